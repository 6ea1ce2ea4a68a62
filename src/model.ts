// Catalog data model — packages, datasets, streams and queries

// Variable definitions are loosely typed YAML; keep them as a tagged union
export type VarValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" }
  | { kind: "list"; items: VarValue[] }
  | { kind: "map"; entries: Array<[string, VarValue]> };

export type VarDefinition = ReadonlyArray<readonly [string, VarValue]>;

export interface Stream {
  input: string;
  vars: VarDefinition[];
  dataset?: string;
  title?: string;
  description?: string;
}

export interface Dataset {
  id: string;
  title: string;
  type: string;
  release: string;          // defaults to "beta"
  ingestPipeline?: string;
  streams: Stream[];
  package: string;
  path: string;             // name of the dataset directory
  basePath: string;         // local directory, never serialized
}

export interface Icon {
  src: string;
  title?: string;
  size?: string;
  type?: string;
}

// Package descriptor fields as read from manifest.yml, before validation
export interface PackageManifest {
  name: string;
  version: string;
  title?: string;
  description: string;
  type: string;
  categories: string[];
  kibanaVersionConstraint?: string;
  internal: boolean;
  icons?: Icon[];
}

export interface Package extends PackageManifest {
  datasets: Dataset[];
  downloadPath: string;
  catalogPath: string;
  basePath: string;
}

export interface Query {
  platformVersion?: string;
  category?: string;
  packageName?: string;
  all: boolean;
  internal: boolean;
}

export interface PackageSummary {
  name: string;
  description: string;
  version: string;
  type: string;
  download: string;
  path: string;
  title?: string;
  icons?: Icon[];
  internal?: true;
}

export type ResultSet = PackageSummary[];

export interface ValidationResult {
  errors: string[];
  warnings: string[];
  isValid: boolean;
}

export interface LoadIssue {
  path: string;
  message: string;
}

export interface LoadResult {
  packages: Package[];
  failures: LoadIssue[];
  warnings: LoadIssue[];
}
