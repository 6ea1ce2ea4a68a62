// Manifest loader — reads a package tree from disk into catalog records
//
// Layout:
//   <root>/<name>/<version>/manifest.yml
//   <root>/<name>/<version>/dataset/<dir>/manifest.yml
//   <root>/<name>/<version>/dataset/<dir>/elasticsearch/ingest-pipeline/*

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import yaml from "js-yaml";
import type {
  Dataset,
  Icon,
  LoadResult,
  Package,
  PackageManifest,
  Stream,
  VarDefinition,
  VarValue,
} from "./model.js";
import { validateDataset, validatePackage } from "./validator.js";

export const MANIFEST_FILE = "manifest.yml";

// --- Raw YAML type helpers ---

type RawMap = Record<string, unknown>;

function isRawMap(value: unknown): value is RawMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

function asOptionalString(value: unknown): string | undefined {
  return value !== undefined && value !== null ? String(value) : undefined;
}

function asStringArray(value: unknown): string[] {
  if (!value) return [];
  if (Array.isArray(value)) return value.map(String);
  return [String(value)];
}

function asMapArray(value: unknown): RawMap[] {
  return Array.isArray(value) ? value.filter(isRawMap) : [];
}

function asBoolean(value: unknown): boolean {
  return value === true || value === "true";
}

// --- Variables ---

export function toVarValue(value: unknown): VarValue {
  if (value === null || value === undefined) return { kind: "null" };
  if (typeof value === "string") return { kind: "string", value };
  if (typeof value === "number") return { kind: "number", value };
  if (typeof value === "boolean") return { kind: "boolean", value };
  if (value instanceof Date) {
    return { kind: "string", value: value.toISOString() };
  }
  if (Array.isArray(value)) {
    return { kind: "list", items: value.map(toVarValue) };
  }
  if (isRawMap(value)) {
    return {
      kind: "map",
      entries: Object.entries(value).map(
        ([k, v]): [string, VarValue] => [k, toVarValue(v)]
      ),
    };
  }
  return { kind: "string", value: String(value) };
}

function parseVars(value: unknown): VarDefinition[] {
  return asMapArray(value).map((raw) =>
    Object.entries(raw).map(
      ([k, v]): readonly [string, VarValue] => [k, toVarValue(v)]
    )
  );
}

// --- Dict parsing ---

function parseIcon(raw: RawMap): Icon {
  return {
    src: asString(raw["src"]),
    title: asOptionalString(raw["title"]),
    size: asOptionalString(raw["size"]),
    type: asOptionalString(raw["type"]),
  };
}

function kibanaConstraint(data: RawMap): string | undefined {
  const requirement = data["requirement"];
  if (!isRawMap(requirement)) return undefined;
  const kibana = requirement["kibana"];
  if (!isRawMap(kibana)) return undefined;
  return asOptionalString(kibana["versions"]) || undefined;
}

export function parsePackageDict(data: RawMap): PackageManifest {
  return {
    name: asString(data["name"]),
    version: asString(data["version"]),
    title: asOptionalString(data["title"]),
    description: asString(data["description"]),
    type: asString(data["type"]),
    categories: asStringArray(data["categories"]),
    kibanaVersionConstraint: kibanaConstraint(data),
    internal: asBoolean(data["internal"]),
    icons: Array.isArray(data["icons"])
      ? asMapArray(data["icons"]).map(parseIcon)
      : undefined,
  };
}

function parseStream(raw: RawMap): Stream {
  return {
    input: asString(raw["input"]),
    vars: parseVars(raw["vars"]),
    dataset: asOptionalString(raw["dataset"]),
    title: asOptionalString(raw["title"]),
    description: asOptionalString(raw["description"]),
  };
}

/**
 * Build a Dataset from its manifest. `id` defaults to `{package}.{dir}` and
 * `release` to "beta".
 */
export function parseDatasetDict(
  data: RawMap,
  packageName: string,
  basePath: string
): Dataset {
  const dir = basename(basePath);
  return {
    id: asString(data["id"]) || `${packageName}.${dir}`,
    title: asString(data["title"]),
    type: asString(data["type"]),
    release: asString(data["release"]) || "beta",
    ingestPipeline: asOptionalString(data["ingest_pipeline"]) || undefined,
    streams: asMapArray(data["streams"]).map(parseStream),
    package: packageName,
    path: dir,
    basePath,
  };
}

// --- Derived paths ---

export function downloadPath(name: string, version: string): string {
  return `/epr/${name}/${name}-${version}.tar.gz`;
}

export function catalogPath(name: string, version: string): string {
  return `/package/${name}/${version}`;
}

// --- Disk access ---

function readYamlMap(filePath: string): RawMap {
  const raw = readFileSync(filePath, "utf-8");
  const data = yaml.load(raw, { schema: yaml.DEFAULT_SCHEMA });
  if (!isRawMap(data)) {
    throw new Error(`Invalid YAML structure in: ${filePath}`);
  }
  return data;
}

function listDirs(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

export function listPipelineFiles(datasetPath: string): string[] {
  const dir = join(datasetPath, "elasticsearch", "ingest-pipeline");
  if (!existsSync(dir) || !statSync(dir).isDirectory()) return [];
  return readdirSync(dir).sort();
}

export interface LoadedPackage {
  package: Package;
  warnings: string[];
}

/**
 * Load and validate one package version directory. Throws when the package
 * must be left out of the catalog.
 */
export function loadPackage(packagePath: string): LoadedPackage {
  const manifest = parsePackageDict(
    readYamlMap(join(packagePath, MANIFEST_FILE))
  );

  const datasetRoot = join(packagePath, "dataset");
  const parsed = listDirs(datasetRoot).map((dir) => {
    const basePath = join(datasetRoot, dir);
    const manifestPath = join(basePath, MANIFEST_FILE);
    if (!existsSync(manifestPath)) {
      throw new Error(
        `Manifest does not exist for dataset '${dir}' in package: ${packagePath}`
      );
    }
    return parseDatasetDict(readYamlMap(manifestPath), manifest.name, basePath);
  });

  const result = validatePackage(manifest, parsed);
  if (!result.isValid) {
    throw new Error(`Invalid package ${packagePath}:\n${result.errors.join("\n")}`);
  }

  const warnings = [...result.warnings];
  const versionDir = basename(packagePath);
  const nameDir = basename(dirname(packagePath));
  if (nameDir !== manifest.name || versionDir !== manifest.version) {
    warnings.push(
      `Directory ${nameDir}/${versionDir} does not match manifest ${manifest.name}/${manifest.version}`
    );
  }

  const datasets = parsed.map((d) => validateDataset(d, listPipelineFiles(d.basePath)));

  return {
    package: {
      ...manifest,
      datasets,
      downloadPath: downloadPath(manifest.name, manifest.version),
      catalogPath: catalogPath(manifest.name, manifest.version),
      basePath: packagePath,
    },
    warnings,
  };
}

/**
 * Walk a package tree. A package that fails to load is reported in
 * `failures` and never stops the rest of the load.
 */
export function loadAll(rootPath: string): LoadResult {
  const result: LoadResult = { packages: [], failures: [], warnings: [] };

  if (!existsSync(rootPath)) {
    throw new Error(`Packages directory not found: ${rootPath}`);
  }

  for (const name of listDirs(rootPath)) {
    for (const version of listDirs(join(rootPath, name))) {
      const packagePath = join(rootPath, name, version);
      if (!existsSync(join(packagePath, MANIFEST_FILE))) continue;
      try {
        const loaded = loadPackage(packagePath);
        result.packages.push(loaded.package);
        for (const message of loaded.warnings) {
          result.warnings.push({ path: packagePath, message });
        }
      } catch (err) {
        result.failures.push({
          path: packagePath,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  return result;
}
