// Catalog error kinds. Every kind is recoverable at the unit that raised it:
// a query, a single package load, or a single index build.

export type CatalogErrorKind =
  | "MalformedVersion"
  | "InvalidIdentifier"
  | "UnusedPipelines"
  | "MissingPipeline"
  | "DuplicateVersion";

export class CatalogError extends Error {
  constructor(
    readonly kind: CatalogErrorKind,
    message: string
  ) {
    super(message);
    this.name = kind;
  }
}

export class MalformedVersionError extends CatalogError {
  constructor(readonly input: string) {
    super("MalformedVersion", `Invalid version '${input}'`);
  }
}

export class InvalidIdentifierError extends CatalogError {
  constructor(readonly datasetId: string) {
    super(
      "InvalidIdentifier",
      `Dataset id is not allowed to contain '-': ${datasetId}`
    );
  }
}

export class UnusedPipelinesError extends CatalogError {
  constructor(
    readonly datasetId: string,
    readonly files: string[]
  ) {
    super(
      "UnusedPipelines",
      `Dataset '${datasetId}' contains ingest pipelines which are not used: ${files.join(", ")}`
    );
  }
}

export class MissingPipelineError extends CatalogError {
  constructor(
    readonly datasetId: string,
    readonly pipeline: string
  ) {
    super(
      "MissingPipeline",
      `Dataset '${datasetId}' defines ingest_pipeline '${pipeline}' but no ${pipeline}.json or ${pipeline}.yml exists`
    );
  }
}

export class DuplicateVersionError extends CatalogError {
  constructor(
    readonly packageName: string,
    readonly version: string
  ) {
    super(
      "DuplicateVersion",
      `Package '${packageName}' version ${version} is defined more than once`
    );
  }
}

export function isCatalogError(err: unknown): err is CatalogError {
  return err instanceof CatalogError;
}
