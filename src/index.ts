// Package catalog — public library surface
// Import this to resolve catalog queries or embed the MCP server in your own application.

export {
  loadAll,
  loadPackage,
  parsePackageDict,
  parseDatasetDict,
  listPipelineFiles,
  toVarValue,
  downloadPath,
  catalogPath,
} from "./parser.js";
export { validatePackage, validateDataset, KEY_SEPARATOR } from "./validator.js";
export {
  parseVersion,
  isValidVersion,
  compareVersions,
  isNewer,
  satisfiesConstraint,
  LESS,
  EQUAL,
  GREATER,
} from "./version.js";
export { PackageIndex, CatalogStore, buildIndex } from "./registry.js";
export { filterPackages, buildPredicates } from "./filter.js";
export { selectVersions } from "./select.js";
export {
  formatResults,
  resultsToJson,
  packageToJson,
  varToPlain,
  buildPackageUri,
  INDEX_URI,
} from "./mapper.js";
export { decodeQuery, decodeSearchArguments, parseFlag } from "./query.js";
export { resolveCatalog, DEFAULT_QUERY } from "./catalog.js";
export { createCatalogServer, SEARCH_TOOL } from "./server.js";
export {
  CatalogError,
  MalformedVersionError,
  InvalidIdentifierError,
  UnusedPipelinesError,
  MissingPipelineError,
  DuplicateVersionError,
  isCatalogError,
} from "./errors.js";
export type {
  Package,
  PackageManifest,
  Dataset,
  Stream,
  Icon,
  VarValue,
  VarDefinition,
  Query,
  PackageSummary,
  ResultSet,
  ValidationResult,
  LoadResult,
  LoadIssue,
} from "./model.js";
export type { CatalogErrorKind } from "./errors.js";
export type { Ordering } from "./version.js";
export type { PackageLoader, Snapshot } from "./registry.js";
export type { PackagePredicate } from "./filter.js";
export type { SearchParams } from "./query.js";
export type { CatalogServerOptions, CatalogMcpServer } from "./server.js";
export type { McpResourceMeta } from "./mapper.js";
