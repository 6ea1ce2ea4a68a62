// Catalog resolution: filter → select → format over one index snapshot

import type { Query, ResultSet } from "./model.js";
import type { PackageIndex } from "./registry.js";
import { filterPackages } from "./filter.js";
import { selectVersions } from "./select.js";
import { formatResults } from "./mapper.js";

export const DEFAULT_QUERY: Query = { all: false, internal: false };

/**
 * Resolve a query against an index. A package name filter still collapses
 * to the newest version unless `all` is set.
 */
export function resolveCatalog(index: PackageIndex, query: Query): ResultSet {
  const filtered = filterPackages(index, query);
  return formatResults(selectVersions(filtered, query.all));
}
