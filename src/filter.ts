// Query predicates over an index snapshot

import type { SemVer } from "semver";
import type { Package, Query } from "./model.js";
import type { PackageIndex } from "./registry.js";
import { parseVersion, satisfiesConstraint } from "./version.js";

export type PackagePredicate = (pkg: Package) => boolean;

/**
 * Predicates in evaluation order, cheapest and most restrictive first.
 * Throws MalformedVersionError for an unparsable platform version, so the
 * query is rejected before any package is looked at.
 */
export function buildPredicates(query: Query): PackagePredicate[] {
  const predicates: PackagePredicate[] = [];

  if (!query.internal) {
    predicates.push((pkg) => !pkg.internal);
  }

  const { category } = query;
  if (category) {
    predicates.push((pkg) => pkg.categories.includes(category));
  }

  if (query.platformVersion) {
    const platform: SemVer = parseVersion(query.platformVersion);
    predicates.push((pkg) =>
      satisfiesConstraint(platform, pkg.kibanaVersionConstraint)
    );
  }

  const { packageName } = query;
  if (packageName) {
    predicates.push((pkg) => pkg.name === packageName);
  }

  return predicates;
}

export function filterPackages(index: PackageIndex, query: Query): Package[] {
  const predicates = buildPredicates(query);
  return index.packages().filter((pkg) => predicates.every((p) => p(pkg)));
}
