// Collapse a filtered package list to the versions a listing exposes

import type { Package } from "./model.js";
import { compareVersions, GREATER } from "./version.js";

function byNameThenVersionText(a: Package, b: Package): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.version !== b.version) return a.version < b.version ? -1 : 1;
  return 0;
}

/**
 * With `all`, every package is kept. Otherwise one package per name: the one
 * with the greatest version. Equal versions keep the first in name/version
 * text order, so repeated runs pick the same package.
 */
export function selectVersions(
  filtered: readonly Package[],
  all: boolean
): Package[] {
  if (all) return [...filtered];

  const newest = new Map<string, Package>();
  for (const pkg of [...filtered].sort(byNameThenVersionText)) {
    const current = newest.get(pkg.name);
    if (!current || compareVersions(pkg.version, current.version) === GREATER) {
      newest.set(pkg.name, pkg);
    }
  }
  return [...newest.values()];
}
