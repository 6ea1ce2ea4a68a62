// Package index — immutable name → version → Package snapshot

import type { LoadResult, Package } from "./model.js";
import { DuplicateVersionError } from "./errors.js";
import { isValidVersion, releaseKey } from "./version.js";

export class PackageIndex {
  private readonly byName: ReadonlyMap<string, ReadonlyMap<string, Package>>;
  private readonly all: readonly Package[];

  private constructor(byName: Map<string, Map<string, Package>>) {
    this.byName = byName;
    this.all = Object.freeze([...byName.values()].flatMap((v) => [...v.values()]));
  }

  /**
   * Build an index from a flat package list. Two packages with the same name
   * and the same release (build metadata ignored) abort the build.
   */
  static build(packages: readonly Package[]): PackageIndex {
    const byName = new Map<string, Map<string, Package>>();
    for (const pkg of packages) {
      let versions = byName.get(pkg.name);
      if (!versions) {
        versions = new Map();
        byName.set(pkg.name, versions);
      }
      const key = releaseKey(pkg.version);
      if (versions.has(key)) {
        throw new DuplicateVersionError(pkg.name, pkg.version);
      }
      versions.set(key, Object.freeze({ ...pkg }));
    }
    return new PackageIndex(byName);
  }

  static empty(): PackageIndex {
    return new PackageIndex(new Map());
  }

  get size(): number {
    return this.all.length;
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  versions(name: string): Package[] {
    return [...(this.byName.get(name)?.values() ?? [])];
  }

  get(name: string, version: string): Package | undefined {
    if (!isValidVersion(version)) return undefined;
    return this.byName.get(name)?.get(releaseKey(version));
  }

  packages(): readonly Package[] {
    return this.all;
  }
}

export function buildIndex(packages: readonly Package[]): PackageIndex {
  return PackageIndex.build(packages);
}

export type PackageLoader = () => LoadResult;

export interface Snapshot {
  index: PackageIndex;
  load: LoadResult;
}

/**
 * Holds the current index snapshot. `rebuild()` loads and indexes off to the
 * side and swaps the reference only on success, so a query that captured a
 * snapshot keeps seeing all of it.
 */
export class CatalogStore {
  private current: Snapshot;

  constructor(private readonly loader: PackageLoader) {
    this.current = {
      index: PackageIndex.empty(),
      load: { packages: [], failures: [], warnings: [] },
    };
  }

  snapshot(): Snapshot {
    return this.current;
  }

  rebuild(): Snapshot {
    const load = this.loader();
    const index = PackageIndex.build(load.packages);
    this.current = { index, load };
    return this.current;
  }
}
