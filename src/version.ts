// Version ordering and compatibility checks on top of semver

import semver from "semver";
import type { SemVer } from "semver";
import { MalformedVersionError } from "./errors.js";

export type Ordering = -1 | 0 | 1;

export const LESS: Ordering = -1;
export const EQUAL: Ordering = 0;
export const GREATER: Ordering = 1;

/**
 * Parse a strict `major.minor.patch[-pre][+build]` string.
 * semver itself tolerates a leading `v`, `=` and surrounding blanks; catalog
 * versions don't.
 */
export function parseVersion(input: string): SemVer {
  const parsed = isValidVersion(input) ? semver.parse(input) : null;
  if (parsed === null) throw new MalformedVersionError(input);
  return parsed;
}

export function isValidVersion(input: string): boolean {
  return /^\d/.test(input) && input.trim() === input && semver.valid(input) !== null;
}

export function compareVersions(
  a: string | SemVer,
  b: string | SemVer
): Ordering {
  const left = typeof a === "string" ? parseVersion(a) : a;
  const right = typeof b === "string" ? parseVersion(b) : b;
  return left.compare(right);
}

export function isNewer(a: string | SemVer, b: string | SemVer): boolean {
  return compareVersions(a, b) === GREATER;
}

// Key under which two versions count as the same release (build metadata ignored)
export function releaseKey(version: string): string {
  return parseVersion(version).version;
}

export function isValidConstraint(constraint: string): boolean {
  return semver.validRange(constraint) !== null;
}

/**
 * An empty constraint accepts every version. A constraint that is not a valid
 * range is an error, never a silent mismatch. Pre-release platform builds
 * (e.g. `7.6.0-SNAPSHOT`) are compared like any other version.
 */
export function satisfiesConstraint(
  version: SemVer,
  constraint: string | undefined
): boolean {
  if (!constraint) return true;
  if (!isValidConstraint(constraint)) {
    throw new MalformedVersionError(constraint);
  }
  return semver.satisfies(version, constraint, { includePrerelease: true });
}
