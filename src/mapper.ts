// Catalog → wire mapping — pure functions, no I/O

import type {
  Dataset,
  Package,
  PackageSummary,
  ResultSet,
  Stream,
  VarValue,
} from "./model.js";
import { KEY_SEPARATOR } from "./validator.js";

// --- Result set ---

function sortKey(pkg: Package): string {
  return pkg.name + KEY_SEPARATOR + pkg.version;
}

export function toSummary(pkg: Package): PackageSummary {
  const summary: PackageSummary = {
    name: pkg.name,
    description: pkg.description,
    version: pkg.version,
    type: pkg.type,
    download: pkg.downloadPath,
    path: pkg.catalogPath,
  };
  if (pkg.title !== undefined) summary.title = pkg.title;
  if (pkg.icons !== undefined) summary.icons = pkg.icons;
  if (pkg.internal) summary.internal = true;
  return summary;
}

/**
 * Order by the text of `name@version` and project each package. The key
 * comparison is by code unit, not locale, so the order is the same everywhere.
 */
export function formatResults(selected: readonly Package[]): ResultSet {
  return selected
    .map((pkg) => ({ key: sortKey(pkg), pkg }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map(({ pkg }) => toSummary(pkg));
}

export function resultsToJson(results: ResultSet): string {
  if (results.length === 0) return "[]";
  return JSON.stringify(results, null, 2);
}

// --- Variables ---

export function varToPlain(value: VarValue): unknown {
  switch (value.kind) {
    case "string":
    case "number":
    case "boolean":
      return value.value;
    case "null":
      return null;
    case "list":
      return value.items.map(varToPlain);
    case "map":
      return Object.fromEntries(
        value.entries.map(([k, v]) => [k, varToPlain(v)])
      );
  }
}

// --- Package detail ---

function streamToJson(stream: Stream): Record<string, unknown> {
  const entry: Record<string, unknown> = { input: stream.input };
  if (stream.vars.length > 0) {
    entry["vars"] = stream.vars.map((def) =>
      Object.fromEntries(def.map(([k, v]) => [k, varToPlain(v)]))
    );
  }
  if (stream.dataset) entry["dataset"] = stream.dataset;
  if (stream.title) entry["title"] = stream.title;
  if (stream.description) entry["description"] = stream.description;
  return entry;
}

function datasetToJson(dataset: Dataset): Record<string, unknown> {
  const entry: Record<string, unknown> = {
    id: dataset.id,
    title: dataset.title,
    release: dataset.release,
    type: dataset.type,
  };
  if (dataset.ingestPipeline) entry["ingest_pipeline"] = dataset.ingestPipeline;
  entry["streams"] = dataset.streams.map(streamToJson);
  entry["package"] = dataset.package;
  entry["path"] = dataset.path;
  return entry;
}

export function packageToJson(pkg: Package): string {
  const payload: Record<string, unknown> = { ...toSummary(pkg) };
  payload["categories"] = pkg.categories;
  if (pkg.kibanaVersionConstraint) {
    payload["requirement"] = {
      kibana: { versions: pkg.kibanaVersionConstraint },
    };
  }
  payload["datasets"] = pkg.datasets.map(datasetToJson);
  return JSON.stringify(payload, null, 2);
}

// --- URI construction ---

export const INDEX_URI = "package://catalog/index";

export function buildPackageUri(name: string, version: string): string {
  return `package://${name}/${version}`;
}

export function parsePackageUri(
  uri: string
): { name: string; version: string } | null {
  const match = /^package:\/\/([^/]+)\/([^/]+)$/.exec(uri);
  if (!match || match[1] === undefined || match[2] === undefined) return null;
  return { name: match[1], version: match[2] };
}

// --- MCP Resource shapes ---
// Plain objects matching the MCP resource schema, kept free of SDK types.

export interface McpResourceMeta {
  uri: string;
  name: string;
  title: string;
  description: string;
  mimeType: string;
}

export function buildPackageResource(summary: PackageSummary): McpResourceMeta {
  return {
    uri: buildPackageUri(summary.name, summary.version),
    name: `${summary.name}${KEY_SEPARATOR}${summary.version}`,
    title: summary.title ?? summary.name,
    description: summary.description,
    mimeType: "application/json",
  };
}

export function buildIndexResource(count: number): McpResourceMeta {
  return {
    uri: INDEX_URI,
    name: "index",
    title: "Package catalog",
    description:
      `Newest version of each of the ${count} listed package(s). ` +
      `Use the 'search' tool to filter by category, Kibana version or name.`,
    mimeType: "application/json",
  };
}
