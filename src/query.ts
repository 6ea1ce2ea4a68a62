// Search query decoding — wire parameters to a Query value

import { z } from "zod";
import type { Query } from "./model.js";
import { parseVersion } from "./version.js";

const FlagSchema = z.union([z.boolean(), z.string()]).optional();

/** Search arguments as they arrive on the wire. */
export const SearchParamsSchema = z
  .object({
    kibana: z.string().optional().describe("Kibana version packages must be compatible with"),
    category: z.string().optional().describe("Only packages tagged with this category"),
    package: z.string().optional().describe("Only packages with exactly this name"),
    all: FlagSchema.describe("Return every matching version, not only the newest"),
    internal: FlagSchema.describe("Include internal packages"),
  })
  .strict();

export type SearchParams = z.infer<typeof SearchParamsSchema>;

/** JSON Schema for the search tool, kept in step with SearchParamsSchema. */
export const SEARCH_INPUT_JSON_SCHEMA = {
  type: "object",
  properties: {
    kibana: {
      type: "string",
      description: "Kibana version packages must be compatible with",
    },
    category: {
      type: "string",
      description: "Only packages tagged with this category",
    },
    package: {
      type: "string",
      description: "Only packages with exactly this name",
    },
    all: {
      type: ["boolean", "string"],
      description: "Return every matching version, not only the newest",
    },
    internal: {
      type: ["boolean", "string"],
      description: "Include internal packages",
    },
  },
  additionalProperties: false,
} as const;

const TRUE_VALUES = new Set(["1", "t", "T", "TRUE", "true", "True"]);

// Anything that isn't a recognised true value reads as false
export function parseFlag(value: boolean | string | undefined): boolean {
  if (typeof value === "boolean") return value;
  return value !== undefined && TRUE_VALUES.has(value);
}

/**
 * Turn search parameters into a Query. Empty strings leave a filter unset.
 * A malformed `kibana` version throws MalformedVersionError: the caller
 * must reject the request rather than drop the filter.
 */
export function decodeQuery(params: SearchParams): Query {
  const query: Query = {
    all: parseFlag(params.all),
    internal: parseFlag(params.internal),
  };
  if (params.kibana) {
    parseVersion(params.kibana);
    query.platformVersion = params.kibana;
  }
  if (params.category) query.category = params.category;
  if (params.package) query.packageName = params.package;
  return query;
}

export function decodeSearchArguments(args: unknown): Query {
  return decodeQuery(SearchParamsSchema.parse(args ?? {}));
}
