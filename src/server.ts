// Package catalog MCP server
// Loads a package tree and answers catalog searches as an MCP tool.

import { resolve } from "node:path";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import { loadAll } from "./parser.js";
import { CatalogStore, type Snapshot } from "./registry.js";
import { DEFAULT_QUERY, resolveCatalog } from "./catalog.js";
import {
  INDEX_URI,
  buildIndexResource,
  buildPackageResource,
  packageToJson,
  parsePackageUri,
  resultsToJson,
  type McpResourceMeta,
} from "./mapper.js";
import { decodeSearchArguments, SEARCH_INPUT_JSON_SCHEMA } from "./query.js";
import { isCatalogError } from "./errors.js";
import type { LoadIssue } from "./model.js";

export const SEARCH_TOOL = "search";

export interface CatalogServerOptions {
  reloadOnQuery?: boolean;
  warnOnValidation?: boolean;
}

export interface CatalogMcpServer {
  server: Server;
  store: CatalogStore;
  packagesDir: string;
}

function log(message: string): void {
  process.stderr.write(`[catalog-mcp] ${message}\n`);
}

// Errors that reject a single request rather than the server
function requestErrorMessage(err: unknown): string | null {
  if (err instanceof ZodError) {
    return err.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
  }
  if (isCatalogError(err)) return err.message;
  return null;
}

/**
 * Create an MCP Server over a package directory tree.
 *
 * @param packagesDir  Root holding `<name>/<version>/manifest.yml` entries
 * @param options      reloadOnQuery: rebuild the index before every request;
 *                     warnOnValidation: report packages left out of the catalog
 */
export function createCatalogServer(
  packagesDir: string,
  options: CatalogServerOptions = {}
): CatalogMcpServer {
  const { reloadOnQuery = true, warnOnValidation = true } = options;
  const root = resolve(packagesDir);

  const store = new CatalogStore(() => loadAll(root));
  // Issues of the latest snapshot; only issues new since then are logged
  let reported = new Set<string>();

  function report(issues: Array<[string, LoadIssue]>): void {
    const next = new Set<string>();
    for (const [level, issue] of issues) {
      const key = `${level}:${issue.path}:${issue.message}`;
      next.add(key);
      if (!reported.has(key)) log(`${level}: ${issue.path}: ${issue.message}`);
    }
    reported = next;
  }

  function rebuild(): Snapshot {
    const snapshot = store.rebuild();
    if (warnOnValidation) {
      report([
        ...snapshot.load.failures.map((i): [string, LoadIssue] => ["skipped", i]),
        ...snapshot.load.warnings.map((i): [string, LoadIssue] => ["warning", i]),
      ]);
    }
    return snapshot;
  }

  const initial = rebuild();
  log(
    `Serving ${initial.index.size} package version(s) from ${root}` +
      (initial.load.failures.length > 0
        ? ` (${initial.load.failures.length} skipped)`
        : "")
  );

  function current(): Snapshot {
    return reloadOnQuery ? rebuild() : store.snapshot();
  }

  const server = new Server(
    { name: "package-catalog", version: "0.1.0" },
    {
      capabilities: {
        resources: {},
        tools: {},
      },
    }
  );

  // --- handlers ---

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: SEARCH_TOOL,
        description:
          "Search the package catalog. Returns a JSON array of package summaries " +
          "sorted by name and version; only the newest version of each package " +
          "unless 'all' is set.",
        inputSchema: SEARCH_INPUT_JSON_SCHEMA,
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    if (request.params.name !== SEARCH_TOOL) {
      throw new Error(`Unknown tool: ${request.params.name}`);
    }
    try {
      const query = decodeSearchArguments(request.params.arguments);
      const results = resolveCatalog(current().index, query);
      return { content: [{ type: "text", text: resultsToJson(results) }] };
    } catch (err) {
      const message = requestErrorMessage(err);
      if (message === null) throw err;
      return { content: [{ type: "text", text: message }], isError: true };
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    const results = resolveCatalog(current().index, DEFAULT_QUERY);
    const resources: McpResourceMeta[] = [
      buildIndexResource(results.length),
      ...results.map(buildPackageResource),
    ];
    return { resources };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;
    const { index } = current();

    if (uri === INDEX_URI) {
      return {
        contents: [
          {
            uri,
            mimeType: "application/json",
            text: resultsToJson(resolveCatalog(index, DEFAULT_QUERY)),
          },
        ],
      };
    }

    const ref = parsePackageUri(uri);
    if (!ref) {
      throw new Error(`Unknown resource URI: ${uri}`);
    }
    const pkg = index.get(ref.name, ref.version);
    if (!pkg) {
      throw new Error(`No package '${ref.name}' version ${ref.version}`);
    }

    return {
      contents: [{ uri, mimeType: "application/json", text: packageToJson(pkg) }],
    };
  });

  return { server, store, packagesDir: root };
}
