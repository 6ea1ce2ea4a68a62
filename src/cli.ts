#!/usr/bin/env node
// Package catalog MCP server CLI
// Usage: catalog-mcp [packages-dir] [--transport stdio|http] [--port 8000]

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createCatalogServer, type CatalogMcpServer } from "./server.js";

function printUsage(): void {
  process.stderr.write(
    `Usage: catalog-mcp [path/to/packages] [options]

Options:
  --transport <type>  Transport: stdio (default) or http
  --port <number>     Port for HTTP transport (default: 8000)
  --no-reload         Index the package tree once instead of on every request
  --no-warnings       Do not report packages left out of the catalog
  --help, -h          Show this help

Examples:
  catalog-mcp                              # serve ./packages via stdio
  catalog-mcp ./packages --no-reload
  catalog-mcp ./packages --transport http --port 9000

The packages directory holds <name>/<version>/manifest.yml entries.
Use the 'search' tool to query it; package://catalog/index lists the newest
version of every package.
`
  );
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      transport: { type: "string", default: "stdio" },
      port: { type: "string", default: "8000" },
      "no-reload": { type: "boolean", default: false },
      "no-warnings": { type: "boolean", default: false },
      help: { type: "boolean", default: false, short: "h" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printUsage();
    process.exit(0);
  }

  const packagesDir = positionals[0] ?? "packages";

  if (!existsSync(packagesDir)) {
    process.stderr.write(`Error: packages directory not found: ${packagesDir}\n`);
    process.exit(1);
  }

  let catalog: CatalogMcpServer;
  try {
    catalog = createCatalogServer(packagesDir, {
      reloadOnQuery: !values["no-reload"],
      warnOnValidation: !values["no-warnings"],
    });
  } catch (err) {
    process.stderr.write(
      `Error: ${err instanceof Error ? err.message : String(err)}\n`
    );
    process.exit(1);
  }

  const transport = values.transport ?? "stdio";

  if (transport === "http") {
    const port = parseInt(values.port ?? "8000", 10);
    if (Number.isNaN(port)) {
      process.stderr.write(`Error: invalid port: ${values.port}\n`);
      process.exit(1);
    }
    const { StreamableHTTPServerTransport } = await import(
      "@modelcontextprotocol/sdk/server/streamableHttp.js"
    );
    const http = await import("node:http");

    const sessionTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined, // stateless
    });
    await catalog.server.connect(sessionTransport);

    const httpServer = http.createServer((req, res) => {
      sessionTransport.handleRequest(req, res).catch((err: unknown) => {
        process.stderr.write(
          `[catalog-mcp] request failed: ${err instanceof Error ? err.message : String(err)}\n`
        );
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
    });

    httpServer.listen(port, () => {
      process.stderr.write(
        `[catalog-mcp] HTTP transport listening on http://localhost:${port}/mcp\n`
      );
    });
  } else if (transport === "stdio") {
    await catalog.server.connect(new StdioServerTransport());
  } else {
    process.stderr.write(`Error: unknown transport: ${transport}\n`);
    process.exit(1);
  }
}

main().catch((err) => {
  process.stderr.write(
    `Fatal: ${err instanceof Error ? err.message : String(err)}\n`
  );
  process.exit(1);
});
