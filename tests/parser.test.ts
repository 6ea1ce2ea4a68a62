import { describe, it, expect } from "vitest";
import { join } from "node:path";
import {
  catalogPath,
  downloadPath,
  listPipelineFiles,
  loadAll,
  loadPackage,
  parseDatasetDict,
  parsePackageDict,
  toVarValue,
} from "../src/parser.js";
import { DUPLICATE_DIR, PACKAGES_DIR } from "./helpers.js";

describe("parsePackageDict", () => {
  it("parses a minimal descriptor with defaults", () => {
    const manifest = parsePackageDict({
      name: "mysql",
      version: "1.0.0",
      description: "MySQL integration",
      type: "integration",
    });
    expect(manifest).toEqual({
      name: "mysql",
      version: "1.0.0",
      title: undefined,
      description: "MySQL integration",
      type: "integration",
      categories: [],
      kibanaVersionConstraint: undefined,
      internal: false,
      icons: undefined,
    });
  });

  it("reads the Kibana constraint from requirement.kibana.versions", () => {
    const manifest = parsePackageDict({
      name: "mysql",
      version: "1.0.0",
      requirement: { kibana: { versions: ">=7.2.0" } },
    });
    expect(manifest.kibanaVersionConstraint).toBe(">=7.2.0");
  });

  it("accepts a single category as a string", () => {
    const manifest = parsePackageDict({ name: "a", version: "1.0.0", categories: "web" });
    expect(manifest.categories).toEqual(["web"]);
  });
});

describe("parseDatasetDict", () => {
  it("defaults id and release", () => {
    const dataset = parseDatasetDict(
      { title: "Access", type: "logs", streams: [{ input: "logs" }] },
      "nginx",
      "/packages/nginx/2.0.0/dataset/access"
    );
    expect(dataset.id).toBe("nginx.access");
    expect(dataset.release).toBe("beta");
    expect(dataset.path).toBe("access");
    expect(dataset.package).toBe("nginx");
    expect(dataset.ingestPipeline).toBeUndefined();
    expect(dataset.streams).toEqual([
      {
        input: "logs",
        vars: [],
        dataset: undefined,
        title: undefined,
        description: undefined,
      },
    ]);
  });

  it("keeps an explicit id and ingest pipeline", () => {
    const dataset = parseDatasetDict(
      { id: "nginx.web", title: "t", type: "logs", ingest_pipeline: "access" },
      "nginx",
      "/packages/nginx/2.0.0/dataset/access"
    );
    expect(dataset.id).toBe("nginx.web");
    expect(dataset.ingestPipeline).toBe("access");
  });
});

describe("toVarValue", () => {
  it("tags scalars", () => {
    expect(toVarValue("10s")).toEqual({ kind: "string", value: "10s" });
    expect(toVarValue(3)).toEqual({ kind: "number", value: 3 });
    expect(toVarValue(false)).toEqual({ kind: "boolean", value: false });
    expect(toVarValue(null)).toEqual({ kind: "null" });
  });

  it("tags nested lists and maps", () => {
    expect(toVarValue({ hosts: ["a", 1] })).toEqual({
      kind: "map",
      entries: [
        [
          "hosts",
          {
            kind: "list",
            items: [
              { kind: "string", value: "a" },
              { kind: "number", value: 1 },
            ],
          },
        ],
      ],
    });
  });
});

describe("derived paths", () => {
  it("builds download and catalog paths from name and version", () => {
    expect(downloadPath("nginx", "2.0.0")).toBe("/epr/nginx/nginx-2.0.0.tar.gz");
    expect(catalogPath("nginx", "2.0.0")).toBe("/package/nginx/2.0.0");
  });
});

describe("loadPackage", () => {
  it("loads the nginx fixture", () => {
    const { package: pkg, warnings } = loadPackage(join(PACKAGES_DIR, "nginx", "2.0.0"));
    expect(warnings).toEqual([]);
    expect(pkg.name).toBe("nginx");
    expect(pkg.title).toBe("Nginx");
    expect(pkg.categories).toEqual(["web", "security"]);
    expect(pkg.kibanaVersionConstraint).toBe("^7.0.0");
    expect(pkg.icons).toEqual([
      { src: "/img/nginx.svg", title: "Nginx logo", size: "32x32", type: "image/svg+xml" },
    ]);
    expect(pkg.downloadPath).toBe("/epr/nginx/nginx-2.0.0.tar.gz");
    expect(pkg.catalogPath).toBe("/package/nginx/2.0.0");

    expect(pkg.datasets).toHaveLength(1);
    const access = pkg.datasets[0];
    expect(access?.id).toBe("nginx.access");
    expect(access?.release).toBe("ga");
    expect(access?.ingestPipeline).toBe("access");
    expect(access?.streams[0]?.dataset).toBe("nginx.access");
    expect(access?.streams[0]?.vars).toEqual([
      [
        ["name", { kind: "string", value: "paths" }],
        [
          "default",
          { kind: "list", items: [{ kind: "string", value: "/var/log/nginx/access.log*" }] },
        ],
      ],
    ]);
  });

  it("sets the default pipeline from the dataset directory", () => {
    const { package: pkg } = loadPackage(join(PACKAGES_DIR, "mysql", "1.2.0"));
    expect(pkg.datasets.map((d) => d.path)).toEqual(["slowlog", "status"]);
    expect(pkg.datasets.map((d) => d.ingestPipeline)).toEqual(["default", undefined]);
    expect(pkg.datasets.map((d) => d.release)).toEqual(["ga", "beta"]);
    expect(pkg.datasets[1]?.id).toBe("mysql.status");
  });

  it("throws for a dataset that fails validation", () => {
    expect(() => loadPackage(join(PACKAGES_DIR, "broken", "1.0.0"))).toThrow(
      "Dataset id is not allowed to contain '-': broken-errors"
    );
  });
});

describe("listPipelineFiles", () => {
  it("lists pipeline file names", () => {
    const dir = join(PACKAGES_DIR, "mysql", "1.2.0", "dataset", "slowlog");
    expect(listPipelineFiles(dir)).toEqual(["default.json"]);
  });

  it("returns nothing when the directory is missing", () => {
    const dir = join(PACKAGES_DIR, "mysql", "1.2.0", "dataset", "status");
    expect(listPipelineFiles(dir)).toEqual([]);
  });
});

describe("loadAll", () => {
  it("loads every valid package and reports the rest", () => {
    const result = loadAll(PACKAGES_DIR);
    expect(result.packages.map((p) => `${p.name}@${p.version}`)).toEqual([
      "endpoint@0.1.0",
      "mysql@1.0.0",
      "mysql@1.2.0",
      "nginx@2.0.0",
    ]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.path).toBe(join(PACKAGES_DIR, "broken", "1.0.0"));
    expect(result.failures[0]?.message).toBe(
      "Dataset id is not allowed to contain '-': broken-errors"
    );
    expect(result.warnings).toEqual([
      { path: join(PACKAGES_DIR, "endpoint", "0.1.0"), message: "Package has no datasets" },
    ]);
  });

  it("warns when the directory disagrees with the manifest", () => {
    const result = loadAll(DUPLICATE_DIR);
    expect(result.packages).toHaveLength(2);
    expect(result.warnings.map((w) => w.message)).toContain(
      "Directory dup/1.0.0-copy does not match manifest dup/1.0.0+build.2"
    );
  });

  it("throws when the root does not exist", () => {
    expect(() => loadAll(join(PACKAGES_DIR, "missing"))).toThrow(
      "Packages directory not found"
    );
  });
});
