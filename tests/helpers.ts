import { fileURLToPath } from "node:url";
import type { Dataset, Package } from "../src/model.js";
import { catalogPath, downloadPath } from "../src/parser.js";

export const PACKAGES_DIR = fileURLToPath(
  new URL("./fixtures/packages", import.meta.url)
);
export const DUPLICATE_DIR = fileURLToPath(
  new URL("./fixtures/duplicate", import.meta.url)
);

export function makePackage(
  name: string,
  version: string,
  overrides: Partial<Package> = {}
): Package {
  return {
    name,
    version,
    description: `${name} integration`,
    type: "integration",
    categories: [],
    internal: false,
    datasets: [],
    downloadPath: downloadPath(name, version),
    catalogPath: catalogPath(name, version),
    basePath: `/packages/${name}/${version}`,
    ...overrides,
  };
}

export function makeDataset(overrides: Partial<Dataset> = {}): Dataset {
  return {
    id: "nginx.access",
    title: "Nginx access logs",
    type: "logs",
    release: "beta",
    streams: [{ input: "logs", vars: [] }],
    package: "nginx",
    path: "access",
    basePath: "/packages/nginx/2.0.0/dataset/access",
    ...overrides,
  };
}
