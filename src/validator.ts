// Package and dataset manifest validation

import type { Dataset, PackageManifest, ValidationResult } from "./model.js";
import {
  InvalidIdentifierError,
  MissingPipelineError,
  UnusedPipelinesError,
} from "./errors.js";
import { isValidConstraint, parseVersion } from "./version.js";

export const KEY_SEPARATOR = "@";

const PIPELINE_EXTENSIONS = [".json", ".yml"];

/**
 * Structural checks on a package descriptor and its datasets. Errors exclude
 * the package from the catalog, warnings are reported only.
 */
export function validatePackage(
  manifest: PackageManifest,
  datasets: Dataset[]
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!manifest.name) {
    errors.push("Root field 'name' is required");
  } else if (manifest.name.includes(KEY_SEPARATOR)) {
    errors.push(
      `Package name must not contain '${KEY_SEPARATOR}': '${manifest.name}'`
    );
  }

  if (!manifest.version) {
    errors.push("Root field 'version' is required");
  } else {
    try {
      parseVersion(manifest.version);
    } catch (err) {
      errors.push(err instanceof Error ? err.message : String(err));
    }
  }

  if (
    manifest.kibanaVersionConstraint &&
    !isValidConstraint(manifest.kibanaVersionConstraint)
  ) {
    errors.push(
      `Invalid Kibana version constraint '${manifest.kibanaVersionConstraint}'`
    );
  }

  if (!manifest.type) warnings.push("Root field 'type' is empty");
  if (datasets.length === 0) warnings.push("Package has no datasets");

  for (const dataset of datasets) {
    const ctx = `Dataset '${dataset.path}'`;
    if (!dataset.title) errors.push(`${ctx}: missing required field 'title'`);
    if (!dataset.type) errors.push(`${ctx}: missing required field 'type'`);
    if (dataset.streams.length === 0) {
      errors.push(`${ctx}: missing required field 'streams'`);
    }
    dataset.streams.forEach((stream, i) => {
      if (!stream.input) {
        errors.push(`${ctx}: stream ${i} is missing required field 'input'`);
      }
    });
  }

  return { errors, warnings, isValid: errors.length === 0 };
}

function hasPipeline(files: readonly string[], name: string): boolean {
  return PIPELINE_EXTENSIONS.some((ext) => files.includes(name + ext));
}

/**
 * Ingest pipeline consistency for one dataset. `pipelineFiles` are the file
 * names found in its `elasticsearch/ingest-pipeline` directory.
 *
 * Returns the dataset with `ingestPipeline` set to "default" when it was
 * left out and a default pipeline file exists. Throws InvalidIdentifierError,
 * UnusedPipelinesError or MissingPipelineError.
 */
export function validateDataset(
  dataset: Dataset,
  pipelineFiles: readonly string[]
): Dataset {
  if (dataset.id.includes("-")) {
    throw new InvalidIdentifierError(dataset.id);
  }

  let ingestPipeline = dataset.ingestPipeline;
  if (!ingestPipeline && hasPipeline(pipelineFiles, "default")) {
    ingestPipeline = "default";
  }

  if (!ingestPipeline) {
    if (pipelineFiles.length > 0) {
      throw new UnusedPipelinesError(dataset.id, [...pipelineFiles]);
    }
    return dataset;
  }

  if (!hasPipeline(pipelineFiles, ingestPipeline)) {
    throw new MissingPipelineError(dataset.id, ingestPipeline);
  }

  return ingestPipeline === dataset.ingestPipeline
    ? dataset
    : { ...dataset, ingestPipeline };
}
