/**
 * YAML/JSON loading and saving for datasets.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import YAML from 'yaml';
import { DEFAULT_FIELD_MAPPING, Dataset, type FieldMapping } from '../dataset.js';
import { metricSpecOf } from '../metrics/metric.js';
import {
  buildMetricRegistry,
  loadMetric,
  type MetricRegistryEntry,
} from '../metrics/registry.js';
import { serializeMetricSpec } from '../metrics/spec.js';
import { datasetSchema } from './schema.js';

export type DatasetFormat = 'yaml' | 'json';

export interface LoadOptions {
  /** Custom metric entries for deserialization. */
  customMetrics?: MetricRegistryEntry[];
  /** File format. If not specified, inferred from file extension. */
  fmt?: DatasetFormat;
}

/**
 * Load a Dataset from a file. The dataset name defaults to the file name without
 * its extension.
 */
export function loadDatasetFromFile(path: string, opts?: LoadOptions): Dataset {
  const fmt = opts?.fmt ?? inferFormat(path);
  const content = readFileSync(path, 'utf-8');
  return loadDatasetFromText(content, { ...opts, fmt, defaultName: stemOf(path) });
}

/**
 * Load a Dataset from a string.
 */
export function loadDatasetFromText(
  content: string,
  opts?: LoadOptions & { defaultName?: string },
): Dataset {
  const fmt = opts?.fmt ?? 'yaml';
  const raw: unknown = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  return loadDatasetFromObject(raw, opts);
}

/**
 * Load a Dataset from a plain object (after parsing YAML/JSON).
 *
 * Throws a ZodError when the object does not match the dataset schema and a
 * MetricConfigurationError when a metric cannot be built.
 */
export function loadDatasetFromObject(
  data: unknown,
  opts?: LoadOptions & { defaultName?: string },
): Dataset {
  const parsed = datasetSchema.parse(data);
  const registry = buildMetricRegistry(opts?.customMetrics ?? []);

  return new Dataset({
    name: parsed.name ?? opts?.defaultName ?? null,
    records: parsed.records,
    metrics: parsed.metrics.map((spec) => loadMetric(spec, registry)),
    mapping: parsed.mapping,
    concurrency: parsed.concurrency,
  });
}

/**
 * Save a Dataset to a file. Every metric must be serializable.
 */
export function saveDatasetToFile(
  dataset: Dataset,
  path: string,
  opts?: { fmt?: DatasetFormat },
): void {
  const fmt = opts?.fmt ?? inferFormat(path);
  const data = serializeDataset(dataset);

  if (fmt === 'yaml') {
    writeFileSync(path, YAML.stringify(data, { sortMapEntries: false }), 'utf-8');
  } else {
    writeFileSync(path, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  }
}

export function serializeDataset(dataset: Dataset): Record<string, unknown> {
  const data: Record<string, unknown> = {};

  if (dataset.name) data.name = dataset.name;

  const mapping = changedMappingKeys(dataset.mapping);
  if (Object.keys(mapping).length > 0) data.mapping = mapping;

  if (dataset.concurrency !== 1) data.concurrency = dataset.concurrency;

  if (dataset.metrics.length > 0) {
    data.metrics = dataset.metrics.map((m) => serializeMetricSpec(metricSpecOf(m)));
  }

  data.records = dataset.records;
  return data;
}

function changedMappingKeys(mapping: FieldMapping): Partial<FieldMapping> {
  const changed: Partial<FieldMapping> = {};
  if (mapping.input !== DEFAULT_FIELD_MAPPING.input) changed.input = mapping.input;
  if (mapping.output !== DEFAULT_FIELD_MAPPING.output) changed.output = mapping.output;
  if (mapping.expected !== DEFAULT_FIELD_MAPPING.expected) changed.expected = mapping.expected;
  return changed;
}

// -- Utilities --

function inferFormat(path: string): DatasetFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new Error(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}

function stemOf(path: string): string {
  const base = basename(path);
  return base.slice(0, base.length - extname(base).length);
}
