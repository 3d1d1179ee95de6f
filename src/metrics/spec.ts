/**
 * MetricSpec short forms used in dataset files:
 * - `'BLEU'`: no options
 * - `{ ROUGE: { beta: 2 } }`: options mapping
 * - `{ ROUGE: null }`: no options
 */

import { MetricConfigurationError } from '../errors.js';
import type { MetricSpec } from '../types.js';

/**
 * Deserialize a raw value (from YAML/JSON) into a MetricSpec.
 */
export function deserializeMetricSpec(value: unknown): MetricSpec {
  if (typeof value === 'string') {
    return { name: value, arguments: null };
  }

  if (isPlainObject(value)) {
    const entries = Object.entries(value);
    const first = entries[0];
    if (entries.length !== 1 || first === undefined) {
      throw new MetricConfigurationError(
        `Expected a single key containing the metric name, found keys ${JSON.stringify(Object.keys(value))}`,
      );
    }

    const [name, rawValue] = first;
    if (rawValue === undefined || rawValue === null) {
      return { name, arguments: null };
    }
    if (isPlainObject(rawValue)) {
      return { name, arguments: rawValue };
    }
    throw new MetricConfigurationError(
      `Metric '${name}' expects a mapping of options, got ${JSON.stringify(rawValue)}`,
    );
  }

  throw new MetricConfigurationError(`Invalid metric spec: ${JSON.stringify(value)}`);
}

/**
 * Serialize a MetricSpec to its short form for YAML/JSON.
 */
export function serializeMetricSpec(spec: MetricSpec, useShortForm = true): unknown {
  if (!useShortForm) {
    return spec;
  }
  if (spec.arguments === null) {
    return spec.name;
  }
  return { [spec.name]: spec.arguments };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
