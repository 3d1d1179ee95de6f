/**
 * Metric: the scoring capability every metric implements.
 */

import { MetricConfigurationError } from '../errors.js';
import type { MetricInput, MetricSpec, ScoreResult } from '../types.js';
import { failedScoreResult, toError } from '../types.js';

/**
 * A named scoring function over a MetricInput.
 *
 * `score` may return a result directly or a Promise. A metric signals failure
 * by returning a ScoreResult with `error` set; a thrown exception is turned into
 * such a result by `runMetric`.
 *
 * Example:
 * ```ts
 * const nonEmpty: Metric = {
 *   name: 'non_empty',
 *   score: (input) => booleanScore('non_empty', input.output.length > 0),
 * };
 * ```
 */
export interface Metric {
  readonly name: string;
  score(input: MetricInput, signal?: AbortSignal): ScoreResult | Promise<ScoreResult>;
}

/**
 * A metric that can describe itself as a MetricSpec for dataset files.
 */
export interface SerializableMetric extends Metric {
  asSpec(): MetricSpec;
}

export function isSerializableMetric(metric: Metric): metric is SerializableMetric {
  return 'asSpec' in metric && typeof metric.asSpec === 'function';
}

/**
 * The spec of a metric, for metrics that can describe themselves.
 */
export function metricSpecOf(metric: Metric): MetricSpec {
  if (!isSerializableMetric(metric)) {
    throw new MetricConfigurationError(
      `Metric '${metric.name}' cannot be serialized: it does not implement asSpec()`,
    );
  }
  return metric.asSpec();
}

/**
 * Score an input with a metric, converting a thrown exception into a failed
 * score result named after the metric.
 */
export async function runMetric(
  metric: Metric,
  input: MetricInput,
  signal?: AbortSignal,
): Promise<ScoreResult> {
  try {
    return await metric.score(input, signal);
  } catch (e) {
    return failedScoreResult(metric.name, toError(e));
  }
}
