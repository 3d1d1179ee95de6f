/**
 * metric-evals: score model outputs against pluggable quality metrics.
 *
 * @example
 * ```ts
 * import { BLEU, Engine, MetricInput, ROUGE, WeightedMetric } from 'metric-evals';
 *
 * const engine = new Engine([new BLEU(), new WeightedMetric(new ROUGE(), 0.5)], {
 *   concurrency: 4,
 * });
 *
 * const results = await engine.evaluateMany([
 *   new MetricInput({ output: 'the cat sat on the mat', expected: 'the cat sat on a mat' }),
 *   new MetricInput({ output: 'a dog barked', expected: 'the dog barked loudly' }),
 * ]);
 * results.print();
 * console.log(results.summary());
 * ```
 */

// Dataset
export type {
  DatasetEvaluateOptions,
  DatasetOptions,
  DatasetRecord,
  FieldMapping,
  InputMapper,
} from './dataset.js';
export { DEFAULT_FIELD_MAPPING, Dataset, DatasetEvaluator, defaultInputMapper } from './dataset.js';
// Engine
export type { EngineOptions, EvaluateOptions, ProgressCallback } from './engine.js';
export { Engine, evaluate, evaluateSingle } from './engine.js';
export { cancellationError, EvaluationCancelledError, MetricConfigurationError } from './errors.js';
// Heuristics
export * from './heuristics/index.js';
// Metrics
export * from './metrics/index.js';
// Reporting
export * from './reporting/index.js';
// Serialization
export * from './serialization/index.js';
// Core types
export type { EvaluationResult, MetricInputFields, MetricSpec, ScoreResult } from './types.js';
export {
  averageScore,
  booleanScore,
  createScoreResult,
  failedScoreResult,
  formatScoreResult,
  isSuccess,
  MetricInput,
  toError,
} from './types.js';
