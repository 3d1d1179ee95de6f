export { BaseMetric } from './base.js';
export type { InputPredicate, ScoreFunction } from './combinators.js';
export { CompositeMetric, ConditionalMetric, MetricFunc, WeightedMetric } from './combinators.js';
export type { Metric, SerializableMetric } from './metric.js';
export { isSerializableMetric, metricSpecOf, runMetric } from './metric.js';
export type { MetricRegistry, MetricRegistryEntry } from './registry.js';
export {
  buildMetricRegistry,
  DEFAULT_METRICS,
  loadMetric,
  loadMetricFromSpec,
} from './registry.js';
export { deserializeMetricSpec, serializeMetricSpec } from './spec.js';
