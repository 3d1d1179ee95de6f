/**
 * Function-backed metrics and the metric combinators: composite, conditional, weighted.
 */

import { MetricConfigurationError } from '../errors.js';
import { ScoreResults } from '../reporting/scores.js';
import type { MetricInput, MetricSpec, ScoreResult } from '../types.js';
import { createScoreResult, isSuccess } from '../types.js';
import { BaseMetric } from './base.js';
import { type Metric, metricSpecOf, runMetric, type SerializableMetric } from './metric.js';
import { serializeMetricSpec } from './spec.js';

export type ScoreFunction = (
  input: MetricInput,
  signal?: AbortSignal,
) => ScoreResult | Promise<ScoreResult>;

export type InputPredicate = (input: MetricInput) => boolean;

/**
 * A metric backed by an arbitrary scoring function.
 *
 * Example:
 * ```ts
 * const shortAnswer = new MetricFunc('short_answer', (input) =>
 *   booleanScore('short_answer', input.output.length <= 280),
 * );
 * ```
 */
export class MetricFunc extends BaseMetric {
  private readonly fn: ScoreFunction;

  constructor(name: string, fn: ScoreFunction) {
    super(name);
    this.fn = fn;
  }

  score(input: MetricInput, signal?: AbortSignal): ScoreResult | Promise<ScoreResult> {
    return this.fn(input, signal);
  }

  asSpec(): MetricSpec {
    throw notSerializable(this.name, 'it wraps a function');
  }

  toString(): string {
    return `MetricFunc(name=${JSON.stringify(this.name)})`;
  }
}

/**
 * Scores every child metric and reports the mean of the successful ones.
 * Failed children are left out of the mean; the result is 0 when every child failed.
 */
export class CompositeMetric extends BaseMetric {
  private readonly children: readonly Metric[];

  constructor(name: string, ...metrics: Metric[]) {
    super(name);
    this.children = [...metrics];
  }

  get metrics(): readonly Metric[] {
    return this.children;
  }

  async score(input: MetricInput, signal?: AbortSignal): Promise<ScoreResult> {
    const scores = await this.scoreAll(input, signal);
    return createScoreResult(this.name, scores.average());
  }

  /**
   * Score every child metric in registration order and return the raw results.
   */
  async scoreAll(input: MetricInput, signal?: AbortSignal): Promise<ScoreResults> {
    const scores: ScoreResult[] = [];
    for (const metric of this.children) {
      scores.push(await runMetric(metric, input, signal));
    }
    return new ScoreResults(scores);
  }

  protected getFields() {
    return {
      name: this.name,
      metrics: this.children.map((m) => serializeMetricSpec(metricSpecOf(m))),
    };
  }

  toString(): string {
    const names = this.children.map((m) => m.name).join(', ');
    return `CompositeMetric(name=${JSON.stringify(this.name)}, metrics=[${names}])`;
  }
}

/**
 * Runs the inner metric only when the predicate holds.
 *
 * When the predicate fails the result carries this metric's name, a value of 0 and
 * the reason "condition not met". Otherwise the inner metric's result is returned
 * as is, under the inner metric's name.
 */
export class ConditionalMetric extends BaseMetric {
  private readonly condition: InputPredicate;
  private readonly inner: Metric;

  constructor(name: string, condition: InputPredicate, metric: Metric) {
    super(name);
    this.condition = condition;
    this.inner = metric;
  }

  get metric(): Metric {
    return this.inner;
  }

  score(input: MetricInput, signal?: AbortSignal): ScoreResult | Promise<ScoreResult> {
    if (!this.condition(input)) {
      return createScoreResult(this.name, 0, 'condition not met');
    }
    return this.inner.score(input, signal);
  }

  asSpec(): MetricSpec {
    throw notSerializable(this.name, 'its condition is a function');
  }

  toString(): string {
    return `ConditionalMetric(name=${JSON.stringify(this.name)}, metric=${this.inner.name})`;
  }
}

/**
 * Scales the value of a successful inner result by a weight.
 * Reports the inner metric's name; a failed inner result is returned unmodified.
 */
export class WeightedMetric implements SerializableMetric {
  private readonly inner: Metric;
  readonly weight: number;

  constructor(metric: Metric, weight: number) {
    this.inner = metric;
    this.weight = weight;
  }

  get name(): string {
    return this.inner.name;
  }

  get metric(): Metric {
    return this.inner;
  }

  async score(input: MetricInput, signal?: AbortSignal): Promise<ScoreResult> {
    const result = await this.inner.score(input, signal);
    if (!isSuccess(result)) {
      return result;
    }
    const weighted: ScoreResult = { name: result.name, value: result.value * this.weight };
    if (result.reason !== undefined) weighted.reason = result.reason;
    if (result.metadata !== undefined) weighted.metadata = result.metadata;
    return weighted;
  }

  asSpec(): MetricSpec {
    return {
      name: 'WeightedMetric',
      arguments: { metric: serializeMetricSpec(metricSpecOf(this.inner)), weight: this.weight },
    };
  }

  toString(): string {
    return `WeightedMetric(metric=${this.inner.name}, weight=${this.weight})`;
  }
}

function notSerializable(name: string, why: string): MetricConfigurationError {
  return new MetricConfigurationError(`Metric '${name}' cannot be serialized: ${why}`);
}
