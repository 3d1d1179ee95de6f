/**
 * Engine: runs a fixed list of metrics over one or many inputs.
 *
 * Items are evaluated sequentially by default. With a concurrency limit above 1,
 * up to that many items are in flight at once; each item still runs its metrics
 * in registration order.
 */

import pLimit from 'p-limit';
import { cancellationError } from './errors.js';
import { type Metric, runMetric } from './metrics/metric.js';
import { EvaluationResults } from './reporting/report.js';
import { ScoreResults } from './reporting/scores.js';
import type { EvaluationResult, MetricInput, ScoreResult } from './types.js';
import { toError } from './types.js';

/**
 * Called once per completed item with the number of items completed so far,
 * the batch size and the item's result. Invocations never overlap.
 */
export type ProgressCallback = (completed: number, total: number, result: EvaluationResult) => void;

export interface EngineOptions {
  /** Maximum number of items evaluated at once. Defaults to 1; values that are not positive integers are ignored. */
  concurrency?: number;
  /** Progress callbacks, invoked in order. */
  callbacks?: ProgressCallback[];
}

type Item = readonly [itemId: string, input: MetricInput];

interface BatchOutcome {
  /** Results aligned with the submitted items. */
  slots: EvaluationResult[];
  /** Results in the order they completed. */
  completed: EvaluationResult[];
}

export class Engine {
  private readonly registered: readonly Metric[];
  private readonly limit: number;
  private readonly callbacks: ProgressCallback[];

  constructor(metrics: readonly Metric[], opts?: EngineOptions) {
    this.registered = [...metrics];
    const concurrency = opts?.concurrency ?? 1;
    this.limit = Number.isInteger(concurrency) && concurrency > 0 ? concurrency : 1;
    this.callbacks = [...(opts?.callbacks ?? [])];
  }

  get concurrency(): number {
    return this.limit;
  }

  /** The registered metrics, in scoring order. */
  get metrics(): readonly Metric[] {
    return this.registered;
  }

  /**
   * Register a progress callback. Returns the engine for chaining.
   */
  onProgress(callback: ProgressCallback): this {
    this.callbacks.push(callback);
    return this;
  }

  /**
   * Score a single input with every metric.
   *
   * The signal is checked before each metric. Once it is aborted no further
   * metric runs and the result carries the cancellation error together with the
   * scores computed so far.
   */
  evaluateOne(input: MetricInput, signal?: AbortSignal): Promise<EvaluationResult> {
    return this.evaluateItem('', input, signal);
  }

  /**
   * Score every input. Result `i` belongs to input `i` and has the id `item-<i>`.
   */
  async evaluateMany(
    inputs: readonly MetricInput[],
    signal?: AbortSignal,
  ): Promise<EvaluationResults> {
    const items = inputs.map((input, i): Item => [`item-${i}`, input]);
    const { slots } = await this.runBatch(items, signal);
    return new EvaluationResults(slots);
  }

  /**
   * Score inputs keyed by caller-chosen ids. Every id appears exactly once in the
   * results, which are in completion order.
   */
  async evaluateWithIds(
    items: Map<string, MetricInput> | Record<string, MetricInput>,
    signal?: AbortSignal,
  ): Promise<EvaluationResults> {
    const entries = items instanceof Map ? [...items.entries()] : Object.entries(items);
    const { completed } = await this.runBatch(entries, signal);
    return new EvaluationResults(completed);
  }

  private async runBatch(items: readonly Item[], signal?: AbortSignal): Promise<BatchOutcome> {
    const total = items.length;
    const slots = new Array<EvaluationResult>(total);
    const completed: EvaluationResult[] = [];

    const publish = (index: number, result: EvaluationResult): void => {
      slots[index] = result;
      completed.push(result);
      for (const callback of this.callbacks) {
        callback(completed.length, total, result);
      }
    };

    if (this.limit === 1) {
      for (const [index, [itemId, input]] of items.entries()) {
        publish(index, await this.evaluateItem(itemId, input, signal));
      }
      return { slots, completed };
    }

    const limit = pLimit(this.limit);
    const settled = await Promise.allSettled(
      items.map(([itemId, input], index) =>
        limit(async () => {
          const result = await this.evaluateItem(itemId, input, signal);
          publish(index, result);
        }),
      ),
    );

    const rejected = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (rejected) {
      throw toError(rejected.reason);
    }
    return { slots, completed };
  }

  private async evaluateItem(
    itemId: string,
    input: MetricInput,
    signal?: AbortSignal,
  ): Promise<EvaluationResult> {
    const t0 = performance.now();
    const scores: ScoreResult[] = [];
    let error: Error | null = null;

    for (const metric of this.registered) {
      if (signal?.aborted) {
        error = cancellationError(signal);
        break;
      }
      scores.push(await runMetric(metric, input, signal));
    }

    return {
      itemId,
      input,
      scores: new ScoreResults(scores),
      error,
      duration: (performance.now() - t0) / 1000,
    };
  }
}

export interface EvaluateOptions extends EngineOptions {
  signal?: AbortSignal;
}

/**
 * Score a batch of inputs with a one-off engine.
 */
export function evaluate(
  metrics: readonly Metric[],
  inputs: readonly MetricInput[],
  opts?: EvaluateOptions,
): Promise<EvaluationResults> {
  return new Engine(metrics, opts).evaluateMany(inputs, opts?.signal);
}

/**
 * Score a single input with a one-off sequential engine.
 */
export function evaluateSingle(
  metrics: readonly Metric[],
  input: MetricInput,
  signal?: AbortSignal,
): Promise<EvaluationResult> {
  return new Engine(metrics).evaluateOne(input, signal);
}
