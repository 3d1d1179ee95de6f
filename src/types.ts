/**
 * Core type definitions: the per-item input record, per-metric score record,
 * per-item evaluation record and the serializable metric spec.
 */

import type { ScoreResults } from './reporting/scores.js';

export interface MetricInputFields {
  /** The input given to the model. */
  input?: string;
  /** The output produced by the model. */
  output?: string;
  /** The expected / reference output, for comparison metrics. */
  expected?: string;
  /** Additional context provided to the model. */
  context?: string;
  /** Arbitrary key-value pairs. */
  metadata?: Record<string, unknown>;
}

/**
 * The inputs for a metric evaluation.
 *
 * Instances are frozen; the `with*` methods return modified copies, so a single
 * input can be shared by concurrently running evaluations.
 */
export class MetricInput {
  readonly input: string;
  readonly output: string;
  readonly expected: string;
  readonly context: string;
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(fields: MetricInputFields = {}) {
    this.input = fields.input ?? '';
    this.output = fields.output ?? '';
    this.expected = fields.expected ?? '';
    this.context = fields.context ?? '';
    this.metadata = Object.freeze({ ...(fields.metadata ?? {}) });
    Object.freeze(this);
  }

  static of(input: string, output: string): MetricInput {
    return new MetricInput({ input, output });
  }

  withOutput(output: string): MetricInput {
    return new MetricInput({ ...this.fields(), output });
  }

  withExpected(expected: string): MetricInput {
    return new MetricInput({ ...this.fields(), expected });
  }

  withContext(context: string): MetricInput {
    return new MetricInput({ ...this.fields(), context });
  }

  withMetadata(key: string, value: unknown): MetricInput {
    return new MetricInput({ ...this.fields(), metadata: { ...this.metadata, [key]: value } });
  }

  get(key: string): unknown {
    return Object.hasOwn(this.metadata, key) ? this.metadata[key] : undefined;
  }

  /** Metadata value as a string; empty when absent or not a string. */
  getString(key: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : '';
  }

  /** String members of an array metadata value; undefined when the value is not an array. */
  getStringSlice(key: string): string[] | undefined {
    const value = this.get(key);
    if (!Array.isArray(value)) return undefined;
    return value.filter((item): item is string => typeof item === 'string');
  }

  private fields(): MetricInputFields {
    return {
      input: this.input,
      output: this.output,
      expected: this.expected,
      context: this.context,
      metadata: { ...this.metadata },
    };
  }
}

/**
 * The result of a single metric evaluation.
 * A result with `error` set is a failure and its `value` carries no meaning.
 */
export interface ScoreResult {
  name: string;
  /** Numeric score, typically between 0 and 1. */
  value: number;
  reason?: string;
  metadata?: Record<string, unknown>;
  error?: Error;
}

/**
 * The result of evaluating one item against every metric of an engine.
 */
export interface EvaluationResult {
  itemId: string;
  input: MetricInput;
  scores: ScoreResults;
  /** Set only when the evaluation as a whole failed (cancellation). */
  error: Error | null;
  /** Wall-clock time spent scoring the item, in seconds. */
  duration: number;
}

/**
 * The serializable specification of a metric: its registry name and options.
 */
export interface MetricSpec {
  name: string;
  arguments: Record<string, unknown> | null;
}

/**
 * Whether a score or evaluation result completed without error.
 */
export function isSuccess(result: ScoreResult | EvaluationResult): boolean {
  return result.error === undefined || result.error === null;
}

/**
 * Mean of the successful scores of an evaluation result; 0 when none succeeded.
 */
export function averageScore(result: EvaluationResult): number {
  return result.scores.average();
}

export function createScoreResult(name: string, value: number, reason?: string): ScoreResult {
  return reason === undefined ? { name, value } : { name, value, reason };
}

export function failedScoreResult(name: string, error: Error): ScoreResult {
  return { name, value: 0, error };
}

/**
 * Convert an assertion into a score: 1 for true, 0 for false.
 */
export function booleanScore(name: string, value: boolean, reason?: string): ScoreResult {
  return createScoreResult(name, value ? 1 : 0, reason);
}

export function formatScoreResult(score: ScoreResult): string {
  if (score.error) {
    return `${score.name}: error - ${score.error.message}`;
  }
  if (score.reason) {
    return `${score.name}: ${score.value.toFixed(4)} (${score.reason})`;
  }
  return `${score.name}: ${score.value.toFixed(4)}`;
}

/**
 * Normalize a caught value into an Error.
 */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
