/**
 * Shared naming and serialization base for class-based metrics.
 */

import type { MetricInput, MetricSpec, ScoreResult } from '../types.js';
import type { SerializableMetric } from './metric.js';

/**
 * Base class providing the metric name plus spec-building and repr logic.
 *
 * Subclasses describe their options through `getFields()` and `getDefaults()`;
 * options left at their default value are omitted from the spec.
 */
export abstract class BaseMetric implements SerializableMetric {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Return the registry name of this metric class.
   * Defaults to the constructor name.
   */
  static getSerializationName(): string {
    // biome-ignore lint/complexity/noThisInStatic: `this` refers to the subclass, not BaseMetric
    return this.name;
  }

  getSerializationName(): string {
    return (this.constructor as typeof BaseMetric).getSerializationName();
  }

  /**
   * Return the options that define this metric instance.
   */
  protected getFields(): Record<string, unknown> {
    return {};
  }

  protected getDefaults(): Record<string, unknown> {
    return {};
  }

  /**
   * Build the serialization arguments, excluding fields at their default values.
   */
  buildSerializationArguments(): Record<string, unknown> {
    const fields = this.getFields();
    const defaults = this.getDefaults();
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(fields)) {
      if (key in defaults && deepEqual(value, defaults[key])) {
        continue;
      }
      result[key] = value;
    }
    return result;
  }

  asSpec(): MetricSpec {
    const args = this.buildSerializationArguments();
    return {
      name: this.getSerializationName(),
      arguments: Object.keys(args).length === 0 ? null : args,
    };
  }

  abstract score(input: MetricInput, signal?: AbortSignal): ScoreResult | Promise<ScoreResult>;

  toString(): string {
    const args = this.buildSerializationArguments();
    const argStr = Object.entries(args)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(', ');
    return `${this.getSerializationName()}(${argStr})`;
  }
}

function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== 'object' || typeof b !== 'object') return false;

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((val, i) => deepEqual(val, b[i]));
  }
  if (Array.isArray(a) || Array.isArray(b)) return false;

  const aEntries = Object.entries(a);
  const bObj = Object.fromEntries(Object.entries(b));
  if (aEntries.length !== Object.keys(bObj).length) return false;
  return aEntries.every(([key, val]) => key in bObj && deepEqual(val, bObj[key]));
}
