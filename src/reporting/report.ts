/**
 * EvaluationResults: the ordered outcome of a batch evaluation, with aggregation
 * and rendering.
 */

import type { EvaluationResult } from '../types.js';
import { isSuccess } from '../types.js';
import { type RendererOptions, renderTable } from './renderer.js';

export type RenderOptions = RendererOptions;

export class EvaluationResults implements Iterable<EvaluationResult> {
  private readonly items: readonly EvaluationResult[];

  constructor(items: Iterable<EvaluationResult> = []) {
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): EvaluationResult | undefined {
    return this.items.at(index);
  }

  /** Items whose evaluation completed, whatever their individual scores. */
  successful(): EvaluationResults {
    return new EvaluationResults(this.items.filter(isSuccess));
  }

  /** Items whose evaluation was cut short by cancellation. */
  failed(): EvaluationResults {
    return new EvaluationResults(this.items.filter((r) => !isSuccess(r)));
  }

  byId(itemId: string): EvaluationResult | null {
    return this.items.find((r) => r.itemId === itemId) ?? null;
  }

  /**
   * Mean of a metric across items. Only the first score of that name in each item
   * is considered, and only when it succeeded. Returns 0 when no item qualifies.
   */
  averageByMetric(name: string): number {
    let sum = 0;
    let count = 0;
    for (const result of this.items) {
      const score = result.scores.byName(name);
      if (score !== null && isSuccess(score)) {
        sum += score.value;
        count++;
      }
    }
    return count === 0 ? 0 : sum / count;
  }

  /** Every metric name seen in any item, in first-seen order. */
  metricNames(): string[] {
    const names = new Set<string>();
    for (const result of this.items) {
      for (const score of result.scores) {
        names.add(score.name);
      }
    }
    return [...names];
  }

  /**
   * Average of every observed metric, keyed by metric name.
   */
  summary(): Record<string, number> {
    return Object.fromEntries(this.metricNames().map((name) => [name, this.averageByMetric(name)]));
  }

  /** Mean wall-clock duration per item, in seconds. */
  averageDuration(): number {
    if (this.items.length === 0) return 0;
    return this.items.reduce((sum, r) => sum + r.duration, 0) / this.items.length;
  }

  toArray(): EvaluationResult[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<EvaluationResult> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Render the results as a table string.
   */
  render(opts?: RenderOptions): string {
    return renderTable(this, opts);
  }

  /**
   * Print the results table to the console.
   */
  print(opts?: RenderOptions): void {
    console.log(this.render(opts));
  }

  toString(): string {
    return `<EvaluationResults count=${this.items.length} failed=${this.failed().length} />`;
  }
}
