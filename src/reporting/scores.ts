/**
 * ScoreResults: an ordered collection of score records with aggregate queries.
 */

import { isSuccess, type ScoreResult } from '../types.js';

export class ScoreResults implements Iterable<ScoreResult> {
  private readonly items: readonly ScoreResult[];

  constructor(items: Iterable<ScoreResult> = []) {
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): ScoreResult | undefined {
    return this.items.at(index);
  }

  /** First score with the given name, or null. */
  byName(name: string): ScoreResult | null {
    return this.items.find((s) => s.name === name) ?? null;
  }

  allByName(name: string): ScoreResults {
    return new ScoreResults(this.items.filter((s) => s.name === name));
  }

  successful(): ScoreResults {
    return new ScoreResults(this.items.filter(isSuccess));
  }

  failed(): ScoreResults {
    return new ScoreResults(this.items.filter((s) => !isSuccess(s)));
  }

  /**
   * Mean value of the successful scores. Failed scores are excluded from both
   * the sum and the count; returns 0 when nothing succeeded.
   */
  average(): number {
    return meanOf(this.items.filter(isSuccess));
  }

  averageByName(name: string): number {
    return meanOf(this.items.filter((s) => s.name === name && isSuccess(s)));
  }

  toArray(): ScoreResult[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<ScoreResult> {
    return this.items[Symbol.iterator]();
  }

  toString(): string {
    return `<ScoreResults count=${this.items.length} failed=${this.failed().length} />`;
  }
}

function meanOf(scores: ScoreResult[]): number {
  if (scores.length === 0) return 0;
  return scores.reduce((sum, s) => sum + s.value, 0) / scores.length;
}
