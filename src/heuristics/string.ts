/**
 * String comparison and shape metrics.
 */

import { BaseMetric } from '../metrics/base.js';
import type { MetricInput, ScoreResult } from '../types.js';
import { booleanScore, createScoreResult } from '../types.js';
import type { CaseOptions } from './similarity.js';
import { words } from './text.js';

abstract class CaseAwareMetric extends BaseMetric {
  readonly caseSensitive: boolean;

  constructor(name: string, opts?: CaseOptions) {
    super(name);
    this.caseSensitive = opts?.caseSensitive ?? true;
  }

  protected getFields(): Record<string, unknown> {
    return { caseSensitive: this.caseSensitive };
  }
  protected getDefaults(): Record<string, unknown> {
    return { caseSensitive: true };
  }

  protected fold(text: string): string {
    return this.caseSensitive ? text : text.toLowerCase();
  }
}

/** Output equals expected. */
export class Equals extends CaseAwareMetric {
  constructor(opts?: CaseOptions) {
    super('equals', opts);
  }

  score(input: MetricInput): ScoreResult {
    const match = this.fold(input.output) === this.fold(input.expected);
    return booleanScore(this.name, match, match ? 'exact match' : 'no match');
  }
}

/** Output contains expected. */
export class Contains extends CaseAwareMetric {
  constructor(opts?: CaseOptions) {
    super('contains', opts);
  }

  score(input: MetricInput): ScoreResult {
    const found = this.fold(input.output).includes(this.fold(input.expected));
    return booleanScore(
      this.name,
      found,
      found ? 'contains expected value' : 'does not contain expected value',
    );
  }
}

export class StartsWith extends CaseAwareMetric {
  constructor(opts?: CaseOptions) {
    super('starts_with', opts);
  }

  score(input: MetricInput): ScoreResult {
    const ok = this.fold(input.output).startsWith(this.fold(input.expected));
    return booleanScore(
      this.name,
      ok,
      ok ? 'starts with expected value' : 'does not start with expected value',
    );
  }
}

export class EndsWith extends CaseAwareMetric {
  constructor(opts?: CaseOptions) {
    super('ends_with', opts);
  }

  score(input: MetricInput): ScoreResult {
    const ok = this.fold(input.output).endsWith(this.fold(input.expected));
    return booleanScore(
      this.name,
      ok,
      ok ? 'ends with expected value' : 'does not end with expected value',
    );
  }
}

/**
 * Output contains at least one of the given values. The reason names the first
 * value found.
 */
export class ContainsAny extends CaseAwareMetric {
  readonly values: string[];

  constructor(opts: CaseOptions & { values: string[] }) {
    super('contains_any', opts);
    this.values = [...opts.values];
  }

  protected getFields() {
    return { values: this.values, ...super.getFields() };
  }

  score(input: MetricInput): ScoreResult {
    const output = this.fold(input.output);
    const hit = this.values.find((v) => output.includes(this.fold(v)));
    if (hit !== undefined) {
      return createScoreResult(this.name, 1, `contains: ${hit}`);
    }
    return createScoreResult(this.name, 0, 'does not contain any expected value');
  }
}

/**
 * Fraction of the given values that the output contains.
 */
export class ContainsAll extends CaseAwareMetric {
  readonly values: string[];

  constructor(opts: CaseOptions & { values: string[] }) {
    super('contains_all', opts);
    this.values = [...opts.values];
  }

  protected getFields() {
    return { values: this.values, ...super.getFields() };
  }

  score(input: MetricInput): ScoreResult {
    const output = this.fold(input.output);
    const missing = this.values.filter((v) => !output.includes(this.fold(v)));
    if (missing.length === 0) {
      return createScoreResult(this.name, 1, 'contains all expected values');
    }
    const found = this.values.length - missing.length;
    return createScoreResult(this.name, found / this.values.length, `missing: ${missing.join(', ')}`);
  }
}

/** Output has non-whitespace content. */
export class NotEmpty extends BaseMetric {
  constructor() {
    super('not_empty');
  }

  score(input: MetricInput): ScoreResult {
    const ok = input.output.trim() !== '';
    return booleanScore(this.name, ok, ok ? 'output is not empty' : 'output is empty');
  }
}

/** Output length, in code points, lies within [min, max]. */
export class LengthBetween extends BaseMetric {
  readonly min: number;
  readonly max: number;

  constructor(opts: { min: number; max: number }) {
    super('length_between');
    this.min = opts.min;
    this.max = opts.max;
  }

  protected getFields() {
    return { min: this.min, max: this.max };
  }

  score(input: MetricInput): ScoreResult {
    const length = Array.from(input.output).length;
    if (length >= this.min && length <= this.max) {
      return createScoreResult(this.name, 1, 'length within range');
    }
    return createScoreResult(this.name, 0, `length out of range: ${length}`);
  }
}

/** Output word count lies within [min, max]. */
export class WordCount extends BaseMetric {
  readonly min: number;
  readonly max: number;

  constructor(opts: { min: number; max: number }) {
    super('word_count');
    this.min = opts.min;
    this.max = opts.max;
  }

  protected getFields() {
    return { min: this.min, max: this.max };
  }

  score(input: MetricInput): ScoreResult {
    const count = words(input.output).length;
    const ok = count >= this.min && count <= this.max;
    return booleanScore(
      this.name,
      ok,
      ok ? 'word count within range' : `word count out of range: ${count}`,
    );
  }
}

/**
 * Scores 0 when the lower-cased output contains any of the configured patterns.
 */
export class NoOffensiveLanguage extends BaseMetric {
  readonly patterns: string[];

  constructor(opts: { patterns: string[] }) {
    super('no_offensive_language');
    this.patterns = [...opts.patterns];
  }

  protected getFields() {
    return { patterns: this.patterns };
  }

  score(input: MetricInput): ScoreResult {
    const lower = input.output.toLowerCase();
    if (this.patterns.some((p) => lower.includes(p.toLowerCase()))) {
      return createScoreResult(this.name, 0, 'contains offensive pattern');
    }
    return createScoreResult(this.name, 1, 'no offensive language detected');
  }
}
