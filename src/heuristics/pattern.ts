/**
 * Regular-expression and well-known format metrics.
 */

import { MetricConfigurationError } from '../errors.js';
import { BaseMetric } from '../metrics/base.js';
import type { MetricInput, ScoreResult } from '../types.js';
import { createScoreResult, toError } from '../types.js';

export interface PatternOptions {
  pattern: string;
  /** RegExp flags, e.g. `'i'`. The global flag is managed internally. */
  flags?: string;
}

/** Global and sticky flags are dropped: both make `test` depend on `lastIndex`. */
function compile(pattern: string, flags = ''): RegExp {
  try {
    return new RegExp(pattern, flags.replace(/[gy]/g, ''));
  } catch (e) {
    throw new MetricConfigurationError(`Invalid pattern ${JSON.stringify(pattern)}`, {
      cause: toError(e),
    });
  }
}

abstract class RegexMetric extends BaseMetric {
  readonly pattern: string;
  readonly flags: string;
  protected readonly regex: RegExp;

  constructor(name: string, opts: PatternOptions) {
    super(name);
    this.pattern = opts.pattern;
    this.flags = opts.flags ?? '';
    this.regex = compile(this.pattern, this.flags);
  }

  protected getFields(): Record<string, unknown> {
    return { pattern: this.pattern, flags: this.flags };
  }
  protected getDefaults(): Record<string, unknown> {
    return { flags: '' };
  }
}

export class RegexMatch extends RegexMetric {
  constructor(opts: PatternOptions) {
    super('regex_match', opts);
  }

  score(input: MetricInput): ScoreResult {
    if (this.regex.test(input.output)) {
      return createScoreResult(this.name, 1, 'matches pattern');
    }
    return createScoreResult(this.name, 0, 'does not match pattern');
  }
}

export class RegexNotMatch extends RegexMetric {
  constructor(opts: PatternOptions) {
    super('regex_not_match', opts);
  }

  score(input: MetricInput): ScoreResult {
    if (!this.regex.test(input.output)) {
      return createScoreResult(this.name, 1, 'does not match pattern');
    }
    return createScoreResult(this.name, 0, 'matches pattern (unexpected)');
  }
}

/**
 * Counts the matches of a pattern in the output.
 *
 * With `normalizeBy` set the score is `min(count / normalizeBy, 1)`. Otherwise the
 * score is 1 when the count lies within `[minMatches, maxMatches]`, where a
 * `maxMatches` of 0 means unbounded.
 */
export class RegexFindAll extends RegexMetric {
  readonly minMatches: number;
  readonly maxMatches: number;
  readonly normalizeBy: number;
  private readonly globalRegex: RegExp;

  constructor(
    opts: PatternOptions & { minMatches?: number; maxMatches?: number; normalizeBy?: number },
  ) {
    super('regex_find_all', opts);
    this.minMatches = opts.minMatches ?? 0;
    this.maxMatches = opts.maxMatches ?? 0;
    this.normalizeBy = opts.normalizeBy ?? 0;
    this.globalRegex = new RegExp(this.regex.source, `${this.regex.flags}g`);
  }

  protected getFields(): Record<string, unknown> {
    return {
      ...super.getFields(),
      minMatches: this.minMatches,
      maxMatches: this.maxMatches,
      normalizeBy: this.normalizeBy,
    };
  }
  protected getDefaults(): Record<string, unknown> {
    return { ...super.getDefaults(), minMatches: 0, maxMatches: 0, normalizeBy: 0 };
  }

  score(input: MetricInput): ScoreResult {
    const count = [...input.output.matchAll(this.globalRegex)].length;

    if (this.normalizeBy > 0) {
      return createScoreResult(this.name, Math.min(count / this.normalizeBy, 1));
    }
    if (count >= this.minMatches && (this.maxMatches <= 0 || count <= this.maxMatches)) {
      return createScoreResult(this.name, 1, 'match count within range');
    }
    return createScoreResult(this.name, 0, 'match count out of range');
  }
}

abstract class FormatMetric extends BaseMetric {
  protected abstract readonly regex: RegExp;
  protected abstract readonly label: string;

  protected accepts(text: string): boolean {
    return this.regex.test(text);
  }

  score(input: MetricInput): ScoreResult {
    if (this.accepts(input.output.trim())) {
      return createScoreResult(this.name, 1, `valid ${this.label} format`);
    }
    return createScoreResult(this.name, 0, `invalid ${this.label} format`);
  }
}

export class EmailFormat extends FormatMetric {
  protected readonly regex = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
  protected readonly label = 'email';

  constructor() {
    super('email_format');
  }
}

export class URLFormat extends FormatMetric {
  protected readonly regex = /^https?:\/\/[^\s/$.?#].[^\s]*$/;
  protected readonly label = 'URL';

  constructor() {
    super('url_format');
  }
}

/**
 * Common phone layouts such as `+1-234-567-8901` or `(234) 567-8901`; at least
 * seven characters.
 */
export class PhoneFormat extends FormatMetric {
  protected readonly regex = /^[+]?[(]?[0-9]{1,4}[)]?[-\s./0-9]*$/;
  protected readonly label = 'phone';

  constructor() {
    super('phone_format');
  }

  protected accepts(text: string): boolean {
    return text.length >= 7 && super.accepts(text);
  }
}

/** ISO 8601 style date prefix by default; a custom pattern may be given. */
export class DateFormat extends FormatMetric {
  static readonly ISO_PATTERN = '^\\d{4}[-/]\\d{2}[-/]\\d{2}(T\\d{2}:\\d{2}(:\\d{2})?)?';

  readonly pattern: string;
  protected readonly regex: RegExp;
  protected readonly label = 'date';

  constructor(opts?: { pattern?: string }) {
    super('date_format');
    this.pattern = opts?.pattern ?? DateFormat.ISO_PATTERN;
    this.regex = compile(this.pattern);
  }

  protected getFields() {
    return { pattern: this.pattern };
  }
  protected getDefaults() {
    return { pattern: DateFormat.ISO_PATTERN };
  }
}

export class UUIDFormat extends FormatMetric {
  protected readonly regex =
    /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;
  protected readonly label = 'UUID';

  constructor() {
    super('uuid_format');
  }
}
