/**
 * Structured-output metrics: JSON validity and shape, XML, numbers, booleans.
 */

import { XMLValidator } from 'fast-xml-parser';
import { BaseMetric } from '../metrics/base.js';
import { type Metric, metricSpecOf } from '../metrics/metric.js';
import { serializeMetricSpec } from '../metrics/spec.js';
import type { MetricInput, ScoreResult } from '../types.js';
import { createScoreResult, toError } from '../types.js';

export type JSONType = 'string' | 'number' | 'boolean' | 'array' | 'object' | 'null';

type ParseOutcome = { ok: true; value: unknown } | { ok: false; error: Error };

function parseJSON(text: string): ParseOutcome {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    return { ok: false, error: toError(e) };
  }
}

function parseObject(text: string): Record<string, unknown> | null {
  const parsed = parseJSON(text);
  if (!parsed.ok) return null;
  const { value } = parsed;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

export function jsonTypeOf(value: unknown): JSONType | 'unknown' {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'object':
      return 'object';
    default:
      return 'unknown';
  }
}

export class IsJSON extends BaseMetric {
  constructor() {
    super('is_json');
  }

  score(input: MetricInput): ScoreResult {
    const parsed = parseJSON(input.output);
    if (!parsed.ok) {
      return createScoreResult(this.name, 0, `invalid JSON: ${parsed.error.message}`);
    }
    return createScoreResult(this.name, 1, 'valid JSON');
  }
}

export class IsJSONObject extends BaseMetric {
  constructor() {
    super('is_json_object');
  }

  score(input: MetricInput): ScoreResult {
    if (parseObject(input.output) === null) {
      return createScoreResult(this.name, 0, 'not a valid JSON object');
    }
    return createScoreResult(this.name, 1, 'valid JSON object');
  }
}

export class IsJSONArray extends BaseMetric {
  constructor() {
    super('is_json_array');
  }

  score(input: MetricInput): ScoreResult {
    const parsed = parseJSON(input.output);
    if (!parsed.ok || !Array.isArray(parsed.value)) {
      return createScoreResult(this.name, 0, 'not a valid JSON array');
    }
    return createScoreResult(this.name, 1, 'valid JSON array');
  }
}

/**
 * Fraction of the required keys present in a JSON object output.
 */
export class JSONHasKeys extends BaseMetric {
  readonly keys: string[];

  constructor(opts: { keys: string[] }) {
    super('json_has_keys');
    this.keys = [...opts.keys];
  }

  protected getFields() {
    return { keys: this.keys };
  }

  score(input: MetricInput): ScoreResult {
    const obj = parseObject(input.output);
    if (obj === null) {
      return createScoreResult(this.name, 0, 'not a valid JSON object');
    }

    const missing = this.keys.filter((key) => !Object.hasOwn(obj, key));
    if (missing.length === 0) {
      return createScoreResult(this.name, 1, 'has all required keys');
    }
    const found = this.keys.length - missing.length;
    return createScoreResult(
      this.name,
      found / this.keys.length,
      `missing keys: ${missing.join(', ')}`,
    );
  }
}

/**
 * Fraction of the required keys present in a JSON object output with the
 * expected JSON type.
 */
export class JSONSchemaValid extends BaseMetric {
  readonly required: Record<string, JSONType>;

  constructor(opts: { required: Record<string, JSONType> }) {
    super('json_schema_valid');
    this.required = { ...opts.required };
  }

  protected getFields() {
    return { required: this.required };
  }

  score(input: MetricInput): ScoreResult {
    const obj = parseObject(input.output);
    if (obj === null) {
      return createScoreResult(this.name, 0, 'not a valid JSON object');
    }

    const entries = Object.entries(this.required);
    const errors: string[] = [];
    for (const [key, expectedType] of entries) {
      if (!Object.hasOwn(obj, key)) {
        errors.push(`${key}: missing`);
        continue;
      }
      const actualType = jsonTypeOf(obj[key]);
      if (actualType !== expectedType) {
        errors.push(`${key}: expected ${expectedType}, got ${actualType}`);
      }
    }

    if (errors.length === 0) {
      return createScoreResult(this.name, 1, 'valid schema');
    }
    const valid = entries.length - errors.length;
    return createScoreResult(this.name, valid / entries.length, errors.join('; '));
  }
}

export class IsNumber extends BaseMetric {
  constructor() {
    super('is_number');
  }

  score(input: MetricInput): ScoreResult {
    const parsed = parseJSON(input.output);
    if (!parsed.ok || typeof parsed.value !== 'number') {
      return createScoreResult(this.name, 0, 'not a valid number');
    }
    return createScoreResult(this.name, 1, 'valid number');
  }
}

/**
 * Scores 1 when the output is well-formed XML. Empty output has no root element
 * and is rejected.
 */
export class IsXML extends BaseMetric {
  constructor() {
    super('is_xml');
  }

  score(input: MetricInput): ScoreResult {
    const result = XMLValidator.validate(input.output);
    if (result !== true) {
      return createScoreResult(this.name, 0, `invalid XML: ${result.err.msg}`);
    }
    return createScoreResult(this.name, 1, 'valid XML');
  }
}

const BOOLEAN_WORDS = new Set(['true', 'false', 'yes', 'no', '1', '0']);

/** Accepts true/false, yes/no and 1/0, case-insensitively. */
export class IsBoolean extends BaseMetric {
  constructor() {
    super('is_boolean');
  }

  score(input: MetricInput): ScoreResult {
    const lower = input.output.trim().toLowerCase();
    if (BOOLEAN_WORDS.has(lower)) {
      return createScoreResult(this.name, 1, `valid boolean: ${lower}`);
    }
    return createScoreResult(this.name, 0, 'not a valid boolean');
  }
}

/**
 * Find JSON in free text: the first fenced code block, the whole trimmed text
 * when it is bracketed, or the first flat object or array inside it.
 * Returns an empty string when nothing looks like JSON.
 */
export function extractJSONFromText(text: string): string {
  const block = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  if (block?.[1] !== undefined) {
    return block[1].trim();
  }

  const trimmed = text.trim();
  if (
    (trimmed.startsWith('{') && trimmed.endsWith('}')) ||
    (trimmed.startsWith('[') && trimmed.endsWith(']'))
  ) {
    return trimmed;
  }

  const object = /\{[^{}]*\}/.exec(trimmed);
  if (object) return object[0];

  const array = /\[[^[\]]*\]/.exec(trimmed);
  if (array) return array[0];

  return '';
}

/**
 * Extracts JSON from the output and scores the extracted text with the inner metric.
 */
export class ExtractJSON extends BaseMetric {
  private readonly inner: Metric;

  constructor(opts: { metric: Metric }) {
    super('extract_json');
    this.inner = opts.metric;
  }

  get metric(): Metric {
    return this.inner;
  }

  protected getFields() {
    return { metric: serializeMetricSpec(metricSpecOf(this.inner)) };
  }

  score(input: MetricInput, signal?: AbortSignal): ScoreResult | Promise<ScoreResult> {
    const extracted = extractJSONFromText(input.output);
    if (extracted === '') {
      return createScoreResult(this.name, 0, 'no JSON found in output');
    }
    return this.inner.score(input.withOutput(extracted), signal);
  }

  toString(): string {
    return `ExtractJSON(metric=${this.inner.name})`;
  }
}
