/**
 * Text-similarity metrics comparing `output` against `expected`.
 */

import { BaseMetric } from '../metrics/base.js';
import type { MetricInput, ScoreResult } from '../types.js';
import { createScoreResult } from '../types.js';
import {
  bleuScore,
  charSet,
  cosineSimilarity,
  jaccardIndex,
  levenshteinSimilarity,
  rougeLScore,
  wordFrequency,
  wordSet,
  words,
} from './text.js';

export interface CaseOptions {
  /** Compare without lower-casing both sides first. Defaults to true. */
  caseSensitive?: boolean;
}

/**
 * `1 - editDistance / maxLength`, over code points.
 */
export class LevenshteinSimilarity extends BaseMetric {
  readonly caseSensitive: boolean;

  constructor(opts?: CaseOptions) {
    super('levenshtein_similarity');
    this.caseSensitive = opts?.caseSensitive ?? true;
  }

  protected getFields() {
    return { caseSensitive: this.caseSensitive };
  }
  protected getDefaults() {
    return { caseSensitive: true };
  }

  score(input: MetricInput): ScoreResult {
    const [a, b] = fold(input.output, input.expected, this.caseSensitive);
    return createScoreResult(this.name, levenshteinSimilarity(a, b));
  }
}

export type JaccardTokens = 'words' | 'characters';

/**
 * Intersection over union of the distinct tokens of both strings.
 */
export class JaccardSimilarity extends BaseMetric {
  readonly caseSensitive: boolean;
  readonly tokens: JaccardTokens;

  constructor(opts?: CaseOptions & { tokens?: JaccardTokens }) {
    super('jaccard_similarity');
    this.caseSensitive = opts?.caseSensitive ?? true;
    this.tokens = opts?.tokens ?? 'words';
  }

  protected getFields() {
    return { caseSensitive: this.caseSensitive, tokens: this.tokens };
  }
  protected getDefaults() {
    return { caseSensitive: true, tokens: 'words' };
  }

  score(input: MetricInput): ScoreResult {
    const [a, b] = fold(input.output, input.expected, this.caseSensitive);
    const toSet = this.tokens === 'words' ? wordSet : charSet;
    return createScoreResult(this.name, jaccardIndex(toSet(a), toSet(b)));
  }
}

/**
 * Cosine similarity of word-frequency vectors.
 */
export class CosineSimilarity extends BaseMetric {
  readonly caseSensitive: boolean;

  constructor(opts?: CaseOptions) {
    super('cosine_similarity');
    this.caseSensitive = opts?.caseSensitive ?? true;
  }

  protected getFields() {
    return { caseSensitive: this.caseSensitive };
  }
  protected getDefaults() {
    return { caseSensitive: true };
  }

  score(input: MetricInput): ScoreResult {
    const [a, b] = fold(input.output, input.expected, this.caseSensitive);
    return createScoreResult(this.name, cosineSimilarity(wordFrequency(a), wordFrequency(b)));
  }
}

/**
 * Simplified BLEU: brevity penalty times the geometric mean of clipped n-gram
 * precisions for n = 1..maxN, on lower-cased whitespace tokens.
 */
export class BLEU extends BaseMetric {
  readonly maxN: number;

  constructor(opts?: { maxN?: number }) {
    super('bleu');
    const maxN = opts?.maxN ?? 4;
    this.maxN = maxN > 0 ? maxN : 4;
  }

  protected getFields() {
    return { maxN: this.maxN };
  }
  protected getDefaults() {
    return { maxN: 4 };
  }

  score(input: MetricInput): ScoreResult {
    const candidate = words(input.output.toLowerCase());
    const reference = words(input.expected.toLowerCase());
    return createScoreResult(this.name, bleuScore(candidate, reference, this.maxN));
  }
}

/**
 * Simplified ROUGE-L: F-score from the longest common subsequence of
 * lower-cased whitespace tokens.
 */
export class ROUGE extends BaseMetric {
  /** Weight of recall relative to precision. */
  readonly beta: number;

  constructor(opts?: { beta?: number }) {
    super('rouge_l');
    const beta = opts?.beta ?? 1;
    this.beta = beta > 0 ? beta : 1;
  }

  protected getFields() {
    return { beta: this.beta };
  }
  protected getDefaults() {
    return { beta: 1 };
  }

  score(input: MetricInput): ScoreResult {
    const candidate = words(input.output.toLowerCase());
    const reference = words(input.expected.toLowerCase());
    return createScoreResult(this.name, rougeLScore(candidate, reference, this.beta));
  }
}

/**
 * Mean of Levenshtein similarity and word-level Jaccard similarity.
 * The reason records which side of the threshold the score fell on; falling
 * below it is not a failure.
 */
export class FuzzyMatch extends BaseMetric {
  readonly threshold: number;
  readonly caseSensitive: boolean;

  constructor(opts?: { threshold?: number; caseSensitive?: boolean }) {
    super('fuzzy_match');
    this.threshold = opts?.threshold ?? 0.8;
    this.caseSensitive = opts?.caseSensitive ?? false;
  }

  protected getFields() {
    return { threshold: this.threshold, caseSensitive: this.caseSensitive };
  }
  protected getDefaults() {
    return { threshold: 0.8, caseSensitive: false };
  }

  score(input: MetricInput): ScoreResult {
    const [a, b] = fold(input.output, input.expected, this.caseSensitive);
    const value = (levenshteinSimilarity(a, b) + jaccardIndex(wordSet(a), wordSet(b))) / 2;
    const side = value >= this.threshold ? 'above' : 'below';
    return createScoreResult(this.name, value, `fuzzy match ${side} threshold`);
  }
}

/**
 * Placeholder for embedding-based similarity: scores with case-insensitive
 * word cosine similarity until an embedding backend is plugged in.
 */
export class SemanticSimilarity extends BaseMetric {
  constructor() {
    super('semantic_similarity');
  }

  score(input: MetricInput): ScoreResult {
    const value = cosineSimilarity(
      wordFrequency(input.output.toLowerCase()),
      wordFrequency(input.expected.toLowerCase()),
    );
    return createScoreResult(
      this.name,
      value,
      'using word-based approximation (no embedding provider)',
    );
  }
}

function fold(a: string, b: string, caseSensitive: boolean): [string, string] {
  return caseSensitive ? [a, b] : [a.toLowerCase(), b.toLowerCase()];
}
