/**
 * Tokenizers and text-similarity algorithms shared by the heuristic metrics.
 */

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/** Split on runs of whitespace, dropping empty tokens. */
export function words(text: string): string[] {
  return text.split(/\s+/u).filter((w) => w.length > 0);
}

export function wordSet(text: string): Set<string> {
  return new Set(words(text));
}

/** The distinct code points of a string, whitespace included. */
export function charSet(text: string): Set<string> {
  return new Set(Array.from(text));
}

/**
 * Word frequencies, with non-alphanumeric characters trimmed from both ends of
 * each word. Words that are entirely punctuation are dropped.
 */
export function wordFrequency(text: string): Map<string, number> {
  const freq = new Map<string, number>();
  for (const raw of words(text)) {
    const word = raw.replace(EDGE_PUNCTUATION, '');
    if (word !== '') {
      freq.set(word, (freq.get(word) ?? 0) + 1);
    }
  }
  return freq;
}

/**
 * Edit distance (insertions, deletions, substitutions) between two strings,
 * counted in code points.
 */
export function levenshteinDistance(a: string, b: string): number {
  const s = Array.from(a);
  const t = Array.from(b);
  if (s.length === 0) return t.length;
  if (t.length === 0) return s.length;

  // Two rolling rows of the distance matrix.
  let prev = Array.from({ length: t.length + 1 }, (_, j) => j);
  let curr = new Array<number>(t.length + 1).fill(0);

  for (let i = 1; i <= s.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= t.length; j++) {
      const cost = s[i - 1] === t[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        (prev[j] ?? 0) + 1,
        (curr[j - 1] ?? 0) + 1,
        (prev[j - 1] ?? 0) + cost,
      );
    }
    [prev, curr] = [curr, prev];
  }

  return prev[t.length] ?? 0;
}

/**
 * `1 - distance / max(len)`; two empty strings are identical.
 */
export function levenshteinSimilarity(a: string, b: string): number {
  const maxLen = Math.max(Array.from(a).length, Array.from(b).length);
  if (maxLen === 0) return 1;
  return 1 - levenshteinDistance(a, b) / maxLen;
}

/**
 * Intersection over union of two sets; two empty sets are identical.
 */
export function jaccardIndex<T>(a: Set<T>, b: Set<T>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

/**
 * Cosine of the angle between two frequency vectors.
 * Two empty vectors are identical; one empty vector scores 0.
 */
export function cosineSimilarity(a: Map<string, number>, b: Map<string, number>): number {
  if (a.size === 0 || b.size === 0) {
    return a.size === 0 && b.size === 0 ? 1 : 0;
  }

  let dot = 0;
  for (const [word, count] of a) {
    dot += count * (b.get(word) ?? 0);
  }
  const magnitude = (v: Map<string, number>) =>
    Math.sqrt([...v.values()].reduce((sum, c) => sum + c * c, 0));

  const magA = magnitude(a);
  const magB = magnitude(b);
  if (magA === 0 || magB === 0) return 0;
  return dot / (magA * magB);
}

/** Length of the longest common subsequence of two token lists. */
export function lcsLength(a: readonly string[], b: readonly string[]): number {
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] =
        a[i - 1] === b[j - 1]
          ? (prev[j - 1] ?? 0) + 1
          : Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[b.length] ?? 0;
}

export function ngramCounts(tokens: readonly string[], n: number): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i + n <= tokens.length; i++) {
    const gram = tokens.slice(i, i + n).join(' ');
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Clipped n-gram precision: each candidate n-gram counts at most as many times as
 * it occurs in the reference. Returns 0 when either side is shorter than n.
 */
export function ngramPrecision(
  candidate: readonly string[],
  reference: readonly string[],
  n: number,
): number {
  if (candidate.length < n || reference.length < n) return 0;

  const refCounts = ngramCounts(reference, n);
  let matches = 0;
  for (const [gram, count] of ngramCounts(candidate, n)) {
    matches += Math.min(count, refCounts.get(gram) ?? 0);
  }
  return matches / (candidate.length - n + 1);
}

/**
 * 1 when the candidate is at least as long as the reference, otherwise
 * `exp(1 - ref / cand)`.
 */
export function brevityPenalty(candidateLength: number, referenceLength: number): number {
  if (candidateLength >= referenceLength) return 1;
  return Math.exp(1 - referenceLength / candidateLength);
}

/** Floor applied to zero n-gram precisions before taking logarithms. */
export const BLEU_SMOOTHING = 0.01;

/**
 * Simplified sentence BLEU over pre-tokenized text. An empty candidate scores 0.
 */
export function bleuScore(
  candidate: readonly string[],
  reference: readonly string[],
  maxN = 4,
): number {
  if (candidate.length === 0) return 0;

  const penalty = brevityPenalty(candidate.length, reference.length);
  let logSum = 0;
  for (let n = 1; n <= maxN; n++) {
    const precision = ngramPrecision(candidate, reference, n);
    logSum += Math.log(precision > 0 ? precision : BLEU_SMOOTHING);
  }
  return penalty * Math.exp(logSum / maxN);
}

/**
 * ROUGE-L F-score from the longest common subsequence of two token lists.
 * Two empty lists score 1; exactly one empty list scores 0.
 */
export function rougeLScore(
  candidate: readonly string[],
  reference: readonly string[],
  beta = 1,
): number {
  if (candidate.length === 0 || reference.length === 0) {
    return candidate.length === 0 && reference.length === 0 ? 1 : 0;
  }

  const lcs = lcsLength(candidate, reference);
  const precision = lcs / candidate.length;
  const recall = lcs / reference.length;
  if (precision + recall === 0) return 0;

  const betaSq = beta * beta;
  return ((1 + betaSq) * precision * recall) / (betaSq * precision + recall);
}
