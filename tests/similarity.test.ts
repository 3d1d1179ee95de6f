import { describe, expect, it } from 'vitest';
import {
  BLEU,
  CosineSimilarity,
  FuzzyMatch,
  JaccardSimilarity,
  LevenshteinSimilarity,
  ROUGE,
  SemanticSimilarity,
} from '../src/heuristics/similarity.js';
import {
  bleuScore,
  brevityPenalty,
  charSet,
  cosineSimilarity,
  jaccardIndex,
  lcsLength,
  levenshteinDistance,
  levenshteinSimilarity,
  ngramCounts,
  ngramPrecision,
  rougeLScore,
  wordFrequency,
  words,
} from '../src/heuristics/text.js';
import { MetricInput } from '../src/types.js';

function pair(output: string, expected: string): MetricInput {
  return new MetricInput({ output, expected });
}

describe('tokenizers', () => {
  it('splits on whitespace runs', () => {
    expect(words('  the   cat\tsat\n')).toEqual(['the', 'cat', 'sat']);
    expect(words('')).toEqual([]);
  });

  it('collects code points', () => {
    expect(charSet('aab')).toEqual(new Set(['a', 'b']));
    expect(charSet('😀😀').size).toBe(1);
  });

  it('counts words without edge punctuation', () => {
    expect([...wordFrequency('Hello, world! -- hello world')]).toEqual([
      ['Hello', 1],
      ['world', 2],
      ['hello', 1],
    ]);
  });

  it('counts n-grams', () => {
    expect([...ngramCounts(['a', 'b', 'a', 'b'], 2)]).toEqual([
      ['a b', 2],
      ['b a', 1],
    ]);
  });
});

describe('Levenshtein', () => {
  it('computes edit distance', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('abc', '')).toBe(3);
    expect(levenshteinDistance('same', 'same')).toBe(0);
  });

  it('normalizes by the longer length', () => {
    expect(levenshteinSimilarity('', '')).toBe(1);
    expect(levenshteinSimilarity('kitten', 'sitting')).toBeCloseTo(1 - 3 / 7, 9);
    expect(levenshteinSimilarity('abc', '')).toBe(0);
  });

  it('counts code points, not UTF-16 units', () => {
    expect(levenshteinDistance('😀a', '😀b')).toBe(1);
    expect(levenshteinSimilarity('😀a', '😀b')).toBe(0.5);
  });

  it('is case-sensitive unless configured otherwise', async () => {
    const input = pair('Hello', 'hello');
    expect((await new LevenshteinSimilarity().score(input)).value).toBeCloseTo(0.8, 9);
    expect((await new LevenshteinSimilarity({ caseSensitive: false }).score(input)).value).toBe(1);
  });

  it('reports under its metric name', async () => {
    const result = await new LevenshteinSimilarity().score(pair('kitten', 'sitting'));
    expect(result.name).toBe('levenshtein_similarity');
    expect(result.value).toBeCloseTo(0.5714285714, 9);
  });
});

describe('Jaccard', () => {
  it('computes intersection over union', () => {
    expect(jaccardIndex(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3, 9);
    expect(jaccardIndex(new Set(), new Set())).toBe(1);
    expect(jaccardIndex(new Set(['a']), new Set())).toBe(0);
  });

  it('compares distinct words by default', async () => {
    const result = await new JaccardSimilarity().score(pair('the cat sat', 'the dog sat the'));
    expect(result.name).toBe('jaccard_similarity');
    expect(result.value).toBe(0.5);
  });

  it('compares characters when asked', async () => {
    const metric = new JaccardSimilarity({ tokens: 'characters' });
    expect((await metric.score(pair('ab', 'bc'))).value).toBeCloseTo(1 / 3, 9);
  });

  it('scores two empty strings as identical', async () => {
    expect((await new JaccardSimilarity().score(pair('', ''))).value).toBe(1);
  });
});

describe('Cosine', () => {
  it('compares word-frequency vectors', () => {
    const a = wordFrequency('a b');
    const b = wordFrequency('a c');
    expect(cosineSimilarity(a, b)).toBeCloseTo(0.5, 9);
  });

  it('handles empty vectors', () => {
    expect(cosineSimilarity(new Map(), new Map())).toBe(1);
    expect(cosineSimilarity(wordFrequency('a'), new Map())).toBe(0);
  });

  it('ignores edge punctuation', async () => {
    const result = await new CosineSimilarity().score(pair('cat, dog!', 'cat dog'));
    expect(result.name).toBe('cosine_similarity');
    expect(result.value).toBeCloseTo(1, 9);
  });

  it('scores punctuation-only text as empty', async () => {
    expect((await new CosineSimilarity().score(pair('...', ''))).value).toBe(1);
    expect((await new CosineSimilarity().score(pair('...', 'cat'))).value).toBe(0);
  });
});

describe('BLEU', () => {
  it('clips n-gram matches by the reference counts', () => {
    expect(ngramPrecision(['the', 'cat', 'the'], ['the', 'cat'], 1)).toBeCloseTo(2 / 3, 9);
    expect(ngramPrecision(['the', 'cat'], ['the', 'cat'], 3)).toBe(0);
  });

  it('penalizes short candidates', () => {
    expect(brevityPenalty(4, 4)).toBe(1);
    expect(brevityPenalty(5, 4)).toBe(1);
    expect(brevityPenalty(2, 4)).toBeCloseTo(Math.exp(-1), 9);
  });

  it('scores identical text as 1', async () => {
    const result = await new BLEU().score(
      pair('The quick brown fox jumps', 'the quick brown fox jumps'),
    );
    expect(result.name).toBe('bleu');
    expect(result.value).toBeCloseTo(1, 9);
  });

  it('floors missing n-gram orders', () => {
    // p1 = p2 = 1, p3 and p4 floored to 0.01: exp((2 * ln 0.01) / 4) = 0.1
    expect(bleuScore(['the', 'cat'], ['the', 'cat'])).toBeCloseTo(0.1, 9);
  });

  it('scores an empty candidate as 0', () => {
    expect(bleuScore([], ['the', 'cat'])).toBe(0);
  });

  it('falls back to 4-grams for a non-positive order', () => {
    expect(new BLEU({ maxN: 0 }).maxN).toBe(4);
    expect(new BLEU({ maxN: 2 }).maxN).toBe(2);
  });
});

describe('ROUGE-L', () => {
  it('finds the longest common subsequence', () => {
    expect(lcsLength(['a', 'b', 'c', 'd'], ['a', 'c', 'd'])).toBe(3);
    expect(lcsLength([], ['a'])).toBe(0);
  });

  it('computes the F-score from LCS precision and recall', () => {
    expect(rougeLScore(['the', 'cat'], ['the', 'cat', 'sat'])).toBeCloseTo(0.8, 9);
  });

  it('weights recall by beta', () => {
    expect(rougeLScore(['the', 'cat'], ['the', 'cat', 'sat'], 2)).toBeCloseTo(10 / 14, 9);
  });

  it('handles empty and disjoint token lists', () => {
    expect(rougeLScore([], [])).toBe(1);
    expect(rougeLScore(['a'], [])).toBe(0);
    expect(rougeLScore(['a'], ['b'])).toBe(0);
  });

  it('lower-cases text before tokenizing', async () => {
    const result = await new ROUGE().score(pair('The Cat', 'the cat sat'));
    expect(result.name).toBe('rouge_l');
    expect(result.value).toBeCloseTo(0.8, 9);
  });

  it('falls back to beta 1 for a non-positive beta', () => {
    expect(new ROUGE({ beta: -1 }).beta).toBe(1);
  });
});

describe('FuzzyMatch', () => {
  it('ignores case by default', async () => {
    const result = await new FuzzyMatch().score(pair('Hello World', 'hello world'));
    expect(result).toEqual({
      name: 'fuzzy_match',
      value: 1,
      reason: 'fuzzy match above threshold',
    });
  });

  it('reports scores below the threshold without failing', async () => {
    const result = await new FuzzyMatch().score(pair('abc', 'xyz'));
    expect(result).toEqual({
      name: 'fuzzy_match',
      value: 0,
      reason: 'fuzzy match below threshold',
    });
  });

  it('averages Levenshtein and word Jaccard', async () => {
    // Levenshtein 1 - 1/7, Jaccard {the, cat} vs {the, car} = 1/3
    const result = await new FuzzyMatch({ threshold: 0.5 }).score(pair('the cat', 'the car'));
    expect(result.value).toBeCloseTo((1 - 1 / 7 + 1 / 3) / 2, 9);
    expect(result.reason).toBe('fuzzy match above threshold');
  });
});

describe('SemanticSimilarity', () => {
  it('approximates with case-insensitive word cosine', async () => {
    const result = await new SemanticSimilarity().score(pair('The Cat', 'the cat'));
    expect(result).toEqual({
      name: 'semantic_similarity',
      value: expect.closeTo(1, 9),
      reason: 'using word-based approximation (no embedding provider)',
    });
  });
});
