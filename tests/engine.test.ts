import { describe, expect, it } from 'vitest';
import { Engine, evaluate, evaluateSingle, type ProgressCallback } from '../src/engine.js';
import { EvaluationCancelledError } from '../src/errors.js';
import { ROUGE } from '../src/heuristics/similarity.js';
import type { Metric } from '../src/metrics/metric.js';
import { createScoreResult, type EvaluationResult, isSuccess, MetricInput } from '../src/types.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function constant(name: string, value: number): Metric {
  return { name, score: () => createScoreResult(name, value) };
}

/** Scores the numeric output after a delay, counting calls and peak concurrency. */
function trackingMetric(delay: (input: MetricInput) => number) {
  const seen: string[] = [];
  let inFlight = 0;
  let peak = 0;
  const metric: Metric = {
    name: 'echo',
    score: async (input) => {
      seen.push(input.output);
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(delay(input));
      inFlight--;
      return createScoreResult('echo', Number(input.output));
    },
  };
  return { metric, seen, peak: () => peak };
}

function numberedInputs(count: number): MetricInput[] {
  return Array.from({ length: count }, (_, i) => MetricInput.of(`q${i}`, String(i)));
}

describe('Engine.evaluateOne', () => {
  it('scores with every metric in registration order', async () => {
    const engine = new Engine([constant('b', 0.2), constant('a', 0.1), constant('c', 0.3)]);
    const result = await engine.evaluateOne(MetricInput.of('q', 'a'));
    expect(result.scores.toArray().map((s) => s.name)).toEqual(['b', 'a', 'c']);
    expect(result.itemId).toBe('');
    expect(result.error).toBeNull();
    expect(result.duration).toBeGreaterThanOrEqual(0);
  });

  it('keeps the input on the result', async () => {
    const input = MetricInput.of('q', 'a');
    const result = await new Engine([constant('a', 1)]).evaluateOne(input);
    expect(result.input).toBe(input);
  });

  it('succeeds with no metrics', async () => {
    const result = await new Engine([]).evaluateOne(MetricInput.of('q', 'a'));
    expect(isSuccess(result)).toBe(true);
    expect(result.scores).toHaveLength(0);
  });

  it('records a throwing metric as a failed score without failing the item', async () => {
    const broken: Metric = {
      name: 'broken',
      score: () => {
        throw new Error('boom');
      },
    };
    const result = await new Engine([broken, constant('ok', 1)]).evaluateOne(new MetricInput());
    expect(result.error).toBeNull();
    expect(result.scores.at(0)?.error?.message).toBe('boom');
    expect(result.scores.at(1)?.value).toBe(1);
    expect(result.scores.average()).toBe(1);
  });

  it('computes nothing when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await new Engine([constant('a', 1)]).evaluateOne(
      new MetricInput(),
      controller.signal,
    );
    expect(result.error).not.toBeNull();
    expect(result.scores).toHaveLength(0);
    expect(isSuccess(result)).toBe(false);
  });

  it('reports an Error abort reason as is', async () => {
    const controller = new AbortController();
    const reason = new Error('shutting down');
    controller.abort(reason);
    const result = await new Engine([constant('a', 1)]).evaluateOne(
      new MetricInput(),
      controller.signal,
    );
    expect(result.error).toBe(reason);
  });

  it('wraps a non-Error abort reason', async () => {
    const controller = new AbortController();
    controller.abort('stop');
    const result = await new Engine([constant('a', 1)]).evaluateOne(
      new MetricInput(),
      controller.signal,
    );
    expect(result.error).toBeInstanceOf(EvaluationCancelledError);
    expect(result.error?.message).toBe('Evaluation was cancelled: stop');
    expect(result.error?.cause).toBe('stop');
  });

  it('keeps the scores computed before cancellation', async () => {
    const controller = new AbortController();
    let laterCalls = 0;
    const aborting: Metric = {
      name: 'first',
      score: () => {
        controller.abort('enough');
        return createScoreResult('first', 1);
      },
    };
    const later: Metric = {
      name: 'second',
      score: () => {
        laterCalls++;
        return createScoreResult('second', 1);
      },
    };
    const result = await new Engine([aborting, later]).evaluateOne(
      new MetricInput(),
      controller.signal,
    );
    expect(result.scores.toArray().map((s) => s.name)).toEqual(['first']);
    expect(result.error?.message).toBe('Evaluation was cancelled: enough');
    expect(laterCalls).toBe(0);
  });
});

describe('Engine.evaluateMany', () => {
  it('returns one result per input, index-aligned, sequentially', async () => {
    const results = await new Engine([constant('a', 1)]).evaluateMany(numberedInputs(3));
    expect(results.toArray().map((r) => r.itemId)).toEqual(['item-0', 'item-1', 'item-2']);
    expect(results.toArray().map((r) => r.input.output)).toEqual(['0', '1', '2']);
  });

  it('keeps slots aligned when later items finish first', async () => {
    const { metric } = trackingMetric((input) => 20 - 2 * Number(input.output));
    const engine = new Engine([metric], { concurrency: 4 });
    const results = await engine.evaluateMany(numberedInputs(8));

    expect(results).toHaveLength(8);
    results.toArray().forEach((result, i) => {
      expect(result.itemId).toBe(`item-${i}`);
      expect(result.input.output).toBe(String(i));
      expect(result.scores.byName('echo')?.value).toBe(i);
    });
  });

  it('dispatches every input exactly once within the concurrency limit', async () => {
    const tracker = trackingMetric(() => 5);
    const engine = new Engine([tracker.metric], { concurrency: 4 });
    const results = await engine.evaluateMany(numberedInputs(10));

    expect(results).toHaveLength(10);
    expect(tracker.seen).toHaveLength(10);
    expect([...tracker.seen].sort((a, b) => Number(a) - Number(b))).toEqual(
      numberedInputs(10).map((i) => i.output),
    );
    expect(tracker.peak()).toBe(4);
  });

  it('runs one item at a time by default', async () => {
    const tracker = trackingMetric(() => 1);
    await new Engine([tracker.metric]).evaluateMany(numberedInputs(4));
    expect(tracker.peak()).toBe(1);
    expect(tracker.seen).toEqual(['0', '1', '2', '3']);
  });

  it('returns an empty collection for no inputs', async () => {
    const results = await new Engine([constant('a', 1)], { concurrency: 3 }).evaluateMany([]);
    expect(results).toHaveLength(0);
  });

  it('marks every item cancelled when the signal is aborted up front', async () => {
    const controller = new AbortController();
    controller.abort();
    const completed: number[] = [];
    const engine = new Engine([constant('a', 1)], { concurrency: 2 }).onProgress((n) =>
      completed.push(n),
    );
    const results = await engine.evaluateMany(numberedInputs(3), controller.signal);

    expect(results.failed()).toHaveLength(3);
    expect(results.toArray().every((r) => r.scores.length === 0)).toBe(true);
    expect(completed).toEqual([1, 2, 3]);
  });
});

describe('progress callbacks', () => {
  it('are invoked once per item in order when sequential', async () => {
    const calls: [number, number, string][] = [];
    const engine = new Engine([constant('a', 1)]).onProgress((completed, total, result) => {
      calls.push([completed, total, result.itemId]);
    });
    await engine.evaluateMany(numberedInputs(3));
    expect(calls).toEqual([
      [1, 3, 'item-0'],
      [2, 3, 'item-1'],
      [3, 3, 'item-2'],
    ]);
  });

  it('count completions and see each item once when concurrent', async () => {
    const { metric } = trackingMetric((input) => (Number(input.output) % 3) * 3);
    const counts: number[] = [];
    const ids: string[] = [];
    const engine = new Engine([metric], { concurrency: 3 }).onProgress((completed, _, result) => {
      counts.push(completed);
      ids.push(result.itemId);
    });
    await engine.evaluateMany(numberedInputs(7));

    expect(counts).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect([...ids].sort()).toEqual(numberedInputs(7).map((_, i) => `item-${i}`).sort());
  });

  it('run option callbacks before registered ones', async () => {
    const order: string[] = [];
    const first: ProgressCallback = () => order.push('options');
    const engine = new Engine([constant('a', 1)], { callbacks: [first] });
    expect(engine.onProgress(() => order.push('registered'))).toBe(engine);
    await engine.evaluateOne(new MetricInput());
    expect(order).toEqual([]);
    await engine.evaluateMany([new MetricInput()]);
    expect(order).toEqual(['options', 'registered']);
  });

  it('reject the batch after every task settles when a callback throws', async () => {
    const tracker = trackingMetric(() => 2);
    const engine = new Engine([tracker.metric], { concurrency: 2 }).onProgress((completed) => {
      if (completed === 1) throw new Error('callback failed');
    });
    await expect(engine.evaluateMany(numberedInputs(4))).rejects.toThrow('callback failed');
    expect(tracker.seen).toHaveLength(4);
  });
});

describe('Engine.evaluateWithIds', () => {
  it('returns each id exactly once from a map', async () => {
    const items = new Map([
      ['alpha', MetricInput.of('q', '1')],
      ['beta', MetricInput.of('q', '2')],
      ['gamma', MetricInput.of('q', '3')],
    ]);
    const { metric } = trackingMetric((input) => 10 - 3 * Number(input.output));
    const results = await new Engine([metric], { concurrency: 3 }).evaluateWithIds(items);

    expect(results).toHaveLength(3);
    expect(results.toArray().map((r) => r.itemId).sort()).toEqual(['alpha', 'beta', 'gamma']);
    expect(results.byId('beta')?.scores.byName('echo')?.value).toBe(2);
  });

  it('accepts a plain record and keeps insertion order when sequential', async () => {
    const results = await new Engine([constant('a', 1)]).evaluateWithIds({
      x: MetricInput.of('q', 'x'),
      y: MetricInput.of('q', 'y'),
    });
    expect(results.toArray().map((r: EvaluationResult) => r.itemId)).toEqual(['x', 'y']);
    expect(results.byId('y')?.input.output).toBe('y');
  });
});

describe('Engine configuration', () => {
  it('defaults to a concurrency of 1 and ignores non-positive values', () => {
    expect(new Engine([]).concurrency).toBe(1);
    expect(new Engine([], { concurrency: 0 }).concurrency).toBe(1);
    expect(new Engine([], { concurrency: -3 }).concurrency).toBe(1);
    expect(new Engine([], { concurrency: 8 }).concurrency).toBe(8);
  });

  it('falls back to sequential for a fractional concurrency', async () => {
    const engine = new Engine([constant('a', 1)], { concurrency: 2.5 });
    expect(engine.concurrency).toBe(1);
    const results = await engine.evaluateMany(numberedInputs(3));
    expect(results.toArray().map((r) => r.itemId)).toEqual(['item-0', 'item-1', 'item-2']);
  });

  it('exposes a snapshot of its metrics', () => {
    const metrics = [constant('a', 1), constant('b', 1)];
    const engine = new Engine(metrics);
    metrics.push(constant('c', 1));
    expect(engine.metrics.map((m) => m.name)).toEqual(['a', 'b']);
  });
});

describe('one-off helpers', () => {
  it('evaluate scores a batch', async () => {
    const results = await evaluate(
      [new ROUGE()],
      [new MetricInput({ output: 'the cat', expected: 'the cat sat' })],
      { concurrency: 2 },
    );
    expect(results.averageByMetric('rouge_l')).toBeCloseTo(0.8, 9);
  });

  it('evaluateSingle scores one input', async () => {
    const result = await evaluateSingle([constant('a', 0.5)], new MetricInput());
    expect(result.scores.average()).toBe(0.5);
  });
});
