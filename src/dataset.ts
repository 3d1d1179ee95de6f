/**
 * Datasets: raw records mapped into MetricInputs and scored by an Engine.
 *
 * A DatasetEvaluator pairs an engine with a mapper from caller-shaped records to
 * MetricInputs. A Dataset adds a name, the records themselves, the metrics to
 * run and the field mapping, and is what dataset files load into.
 */

import { Engine, type ProgressCallback } from './engine.js';
import type { Metric } from './metrics/metric.js';
import { consoleProgress } from './reporting/progress.js';
import type { EvaluationResults } from './reporting/report.js';
import { MetricInput } from './types.js';

/** A raw dataset record, as read from a dataset file. */
export type DatasetRecord = Record<string, unknown>;

/** Converts a caller-shaped record into a MetricInput. */
export type InputMapper<TRecord = DatasetRecord> = (record: TRecord) => MetricInput;

/**
 * Which record keys hold the input, the output and the expected value.
 */
export interface FieldMapping {
  input: string;
  output: string;
  expected: string;
}

export const DEFAULT_FIELD_MAPPING: Readonly<FieldMapping> = Object.freeze({
  input: 'input',
  output: 'output',
  expected: 'expected',
});

/**
 * Build a mapper that reads the input, output and expected strings from the given
 * keys and keeps the whole record as metadata. Missing or non-string values
 * become empty strings.
 */
export function defaultInputMapper(
  inputKey = DEFAULT_FIELD_MAPPING.input,
  outputKey = DEFAULT_FIELD_MAPPING.output,
  expectedKey = DEFAULT_FIELD_MAPPING.expected,
): InputMapper {
  return (record) =>
    new MetricInput({
      input: stringField(record, inputKey),
      output: stringField(record, outputKey),
      expected: stringField(record, expectedKey),
      metadata: record,
    });
}

function stringField(record: DatasetRecord, key: string): string {
  const value = Object.hasOwn(record, key) ? record[key] : undefined;
  return typeof value === 'string' ? value : '';
}

/**
 * Maps records through a mapper and scores them with an engine.
 */
export class DatasetEvaluator<TRecord = DatasetRecord> {
  readonly engine: Engine;
  private readonly mapper: InputMapper<TRecord>;

  constructor(engine: Engine, mapper: InputMapper<TRecord>) {
    this.engine = engine;
    this.mapper = mapper;
  }

  /**
   * Score every record. Result `i` belongs to record `i`.
   */
  evaluate(records: readonly TRecord[], signal?: AbortSignal): Promise<EvaluationResults> {
    return this.engine.evaluateMany(records.map(this.mapper), signal);
  }
}

export interface DatasetOptions {
  /** Optional name for the dataset. */
  name?: string | null;
  records?: DatasetRecord[];
  /** Metrics applied to every record. */
  metrics?: Metric[];
  /** Record keys to read; unset keys keep their defaults. */
  mapping?: Partial<FieldMapping>;
  /** Maximum number of records evaluated at once. */
  concurrency?: number;
}

export interface DatasetEvaluateOptions {
  signal?: AbortSignal;
  /** Whether to write per-record progress to stderr. */
  progress?: boolean;
  onProgress?: ProgressCallback;
  /** Overrides the dataset's concurrency for this run. */
  concurrency?: number;
}

/**
 * A named collection of records and the metrics to score them with.
 */
export class Dataset {
  name: string | null;
  records: DatasetRecord[];
  metrics: Metric[];
  mapping: FieldMapping;
  concurrency: number;

  constructor(opts: DatasetOptions = {}) {
    const concurrency = opts.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`concurrency must be a positive integer, got ${concurrency}`);
    }

    this.name = opts.name ?? null;
    this.records = [...(opts.records ?? [])];
    this.metrics = [...(opts.metrics ?? [])];
    this.mapping = { ...DEFAULT_FIELD_MAPPING, ...opts.mapping };
    this.concurrency = concurrency;
  }

  addRecord(record: DatasetRecord): void {
    this.records.push(record);
  }

  addMetric(metric: Metric): void {
    this.metrics.push(metric);
  }

  /**
   * The records mapped to MetricInputs through the field mapping.
   */
  inputs(): MetricInput[] {
    const mapper = this.mapper();
    return this.records.map(mapper);
  }

  /**
   * Score every record with the dataset's metrics.
   */
  evaluate(opts?: DatasetEvaluateOptions): Promise<EvaluationResults> {
    const callbacks: ProgressCallback[] = [];
    if (opts?.progress) callbacks.push(consoleProgress());
    if (opts?.onProgress) callbacks.push(opts.onProgress);

    const engine = new Engine(this.metrics, {
      concurrency: opts?.concurrency ?? this.concurrency,
      callbacks,
    });
    return new DatasetEvaluator(engine, this.mapper()).evaluate(this.records, opts?.signal);
  }

  private mapper(): InputMapper {
    const { input, output, expected } = this.mapping;
    return defaultInputMapper(input, output, expected);
  }
}
