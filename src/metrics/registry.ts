/**
 * Registry mapping serialization names to metric factories.
 *
 * Each built-in entry validates its options with a zod schema before building the
 * metric, so a dataset file with a misspelled option fails at load time rather
 * than during evaluation.
 */

import { z } from 'zod';
import { MetricConfigurationError } from '../errors.js';
import {
  ExtractJSON,
  IsBoolean,
  IsJSON,
  IsJSONArray,
  IsJSONObject,
  IsNumber,
  IsXML,
  JSONHasKeys,
  JSONSchemaValid,
} from '../heuristics/parsing.js';
import {
  DateFormat,
  EmailFormat,
  PhoneFormat,
  RegexFindAll,
  RegexMatch,
  RegexNotMatch,
  URLFormat,
  UUIDFormat,
} from '../heuristics/pattern.js';
import {
  BLEU,
  CosineSimilarity,
  FuzzyMatch,
  JaccardSimilarity,
  LevenshteinSimilarity,
  ROUGE,
  SemanticSimilarity,
} from '../heuristics/similarity.js';
import {
  Contains,
  ContainsAll,
  ContainsAny,
  EndsWith,
  Equals,
  LengthBetween,
  NoOffensiveLanguage,
  NotEmpty,
  StartsWith,
  WordCount,
} from '../heuristics/string.js';
import { metricSpecSchema } from '../serialization/schema.js';
import type { MetricSpec } from '../types.js';
import { toError } from '../types.js';
import type { BaseMetric } from './base.js';
import { CompositeMetric, WeightedMetric } from './combinators.js';
import type { Metric } from './metric.js';
import { deserializeMetricSpec } from './spec.js';

/**
 * Registry entry: maps a serialization name to a factory function.
 *
 * `load` builds a nested metric from its raw spec, for entries whose options
 * contain other metrics.
 */
export interface MetricRegistryEntry {
  name: string;
  create: (args: Record<string, unknown>, load: (raw: unknown) => Metric) => Metric;
}

export type MetricRegistry = ReadonlyMap<string, MetricRegistryEntry>;

type MetricClass = { getSerializationName(): string };

const noOptions = z.object({}).strict();

function entry<S extends z.ZodTypeAny>(
  named: MetricClass | string,
  schema: S,
  build: (opts: z.infer<S>, load: (raw: unknown) => Metric) => Metric,
): MetricRegistryEntry {
  return {
    name: typeof named === 'string' ? named : named.getSerializationName(),
    create: (args, load) => build(schema.parse(args), load),
  };
}

function plain(cls: MetricClass & (new () => BaseMetric)): MetricRegistryEntry {
  return entry(cls, noOptions, () => new cls());
}

const caseOptions = z.object({ caseSensitive: z.boolean().optional() }).strict();

const valuesOptions = caseOptions.extend({ values: z.array(z.string()) }).strict();

const rangeOptions = z
  .object({ min: z.number().int().nonnegative(), max: z.number().int().nonnegative() })
  .strict()
  .refine((o) => o.min <= o.max, { message: 'min must not exceed max' });

const patternOptions = z.object({ pattern: z.string(), flags: z.string().optional() }).strict();

const jsonType = z.enum(['string', 'number', 'boolean', 'array', 'object', 'null']);

/**
 * Built-in metrics, keyed by class name.
 */
export const DEFAULT_METRICS: readonly MetricRegistryEntry[] = [
  // similarity
  entry(LevenshteinSimilarity, caseOptions, (o) => new LevenshteinSimilarity(o)),
  entry(
    JaccardSimilarity,
    caseOptions.extend({ tokens: z.enum(['words', 'characters']).optional() }).strict(),
    (o) => new JaccardSimilarity(o),
  ),
  entry(CosineSimilarity, caseOptions, (o) => new CosineSimilarity(o)),
  entry(BLEU, z.object({ maxN: z.number().int().optional() }).strict(), (o) => new BLEU(o)),
  entry(ROUGE, z.object({ beta: z.number().optional() }).strict(), (o) => new ROUGE(o)),
  entry(
    FuzzyMatch,
    caseOptions.extend({ threshold: z.number().min(0).max(1).optional() }).strict(),
    (o) => new FuzzyMatch(o),
  ),
  plain(SemanticSimilarity),

  // string
  entry(Equals, caseOptions, (o) => new Equals(o)),
  entry(Contains, caseOptions, (o) => new Contains(o)),
  entry(StartsWith, caseOptions, (o) => new StartsWith(o)),
  entry(EndsWith, caseOptions, (o) => new EndsWith(o)),
  entry(ContainsAny, valuesOptions, (o) => new ContainsAny(o)),
  entry(ContainsAll, valuesOptions, (o) => new ContainsAll(o)),
  plain(NotEmpty),
  entry(LengthBetween, rangeOptions, (o) => new LengthBetween(o)),
  entry(WordCount, rangeOptions, (o) => new WordCount(o)),
  entry(
    NoOffensiveLanguage,
    z.object({ patterns: z.array(z.string()) }).strict(),
    (o) => new NoOffensiveLanguage(o),
  ),

  // pattern
  entry(RegexMatch, patternOptions, (o) => new RegexMatch(o)),
  entry(RegexNotMatch, patternOptions, (o) => new RegexNotMatch(o)),
  entry(
    RegexFindAll,
    patternOptions
      .extend({
        minMatches: z.number().int().nonnegative().optional(),
        maxMatches: z.number().int().nonnegative().optional(),
        normalizeBy: z.number().nonnegative().optional(),
      })
      .strict(),
    (o) => new RegexFindAll(o),
  ),
  plain(EmailFormat),
  plain(URLFormat),
  plain(PhoneFormat),
  entry(DateFormat, z.object({ pattern: z.string().optional() }).strict(), (o) => new DateFormat(o)),
  plain(UUIDFormat),

  // parsing
  plain(IsJSON),
  plain(IsJSONObject),
  plain(IsJSONArray),
  entry(JSONHasKeys, z.object({ keys: z.array(z.string()) }).strict(), (o) => new JSONHasKeys(o)),
  entry(
    JSONSchemaValid,
    z.object({ required: z.record(z.string(), jsonType) }).strict(),
    (o) => new JSONSchemaValid(o),
  ),
  plain(IsXML),
  plain(IsNumber),
  plain(IsBoolean),
  entry(
    ExtractJSON,
    z.object({ metric: metricSpecSchema }).strict(),
    (o, load) => new ExtractJSON({ metric: load(o.metric) }),
  ),

  // combinators
  entry(
    CompositeMetric,
    z.object({ name: z.string(), metrics: z.array(metricSpecSchema) }).strict(),
    (o, load) => new CompositeMetric(o.name, ...o.metrics.map(load)),
  ),
  entry(
    'WeightedMetric',
    z.object({ metric: metricSpecSchema, weight: z.number() }).strict(),
    (o, load) => new WeightedMetric(load(o.metric), o.weight),
  ),
];

/**
 * Build a registry from custom entries plus the defaults.
 * Custom entries take precedence over built-ins of the same name; duplicates among
 * the custom entries are rejected.
 */
export function buildMetricRegistry(
  custom: readonly MetricRegistryEntry[] = [],
  defaults: readonly MetricRegistryEntry[] = DEFAULT_METRICS,
): MetricRegistry {
  const registry = new Map<string, MetricRegistryEntry>();

  for (const e of custom) {
    if (registry.has(e.name)) {
      throw new MetricConfigurationError(`Duplicate metric name: '${e.name}'`);
    }
    registry.set(e.name, e);
  }

  for (const e of defaults) {
    if (!registry.has(e.name)) {
      registry.set(e.name, e);
    }
  }

  return registry;
}

const defaultRegistry = buildMetricRegistry();

/**
 * Build a metric from its spec.
 */
export function loadMetricFromSpec(
  spec: MetricSpec,
  registry: MetricRegistry = defaultRegistry,
): Metric {
  const found = registry.get(spec.name);
  if (!found) {
    throw new MetricConfigurationError(
      `Metric '${spec.name}' is not in the registry. ` +
        `Valid choices: ${[...registry.keys()].join(', ')}. ` +
        'If using a custom metric, include its entry in customMetrics.',
    );
  }

  try {
    return found.create(spec.arguments ?? {}, (raw) => loadMetric(raw, registry));
  } catch (e) {
    if (e instanceof MetricConfigurationError) throw e;
    const error = toError(e);
    throw new MetricConfigurationError(
      `Failed to instantiate metric '${spec.name}': ${error.message}`,
      { cause: error },
    );
  }
}

/**
 * Build a metric from its serialized short form, e.g. `'BLEU'` or `{ ROUGE: { beta: 2 } }`.
 */
export function loadMetric(raw: unknown, registry: MetricRegistry = defaultRegistry): Metric {
  return loadMetricFromSpec(deserializeMetricSpec(raw), registry);
}
