/**
 * Zod schemas for the dataset file format.
 *
 * ```yaml
 * name: capitals
 * mapping: { input: question, output: answer, expected: reference }
 * concurrency: 4
 * metrics:
 *   - Equals
 *   - ROUGE: { beta: 2 }
 * records:
 *   - { question: Capital of France?, answer: Paris, reference: Paris }
 * ```
 */

import { z } from 'zod';

/**
 * Schema for a metric spec in serialized form.
 * Handles the short forms:
 * - string: metric name with no options
 * - { name: null }: metric name with no options
 * - { name: { k1: v1, k2: v2 } }: options mapping
 */
export const metricSpecSchema = z.union([
  z.string(),
  z.record(z.string(), z.unknown()).refine((obj) => Object.keys(obj).length === 1, {
    message: 'Metric spec object must have exactly one key (the metric name)',
  }),
]);

export type MetricSpecRaw = z.infer<typeof metricSpecSchema>;

/**
 * Which record keys hold the input, the output and the expected value.
 */
export const fieldMappingSchema = z
  .object({
    input: z.string().optional(),
    output: z.string().optional(),
    expected: z.string().optional(),
  })
  .strict();

export const recordSchema = z.record(z.string(), z.unknown());

export const datasetSchema = z
  .object({
    $schema: z.string().optional(),
    name: z.string().optional().nullable(),
    mapping: fieldMappingSchema.optional(),
    concurrency: z.number().int().positive().optional(),
    metrics: z.array(metricSpecSchema).optional().default([]),
    records: z.array(recordSchema),
  })
  .strict();

export type DatasetFile = z.infer<typeof datasetSchema>;
