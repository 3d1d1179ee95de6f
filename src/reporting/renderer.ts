/**
 * Terminal table rendering with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { EvaluationResult, ScoreResult } from '../types.js';
import { isSuccess } from '../types.js';
import { defaultRenderDuration, defaultRenderNumber } from './render-numbers.js';
import type { EvaluationResults } from './report.js';

export interface RendererOptions {
  /** Title shown above the table. */
  title?: string;
  includeInput?: boolean;
  includeExpected?: boolean;
  includeOutput?: boolean;
  includeDurations?: boolean;
  includeAverages?: boolean;
  includeReasons?: boolean;
  includeErrors?: boolean;
}

/**
 * Render evaluation results as a formatted table string: one row per item, an
 * averages row, and a list of failed items below the table.
 */
export function renderTable(results: EvaluationResults, opts?: RendererOptions): string {
  const includeDurations = opts?.includeDurations ?? true;
  const includeAverages = opts?.includeAverages ?? true;
  const includeErrors = opts?.includeErrors ?? true;
  const hasScores = results.metricNames().length > 0;

  const header: string[] = [chalk.bold('Item ID')];
  if (opts?.includeInput) header.push('Input');
  if (opts?.includeExpected) header.push('Expected');
  if (opts?.includeOutput) header.push('Output');
  if (hasScores) header.push('Scores');
  if (includeDurations) header.push('Duration');

  const table = new Table({
    head: header,
    style: { head: [], border: [] },
  });

  for (const result of results) {
    const row: string[] = [renderItemId(result)];

    if (opts?.includeInput) row.push(formatText(result.input.input));
    if (opts?.includeExpected) row.push(formatText(result.input.expected));
    if (opts?.includeOutput) row.push(formatText(result.input.output));
    if (hasScores) row.push(renderScores(result, opts?.includeReasons));
    if (includeDurations) row.push(defaultRenderDuration(result.duration));

    table.push(row);
  }

  if (includeAverages && results.length > 0) {
    const row: string[] = [chalk.bold.italic('Averages')];
    if (opts?.includeInput) row.push('');
    if (opts?.includeExpected) row.push('');
    if (opts?.includeOutput) row.push('');
    if (hasScores) {
      const averages = Object.entries(results.summary()).map(
        ([name, value]) => `${name}: ${defaultRenderNumber(value)}`,
      );
      row.push(averages.join('\n'));
    }
    if (includeDurations) row.push(defaultRenderDuration(results.averageDuration()));
    table.push(row);
  }

  const title = opts?.title ? `Evaluation Summary: ${opts.title}` : 'Evaluation Summary';
  const lines = [title, table.toString()];

  const failed = results.failed();
  if (includeErrors && failed.length > 0) {
    lines.push('', 'Failures:');
    for (const result of failed) {
      const error = result.error;
      if (error) lines.push(`  ${result.itemId}: ${error.name}: ${error.message}`);
    }
  }

  return lines.join('\n');
}

function renderItemId(result: EvaluationResult): string {
  const id = chalk.bold(result.itemId || '-');
  return isSuccess(result) ? id : `${id} ${chalk.red('✘')}`;
}

function renderScores(result: EvaluationResult, includeReasons?: boolean): string {
  if (result.scores.length === 0) return '-';
  return result.scores
    .toArray()
    .map((s) => renderScore(s, includeReasons))
    .join('\n');
}

function renderScore(score: ScoreResult, includeReasons?: boolean): string {
  if (score.error) {
    return `${score.name}: ${chalk.red('error')}`;
  }
  const line = `${score.name}: ${defaultRenderNumber(score.value)}`;
  if (includeReasons && score.reason) {
    return `${line}\n  Reason: ${score.reason}`;
  }
  return line;
}

function formatText(value: string): string {
  return value === '' ? '-' : value;
}
