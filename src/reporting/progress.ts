import chalk from 'chalk';
import type { ProgressCallback } from '../engine.js';
import { averageScore, isSuccess } from '../types.js';
import { defaultRenderNumber } from './render-numbers.js';

/**
 * A progress callback that writes one line per completed item to stderr, e.g.
 * `[3/10] item-2 avg 0.750`.
 */
export function consoleProgress(): ProgressCallback {
  return (completed, total, result) => {
    const counter = chalk.dim(`[${completed}/${total}]`);
    const status = isSuccess(result)
      ? `avg ${defaultRenderNumber(averageScore(result))}`
      : chalk.red(`failed: ${result.error?.message ?? 'unknown error'}`);
    console.error(`${counter} ${result.itemId} ${status}`);
  };
}
