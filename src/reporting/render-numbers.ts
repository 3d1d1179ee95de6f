/**
 * Number and duration formatting for result tables.
 */

const VALUE_SIG_FIGS = 3;
const EXPONENTIAL_BELOW = 1e-6;

/**
 * Format a number for display.
 *
 * - Integers: grouped with commas
 * - Other values: at least 1 decimal place and at least 3 significant figures
 * - Magnitudes below 1e-6: exponential notation, e.g. `2.29e-110`
 */
export function defaultRenderNumber(value: number): string {
  if (Number.isInteger(value)) {
    return formatWithCommas(value, 0);
  }

  if (Math.abs(value) < EXPONENTIAL_BELOW) {
    return value.toExponential(VALUE_SIG_FIGS - 1);
  }

  const magnitude = Math.floor(Math.log10(Math.abs(value)));
  const decimals =
    magnitude >= 0 ? Math.max(1, VALUE_SIG_FIGS - magnitude - 1) : VALUE_SIG_FIGS - 1 - magnitude;
  return formatWithCommas(value, decimals);
}

/**
 * Format a duration given in seconds, picking µs, ms or s.
 */
export function defaultRenderDuration(seconds: number): string {
  if (seconds === 0) {
    return '0s';
  }

  const abs = Math.abs(seconds);
  if (abs < 1e-3) {
    const micros = seconds * 1_000_000;
    return `${formatWithCommas(micros, Math.abs(micros) >= 1 ? 0 : 1)}µs`;
  }
  if (abs < 1) {
    return `${formatWithCommas(seconds * 1_000, 1)}ms`;
  }
  return `${formatWithCommas(seconds, 1)}s`;
}

function formatWithCommas(value: number, decimals: number): string {
  const [intPart = '', fraction] = Math.abs(value).toFixed(decimals).split('.');
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value < 0 ? '-' : '';
  return fraction ? `${sign}${grouped}.${fraction}` : `${sign}${grouped}`;
}
