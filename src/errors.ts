/**
 * Raised into an EvaluationResult when the evaluation was cancelled through an
 * AbortSignal whose reason is not itself an Error.
 */
export class EvaluationCancelledError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EvaluationCancelledError';
  }
}

/**
 * A metric could not be built from the given options (unknown registry name,
 * invalid option values, malformed regular expression).
 */
export class MetricConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MetricConfigurationError';
  }
}

/**
 * The error to record for an aborted signal.
 */
export function cancellationError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  return new EvaluationCancelledError(
    reason === undefined ? 'Evaluation was cancelled' : `Evaluation was cancelled: ${String(reason)}`,
    { cause: reason },
  );
}
