import {
  getErrorStatus,
  isAuthError,
  isRateLimitError,
  isTimeoutError
} from './retryHelper';

export type TranslationFailureReason =
  | 'auth'
  | 'rate_limit'
  | 'timeout'
  | 'transport'
  | 'malformed_response'
  | 'empty_response'
  | 'unavailable'
  | 'unknown';

/**
 * The single failure kind a provider adapter may raise.
 */
export class TranslationError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly reason: TranslationFailureReason = 'unknown',
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TranslationError';
  }
}

/**
 * Turn any thrown value into a human-readable message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

function classify(error: unknown): TranslationFailureReason {
  if (isAuthError(error)) {
    return 'auth';
  }
  if (isRateLimitError(error)) {
    return 'rate_limit';
  }
  if (isTimeoutError(error)) {
    return 'timeout';
  }
  if (getErrorStatus(error) !== undefined) {
    return 'transport';
  }
  return 'unknown';
}

/**
 * Normalize a backend failure into a TranslationError carrying the
 * provider-prefixed message. TranslationErrors pass through unchanged.
 */
export function toTranslationError(
  provider: string,
  label: string,
  error: unknown
): TranslationError {
  if (error instanceof TranslationError) {
    return error;
  }
  return new TranslationError(
    `${label} translation failed: ${describeError(error)}`,
    provider,
    classify(error),
    getErrorStatus(error),
    { cause: error }
  );
}
