/**
 * Error types surfaced by the ask pipeline.
 *
 * Validation and quota errors carry a message meant for the user. API errors
 * carry a `kind` that decides which message the user sees.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class QuotaExceededError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`Daily request limit of ${limit} reached`);
    this.name = 'QuotaExceededError';
    this.limit = limit;
  }
}

export type GeminiErrorKind = 'rate_limit' | 'timeout' | 'blocked' | 'empty' | 'request';

export class GeminiApiError extends Error {
  readonly kind: GeminiErrorKind;
  readonly status?: number;

  constructor(kind: GeminiErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'GeminiApiError';
    this.kind = kind;
    this.status = status;
  }
}

const apiErrorMessages: Record<GeminiErrorKind, string> = {
  rate_limit: 'Gemini is rate limiting requests right now. Please wait a minute and try again.',
  timeout: 'Gemini took too long to answer. Please try again.',
  blocked: 'The model refused to answer (Safety/Invalid response).',
  empty: 'The model returned no response.',
  request: 'Sorry, the request to Gemini failed.',
};

/**
 * Text shown to the user for a failed ask.
 */
export function describeError(error: unknown): string {
  if (error instanceof ValidationError) {
    return error.message;
  }
  if (error instanceof QuotaExceededError) {
    return `The daily limit of ${error.limit} Gemini calls has been reached. Try again tomorrow.`;
  }
  if (error instanceof GeminiApiError) {
    return apiErrorMessages[error.kind];
  }
  return 'Sorry, I encountered a critical unexpected error.';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
