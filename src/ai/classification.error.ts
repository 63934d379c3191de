import Groq from 'groq-sdk';

export const CLASSIFICATION_FAILURE_REASONS = [
  'not_configured',
  'auth_failed',
  'rate_limited',
  'timeout',
  'connection_error',
  'api_error',
  'invalid_response',
  'empty_response',
  'unexpected',
] as const;
export type ClassificationFailureReason = (typeof CLASSIFICATION_FAILURE_REASONS)[number];

/**
 * A remote classification attempt failed; `reason` is the tag written to the logs
 */
export class ClassificationError extends Error {
  constructor(
    readonly reason: ClassificationFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ClassificationError';
  }
}

/**
 * Maps anything thrown by the Groq client to a ClassificationError.
 * Subclasses are checked before their parents.
 */
export function toClassificationError(error: unknown): ClassificationError {
  if (error instanceof ClassificationError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof Groq.AuthenticationError) {
    return new ClassificationError('auth_failed', `Authentication failed: ${message}`, { cause: error });
  }
  if (error instanceof Groq.RateLimitError) {
    return new ClassificationError('rate_limited', `Rate limit exceeded: ${message}`, { cause: error });
  }
  if (error instanceof Groq.APIConnectionTimeoutError) {
    return new ClassificationError('timeout', `Request timed out: ${message}`, { cause: error });
  }
  if (error instanceof Groq.APIConnectionError) {
    return new ClassificationError('connection_error', `Connection error: ${message}`, { cause: error });
  }
  if (error instanceof Groq.APIError) {
    return new ClassificationError('api_error', `API error: ${message}`, { cause: error });
  }
  if (error instanceof SyntaxError) {
    return new ClassificationError('invalid_response', `Invalid JSON: ${message}`, { cause: error });
  }

  const name = error instanceof Error ? error.name : typeof error;
  return new ClassificationError('unexpected', `Unexpected error: ${name}`, { cause: error });
}
