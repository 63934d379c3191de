import { Logger } from '@nestjs/common';

const logger = new Logger('DatabaseRetry');

// Failures of the HTTP round trip to Neon. The statement may or may not have
// been applied when one of these surfaces.
const TRANSIENT_MARKERS = [
  'etimedout',
  'enetunreach',
  'econnreset',
  'econnrefused',
  'fetch failed',
  'network',
  'timeout',
];

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isTransientDbError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const code: unknown = Reflect.get(error, 'code');
  const haystack = `${error.message} ${error.name} ${typeof code === 'string' ? code : ''}`.toLowerCase();
  return TRANSIENT_MARKERS.some((marker) => haystack.includes(marker));
}

/** 1x, 2x, 4x ... the base delay, capped */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs a statement that is safe to repeat (a read, a delete by cutoff, or a
 * status transition guarded on the current status) and retries it on
 * transient failures.
 *
 * Inserts and claims must not go through here: when the response of a
 * committed write is lost, running it again either fails on a unique key or
 * reports a different outcome. Their callers re-read the row instead.
 */
export async function retryIdempotent<T>(
  label: string,
  statement: () => Promise<T>,
  policy: Partial<RetryPolicy> = {},
): Promise<T> {
  const resolved: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };

  for (let attempt = 1; ; attempt++) {
    try {
      return await statement();
    } catch (error) {
      if (!isTransientDbError(error)) {
        throw error;
      }

      if (attempt >= resolved.attempts) {
        logger.error(
          `${label}: giving up after ${attempt} attempts`,
          error instanceof Error ? error.stack : String(error),
        );
        throw error;
      }

      const delay = backoffDelay(attempt, resolved);
      logger.warn(
        `${label}: attempt ${attempt}/${resolved.attempts} failed, retrying in ${delay}ms (${describeError(error)})`,
      );
      await sleep(delay);
    }
  }
}
