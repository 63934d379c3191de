import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { fingerprintAddress } from '../common/utils/hashing.util';
import { retryIdempotent } from '../drizzle/db-utils';
import { RateLimitRepository } from './rate-limit.repository';

const ONE_HOUR_MS = 60 * 60 * 1000;

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetAt: Date;
  retryAfterMs?: number;
}

export interface RateLimitStats {
  totalEvents: number;
  lastHour: number;
  lastWindow: number;
  /** Events older than the window that the next sweep will delete */
  expired: number;
  maxSubmissions: number;
  windowHours: number;
}

/**
 * Sliding-window admission control for anonymous submissions, keyed by a
 * salted fingerprint of the submitter address.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly rateLimitRepository: RateLimitRepository,
  ) {}

  fingerprint(address: string | undefined): string {
    return fingerprintAddress(address, this.config.rateLimit.fingerprintSalt);
  }

  /**
   * Check whether the fingerprint may submit at `now`.
   * Recording happens with the submission itself, not here.
   */
  async check(fingerprint: string, now: Date = new Date()): Promise<RateLimitResult> {
    const { maxSubmissions, windowMs } = this.config.rateLimit;
    const windowStart = new Date(now.getTime() - windowMs);

    const currentCount = await retryIdempotent('Count rate-limit events', () =>
      this.rateLimitRepository.countEvents({ fingerprint, after: windowStart }),
    );

    if (currentCount >= maxSubmissions) {
      const oldest = await retryIdempotent('Find oldest rate-limit event', () =>
        this.rateLimitRepository.oldestEventAfter(fingerprint, windowStart),
      );
      const resetAt = new Date((oldest ?? now).getTime() + windowMs);
      const retryAfterMs = Math.max(resetAt.getTime() - now.getTime(), 0);

      this.logger.warn(
        `Rate limit reached for ${fingerprint.slice(0, 12)}: ${currentCount}/${maxSubmissions}. Retry after ${Math.ceil(retryAfterMs / 1000)}s`,
      );

      return { allowed: false, remaining: 0, resetAt, retryAfterMs };
    }

    return {
      allowed: true,
      remaining: maxSubmissions - currentCount - 1,
      resetAt: new Date(now.getTime() + windowMs),
    };
  }

  /**
   * Delete events that fell out of the window. Returns the number removed.
   */
  async sweep(now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.config.rateLimit.windowMs);
    const deleted = await retryIdempotent('Sweep rate-limit events', () =>
      this.rateLimitRepository.deleteBefore(cutoff),
    );

    if (deleted > 0) {
      this.logger.log(`Removed ${deleted} expired rate-limit events`);
    }

    return deleted;
  }

  async stats(now: Date = new Date()): Promise<RateLimitStats> {
    const { maxSubmissions, windowMs } = this.config.rateLimit;
    const windowStart = new Date(now.getTime() - windowMs);
    const hourStart = new Date(now.getTime() - ONE_HOUR_MS);

    const [totalEvents, lastHour, lastWindow, expired] = await Promise.all([
      this.rateLimitRepository.countEvents({}),
      this.rateLimitRepository.countEvents({ after: hourStart }),
      this.rateLimitRepository.countEvents({ after: windowStart }),
      this.rateLimitRepository.countEvents({ before: windowStart }),
    ]);

    return {
      totalEvents,
      lastHour,
      lastWindow,
      expired,
      maxSubmissions,
      windowHours: windowMs / ONE_HOUR_MS,
    };
  }
}
