export interface RateLimitEventQuery {
  fingerprint?: string;
  /** Exclusive lower bound on submittedAt */
  after?: Date;
  /** Exclusive upper bound on submittedAt */
  before?: Date;
}

/**
 * Read/sweep access to rate-limit events. Events are only ever written
 * together with a submission (see SubmissionsRepository).
 */
export abstract class RateLimitRepository {
  abstract countEvents(query: RateLimitEventQuery): Promise<number>;

  abstract oldestEventAfter(fingerprint: string, after: Date): Promise<Date | undefined>;

  /** Returns the number of deleted events */
  abstract deleteBefore(cutoff: Date): Promise<number>;
}
