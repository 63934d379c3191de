import { RateLimitEventQuery, RateLimitRepository } from '../rate-limit/rate-limit.repository';
import { InMemoryStore } from './in-memory-store';

export class InMemoryRateLimitRepository extends RateLimitRepository {
  constructor(readonly store: InMemoryStore = new InMemoryStore()) {
    super();
  }

  async countEvents(query: RateLimitEventQuery): Promise<number> {
    return this.store.rateLimitEvents.filter(
      (event) =>
        (query.fingerprint === undefined || event.fingerprint === query.fingerprint) &&
        (!query.after || event.submittedAt.getTime() > query.after.getTime()) &&
        (!query.before || event.submittedAt.getTime() < query.before.getTime()),
    ).length;
  }

  async oldestEventAfter(fingerprint: string, after: Date): Promise<Date | undefined> {
    const times = this.store.rateLimitEvents
      .filter((event) => event.fingerprint === fingerprint && event.submittedAt.getTime() > after.getTime())
      .map((event) => event.submittedAt.getTime());

    return times.length > 0 ? new Date(Math.min(...times)) : undefined;
  }

  async deleteBefore(cutoff: Date): Promise<number> {
    const before = this.store.rateLimitEvents.length;
    this.store.rateLimitEvents = this.store.rateLimitEvents.filter(
      (event) => event.submittedAt.getTime() >= cutoff.getTime(),
    );
    return before - this.store.rateLimitEvents.length;
  }
}
