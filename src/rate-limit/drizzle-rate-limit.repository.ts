import { Inject, Injectable } from '@nestjs/common';
import { and, asc, count, eq, gt, lt, SQL } from 'drizzle-orm';
import type { DbType } from '../drizzle/db';
import { DRIZZLE } from '../drizzle/drizzle.module';
import { rateLimitEvents } from '../drizzle/schema';
import { RateLimitEventQuery, RateLimitRepository } from './rate-limit.repository';

@Injectable()
export class DrizzleRateLimitRepository extends RateLimitRepository {
  constructor(@Inject(DRIZZLE) private readonly db: DbType) {
    super();
  }

  async countEvents(query: RateLimitEventQuery): Promise<number> {
    const conditions: SQL[] = [];
    if (query.fingerprint !== undefined) {
      conditions.push(eq(rateLimitEvents.fingerprint, query.fingerprint));
    }
    if (query.after) {
      conditions.push(gt(rateLimitEvents.submittedAt, query.after));
    }
    if (query.before) {
      conditions.push(lt(rateLimitEvents.submittedAt, query.before));
    }

    const [{ total }] = await this.db
      .select({ total: count() })
      .from(rateLimitEvents)
      .where(conditions.length > 0 ? and(...conditions) : undefined);

    return Number(total);
  }

  async oldestEventAfter(fingerprint: string, after: Date): Promise<Date | undefined> {
    const [oldest] = await this.db
      .select({ submittedAt: rateLimitEvents.submittedAt })
      .from(rateLimitEvents)
      .where(and(eq(rateLimitEvents.fingerprint, fingerprint), gt(rateLimitEvents.submittedAt, after)))
      .orderBy(asc(rateLimitEvents.submittedAt))
      .limit(1);

    return oldest?.submittedAt;
  }

  async deleteBefore(cutoff: Date): Promise<number> {
    const deleted = await this.db
      .delete(rateLimitEvents)
      .where(lt(rateLimitEvents.submittedAt, cutoff))
      .returning({ id: rateLimitEvents.id });

    return deleted.length;
  }
}
