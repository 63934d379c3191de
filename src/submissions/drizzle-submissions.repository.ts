import { Inject, Injectable } from '@nestjs/common';
import { and, count, desc, eq, gte, ilike, inArray, isNotNull, ne, or, sql, SQL } from 'drizzle-orm';
import type { DbType } from '../drizzle/db';
import { DRIZZLE } from '../drizzle/drizzle.module';
import { rateLimitEvents, Submission, submissions, WorkflowStatus } from '../drizzle/schema';
import {
  CategoryCount,
  DailyCount,
  EnrichmentFields,
  NewSubmissionInput,
  StatusCount,
  SubmissionFilters,
  SubmissionPage,
  SubmissionsRepository,
} from './submissions.repository';

/**
 * Escape LIKE wildcards so user input only ever matches literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Conjunctive WHERE clause over non-deleted rows; every filter is optional
 */
export function buildSubmissionFilter(filters: SubmissionFilters): SQL | undefined {
  const conditions: SQL[] = [eq(submissions.isDeleted, false)];

  if (filters.status) {
    conditions.push(eq(submissions.status, filters.status));
  }
  if (filters.category) {
    conditions.push(eq(submissions.category, filters.category));
  }
  if (filters.tag) {
    conditions.push(ilike(submissions.tags, `%${escapeLikePattern(filters.tag)}%`));
  }
  if (filters.search) {
    const pattern = `%${escapeLikePattern(filters.search)}%`;
    const searchCondition = or(
      ilike(submissions.message, pattern),
      ilike(submissions.translationEn, pattern),
      ilike(submissions.translationRu, pattern),
      ilike(submissions.summary, pattern),
      ilike(submissions.code, pattern),
    );
    if (searchCondition) {
      conditions.push(searchCondition);
    }
  }

  return and(...conditions);
}

const notDeleted = eq(submissions.isDeleted, false);

@Injectable()
export class DrizzleSubmissionsRepository extends SubmissionsRepository {
  constructor(@Inject(DRIZZLE) private readonly db: DbType) {
    super();
  }

  async codeExists(code: string): Promise<boolean> {
    const existing = await this.db.query.submissions.findFirst({
      where: eq(submissions.code, code),
      columns: { id: true },
    });

    return existing !== undefined;
  }

  async findByCode(code: string): Promise<Submission | undefined> {
    return this.db.query.submissions.findFirst({
      where: eq(submissions.code, code),
    });
  }

  async createWithRateLimitEvent(input: NewSubmissionInput, submittedAt: Date): Promise<Submission> {
    // neon-http runs a batch as a single transaction
    const [inserted] = await this.db.batch([
      this.db
        .insert(submissions)
        .values({ ...input, createdAt: submittedAt, updatedAt: submittedAt })
        .returning(),
      this.db.insert(rateLimitEvents).values({ fingerprint: input.fingerprint, submittedAt }),
    ]);

    const [created] = inserted;
    if (!created) {
      throw new Error(`Insert of submission ${input.code} returned no row`);
    }

    return created;
  }

  async findById(
    id: number,
    options: { includeDeleted?: boolean } = {},
  ): Promise<Submission | undefined> {
    return this.db.query.submissions.findFirst({
      where: options.includeDeleted ? eq(submissions.id, id) : and(eq(submissions.id, id), notDeleted),
    });
  }

  async findPage(filters: SubmissionFilters, offset: number, limit: number): Promise<SubmissionPage> {
    const where = buildSubmissionFilter(filters);

    const [rows, [{ total }]] = await Promise.all([
      this.db
        .select()
        .from(submissions)
        .where(where)
        .orderBy(desc(submissions.createdAt), desc(submissions.id))
        .limit(limit)
        .offset(offset),
      this.db.select({ total: count() }).from(submissions).where(where),
    ]);

    return { rows, total: Number(total) };
  }

  async listForExport(): Promise<Submission[]> {
    return this.db
      .select()
      .from(submissions)
      .where(notDeleted)
      .orderBy(desc(submissions.createdAt), desc(submissions.id));
  }

  async countByStatus(): Promise<StatusCount[]> {
    const rows = await this.db
      .select({ status: submissions.status, count: count() })
      .from(submissions)
      .where(notDeleted)
      .groupBy(submissions.status)
      .orderBy(desc(count()));

    return rows.map((row) => ({ status: row.status, count: Number(row.count) }));
  }

  async countByCategory(): Promise<CategoryCount[]> {
    const rows = await this.db
      .select({ category: submissions.category, count: count() })
      .from(submissions)
      .where(notDeleted)
      .groupBy(submissions.category)
      .orderBy(desc(count()));

    return rows.map((row) => ({ category: row.category, count: Number(row.count) }));
  }

  async listTagFields(): Promise<string[]> {
    const rows = await this.db
      .select({ tags: submissions.tags })
      .from(submissions)
      .where(and(notDeleted, isNotNull(submissions.tags), ne(submissions.tags, '')));

    return rows.flatMap((row) => (row.tags ? [row.tags] : []));
  }

  async countByDay(since: Date): Promise<DailyCount[]> {
    const day = sql<string>`to_char(${submissions.createdAt}, 'YYYY-MM-DD')`;

    const rows = await this.db
      .select({ day, count: count() })
      .from(submissions)
      .where(and(notDeleted, gte(submissions.createdAt, since)))
      .groupBy(day)
      .orderBy(day);

    return rows.map((row) => ({ day: row.day, count: Number(row.count) }));
  }

  async updateWorkflowStatus(ids: number[], status: WorkflowStatus): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }

    const updated = await this.db
      .update(submissions)
      .set({ status, updatedAt: new Date() })
      .where(and(inArray(submissions.id, ids), notDeleted))
      .returning({ id: submissions.id });

    return updated.length;
  }

  async updateNote(id: number, note: string): Promise<boolean> {
    const updated = await this.db
      .update(submissions)
      .set({ privateNote: note, updatedAt: new Date() })
      .where(and(eq(submissions.id, id), notDeleted))
      .returning({ id: submissions.id });

    return updated.length > 0;
  }

  async softDelete(id: number): Promise<boolean> {
    const updated = await this.db
      .update(submissions)
      .set({ isDeleted: true, updatedAt: new Date() })
      .where(and(eq(submissions.id, id), notDeleted))
      .returning({ id: submissions.id });

    return updated.length > 0;
  }

  async claimForEnrichment(id: number): Promise<Submission | undefined> {
    const [claimed] = await this.db
      .update(submissions)
      .set({ enrichmentStatus: 'processing' })
      .where(and(eq(submissions.id, id), eq(submissions.enrichmentStatus, 'pending')))
      .returning();

    return claimed;
  }

  async completeEnrichment(id: number, fields: EnrichmentFields): Promise<boolean> {
    const updated = await this.db
      .update(submissions)
      .set({
        enrichmentStatus: 'done',
        detectedLanguage: fields.detectedLanguage,
        translationEn: fields.translationEn,
        translationRu: fields.translationRu,
        summary: fields.summary,
        tags: fields.tags.join(','),
      })
      .where(and(eq(submissions.id, id), eq(submissions.enrichmentStatus, 'processing')))
      .returning({ id: submissions.id });

    return updated.length > 0;
  }

  async failEnrichment(id: number): Promise<boolean> {
    const updated = await this.db
      .update(submissions)
      .set({ enrichmentStatus: 'failed' })
      .where(and(eq(submissions.id, id), eq(submissions.enrichmentStatus, 'processing')))
      .returning({ id: submissions.id });

    return updated.length > 0;
  }

  async resetFailedEnrichment(id: number): Promise<boolean> {
    const updated = await this.db
      .update(submissions)
      .set({ enrichmentStatus: 'pending', updatedAt: new Date() })
      .where(
        and(eq(submissions.id, id), notDeleted, eq(submissions.enrichmentStatus, 'failed')),
      )
      .returning({ id: submissions.id });

    return updated.length > 0;
  }
}
