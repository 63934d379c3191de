import type { FeedbackCategory } from '../config/app.config';
import type { Submission, WorkflowStatus } from '../drizzle/schema';
import {
  CategoryCount,
  DailyCount,
  EnrichmentFields,
  NewSubmissionInput,
  StatusCount,
  SubmissionFilters,
  SubmissionPage,
  SubmissionsRepository,
} from '../submissions/submissions.repository';
import { InMemoryStore } from './in-memory-store';

function containsIgnoreCase(value: string | null, needle: string): boolean {
  return (value ?? '').toLowerCase().includes(needle.toLowerCase());
}

// Same day bucket as to_char(created_at, 'YYYY-MM-DD') on a UTC server
function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function newestFirst(a: Submission, b: Submission): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

function countBy<K extends string>(keys: K[]): Array<{ key: K; count: number }> {
  const counts = new Map<K, number>();
  keys.forEach((key) => counts.set(key, (counts.get(key) ?? 0) + 1));
  return [...counts.entries()]
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count);
}

export class InMemorySubmissionsRepository extends SubmissionsRepository {
  /** When set, the next insert fails with this error */
  insertError: Error | null = null;

  constructor(readonly store: InMemoryStore = new InMemoryStore()) {
    super();
  }

  private live(): Submission[] {
    return this.store.submissions.filter((row) => !row.isDeleted);
  }

  private update(id: number, changes: Partial<Submission>): Submission {
    const index = this.store.submissions.findIndex((row) => row.id === id);
    const updated = { ...this.store.submissions[index], ...changes };
    this.store.submissions[index] = updated;
    return updated;
  }

  async codeExists(code: string): Promise<boolean> {
    return this.store.submissions.some((row) => row.code === code);
  }

  async findByCode(code: string): Promise<Submission | undefined> {
    return this.store.submissions.find((row) => row.code === code);
  }

  async createWithRateLimitEvent(input: NewSubmissionInput, submittedAt: Date): Promise<Submission> {
    if (this.insertError) {
      const error = this.insertError;
      this.insertError = null;
      throw error;
    }

    const row = this.store.seedSubmission({ ...input, createdAt: submittedAt, updatedAt: submittedAt });
    this.store.seedRateLimitEvent(input.fingerprint, submittedAt);
    return row;
  }

  async findById(id: number, options: { includeDeleted?: boolean } = {}): Promise<Submission | undefined> {
    const row = this.store.findSubmission(id);
    return row && (options.includeDeleted || !row.isDeleted) ? row : undefined;
  }

  async findPage(filters: SubmissionFilters, offset: number, limit: number): Promise<SubmissionPage> {
    const matching = this.live()
      .filter((row) => !filters.status || row.status === filters.status)
      .filter((row) => !filters.category || row.category === filters.category)
      .filter((row) => !filters.tag || containsIgnoreCase(row.tags, filters.tag))
      .filter((row) => {
        const search = filters.search;
        if (!search) {
          return true;
        }
        return [row.message, row.translationEn, row.translationRu, row.summary, row.code].some(
          (field) => containsIgnoreCase(field, search),
        );
      })
      .sort(newestFirst);

    return { rows: matching.slice(offset, offset + limit), total: matching.length };
  }

  async listForExport(): Promise<Submission[]> {
    return this.live().sort(newestFirst);
  }

  async countByStatus(): Promise<StatusCount[]> {
    return countBy<WorkflowStatus>(this.live().map((row) => row.status)).map(({ key, count }) => ({
      status: key,
      count,
    }));
  }

  async countByCategory(): Promise<CategoryCount[]> {
    return countBy<FeedbackCategory>(this.live().map((row) => row.category)).map(
      ({ key, count }) => ({ category: key, count }),
    );
  }

  async listTagFields(): Promise<string[]> {
    return this.live().flatMap((row) => (row.tags ? [row.tags] : []));
  }

  async countByDay(since: Date): Promise<DailyCount[]> {
    const days = this.live()
      .filter((row) => row.createdAt.getTime() >= since.getTime())
      .map((row) => utcDay(row.createdAt));

    return countBy(days)
      .map(({ key, count }) => ({ day: key, count }))
      .sort((a, b) => a.day.localeCompare(b.day));
  }

  async updateWorkflowStatus(ids: number[], status: WorkflowStatus): Promise<number> {
    const targets = this.live().filter((row) => ids.includes(row.id));
    targets.forEach((row) => this.update(row.id, { status, updatedAt: new Date() }));
    return targets.length;
  }

  async updateNote(id: number, note: string): Promise<boolean> {
    if (!(await this.findById(id))) {
      return false;
    }
    this.update(id, { privateNote: note, updatedAt: new Date() });
    return true;
  }

  async softDelete(id: number): Promise<boolean> {
    if (!(await this.findById(id))) {
      return false;
    }
    this.update(id, { isDeleted: true, updatedAt: new Date() });
    return true;
  }

  async claimForEnrichment(id: number): Promise<Submission | undefined> {
    const row = this.store.findSubmission(id);
    if (!row || row.enrichmentStatus !== 'pending') {
      return undefined;
    }
    return this.update(id, { enrichmentStatus: 'processing' });
  }

  async completeEnrichment(id: number, fields: EnrichmentFields): Promise<boolean> {
    const row = this.store.findSubmission(id);
    if (!row || row.enrichmentStatus !== 'processing') {
      return false;
    }
    this.update(id, {
      enrichmentStatus: 'done',
      detectedLanguage: fields.detectedLanguage,
      translationEn: fields.translationEn,
      translationRu: fields.translationRu,
      summary: fields.summary,
      tags: fields.tags.join(','),
    });
    return true;
  }

  async failEnrichment(id: number): Promise<boolean> {
    const row = this.store.findSubmission(id);
    if (!row || row.enrichmentStatus !== 'processing') {
      return false;
    }
    this.update(id, { enrichmentStatus: 'failed' });
    return true;
  }

  async resetFailedEnrichment(id: number): Promise<boolean> {
    const row = await this.findById(id);
    if (!row || row.enrichmentStatus !== 'failed') {
      return false;
    }
    this.update(id, { enrichmentStatus: 'pending', updatedAt: new Date() });
    return true;
  }
}
