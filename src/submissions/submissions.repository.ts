import type { FeedbackCategory } from '../config/app.config';
import type { Submission, WorkflowStatus } from '../drizzle/schema';

export interface SubmissionFilters {
  status?: WorkflowStatus;
  category?: FeedbackCategory;
  /** Case-insensitive substring of the tags field */
  tag?: string;
  /** Case-insensitive substring of message, translations, summary or code */
  search?: string;
}

export interface SubmissionPage {
  rows: Submission[];
  total: number;
}

export interface NewSubmissionInput {
  code: string;
  category: FeedbackCategory;
  message: string;
  photoPath: string | null;
  fingerprint: string;
  userAgent: string | null;
}

export interface EnrichmentFields {
  detectedLanguage: string;
  translationEn: string;
  translationRu: string;
  summary: string;
  tags: string[];
}

export interface StatusCount {
  status: WorkflowStatus;
  count: number;
}

export interface CategoryCount {
  category: FeedbackCategory;
  count: number;
}

export interface DailyCount {
  /** YYYY-MM-DD */
  day: string;
  count: number;
}

/**
 * Persistence boundary for submissions. Unless stated otherwise, reads and
 * mutations only see rows that are not soft-deleted.
 */
export abstract class SubmissionsRepository {
  abstract codeExists(code: string): Promise<boolean>;

  abstract findByCode(code: string): Promise<Submission | undefined>;

  /**
   * Stores the submission and its rate-limit event atomically: either both
   * rows are written or neither is.
   */
  abstract createWithRateLimitEvent(
    input: NewSubmissionInput,
    submittedAt: Date,
  ): Promise<Submission>;

  abstract findById(id: number, options?: { includeDeleted?: boolean }): Promise<Submission | undefined>;

  /** Newest first */
  abstract findPage(filters: SubmissionFilters, offset: number, limit: number): Promise<SubmissionPage>;

  /** Newest first */
  abstract listForExport(): Promise<Submission[]>;

  abstract countByStatus(): Promise<StatusCount[]>;

  abstract countByCategory(): Promise<CategoryCount[]>;

  /** Raw tags fields of rows with at least one tag */
  abstract listTagFields(): Promise<string[]>;

  abstract countByDay(since: Date): Promise<DailyCount[]>;

  /** Returns the number of rows updated */
  abstract updateWorkflowStatus(ids: number[], status: WorkflowStatus): Promise<number>;

  abstract updateNote(id: number, note: string): Promise<boolean>;

  abstract softDelete(id: number): Promise<boolean>;

  /**
   * Conditional pending -> processing transition. Returns the claimed row,
   * or undefined when the row is missing or not pending.
   */
  abstract claimForEnrichment(id: number): Promise<Submission | undefined>;

  /** processing -> done, writing the enrichment outputs */
  abstract completeEnrichment(id: number, fields: EnrichmentFields): Promise<boolean>;

  /** processing -> failed */
  abstract failEnrichment(id: number): Promise<boolean>;

  /** failed -> pending, for manual reprocessing */
  abstract resetFailedEnrichment(id: number): Promise<boolean>;
}
