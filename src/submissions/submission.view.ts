import type { FeedbackCategory } from '../config/app.config';
import type { Submission, WorkflowStatus } from '../drizzle/schema';

/**
 * Enrichment outputs only exist once enrichment is done
 */
export type EnrichmentView =
  | {
      status: 'done';
      language: string;
      translationEn: string;
      translationRu: string;
      summary: string;
      tags: string[];
    }
  | { status: 'pending' | 'processing' | 'failed' };

export interface SubmissionView {
  id: number;
  code: string;
  category: FeedbackCategory;
  message: string;
  photoUrl: string | null;
  status: WorkflowStatus;
  privateNote: string | null;
  enrichment: EnrichmentView;
  createdAt: Date;
  updatedAt: Date;
}

export function splitTags(tags: string | null): string[] {
  if (!tags) {
    return [];
  }
  return tags
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export function toEnrichmentView(row: Submission): EnrichmentView {
  if (row.enrichmentStatus !== 'done') {
    return { status: row.enrichmentStatus };
  }

  return {
    status: 'done',
    language: row.detectedLanguage ?? 'unknown',
    translationEn: row.translationEn ?? '',
    translationRu: row.translationRu ?? '',
    summary: row.summary ?? '',
    tags: splitTags(row.tags),
  };
}

export function toSubmissionView(row: Submission): SubmissionView {
  return {
    id: row.id,
    code: row.code,
    category: row.category,
    message: row.message,
    photoUrl: row.photoPath ? `/admin/feedback/${row.id}/photo` : null,
    status: row.status,
    privateNote: row.privateNote,
    enrichment: toEnrichmentView(row),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}
