import {
  pgTable,
  pgEnum,
  serial,
  timestamp,
  text,
  varchar,
  boolean,
  index,
} from 'drizzle-orm/pg-core';
import { FEEDBACK_CATEGORIES } from '../../config/app.config';

// Admin triage state, independent of enrichment
export const WORKFLOW_STATUSES = ['new', 'read', 'in_progress', 'resolved', 'rejected'] as const;
export type WorkflowStatus = (typeof WORKFLOW_STATUSES)[number];
export const workflowStatusEnum = pgEnum('workflow_status', WORKFLOW_STATUSES);

// Only the enrichment worker moves this field
export const ENRICHMENT_STATUSES = ['pending', 'processing', 'done', 'failed'] as const;
export type EnrichmentStatus = (typeof ENRICHMENT_STATUSES)[number];
export const enrichmentStatusEnum = pgEnum('enrichment_status', ENRICHMENT_STATUSES);

export const feedbackCategoryEnum = pgEnum('feedback_category', FEEDBACK_CATEGORIES);

export const submissions = pgTable(
  'submissions',
  {
    id: serial('id').primaryKey(),

    // Reference code shown to the submitter
    code: varchar('code', { length: 32 }).notNull().unique(),

    category: feedbackCategoryEnum('category').notNull(),
    message: text('message').notNull(),
    photoPath: varchar('photo_path', { length: 255 }),

    status: workflowStatusEnum('status').default('new').notNull(),

    // Salted hash of the submitter address, never the address itself
    fingerprint: varchar('fingerprint', { length: 64 }).notNull(),
    userAgent: varchar('user_agent', { length: 500 }),

    enrichmentStatus: enrichmentStatusEnum('enrichment_status').default('pending').notNull(),
    detectedLanguage: varchar('detected_language', { length: 16 }),
    translationEn: text('translation_en'),
    translationRu: text('translation_ru'),
    summary: varchar('summary', { length: 150 }),
    // Comma-joined subset of the tag allow-list
    tags: text('tags'),

    privateNote: text('private_note'),
    isDeleted: boolean('is_deleted').default(false).notNull(),

    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    statusDeletedIdx: index('submissions_status_deleted_idx').on(table.status, table.isDeleted),
    categoryDeletedIdx: index('submissions_category_deleted_idx').on(
      table.category,
      table.isDeleted,
    ),
    enrichmentStatusIdx: index('submissions_enrichment_status_idx').on(table.enrichmentStatus),
    createdAtIdx: index('submissions_created_at_idx').on(table.createdAt),
  }),
);

export type Submission = typeof submissions.$inferSelect;
export type NewSubmission = typeof submissions.$inferInsert;
