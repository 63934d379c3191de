import { pgTable, serial, timestamp, varchar, index } from 'drizzle-orm/pg-core';

// Append-only admission events; removed only by the age-based sweep
export const rateLimitEvents = pgTable(
  'rate_limit_events',
  {
    id: serial('id').primaryKey(),
    fingerprint: varchar('fingerprint', { length: 64 }).notNull(),
    submittedAt: timestamp('submitted_at').defaultNow().notNull(),
  },
  (table) => ({
    fingerprintTimeIdx: index('rate_limit_events_fingerprint_time_idx').on(
      table.fingerprint,
      table.submittedAt,
    ),
    submittedAtIdx: index('rate_limit_events_submitted_at_idx').on(table.submittedAt),
  }),
);

export type RateLimitEvent = typeof rateLimitEvents.$inferSelect;
export type NewRateLimitEvent = typeof rateLimitEvents.$inferInsert;
