import type { RateLimitEvent, Submission, User } from '../drizzle/schema';

type Table = 'submissions' | 'rateLimitEvents' | 'users';

/**
 * Tables shared by the in-memory repositories, so that an atomic
 * submission + rate-limit insert is visible to both.
 */
export class InMemoryStore {
  submissions: Submission[] = [];
  rateLimitEvents: RateLimitEvent[] = [];
  users: User[] = [];

  private sequences: Record<Table, number> = { submissions: 0, rateLimitEvents: 0, users: 0 };

  nextId(table: Table): number {
    this.sequences[table] += 1;
    return this.sequences[table];
  }

  seedSubmission(values: Partial<Submission> = {}): Submission {
    const id = values.id ?? this.nextId('submissions');
    const createdAt = values.createdAt ?? new Date('2025-01-15T10:00:00Z');
    const row: Submission = {
      id,
      code: `FB-${String(id).padStart(3, '0')}-00`,
      category: 'complaint',
      message: `Message ${id}`,
      photoPath: null,
      status: 'new',
      fingerprint: 'f'.repeat(64),
      userAgent: null,
      enrichmentStatus: 'pending',
      detectedLanguage: null,
      translationEn: null,
      translationRu: null,
      summary: null,
      tags: null,
      privateNote: null,
      isDeleted: false,
      createdAt,
      updatedAt: createdAt,
      ...values,
    };
    this.submissions.push(row);
    return row;
  }

  seedRateLimitEvent(fingerprint: string, submittedAt: Date): RateLimitEvent {
    const event = { id: this.nextId('rateLimitEvents'), fingerprint, submittedAt };
    this.rateLimitEvents.push(event);
    return event;
  }

  findSubmission(id: number): Submission | undefined {
    return this.submissions.find((row) => row.id === id);
  }
}
