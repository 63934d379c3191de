import { Injectable, Logger } from '@nestjs/common';
import { toCsv } from '../common/utils/csv.util';
import { compactUtcTimestamp } from '../common/utils/date.util';
import { splitTags } from '../submissions/submission.view';
import {
  CategoryCount,
  DailyCount,
  StatusCount,
  SubmissionsRepository,
} from '../submissions/submissions.repository';

export const EXPORT_COLUMNS = [
  'Submission ID',
  'Category',
  'Message',
  'Status',
  'Language',
  'Translation EN',
  'Translation RU',
  'Summary',
  'Tags',
  'Private Note',
  'AI Status',
  'Created At',
  'Updated At',
] as const;

// Lets spreadsheet applications detect UTF-8
const UTF8_BOM = '\uFEFF';

const ANALYTICS_DAYS = 30;

export interface TagCount {
  tag: string;
  count: number;
}

export interface AnalyticsReport {
  byCategory: CategoryCount[];
  byStatus: StatusCount[];
  byTag: TagCount[];
  daily: DailyCount[];
}

export interface CsvExport {
  fileName: string;
  content: Buffer;
}

/**
 * Tag frequencies over comma-joined tag fields, most frequent first
 */
export function countTags(tagFields: readonly string[]): TagCount[] {
  const counts = new Map<string, number>();
  for (const field of tagFields) {
    for (const tag of splitTags(field)) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .map(([tag, count]) => ({ tag, count }))
    .sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag));
}

@Injectable()
export class AdminService {
  private readonly logger = new Logger(AdminService.name);

  constructor(private readonly submissionsRepository: SubmissionsRepository) {}

  // ==========================================================================
  // Export
  // ==========================================================================

  async exportCsv(now: Date = new Date()): Promise<CsvExport> {
    const rows = await this.submissionsRepository.listForExport();

    const csv = toCsv(
      EXPORT_COLUMNS,
      rows.map((row) => [
        row.code,
        row.category,
        row.message,
        row.status,
        row.detectedLanguage,
        row.translationEn,
        row.translationRu,
        row.summary,
        row.tags,
        row.privateNote,
        row.enrichmentStatus,
        row.createdAt,
        row.updatedAt,
      ]),
    );

    this.logger.log(`Exported ${rows.length} submissions`);

    return {
      fileName: `feedback_export_${compactUtcTimestamp(now)}.csv`,
      content: Buffer.from(UTF8_BOM + csv, 'utf8'),
    };
  }

  // ==========================================================================
  // Analytics
  // ==========================================================================

  async getAnalytics(now: Date = new Date()): Promise<AnalyticsReport> {
    const since = new Date(now.getTime() - ANALYTICS_DAYS * 24 * 60 * 60 * 1000);

    const [byCategory, byStatus, tagFields, daily] = await Promise.all([
      this.submissionsRepository.countByCategory(),
      this.submissionsRepository.countByStatus(),
      this.submissionsRepository.listTagFields(),
      this.submissionsRepository.countByDay(since),
    ]);

    return { byCategory, byStatus, byTag: countTags(tagFields), daily };
  }
}
