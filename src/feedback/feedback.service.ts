import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import type { WorkflowStatus } from '../drizzle/schema';
import { EnrichmentExecutor } from '../enrichment/enrichment.executor';
import { PhotoStorageService, StoredPhoto } from '../submissions/photo-storage.service';
import { SubmissionView, toSubmissionView } from '../submissions/submission.view';
import { SubmissionsRepository } from '../submissions/submissions.repository';
import { BulkStatusRequest } from './bulk-status';
import { DEFAULT_PER_PAGE, InboxQueryDto } from './dto';

export type InboxStats = { total: number } & Record<WorkflowStatus, number>;

export interface InboxPage {
  data: SubmissionView[];
  pagination: {
    page: number;
    perPage: number;
    total: number;
    totalPages: number;
  };
  stats: InboxStats;
}

@Injectable()
export class FeedbackService {
  private readonly logger = new Logger(FeedbackService.name);

  constructor(
    private readonly submissionsRepository: SubmissionsRepository,
    private readonly photoStorage: PhotoStorageService,
    private readonly enrichmentExecutor: EnrichmentExecutor,
  ) {}

  async findInbox(query: InboxQueryDto): Promise<InboxPage> {
    const page = query.page ?? 1;
    const perPage = query.perPage ?? DEFAULT_PER_PAGE;
    const offset = (page - 1) * perPage;

    const [{ rows, total }, stats] = await Promise.all([
      this.submissionsRepository.findPage(
        {
          status: query.status,
          category: query.category,
          tag: query.tag?.trim(),
          search: query.search?.trim(),
        },
        offset,
        perPage,
      ),
      this.getStats(),
    ]);

    return {
      data: rows.map(toSubmissionView),
      pagination: {
        page,
        perPage,
        total,
        totalPages: Math.max(1, Math.ceil(total / perPage)),
      },
      stats,
    };
  }

  /**
   * Counts per workflow status over non-deleted rows
   */
  async getStats(): Promise<InboxStats> {
    const counts = await this.submissionsRepository.countByStatus();

    const stats: InboxStats = {
      total: 0,
      new: 0,
      read: 0,
      in_progress: 0,
      resolved: 0,
      rejected: 0,
    };
    for (const { status, count } of counts) {
      stats[status] = count;
      stats.total += count;
    }

    return stats;
  }

  /**
   * Opening a new submission marks it as read
   */
  async findOne(id: number): Promise<SubmissionView> {
    const submission = await this.submissionsRepository.findById(id);

    if (!submission) {
      throw new NotFoundException('Feedback not found');
    }

    if (submission.status === 'new') {
      await this.submissionsRepository.updateWorkflowStatus([id], 'read');
      const refreshed = await this.submissionsRepository.findById(id);
      return toSubmissionView(refreshed ?? { ...submission, status: 'read' });
    }

    return toSubmissionView(submission);
  }

  async findPhoto(id: number): Promise<StoredPhoto> {
    const submission = await this.submissionsRepository.findById(id);

    if (!submission?.photoPath) {
      throw new NotFoundException('Photo not found');
    }

    const photo = await this.photoStorage.locate(submission.photoPath);
    if (!photo) {
      this.logger.warn(`Submission ${id}: photo ${submission.photoPath} is missing on disk`);
      throw new NotFoundException('Photo not found');
    }

    return photo;
  }

  async updateStatus(id: number, status: WorkflowStatus): Promise<void> {
    const updated = await this.submissionsRepository.updateWorkflowStatus([id], status);

    if (updated === 0) {
      throw new NotFoundException('Feedback not found');
    }
  }

  async bulkUpdateStatus({ ids, status }: BulkStatusRequest): Promise<number> {
    const count = await this.submissionsRepository.updateWorkflowStatus(ids, status);
    this.logger.log(`Bulk status ${status}: ${count} of ${ids.length} submissions updated`);
    return count;
  }

  async updateNote(id: number, note: string): Promise<void> {
    const updated = await this.submissionsRepository.updateNote(id, note);

    if (!updated) {
      throw new NotFoundException('Feedback not found');
    }
  }

  async softDelete(id: number, actingUserId: number): Promise<void> {
    const deleted = await this.submissionsRepository.softDelete(id);

    if (!deleted) {
      throw new NotFoundException('Feedback not found');
    }

    this.logger.log(`Submission ${id} deleted by user ${actingUserId}`);
  }

  /**
   * Send a failed enrichment back through the worker
   */
  async reprocess(id: number): Promise<void> {
    const reset = await this.submissionsRepository.resetFailedEnrichment(id);

    if (!reset) {
      const submission = await this.submissionsRepository.findById(id);
      if (!submission) {
        throw new NotFoundException('Feedback not found');
      }
      throw new ConflictException(
        `Only failed enrichments can be reprocessed (current: ${submission.enrichmentStatus})`,
      );
    }

    this.logger.log(`Submission ${id}: enrichment reset for reprocessing`);
    this.enrichmentExecutor.dispatch(id);
  }
}
