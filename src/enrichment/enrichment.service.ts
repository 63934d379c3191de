import { Injectable, Logger } from '@nestjs/common';
import { toClassificationError } from '../ai/classification.error';
import { FeedbackClassification, GroqService } from '../ai/groq.service';
import { describeError, isTransientDbError, retryIdempotent } from '../drizzle/db-utils';
import type { Submission } from '../drizzle/schema';
import { SubmissionsRepository } from '../submissions/submissions.repository';
import { HeuristicClassifierService } from './heuristic-classifier.service';

export type EnrichmentOutcome = 'done' | 'failed' | 'skipped';

const EMPTY_CLASSIFICATION: FeedbackClassification = {
  detectedLanguage: 'unknown',
  translationEn: '',
  translationRu: '',
  summary: '',
  tags: [],
};

// Remote failures that are usually transient only warrant a warning
const TRANSIENT_REASONS = new Set(['rate_limited', 'timeout', 'connection_error']);

/**
 * Enriches one submission: remote classifier first, local heuristics as
 * fallback. Moves enrichmentStatus pending -> processing -> done | failed.
 */
@Injectable()
export class EnrichmentService {
  private readonly logger = new Logger(EnrichmentService.name);

  constructor(
    private readonly submissionsRepository: SubmissionsRepository,
    private readonly groqService: GroqService,
    private readonly heuristicClassifier: HeuristicClassifierService,
  ) {}

  async enrich(submissionId: number): Promise<EnrichmentOutcome> {
    const claimed = await this.claim(submissionId);

    if (!claimed) {
      const existing = await this.load(submissionId);

      if (!existing) {
        this.logger.warn(`Submission ${submissionId}: not found, skipping enrichment`);
      } else {
        this.logger.log(
          `Submission ${submissionId}: enrichment is ${existing.enrichmentStatus}, skipping`,
        );
      }
      return 'skipped';
    }

    this.logger.log(`Submission ${submissionId}: processing`);

    try {
      return await this.process(claimed);
    } catch (error) {
      this.logger.error(
        `Submission ${submissionId}: enrichment failed unexpectedly`,
        error instanceof Error ? error.stack : String(error),
      );
      await this.markFailed(submissionId);
      return 'failed';
    }
  }

  /**
   * pending -> processing. The claim is not retried as such: when its outcome
   * is unknown, the row is read back. A row already in processing is ours,
   * since the executor never runs two enrichments of one submission at once.
   */
  private async claim(id: number): Promise<Submission | undefined> {
    try {
      return await this.submissionsRepository.claimForEnrichment(id);
    } catch (error) {
      if (!isTransientDbError(error)) {
        throw error;
      }

      this.logger.warn(`Submission ${id}: claim outcome unknown (${describeError(error)}), reading back`);
      const current = await this.load(id);

      if (current?.enrichmentStatus === 'processing') {
        return current;
      }
      if (current?.enrichmentStatus === 'pending') {
        return this.submissionsRepository.claimForEnrichment(id);
      }
      return undefined;
    }
  }

  private load(id: number): Promise<Submission | undefined> {
    return retryIdempotent(`Load submission ${id}`, () =>
      this.submissionsRepository.findById(id, { includeDeleted: true }),
    );
  }

  private async process(submission: Submission): Promise<EnrichmentOutcome> {
    const { id, message } = submission;

    if (!message.trim()) {
      this.logger.warn(`Submission ${id}: empty message, nothing to enrich`);
      return this.complete(id, EMPTY_CLASSIFICATION, 'empty');
    }

    const remote = await this.classifyRemotely(id, message);
    if (remote) {
      return this.complete(id, remote, 'groq');
    }

    let local: FeedbackClassification;
    try {
      local = this.heuristicClassifier.classify(message);
    } catch (error) {
      this.logger.error(
        `Submission ${id}: heuristic enrichment failed`,
        error instanceof Error ? error.stack : String(error),
      );
      await this.markFailed(id);
      return 'failed';
    }

    return this.complete(id, local, 'heuristics');
  }

  /**
   * Null when the remote classifier is not configured or fails
   */
  private async classifyRemotely(
    id: number,
    message: string,
  ): Promise<FeedbackClassification | null> {
    if (!this.groqService.isReady()) {
      this.logger.debug(`Submission ${id}: remote classifier not configured, using heuristics`);
      return null;
    }

    try {
      return await this.groqService.classifyFeedback(message);
    } catch (error) {
      const failure = toClassificationError(error);
      const line = `Submission ${id}: remote classification failed [${failure.reason}] ${failure.message}; falling back to heuristics`;

      if (TRANSIENT_REASONS.has(failure.reason)) {
        this.logger.warn(line);
      } else {
        this.logger.error(line);
      }
      return null;
    }
  }

  private async complete(
    id: number,
    classification: FeedbackClassification,
    source: string,
  ): Promise<EnrichmentOutcome> {
    const updated = await retryIdempotent(`Complete enrichment of ${id}`, () =>
      this.submissionsRepository.completeEnrichment(id, classification),
    );

    if (!updated) {
      this.logger.warn(`Submission ${id}: no longer processing, result discarded`);
      return 'skipped';
    }

    this.logger.log(
      `Submission ${id}: done via ${source} (language=${classification.detectedLanguage}, tags=${classification.tags.join(',') || '-'})`,
    );
    return 'done';
  }

  private async markFailed(id: number): Promise<void> {
    try {
      await retryIdempotent(`Fail enrichment of ${id}`, () =>
        this.submissionsRepository.failEnrichment(id),
      );
      this.logger.warn(`Submission ${id}: marked failed`);
    } catch (error) {
      this.logger.error(
        `Submission ${id}: could not mark failed`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
