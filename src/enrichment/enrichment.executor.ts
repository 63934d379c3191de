import { BeforeApplicationShutdown, Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { EnrichmentService } from './enrichment.service';

/**
 * Runs enrichment in the background with bounded concurrency:
 * - Up to `ENRICHMENT_CONCURRENCY` submissions at once, the rest wait FIFO
 * - A submission already queued or running is not queued again
 */
@Injectable()
export class EnrichmentExecutor implements BeforeApplicationShutdown {
  private readonly logger = new Logger(EnrichmentExecutor.name);
  private readonly maxConcurrent: number;
  private readonly queue: number[] = [];
  // Queued or running
  private readonly scheduled = new Set<number>();
  private idleWaiters: Array<() => void> = [];
  private totalActive = 0;
  private accepting = true;

  constructor(
    @Inject(APP_CONFIG) config: AppConfig,
    private readonly enrichmentService: EnrichmentService,
  ) {
    this.maxConcurrent = config.enrichment.concurrency;
  }

  /**
   * Fire-and-forget. Returns false when the submission was not scheduled.
   */
  dispatch(submissionId: number): boolean {
    if (!this.accepting) {
      this.logger.warn(`Submission ${submissionId}: executor is shutting down, not scheduled`);
      return false;
    }

    if (this.scheduled.has(submissionId)) {
      this.logger.debug(`Submission ${submissionId}: already scheduled`);
      return false;
    }

    this.scheduled.add(submissionId);

    if (this.totalActive >= this.maxConcurrent) {
      this.queue.push(submissionId);
      this.logger.debug(
        `Submission ${submissionId}: queued (position ${this.queue.length}, active ${this.totalActive})`,
      );
      return true;
    }

    this.execute(submissionId);
    return true;
  }

  /**
   * Resolves once nothing is queued or running
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async beforeApplicationShutdown() {
    this.accepting = false;

    if (!this.isIdle()) {
      this.logger.log(
        `Waiting for ${this.totalActive} running and ${this.queue.length} queued enrichments`,
      );
    }
    await this.onIdle();
  }

  private isIdle(): boolean {
    return this.totalActive === 0 && this.queue.length === 0;
  }

  private execute(submissionId: number): void {
    this.totalActive++;

    void this.enrichmentService
      .enrich(submissionId)
      .then((outcome) => {
        this.logger.debug(`Submission ${submissionId}: enrichment ${outcome}`);
      })
      .catch((error: unknown) => {
        this.logger.error(
          `Submission ${submissionId}: enrichment task error`,
          error instanceof Error ? error.stack : String(error),
        );
      })
      .finally(() => {
        this.scheduled.delete(submissionId);
        this.totalActive--;
        this.processNext();
      });
  }

  private processNext(): void {
    while (this.queue.length > 0 && this.totalActive < this.maxConcurrent) {
      const next = this.queue.shift();
      if (next !== undefined) {
        this.execute(next);
      }
    }

    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }
}
