import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { RateLimiterService } from './rate-limiter.service';

/**
 * Scheduled removal of rate-limit events older than the window.
 * Runs once when the application starts and then every hour.
 */
@Injectable()
export class RateLimitCleanupService implements OnApplicationBootstrap {
  private readonly logger = new Logger(RateLimitCleanupService.name);

  constructor(private readonly rateLimiterService: RateLimiterService) {}

  async onApplicationBootstrap() {
    await this.handleSweep();
  }

  @Cron(CronExpression.EVERY_HOUR)
  async handleSweep(): Promise<number> {
    try {
      const deleted = await this.rateLimiterService.sweep();
      this.logger.debug(`Rate-limit sweep completed, ${deleted} events deleted`);
      return deleted;
    } catch (error) {
      this.logger.error(
        'Rate-limit sweep failed',
        error instanceof Error ? error.stack : String(error),
      );
      return 0;
    }
  }
}
