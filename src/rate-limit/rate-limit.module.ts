import { Module } from '@nestjs/common';
import { DrizzleRateLimitRepository } from './drizzle-rate-limit.repository';
import { RateLimitCleanupService } from './rate-limit-cleanup.service';
import { RateLimitRepository } from './rate-limit.repository';
import { RateLimiterService } from './rate-limiter.service';

@Module({
  providers: [
    { provide: RateLimitRepository, useClass: DrizzleRateLimitRepository },
    RateLimiterService,
    RateLimitCleanupService,
  ],
  exports: [RateLimiterService],
})
export class RateLimitModule {}
