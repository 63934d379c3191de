import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { EnrichmentModule } from '../enrichment/enrichment.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { SubmissionsStoreModule } from './submissions-store.module';
import { SubmissionsController } from './submissions.controller';
import { SubmissionsService } from './submissions.service';

@Module({
  imports: [
    SubmissionsStoreModule,
    RateLimitModule,
    EnrichmentModule,
    // Memory storage; the file is written only after every check passed
    MulterModule.registerAsync({
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => ({
        limits: { fileSize: config.uploads.maxFileSize, files: 1 },
      }),
    }),
  ],
  controllers: [SubmissionsController],
  providers: [SubmissionsService],
})
export class SubmissionsModule {}
