import { Module } from '@nestjs/common';
import { DrizzleSubmissionsRepository } from './drizzle-submissions.repository';
import { PhotoStorageService } from './photo-storage.service';
import { SubmissionsRepository } from './submissions.repository';

/**
 * Submission rows and their stored photos, shared by intake, enrichment
 * and admin modules
 */
@Module({
  providers: [
    { provide: SubmissionsRepository, useClass: DrizzleSubmissionsRepository },
    PhotoStorageService,
  ],
  exports: [SubmissionsRepository, PhotoStorageService],
})
export class SubmissionsStoreModule {}
