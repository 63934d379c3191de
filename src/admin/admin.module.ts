import { Module } from '@nestjs/common';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { SubmissionsStoreModule } from '../submissions/submissions-store.module';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';

@Module({
  imports: [SubmissionsStoreModule, RateLimitModule],
  controllers: [AdminController],
  providers: [AdminService],
})
export class AdminModule {}
