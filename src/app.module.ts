import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AdminModule } from './admin/admin.module';
import { AuthModule } from './auth/auth.module';
import { AppConfigModule } from './config/app-config.module';
import { DrizzleModule } from './drizzle/drizzle.module';
import { EnrichmentModule } from './enrichment/enrichment.module';
import { FeedbackModule } from './feedback/feedback.module';
import { RateLimitModule } from './rate-limit/rate-limit.module';
import { SubmissionsModule } from './submissions/submissions.module';
import { UsersModule } from './users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    ScheduleModule.forRoot(),
    AppConfigModule,
    DrizzleModule,
    UsersModule,
    AuthModule,
    RateLimitModule,
    EnrichmentModule,
    SubmissionsModule,
    FeedbackModule,
    AdminModule,
  ],
})
export class AppModule {}
