import {
  BadRequestException,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { APP_CONFIG, AppConfig, FeedbackCategory } from '../config/app.config';
import { charLength, truncateChars } from '../common/utils/text.util';
import type { Submission } from '../drizzle/schema';
import { describeError, isTransientDbError, retryIdempotent } from '../drizzle/db-utils';
import { EnrichmentExecutor } from '../enrichment/enrichment.executor';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { PhotoStorageService } from './photo-storage.service';
import { UploadedPhoto, validatePhoto } from './photo-validation';
import { generateSubmissionCode } from './submission-code';
import { NewSubmissionInput, SubmissionsRepository } from './submissions.repository';

export interface SubmissionRequest {
  category?: string;
  message?: string;
  anonymityConsent?: string;
  photo?: UploadedPhoto;
  clientAddress?: string;
  userAgent?: string;
}

export interface SubmissionReceipt {
  submissionCode: string;
}

const MAX_USER_AGENT_LENGTH = 500;

@Injectable()
export class SubmissionsService {
  private readonly logger = new Logger(SubmissionsService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly submissionsRepository: SubmissionsRepository,
    private readonly rateLimiterService: RateLimiterService,
    private readonly photoStorage: PhotoStorageService,
    private readonly enrichmentExecutor: EnrichmentExecutor,
  ) {}

  /**
   * Accept an anonymous submission. Checks run in a fixed order: consent,
   * rate limit, category, message, photo.
   */
  async submit(request: SubmissionRequest, now: Date = new Date()): Promise<SubmissionReceipt> {
    if (!request.anonymityConsent?.trim()) {
      throw new BadRequestException('Consent required');
    }

    const fingerprint = this.rateLimiterService.fingerprint(request.clientAddress);
    const limit = await this.rateLimiterService.check(fingerprint, now);
    if (!limit.allowed) {
      throw new HttpException(
        {
          statusCode: HttpStatus.TOO_MANY_REQUESTS,
          code: 'RATE_LIMITED',
          message: 'Too many submissions. Please try again later.',
          retryAfterSeconds: Math.ceil((limit.retryAfterMs ?? 0) / 1000),
        },
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }

    const category = this.parseCategory(request.category);
    const message = this.parseMessage(request.message);

    const photo = request.photo && request.photo.originalname ? request.photo : undefined;
    const imageType = photo ? validatePhoto(photo, this.config.uploads) : undefined;

    const code = await this.generateUniqueCode();

    const photoPath =
      photo && imageType ? await this.photoStorage.save(photo.buffer, imageType) : null;

    const input: NewSubmissionInput = {
      code,
      category,
      message,
      photoPath,
      fingerprint,
      userAgent: request.userAgent ? truncateChars(request.userAgent, MAX_USER_AGENT_LENGTH) : null,
    };

    let created: Submission;
    try {
      created = await this.submissionsRepository.createWithRateLimitEvent(input, now);
    } catch (error) {
      created = await this.recoverInsert(input, error);
    }

    this.logger.log(`Submission ${created.id} accepted as ${code} (${category})`);
    if (!this.enrichmentExecutor.dispatch(created.id)) {
      this.logger.warn(`Submission ${created.id}: enrichment not scheduled, left pending`);
    }

    return { submissionCode: code };
  }

  /**
   * The insert is never repeated. When its outcome is unknown the row is looked
   * up by its code; only a confirmed missing row releases the photo.
   */
  private async recoverInsert(input: NewSubmissionInput, error: unknown): Promise<Submission> {
    if (isTransientDbError(error)) {
      this.logger.warn(`Submission ${input.code}: insert outcome unknown (${describeError(error)}), reading back`);

      let stored: Submission | undefined;
      try {
        stored = await retryIdempotent(`Load submission ${input.code}`, () =>
          this.submissionsRepository.findByCode(input.code),
        );
      } catch (lookupError) {
        this.logger.error(
          `Submission ${input.code}: could not confirm the insert, keeping upload ${input.photoPath ?? '-'}`,
          lookupError instanceof Error ? lookupError.stack : String(lookupError),
        );
        throw error;
      }

      if (stored) {
        return stored;
      }
    }

    if (input.photoPath) {
      await this.photoStorage.remove(input.photoPath);
    }
    throw error;
  }

  private parseCategory(value: string | undefined): FeedbackCategory {
    const category = this.config.submission.categories.find((allowed) => allowed === value);
    if (!category) {
      throw new BadRequestException('Invalid category');
    }
    return category;
  }

  private parseMessage(value: string | undefined): string {
    const message = (value ?? '').trim();
    const { maxMessageLength } = this.config.submission;

    if (!message) {
      throw new BadRequestException('Message cannot be empty');
    }
    if (charLength(message) > maxMessageLength) {
      throw new BadRequestException(`Message too long (max ${maxMessageLength} characters)`);
    }

    return message;
  }

  // Collisions regenerate; they are never reported to the submitter
  private async generateUniqueCode(): Promise<string> {
    let code = generateSubmissionCode(this.config.submission.codePrefix);
    while (
      await retryIdempotent('Check submission code', () => this.submissionsRepository.codeExists(code))
    ) {
      this.logger.debug(`Submission code ${code} already taken, regenerating`);
      code = generateSubmissionCode(this.config.submission.codePrefix);
    }
    return code;
  }
}
