import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { truncateChars } from '../common/utils/text.util';
import { ClassificationError, toClassificationError } from './classification.error';
import { ClassificationResponseDto } from './dto/classification-response.dto';
import { SYSTEM_PROMPTS, USER_PROMPTS } from './prompts';

export const GROQ_CLIENT = 'GROQ_CLIENT';

export interface CompletionRequest {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  temperature: number;
  max_tokens: number;
  response_format: { type: 'json_object' };
}

export interface CompletionResponse {
  choices: Array<{ message?: { content?: string | null } }>;
}

/**
 * The part of the Groq client used here; `new Groq(...)` satisfies it
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: CompletionRequest): PromiseLike<CompletionResponse>;
    };
  };
}

export interface FeedbackClassification {
  detectedLanguage: string;
  translationEn: string;
  translationRu: string;
  summary: string;
  tags: string[];
}

/**
 * Keep allow-listed tags in order, without duplicates, up to `maxTags`
 */
export function filterTags(
  tags: readonly unknown[],
  allowedTags: readonly string[],
  maxTags: number,
): string[] {
  const result: string[] = [];
  for (const tag of tags) {
    if (typeof tag === 'string' && allowedTags.includes(tag) && !result.includes(tag)) {
      result.push(tag);
    }
    if (result.length >= maxTags) {
      break;
    }
  }
  return result;
}

@Injectable()
export class GroqService {
  private readonly logger = new Logger(GroqService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(GROQ_CLIENT) private readonly client: ChatCompletionClient | null,
  ) {
    if (this.client) {
      this.logger.log(`Groq client initialized (model ${config.enrichment.model})`);
    } else {
      this.logger.warn('GROQ_API_KEY not configured - enrichment will use local heuristics');
    }
  }

  /**
   * Check if the Groq service is ready
   */
  isReady(): boolean {
    return this.client !== null;
  }

  /**
   * Detect language, translate, summarize and tag one message.
   * Throws ClassificationError on any failure.
   */
  async classifyFeedback(message: string): Promise<FeedbackClassification> {
    if (!this.client) {
      throw new ClassificationError('not_configured', 'Groq API is not configured');
    }

    const { model, summaryMaxLength, allowedTags } = this.config.enrichment;

    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPTS.feedbackClassifier },
          {
            role: 'user',
            content: USER_PROMPTS.classifyFeedback(message, allowedTags, summaryMaxLength),
          },
        ],
        response_format: { type: 'json_object' },
        temperature: 0.1,
        max_tokens: 1000,
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw toClassificationError(error);
    }

    if (!content || !content.trim()) {
      throw new ClassificationError('empty_response', 'No content generated');
    }

    return this.parseClassification(content);
  }

  /**
   * Validate the model output and clamp it to the stored limits
   */
  async parseClassification(content: string): Promise<FeedbackClassification> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw toClassificationError(error);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ClassificationError('invalid_response', 'Response is not a JSON object');
    }

    const response = plainToInstance(ClassificationResponseDto, parsed);
    const errors = await validate(response);
    if (errors.length > 0) {
      const fields = errors.map((error) => error.property).join(', ');
      throw new ClassificationError('invalid_response', `Malformed fields: ${fields}`);
    }

    const { summaryMaxLength, maxTags, allowedTags } = this.config.enrichment;

    return {
      detectedLanguage: response.detected_language ?? 'unknown',
      translationEn: response.translation_en ?? '',
      translationRu: response.translation_ru ?? '',
      summary: truncateChars(response.summary ?? '', summaryMaxLength),
      tags: filterTags(response.tags ?? [], allowedTags, maxTags),
    };
  }
}
