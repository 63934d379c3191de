import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG, AppConfig, FALLBACK_TAG } from '../config/app.config';
import type { FeedbackClassification } from '../ai/groq.service';
import { charLength, truncateChars } from '../common/utils/text.util';
import tagKeywords from './data/tag-keywords.json';

export interface TagKeywords {
  tag: string;
  keywords: string[];
}

// First match wins
const SCRIPT_LANGUAGES: ReadonlyArray<[RegExp, string]> = [
  [/[\u0E00-\u0E7F]/, 'th'],
  [/[\u0400-\u04FF]/, 'ru'],
  [/[\u4E00-\u9FFF]/, 'zh'],
  [/[\u0600-\u06FF]/, 'ar'],
];

export const UNTRANSLATED_EN_PREFIX = '[Auto-translation unavailable]';
export const UNTRANSLATED_RU_PREFIX = '[Требуется перевод]';

export function detectLanguage(message: string): string {
  const match = SCRIPT_LANGUAGES.find(([pattern]) => pattern.test(message));
  return match ? match[1] : 'en';
}

export function summarize(message: string, maxLength: number): string {
  if (charLength(message) <= maxLength) {
    return message;
  }
  return `${truncateChars(message, maxLength - 3)}...`;
}

/**
 * Case-insensitive substring scan in table order; at most `maxTags` distinct
 * tags, or the fallback tag when nothing matches.
 */
export function matchTags(
  message: string,
  table: readonly TagKeywords[],
  maxTags: number,
): string[] {
  const lower = message.toLowerCase();
  const tags: string[] = [];

  for (const entry of table) {
    if (tags.length >= maxTags) {
      break;
    }
    if (!tags.includes(entry.tag) && entry.keywords.some((keyword) => lower.includes(keyword))) {
      tags.push(entry.tag);
    }
  }

  return tags.length > 0 ? tags : [FALLBACK_TAG];
}

/**
 * Local, rule-based enrichment used when the remote classifier is
 * unavailable or fails.
 */
@Injectable()
export class HeuristicClassifierService {
  private readonly table: readonly TagKeywords[];

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    // Only keep tags the rest of the system accepts
    this.table = tagKeywords.filter((entry) => config.enrichment.allowedTags.includes(entry.tag));
  }

  classify(message: string): FeedbackClassification {
    const { summaryMaxLength, maxTags } = this.config.enrichment;
    const detectedLanguage = detectLanguage(message);

    return {
      detectedLanguage,
      translationEn: detectedLanguage === 'en' ? message : `${UNTRANSLATED_EN_PREFIX} ${message}`,
      translationRu: `${UNTRANSLATED_RU_PREFIX} ${message}`,
      summary: summarize(message, summaryMaxLength),
      tags: matchTags(message, this.table, maxTags),
    };
  }
}
