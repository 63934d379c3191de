import { IsArray, IsOptional, IsString, MaxLength } from 'class-validator';

// Width of submissions.detected_language
export const MAX_LANGUAGE_LENGTH = 16;

/**
 * Shape of the JSON object the model is asked to return. Every field is
 * optional; a present field of the wrong type makes the response malformed.
 */
export class ClassificationResponseDto {
  @IsOptional()
  @IsString()
  @MaxLength(MAX_LANGUAGE_LENGTH)
  detected_language?: string;

  @IsOptional()
  @IsString()
  translation_en?: string;

  @IsOptional()
  @IsString()
  translation_ru?: string;

  @IsOptional()
  @IsString()
  summary?: string;

  @IsOptional()
  @IsArray()
  tags?: unknown[];
}
