import { IsOptional, IsString } from 'class-validator';

/**
 * Multipart form fields of the public form. Content rules are applied by
 * SubmissionsService so that they run after consent and rate limiting.
 */
export class SubmitFeedbackDto {
  @IsOptional()
  @IsString()
  category?: string;

  @IsOptional()
  @IsString()
  message?: string;

  @IsOptional()
  @IsString()
  anonymityConsent?: string;
}
