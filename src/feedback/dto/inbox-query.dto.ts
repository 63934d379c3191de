import { Transform, Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { FEEDBACK_CATEGORIES, FeedbackCategory } from '../../config/app.config';
import { WORKFLOW_STATUSES, WorkflowStatus } from '../../drizzle/schema';
import { emptyToUndefined } from '../../common/transforms/empty-to-undefined.transform';

export const DEFAULT_PER_PAGE = 20;
export const MAX_PER_PAGE = 100;

export class InboxQueryDto {
  @Transform(emptyToUndefined)
  @IsOptional()
  @IsIn(WORKFLOW_STATUSES, { message: 'Invalid status' })
  status?: WorkflowStatus;

  @Transform(emptyToUndefined)
  @IsOptional()
  @IsIn(FEEDBACK_CATEGORIES, { message: 'Invalid category' })
  category?: FeedbackCategory;

  @Transform(emptyToUndefined)
  @IsOptional()
  @IsString()
  @MaxLength(100)
  tag?: string;

  @Transform(emptyToUndefined)
  @IsOptional()
  @IsString()
  @MaxLength(200)
  search?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PER_PAGE)
  perPage?: number;
}
