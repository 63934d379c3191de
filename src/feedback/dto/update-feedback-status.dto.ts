import { IsIn } from 'class-validator';
import { WORKFLOW_STATUSES, WorkflowStatus } from '../../drizzle/schema';

export class UpdateFeedbackStatusDto {
  @IsIn(WORKFLOW_STATUSES, { message: 'Invalid status' })
  status: WorkflowStatus;
}
