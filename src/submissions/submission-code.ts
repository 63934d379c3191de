import { randomDigits } from '../common/utils/hashing.util';

/**
 * Short reference shown to the submitter, e.g. FB-123-45
 */
export function generateSubmissionCode(prefix: string): string {
  return `${prefix}-${randomDigits(3)}-${randomDigits(2)}`;
}
