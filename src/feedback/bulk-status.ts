import { BadRequestException } from '@nestjs/common';
import { WORKFLOW_STATUSES, WorkflowStatus } from '../drizzle/schema';

const INTEGER_PATTERN = /^[+-]?\d+$/;

// Postgres integer column range
const MIN_ID = -2147483648;
const MAX_ID = 2147483647;

export interface BulkStatusRequest {
  ids: number[];
  status: WorkflowStatus;
}

export function isWorkflowStatus(value: unknown): value is WorkflowStatus {
  return WORKFLOW_STATUSES.some((status) => status === value);
}

/**
 * An integer number or a string of optional sign + digits; null otherwise
 */
export function parseId(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return null;
}

/**
 * Validates the whole request before anything is written. Ids outside the
 * column range are well-formed but can never match, so they are dropped.
 */
export function parseBulkStatusRequest(ids: unknown, status: unknown): BulkStatusRequest {
  if (!isWorkflowStatus(status)) {
    throw new BadRequestException('Invalid status');
  }

  if (!Array.isArray(ids) || ids.length === 0) {
    throw new BadRequestException('No IDs provided');
  }

  const values: readonly unknown[] = ids;
  const parsed: number[] = [];
  for (const raw of values) {
    const id = parseId(raw);
    if (id === null) {
      throw new BadRequestException('Invalid ID format');
    }
    parsed.push(id);
  }

  const unique = [...new Set(parsed)].filter((id) => id >= MIN_ID && id <= MAX_ID);
  return { ids: unique, status };
}
