import type { TransformFnParams } from 'class-transformer';

/**
 * Treat blank query/form values (`?status=`) as absent
 */
export function emptyToUndefined({ value }: TransformFnParams): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}
