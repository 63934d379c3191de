/**
 * UTC timestamp for file names, e.g. 20250131_142233
 */
export function compactUtcTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
}
