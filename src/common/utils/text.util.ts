/**
 * Length in Unicode code points, the unit Postgres measures varchar limits in.
 * Astral characters such as emoji count once.
 */
export function charLength(text: string): number {
  return [...text].length;
}

/**
 * First `max` code points; never splits a surrogate pair
 */
export function truncateChars(text: string, max: number): string {
  const chars = [...text];
  return chars.length <= max ? text : chars.slice(0, max).join('');
}
