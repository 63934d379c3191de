import * as crypto from 'crypto';

/**
 * One-way fingerprint of a submitter address (SHA-256 of salt + address).
 * The raw address is never stored anywhere.
 */
export function fingerprintAddress(address: string | undefined, salt: string): string {
  return crypto
    .createHash('sha256')
    .update(`${salt}${address || 'unknown'}`)
    .digest('hex');
}

/**
 * Random decimal digits from a CSPRNG, e.g. randomDigits(3) -> "042"
 */
export function randomDigits(length: number): string {
  let digits = '';
  for (let i = 0; i < length; i++) {
    digits += crypto.randomInt(0, 10).toString();
  }
  return digits;
}
