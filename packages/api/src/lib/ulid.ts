import { randomBytes } from 'node:crypto';

const ENCODING = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const ENCODING_LEN = ENCODING.length;
const TIME_LEN = 10;
const RANDOM_LEN = 16;

/**
 * Crockford base32 ULID: 48-bit millisecond time, 80 random bits
 */
export function generateULID(now = Date.now()): string {
  let str = '';

  let time = now;
  for (let i = TIME_LEN - 1; i >= 0; i--) {
    str = ENCODING[time % ENCODING_LEN] + str;
    time = Math.floor(time / ENCODING_LEN);
  }

  // 16 chars x 5 bits = 80 bits
  const random = randomBytes(RANDOM_LEN);
  for (let i = 0; i < RANDOM_LEN; i++) {
    str += ENCODING[random[i] & 0x1f];
  }

  return str;
}

export function generateId(prefix: string): string {
  return `${prefix}_${generateULID()}`;
}
