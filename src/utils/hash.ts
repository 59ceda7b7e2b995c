/**
 * Identifier helpers
 */

import { randomBytes } from 'crypto';

export function randomHex(length: number = 8): string {
  return randomBytes(Math.ceil(length / 2)).toString('hex').substring(0, length);
}
