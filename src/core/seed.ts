/**
 * Deterministic seed generation for reproducible placeholder data
 */

import { createHash } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function deterministicSeed(key: string, salt: string = ''): number {
  const hashInput = `${key}${salt}`;
  const hash = deterministicHash(hashInput);
  // Use first 8 hex characters as a number
  return parseInt(hash.substring(0, 8), 16);
}

/**
 * mulberry32 generator: same seed, same sequence, values in [0, 1).
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function seededUniform(random: () => number, min: number, max: number, decimals: number): number {
  const value = min + random() * (max - min);
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
