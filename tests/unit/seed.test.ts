import { describe, it, expect } from 'vitest';
import {
  createSeededRandom,
  deterministicHash,
  deterministicSeed,
  seededUniform,
} from '@/core/seed';

describe('seed', () => {
  describe('deterministicHash', () => {
    it('produces consistent hash for same input', () => {
      expect(deterministicHash('test-input')).toBe(deterministicHash('test-input'));
    });

    it('returns 64-character hex string', () => {
      expect(deterministicHash('any-input')).toMatch(/^[a-f0-9]{64}$/);
    });
  });

  describe('deterministicSeed', () => {
    it('is stable per key and changes with the salt', () => {
      expect(deterministicSeed('AAPL')).toBe(deterministicSeed('AAPL'));
      expect(deterministicSeed('AAPL', 'a')).not.toBe(deterministicSeed('AAPL', 'b'));
    });

    it('fits in 32 bits', () => {
      const seed = deterministicSeed('XYZ');
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThanOrEqual(0xffffffff);
    });
  });

  describe('createSeededRandom', () => {
    it('repeats the same sequence for the same seed', () => {
      const a = createSeededRandom(42);
      const b = createSeededRandom(42);
      const first = [a(), a(), a()];
      expect([b(), b(), b()]).toEqual(first);
    });

    it('stays within [0, 1)', () => {
      const random = createSeededRandom(7);
      for (let i = 0; i < 200; i++) {
        const value = random();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe('seededUniform', () => {
    it('maps into the range and rounds to the requested decimals', () => {
      expect(seededUniform(() => 0, 15, 50, 1)).toBe(15);
      expect(seededUniform(() => 0.5, 15, 50, 1)).toBe(32.5);
      expect(seededUniform(() => 0.123456, 0, 1, 3)).toBe(0.123);
    });
  });
});
