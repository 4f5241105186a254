import { describe, test, expect } from 'vitest';
import { decide, range, select, hashFloat, InvalidInputError } from '../src/index.js';

const NUM_SAMPLES = 10000;

describe('dial', () => {
  describe('hashFloat()', () => {
    test('distributes evenly across [0, 1)', () => {
      const buckets = new Array<number>(10).fill(0);
      for (let n = 0; n < NUM_SAMPLES; n++) {
        const f = hashFloat(`${n}`);
        expect(f).toBeGreaterThanOrEqual(0);
        expect(f).toBeLessThan(1);
        buckets[Math.floor(f * 10)]++;
      }

      // every bucket within 10% of its share
      for (const count of buckets) {
        expect(count).toBeGreaterThan(900);
        expect(count).toBeLessThan(1100);
      }
    });

    test('uses the seed', () => {
      expect(hashFloat('t')).not.toBe(hashFloat('t', 'something'));
    });

    test('treats strings as their UTF-8 bytes', () => {
      expect(hashFloat(new Uint8Array([0x74]))).toBe(hashFloat('t'));
    });
  });

  describe('decide()', () => {
    test('returns true for roughly the given fraction of keys', () => {
      let hits = 0;
      for (let n = 0; n < 1000; n++) {
        if (decide(`${n}`, 0.25)) hits++;
      }

      expect(hits).toBeGreaterThan(225);
      expect(hits).toBeLessThan(275);
    });

    test('is deterministic per key', () => {
      expect(decide('request-17', 0.5)).toBe(decide('request-17', 0.5));
    });

    test('always or never at the bounds', () => {
      expect(decide('t', 0)).toBe(false);
      expect(decide('t', 1)).toBe(true);
    });

    test('rejects probabilities outside [0, 1]', () => {
      expect(decide('', 0.5)).toBeTypeOf('boolean');
      expect(() => decide('', -0.5)).toThrow(InvalidInputError);
      expect(() => decide('', -0.5)).toThrow('probability (-0.5) must be >= 0.0');
      expect(() => decide('', 1.5)).toThrow('probability (1.5) must be <= 1.0');
    });

    test('uses the seed', () => {
      expect(decide('t', 0.5)).toBe(false);
      expect(decide('t', 0.5, { seed: 'test2' })).toBe(true);
    });
  });

  describe('range()', () => {
    test('distributes across [start, stop)', () => {
      const values = new Map<number, number>();
      for (let n = 0; n < NUM_SAMPLES; n++) {
        const selected = range(`${n}`, 2, { start: -1 });
        values.set(selected, (values.get(selected) ?? 0) + 1);
      }

      expect([...values.keys()].sort((a, b) => a - b)).toEqual([-1, 0, 1]);
      for (const count of values.values()) {
        expect(count).toBeGreaterThan(NUM_SAMPLES * 0.33 * 0.9);
        expect(count).toBeLessThan(NUM_SAMPLES * 0.33 * 1.1);
      }
    });

    test('offsets by start', () => {
      expect(range('partition-key', 10)).toBe(6);
      expect(range('partition-key', 110, { start: 100 })).toBe(106);
    });

    test('uses the seed', () => {
      expect(range('t', 2)).toBe(1);
      expect(range('t', 2, { seed: 'test2' })).toBe(0);
    });

    test('rejects an empty range', () => {
      expect(() => range('t', 5, { start: 5 })).toThrow('stop (5) must be > start (5)');
    });

    test('rejects ranges too large for a float', () => {
      expect(() => range('', 2 ** 63)).toThrow(InvalidInputError);
      expect(() => range('', 0, { start: -(2 ** 63) })).toThrow(InvalidInputError);
      expect(() => range('', Number.MAX_SAFE_INTEGER, { start: -1 })).toThrow(
        `stop-start must be <= ${Number.MAX_SAFE_INTEGER}`,
      );
    });

    test('rejects fractional bounds', () => {
      expect(() => range('t', 2.5)).toThrow('start (0) and stop (2.5) must be safe integers');
    });
  });

  describe('select()', () => {
    test('distributes across the sequence', () => {
      const values = new Map<number, number>();
      for (let n = 0; n < NUM_SAMPLES; n++) {
        const selected = select(`${n}`, [-1, 0, 1]);
        values.set(selected, (values.get(selected) ?? 0) + 1);
      }

      expect(values.size).toBe(3);
      for (const count of values.values()) {
        expect(count).toBeGreaterThan(NUM_SAMPLES * 0.33 * 0.9);
        expect(count).toBeLessThan(NUM_SAMPLES * 0.33 * 1.1);
      }
    });

    test('picks a stable element', () => {
      expect(select('user:7', ['red', 'green', 'blue'])).toBe('red');
    });

    test('uses the seed', () => {
      expect(select('t', [0, 1])).toBe(1);
      expect(select('t', [0, 1], { seed: 'test2' })).toBe(0);
    });

    test('rejects an empty sequence', () => {
      expect(() => select('', [])).toThrow('non-empty sequence required');
    });
  });
});
