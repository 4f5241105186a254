/**
 * Hash based decision making: deterministic for a given key, but
 * probabilistic across a set of keys.
 *
 * Components that must agree on the same sample without coordinating can
 * each ask the dial, e.g. to log the same 1% of requests everywhere:
 *
 * ```typescript
 * if (decide(request.id, 0.01)) {
 *   logRequest(request);
 * }
 * ```
 *
 * A `seed` makes decisions orthogonal. Re-filtering the output of a
 * filter with the same seed keeps every key, and keys chosen by an
 * untrusted party can only be kept unbiased with a seed they don't know.
 *
 * Outputs for a given key, seed and arguments are stable; changing them
 * requires a major version bump.
 *
 * @module dial
 */

import { InvalidInputError } from './errors.js';
import { hashToUnitInterval, seeded, sha256Hash, toBytes, type HashInput } from './hash.js';

export const DEFAULT_SEED = '';

export interface DialOptions {
  /** Hashed ahead of the key */
  seed?: HashInput;
}

export interface RangeOptions extends DialOptions {
  /**
   * Inclusive start of the range
   * @default 0
   */
  start?: number;
}

/**
 * Hashes `seed || key` with SHA-256 into [0, 1).
 */
export function hashFloat(key: HashInput, seed: HashInput = DEFAULT_SEED): number {
  return hashToUnitInterval(seeded(sha256Hash, seed)(toBytes(key)));
}

/**
 * Returns true for a fraction `probability` of all keys, always the same
 * answer for the same key and seed.
 *
 * @param probability - Must be in [0, 1]
 */
export function decide(key: HashInput, probability: number, options: DialOptions = {}): boolean {
  if (probability < 0) {
    throw new InvalidInputError(`probability (${probability}) must be >= 0.0`);
  }
  if (probability > 1) {
    throw new InvalidInputError(`probability (${probability}) must be <= 1.0`);
  }

  return hashFloat(key, options.seed) < probability;
}

/**
 * Picks an integer in `[start, stop)` by hashing the key.
 *
 * `stop - start` may not exceed `Number.MAX_SAFE_INTEGER`.
 *
 * @example
 * ```typescript
 * // is this line in partition 3 of 10?
 * range(line, 10) === 3;
 * ```
 */
export function range(key: HashInput, stop: number, options: RangeOptions = {}): number {
  const start = options.start ?? 0;
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(stop)) {
    throw new InvalidInputError(`start (${start}) and stop (${stop}) must be safe integers`);
  }
  if (stop <= start) {
    throw new InvalidInputError(`stop (${stop}) must be > start (${start})`);
  }
  if (stop - start > Number.MAX_SAFE_INTEGER) {
    throw new InvalidInputError(`stop-start must be <= ${Number.MAX_SAFE_INTEGER}`);
  }

  return start + Math.floor((stop - start) * hashFloat(key, options.seed));
}

/**
 * Picks one element of `seq` by hashing the key.
 */
export function select<T>(key: HashInput, seq: readonly T[], options: DialOptions = {}): T {
  if (seq.length === 0) {
    throw new InvalidInputError('non-empty sequence required');
  }

  return seq[range(key, seq.length, { seed: options.seed })];
}
