import { createHash } from 'node:crypto';
import CRC32 from 'crc-32';
import murmur from 'murmur-hash';

/**
 * Maps bytes onto the ring's keyspace, an unsigned 64-bit integer.
 *
 * Implementations must be deterministic across processes and machines:
 * every participant that builds a ring from the same node list has to
 * arrive at the same positions.
 */
export type HashFunction = (input: Uint8Array) => bigint;

/** Keys, node identifiers and seeds may be given as text or raw bytes. */
export type HashInput = string | Uint8Array;

/** Size of the keyspace, 2^64 */
export const KEYSPACE_SIZE = 1n << 64n;

const encoder = new TextEncoder();

/**
 * Encodes a string as UTF-8; byte input is passed through untouched.
 */
export function toBytes(input: HashInput): Uint8Array {
  return typeof input === 'string' ? encoder.encode(input) : input;
}

/**
 * Default strategy: the first 8 bytes of the SHA-256 digest, big-endian.
 */
export const sha256Hash: HashFunction = (input) => {
  const digest = createHash('sha256').update(input).digest();
  return digest.readBigUInt64BE(0);
};

/**
 * MurmurHash3 (x86, 32-bit). Positions only span the lower 2^32 of the
 * keyspace.
 */
export const murmur32Hash: HashFunction = (input) => {
  // latin1 maps each byte to one char code, so distinct inputs stay distinct
  return BigInt(murmur.v3.x86.hash32(Buffer.from(input).toString('latin1')) >>> 0);
};

/**
 * Unsigned CRC-32. Weak avalanche; meant for fixed-output stubs.
 */
export const crc32Hash: HashFunction = (input) => {
  return BigInt(CRC32.buf(input) >>> 0);
};

/**
 * Wraps a strategy so that `seed` is hashed ahead of every input.
 * Useful when two users of the same keys need orthogonal placements.
 */
export function seeded(hashFn: HashFunction, seed: HashInput): HashFunction {
  const prefix = toBytes(seed);
  if (prefix.length === 0) return hashFn;

  return (input) => {
    const buf = new Uint8Array(prefix.length + input.length);
    buf.set(prefix, 0);
    buf.set(input, prefix.length);
    return hashFn(buf);
  };
}

/**
 * Scales a keyspace position into [0, 1), keeping the top 53 bits so the
 * result is exact and never rounds up to 1.
 */
export function hashToUnitInterval(hash: bigint): number {
  return Number(hash >> 11n) / 2 ** 53;
}
