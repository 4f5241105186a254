/**
 * hashdial: Consistent hashing ring and hash based decision making for distributed systems
 * @module hashdial
 */

export {
  Ring,
  createRing,
  DEFAULT_REPLICA_COUNT,
  MAX_IDENTIFIER_LENGTH,
  MAX_PROBE_ATTEMPTS,
  type RingOptions,
  type RingJSON,
  type VirtualPoint,
} from './ring.js';
export {
  sha256Hash,
  murmur32Hash,
  crc32Hash,
  seeded,
  toBytes,
  hashToUnitInterval,
  KEYSPACE_SIZE,
  type HashFunction,
  type HashInput,
} from './hash.js';
export { decide, range, select, hashFloat, DEFAULT_SEED, type DialOptions, type RangeOptions } from './dial.js';
export { HashDialError, DuplicateNodeError, NodeNotFoundError, EmptyRingError, InvalidInputError } from './errors.js';
export { logger, type RingLogger } from './logger.js';
