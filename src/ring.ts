import { DuplicateNodeError, EmptyRingError, HashDialError, InvalidInputError, NodeNotFoundError } from './errors.js';
import { sha256Hash, toBytes, type HashFunction } from './hash.js';
import { logger as defaultLogger, type RingLogger } from './logger.js';

export const DEFAULT_REPLICA_COUNT = 150;
export const MAX_IDENTIFIER_LENGTH = 1000;

/** Salted retries per virtual point before the hash function is deemed degenerate. */
export const MAX_PROBE_ATTEMPTS = 1024;

/**
 * Configuration options for Ring
 */
export interface RingOptions {
  /**
   * Number of virtual points per node.
   * More replicas = smoother distribution but more memory and slower inserts
   * @default 150
   */
  replicaCount?: number;
  /**
   * Places virtual points and keys on the keyspace
   * @default sha256Hash
   */
  hashFn?: HashFunction;
  /** Nodes added, in order, at construction */
  nodes?: Iterable<string>;
  logger?: RingLogger;
}

/**
 * One position on the ring and the node that owns it
 */
export interface VirtualPoint {
  readonly position: bigint;
  readonly node: string;
}

/**
 * Exported shape of a ring: its membership and replica count
 */
export interface RingJSON {
  nodes: string[];
  replicas: number;
}

/**
 * Immutable view of the ring. `positions` is sorted ascending and
 * `owners[i]` owns `positions[i]`.
 */
interface RingSnapshot {
  readonly positions: readonly bigint[];
  readonly owners: readonly string[];
  readonly nodes: ReadonlySet<string>;
}

const EMPTY: RingSnapshot = { positions: [], owners: [], nodes: new Set<string>() };

/**
 * Ring - A consistent hashing ring using virtual points
 *
 * Every mutation builds a fresh snapshot and swaps it in with a single
 * assignment, so lookups only ever observe a complete ring and a failed
 * mutation leaves nothing behind.
 *
 * @example
 * ```typescript
 * const ring = new Ring({ replicaCount: 100, nodes: ['10.0.0.1:11211', '10.0.0.2:11211'] });
 * ring.locate('user:42'); // '10.0.0.1:11211' or '10.0.0.2:11211'
 * ```
 */
export class Ring {
  readonly replicaCount: number;
  private readonly hashFn: HashFunction;
  private readonly log: RingLogger;
  private snapshot: RingSnapshot = EMPTY;
  private _version = 0;

  /**
   * Creates a new Ring instance
   * @param options - Configuration options for the ring
   */
  constructor(options: RingOptions = {}) {
    const replicaCount = options.replicaCount ?? DEFAULT_REPLICA_COUNT;
    if (!Number.isInteger(replicaCount) || replicaCount < 1) {
      throw new InvalidInputError(`Replica count must be a positive integer, got ${replicaCount}`);
    }

    this.replicaCount = replicaCount;
    this.hashFn = options.hashFn ?? sha256Hash;
    this.log = (options.logger ?? defaultLogger).child({ component: 'ring' });

    for (const node of options.nodes ?? []) {
      this.addNode(node);
    }
  }

  /**
   * Recreates a ring from the output of {@link Ring.toJSON}, adding nodes
   * in their exported order. With the same hash function the points match
   * those of a ring built by adding the same nodes in that order; a ring
   * whose history included removals may have placed salted points elsewhere.
   */
  static fromJSON(json: RingJSON, options: Pick<RingOptions, 'hashFn' | 'logger'> = {}): Ring {
    return new Ring({ ...options, replicaCount: json.replicas, nodes: json.nodes });
  }

  /**
   * Number of nodes in the ring
   */
  get size(): number {
    return this.snapshot.nodes.size;
  }

  /**
   * Snapshot of the nodes in the ring; later mutations do not affect it
   */
  get nodes(): ReadonlySet<string> {
    return new Set(this.snapshot.nodes);
  }

  /**
   * Incremented by every successful `addNode` or `removeNode`
   */
  get version(): number {
    return this._version;
  }

  has(node: string): boolean {
    return this.snapshot.nodes.has(node);
  }

  /**
   * Adds a node with `replicaCount` virtual points.
   *
   * Point `i` sits at `H(node:i)`. A position that is already taken is
   * never displaced; the point probes `H(node:i:1)`, `H(node:i:2)`, ...
   * until it lands on a free one.
   *
   * @throws {DuplicateNodeError} if the node is already in the ring
   */
  addNode(node: string): void {
    validateNode(node);
    const current = this.snapshot;
    if (current.nodes.has(node)) {
      throw new DuplicateNodeError(node);
    }

    const placed = new Set<bigint>();
    for (let i = 0; i < this.replicaCount; i++) {
      placed.add(this.probe(node, i, current.positions, placed));
    }
    const added = Array.from(placed).sort(comparePositions);

    const positions: bigint[] = [];
    const owners: string[] = [];
    let from = 0;
    for (const position of added) {
      const at = lowerBound(current.positions, position);
      for (; from < at; from++) {
        positions.push(current.positions[from]);
        owners.push(current.owners[from]);
      }
      positions.push(position);
      owners.push(node);
    }
    for (; from < current.positions.length; from++) {
      positions.push(current.positions[from]);
      owners.push(current.owners[from]);
    }

    const nodes = new Set(current.nodes);
    nodes.add(node);
    this.swap({ positions, owners, nodes });
    this.log.debug({ node, points: added.length, version: this._version }, 'node added');
  }

  /**
   * Removes a node and exactly the virtual points it owns. Points are
   * matched by owner, so salted positions are removed as well.
   *
   * @throws {NodeNotFoundError} if the node is not in the ring
   */
  removeNode(node: string): void {
    validateNode(node);
    const current = this.snapshot;
    if (!current.nodes.has(node)) {
      throw new NodeNotFoundError(node);
    }

    const positions: bigint[] = [];
    const owners: string[] = [];
    current.owners.forEach((owner, i) => {
      if (owner !== node) {
        positions.push(current.positions[i]);
        owners.push(owner);
      }
    });

    const nodes = new Set(current.nodes);
    nodes.delete(node);
    this.swap({ positions, owners, nodes });
    this.log.debug(
      { node, points: current.positions.length - positions.length, version: this._version },
      'node removed',
    );
  }

  /**
   * Finds the node that owns a key: the owner of the first virtual point
   * at or after `H(key)`, wrapping around past the largest position.
   *
   * @throws {EmptyRingError} if the ring has no nodes
   */
  locate(key: string): string {
    const { positions, owners } = this.snapshot;
    if (positions.length === 0) {
      throw new EmptyRingError();
    }

    return owners[this.indexFor(key, positions)];
  }

  /**
   * Finds up to `count` distinct nodes for a key, walking clockwise from
   * the owner returned by {@link Ring.locate}. Useful for picking fallbacks.
   *
   * @throws {InvalidInputError} if `count` is not an integer
   * @throws {EmptyRingError} if the ring has no nodes
   */
  locateN(key: string, count: number): string[] {
    if (!Number.isInteger(count)) {
      throw new InvalidInputError(`Count must be an integer, got ${count}`);
    }
    if (count <= 0) return [];

    const { positions, owners, nodes } = this.snapshot;
    if (positions.length === 0) {
      throw new EmptyRingError();
    }

    const wanted = Math.min(count, nodes.size);
    const found: string[] = [];
    const seen = new Set<string>();
    const start = this.indexFor(key, positions);

    for (let step = 0; step < positions.length && found.length < wanted; step++) {
      const owner = owners[(start + step) % positions.length];
      if (!seen.has(owner)) {
        seen.add(owner);
        found.push(owner);
      }
    }

    return found;
  }

  /**
   * Copy of the virtual points in position order
   */
  points(): VirtualPoint[] {
    const { positions, owners } = this.snapshot;
    return positions.map((position, i) => ({ position, node: owners[i] }));
  }

  toJSON(): RingJSON {
    return {
      nodes: Array.from(this.snapshot.nodes),
      replicas: this.replicaCount,
    };
  }

  toString(): string {
    return `Ring(nodes=${this.size}, positions=${this.snapshot.positions.length}, replicas=${this.replicaCount})`;
  }

  private swap(next: RingSnapshot): void {
    this.snapshot = next;
    this._version++;
  }

  private indexFor(key: string, positions: readonly bigint[]): number {
    const at = lowerBound(positions, this.hashFn(toBytes(key)));
    return at === positions.length ? 0 : at;
  }

  /**
   * Position for replica `replica` of `node`, salted until it misses both
   * the existing ring and the points already placed for this node.
   */
  private probe(node: string, replica: number, existing: readonly bigint[], placed: ReadonlySet<bigint>): bigint {
    const base = `${node}:${replica}`;
    for (let attempt = 0; attempt < MAX_PROBE_ATTEMPTS; attempt++) {
      const position = this.hashFn(toBytes(attempt === 0 ? base : `${base}:${attempt}`));
      if (!placed.has(position) && !contains(existing, position)) {
        return position;
      }
      this.log.debug({ node, replica, attempt, position: position.toString() }, 'virtual point collision');
    }

    throw new HashDialError(
      `No free position for ${base} after ${MAX_PROBE_ATTEMPTS} attempts; the hash function is degenerate`,
    );
  }
}

/**
 * Functional form of `new Ring(...)`.
 */
export function createRing(replicaCount = DEFAULT_REPLICA_COUNT, hashFn: HashFunction = sha256Hash): Ring {
  return new Ring({ replicaCount, hashFn });
}

function validateNode(node: string): void {
  if (!node) {
    throw new InvalidInputError('Node identifier cannot be empty');
  }
  if (node.length > MAX_IDENTIFIER_LENGTH) {
    throw new InvalidInputError('Node identifier exceeds maximum length');
  }
}

function comparePositions(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Index of the first position >= target, or `positions.length` if none.
 */
function lowerBound(positions: readonly bigint[], target: bigint): number {
  let low = 0;
  let high = positions.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (positions[mid] < target) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

function contains(positions: readonly bigint[], target: bigint): boolean {
  const at = lowerBound(positions, target);
  return at < positions.length && positions[at] === target;
}
