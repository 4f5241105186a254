/**
 * Base class for every error thrown by hashdial.
 */
export class HashDialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Thrown by `addNode` when the node is already on the ring.
 * Remove it first if it has to be re-added.
 */
export class DuplicateNodeError extends HashDialError {
  constructor(readonly node: string) {
    super(`Node already exists in the ring: ${node}`);
  }
}

/** Thrown by `removeNode` when the node is not on the ring. */
export class NodeNotFoundError extends HashDialError {
  constructor(readonly node: string) {
    super(`Node not found in the ring: ${node}`);
  }
}

/** Thrown by lookups on a ring with no nodes. */
export class EmptyRingError extends HashDialError {
  constructor() {
    super('Cannot locate a key on an empty ring');
  }
}

export class InvalidInputError extends HashDialError {}
