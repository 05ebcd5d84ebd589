/**
 * Base error for everything the inventory pipeline rejects.
 */
export class InventoryError extends Error {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = "InventoryError";
    this.cause = cause;
  }
}

/**
 * The topology cannot be turned into a graph: unknown link endpoint,
 * node name without a type prefix, duplicate names.
 */
export class MalformedTopologyError extends InventoryError {
  constructor(
    message: string,
    public readonly subject?: string,
  ) {
    super(message);
    this.name = "MalformedTopologyError";
  }
}

/**
 * A reserved pool is too small for the topology. Raised before any address
 * is handed out.
 */
export class PoolExhaustedError extends InventoryError {
  constructor(
    public readonly pool: string,
    public readonly requested: bigint,
    public readonly capacity: bigint,
  ) {
    super(`Address pool ${pool} exhausted: ${requested} requested, capacity ${capacity}`);
    this.name = "PoolExhaustedError";
  }
}

export class EncodingError extends InventoryError {
  constructor(
    message: string,
    public readonly input?: string,
  ) {
    super(message);
    this.name = "EncodingError";
  }
}

/**
 * The topology file could not be located, read or parsed.
 */
export class TopologySourceError extends InventoryError {
  constructor(
    message: string,
    public readonly path?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = "TopologySourceError";
  }
}
