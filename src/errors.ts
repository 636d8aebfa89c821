export class QueryError extends Error {
  override readonly name = 'QueryError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A tree that is not made of attr/and/or nodes, or a tree that claims to be
 * in normal form but is not. Always a programming error.
 */
export class StructuralError extends Error {
  override readonly name = 'StructuralError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type HandlerTable = 'creator' | 'applier';

export class DispatchError extends Error {
  override readonly name = 'DispatchError';

  constructor(
    readonly nodeType: string,
    readonly table: HandlerTable,
    message?: string,
  ) {
    super(message ?? `No ${table} registered for node type "${nodeType}" or any of its ancestors`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ClientError extends Error {
  override readonly name = 'ClientError';

  constructor(
    message: string,
    override readonly cause?: unknown,
    readonly branchIndex?: number,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
