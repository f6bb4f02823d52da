export class EngineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised when a transport event cannot be turned into a typed record. */
export class NormalizationError extends EngineError {
  constructor(
    readonly reason: string,
    readonly nodeId?: string,
  ) {
    super(
      nodeId ? `Cannot normalize packet from ${nodeId}: ${reason}` : `Cannot normalize packet: ${reason}`,
    );
  }
}

/** Raised when a status broadcast does not match the wire format. */
export class DecodeError extends EngineError {
  constructor(
    readonly reason: string,
    readonly payload: string,
  ) {
    super(`Invalid status broadcast: ${reason}`);
  }
}

export type PersistenceOperation =
  | 'snapshot-load'
  | 'snapshot-save'
  | 'log-append'
  | 'log-cleanup'
  | 'log-delete'
  | 'rules-load'
  | 'rules-save'
  | 'messages-load'
  | 'messages-save';

export class PersistenceError extends EngineError {
  constructor(
    readonly operation: PersistenceOperation,
    readonly path: string,
    cause?: unknown,
  ) {
    super(
      `Persistence ${operation} failed for ${path}: ${
        cause instanceof Error ? cause.message : String(cause ?? 'unknown error')
      }`,
      { cause },
    );
  }
}

/** Thrown at startup only; the process refuses to run with these thresholds. */
export class ConfigurationError extends EngineError {
  constructor(readonly problems: string[]) {
    super(`Invalid engine configuration: ${problems.join('; ')}`);
  }
}

/** The mesh link is down or cannot carry the requested send. */
export class TransportError extends EngineError {}

/** A command that targets a node the store does not know. */
export class UnknownNodeError extends EngineError {
  constructor(readonly nodeId: string) {
    super(`Unknown node ${nodeId}`);
  }
}

/** A command that targets a message the store does not hold. */
export class UnknownMessageError extends EngineError {
  constructor(readonly messageId: string) {
    super(`Unknown message ${messageId}`);
  }
}

/** A command the engine refuses, such as forgetting the local node. */
export class ForbiddenOperationError extends EngineError {}

/** A status message that cannot be put on the wire. */
export class EncodeError extends EngineError {}
