/**
 * Error class for pipeline nodes
 *
 * Extends standard Error class, adding the identifier of the node
 * the fault belongs to
 */
export class NodeError extends Error {
  /**
   * Identifier of node where error occurred
   */
  public readonly nodeId: string;

  /**
   * Original error, if exists
   */
  public readonly originalError?: Error;

  constructor(message: string, nodeId: string, originalError?: Error) {
    super(message);

    this.name = 'NodeError';
    this.nodeId = nodeId;
    this.originalError = originalError;

    if (originalError?.stack) {
      this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
    }

    // For ES5 compatibility
    Object.setPrototypeOf(this, new.target.prototype);
  }

  public override toString(): string {
    return `[${this.name} in ${this.nodeId}] ${this.message}`;
  }

  /**
   * Converts error to object for serialization
   */
  toJSON(): {
    readonly name: string;
    readonly message: string;
    readonly nodeId: string;
    readonly originalError?: {
      readonly name: string;
      readonly message: string;
    };
  } {
    return {
      name: this.name,
      message: this.message,
      nodeId: this.nodeId,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
          }
        : undefined,
    };
  }
}

/**
 * Kinds of lifecycle protocol violations. All of them are programming errors.
 */
export type ProtocolViolationKind =
  | 'unexpected-initialize'
  | 'unexpected-reset'
  | 'unexpected-history-invalidation'
  | 'duplicate-node'
  | 'foreign-graph'
  | 'unknown-node'
  | 'cycle'
  | 'invalid-edge'
  | 'missing-input'
  | 'uncomparable-snapshot'
  | 'missing-source';

/**
 * A caller bypassed the flag protocol or broke the graph structure.
 * Surfaced immediately, never recovered.
 */
export class ProtocolViolationError extends NodeError {
  public readonly kind: ProtocolViolationKind;

  constructor(kind: ProtocolViolationKind, message: string, nodeId: string) {
    super(message, nodeId);
    this.name = 'ProtocolViolationError';
    this.kind = kind;
  }
}

/**
 * Attribute value outside its declared domain, or a source that finished
 * initialization with unusable channel metadata
 */
export class ValidationError extends NodeError {
  public readonly attribute?: string;

  constructor(message: string, nodeId: string, attribute?: string) {
    super(message, nodeId);
    this.name = 'ValidationError';
    this.attribute = attribute;
  }
}

/**
 * None of the nodes upstream of `nodeId` exposes the requested attribute
 */
export class UpstreamAttributeError extends NodeError {
  public readonly attribute: string;

  constructor(nodeId: string, attribute: string) {
    super(`None of the predecessors of node ${nodeId} exposes attribute '${attribute}'`, nodeId);
    this.name = 'UpstreamAttributeError';
    this.attribute = attribute;
  }
}

/**
 * Checks if object is NodeError instance
 */
export function isNodeError(error: unknown): error is NodeError {
  return error instanceof NodeError;
}

export function isProtocolViolation(error: unknown): error is ProtocolViolationError {
  return error instanceof ProtocolViolationError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Type guard for standard Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Safely extracts error message from unknown error type
 * @param error Error of unknown type
 * @returns Error message string
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
