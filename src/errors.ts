/**
 * Error taxonomy
 *
 * Fatal conditions are thrown as GraphportError subclasses.
 * Per-entity failures during an import are NOT thrown: they are collected
 * as EntityCreationFailure / StatementFailure records in the outcome.
 */

export type ErrorCode =
  | 'MALFORMED_EXPORT'
  | 'CONNECTION_FAILED'
  | 'SHAPE_MISMATCH'
  | 'INVALID_CONFIG';

export class GraphportError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'GraphportError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The export document is not well-formed. Raised before any store mutation.
 */
export class MalformedExportError extends GraphportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MALFORMED_EXPORT', message, details);
    this.name = 'MalformedExportError';
  }
}

/**
 * Store unreachable or credentials rejected.
 */
export class ConnectionError extends GraphportError {
  constructor(
    message: string,
    public readonly uri: string,
    public readonly hints: string[] = []
  ) {
    super('CONNECTION_FAILED', message, { uri });
    this.name = 'ConnectionError';
  }
}

/**
 * Tensor buffers with inconsistent dimensions (ragged rows, edge feature
 * count != edge count, out-of-range indices).
 */
export class ShapeMismatchError extends GraphportError {
  constructor(
    message: string,
    public readonly group: string,
    details?: Record<string, unknown>
  ) {
    super('SHAPE_MISMATCH', message, { group, ...details });
    this.name = 'ShapeMismatchError';
  }
}

export class ConfigError extends GraphportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CONFIG', message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Extract a message from any caught value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
