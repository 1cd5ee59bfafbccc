/**
 * @arch hexagraph.common.errors
 *
 * Error types and codes for hexagraph.
 * All errors raised by the library extend HexagraphError.
 */

/**
 * Base error class for all hexagraph errors.
 */
export class HexagraphError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HexagraphError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Structural errors raised while assembling a graph (dangling edges, reuse of a consumed builder).
 */
export class GraphError extends HexagraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GraphError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends HexagraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Component manifest errors (missing file, YAML or schema failures).
 */
export class ManifestError extends HexagraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ManifestError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends HexagraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Graph assembly (G001-G003)
  MISSING_SOURCE_NODE: 'G001',
  MISSING_TARGET_NODE: 'G002',
  BUILDER_CONSUMED: 'G003',

  // Configuration (C001-C002)
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CONFIG: 'C002',

  // Manifest (M001)
  INVALID_MANIFEST: 'M001',

  // Export (X001)
  UNKNOWN_FORMAT: 'X001',

  // System (S001-S002)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
