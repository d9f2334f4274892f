/**
 * @fileoverview World model error hierarchy
 *
 * Storage and loader failures travel as typed errors inside `Result` values
 * until the engine facade turns them into empty results.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class WorldModelError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'read' | 'write' | 'lock' | 'migrate' | 'query';

export class StorageError extends WorldModelError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// GRAPH LOAD ERRORS
// ============================================================================

export type GraphLoadSource = 'nodes' | 'edges' | 'spans' | 'loops' | 'stats';

/**
 * Raised when the mechanism graph cannot be read. Callers abort the current
 * operation; a partially loaded graph is never used.
 */
export class GraphLoadError extends WorldModelError {
  readonly code = 'GRAPH_LOAD_ERROR';

  constructor(
    readonly source: GraphLoadSource,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Graph load (${source}) failed: ${message}`);
    this.name = 'GraphLoadError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        source: this.source,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends WorldModelError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

/**
 * A mechanism node whose `kind:refId` does not resolve to a framework entity,
 * or an abstract node without a label.
 */
export class AnchorValidationError extends WorldModelError {
  readonly code = 'ANCHOR_VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly nodeId: string,
    readonly ref: string,
    readonly reason: string,
  ) {
    super(`Mechanism node ${nodeId} (${ref}) is not anchored: ${reason}`);
    this.name = 'AnchorValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        nodeId: this.nodeId,
        ref: this.ref,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// SCHEMA ERRORS
// ============================================================================

export class SchemaError extends WorldModelError {
  readonly code = 'SCHEMA_ERROR';
  readonly retryable = false;

  constructor(
    readonly schemaType: string,
    readonly expectedVersion: number,
    readonly actualVersion: number,
  ) {
    super(`Schema version mismatch for ${schemaType}: expected v${expectedVersion}, got v${actualVersion}`);
    this.name = 'SchemaError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        schemaType: this.schemaType,
        expectedVersion: this.expectedVersion,
        actualVersion: this.actualVersion,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends WorldModelError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isWorldModelError(error: unknown): error is WorldModelError {
  return error instanceof WorldModelError;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof WorldModelError) {
    return error.retryable;
  }

  // SQLite lock contention clears on its own
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return message.includes('sqlite_busy') || message.includes('database is locked');
  }

  return false;
}

export function isValidationError(error: unknown): error is ValidationError | AnchorValidationError {
  return error instanceof ValidationError || error instanceof AnchorValidationError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  storage: (operation: StorageOperation, message: string, retryable = false, cause?: Error) =>
    new StorageError(operation, retryable, message, cause),

  graphLoad: (source: GraphLoadSource, cause: unknown) => {
    const error = toError(cause);
    return new GraphLoadError(source, isRetryableError(error), error.message, error);
  },

  validation: (field: string, expected: string, received: string) =>
    new ValidationError(field, expected, received),

  anchor: (nodeId: string, ref: string, reason: string) =>
    new AnchorValidationError(nodeId, ref, reason),

  schema: (type: string, expected: number, actual: number) =>
    new SchemaError(type, expected, actual),

  config: (key: string, message: string) =>
    new ConfigurationError(key, message),
};
