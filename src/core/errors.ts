/**
 * @fileoverview Recommender error hierarchy
 *
 * Every stage of the pipeline has a degraded-but-available fallback; these
 * errors describe why a fallback was taken, they are rarely thrown to callers.
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

export abstract class MarqueeError extends Error {
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
// CANDIDATE SOURCE ERRORS
// ============================================================================

export type SourceName = 'graph_seed' | 'graph_preference' | 'embedding';

export class SourceUnavailableError extends MarqueeError {
  readonly code = 'SOURCE_UNAVAILABLE';

  constructor(
    readonly source: SourceName,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Source ${source} unavailable: ${message}`);
    this.name = 'SourceUnavailableError';
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

export class EmbeddingMissingError extends MarqueeError {
  readonly code = 'EMBEDDING_MISSING';
  readonly retryable = false;

  constructor(readonly entityIds: readonly string[]) {
    super(`No embedding for ${entityIds.length} entit${entityIds.length === 1 ? 'y' : 'ies'}: ${entityIds.join(', ')}`);
    this.name = 'EmbeddingMissingError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        entityIds: [...this.entityIds],
      },
    };
  }
}

// ============================================================================
// PIPELINE STAGE ERRORS
// ============================================================================

export class FilterVerificationError extends MarqueeError {
  readonly code = 'FILTER_VERIFICATION_FAILED';

  constructor(
    readonly candidateCount: number,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Constraint verification of ${candidateCount} candidates failed: ${message}`);
    this.name = 'FilterVerificationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        candidateCount: this.candidateCount,
        cause: this.cause?.message,
      },
    };
  }
}

export class DiversificationError extends MarqueeError {
  readonly code = 'DIVERSIFICATION_FAILED';
  readonly retryable = false;

  constructor(
    message: string,
    readonly cause?: Error,
  ) {
    super(`Diversification failed: ${message}`);
    this.name = 'DiversificationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type GraphStoreOperation = 'open' | 'query' | 'verify' | 'label' | 'write';

export class GraphStoreError extends MarqueeError {
  readonly code = 'GRAPH_STORE_ERROR';

  constructor(
    readonly operation: GraphStoreOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Graph store ${operation} failed: ${message}`);
    this.name = 'GraphStoreError';
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
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends MarqueeError {
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

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends MarqueeError {
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

export function isMarqueeError(error: unknown): error is MarqueeError {
  return error instanceof MarqueeError;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof MarqueeError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('sqlite_busy') ||
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('timed out')
    );
  }

  return false;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  source: (source: SourceName, cause: unknown) => {
    const error = toError(cause);
    return new SourceUnavailableError(source, isRetryableError(error), error.message, error);
  },

  embeddingMissing: (entityIds: readonly string[]) =>
    new EmbeddingMissingError(entityIds),

  filterVerification: (candidateCount: number, cause: unknown) => {
    const error = toError(cause);
    return new FilterVerificationError(candidateCount, isRetryableError(error), error.message, error);
  },

  diversification: (cause: unknown) => {
    const error = toError(cause);
    return new DiversificationError(error.message, error);
  },

  graphStore: (operation: GraphStoreOperation, message: string, retryable = false, cause?: Error) =>
    new GraphStoreError(operation, retryable, message, cause),

  validation: (field: string, expected: string, received: string) =>
    new ValidationError(field, expected, received),

  config: (key: string, message: string) =>
    new ConfigurationError(key, message),
};
