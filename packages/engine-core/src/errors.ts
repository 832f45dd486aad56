import { EngineError } from './types.js';

/** Which side of a dimension a failed check refers to. */
export interface ErrorBound {
  min?: number;
  max?: number;
  allowed?: string[];
}

export interface EngineFailureOptions {
  detail?: string;
  dimension?: string;
  party_id?: string;
  bound?: ErrorBound;
  cause?: Error;
}

/** Base class for every error the engine throws. */
export class EngineFailure extends Error {
  readonly code: EngineError;
  readonly detail?: string;
  readonly dimension?: string;
  readonly party_id?: string;
  readonly bound?: ErrorBound;

  constructor(code: EngineError, message: string, options?: EngineFailureOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'EngineFailure';
    this.code = code;
    this.detail = options?.detail;
    this.dimension = options?.dimension;
    this.party_id = options?.party_id;
    this.bound = options?.bound;
  }

  /** Structured form for logs and API responses. */
  toJSON(): {
    error: EngineError;
    message: string;
    detail?: string;
    dimension?: string;
    party_id?: string;
    bound?: ErrorBound;
  } {
    return {
      error: this.code,
      message: this.message,
      ...(this.detail !== undefined && { detail: this.detail }),
      ...(this.dimension !== undefined && { dimension: this.dimension }),
      ...(this.party_id !== undefined && { party_id: this.party_id }),
      ...(this.bound !== undefined && { bound: this.bound }),
    };
  }
}

/** Bad input: unknown dimension, out-of-range value, malformed profile or issue space. */
export class ValidationError extends EngineFailure {
  constructor(code: EngineError, message: string, options?: EngineFailureOptions) {
    super(code, message, options);
    this.name = 'ValidationError';
  }
}

/** Missing or inconsistent thresholds. Raised when an engine is constructed. */
export class ConfigurationError extends EngineFailure {
  constructor(message: string, options?: EngineFailureOptions) {
    super(EngineError.INVALID_CONFIG, message, options);
    this.name = 'ConfigurationError';
  }
}

/** Fatal to a single simulation run. */
export class SimulationError extends EngineFailure {
  constructor(code: EngineError, message: string, options?: EngineFailureOptions) {
    super(code, message, options);
    this.name = 'SimulationError';
  }
}

/** Result shape of the validate* helpers: the first problem found. */
export interface ValidationIssue {
  error: EngineError;
  detail: string;
  dimension?: string;
  party_id?: string;
  bound?: ErrorBound;
}

/** Throw a ValidationError for an issue returned by a validate* helper. */
export function raise(issue: ValidationIssue): never {
  throw new ValidationError(issue.error, `${issue.error}: ${issue.detail}`, issue);
}
