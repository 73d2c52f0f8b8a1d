/**
 * IngestionError
 *
 * Base error class for ingestion failures.
 */
export class IngestionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IngestionError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create IngestionError from unknown error with context
   */
  static fromError(context: string, error: unknown): IngestionError {
    return new IngestionError(
      `${context}: ${IngestionError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * DocumentNotFoundError
 *
 * The input file to ingest does not exist.
 */
export class DocumentNotFoundError extends IngestionError {
  constructor(public readonly filePath: string) {
    super(`Document not found: ${filePath}`);
    this.name = 'DocumentNotFoundError';
  }
}

/**
 * StoreError
 *
 * Chunk store operation failed. Only transient failures are retried.
 */
export class StoreError extends IngestionError {
  constructor(
    message: string,
    public readonly transient: boolean,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'StoreError';
  }

  static fromError(
    context: string,
    error: unknown,
    transient = false,
  ): StoreError {
    return new StoreError(
      `${context}: ${IngestionError.getErrorMessage(error)}`,
      transient,
      { cause: error },
    );
  }

  static isTransient(error: unknown): boolean {
    return error instanceof StoreError && error.transient;
  }
}

/**
 * InvalidStateTransitionError
 *
 * A document state change that the lifecycle does not allow.
 */
export class InvalidStateTransitionError extends IngestionError {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid document state transition: ${from} -> ${to}`);
    this.name = 'InvalidStateTransitionError';
  }
}

/**
 * ConfigError
 *
 * Ingestion configuration failed validation.
 */
export class ConfigError extends IngestionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Build the error thrown at cancellation checkpoints.
 */
export function createAbortError(message: string): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
