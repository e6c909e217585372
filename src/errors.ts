/**
 * Structured error types for the merge tooling
 *
 * Provides type-safe error handling with machine-readable error codes
 * and structured error details for logging.
 *
 * Collisions are not errors: mergers report them as skip diagnostics.
 */

export class MixinError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MixinError';
  }
}

/**
 * Caller-level programming error, e.g. merging into a missing primary
 */
export class PreconditionError extends MixinError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PRECONDITION_FAILED', details);
    this.name = 'PreconditionError';
  }
}

export class ValidationError extends MixinError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends MixinError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class SpecLoadError extends MixinError {
  constructor(message: string, specPath: string, cause?: string) {
    super(message, 'SPEC_LOAD_ERROR', cause ? { specPath, cause } : { specPath });
    this.name = 'SpecLoadError';
  }
}

export class CollisionCountError extends MixinError {
  constructor(expected: number, actual: number) {
    super(
      `Expected ${expected} skipped entries but the merge skipped ${actual}`,
      'COLLISION_COUNT_MISMATCH',
      { expected, actual }
    );
    this.name = 'CollisionCountError';
  }
}

/**
 * Helper function to check if an error is a MixinError
 */
export function isMixinError(error: unknown): error is MixinError {
  return error instanceof MixinError;
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isMixinError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}
