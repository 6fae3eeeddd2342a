export class SqlWeaveError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'SqlWeaveError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when a builder produces a template the compiler cannot resolve.
 * This is a bug in the builder, never a problem with caller input.
 */
export class InvariantViolationError extends SqlWeaveError {
  constructor(message: string, public template?: string, cause?: Error) {
    super(message, 'INVARIANT_VIOLATION', cause);
    this.name = 'InvariantViolationError';
  }
}

export class UnsupportedFlavorError extends SqlWeaveError {
  constructor(public flavor: string, cause?: Error) {
    super(`Unsupported SQL flavor: ${flavor}`, 'UNSUPPORTED_FLAVOR', cause);
    this.name = 'UnsupportedFlavorError';
  }
}

export class ValidationError extends SqlWeaveError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}
