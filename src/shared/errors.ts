/**
 * Error taxonomy shared by the store, the pipeline and the outer surfaces.
 * Every error carries a stable `code` and the HTTP status the API maps it to.
 */
export class FinpipeError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/** Malformed inputs, raised before anything is written. */
export class ValidationError extends FinpipeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'validation_error', 400);
    this.issues = issues;
  }
}

export class NotFoundError extends FinpipeError {
  constructor(message: string) {
    super(message, 'not_found', 404);
  }
}

/** The caller's role may not take this action. */
export class ForbiddenError extends FinpipeError {
  constructor(message: string) {
    super(message, 'forbidden', 403);
  }
}

/**
 * A conditional status update matched zero rows, or the target is owned by
 * another actor. Never retried automatically.
 */
export class ConflictError extends FinpipeError {
  readonly currentStatus: string | null;

  constructor(message: string, currentStatus: string | null = null) {
    super(message, 'conflict', 409);
    this.currentStatus = currentStatus;
  }
}

/** A step could not run or its implementation raised; `code` is what gets recorded. */
export class StepExecutionError extends FinpipeError {
  readonly stepName: string;

  constructor(stepName: string, code: string, message: string) {
    super(message, code, 500);
    this.stepName = stepName;
  }
}

export function isFinpipeError(err: unknown): err is FinpipeError {
  return err instanceof FinpipeError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const MAX_ERROR_MESSAGE = 2000;

/** Stable short code for a failure: the error's own string `code`, else its class name. */
export function errorCode(err: unknown): string {
  if (err instanceof Error) {
    if ('code' in err && typeof err.code === 'string' && err.code.length > 0) return err.code;
    return err.name || 'Error';
  }
  return 'UnknownError';
}

/** Message stored on failed rows, capped at 2000 characters. */
export function storedErrorMessage(err: unknown): string {
  return errorMessage(err).slice(0, MAX_ERROR_MESSAGE);
}
