export type AppErrorCode =
  | 'LOAD_ERROR'
  | 'VALIDATION_ERROR'
  | 'INVALID_DIFFICULTY'
  | 'INVALID_TRANSITION'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly expose: boolean;

  constructor(
    message: string,
    code: AppErrorCode,
    options?: { cause?: unknown; expose?: boolean },
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.expose = options?.expose ?? code !== 'INTERNAL_ERROR';
    if (options?.cause) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The sentence resource is missing, empty, or malformed, or a tier has no
 * sentences to draw from. Nothing can run without a sentence, so callers
 * treat this as blocking.
 */
export class LoadError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'LOAD_ERROR', { cause: options?.cause, expose: true });
  }
}

export class ValidationError extends AppError {
  public readonly details?: unknown;

  constructor(message: string, details?: unknown, code: AppErrorCode = 'VALIDATION_ERROR') {
    super(message, code, { expose: true });
    this.details = details;
  }
}

export class InvalidDifficultyError extends ValidationError {
  public readonly value: unknown;

  constructor(value: unknown, details?: unknown) {
    super(`Unknown difficulty: ${String(value)}`, details, 'INVALID_DIFFICULTY');
    this.value = value;
  }
}

export class InvalidTransitionError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSITION');
  }
}

export const ensureAppError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, 'INTERNAL_ERROR', { cause: error, expose: false });
  }

  return new AppError('Unknown error', 'INTERNAL_ERROR');
};
