/**
 * Base for every error raised by this package.
 * `code` is a stable machine-readable identifier; `cause` keeps the original failure.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly cause?: unknown;

  constructor(message: string, code = 'APP_ERROR', cause?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.cause = cause;
  }
}
