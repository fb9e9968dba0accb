import { AppError } from './AppError';

/**
 * The two error families a DataClient may raise.
 * - transport: the data source rejected or failed to serve the request
 * - format: returned data could not be interpreted
 */
export type DataErrorKind = 'transport' | 'format';

export type TransportErrorCode =
  | 'BAD_REQUEST'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'UNKNOWN';

/**
 * Data operation names used in error context.
 * Open string union so clients can report their own operations.
 */
export type DataOperation =
  | 'create'
  | 'read'
  | 'readAll'
  | 'update'
  | 'delete'
  | 'count'
  | 'aggregate'
  | 'connect'
  | (string & {});

/**
 * Structured context attached to client errors.
 * Never carries full documents.
 */
export interface DataErrorContext {
  readonly operation: DataOperation;
  readonly entityType?: string;
  readonly collection?: string;
  /** Driver-level error code, e.g. MongoServerError.code. */
  readonly driverCode?: number | string;
}

export abstract class DataClientError extends AppError {
  public abstract readonly kind: DataErrorKind;
  public readonly context?: Readonly<DataErrorContext>;

  protected constructor(
    message: string,
    code: string,
    context?: DataErrorContext,
    cause?: unknown,
  ) {
    super(message, code, cause);
    this.context = context ? Object.freeze({ ...context }) : undefined;
  }

  /** Human-readable summary for logs. */
  public summary(): string {
    const ctx = this.context;
    const parts: string[] = [`kind=${this.kind}`, `code=${this.code}`];
    if (ctx) {
      parts.push(`op=${ctx.operation}`);
      if (ctx.entityType) parts.push(`entity=${ctx.entityType}`);
      if (ctx.collection) parts.push(`coll=${ctx.collection}`);
      if (ctx.driverCode !== undefined) {
        parts.push(`driverCode=${String(ctx.driverCode)}`);
      }
    }
    return `${this.name}: ${this.message} (${parts.join(' ')})`;
  }

  /** JSON-safe representation for structured logs. */
  public toJSON(): {
    name: string;
    kind: DataErrorKind;
    code: string;
    message: string;
    context?: DataErrorContext;
    cause?: { name: string; message: string };
  } {
    const c = this.cause;
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      context: this.context,
      cause:
        c instanceof Error ? { name: c.name, message: c.message } : undefined,
    };
  }
}

/* ---------------------------
   Transport family
   --------------------------- */

export class TransportError extends DataClientError {
  public readonly kind = 'transport' as const;
  public readonly code: TransportErrorCode;
  /** HTTP status this failure corresponds to. */
  public readonly statusCode: number;

  constructor(
    message: string,
    code: TransportErrorCode,
    statusCode: number,
    context?: DataErrorContext,
    cause?: unknown,
  ) {
    super(message, code, context, cause);
    this.name = 'TransportError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class BadRequestError extends TransportError {
  constructor(message: string, context?: DataErrorContext, cause?: unknown) {
    super(message, 'BAD_REQUEST', 400, context, cause);
    this.name = 'BadRequestError';
  }
}

export class UnauthorizedError extends TransportError {
  constructor(message: string, context?: DataErrorContext, cause?: unknown) {
    super(message, 'UNAUTHORIZED', 401, context, cause);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends TransportError {
  constructor(message: string, context?: DataErrorContext, cause?: unknown) {
    super(message, 'FORBIDDEN', 403, context, cause);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends TransportError {
  constructor(message: string, context?: DataErrorContext, cause?: unknown) {
    super(message, 'NOT_FOUND', 404, context, cause);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends TransportError {
  constructor(message: string, context?: DataErrorContext, cause?: unknown) {
    super(message, 'CONFLICT', 409, context, cause);
    this.name = 'ConflictError';
  }
}

export class ServerError extends TransportError {
  constructor(message: string, context?: DataErrorContext, cause?: unknown) {
    super(message, 'SERVER_ERROR', 500, context, cause);
    this.name = 'ServerError';
  }
}

export class NetworkError extends TransportError {
  constructor(message: string, context?: DataErrorContext, cause?: unknown) {
    super(message, 'NETWORK_ERROR', 503, context, cause);
    this.name = 'NetworkError';
  }
}

export class UnknownTransportError extends TransportError {
  constructor(message: string, context?: DataErrorContext, cause?: unknown) {
    super(message, 'UNKNOWN', 500, context, cause);
    this.name = 'UnknownTransportError';
  }
}

/* ---------------------------
   Format family
   --------------------------- */

export interface FormatIssue {
  path: string;
  message: string;
  keyword?: string;
}

export class DataFormatError extends DataClientError {
  public readonly kind = 'format' as const;
  public readonly issues: readonly FormatIssue[];

  constructor(
    message: string,
    issues: FormatIssue[] = [],
    context?: DataErrorContext,
    cause?: unknown,
  ) {
    super(message, 'FORMAT_ERROR', context, cause);
    this.name = 'DataFormatError';
    this.issues = Object.freeze([...issues]);
  }
}

/* ---------------------------
   Guards
   --------------------------- */

export function isDataClientError(err: unknown): err is DataClientError {
  return err instanceof DataClientError;
}

export function isTransportError(err: unknown): err is TransportError {
  return err instanceof TransportError;
}

export function isFormatError(err: unknown): err is DataFormatError {
  return err instanceof DataFormatError;
}
