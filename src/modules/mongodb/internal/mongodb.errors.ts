import {
  MongoNetworkError,
  MongoServerError,
  MongoServerSelectionError,
} from 'mongodb';
import {
  ConflictError,
  NetworkError,
  ServerError,
  UnknownTransportError,
  isDataClientError,
  type DataClientError,
  type DataErrorContext,
} from '../../../lib/errors/DataClientError';

const DUPLICATE_KEY = 11000;

/**
 * Map a thrown driver error onto the transport error family.
 * DataClientErrors (already classified) are returned as-is.
 */
export function toTransportError(
  err: unknown,
  context: DataErrorContext,
): DataClientError {
  if (isDataClientError(err)) return err;

  if (
    err instanceof MongoNetworkError ||
    err instanceof MongoServerSelectionError
  ) {
    return new NetworkError(err.message, context, err);
  }

  if (err instanceof MongoServerError) {
    const ctx: DataErrorContext = { ...context, driverCode: err.code };
    if (err.code === DUPLICATE_KEY) {
      return new ConflictError(err.message, ctx, err);
    }
    return new ServerError(err.message, ctx, err);
  }

  const message =
    err instanceof Error && err.message.length > 0
      ? err.message
      : 'Mongo action failed';
  return new UnknownTransportError(message, context, err);
}
