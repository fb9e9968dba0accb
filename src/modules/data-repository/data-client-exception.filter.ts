import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  DataClientError,
  isFormatError,
  isTransportError,
  type FormatIssue,
} from '../../lib/errors/DataClientError';

export interface DataClientErrorBody {
  statusCode: number;
  error: string;
  message: string;
  details?: FormatIssue[];
}

/** Status for a client error: transport errors carry their own, format errors are 502. */
export function statusForDataClientError(err: DataClientError): number {
  if (isTransportError(err)) return err.statusCode;
  return HttpStatus.BAD_GATEWAY;
}

export function toDataClientErrorBody(
  err: DataClientError,
): DataClientErrorBody {
  const body: DataClientErrorBody = {
    statusCode: statusForDataClientError(err),
    error: err.code,
    message: err.message,
  };
  if (isFormatError(err) && err.issues.length > 0) {
    body.details = [...err.issues];
  }
  return body;
}

/**
 * Maps DataClientError rejections coming out of repositories to HTTP responses.
 * Register with app.useGlobalFilters(new DataClientExceptionFilter()).
 */
@Catch(DataClientError)
export class DataClientExceptionFilter
  implements ExceptionFilter<DataClientError>
{
  private readonly logger = new Logger(DataClientExceptionFilter.name);

  catch(exception: DataClientError, host: ArgumentsHost): void {
    const body = toDataClientErrorBody(exception);
    if (body.statusCode >= 500) {
      this.logger.error(exception.summary());
    } else {
      this.logger.warn(exception.summary());
    }

    const res = host.switchToHttp().getResponse<Response>();
    res.status(body.statusCode).json(body);
  }
}
