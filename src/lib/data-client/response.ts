import { randomUUID } from 'node:crypto';
import type { ResponseMetadata, SuccessApiResponse } from './types';

/** Project the payload out of a client response. */
export function unwrap<D>(response: SuccessApiResponse<D>): D {
  return response.data;
}

/** Wrap a payload the way clients report success. */
export function success<D>(
  data: D,
  metadata: Partial<ResponseMetadata> = {},
): SuccessApiResponse<D> {
  return {
    status: 'success',
    data,
    metadata: {
      requestId: metadata.requestId ?? randomUUID(),
      timestamp: metadata.timestamp ?? new Date(),
    },
  };
}
