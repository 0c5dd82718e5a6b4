import type { ColumnWriteResponse } from '../collaborators';
import { WriteResponseError } from '../errors';

export const WRITE_RESPONSE_SUCCESS = 0;
export const WRITE_RESPONSE_PARTIAL = 1;
export const WRITE_RESPONSE_FAILURE = 2;

/** Maps a column-write response to null on success, or the error describing the failure. */
export function interpretWriteResponse(response: ColumnWriteResponse): WriteResponseError | null {
  const { code, message } = response;
  switch (code) {
    case WRITE_RESPONSE_SUCCESS:
      return null;
    case WRITE_RESPONSE_PARTIAL:
      return new WriteResponseError(`write failed, code: ${code}, partial write failure`, code, message);
    case WRITE_RESPONSE_FAILURE:
      return new WriteResponseError(`write failed, code: ${code}, write failure`, code, message);
    default:
      return new WriteResponseError(`unexpected response code: ${code}`, code, message);
  }
}
