import type { ErrorCode } from './errors.js';

/**
 * Body of every non-2xx response.
 */
export interface ApiError {
  code: ErrorCode;
  message: string;
  /**
   * Extra context, e.g. `{ dutyId, dutyType }` for a missing duty or
   * `{ fields: [...] }` with one entry per field that failed schema validation.
   */
  details?: Record<string, unknown>;
}

/** Error envelope: `{ "error": { "code", "message", "details"? } }`. */
export interface ApiErrorResponse {
  error: ApiError;
}

/** Common part of successful mutation responses. */
export interface MutationResult {
  message: string;
  success: true;
}
