import type { MutationResult } from './api.js';

/**
 * Duty assignment types.
 * Assignments are created by the rotation process outside this API; the API
 * reads them and toggles their completion state.
 */

export const DUTY_TYPES = ['coffee', 'fridge'] as const;

export type DutyType = (typeof DUTY_TYPES)[number];

/**
 * Duty assignment as returned by the API, joined with its member's identity.
 */
export interface DutyResponse {
  id: number;
  member_id: number;
  username: string;
  /** Falls back to the username when the member has no full name. */
  full_name: string;
  duty_type: DutyType;
  /** ISO-8601 timestamp */
  assigned_at: string;
  cycle_id: number;
  completed: boolean;
  /** ISO-8601 timestamp, null while the duty is open */
  completed_at: string | null;
}

/**
 * Query string for GET /api/duties.
 */
export interface DutyListQuery {
  limit?: number;
}

/**
 * Response for GET /api/duties.
 */
export interface DutyListResponse {
  duties: DutyResponse[];
  total: number;
}

/**
 * Request body for POST /api/duties/complete and /api/duties/uncomplete.
 */
export interface DutyCompletionRequest {
  duty_id: number;
  duty_type: DutyType;
}

/**
 * Response for the completion toggles. Carries the refreshed duty list.
 */
export interface DutyCompletionResponse extends MutationResult {
  duties: DutyResponse[];
}

/**
 * Query string for GET /api/duties/recent.
 */
export interface RecentDutyQuery {
  duty_type: DutyType;
}

/**
 * Response for GET /api/duties/recent.
 */
export interface RecentDutyResponse {
  duty: DutyResponse;
}
