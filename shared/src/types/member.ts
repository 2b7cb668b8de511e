import type { MutationResult } from './api.js';

/**
 * Office member types.
 * Members are never removed; deactivation flips `active` to false.
 */

export interface Member {
  id: number;
  username: string;
  full_name: string | null;
  coffee_drinker: boolean;
  active: boolean;
}

/** Member response shape for API responses */
export type MemberResponse = Member;

/**
 * Request body for POST /api/members.
 */
export interface CreateMemberRequest {
  username: string;
  full_name: string;
  coffee_drinker?: boolean;
}

/**
 * Request body for PUT /api/members.
 * Besides `id`, at least one field must be provided.
 */
export interface UpdateMemberRequest {
  id: number;
  username?: string;
  full_name?: string;
  coffee_drinker?: boolean;
}

/**
 * Request body for DELETE /api/members.
 */
export interface DeactivateMemberRequest {
  id: number;
}

/**
 * Query string for GET /api/members.
 */
export interface MemberListQuery {
  include_inactive?: boolean;
  coffee_drinkers_only?: boolean;
}

/**
 * Response for GET /api/members.
 */
export interface MemberListResponse {
  members: MemberResponse[];
}

/**
 * Response for every roster mutation. Carries the refreshed active roster.
 */
export interface MemberMutationResponse extends MutationResult, MemberListResponse {}
