/**
 * @office-duties/shared
 *
 * Wire types shared by the server and its clients: request/response shapes
 * for members and duty assignments, and the API error envelope.
 */

export type { ApiError, ApiErrorResponse, MutationResult } from './types/api.js';
export type { ErrorCode } from './types/errors.js';

// Members
export type {
  Member,
  MemberResponse,
  CreateMemberRequest,
  UpdateMemberRequest,
  DeactivateMemberRequest,
  MemberListQuery,
  MemberListResponse,
  MemberMutationResponse,
} from './types/member.js';

// Duties
export type {
  DutyType,
  DutyResponse,
  DutyListQuery,
  DutyListResponse,
  DutyCompletionRequest,
  DutyCompletionResponse,
  RecentDutyQuery,
  RecentDutyResponse,
} from './types/duty.js';
export { DUTY_TYPES } from './types/duty.js';
