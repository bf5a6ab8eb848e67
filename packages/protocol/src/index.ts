export {
  ActiveSessionResponseSchema,
  EndSessionRequestSchema,
  ErrorResponseSchema,
  SessionListResponseSchema,
  SessionResponseSchema,
  SessionResultResponseSchema,
  SessionRewardsResponseSchema,
  StartSessionRequestSchema,
  StartSessionResponseSchema,
  SyncSessionRequestSchema,
  SyncSessionResponseSchema,
  type ActiveSessionResponse,
  type EndSessionRequest,
  type ErrorResponse,
  type SessionListResponse,
  type SessionResponse,
  type SessionResultResponse,
  type SessionRewardsResponse,
  type StartSessionRequest,
  type StartSessionResponse,
  type SyncSessionRequest,
  type SyncSessionResponse,
} from './readingSessions.js';

export {
  LOCK_STATUSES,
  LockStatusEventSchema,
  LockStatusSchema,
  type LockStatus,
  type LockStatusEvent,
} from './lockStatus.js';
