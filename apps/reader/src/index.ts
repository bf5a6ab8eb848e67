export {
    ApiReadingClient,
    classifyStatus,
    type ReadingRemote,
    type RemoteFailure,
    type RemoteOutcome,
    type RemoteSessionHandle,
    type RemoteTerminalError,
    type ReplayOutcome,
} from '@/api/apiReading'
export { configuration, type Configuration } from '@/configuration'
export { LockEventChannel, parseLockStatusEvent } from '@/lock/lockEventChannel'
export { NoopPhoneLock, type PhoneLockController } from '@/lock/phoneLock'
export { createReadingService, ReadingService, type ReadingServiceEvents, type ReadingServiceOptions } from '@/readingService'
export { DEFAULT_REWARD_RATES, estimateRewards, estimateSessionResult, type RewardRates } from '@/rewards/estimateRewards'
export { elapsedSeconds } from '@/session/elapsed'
export {
    ReadingSessionMachine,
    type EndSessionParams,
    type SessionMachineEvents,
    type SessionMachineOptions,
    type StartSessionParams,
} from '@/session/sessionMachine'
export { FileSessionStore, type SessionStore } from '@/session/sessionStore'
export {
    isOfflineSessionId,
    type PendingSyncRecord,
    type ReadingSession,
    type ReadingSessionResult,
    type SessionHistoryFilter,
    type SessionPhase,
    type SessionRewards,
} from '@/session/types'
export { deriveIdempotencyKey } from '@/sync/idempotencyKey'
export { SyncOrchestrator, type DrainSummary, type SyncOrchestratorEvents, type SyncTrigger } from '@/sync/syncOrchestrator'
export { ReadingError, type ReadingFailure, type ReadingFailureCode, type ReadingResult } from '@/utils/errors'
