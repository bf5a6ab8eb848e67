import { z } from 'zod'

const TimestampMsSchema = z.number().int().min(0)
const PageSchema = z.number().int().min(0)

export const OFFLINE_SESSION_ID_PREFIX = 'offline_'

export const ReadingSessionSchema = z.object({
    id: z.string().min(1),
    libraryEntryId: z.string().min(1),
    startTime: TimestampMsSchema,
    endTime: TimestampMsSchema.nullable(),
    startPage: PageSchema,
    endPage: PageSchema.nullable(),
    totalPauseDurationMs: z.number().int().min(0),
    pausedAt: TimestampMsSchema.nullable(),
    focusScore: z.number().int().min(0).max(100).nullable(),
    isOffline: z.boolean(),
    needsSync: z.boolean(),
})

export type ReadingSession = z.infer<typeof ReadingSessionSchema>

export const SessionRewardsSchema = z.object({
    coinsEarned: z.number().int(),
    expEarned: z.number().int(),
    bonusCoins: z.number().int(),
    bonusExp: z.number().int(),
})

export type SessionRewards = z.infer<typeof SessionRewardsSchema>

export const ReadingSessionResultSchema = z.object({
    sessionId: z.string().min(1),
    durationSeconds: z.number().int().min(0),
    pagesRead: z.number().int(),
    streakDays: z.number().int().min(0),
    rewards: SessionRewardsSchema,
    levelUp: z.boolean(),
    newLevel: z.number().int().nullable(),
    badgesEarned: z.array(z.string()),
    /** True while this is a local estimate awaiting the authority's result. */
    isOffline: z.boolean(),
})

export type ReadingSessionResult = z.infer<typeof ReadingSessionResultSchema>

export const PendingSyncRecordSchema = z.object({
    session: ReadingSessionSchema,
    idempotencyKey: z.string().min(1),
    enqueuedAt: TimestampMsSchema,
    // Server id issued by the first phase of an offline replay, so a retry skips straight to finalize
    remoteSessionId: z.string().min(1).nullable(),
    attempts: z.number().int().min(0),
    lastError: z.string().nullable(),
})

export type PendingSyncRecord = z.infer<typeof PendingSyncRecordSchema>

export type SessionHistoryFilter = {
    libraryEntryId?: string
    startDate?: Date
    endDate?: Date
    page?: number
    pageSize?: number
}

export type SessionPhase = 'idle' | 'starting' | 'active' | 'paused' | 'ending'

export function isOfflineSessionId(id: string): boolean {
    return id.startsWith(OFFLINE_SESSION_ID_PREFIX)
}

export function pagesReadOf(session: Pick<ReadingSession, 'startPage' | 'endPage'>): number {
    if (session.endPage === null) {
        return 0
    }
    return Math.max(0, session.endPage - session.startPage)
}
