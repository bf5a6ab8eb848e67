/**
 * HTTP boundary to the reading authority.
 *
 * Nothing here throws for network or HTTP failures: every call resolves to a tagged
 * outcome so the session machine and the sync orchestrator can branch on retryable
 * versus terminal without try/catch.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios'
import type { z } from 'zod'
import {
    ActiveSessionResponseSchema,
    ErrorResponseSchema,
    SessionListResponseSchema,
    SessionResultResponseSchema,
    StartSessionResponseSchema,
    SyncSessionResponseSchema,
    type EndSessionRequest,
    type SessionResponse,
    type SessionResultResponse,
    type StartSessionRequest,
    type SyncSessionRequest,
} from '@readlock/protocol'
import { logger } from '@/ui/logger'
import { normalizePage } from '@/session/sessionStore'
import type { PendingSyncRecord, ReadingSession, ReadingSessionResult, SessionHistoryFilter } from '@/session/types'

export type RemoteTerminalError = 'already-active' | 'session-not-found' | 'unauthorized' | 'validation'

export type RemoteFailure =
    | { status: 'retryable'; reason: string }
    | { status: 'terminal'; error: RemoteTerminalError; message: string }

export type RemoteOutcome<T> =
    | { status: 'ok'; value: T }
    | { status: 'duplicate' }
    | RemoteFailure

export type RemoteSessionHandle = {
    sessionId: string
    startedAt: number
}

export type ReplayOutcome =
    | { status: 'ok'; result: ReadingSessionResult; remoteSessionId: string }
    | { status: 'duplicate' }
    | { status: 'retryable'; reason: string; remoteSessionId: string | null }
    | { status: 'terminal'; error: RemoteTerminalError; message: string }

export interface ReadingRemote {
    createRemote(params: { libraryEntryId: string; startPage: number | null }): Promise<RemoteOutcome<RemoteSessionHandle>>
    finalizeRemote(
        sessionId: string,
        params: { endPage: number; focusScore: number | null },
        opts?: { idempotencyKey?: string },
    ): Promise<RemoteOutcome<ReadingSessionResult>>
    /**
     * Replays a pending record. Offline records go through two phases (create the
     * server-side session from the local snapshot, then finalize it); `onCreated` is
     * awaited between them so the caller can persist the server id first.
     */
    replayRemote(
        record: PendingSyncRecord,
        hooks?: { onCreated?: (remoteSessionId: string) => Promise<void> },
    ): Promise<ReplayOutcome>
    pauseRemote(sessionId: string): Promise<RemoteOutcome<null>>
    resumeRemote(sessionId: string): Promise<RemoteOutcome<null>>
    fetchActiveRemote(): Promise<RemoteOutcome<ReadingSession | null>>
    fetchHistoryRemote(filter?: SessionHistoryFilter): Promise<RemoteOutcome<ReadingSession[]>>
}

type RequestOp = 'create' | 'finalize' | 'sync' | 'other'

export function resultFromWire(wire: SessionResultResponse): ReadingSessionResult {
    return {
        sessionId: wire.session_id,
        durationSeconds: wire.duration,
        pagesRead: wire.pages_read,
        streakDays: wire.streak_days,
        rewards: {
            coinsEarned: wire.rewards.coins_earned,
            expEarned: wire.rewards.exp_earned,
            bonusCoins: wire.rewards.bonus_coins,
            bonusExp: wire.rewards.bonus_exp,
        },
        levelUp: wire.level_up,
        newLevel: wire.new_level,
        badgesEarned: wire.badges_earned,
        isOffline: false,
    }
}

/** Server times without a zone designator are UTC. */
export function parseServerTime(value: string): number {
    return Date.parse(/T[\d:.]+$/.test(value) ? `${value}Z` : value)
}

export function sessionFromWire(wire: SessionResponse, now: number): ReadingSession {
    const pausedAt = wire.paused_at !== null ? parseServerTime(wire.paused_at) : wire.is_paused ? now : null
    return {
        id: wire.id,
        libraryEntryId: wire.user_book_id,
        startTime: parseServerTime(wire.start_time),
        endTime: wire.end_time !== null ? parseServerTime(wire.end_time) : null,
        startPage: wire.start_page,
        endPage: wire.end_page,
        totalPauseDurationMs: wire.total_pause_seconds * 1000,
        pausedAt,
        focusScore: wire.focus_score,
        isOffline: false,
        needsSync: false,
    }
}

export function buildSyncRequest(record: PendingSyncRecord): SyncSessionRequest {
    const session = record.session
    const endTime = session.endTime ?? session.startTime
    return {
        user_book_id: session.libraryEntryId,
        start_time: new Date(session.startTime).toISOString(),
        end_time: new Date(endTime).toISOString(),
        start_page: session.startPage,
        end_page: session.endPage ?? session.startPage,
        ...(session.focusScore !== null ? { focus_score: session.focusScore } : {}),
        total_pause_seconds: Math.floor(session.totalPauseDurationMs / 1000),
        local_id: session.id,
        idempotency_key: record.idempotencyKey,
    }
}

function describeErrorBody(status: number, data: unknown): string {
    const parsed = ErrorResponseSchema.safeParse(data)
    if (!parsed.success) {
        return `HTTP ${status}`
    }
    const detail = parsed.data.detail
    return typeof detail === 'string' ? detail : detail.map((d) => d.msg).join('; ')
}

function describeThrown(error: unknown): string {
    if (axios.isAxiosError(error)) {
        return error.code ? `${error.code}: ${error.message}` : error.message
    }
    return error instanceof Error ? error.message : String(error)
}

export class ApiReadingClient implements ReadingRemote {
    private readonly http: AxiosInstance
    private readonly now: () => number

    constructor(opts: {
        serverUrl: string
        token: string | null
        timeoutMs: number
        http?: AxiosInstance
        now?: () => number
    }) {
        this.now = opts.now ?? Date.now
        this.http = opts.http ?? axios.create()
        this.http.defaults.baseURL = opts.serverUrl
        this.http.defaults.timeout = opts.timeoutMs
        this.http.defaults.validateStatus = () => true
        this.http.defaults.headers.common['Content-Type'] = 'application/json'
        if (opts.token) {
            this.http.defaults.headers.common.Authorization = `Bearer ${opts.token}`
        }
    }

    async createRemote(params: { libraryEntryId: string; startPage: number | null }): Promise<RemoteOutcome<RemoteSessionHandle>> {
        const body: StartSessionRequest = {
            user_book_id: params.libraryEntryId,
            ...(params.startPage !== null ? { start_page: params.startPage } : {}),
        }
        const outcome = await this.send('create', StartSessionResponseSchema, () => this.http.post('/reading/sessions', body))
        if (outcome.status !== 'ok') return outcome
        return {
            status: 'ok',
            value: { sessionId: outcome.value.session_id, startedAt: parseServerTime(outcome.value.started_at) },
        }
    }

    async finalizeRemote(
        sessionId: string,
        params: { endPage: number; focusScore: number | null },
        opts?: { idempotencyKey?: string },
    ): Promise<RemoteOutcome<ReadingSessionResult>> {
        const body: EndSessionRequest = {
            end_page: params.endPage,
            ...(params.focusScore !== null ? { focus_score: params.focusScore } : {}),
        }
        const headers = opts?.idempotencyKey ? { 'Idempotency-Key': opts.idempotencyKey } : undefined
        const outcome = await this.send('finalize', SessionResultResponseSchema, () =>
            this.http.post(`/reading/sessions/${encodeURIComponent(sessionId)}/end`, body, { headers }),
        )
        if (outcome.status !== 'ok') return outcome
        return { status: 'ok', value: resultFromWire(outcome.value) }
    }

    async replayRemote(
        record: PendingSyncRecord,
        hooks?: { onCreated?: (remoteSessionId: string) => Promise<void> },
    ): Promise<ReplayOutcome> {
        const session = record.session
        if (session.endPage === null) {
            return { status: 'terminal', error: 'validation', message: `Session ${session.id} has not ended` }
        }

        let remoteSessionId: string
        if (!session.isOffline) {
            remoteSessionId = session.id
        } else if (record.remoteSessionId) {
            remoteSessionId = record.remoteSessionId
        } else {
            const created = await this.send('sync', SyncSessionResponseSchema, () =>
                this.http.post('/reading/sessions/sync', buildSyncRequest(record), {
                    headers: { 'Idempotency-Key': record.idempotencyKey },
                }),
            )
            if (created.status === 'retryable') return { ...created, remoteSessionId: null }
            if (created.status !== 'ok') return created
            remoteSessionId = created.value.session_id
            logger.debug(`[API] Replayed offline session ${session.id} as ${remoteSessionId}`)
            if (hooks?.onCreated) {
                await hooks.onCreated(remoteSessionId)
            }
        }

        const finalized = await this.finalizeRemote(
            remoteSessionId,
            { endPage: session.endPage, focusScore: session.focusScore },
            { idempotencyKey: record.idempotencyKey },
        )
        if (finalized.status === 'ok') {
            return { status: 'ok', result: finalized.value, remoteSessionId }
        }
        if (finalized.status === 'retryable') {
            return { ...finalized, remoteSessionId: session.isOffline ? remoteSessionId : null }
        }
        return finalized
    }

    async pauseRemote(sessionId: string): Promise<RemoteOutcome<null>> {
        return await this.sendWithoutBody(`/reading/sessions/${encodeURIComponent(sessionId)}/pause`)
    }

    async resumeRemote(sessionId: string): Promise<RemoteOutcome<null>> {
        return await this.sendWithoutBody(`/reading/sessions/${encodeURIComponent(sessionId)}/resume`)
    }

    async fetchActiveRemote(): Promise<RemoteOutcome<ReadingSession | null>> {
        const outcome = await this.send('other', ActiveSessionResponseSchema, () => this.http.get('/reading/sessions/active'))
        if (outcome.status !== 'ok') return outcome
        return { status: 'ok', value: outcome.value ? sessionFromWire(outcome.value, this.now()) : null }
    }

    async fetchHistoryRemote(filter?: SessionHistoryFilter): Promise<RemoteOutcome<ReadingSession[]>> {
        const { page, pageSize } = normalizePage(filter)
        const params: Record<string, string | number> = { page, page_size: pageSize }
        if (filter?.libraryEntryId) params.user_book_id = filter.libraryEntryId
        if (filter?.startDate) params.start_date = filter.startDate.toISOString()
        if (filter?.endDate) params.end_date = filter.endDate.toISOString()

        const outcome = await this.send('other', SessionListResponseSchema, () => this.http.get('/reading/sessions', { params }))
        if (outcome.status !== 'ok') return outcome
        const now = this.now()
        return { status: 'ok', value: outcome.value.items.map((item) => sessionFromWire(item, now)) }
    }

    private async sendWithoutBody(path: string): Promise<RemoteOutcome<null>> {
        const outcome = await this.exchange(() => this.http.post(path))
        if (outcome.status !== 'response') return outcome
        const failure = classifyStatus(outcome.response, 'other')
        return failure ?? { status: 'ok', value: null }
    }

    private async send<S extends z.ZodTypeAny>(
        op: RequestOp,
        schema: S,
        request: () => Promise<AxiosResponse<unknown>>,
    ): Promise<RemoteOutcome<z.output<S>>> {
        const outcome = await this.exchange(request)
        if (outcome.status !== 'response') return outcome

        const failure = classifyStatus(outcome.response, op)
        if (failure) return failure

        const parsed = schema.safeParse(outcome.response.data)
        if (!parsed.success) {
            logger.debugLargeJson(`[API] Malformed ${op} response body:`, outcome.response.data)
            return { status: 'retryable', reason: `malformed ${op} response` }
        }
        return { status: 'ok', value: parsed.data }
    }

    private async exchange(
        request: () => Promise<AxiosResponse<unknown>>,
    ): Promise<{ status: 'response'; response: AxiosResponse<unknown> } | { status: 'retryable'; reason: string }> {
        try {
            return { status: 'response', response: await request() }
        } catch (error) {
            // Timeouts, DNS failures, refused connections: the authority is unreachable.
            const reason = describeThrown(error)
            logger.debug(`[API] Request failed: ${reason}`)
            return { status: 'retryable', reason }
        }
    }
}

/**
 * Maps a non-2xx response to a failure outcome; null for success.
 * 409 means "already recorded" for replays and "another session is active" for creates.
 */
export function classifyStatus(
    response: Pick<AxiosResponse<unknown>, 'status' | 'data'>,
    op: RequestOp,
): { status: 'duplicate' } | RemoteFailure | null {
    const status = response.status
    if (status >= 200 && status < 300) {
        return null
    }
    if (status === 409) {
        if (op === 'create') {
            return { status: 'terminal', error: 'already-active', message: describeErrorBody(status, response.data) }
        }
        return { status: 'duplicate' }
    }
    if (status === 408 || status === 429 || status >= 500) {
        return { status: 'retryable', reason: `HTTP ${status}` }
    }
    if (status === 404) {
        return { status: 'terminal', error: 'session-not-found', message: describeErrorBody(status, response.data) }
    }
    if (status === 401 || status === 403) {
        return { status: 'terminal', error: 'unauthorized', message: describeErrorBody(status, response.data) }
    }
    return { status: 'terminal', error: 'validation', message: describeErrorBody(status, response.data) }
}
