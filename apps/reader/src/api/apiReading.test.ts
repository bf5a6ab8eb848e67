import axios, { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { PendingSyncRecord, ReadingSession } from '@/session/types'
import { ApiReadingClient, buildSyncRequest, classifyStatus, parseServerTime, sessionFromWire } from './apiReading'

function reply(status: number, data: unknown): AxiosResponse<unknown> {
    return { status, data, statusText: '', headers: {}, config: { headers: new AxiosHeaders() } }
}

const resultBody = {
    session_id: 'srv_9',
    duration: 540,
    pages_read: 15,
    streak_days: 4,
    rewards: { coins_earned: 9, exp_earned: 75, bonus_coins: 5, streak_bonus: true },
    level_up: true,
    new_level: 7,
}

// Stored-session body the authority returns from the sync route.
const storedSessionBody = {
    id: 'srv_9',
    user_id: 'user-1',
    user_book_id: 'book-1',
    start_time: '2026-03-01T09:00:00',
    end_time: null,
    start_page: 10,
    end_page: null,
    duration: 0,
    focus_score: null,
    is_active: true,
    is_paused: false,
    paused_at: null,
    total_pause_seconds: 61,
}

const offlineSession: ReadingSession = {
    id: 'offline_1f0c',
    libraryEntryId: 'book-1',
    startTime: Date.parse('2026-03-01T09:00:00.000Z'),
    endTime: Date.parse('2026-03-01T09:10:00.000Z'),
    startPage: 10,
    endPage: 25,
    totalPauseDurationMs: 61_500,
    pausedAt: null,
    focusScore: 85,
    isOffline: true,
    needsSync: true,
}

function record(overrides: Partial<PendingSyncRecord> = {}): PendingSyncRecord {
    return {
        session: offlineSession,
        idempotencyKey: 'key-offline_1f0c',
        enqueuedAt: offlineSession.startTime,
        remoteSessionId: null,
        attempts: 0,
        lastError: null,
        ...overrides,
    }
}

function setup() {
    const http = axios.create()
    const client = new ApiReadingClient({
        serverUrl: 'https://reading.test/v1',
        token: 'test-token',
        timeoutMs: 15_000,
        http,
        now: () => Date.parse('2026-03-01T12:00:00.000Z'),
    })
    const post = vi.spyOn(http, 'post')
    const get = vi.spyOn(http, 'get')
    return { http, client, post, get }
}

describe('ApiReadingClient', () => {
    afterEach(() => {
        vi.restoreAllMocks()
    })

    it('configures the instance for the authority', () => {
        const { http } = setup()

        expect(http.defaults.baseURL).toBe('https://reading.test/v1')
        expect(http.defaults.timeout).toBe(15_000)
        expect(http.defaults.headers.common.Authorization).toBe('Bearer test-token')
        expect(http.defaults.validateStatus?.(503)).toBe(true)
    })

    it('creates a session', async () => {
        const { client, post } = setup()
        post.mockResolvedValueOnce(reply(201, { session_id: 'srv_1', started_at: '2026-03-01T09:00:00.000Z' }))

        const outcome = await client.createRemote({ libraryEntryId: 'book-1', startPage: 12 })

        expect(outcome).toEqual({ status: 'ok', value: { sessionId: 'srv_1', startedAt: Date.parse('2026-03-01T09:00:00.000Z') } })
        expect(post).toHaveBeenCalledWith('/reading/sessions', { user_book_id: 'book-1', start_page: 12 })
    })

    it('reports a 409 on create as an already active session', async () => {
        const { client, post } = setup()
        post.mockResolvedValueOnce(reply(409, { detail: 'User already has an active reading session' }))

        expect(await client.createRemote({ libraryEntryId: 'book-1', startPage: null })).toEqual({
            status: 'terminal',
            error: 'already-active',
            message: 'User already has an active reading session',
        })
        expect(post).toHaveBeenCalledWith('/reading/sessions', { user_book_id: 'book-1' })
    })

    it('maps the authority result', async () => {
        const { client, post } = setup()
        post.mockResolvedValueOnce(reply(200, resultBody))

        const outcome = await client.finalizeRemote('srv_9', { endPage: 25, focusScore: 85 })

        expect(outcome).toEqual({
            status: 'ok',
            value: {
                sessionId: 'srv_9',
                durationSeconds: 540,
                pagesRead: 15,
                streakDays: 4,
                rewards: { coinsEarned: 9, expEarned: 75, bonusCoins: 5, bonusExp: 0 },
                levelUp: true,
                newLevel: 7,
                badgesEarned: [],
                isOffline: false,
            },
        })
        expect(post).toHaveBeenCalledWith('/reading/sessions/srv_9/end', { end_page: 25, focus_score: 85 }, { headers: undefined })
    })

    it('classifies failed finalize calls', async () => {
        const { client, post } = setup()
        post
            .mockResolvedValueOnce(reply(404, { detail: 'Reading session not found' }))
            .mockResolvedValueOnce(reply(503, 'upstream unavailable'))
            .mockResolvedValueOnce(reply(422, { detail: [{ msg: 'end_page must be >= 0', loc: ['body', 'end_page'] }, { msg: 'focus_score too high' }] }))
            .mockResolvedValueOnce(reply(200, { session_id: 'srv_9' }))
            .mockResolvedValueOnce(reply(409, { detail: 'Session already ended' }))
            .mockResolvedValueOnce(reply(401, {}))
            .mockRejectedValueOnce(new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED'))

        const params = { endPage: 1, focusScore: null }
        expect(await client.finalizeRemote('srv_9', params)).toEqual({ status: 'terminal', error: 'session-not-found', message: 'Reading session not found' })
        expect(await client.finalizeRemote('srv_9', params)).toEqual({ status: 'retryable', reason: 'HTTP 503' })
        expect(await client.finalizeRemote('srv_9', params)).toEqual({
            status: 'terminal',
            error: 'validation',
            message: 'end_page must be >= 0; focus_score too high',
        })
        expect(await client.finalizeRemote('srv_9', params)).toEqual({ status: 'retryable', reason: 'malformed finalize response' })
        expect(await client.finalizeRemote('srv_9', params)).toEqual({ status: 'duplicate' })
        expect(await client.finalizeRemote('srv_9', params)).toEqual({ status: 'terminal', error: 'unauthorized', message: 'HTTP 401' })
        expect(await client.finalizeRemote('srv_9', params)).toEqual({ status: 'retryable', reason: 'ECONNABORTED: timeout of 15000ms exceeded' })
    })

    describe('replayRemote', () => {
        it('creates the offline session, reports its id, then finalizes it', async () => {
            const { client, post } = setup()
            post.mockResolvedValueOnce(reply(200, storedSessionBody)).mockResolvedValueOnce(reply(200, resultBody))
            const onCreated = vi.fn(async (_remoteSessionId: string) => {})

            const outcome = await client.replayRemote(record(), { onCreated })

            expect(outcome).toMatchObject({ status: 'ok', remoteSessionId: 'srv_9', result: { sessionId: 'srv_9', durationSeconds: 540 } })
            expect(onCreated).toHaveBeenCalledWith('srv_9')
            expect(post).toHaveBeenNthCalledWith(1, '/reading/sessions/sync', buildSyncRequest(record()), {
                headers: { 'Idempotency-Key': 'key-offline_1f0c' },
            })
            expect(post).toHaveBeenNthCalledWith(2, '/reading/sessions/srv_9/end', { end_page: 25, focus_score: 85 }, {
                headers: { 'Idempotency-Key': 'key-offline_1f0c' },
            })
        })

        it('accepts a sync reply that only names the session id', async () => {
            const { client, post } = setup()
            post.mockResolvedValueOnce(reply(201, { session_id: 'srv_4' })).mockResolvedValueOnce(reply(200, { ...resultBody, session_id: 'srv_4' }))

            expect(await client.replayRemote(record())).toMatchObject({ status: 'ok', remoteSessionId: 'srv_4', result: { sessionId: 'srv_4' } })
        })

        it('keeps the record retryable when the sync reply carries no id', async () => {
            const { client, post } = setup()
            post.mockResolvedValueOnce(reply(200, { user_book_id: 'book-1' }))

            expect(await client.replayRemote(record())).toEqual({ status: 'retryable', reason: 'malformed sync response', remoteSessionId: null })
            expect(post).toHaveBeenCalledTimes(1)
        })

        it('goes straight to finalize once the server id is known', async () => {
            const { client, post } = setup()
            post.mockResolvedValueOnce(reply(200, resultBody))

            await client.replayRemote(record({ remoteSessionId: 'srv_9' }))

            expect(post).toHaveBeenCalledTimes(1)
            expect(post.mock.calls[0][0]).toBe('/reading/sessions/srv_9/end')
        })

        it('treats a 409 from the sync call as a duplicate', async () => {
            const { client, post } = setup()
            post.mockResolvedValueOnce(reply(409, { detail: 'Session already synced' }))

            expect(await client.replayRemote(record())).toEqual({ status: 'duplicate' })
            expect(post).toHaveBeenCalledTimes(1)
        })

        it('returns the server id with a finalize failure after the create landed', async () => {
            const { client, post } = setup()
            post.mockResolvedValueOnce(reply(200, storedSessionBody)).mockResolvedValueOnce(reply(502, null))

            expect(await client.replayRemote(record())).toEqual({ status: 'retryable', reason: 'HTTP 502', remoteSessionId: 'srv_9' })
        })

        it('refuses a record whose session has not ended', async () => {
            const { client, post } = setup()

            const outcome = await client.replayRemote(record({ session: { ...offlineSession, endTime: null, endPage: null } }))

            expect(outcome).toMatchObject({ status: 'terminal', error: 'validation' })
            expect(post).not.toHaveBeenCalled()
        })
    })

    it('sends pause and resume without a body', async () => {
        const { client, post } = setup()
        post.mockResolvedValueOnce(reply(204, '')).mockResolvedValueOnce(reply(404, { detail: 'Reading session not found' }))

        expect(await client.pauseRemote('srv_1')).toEqual({ status: 'ok', value: null })
        expect(await client.resumeRemote('srv_1')).toMatchObject({ status: 'terminal', error: 'session-not-found' })
        expect(post.mock.calls.map((call) => call[0])).toEqual(['/reading/sessions/srv_1/pause', '/reading/sessions/srv_1/resume'])
    })

    it('reads the active session', async () => {
        const { client, get } = setup()
        get.mockResolvedValueOnce(reply(200, null)).mockResolvedValueOnce(
            reply(200, {
                id: 'srv_3',
                user_book_id: 'book-2',
                start_time: '2026-03-01T11:00:00.000Z',
                start_page: 4,
                is_active: true,
                is_paused: true,
                paused_at: '2026-03-01T11:30:00.000Z',
                total_pause_seconds: 90,
            }),
        )

        expect(await client.fetchActiveRemote()).toEqual({ status: 'ok', value: null })
        expect(await client.fetchActiveRemote()).toEqual({
            status: 'ok',
            value: {
                id: 'srv_3',
                libraryEntryId: 'book-2',
                startTime: Date.parse('2026-03-01T11:00:00.000Z'),
                endTime: null,
                startPage: 4,
                endPage: null,
                totalPauseDurationMs: 90_000,
                pausedAt: Date.parse('2026-03-01T11:30:00.000Z'),
                focusScore: null,
                isOffline: false,
                needsSync: false,
            },
        })
        expect(get).toHaveBeenCalledWith('/reading/sessions/active')
    })

    it('pages through history with the filter as query parameters', async () => {
        const { client, get } = setup()
        get.mockResolvedValueOnce(reply(200, { items: [], total: 0, page: 2, page_size: 100, has_more: false }))

        await client.fetchHistoryRemote({
            libraryEntryId: 'book-1',
            startDate: new Date('2026-02-01T00:00:00.000Z'),
            page: 2,
            pageSize: 250,
        })

        expect(get).toHaveBeenCalledWith('/reading/sessions', {
            params: { page: 2, page_size: 100, user_book_id: 'book-1', start_date: '2026-02-01T00:00:00.000Z' },
        })
    })
})

describe('wire mapping', () => {
    it('builds the sync body from an offline snapshot', () => {
        expect(buildSyncRequest(record())).toEqual({
            user_book_id: 'book-1',
            start_time: '2026-03-01T09:00:00.000Z',
            end_time: '2026-03-01T09:10:00.000Z',
            start_page: 10,
            end_page: 25,
            focus_score: 85,
            total_pause_seconds: 61,
            local_id: 'offline_1f0c',
            idempotency_key: 'key-offline_1f0c',
        })
    })

    it('treats a paused session without a pause timestamp as paused since now', () => {
        const session = sessionFromWire(
            {
                id: 'srv_3',
                user_book_id: 'book-2',
                start_time: '2026-03-01T11:00:00.000Z',
                end_time: null,
                start_page: 0,
                end_page: null,
                duration: 0,
                focus_score: null,
                is_active: true,
                is_paused: true,
                paused_at: null,
                total_pause_seconds: 0,
            },
            5_000,
        )
        expect(session.pausedAt).toBe(5_000)
    })

    describe('server timestamps', () => {
        const originalTz = process.env.TZ

        beforeEach(() => {
            process.env.TZ = 'Asia/Seoul'
        })

        afterEach(() => {
            if (originalTz === undefined) {
                delete process.env.TZ
            } else {
                process.env.TZ = originalTz
            }
        })

        it('reads times without a zone designator as UTC', () => {
            expect(parseServerTime('2026-03-01T09:00:00')).toBe(Date.parse('2026-03-01T09:00:00Z'))
            expect(parseServerTime('2026-03-01T09:00:00.250')).toBe(Date.parse('2026-03-01T09:00:00.250Z'))
        })

        it('keeps an explicit offset', () => {
            expect(parseServerTime('2026-03-01T18:00:00+09:00')).toBe(Date.parse('2026-03-01T09:00:00Z'))
            expect(parseServerTime('2026-03-01T09:00:00.000Z')).toBe(Date.parse('2026-03-01T09:00:00Z'))
        })

        it('maps an adopted session without shifting it by the local offset', () => {
            const session = sessionFromWire(
                { ...storedSessionBody, is_paused: true, paused_at: '2026-03-01T09:05:00', end_time: '2026-03-01T09:10:00' },
                0,
            )

            expect(session.startTime).toBe(Date.parse('2026-03-01T09:00:00Z'))
            expect(session.pausedAt).toBe(Date.parse('2026-03-01T09:05:00Z'))
            expect(session.endTime).toBe(Date.parse('2026-03-01T09:10:00Z'))
        })
    })

    it('classifies throttling as retryable and success as no failure', () => {
        expect(classifyStatus({ status: 429, data: null }, 'sync')).toEqual({ status: 'retryable', reason: 'HTTP 429' })
        expect(classifyStatus({ status: 204, data: null }, 'other')).toBeNull()
    })
})
