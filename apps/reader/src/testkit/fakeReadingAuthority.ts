/**
 * In-process stand-in for the reading authority, used by the engine's tests.
 * Behaves like the REST service behind ApiReadingClient, with a switch to take it offline.
 */

import type { RemoteFailure, RemoteOutcome, RemoteSessionHandle, ReadingRemote, ReplayOutcome } from '@/api/apiReading'
import { elapsedSeconds } from '@/session/elapsed'
import { filterHistory } from '@/session/sessionStore'
import { pagesReadOf, type PendingSyncRecord, type ReadingSession, type ReadingSessionResult, type SessionHistoryFilter } from '@/session/types'

export type AuthorityOp = 'create' | 'finalize' | 'sync' | 'pause' | 'resume' | 'active' | 'history'

export type AuthorityCall = { op: AuthorityOp; sessionId: string | null }

// Server-only bonus, so tests can tell an authoritative result from a local estimate.
export const AUTHORITY_BONUS_COINS = 2

export class ManualClock {
    private current: number

    constructor(start: number) {
        this.current = start
    }

    now = (): number => this.current

    advance(ms: number): void {
        this.current += ms
    }

    advanceSeconds(seconds: number): void {
        this.advance(seconds * 1000)
    }
}

export class FakeReadingAuthority implements ReadingRemote {
    online = true
    streakDays = 3
    readonly calls: AuthorityCall[] = []
    /** Results the authority granted rewards for. */
    readonly granted: ReadingSessionResult[] = []
    private readonly sessions = new Map<string, ReadingSession>()
    private readonly recordedKeys = new Set<string>()
    private readonly injected = new Map<AuthorityOp, RemoteFailure>()
    private readonly now: () => number
    private nextId = 1

    constructor(opts: { now: () => number }) {
        this.now = opts.now
    }

    /** The next call of `op` fails with `failure`, once. */
    failNext(op: AuthorityOp, failure: RemoteFailure): void {
        this.injected.set(op, failure)
    }

    /** Marks a replay key as already recorded, as if an earlier attempt had landed. */
    markRecorded(idempotencyKey: string): void {
        this.recordedKeys.add(idempotencyKey)
    }

    session(id: string): ReadingSession | null {
        const session = this.sessions.get(id)
        return session ? { ...session } : null
    }

    countCalls(op: AuthorityOp): number {
        return this.calls.filter((call) => call.op === op).length
    }

    /** Registers a session created elsewhere (another device, an earlier install). */
    seedActive(params: { libraryEntryId: string; startTime: number; startPage?: number }): string {
        const id = this.issueId()
        this.sessions.set(id, {
            id,
            libraryEntryId: params.libraryEntryId,
            startTime: params.startTime,
            endTime: null,
            startPage: params.startPage ?? 0,
            endPage: null,
            totalPauseDurationMs: 0,
            pausedAt: null,
            focusScore: null,
            isOffline: false,
            needsSync: false,
        })
        return id
    }

    async createRemote(params: { libraryEntryId: string; startPage: number | null }): Promise<RemoteOutcome<RemoteSessionHandle>> {
        const blocked = this.intercept('create', null)
        if (blocked) return blocked
        if (this.activeSession()) {
            return { status: 'terminal', error: 'already-active', message: 'User already has an active reading session' }
        }
        const startedAt = this.now()
        const id = this.seedActive({ libraryEntryId: params.libraryEntryId, startTime: startedAt, startPage: params.startPage ?? 0 })
        return { status: 'ok', value: { sessionId: id, startedAt } }
    }

    async finalizeRemote(
        sessionId: string,
        params: { endPage: number; focusScore: number | null },
        opts?: { idempotencyKey?: string },
    ): Promise<RemoteOutcome<ReadingSessionResult>> {
        const blocked = this.intercept('finalize', sessionId)
        if (blocked) return blocked
        const session = this.sessions.get(sessionId)
        if (!session) {
            return { status: 'terminal', error: 'session-not-found', message: 'Reading session not found' }
        }
        if (session.endTime !== null) {
            return { status: 'duplicate' }
        }

        const endTime = this.now()
        const pausedMs = session.pausedAt !== null ? endTime - session.pausedAt : 0
        const ended: ReadingSession = {
            ...session,
            endTime,
            endPage: params.endPage,
            focusScore: params.focusScore,
            pausedAt: null,
            totalPauseDurationMs: session.totalPauseDurationMs + pausedMs,
        }
        this.sessions.set(sessionId, ended)
        if (opts?.idempotencyKey) this.recordedKeys.add(opts.idempotencyKey)
        return { status: 'ok', value: this.grant(ended) }
    }

    async replayRemote(
        record: PendingSyncRecord,
        hooks?: { onCreated?: (remoteSessionId: string) => Promise<void> },
    ): Promise<ReplayOutcome> {
        const snapshot = record.session
        if (snapshot.endTime === null || snapshot.endPage === null) {
            return { status: 'terminal', error: 'validation', message: `Session ${snapshot.id} has not ended` }
        }

        let remoteSessionId: string
        if (!snapshot.isOffline) {
            remoteSessionId = snapshot.id
        } else if (record.remoteSessionId) {
            remoteSessionId = record.remoteSessionId
        } else {
            const blocked = this.intercept('sync', snapshot.id)
            if (blocked) {
                return blocked.status === 'retryable' ? { ...blocked, remoteSessionId: null } : blocked
            }
            if (this.recordedKeys.has(record.idempotencyKey)) {
                return { status: 'duplicate' }
            }
            // The snapshot becomes an open server session holding the offline timestamps.
            remoteSessionId = this.issueId()
            this.sessions.set(remoteSessionId, {
                ...snapshot,
                id: remoteSessionId,
                endTime: null,
                endPage: null,
                isOffline: false,
                needsSync: false,
            })
            this.recordedKeys.add(record.idempotencyKey)
            if (hooks?.onCreated) await hooks.onCreated(remoteSessionId)
        }

        const blocked = this.intercept('finalize', remoteSessionId)
        if (blocked) {
            return blocked.status === 'retryable'
                ? { ...blocked, remoteSessionId: snapshot.isOffline ? remoteSessionId : null }
                : blocked
        }
        const session = this.sessions.get(remoteSessionId)
        if (!session) {
            return { status: 'terminal', error: 'session-not-found', message: 'Reading session not found' }
        }
        if (session.endTime !== null) {
            return { status: 'duplicate' }
        }

        const ended: ReadingSession = {
            ...session,
            endTime: snapshot.endTime,
            endPage: snapshot.endPage,
            focusScore: snapshot.focusScore,
            pausedAt: null,
            totalPauseDurationMs: snapshot.totalPauseDurationMs,
        }
        this.sessions.set(remoteSessionId, ended)
        this.recordedKeys.add(record.idempotencyKey)
        return { status: 'ok', result: this.grant(ended), remoteSessionId }
    }

    async pauseRemote(sessionId: string): Promise<RemoteOutcome<null>> {
        return this.togglePause('pause', sessionId)
    }

    async resumeRemote(sessionId: string): Promise<RemoteOutcome<null>> {
        return this.togglePause('resume', sessionId)
    }

    async fetchActiveRemote(): Promise<RemoteOutcome<ReadingSession | null>> {
        const blocked = this.intercept('active', null)
        if (blocked) return blocked
        const active = this.activeSession()
        return { status: 'ok', value: active ? { ...active } : null }
    }

    async fetchHistoryRemote(filter?: SessionHistoryFilter): Promise<RemoteOutcome<ReadingSession[]>> {
        const blocked = this.intercept('history', null)
        if (blocked) return blocked
        const ended = [...this.sessions.values()]
            .filter((session) => session.endTime !== null)
            .sort((a, b) => b.startTime - a.startTime)
        return { status: 'ok', value: filterHistory(ended, filter) }
    }

    private togglePause(op: 'pause' | 'resume', sessionId: string): RemoteOutcome<null> {
        const blocked = this.intercept(op, sessionId)
        if (blocked) return blocked
        const session = this.sessions.get(sessionId)
        if (!session || session.endTime !== null) {
            return { status: 'terminal', error: 'session-not-found', message: 'Reading session not found' }
        }
        const now = this.now()
        if (op === 'pause' && session.pausedAt === null) {
            this.sessions.set(sessionId, { ...session, pausedAt: now })
        }
        if (op === 'resume' && session.pausedAt !== null) {
            this.sessions.set(sessionId, {
                ...session,
                pausedAt: null,
                totalPauseDurationMs: session.totalPauseDurationMs + (now - session.pausedAt),
            })
        }
        return { status: 'ok', value: null }
    }

    private grant(session: ReadingSession): ReadingSessionResult {
        const durationSeconds = elapsedSeconds(session, session.endTime ?? session.startTime)
        const pagesRead = pagesReadOf(session)
        const result: ReadingSessionResult = {
            sessionId: session.id,
            durationSeconds,
            pagesRead,
            streakDays: this.streakDays,
            rewards: {
                coinsEarned: Math.floor(durationSeconds / 60),
                expEarned: pagesRead * 5,
                bonusCoins: AUTHORITY_BONUS_COINS,
                bonusExp: 0,
            },
            levelUp: false,
            newLevel: null,
            badgesEarned: [],
            isOffline: false,
        }
        this.granted.push(result)
        return result
    }

    private activeSession(): ReadingSession | null {
        for (const session of this.sessions.values()) {
            if (session.endTime === null) return session
        }
        return null
    }

    private intercept(op: AuthorityOp, sessionId: string | null): RemoteFailure | null {
        this.calls.push({ op, sessionId })
        if (!this.online) {
            return { status: 'retryable', reason: 'ECONNREFUSED: authority offline' }
        }
        const injected = this.injected.get(op)
        if (injected) {
            this.injected.delete(op)
            return injected
        }
        return null
    }

    private issueId(): string {
        return `srv_${this.nextId++}`
    }
}
