/**
 * Owner of the device's single reading session.
 *
 * Every transition is written to the session store before the call returns, so a
 * process restart at any point resumes from the last completed transition. Reading
 * time is always derived from timestamps (see elapsed.ts); the periodic tick only
 * tells the UI to redraw.
 */

import { randomUUID } from 'node:crypto'
import type { LockStatusEvent } from '@readlock/protocol'
import type { ReadingRemote, RemoteFailure } from '@/api/apiReading'
import { NoopPhoneLock, sendLockCommand, type PhoneLockController } from '@/lock/phoneLock'
import { DEFAULT_REWARD_RATES, estimateSessionResult, type RewardRates } from '@/rewards/estimateRewards'
import { deriveIdempotencyKey } from '@/sync/idempotencyKey'
import type { SyncTrigger } from '@/sync/syncOrchestrator'
import { logger } from '@/ui/logger'
import { fail, ok, toReadingFailure, type ReadingResult } from '@/utils/errors'
import { Listeners } from '@/utils/listeners'
import { applyEnd, applyPause, applyResume, elapsedSeconds } from './elapsed'
import type { SessionStore } from './sessionStore'
import {
    OFFLINE_SESSION_ID_PREFIX,
    type PendingSyncRecord,
    type ReadingSession,
    type ReadingSessionResult,
    type SessionPhase,
} from './types'

export type SessionMachineEvents = {
    state: { phase: SessionPhase; session: ReadingSession | null }
    tick: { sessionId: string; elapsedSeconds: number }
    result: { localSessionId: string; result: ReadingSessionResult }
}

export type StartSessionParams = {
    libraryEntryId: string
    startPage?: number
    displayTitle?: string
}

export type EndSessionParams = {
    endPage: number
    focusScore?: number
}

export type SessionMachineOptions = {
    store: SessionStore
    remote: ReadingRemote
    lock?: PhoneLockController
    sync?: { trigger(reason: SyncTrigger): void }
    now?: () => number
    tickIntervalMs?: number
    rewardRates?: RewardRates
    heartbeatDriftToleranceSeconds?: number
    /** Adopt the authority's active session on cold start when nothing is stored locally. */
    adoptRemoteActive?: boolean
}

function terminalFailure<T>(outcome: Extract<RemoteFailure, { status: 'terminal' }>): ReadingResult<T> {
    return fail(outcome.error, outcome.message)
}

export class ReadingSessionMachine {
    private readonly store: SessionStore
    private readonly remote: ReadingRemote
    private readonly lock: PhoneLockController
    private readonly sync: { trigger(reason: SyncTrigger): void } | null
    private readonly now: () => number
    private readonly tickIntervalMs: number
    private readonly rewardRates: RewardRates
    private readonly driftToleranceSeconds: number
    private readonly adoptRemoteActive: boolean
    private readonly events = new Listeners<SessionMachineEvents>()

    private phase: SessionPhase = 'idle'
    private session: ReadingSession | null = null
    private restoring: Promise<void> | null = null
    private tickTimer: NodeJS.Timeout | null = null
    // Remote pause/resume notifications, chained so the authority sees them in order.
    private remoteNotifications: Promise<void> = Promise.resolve()

    constructor(opts: SessionMachineOptions) {
        this.store = opts.store
        this.remote = opts.remote
        this.lock = opts.lock ?? new NoopPhoneLock()
        this.sync = opts.sync ?? null
        this.now = opts.now ?? Date.now
        this.tickIntervalMs = opts.tickIntervalMs ?? 1_000
        this.rewardRates = opts.rewardRates ?? DEFAULT_REWARD_RATES
        this.driftToleranceSeconds = opts.heartbeatDriftToleranceSeconds ?? 5
        this.adoptRemoteActive = opts.adoptRemoteActive ?? true
    }

    on<K extends keyof SessionMachineEvents>(event: K, handler: (payload: SessionMachineEvents[K]) => void): () => void {
        return this.events.on(event, handler)
    }

    getPhase(): SessionPhase {
        return this.phase
    }

    /**
     * Elapsed reading time of the current session right now; 0 when idle.
     */
    getElapsedSeconds(): number {
        return this.session ? elapsedSeconds(this.session, this.now()) : 0
    }

    async getActiveSession(): Promise<ReadingResult<ReadingSession | null>> {
        try {
            await this.ensureRestored()
        } catch (error) {
            return { ok: false, failure: toReadingFailure(error) }
        }
        return ok(this.session ? { ...this.session } : null)
    }

    async startSession(params: StartSessionParams): Promise<ReadingResult<ReadingSession>> {
        try {
            await this.ensureRestored()
        } catch (error) {
            return { ok: false, failure: toReadingFailure(error) }
        }

        // No await between this check and the phase change: a concurrent second call sees 'starting'.
        if (this.phase !== 'idle') {
            return fail('already-active')
        }
        this.setPhase('starting')

        const startedAt = this.now()
        const startPage = params.startPage ?? null

        try {
            const created = await this.remote.createRemote({ libraryEntryId: params.libraryEntryId, startPage })
            let session: ReadingSession
            let pending: PendingSyncRecord | undefined

            if (created.status === 'ok') {
                session = {
                    id: created.value.sessionId,
                    libraryEntryId: params.libraryEntryId,
                    startTime: startedAt,
                    endTime: null,
                    startPage: startPage ?? 0,
                    endPage: null,
                    totalPauseDurationMs: 0,
                    pausedAt: null,
                    focusScore: null,
                    isOffline: false,
                    needsSync: false,
                }
            } else if (created.status === 'retryable') {
                logger.info(`[SESSION] Authority unreachable (${created.reason}), starting offline`)
                session = {
                    id: `${OFFLINE_SESSION_ID_PREFIX}${randomUUID()}`,
                    libraryEntryId: params.libraryEntryId,
                    startTime: startedAt,
                    endTime: null,
                    startPage: startPage ?? 0,
                    endPage: null,
                    totalPauseDurationMs: 0,
                    pausedAt: null,
                    focusScore: null,
                    isOffline: true,
                    needsSync: true,
                }
                // Queued right away so a crash before reconnecting cannot lose the session.
                pending = this.pendingRecordFor(session, null)
            } else if (created.status === 'terminal') {
                this.setPhase('idle')
                return terminalFailure(created)
            } else {
                this.setPhase('idle')
                return fail('already-active')
            }

            await this.store.putActive(session, { pending })
            this.session = session
            this.setPhase('active')
            this.startTick()
            logger.debug(`[SESSION] Started ${session.id}${session.isOffline ? ' (offline)' : ''}`)
            await sendLockCommand('start', () => this.lock.start(session.id, params.displayTitle ?? ''))
            return ok({ ...session })
        } catch (error) {
            logger.error('[SESSION] Failed to start session', error)
            this.session = null
            this.setPhase('idle')
            return { ok: false, failure: toReadingFailure(error) }
        }
    }

    async pauseSession(opts?: { fromLock?: boolean }): Promise<ReadingResult<ReadingSession | null>> {
        try {
            await this.ensureRestored()
            const current = this.session
            if (this.phase !== 'active' || !current) {
                return ok(current ? { ...current } : null)
            }

            const paused = applyPause(current, this.now())
            await this.store.putActive(paused)
            if (this.superseded('active', current.id)) {
                logger.debug(`[SESSION] Pause of ${current.id} dropped, session is ${this.phase}`)
                return ok(this.session ? { ...this.session } : null)
            }
            this.session = paused
            this.setPhase('paused')
            this.stopTick()
            if (!paused.isOffline) {
                this.notifyRemote('pause', paused.id)
            }

            if (!opts?.fromLock) {
                await sendLockCommand('pause', () => this.lock.pause())
            }
            return ok({ ...paused })
        } catch (error) {
            return { ok: false, failure: toReadingFailure(error) }
        }
    }

    async resumeSession(opts?: { fromLock?: boolean }): Promise<ReadingResult<ReadingSession | null>> {
        try {
            await this.ensureRestored()
            const current = this.session
            if (this.phase !== 'paused' || !current) {
                return ok(current ? { ...current } : null)
            }

            const resumed = applyResume(current, this.now())
            await this.store.putActive(resumed)
            if (this.superseded('paused', current.id)) {
                logger.debug(`[SESSION] Resume of ${current.id} dropped, session is ${this.phase}`)
                return ok(this.session ? { ...this.session } : null)
            }
            this.session = resumed
            this.setPhase('active')
            this.startTick()
            if (!resumed.isOffline) {
                this.notifyRemote('resume', resumed.id)
            }

            if (!opts?.fromLock) {
                await sendLockCommand('resume', () => this.lock.resume())
            }
            return ok({ ...resumed })
        } catch (error) {
            return { ok: false, failure: toReadingFailure(error) }
        }
    }

    async endSession(params: EndSessionParams): Promise<ReadingResult<ReadingSessionResult>> {
        try {
            await this.ensureRestored()
        } catch (error) {
            return { ok: false, failure: toReadingFailure(error) }
        }

        const current = this.session
        const previousPhase = this.phase
        if ((previousPhase !== 'active' && previousPhase !== 'paused') || !current) {
            return fail('no-active-session')
        }
        this.setPhase('ending')
        this.stopTick()

        const ended = applyEnd(current, {
            now: this.now(),
            endPage: params.endPage,
            focusScore: params.focusScore ?? null,
        })

        try {
            if (!current.isOffline) {
                // Let queued pause/resume notifications land before the end.
                await this.remoteNotifications
                const finalized = await this.remote.finalizeRemote(current.id, {
                    endPage: ended.endPage ?? params.endPage,
                    focusScore: ended.focusScore,
                })

                if (finalized.status === 'ok') {
                    await this.store.clearActive({ history: [{ ...ended, needsSync: false }] })
                    await this.store.setLastKnownStreakDays(finalized.value.streakDays)
                    return await this.complete(current.id, finalized.value)
                }
                if (finalized.status === 'terminal') {
                    if (finalized.error === 'session-not-found') {
                        // The authority expired the session; nothing left to finalize.
                        await this.store.clearActive()
                        this.session = null
                        this.setPhase('idle')
                        await sendLockCommand('stop', () => this.lock.stop())
                        return terminalFailure(finalized)
                    }
                    this.revertEnding(current, previousPhase)
                    return terminalFailure(finalized)
                }
                logger.info(`[SESSION] Could not finalize ${current.id} (${finalized.status}), queuing for sync`)
            }

            const pendingSession: ReadingSession = { ...ended, needsSync: true }
            await this.store.clearActive({ pending: this.pendingRecordFor(pendingSession, null) })
            const streakDays = await this.store.getLastKnownStreakDays()
            const estimate = estimateSessionResult(pendingSession, { streakDays, rates: this.rewardRates })
            return await this.complete(current.id, estimate)
        } catch (error) {
            logger.error(`[SESSION] Failed to end ${current.id}`, error)
            this.revertEnding(current, previousPhase)
            return { ok: false, failure: toReadingFailure(error) }
        }
    }

    /**
     * Applies native lock-status events until the channel closes.
     */
    async consumeLockEvents(channel: AsyncIterable<LockStatusEvent>): Promise<void> {
        for await (const event of channel) {
            await this.handleLockEvent(event)
        }
    }

    async handleLockEvent(event: LockStatusEvent): Promise<void> {
        try {
            await this.ensureRestored()
        } catch (error) {
            logger.warn(`[LOCK] Dropping ${event.status} event, session state unavailable`, error)
            return
        }
        const current = this.session
        if (!current || current.id !== event.sessionId) {
            logger.debug(`[LOCK] Ignoring ${event.status} for ${event.sessionId}: not the current session`)
            return
        }

        switch (event.status) {
            case 'paused': {
                const result = await this.pauseSession({ fromLock: true })
                if (!result.ok) logger.warn('[LOCK] Could not apply pause from lock service', result.failure)
                return
            }
            case 'resumed': {
                const result = await this.resumeSession({ fromLock: true })
                if (!result.ok) logger.warn('[LOCK] Could not apply resume from lock service', result.failure)
                return
            }
            case 'started':
                if (this.phase === 'active') this.startTick()
                return
            case 'stopped':
                this.stopTick()
                return
            case 'heartbeat': {
                const derived = elapsedSeconds(current, this.now())
                if (Math.abs(derived - event.elapsedSeconds) > this.driftToleranceSeconds) {
                    logger.debug(`[LOCK] Heartbeat drift on ${current.id}: native ${event.elapsedSeconds}s, derived ${derived}s`)
                }
                this.events.emit('tick', { sessionId: current.id, elapsedSeconds: derived })
                return
            }
        }
    }

    /**
     * Resolves once queued remote pause/resume notifications have been sent.
     */
    async flushRemoteNotifications(): Promise<void> {
        await this.remoteNotifications
    }

    dispose(): void {
        this.stopTick()
    }

    private async complete(localSessionId: string, result: ReadingSessionResult): Promise<ReadingResult<ReadingSessionResult>> {
        this.session = null
        this.setPhase('idle')
        await sendLockCommand('stop', () => this.lock.stop())
        logger.debug(`[SESSION] Ended ${localSessionId}: ${result.durationSeconds}s${result.isOffline ? ' (estimated)' : ''}`)
        this.events.emit('result', { localSessionId, result })
        this.sync?.trigger('session-ended')
        return ok(result)
    }

    // True when another transition (an end, usually) took over while this one was persisting.
    private superseded(expectedPhase: SessionPhase, sessionId: string): boolean {
        return this.phase !== expectedPhase || this.session?.id !== sessionId
    }

    private revertEnding(session: ReadingSession, phase: 'active' | 'paused'): void {
        this.session = session
        this.setPhase(phase)
        if (phase === 'active') this.startTick()
    }

    private pendingRecordFor(session: ReadingSession, remoteSessionId: string | null): PendingSyncRecord {
        return {
            session,
            idempotencyKey: deriveIdempotencyKey(session),
            enqueuedAt: this.now(),
            remoteSessionId,
            attempts: 0,
            lastError: null,
        }
    }

    private notifyRemote(kind: 'pause' | 'resume', sessionId: string): void {
        this.remoteNotifications = this.remoteNotifications.then(async () => {
            const outcome = kind === 'pause' ? await this.remote.pauseRemote(sessionId) : await this.remote.resumeRemote(sessionId)
            if (outcome.status !== 'ok') {
                // Local state is authoritative for pauses; the authority only loses precision.
                logger.debug(`[SESSION] Remote ${kind} of ${sessionId} not applied: ${outcome.status}`)
            }
        })
    }

    private ensureRestored(): Promise<void> {
        if (!this.restoring) {
            this.restoring = this.restore().catch((error: unknown) => {
                this.restoring = null
                throw error
            })
        }
        return this.restoring
    }

    private async restore(): Promise<void> {
        const stored = await this.store.getActive()
        if (stored) {
            this.adopt(stored)
            logger.info(`[SESSION] Restored ${stored.id} (${this.phase}) from local state`)
            return
        }
        if (!this.adoptRemoteActive) {
            return
        }

        const remoteActive = await this.remote.fetchActiveRemote()
        if (remoteActive.status === 'ok' && remoteActive.value && remoteActive.value.endTime === null) {
            await this.store.putActive(remoteActive.value)
            this.adopt(remoteActive.value)
            logger.info(`[SESSION] Adopted active session ${remoteActive.value.id} from the authority`)
        }
    }

    private adopt(session: ReadingSession): void {
        this.session = session
        this.setPhase(session.pausedAt !== null ? 'paused' : 'active')
        if (this.phase === 'active') this.startTick()
    }

    private setPhase(phase: SessionPhase): void {
        if (this.phase === phase) return
        this.phase = phase
        this.events.emit('state', { phase, session: this.session ? { ...this.session } : null })
    }

    private startTick(): void {
        this.stopTick()
        this.tickTimer = setInterval(() => {
            const current = this.session
            if (!current || this.phase !== 'active') return
            this.events.emit('tick', { sessionId: current.id, elapsedSeconds: elapsedSeconds(current, this.now()) })
        }, this.tickIntervalMs)
        this.tickTimer.unref()
    }

    private stopTick(): void {
        if (this.tickTimer) {
            clearInterval(this.tickTimer)
            this.tickTimer = null
        }
    }
}
