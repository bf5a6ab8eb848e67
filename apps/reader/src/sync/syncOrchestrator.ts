/**
 * Drains the pending-sync queue against the reading authority.
 *
 * Records replay strictly in enqueue order: the authority's streak and statistics
 * bookkeeping depends on seeing sessions in the order they happened, so a record that
 * cannot be sent yet blocks everything queued after it until the next trigger.
 */

import type { ReadingRemote, RemoteTerminalError } from '@/api/apiReading'
import type { SessionStore } from '@/session/sessionStore'
import type { PendingSyncRecord, ReadingSession, ReadingSessionResult } from '@/session/types'
import { logger } from '@/ui/logger'
import { Listeners } from '@/utils/listeners'
import { InvalidateSync } from '@/utils/sync'

export type SyncTrigger = 'reconnect' | 'foreground' | 'session-ended' | 'manual'

export type SyncOrchestratorEvents = {
    reconciled: { localSessionId: string; session: ReadingSession; result: ReadingSessionResult }
    duplicate: { localSessionId: string }
    rejected: { localSessionId: string; error: RemoteTerminalError; message: string }
}

export type DrainSummary = {
    synced: number
    duplicates: number
    rejected: number
    remaining: number
}

export class SyncOrchestrator {
    private readonly store: SessionStore
    private readonly remote: ReadingRemote
    private readonly events = new Listeners<SyncOrchestratorEvents>()
    private readonly drainSync: InvalidateSync
    private summary: DrainSummary | null = null

    constructor(opts: { store: SessionStore; remote: ReadingRemote }) {
        this.store = opts.store
        this.remote = opts.remote
        this.drainSync = new InvalidateSync(this.runPass, {
            onError: (error) => logger.error('[SYNC] Drain pass failed', error),
        })
    }

    on<K extends keyof SyncOrchestratorEvents>(event: K, handler: (payload: SyncOrchestratorEvents[K]) => void): () => void {
        return this.events.on(event, handler)
    }

    get lastSummary(): DrainSummary | null {
        return this.summary
    }

    get isDraining(): boolean {
        return this.drainSync.isRunning
    }

    /**
     * Fire-and-forget: schedules a pass, or one more pass if one is already running.
     */
    trigger(reason: SyncTrigger): void {
        logger.debug(`[SYNC] Drain triggered by ${reason}`)
        this.drainSync.invalidate()
    }

    /**
     * Schedules a pass and resolves once the queue has been worked through.
     */
    async drain(): Promise<DrainSummary | null> {
        await this.drainSync.invalidateAndAwait()
        return this.summary
    }

    stop(): void {
        this.drainSync.stop()
    }

    private runPass = async (): Promise<void> => {
        const queue = await this.store.listPendingSync()
        const summary: DrainSummary = { synced: 0, duplicates: 0, rejected: 0, remaining: 0 }

        for (let i = 0; i < queue.length; i++) {
            const record = queue[i]
            if (record.session.endTime === null) {
                // Offline session still being read; it goes out once it ends.
                logger.debug(`[SYNC] ${record.session.id} has not ended yet, holding the queue`)
                summary.remaining = queue.length - i
                break
            }

            const keepGoing = await this.replay(record, summary)
            if (!keepGoing) {
                summary.remaining = queue.length - i
                break
            }
        }

        this.summary = summary
        if (summary.synced + summary.duplicates + summary.rejected > 0 || summary.remaining > 0) {
            logger.debug(
                `[SYNC] Pass done: ${summary.synced} synced, ${summary.duplicates} duplicate, ` +
                `${summary.rejected} rejected, ${summary.remaining} remaining`,
            )
        }
    }

    private async replay(record: PendingSyncRecord, summary: DrainSummary): Promise<boolean> {
        const localId = record.session.id
        const outcome = await this.remote.replayRemote(record, {
            onCreated: async (remoteSessionId) => {
                await this.store.updatePendingSync(localId, { remoteSessionId })
            },
        })

        switch (outcome.status) {
            case 'ok': {
                const synced: ReadingSession = {
                    ...record.session,
                    id: outcome.remoteSessionId,
                    isOffline: false,
                    needsSync: false,
                }
                await this.store.removePendingSync(localId, { history: [synced] })
                await this.store.setLastKnownStreakDays(outcome.result.streakDays)
                summary.synced++
                logger.info(`[SYNC] Session ${localId} reconciled as ${outcome.remoteSessionId}`)
                this.events.emit('reconciled', { localSessionId: localId, session: synced, result: outcome.result })
                return true
            }
            case 'duplicate': {
                // The authority already has this session; its rewards were granted then.
                await this.store.removePendingSync(localId)
                summary.duplicates++
                logger.debug(`[SYNC] Session ${localId} was already recorded, dropping it`)
                this.events.emit('duplicate', { localSessionId: localId })
                return true
            }
            case 'retryable': {
                await this.store.updatePendingSync(localId, {
                    attempts: record.attempts + 1,
                    lastError: outcome.reason,
                    remoteSessionId: outcome.remoteSessionId ?? record.remoteSessionId,
                })
                logger.debug(`[SYNC] Session ${localId} will retry on the next trigger: ${outcome.reason}`)
                return false
            }
            case 'terminal': {
                await this.store.removePendingSync(localId)
                summary.rejected++
                logger.error(`[SYNC] Authority rejected session ${localId} (${outcome.error}): ${outcome.message}`)
                this.events.emit('rejected', { localSessionId: localId, error: outcome.error, message: outcome.message })
                return true
            }
        }
    }
}
