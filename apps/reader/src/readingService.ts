import { ApiReadingClient, type ReadingRemote } from '@/api/apiReading'
import { configuration, type Configuration } from '@/configuration'
import { NoopPhoneLock, type PhoneLockController } from '@/lock/phoneLock'
import type { RewardRates } from '@/rewards/estimateRewards'
import {
    ReadingSessionMachine,
    type EndSessionParams,
    type SessionMachineEvents,
    type StartSessionParams,
} from '@/session/sessionMachine'
import { FileSessionStore, type SessionStore } from '@/session/sessionStore'
import type { ReadingSession, ReadingSessionResult, SessionHistoryFilter } from '@/session/types'
import { SyncOrchestrator, type DrainSummary, type SyncOrchestratorEvents } from '@/sync/syncOrchestrator'
import { logger } from '@/ui/logger'
import { fail, ok, toReadingFailure, type ReadingResult } from '@/utils/errors'
import { Listeners } from '@/utils/listeners'

export type ReadingServiceEvents = {
    state: SessionMachineEvents['state']
    tick: SessionMachineEvents['tick']
    /** Estimated results when a session ends, authoritative ones as they are reconciled. */
    result: SessionMachineEvents['result']
    rejected: SyncOrchestratorEvents['rejected']
}

/**
 * UI-facing entry point. Every operation resolves to a result; nothing here throws.
 */
export class ReadingService {
    readonly machine: ReadingSessionMachine
    readonly orchestrator: SyncOrchestrator
    private readonly store: SessionStore
    private readonly remote: ReadingRemote
    private readonly events = new Listeners<ReadingServiceEvents>()
    private readonly unsubscribes: Array<() => void>

    constructor(opts: {
        store: SessionStore
        remote: ReadingRemote
        machine: ReadingSessionMachine
        orchestrator: SyncOrchestrator
    }) {
        this.store = opts.store
        this.remote = opts.remote
        this.machine = opts.machine
        this.orchestrator = opts.orchestrator
        this.unsubscribes = [
            this.machine.on('state', (payload) => this.events.emit('state', payload)),
            this.machine.on('tick', (payload) => this.events.emit('tick', payload)),
            this.machine.on('result', (payload) => this.events.emit('result', payload)),
            this.orchestrator.on('reconciled', ({ localSessionId, result }) => this.events.emit('result', { localSessionId, result })),
            this.orchestrator.on('rejected', (payload) => this.events.emit('rejected', payload)),
        ]
    }

    on<K extends keyof ReadingServiceEvents>(event: K, handler: (payload: ReadingServiceEvents[K]) => void): () => void {
        return this.events.on(event, handler)
    }

    startSession(params: StartSessionParams): Promise<ReadingResult<ReadingSession>> {
        return this.machine.startSession(params)
    }

    pauseSession(): Promise<ReadingResult<ReadingSession | null>> {
        return this.machine.pauseSession()
    }

    resumeSession(): Promise<ReadingResult<ReadingSession | null>> {
        return this.machine.resumeSession()
    }

    endSession(params: EndSessionParams): Promise<ReadingResult<ReadingSessionResult>> {
        return this.machine.endSession(params)
    }

    getActiveSession(): Promise<ReadingResult<ReadingSession | null>> {
        return this.machine.getActiveSession()
    }

    /**
     * Authority first; the local cache of synced sessions when it cannot be reached.
     */
    async getSessionHistory(filter?: SessionHistoryFilter): Promise<ReadingResult<ReadingSession[]>> {
        try {
            const remote = await this.remote.fetchHistoryRemote(filter)
            switch (remote.status) {
                case 'ok': {
                    await this.store.appendHistory(remote.value.filter((session) => session.endTime !== null))
                    return ok(remote.value)
                }
                case 'retryable': {
                    const cached = await this.store.listHistory(filter)
                    if (cached.length === 0) {
                        return fail('network-unavailable')
                    }
                    logger.debug(`[SESSION] Serving ${cached.length} cached history entries (${remote.reason})`)
                    return ok(cached)
                }
                case 'terminal':
                    return fail(remote.error, remote.message)
                case 'duplicate':
                    return fail('unknown')
            }
        } catch (error) {
            return { ok: false, failure: toReadingFailure(error) }
        }
    }

    /**
     * Drains the pending queue now and reports what happened.
     */
    async syncNow(): Promise<ReadingResult<DrainSummary>> {
        try {
            const summary = await this.orchestrator.drain()
            const pending = await this.store.listPendingSync()
            return ok(summary ?? { synced: 0, duplicates: 0, rejected: 0, remaining: pending.length })
        } catch (error) {
            return { ok: false, failure: toReadingFailure(error) }
        }
    }

    onReconnect(): void {
        this.orchestrator.trigger('reconnect')
    }

    onForeground(): void {
        this.orchestrator.trigger('foreground')
    }

    dispose(): void {
        for (const unsubscribe of this.unsubscribes) unsubscribe()
        this.machine.dispose()
        this.orchestrator.stop()
    }
}

export type ReadingServiceOptions = {
    config?: Pick<
        Configuration,
        | 'serverUrl'
        | 'apiToken'
        | 'stateFile'
        | 'requestTimeoutMs'
        | 'historyLimit'
        | 'tickIntervalMs'
        | 'coinsPerMinute'
        | 'expPerPage'
        | 'heartbeatDriftToleranceSeconds'
    >
    store?: SessionStore
    remote?: ReadingRemote
    lock?: PhoneLockController
    now?: () => number
}

export function createReadingService(options: ReadingServiceOptions = {}): ReadingService {
    const config = options.config ?? configuration
    const now = options.now ?? Date.now
    const store = options.store ?? new FileSessionStore({ filePath: config.stateFile, historyLimit: config.historyLimit })
    const remote = options.remote ?? new ApiReadingClient({
        serverUrl: config.serverUrl,
        token: config.apiToken,
        timeoutMs: config.requestTimeoutMs,
        now,
    })
    const rewardRates: RewardRates = { coinsPerMinute: config.coinsPerMinute, expPerPage: config.expPerPage }

    const orchestrator = new SyncOrchestrator({ store, remote })
    const machine = new ReadingSessionMachine({
        store,
        remote,
        lock: options.lock ?? new NoopPhoneLock(),
        sync: orchestrator,
        now,
        tickIntervalMs: config.tickIntervalMs,
        rewardRates,
        heartbeatDriftToleranceSeconds: config.heartbeatDriftToleranceSeconds,
    })
    return new ReadingService({ store, remote, machine, orchestrator })
}
