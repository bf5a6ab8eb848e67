import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { logger } from '@/ui/logger'
import { ReadingError } from '@/utils/errors'
import { AsyncLock } from '@/utils/lock'
import {
    PendingSyncRecordSchema,
    ReadingSessionSchema,
    type PendingSyncRecord,
    type ReadingSession,
    type SessionHistoryFilter,
} from './types'

export const DEFAULT_HISTORY_PAGE_SIZE = 20
export const MAX_HISTORY_PAGE_SIZE = 100

const StateDocumentSchema = z.object({
    version: z.literal(1),
    active: ReadingSessionSchema.nullable(),
    pending: z.array(PendingSyncRecordSchema),
    history: z.array(ReadingSessionSchema),
    lastKnownStreakDays: z.number().int().min(0).nullable(),
})

type StateDocument = z.infer<typeof StateDocumentSchema>

function emptyDocument(): StateDocument {
    return { version: 1, active: null, pending: [], history: [], lastKnownStreakDays: null }
}

/**
 * Durable home of the active session, the pending-sync queue and the synced history.
 * Every mutating call resolves only after the data is on disk.
 */
export interface SessionStore {
    getActive(): Promise<ReadingSession | null>
    /** Writes the active slot; `pending` is enqueued in the same write. */
    putActive(session: ReadingSession, opts?: { pending?: PendingSyncRecord }): Promise<void>
    /** Clears the active slot; `pending` and `history` are applied in the same write. */
    clearActive(opts?: { pending?: PendingSyncRecord; history?: ReadingSession[] }): Promise<void>

    enqueuePendingSync(record: PendingSyncRecord): Promise<void>
    /** Oldest first. */
    listPendingSync(): Promise<PendingSyncRecord[]>
    getPendingSync(id: string): Promise<PendingSyncRecord | null>
    updatePendingSync(id: string, patch: Partial<Omit<PendingSyncRecord, 'session' | 'idempotencyKey' | 'enqueuedAt'>>): Promise<void>
    removePendingSync(id: string, opts?: { history?: ReadingSession[] }): Promise<void>

    appendHistory(sessions: ReadingSession[]): Promise<void>
    listHistory(filter?: SessionHistoryFilter): Promise<ReadingSession[]>

    getLastKnownStreakDays(): Promise<number | null>
    setLastKnownStreakDays(days: number): Promise<void>

    clearAll(): Promise<void>
}

export function normalizePage(filter: SessionHistoryFilter | undefined): { page: number; pageSize: number } {
    const rawPage = filter?.page ?? 1
    const rawSize = filter?.pageSize ?? DEFAULT_HISTORY_PAGE_SIZE
    const page = Number.isFinite(rawPage) && rawPage >= 1 ? Math.floor(rawPage) : 1
    const pageSize = Number.isFinite(rawSize) ? Math.min(Math.max(Math.floor(rawSize), 1), MAX_HISTORY_PAGE_SIZE) : DEFAULT_HISTORY_PAGE_SIZE
    return { page, pageSize }
}

export function filterHistory(sessions: ReadingSession[], filter: SessionHistoryFilter | undefined): ReadingSession[] {
    const startMs = filter?.startDate ? filter.startDate.getTime() : null
    const endMs = filter?.endDate ? filter.endDate.getTime() : null
    const matching = sessions.filter((session) => {
        if (filter?.libraryEntryId && session.libraryEntryId !== filter.libraryEntryId) return false
        if (startMs !== null && session.startTime < startMs) return false
        if (endMs !== null && session.startTime > endMs) return false
        return true
    })
    const { page, pageSize } = normalizePage(filter)
    const offset = (page - 1) * pageSize
    return matching.slice(offset, offset + pageSize)
}

/**
 * Newest first, deduplicated by id (later entries win), capped at `limit`.
 */
export function mergeHistory(existing: ReadingSession[], incoming: ReadingSession[], limit: number): ReadingSession[] {
    const byId = new Map<string, ReadingSession>()
    for (const session of existing) byId.set(session.id, session)
    for (const session of incoming) byId.set(session.id, session)
    return [...byId.values()]
        .sort((a, b) => b.startTime - a.startTime)
        .slice(0, Math.max(0, limit))
}

function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class FileSessionStore implements SessionStore {
    private readonly filePath: string
    private readonly historyLimit: number
    private readonly lock = new AsyncLock()
    private document: StateDocument | null = null

    constructor(opts: { filePath: string; historyLimit: number }) {
        this.filePath = opts.filePath
        this.historyLimit = opts.historyLimit
    }

    async getActive(): Promise<ReadingSession | null> {
        const doc = await this.read()
        return doc.active ? { ...doc.active } : null
    }

    async putActive(session: ReadingSession, opts?: { pending?: PendingSyncRecord }): Promise<void> {
        await this.mutate((doc) => {
            const pending = opts?.pending ? upsertPending(doc.pending, opts.pending) : doc.pending
            return { ...doc, active: { ...session }, pending }
        })
    }

    async clearActive(opts?: { pending?: PendingSyncRecord; history?: ReadingSession[] }): Promise<void> {
        await this.mutate((doc) => ({
            ...doc,
            active: null,
            pending: opts?.pending ? upsertPending(doc.pending, opts.pending) : doc.pending,
            history: opts?.history ? mergeHistory(doc.history, opts.history, this.historyLimit) : doc.history,
        }))
    }

    async enqueuePendingSync(record: PendingSyncRecord): Promise<void> {
        await this.mutate((doc) => ({ ...doc, pending: upsertPending(doc.pending, record) }))
    }

    async listPendingSync(): Promise<PendingSyncRecord[]> {
        const doc = await this.read()
        return doc.pending.map((record) => structuredClone(record))
    }

    async getPendingSync(id: string): Promise<PendingSyncRecord | null> {
        const doc = await this.read()
        const record = doc.pending.find((r) => r.session.id === id)
        return record ? structuredClone(record) : null
    }

    async updatePendingSync(
        id: string,
        patch: Partial<Omit<PendingSyncRecord, 'session' | 'idempotencyKey' | 'enqueuedAt'>>,
    ): Promise<void> {
        await this.mutate((doc) => ({
            ...doc,
            pending: doc.pending.map((record) => (record.session.id === id ? { ...record, ...patch } : record)),
        }))
    }

    async removePendingSync(id: string, opts?: { history?: ReadingSession[] }): Promise<void> {
        await this.mutate((doc) => ({
            ...doc,
            pending: doc.pending.filter((record) => record.session.id !== id),
            history: opts?.history ? mergeHistory(doc.history, opts.history, this.historyLimit) : doc.history,
        }))
    }

    async appendHistory(sessions: ReadingSession[]): Promise<void> {
        if (sessions.length === 0) return
        await this.mutate((doc) => ({ ...doc, history: mergeHistory(doc.history, sessions, this.historyLimit) }))
    }

    async listHistory(filter?: SessionHistoryFilter): Promise<ReadingSession[]> {
        const doc = await this.read()
        return filterHistory(doc.history, filter).map((session) => ({ ...session }))
    }

    async getLastKnownStreakDays(): Promise<number | null> {
        const doc = await this.read()
        return doc.lastKnownStreakDays
    }

    async setLastKnownStreakDays(days: number): Promise<void> {
        await this.mutate((doc) => ({ ...doc, lastKnownStreakDays: Math.max(0, Math.floor(days)) }))
    }

    async clearAll(): Promise<void> {
        await this.mutate(() => emptyDocument())
    }

    private async read(): Promise<StateDocument> {
        if (this.document) {
            return this.document
        }
        return await this.lock.inLock(() => this.load())
    }

    private async mutate(fn: (doc: StateDocument) => StateDocument): Promise<void> {
        await this.lock.inLock(async () => {
            const current = await this.load()
            const next = fn(current)
            try {
                await this.persist(next)
            } catch (error) {
                logger.error(`[STORE] Failed to write ${this.filePath}`, error)
                throw new ReadingError('unknown', 'Could not save reading state.', { canTryAgain: true, cause: error })
            }
            this.document = next
        })
    }

    // Must run inside the lock.
    private async load(): Promise<StateDocument> {
        if (this.document) {
            return this.document
        }

        let raw: string
        try {
            raw = await readFile(this.filePath, 'utf8')
        } catch (error) {
            if (isMissingFileError(error)) {
                this.document = emptyDocument()
                return this.document
            }
            throw error
        }

        let json: unknown = null
        let parseError: unknown = null
        try {
            json = JSON.parse(raw)
        } catch (error) {
            parseError = error
        }

        const parsed = parseError === null ? StateDocumentSchema.safeParse(json) : null
        if (parsed && parsed.success) {
            this.document = parsed.data
            return this.document
        }

        const asidePath = `${this.filePath}.corrupt-${Date.now()}`
        logger.warn(`[STORE] Unreadable reading state, moving it to ${asidePath}`, parseError ?? parsed?.error?.issues)
        await rename(this.filePath, asidePath)
        this.document = emptyDocument()
        return this.document
    }

    private async persist(doc: StateDocument): Promise<void> {
        await mkdir(dirname(this.filePath), { recursive: true })
        const tmpPath = `${this.filePath}.tmp-${process.pid}`
        await writeFile(tmpPath, JSON.stringify(doc, null, 2), 'utf8')
        await rename(tmpPath, this.filePath)
    }
}

function upsertPending(queue: PendingSyncRecord[], record: PendingSyncRecord): PendingSyncRecord[] {
    const index = queue.findIndex((r) => r.session.id === record.session.id)
    if (index === -1) {
        return [...queue, record]
    }
    // Re-enqueueing the same session replaces its snapshot but keeps its place in line.
    const existing = queue[index]
    const next = [...queue]
    next[index] = {
        ...record,
        enqueuedAt: existing.enqueuedAt,
        remoteSessionId: record.remoteSessionId ?? existing.remoteSessionId,
    }
    return next
}
