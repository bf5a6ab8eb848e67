import { LockStatusEventSchema, type LockStatusEvent } from '@readlock/protocol'
import { logger } from '@/ui/logger'

/**
 * Validates a payload from the native lock service; null when it is not a lock-status event.
 */
export function parseLockStatusEvent(raw: unknown): LockStatusEvent | null {
    const parsed = LockStatusEventSchema.safeParse(raw)
    if (!parsed.success) {
        logger.warn('[LOCK] Ignoring malformed lock status event', parsed.error.issues)
        return null
    }
    return parsed.data
}

/**
 * Inbound queue of native lock-status events.
 *
 * The platform bridge pushes raw payloads with `sendRaw`; the session machine pulls
 * them with `for await`. Events sent before anyone iterates are buffered.
 */
export class LockEventChannel implements AsyncIterable<LockStatusEvent> {
    private buffer: LockStatusEvent[] = []
    private waiters: Array<(result: IteratorResult<LockStatusEvent>) => void> = []
    private closed = false

    send(event: LockStatusEvent): void {
        if (this.closed) {
            logger.debug(`[LOCK] Dropping ${event.status} event for ${event.sessionId}: channel closed`)
            return
        }
        const waiter = this.waiters.shift()
        if (waiter) {
            waiter({ value: event, done: false })
            return
        }
        this.buffer.push(event)
    }

    /**
     * Validates a payload from the native side. Returns false when it was dropped.
     */
    sendRaw(payload: unknown): boolean {
        const event = parseLockStatusEvent(payload)
        if (!event) {
            return false
        }
        this.send(event)
        return true
    }

    close(): void {
        if (this.closed) return
        this.closed = true
        const waiters = this.waiters
        this.waiters = []
        for (const waiter of waiters) {
            waiter({ value: undefined, done: true })
        }
    }

    get isClosed(): boolean {
        return this.closed
    }

    [Symbol.asyncIterator](): AsyncIterator<LockStatusEvent> {
        return {
            next: () => {
                const buffered = this.buffer.shift()
                if (buffered) {
                    return Promise.resolve({ value: buffered, done: false })
                }
                if (this.closed) {
                    return Promise.resolve({ value: undefined, done: true })
                }
                return new Promise((resolve) => {
                    this.waiters.push(resolve)
                })
            },
            return: () => {
                this.close()
                return Promise.resolve({ value: undefined, done: true })
            },
        }
    }
}
