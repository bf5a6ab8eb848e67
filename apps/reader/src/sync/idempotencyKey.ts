import { createHash } from 'node:crypto'
import type { ReadingSession } from '@/session/types'

const KEY_NAMESPACE = 'readlock-session:v1'

/**
 * Stable across retries and restarts: the same local session always maps to the same key.
 */
export function deriveIdempotencyKey(session: Pick<ReadingSession, 'id' | 'libraryEntryId' | 'startTime'>): string {
    return createHash('sha256')
        .update([KEY_NAMESPACE, session.libraryEntryId, String(session.startTime), session.id].join('|'))
        .digest('hex')
}
