import type { ReadingSession } from './types'

type ElapsedFields = Pick<ReadingSession, 'startTime' | 'totalPauseDurationMs' | 'pausedAt'>

/**
 * Reading time in ms at `now`. An open pause counts as paused time up to `now`.
 * Derived from timestamps only; the UI tick never feeds into it.
 */
export function elapsedMs(session: ElapsedFields, now: number): number {
    const openPauseMs = session.pausedAt !== null ? Math.max(0, now - session.pausedAt) : 0
    return Math.max(0, now - session.startTime - session.totalPauseDurationMs - openPauseMs)
}

export function elapsedSeconds(session: ElapsedFields, now: number): number {
    return Math.floor(elapsedMs(session, now) / 1000)
}

export function applyPause(session: ReadingSession, now: number): ReadingSession {
    if (session.pausedAt !== null) {
        return session
    }
    return { ...session, pausedAt: now }
}

export function applyResume(session: ReadingSession, now: number): ReadingSession {
    if (session.pausedAt === null) {
        return session
    }
    const pauseDelta = Math.max(0, now - session.pausedAt)
    return {
        ...session,
        pausedAt: null,
        totalPauseDurationMs: session.totalPauseDurationMs + pauseDelta,
    }
}

/**
 * Closes any open pause and stamps the end of the session.
 */
export function applyEnd(session: ReadingSession, params: { now: number; endPage: number; focusScore: number | null }): ReadingSession {
    const resumed = applyResume(session, params.now)
    return {
        ...resumed,
        endTime: params.now,
        endPage: params.endPage,
        focusScore: params.focusScore,
    }
}

export function durationSecondsOf(session: ReadingSession): number {
    const end = session.endTime ?? session.startTime
    return elapsedSeconds(session, end)
}
