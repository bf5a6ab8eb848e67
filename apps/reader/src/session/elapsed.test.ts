import { describe, expect, it } from 'vitest'
import { applyEnd, applyPause, applyResume, durationSecondsOf, elapsedSeconds } from './elapsed'
import type { ReadingSession } from './types'

const base: ReadingSession = {
    id: 'srv_1',
    libraryEntryId: 'book-1',
    startTime: 10_000,
    endTime: null,
    startPage: 0,
    endPage: null,
    totalPauseDurationMs: 0,
    pausedAt: null,
    focusScore: null,
    isOffline: false,
    needsSync: false,
}

describe('elapsed time', () => {
    it('excludes an open pause up to now', () => {
        const paused = applyPause(base, 40_000)
        expect(elapsedSeconds(paused, 40_000)).toBe(30)
        expect(elapsedSeconds(paused, 95_000)).toBe(30)
    })

    it('accumulates pause time only on resume', () => {
        const paused = applyPause(base, 40_000)
        expect(paused.totalPauseDurationMs).toBe(0)
        const resumed = applyResume(paused, 55_500)
        expect(resumed).toMatchObject({ pausedAt: null, totalPauseDurationMs: 15_500 })
        expect(elapsedSeconds(resumed, 70_000)).toBe(44)
    })

    it('ignores a second pause and a resume while not paused', () => {
        const paused = applyPause(base, 40_000)
        expect(applyPause(paused, 50_000)).toBe(paused)
        expect(applyResume(base, 50_000)).toBe(base)
    })

    it('closes an open pause when the session ends', () => {
        const ended = applyEnd(applyPause(base, 70_000), { now: 100_000, endPage: 8, focusScore: 55 })
        expect(ended).toMatchObject({ endTime: 100_000, endPage: 8, focusScore: 55, pausedAt: null, totalPauseDurationMs: 30_000 })
        expect(durationSecondsOf(ended)).toBe(60)
    })

    it('never reports negative time when the clock moved backwards', () => {
        expect(elapsedSeconds(base, 5_000)).toBe(0)
    })
})
