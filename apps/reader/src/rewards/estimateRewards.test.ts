import { describe, expect, it } from 'vitest'
import type { ReadingSession } from '@/session/types'
import { DEFAULT_REWARD_RATES, estimateRewards, estimateSessionResult } from './estimateRewards'

describe('estimateRewards', () => {
    it('pays per whole minute and per page', () => {
        expect(estimateRewards({ durationSeconds: 300, pagesRead: 10 })).toEqual({
            coinsEarned: 5,
            expEarned: 50,
            bonusCoins: 0,
            bonusExp: 0,
        })
        expect(estimateRewards({ durationSeconds: 119, pagesRead: 0 }).coinsEarned).toBe(1)
    })

    it('never goes negative', () => {
        expect(estimateRewards({ durationSeconds: -30, pagesRead: -4 })).toEqual({ coinsEarned: 0, expEarned: 0, bonusCoins: 0, bonusExp: 0 })
    })

    it('does not decrease as duration or pages grow', () => {
        let previous = estimateRewards({ durationSeconds: 0, pagesRead: 0 })
        for (let step = 1; step <= 40; step++) {
            const next = estimateRewards({ durationSeconds: step * 37, pagesRead: Math.floor(step / 3) })
            expect(next.coinsEarned).toBeGreaterThanOrEqual(previous.coinsEarned)
            expect(next.expEarned).toBeGreaterThanOrEqual(previous.expEarned)
            previous = next
        }
    })

    it('applies custom rates', () => {
        expect(estimateRewards({ durationSeconds: 600, pagesRead: 3 }, { coinsPerMinute: 2, expPerPage: 10 })).toMatchObject({
            coinsEarned: 20,
            expEarned: 30,
        })
        expect(DEFAULT_REWARD_RATES).toEqual({ coinsPerMinute: 1, expPerPage: 5 })
    })
})

describe('estimateSessionResult', () => {
    const ended: ReadingSession = {
        id: 'offline_1',
        libraryEntryId: 'book-1',
        startTime: 1_000_000,
        endTime: 1_000_000 + 430_000,
        startPage: 40,
        endPage: 52,
        totalPauseDurationMs: 70_000,
        pausedAt: null,
        focusScore: null,
        isOffline: true,
        needsSync: true,
    }

    it('flags the estimate as offline and keeps the last known streak', () => {
        expect(estimateSessionResult(ended, { streakDays: 6 })).toEqual({
            sessionId: 'offline_1',
            durationSeconds: 360,
            pagesRead: 12,
            streakDays: 6,
            rewards: { coinsEarned: 6, expEarned: 60, bonusCoins: 0, bonusExp: 0 },
            levelUp: false,
            newLevel: null,
            badgesEarned: [],
            isOffline: true,
        })
    })

    it('falls back to a one-day streak when none is known', () => {
        expect(estimateSessionResult(ended, { streakDays: null }).streakDays).toBe(1)
    })

    it('counts no pages when the end page is before the start page', () => {
        expect(estimateSessionResult({ ...ended, endPage: 30 }, { streakDays: null }).pagesRead).toBe(0)
    })
})
