import { durationSecondsOf } from '@/session/elapsed'
import { pagesReadOf, type ReadingSession, type ReadingSessionResult, type SessionRewards } from '@/session/types'

export type RewardRates = {
    coinsPerMinute: number
    expPerPage: number
}

// Placeholder rates; the authority's calculation replaces the estimate once synced.
export const DEFAULT_REWARD_RATES: RewardRates = {
    coinsPerMinute: 1,
    expPerPage: 5,
}

/**
 * Local stand-in for the authority's reward calculation.
 * Pure and non-decreasing in both duration and pages read. No bonuses: those depend on
 * server-side streak and goal state the device cannot see.
 */
export function estimateRewards(
    input: { durationSeconds: number; pagesRead: number },
    rates: RewardRates = DEFAULT_REWARD_RATES,
): SessionRewards {
    const minutes = Math.floor(Math.max(0, input.durationSeconds) / 60)
    const pages = Math.max(0, Math.floor(input.pagesRead))
    return {
        coinsEarned: minutes * Math.max(0, rates.coinsPerMinute),
        expEarned: pages * Math.max(0, rates.expPerPage),
        bonusCoins: 0,
        bonusExp: 0,
    }
}

export function estimateSessionResult(
    session: ReadingSession,
    opts: { streakDays: number | null; rates?: RewardRates },
): ReadingSessionResult {
    const durationSeconds = durationSecondsOf(session)
    const pagesRead = pagesReadOf(session)
    return {
        sessionId: session.id,
        durationSeconds,
        pagesRead,
        // Unknown until the authority recomputes it; show the last value we were told.
        streakDays: opts.streakDays ?? 1,
        rewards: estimateRewards({ durationSeconds, pagesRead }, opts.rates),
        levelUp: false,
        newLevel: null,
        badgesEarned: [],
        isOffline: true,
    }
}
