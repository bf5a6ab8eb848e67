import { logger } from '@/ui/logger'

/**
 * Commands accepted by the native phone-lock service (foreground service on Android,
 * keep-screen-on and Focus guidance on iOS). The engine never depends on them succeeding.
 */
export interface PhoneLockController {
    start(sessionId: string, displayTitle: string): Promise<void>
    pause(): Promise<void>
    resume(): Promise<void>
    stop(): Promise<void>
}

export type PhoneLockCommand = 'start' | 'pause' | 'resume' | 'stop'

/**
 * Used when no platform bridge is attached (tests, headless runs).
 */
export class NoopPhoneLock implements PhoneLockController {
    async start(sessionId: string, displayTitle: string): Promise<void> {
        logger.debug(`[LOCK] start(${sessionId}, ${displayTitle}) ignored: no platform bridge`)
    }

    async pause(): Promise<void> {}

    async resume(): Promise<void> {}

    async stop(): Promise<void> {}
}

export async function sendLockCommand(command: PhoneLockCommand, run: () => Promise<void>): Promise<void> {
    try {
        await run()
    } catch (error) {
        logger.warn(`[LOCK] Failed to ${command} phone lock`, error)
    }
}
