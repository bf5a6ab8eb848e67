import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { Logger } from './logger'

describe('Logger', () => {
    let dir: string

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'readlock-logs-'))
        vi.spyOn(console, 'log').mockImplementation(() => {})
    })

    afterEach(() => {
        vi.restoreAllMocks()
        rmSync(dir, { recursive: true, force: true })
    })

    it('appends every level to the log file', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        const log = new Logger(dir)

        log.info('[SYNC] Drained', { synced: 1 })
        log.warn('[LOCK] Dropped event')

        const lines = readFileSync(log.logFilePath, 'utf8').trimEnd().split('\n')
        expect(lines).toHaveLength(2)
        expect(lines[0]).toMatch(/^\[.+\] INFO \[SYNC\] Drained {"synced":1}$/)
        expect(lines[1]).toMatch(/^\[.+\] WARN \[LOCK\] Dropped event$/)
    })

    it('reports an unwritable log file on stderr only once', () => {
        const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
        const log = new Logger(join(dir, 'missing'))

        log.info('first')
        log.info('second')
        log.debug('third')

        expect(stderr).toHaveBeenCalledTimes(1)
        expect(String(stderr.mock.calls[0][0])).toContain(`[LOGGER] Failed to write ${log.logFilePath}`)
    })
})
