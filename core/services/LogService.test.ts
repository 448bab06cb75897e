import { describe, expect, it } from 'vitest'
import { LogService } from './LogService'
import type { LogEntry } from '../../src/types/log'

describe('LogService', () => {
  it('keeps entries per session and emits them', () => {
    const log = new LogService()
    const seen: Array<[string, string]> = []
    log.on('entry', (sessionId: string, entry: LogEntry) => seen.push([sessionId, entry.message]))

    log.log('a', 'info', 'control', 'first')
    log.log('b', 'error', 'transfer', 'second')

    expect(log.getEntries('a').map((e) => e.message)).toEqual(['first'])
    expect(log.getEntries('b').map((e) => e.level)).toEqual(['error'])
    expect(seen).toEqual([
      ['a', 'first'],
      ['b', 'second']
    ])
  })

  it('drops the oldest entries past the limit', () => {
    const log = new LogService(2)
    for (const message of ['one', 'two', 'three']) log.log('a', 'info', 'system', message)

    expect(log.getEntries('a').map((e) => e.message)).toEqual(['two', 'three'])
  })

  it('keeps debug entries only in debug mode', () => {
    const log = new LogService()
    log.log('a', 'debug', 'control', 'hidden')
    log.setDebugMode(true)
    log.log('a', 'debug', 'control', 'shown')

    expect(log.getEntries('a').map((e) => e.message)).toEqual(['shown'])
  })

  it('formats transfer completions with a readable size', () => {
    const log = new LogService()
    LogService.transferCompleted(log, 'a', 'notes.txt', 2048)

    const [entry] = log.getEntries('a')
    expect(entry).toMatchObject({ level: 'success', source: 'transfer', message: 'Transfer completed: notes.txt (2 KB)' })
  })

  it('exports entries as text lines', () => {
    const log = new LogService()
    const entry = log.log('a', 'warning', 'chat', 'slow down', 'flood limit')

    const ts = new Date(entry.timestamp).toISOString()
    expect(log.exportLog('a')).toBe(`[${ts}] [WARNING] [CHAT    ] slow down\n  flood limit`)
  })

  it('clears a session', () => {
    const log = new LogService()
    log.log('a', 'info', 'system', 'x')
    log.clearEntries('a')
    expect(log.getEntries('a')).toEqual([])
  })
})
