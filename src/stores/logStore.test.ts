import { beforeEach, describe, expect, it } from 'vitest'
import { LogService } from '../../core/services/LogService'
import { bindLogStore, logStore } from './logStore'

beforeEach(() => {
  logStore.setState({ entries: new Map() })
})

describe('logStore', () => {
  it('mirrors entries of a LogService until unbound', () => {
    const log = new LogService()
    const unbind = bindLogStore(log)

    log.log('a', 'info', 'control', 'connected')
    unbind()
    log.log('a', 'info', 'control', 'ignored')

    expect(logStore.getState().entries.get('a')?.map((e) => e.message)).toEqual(['connected'])
  })

  it('follows the cap of the service', () => {
    const log = new LogService(3)
    bindLogStore(log)

    for (let i = 0; i < 5; i++) log.log('a', 'info', 'system', `line ${i}`)
    expect(logStore.getState().entries.get('a')?.map((e) => e.message)).toEqual(['line 2', 'line 3', 'line 4'])

    log.setMaxEntries(2)
    log.log('a', 'info', 'system', 'line 5')
    expect(logStore.getState().entries.get('a')?.map((e) => e.message)).toEqual(['line 4', 'line 5'])
  })

  it('drops a session when the service clears it', () => {
    const log = new LogService()
    bindLogStore(log)
    log.log('a', 'info', 'control', 'connected')
    log.log('b', 'info', 'control', 'connected')

    log.clearEntries('a')

    expect([...logStore.getState().entries.keys()]).toEqual(['b'])
  })
})
