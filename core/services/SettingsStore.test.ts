import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { promises as fsp } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { DEFAULT_SETTINGS, SettingsStore } from './SettingsStore'

let dir: string

beforeEach(async () => {
  dir = await fsp.mkdtemp(join(tmpdir(), 'hotline-settings-'))
})

afterEach(async () => {
  await fsp.rm(dir, { recursive: true, force: true })
})

describe('SettingsStore', () => {
  it('starts from the defaults', () => {
    const store = new SettingsStore({ cwd: dir })
    expect(store.getAll()).toEqual(DEFAULT_SETTINGS)
    expect(store.get('iconId')).toBe(414)
  })

  it('persists updates across instances', () => {
    new SettingsStore({ cwd: dir }).update({ nickname: 'captain', requestTimeout: 10 })

    const reopened = new SettingsStore({ cwd: dir })
    expect(reopened.get('nickname')).toBe('captain')
    expect(reopened.get('requestTimeout')).toBe(10)
    expect(reopened.get('keepAliveInterval')).toBe(DEFAULT_SETTINGS.keepAliveInterval)
  })

  it('resets to the defaults', () => {
    const store = new SettingsStore({ cwd: dir })
    store.update({ logDebugMode: true })

    expect(store.reset()).toEqual(DEFAULT_SETTINGS)
    expect(store.get('logDebugMode')).toBe(false)
  })
})
