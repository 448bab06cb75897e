import Conf from 'conf'
import { homedir } from 'os'
import { join } from 'path'
import type { ClientSettings } from '../../src/types/settings'

export const DEFAULT_SETTINGS: ClientSettings = {
  nickname: 'unnamed',
  iconId: 414,
  downloadFolder: join(homedir(), 'Downloads'),

  requestTimeout: 30,
  keepAliveInterval: 180,

  estimatorAlpha: 0.2,
  previewMaxBytes: 1024 * 1024,

  logMaxEntries: 5000,
  logDebugMode: false
}

export interface SettingsStoreOptions {
  /** Directory holding the settings file; defaults to the per-user config dir */
  cwd?: string
}

/**
 * SettingsStore: persists client preferences using conf.
 */
export class SettingsStore {
  private store: Conf<{ settings: ClientSettings }>

  constructor(options: SettingsStoreOptions = {}) {
    this.store = new Conf<{ settings: ClientSettings }>({
      projectName: 'hotline-client',
      configName: 'settings',
      cwd: options.cwd,
      defaults: {
        settings: DEFAULT_SETTINGS
      }
    })
  }

  /** Get all settings, defaults filled in for keys the saved file lacks */
  getAll(): ClientSettings {
    const saved: Partial<ClientSettings> = this.store.get('settings')
    return { ...DEFAULT_SETTINGS, ...saved }
  }

  get<K extends keyof ClientSettings>(key: K): ClientSettings[K] {
    return this.getAll()[key]
  }

  /** Update one or more settings */
  update(updates: Partial<ClientSettings>): ClientSettings {
    const updated = { ...this.getAll(), ...updates }
    this.store.set('settings', updated)
    return updated
  }

  /** Reset all settings to defaults */
  reset(): ClientSettings {
    this.store.set('settings', DEFAULT_SETTINGS)
    return { ...DEFAULT_SETTINGS }
  }
}
