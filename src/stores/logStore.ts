import { createStore } from 'zustand/vanilla'
import type { LogEntry } from '../types/log'
import type { LogService } from '../../core/services/LogService'

interface LogState {
  /** Log entries keyed by sessionId, as kept by the LogService */
  entries: Map<string, LogEntry[]>

  /** Replace the entries of a session */
  setEntries: (sessionId: string, entries: LogEntry[]) => void
  /** Clear all entries for a session */
  clearEntries: (sessionId: string) => void
}

export const logStore = createStore<LogState>()((set) => ({
  entries: new Map(),

  setEntries: (sessionId, entries) =>
    set((state) => {
      const newMap = new Map(state.entries)
      newMap.set(sessionId, entries)
      return { entries: newMap }
    }),

  clearEntries: (sessionId) =>
    set((state) => {
      const newMap = new Map(state.entries)
      newMap.delete(sessionId)
      return { entries: newMap }
    })
}))

/**
 * Mirror a LogService into the store; returns the unbind function. The
 * service owns the per-session cap, the store copies what it keeps.
 */
export function bindLogStore(log: LogService, store = logStore): () => void {
  const { setEntries, clearEntries } = store.getState()
  const onEntry = (sessionId: string): void => setEntries(sessionId, [...log.getEntries(sessionId)])
  log.on('entry', onEntry)
  log.on('cleared', clearEntries)
  return () => {
    log.off('entry', onEntry)
    log.off('cleared', clearEntries)
  }
}
