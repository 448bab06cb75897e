import { EventEmitter } from 'events'
import { v4 as uuid } from 'uuid'
import { formatFileSize } from '../../src/utils/fileSize'
import type { LogEntry, LogLevel, LogSource } from '../../src/types/log'

const DEFAULT_MAX_ENTRIES = 5000

/**
 * LogService: central event-based log aggregator for all server activity.
 *
 * Stores log entries per session in memory (FIFO with configurable max).
 * Emits 'entry' events with (sessionId, LogEntry) and 'cleared' with the
 * sessionId so observers can mirror them.
 */
export class LogService extends EventEmitter {
  private entries: Map<string, LogEntry[]> = new Map()
  private maxEntries: number
  private debugMode: boolean

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES, debugMode: boolean = false) {
    super()
    this.maxEntries = maxEntries
    this.debugMode = debugMode
  }

  setMaxEntries(max: number): void {
    this.maxEntries = max
  }

  /** Enable or disable debug-level log entries */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled
  }

  /** Add a log entry for a session */
  log(
    sessionId: string,
    level: LogLevel,
    source: LogSource,
    message: string,
    details?: string
  ): LogEntry {
    const entry: LogEntry = {
      id: uuid(),
      timestamp: Date.now(),
      level,
      source,
      message,
      details,
      sessionId
    }

    // Debug entries are only kept in debug mode
    if (level === 'debug' && !this.debugMode) return entry

    let sessionEntries = this.entries.get(sessionId)
    if (!sessionEntries) {
      sessionEntries = []
      this.entries.set(sessionId, sessionEntries)
    }

    sessionEntries.push(entry)

    while (sessionEntries.length > this.maxEntries) {
      sessionEntries.shift()
    }

    this.emit('entry', sessionId, entry)
    return entry
  }

  getEntries(sessionId: string): LogEntry[] {
    return this.entries.get(sessionId) ?? []
  }

  clearEntries(sessionId: string): void {
    this.entries.delete(sessionId)
    this.emit('cleared', sessionId)
  }

  /** Export log entries as formatted text */
  exportLog(sessionId: string): string {
    return this.getEntries(sessionId)
      .map((e) => {
        const ts = new Date(e.timestamp).toISOString()
        const level = e.level.toUpperCase().padEnd(7)
        const src = e.source.toUpperCase().padEnd(8)
        const detail = e.details ? `\n  ${e.details}` : ''
        return `[${ts}] [${level}] [${src}] ${e.message}${detail}`
      })
      .join('\n')
  }

  // ── Static helper methods for common log messages ──

  static connecting(log: LogService, sessionId: string, host: string, port: number): void {
    log.log(sessionId, 'info', 'control', `Connecting to Hotline server ${host}:${port}...`)
  }

  static handshakeComplete(log: LogService, sessionId: string): void {
    log.log(sessionId, 'info', 'control', 'Handshake completed.')
  }

  static loggingIn(log: LogService, sessionId: string, login: string): void {
    log.log(sessionId, 'info', 'control', `Logging in as ${login || 'guest'}...`)
  }

  static loginSuccess(log: LogService, sessionId: string, serverName: string, version: number): void {
    log.log(sessionId, 'success', 'control', `Logged in to ${serverName} (version ${version}).`)
  }

  static loginFailed(log: LogService, sessionId: string, reason: string): void {
    log.log(sessionId, 'error', 'control', `Login failed: ${reason}`)
  }

  static connectionLost(log: LogService, sessionId: string, reason: string): void {
    log.log(sessionId, 'error', 'control', `Connection lost: ${reason}`)
  }

  static disconnectedByUser(log: LogService, sessionId: string): void {
    log.log(sessionId, 'info', 'control', 'Disconnected by user.')
  }

  static disconnectedByServer(log: LogService, sessionId: string, message: string): void {
    log.log(sessionId, 'warning', 'control', `Server closed the session: ${message}`)
  }

  static permissionDenied(log: LogService, sessionId: string, capability: string): void {
    log.log(sessionId, 'warning', 'system', `Not permitted: ${capability}`)
  }

  static unknownReply(log: LogService, sessionId: string, transactionId: number): void {
    log.log(sessionId, 'debug', 'control', `Dropped reply for unknown transaction ${transactionId}.`)
  }

  static keepAliveSent(log: LogService, sessionId: string): void {
    log.log(sessionId, 'debug', 'control', 'Keep-alive sent.')
  }

  static transferStarted(log: LogService, sessionId: string, name: string, direction: string): void {
    log.log(sessionId, 'info', 'transfer', `Transfer started: ${name} (${direction})`)
  }

  static transferCompleted(log: LogService, sessionId: string, name: string, bytes: number): void {
    log.log(sessionId, 'success', 'transfer', `Transfer completed: ${name} (${formatFileSize(bytes)})`)
  }

  static transferFailed(log: LogService, sessionId: string, name: string, reason: string): void {
    log.log(sessionId, 'error', 'transfer', `Transfer failed: ${name}: ${reason}`)
  }

  static transferCancelled(log: LogService, sessionId: string, name: string): void {
    log.log(sessionId, 'info', 'transfer', `Transfer cancelled: ${name}`)
  }
}

let logServiceInstance: LogService | null = null

/** Get (or create) the singleton LogService */
export function getLogService(): LogService {
  if (!logServiceInstance) {
    logServiceInstance = new LogService()
  }
  return logServiceInstance
}
