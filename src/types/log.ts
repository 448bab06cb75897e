/** Severity level for a log entry */
export type LogLevel = 'info' | 'warning' | 'error' | 'success' | 'debug'

/** Subsystem that generated the log entry */
export type LogSource = 'control' | 'transfer' | 'files' | 'news' | 'chat' | 'system'

/** A single entry of a server's activity log */
export interface LogEntry {
  id: string
  timestamp: number              // Unix ms
  level: LogLevel
  source: LogSource
  message: string
  details?: string               // Expandable details (e.g., server error text)
  sessionId: string
}
