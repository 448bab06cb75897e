/** Client settings persisted between runs */
export interface ClientSettings {
  // Identity
  nickname: string
  iconId: number
  downloadFolder: string

  // Connection (seconds; keep-alive 0 disables it)
  requestTimeout: number
  keepAliveInterval: number

  // Transfers
  estimatorAlpha: number
  previewMaxBytes: number

  // Log
  logMaxEntries: number
  logDebugMode: boolean
}
