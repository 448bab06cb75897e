/** Transfer status. Completed, failed and cancelled are terminal. */
export type TransferStatus = 'pending' | 'active' | 'completed' | 'failed' | 'cancelled'

/** Transfer direction */
export type TransferDirection = 'upload' | 'download'

/** One file inside a folder transfer */
export interface TransferItemFile {
  /** Path relative to the transferred folder, including the file name */
  path: string[]
  totalSize: number
  transferredBytes: number
  status: TransferStatus
}

/** A single transfer, as seen by observers */
export interface TransferItem {
  id: string
  serverId: string
  referenceNumber?: number
  title: string
  direction: TransferDirection
  status: TransferStatus
  isFolder: boolean
  isPreview: boolean
  remotePath: string[]
  localPath?: string
  totalSize: number
  transferredBytes: number
  speed?: number       // bytes/sec, absent until the estimate is trustworthy
  eta?: number         // seconds remaining
  items?: TransferItemFile[]
  error?: string
  startedAt?: number
  completedAt?: number
}

export const TERMINAL_TRANSFER_STATUSES: readonly TransferStatus[] = ['completed', 'failed', 'cancelled']

export function isTerminalStatus(status: TransferStatus): boolean {
  return TERMINAL_TRANSFER_STATUSES.includes(status)
}
