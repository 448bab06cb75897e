import type { TransferItem } from '../types/transfer'

/**
 * Format a file size in bytes to human-readable string.
 * @param decimals Number of decimal places
 */
export function formatFileSize(bytes: number, decimals: number = 1): string {
  if (bytes === 0) return '0 B'
  if (bytes < 0) return '-'

  const k = 1024
  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB']
  const i = Math.min(units.length - 1, Math.floor(Math.log(bytes) / Math.log(k)))

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(decimals))} ${units[i]}`
}

/** Transfer speed; '-' while the estimate is not yet trusted */
export function formatSpeed(bytesPerSecond: number | undefined): string {
  if (bytesPerSecond === undefined || bytesPerSecond <= 0) return '-'
  return `${formatFileSize(bytesPerSecond)}/s`
}

/** Seconds remaining; '-' when unknown */
export function formatETA(seconds: number | undefined): string {
  if (seconds === undefined || seconds <= 0 || !isFinite(seconds)) return '-'
  if (seconds < 60) return `${Math.round(seconds)}s`
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${Math.round(seconds % 60)}s`
  const h = Math.floor(seconds / 3600)
  const m = Math.floor((seconds % 3600) / 60)
  return `${h}h ${m}m`
}

/** One-line progress summary, e.g. "1 MB of 4 MB, 512 KB/s, 6s left" */
export function formatProgress(item: Pick<TransferItem, 'transferredBytes' | 'totalSize' | 'speed' | 'eta'>): string {
  const amount = `${formatFileSize(item.transferredBytes)} of ${formatFileSize(item.totalSize)}`
  if (item.speed === undefined) return amount
  return `${amount}, ${formatSpeed(item.speed)}, ${formatETA(item.eta)} left`
}
