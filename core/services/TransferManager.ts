import { EventEmitter } from 'events'
import { promises as fsp } from 'fs'
import { basename, join } from 'path'
import { v4 as uuid } from 'uuid'
import { TransferError, errorMessage } from '../errors'
import { TransferRateEstimator, type RateEstimatorOptions } from '../utils/rateEstimator'
import { collectFolderItems, uniqueDestination } from '../utils/localFiles'
import {
  TransferConnection,
  encodeFolderItemHeader,
  flattenedUploadSize,
  safeSegment,
  type FolderUploadItem,
  type TransferSink
} from './TransferConnection'
import { getLogService, LogService } from './LogService'
import type { FileService } from './FileService'
import type { HotlineSession } from './HotlineSession'
import type { FileEntry } from '../../src/types/hotline'
import { isTerminalStatus, type TransferItem, type TransferStatus } from '../../src/types/transfer'

/** The server a transfer runs against */
export interface TransferEndpoint {
  session: HotlineSession
  files: FileService
}

export interface TransferManagerOptions {
  estimator?: RateEstimatorOptions
  /** Largest file startPreview accepts; 0 means no limit */
  previewMaxBytes?: number
  log?: LogService
}

const DEFAULT_PREVIEW_MAX_BYTES = 1024 * 1024

/** Per-transfer bookkeeping that observers never see */
interface ActiveTransfer {
  connection?: TransferConnection
  estimator: TransferRateEstimator
  currentItem?: number
}

/**
 * TransferManager: runs uploads, downloads and previews over data
 * connections and publishes their progress.
 *
 * Emits:
 *   'update'        → (item: TransferItem)
 *   'complete'      → (item: TransferItem), exactly once per transfer
 *   'preview-ready' → (item: TransferItem, data: Buffer)
 *   'removed'       → (id: string)
 */
export class TransferManager extends EventEmitter {
  private items: Map<string, TransferItem> = new Map()
  private active: Map<string, ActiveTransfer> = new Map()
  private estimatorOptions: RateEstimatorOptions
  private previewMaxBytes: number
  private log: LogService

  constructor(options: TransferManagerOptions = {}) {
    super()
    this.estimatorOptions = options.estimator ?? {}
    this.previewMaxBytes = options.previewMaxBytes ?? DEFAULT_PREVIEW_MAX_BYTES
    this.log = options.log ?? getLogService()
  }

  // ── Starting transfers ──

  /** Download a file or folder into `destinationDir` */
  startDownload(endpoint: TransferEndpoint, entry: FileEntry, destinationDir: string): TransferItem {
    endpoint.session.assertAllowed(entry.isFolder ? 'downloadFolders' : 'downloadFiles')

    const item = this.create(endpoint, {
      title: entry.name,
      direction: 'download',
      isFolder: entry.isFolder,
      isPreview: false,
      remotePath: [...entry.path, entry.name],
      totalSize: entry.size
    })

    const run = entry.isFolder
      ? this.runFolderDownload(endpoint, item.id, entry, destinationDir)
      : this.runFileDownload(endpoint, item.id, entry, destinationDir)
    this.track(item.id, run)
    return this.snapshot(item)
  }

  /** Fetch a file into memory; 'preview-ready' carries the bytes */
  startPreview(endpoint: TransferEndpoint, entry: FileEntry): TransferItem {
    if (entry.isFolder) throw new TransferError(`Cannot preview folder "${entry.name}"`)
    if (this.previewMaxBytes > 0 && entry.size > this.previewMaxBytes) {
      throw new TransferError(`"${entry.name}" is too large to preview`)
    }
    endpoint.session.assertAllowed('downloadFiles')

    const item = this.create(endpoint, {
      title: entry.name,
      direction: 'download',
      isFolder: false,
      isPreview: true,
      remotePath: [...entry.path, entry.name],
      totalSize: entry.size
    })

    this.track(item.id, this.runPreview(endpoint, item.id, entry))
    return this.snapshot(item)
  }

  /** Upload a local file or folder into the remote folder `remotePath` */
  async startUpload(endpoint: TransferEndpoint, localPath: string, remotePath: string[]): Promise<TransferItem> {
    const stat = await fsp.stat(localPath)
    const isFolder = stat.isDirectory()
    endpoint.session.assertAllowed(isFolder ? 'uploadFolders' : 'uploadFiles')

    const name = basename(localPath)
    const item = this.create(endpoint, {
      title: name,
      direction: 'upload',
      isFolder,
      isPreview: false,
      remotePath: [...remotePath, name],
      localPath,
      totalSize: isFolder ? 0 : stat.size
    })

    const run = isFolder
      ? this.runFolderUpload(endpoint, item.id, localPath, remotePath)
      : this.runFileUpload(endpoint, item.id, localPath, stat.size, remotePath)
    this.track(item.id, run)
    return this.snapshot(item)
  }

  // ── Control ──

  cancel(id: string): void {
    const item = this.items.get(id)
    if (!item || isTerminalStatus(item.status)) return
    this.finalize(id, 'cancelled')
  }

  cancelAllForServer(serverId: string): void {
    for (const item of this.items.values()) {
      if (item.serverId === serverId) this.cancel(item.id)
    }
  }

  /** Forget a transfer, cancelling it first if it is still running */
  remove(id: string): void {
    if (!this.items.has(id)) return
    this.cancel(id)
    this.items.delete(id)
    this.emit('removed', id)
  }

  /** Forget every transfer in a terminal state */
  clearFinished(): void {
    for (const item of [...this.items.values()]) {
      if (isTerminalStatus(item.status)) this.remove(item.id)
    }
  }

  getAll(): TransferItem[] {
    return Array.from(this.items.values(), (item) => this.snapshot(item))
  }

  get(id: string): TransferItem | undefined {
    const item = this.items.get(id)
    return item ? this.snapshot(item) : undefined
  }

  /** Observe one transfer; returns the unsubscribe function */
  subscribe(id: string, listener: (item: TransferItem) => void): () => void {
    const onUpdate = (item: TransferItem) => {
      if (item.id === id) listener(item)
    }
    this.on('update', onUpdate)
    return () => this.off('update', onUpdate)
  }

  // ── Runs ──

  private async runFileDownload(
    endpoint: TransferEndpoint,
    id: string,
    entry: FileEntry,
    destinationDir: string
  ): Promise<void> {
    const ticket = await endpoint.files.requestDownload(entry.name, entry.path)
    const destination = await uniqueDestination(join(destinationDir, safeSegment(entry.name)))
    const connection = await this.open(endpoint, id, ticket.referenceNumber, 0, false, ticket.transferSize, destination)
    if (!connection) return

    await connection.downloadFile(destination, this.sinkFor(id))
    this.finalize(id, 'completed')
  }

  private async runFolderDownload(
    endpoint: TransferEndpoint,
    id: string,
    entry: FileEntry,
    destinationDir: string
  ): Promise<void> {
    const ticket = await endpoint.files.requestFolderDownload(entry.name, entry.path)
    const destination = await uniqueDestination(join(destinationDir, safeSegment(entry.name)))
    const connection = await this.open(endpoint, id, ticket.referenceNumber, 0, true, ticket.transferSize, destination)
    if (!connection) return

    await connection.downloadFolder(ticket.itemCount, destination, this.sinkFor(id))
    this.finalize(id, 'completed')
  }

  private async runPreview(endpoint: TransferEndpoint, id: string, entry: FileEntry): Promise<void> {
    const ticket = await endpoint.files.requestDownload(entry.name, entry.path, true)
    const connection = await this.open(endpoint, id, ticket.referenceNumber, 0, false, ticket.transferSize)
    if (!connection) return

    const data = await connection.downloadPreview(ticket.transferSize, this.sinkFor(id))
    const item = this.items.get(id)
    if (!item || item.status !== 'active') return
    this.emit('preview-ready', this.snapshot(item), data)
    this.finalize(id, 'completed')
  }

  private async runFileUpload(
    endpoint: TransferEndpoint,
    id: string,
    localPath: string,
    fileSize: number,
    remotePath: string[]
  ): Promise<void> {
    const name = basename(localPath)
    const totalSize = await flattenedUploadSize(localPath, name, fileSize)
    const referenceNumber = await endpoint.files.requestUpload(name, remotePath, totalSize)
    const connection = await this.open(endpoint, id, referenceNumber, totalSize, false, totalSize)
    if (!connection) return

    await connection.uploadFile(localPath, name, this.sinkFor(id))
    this.finalize(id, 'completed')
  }

  private async runFolderUpload(
    endpoint: TransferEndpoint,
    id: string,
    localPath: string,
    remotePath: string[]
  ): Promise<void> {
    const name = basename(localPath)
    const items = await collectFolderItems(localPath)
    const totalSize = await folderUploadSize(items)
    const referenceNumber = await endpoint.files.requestFolderUpload(name, remotePath, items.length, totalSize)
    const connection = await this.open(endpoint, id, referenceNumber, 0, true, totalSize)
    if (!connection) return

    await connection.uploadFolder(items, this.sinkFor(id))
    this.finalize(id, 'completed')
  }

  /**
   * Open the data connection once the server has issued a reference number.
   * Returns undefined when the transfer was cancelled in the meantime.
   */
  private async open(
    endpoint: TransferEndpoint,
    id: string,
    referenceNumber: number,
    dataSize: number,
    folder: boolean,
    totalSize: number,
    localPath?: string
  ): Promise<TransferConnection | undefined> {
    const pending = this.items.get(id)
    if (!pending || pending.status !== 'pending') return undefined
    pending.referenceNumber = referenceNumber
    pending.totalSize = totalSize
    if (localPath) pending.localPath = localPath

    const connection = await TransferConnection.open(
      endpoint.session.connector,
      endpoint.session.address,
      referenceNumber,
      dataSize,
      folder
    )

    const item = this.items.get(id)
    const state = this.active.get(id)
    if (!item || !state || item.status !== 'pending') {
      connection.close()
      return undefined
    }

    state.connection = connection
    state.estimator.start()
    item.status = 'active'
    item.startedAt = Date.now()
    LogService.transferStarted(this.log, item.serverId, item.title, item.direction)
    this.emit('update', this.snapshot(item))
    return connection
  }

  /** Route failures of a run into the transfer's state */
  private track(id: string, run: Promise<void>): void {
    run.catch((err: unknown) => {
      const item = this.items.get(id)
      if (!item || isTerminalStatus(item.status)) return
      this.finalize(id, 'failed', errorMessage(err, 'Transfer failed'))
    })
  }

  private sinkFor(id: string): TransferSink {
    return {
      onBytes: (count) => this.onBytes(id, count),
      onItemStart: (path, size) => {
        const item = this.items.get(id)
        const state = this.active.get(id)
        if (!item || !state || item.status !== 'active') return
        item.items ??= []
        state.currentItem = item.items.push({ path: [...path], totalSize: size, transferredBytes: 0, status: 'active' }) - 1
        this.emit('update', this.snapshot(item))
      },
      onItemComplete: () => {
        const item = this.items.get(id)
        const state = this.active.get(id)
        if (!item || !state || item.status !== 'active' || state.currentItem === undefined) return
        const file = item.items?.[state.currentItem]
        if (file) {
          file.status = 'completed'
          file.transferredBytes = file.totalSize
        }
        state.currentItem = undefined
        this.emit('update', this.snapshot(item))
      }
    }
  }

  private onBytes(id: string, count: number): void {
    const item = this.items.get(id)
    const state = this.active.get(id)
    if (!item || !state || item.status !== 'active' || count <= 0) return

    item.transferredBytes += count
    if (state.currentItem !== undefined) {
      const file = item.items?.[state.currentItem]
      if (file) file.transferredBytes = Math.min(file.totalSize, file.transferredBytes + count)
    }

    state.estimator.sample(count)
    const { speed, eta } = state.estimator.estimate(item.totalSize - item.transferredBytes)
    item.speed = speed
    item.eta = eta
    this.emit('update', this.snapshot(item))
  }

  // ── State ──

  private create(
    endpoint: TransferEndpoint,
    fields: Pick<TransferItem, 'title' | 'direction' | 'isFolder' | 'isPreview' | 'remotePath' | 'totalSize'> &
      Partial<Pick<TransferItem, 'localPath'>>
  ): TransferItem {
    const item: TransferItem = {
      id: uuid(),
      serverId: endpoint.session.id,
      status: 'pending',
      transferredBytes: 0,
      ...fields
    }
    this.items.set(item.id, item)
    this.active.set(item.id, { estimator: new TransferRateEstimator(this.estimatorOptions) })
    this.emit('update', this.snapshot(item))
    return item
  }

  /** Move to a terminal state; later calls for the same transfer are no-ops */
  private finalize(id: string, status: TransferStatus, error?: string): void {
    const item = this.items.get(id)
    if (!item || isTerminalStatus(item.status)) return

    const state = this.active.get(id)
    this.active.delete(id)

    item.status = status
    item.completedAt = Date.now()
    item.speed = undefined
    item.eta = undefined

    if (state?.currentItem !== undefined) {
      const file = item.items?.[state.currentItem]
      if (file && !isTerminalStatus(file.status)) file.status = status
    }

    switch (status) {
      case 'completed':
        item.transferredBytes = Math.max(item.transferredBytes, item.totalSize)
        LogService.transferCompleted(this.log, item.serverId, item.title, item.transferredBytes)
        break
      case 'cancelled':
        state?.connection?.close()
        LogService.transferCancelled(this.log, item.serverId, item.title)
        break
      case 'failed':
        item.error = error ?? 'Transfer failed'
        state?.connection?.close()
        LogService.transferFailed(this.log, item.serverId, item.title, item.error)
        break
    }

    const snapshot = this.snapshot(item)
    this.emit('update', snapshot)
    this.emit('complete', snapshot)
  }

  private snapshot(item: TransferItem): TransferItem {
    return {
      ...item,
      remotePath: [...item.remotePath],
      items: item.items?.map((file) => ({ ...file, path: [...file.path] }))
    }
  }
}

/** Bytes a folder upload puts on the data connection after the first action */
async function folderUploadSize(items: FolderUploadItem[]): Promise<number> {
  let total = 0
  for (const item of items) {
    total += encodeFolderItemHeader(item.path, item.isFolder).length
    if (!item.isFolder) {
      const name = item.path.at(-1) ?? ''
      total += 4 + (await flattenedUploadSize(item.localPath, name, item.size))
    }
  }
  return total
}
