import { promises as fsp } from 'fs'
import { dirname, join } from 'path'
import type { Duplex } from 'stream'
import { TransferError, errorMessage } from '../errors'
import { TRANSFER_PROTOCOL_ID } from '../protocol/constants'
import {
  FILE_HEADER_SIZE,
  FORK_HEADER_SIZE,
  decodeFileHeader,
  decodeForkHeader,
  decodeInfoFork,
  encodeFileHeader,
  encodeForkHeader,
  encodeInfoFork,
  infoForkFor,
  type InfoFork
} from '../protocol/flattenedFile'
import type { SocketConnector } from './HotlineSession'
import type { ServerAddress } from '../../src/types/hotline'

/** Folder transfer actions exchanged on the data connection */
export const FolderAction = {
  sendFile: 1,
  resumeFile: 2,
  nextFile: 3
} as const

const CHUNK_SIZE = 64 * 1024
const READ_HIGH_WATER = 1024 * 1024

/** Receives progress from a running data connection */
export interface TransferSink {
  /** Bytes moved across the data connection */
  onBytes(count: number): void
  /** A file inside a folder transfer started */
  onItemStart(path: string[], size: number): void
  onItemComplete(path: string[]): void
}

/** A file or folder to send in a folder upload, relative to the uploaded folder */
export interface FolderUploadItem {
  path: string[]
  isFolder: boolean
  localPath: string
  /** Data fork size for files */
  size: number
}

/**
 * Buffered reader over the data socket. Reads resolve once enough bytes
 * arrived and reject with TransferError when the connection ends first.
 */
export class DataReader {
  private buffer: Buffer = Buffer.alloc(0)
  private failure: Error | null = null
  private waiter: { min: number; resolve: () => void; reject: (err: Error) => void } | null = null
  private socket: Duplex

  constructor(socket: Duplex) {
    this.socket = socket
    socket.on('data', (chunk: Buffer) => {
      this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk])
      if (this.buffer.length > READ_HIGH_WATER) socket.pause()
      this.wake()
    })
    socket.on('end', () => this.finish(new TransferError('Data connection closed early')))
    socket.on('close', () => this.finish(new TransferError('Data connection closed early')))
    socket.on('error', (err: Error) => this.finish(new TransferError(err.message)))
  }

  async read(length: number): Promise<Buffer> {
    await this.waitFor(length)
    return this.take(length)
  }

  /** At least one and at most `max` bytes */
  async readSome(max: number): Promise<Buffer> {
    await this.waitFor(1)
    return this.take(Math.min(max, this.buffer.length))
  }

  async readUInt16(): Promise<number> {
    return (await this.read(2)).readUInt16BE(0)
  }

  async readUInt32(): Promise<number> {
    return (await this.read(4)).readUInt32BE(0)
  }

  private take(length: number): Buffer {
    const out = Buffer.from(this.buffer.subarray(0, length))
    this.buffer = this.buffer.subarray(length)
    if (this.socket.isPaused() && this.buffer.length < READ_HIGH_WATER) this.socket.resume()
    return out
  }

  private waitFor(min: number): Promise<void> {
    if (this.buffer.length >= min) return Promise.resolve()
    if (this.failure) return Promise.reject(this.failure)
    return new Promise<void>((resolve, reject) => {
      this.waiter = { min, resolve, reject }
    })
  }

  private wake(): void {
    if (this.waiter && this.buffer.length >= this.waiter.min) {
      const { resolve } = this.waiter
      this.waiter = null
      resolve()
    }
  }

  private finish(err: Error): void {
    if (!this.failure) this.failure = err
    if (this.waiter) {
      const { reject } = this.waiter
      this.waiter = null
      reject(this.failure)
    }
  }
}

/** HTXF header: id, reference, data size, then 4 bytes that mark folder transfers */
export function encodeTransferHeader(referenceNumber: number, dataSize: number, folder: boolean = false): Buffer {
  const buf = Buffer.alloc(16)
  buf.write(TRANSFER_PROTOCOL_ID, 0, 'ascii')
  buf.writeUInt32BE(referenceNumber, 4)
  buf.writeUInt32BE(dataSize, 8)
  if (folder) buf.writeUInt16BE(1, 12)
  return buf
}

/** Item types of a folder transfer */
export const FolderItemType = {
  file: 0,
  folder: 1
} as const

/** Item header of a folder transfer: size, type, path */
export function encodeFolderItemHeader(path: string[], isFolder: boolean): Buffer {
  const parts = path.map((segment) => {
    const name = Buffer.from(segment, 'utf8').subarray(0, 0xff)
    const prefix = Buffer.alloc(3)
    prefix.writeUInt8(name.length, 2)
    return Buffer.concat([prefix, name])
  })
  const pathData = Buffer.concat(parts)
  const head = Buffer.alloc(6)
  head.writeUInt16BE(4 + pathData.length, 0)
  head.writeUInt16BE(isFolder ? FolderItemType.folder : FolderItemType.file, 2)
  head.writeUInt16BE(path.length, 4)
  return Buffer.concat([head, pathData])
}

export interface FolderItemHeader {
  type: number
  isFolder: boolean
  path: string[]
}

export function decodeFolderItemHeader(data: Buffer): FolderItemHeader {
  if (data.length < 4) throw new TransferError('Folder item header too short')
  const type = data.readUInt16BE(0)
  const count = data.readUInt16BE(2)
  const path: string[] = []
  let offset = 4
  for (let i = 0; i < count; i++) {
    if (offset + 3 > data.length) throw new TransferError('Folder item path overruns header')
    const length = data.readUInt8(offset + 2)
    offset += 3
    if (offset + length > data.length) throw new TransferError('Folder item path overruns header')
    path.push(data.toString('utf8', offset, offset + length))
    offset += length
  }
  return { type, isFolder: type === FolderItemType.folder, path }
}

/** Local name for a remote path segment; never escapes the destination folder */
export function safeSegment(name: string): string {
  const cleaned = name.replace(/[/\\\0]/g, '_')
  return cleaned === '' || cleaned === '.' || cleaned === '..' ? '_' : cleaned
}

async function statInfoFork(localPath: string, name: string): Promise<InfoFork> {
  const stat = await fsp.stat(localPath)
  return infoForkFor(name, stat.birthtime, stat.mtime)
}

/** Size of the flattened file the upload of `localPath` will send */
export async function flattenedUploadSize(localPath: string, name: string, dataSize: number): Promise<number> {
  const info = await statInfoFork(localPath, name)
  return FILE_HEADER_SIZE + FORK_HEADER_SIZE + encodeInfoFork(info).length + FORK_HEADER_SIZE + dataSize
}

/**
 * One data connection (server port + 1) carrying a single transfer.
 * close() aborts whatever operation is running on it.
 */
export class TransferConnection {
  private socket: Duplex
  private reader: DataReader
  private closed = false

  private constructor(socket: Duplex) {
    this.socket = socket
    this.reader = new DataReader(socket)
  }

  /** Connect to the data port and send the HTXF header */
  static async open(
    connector: SocketConnector,
    address: ServerAddress,
    referenceNumber: number,
    dataSize: number,
    folder: boolean = false
  ): Promise<TransferConnection> {
    let socket: Duplex
    try {
      socket = await connector({ host: address.host, port: address.port + 1 })
    } catch (err) {
      throw new TransferError(`Cannot open data connection: ${errorMessage(err, 'connect failed')}`)
    }
    const connection = new TransferConnection(socket)
    try {
      await connection.write(encodeTransferHeader(referenceNumber, dataSize, folder))
    } catch (err) {
      connection.close()
      throw err
    }
    return connection
  }

  /** Abort: drop the connection immediately */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.socket.destroy()
  }

  /** Graceful end after a completed transfer */
  private finish(): void {
    if (this.closed) return
    this.closed = true
    this.socket.end()
  }

  get isClosed(): boolean {
    return this.closed
  }

  private write(data: Buffer): Promise<void> {
    if (this.closed) return Promise.reject(new TransferError('Data connection closed'))
    return new Promise<void>((resolve, reject) => {
      this.socket.write(data, (err) => (err ? reject(new TransferError(err.message)) : resolve()))
    })
  }

  private writeAction(action: number): Promise<void> {
    const buf = Buffer.alloc(2)
    buf.writeUInt16BE(action)
    return this.write(buf)
  }

  // ── Downloads ──

  /** Receive a flattened file, writing its data fork to `destination` */
  async downloadFile(destination: string, sink: TransferSink): Promise<InfoFork | undefined> {
    const info = await this.receiveFlattened(destination, sink)
    this.finish()
    return info
  }

  /** Preview transfers carry raw bytes without a flattened header */
  async downloadPreview(size: number, sink: TransferSink): Promise<Buffer> {
    const chunks: Buffer[] = []
    let remaining = size
    while (remaining > 0) {
      const chunk = await this.reader.readSome(Math.min(remaining, CHUNK_SIZE))
      chunks.push(chunk)
      remaining -= chunk.length
      sink.onBytes(chunk.length)
    }
    this.finish()
    return Buffer.concat(chunks)
  }

  /** Receive `itemCount` items of a folder into `destination` */
  async downloadFolder(itemCount: number, destination: string, sink: TransferSink): Promise<void> {
    await fsp.mkdir(destination, { recursive: true })
    await this.writeAction(FolderAction.nextFile)

    for (let completed = 0; completed < itemCount; ) {
      const headerLength = await this.reader.readUInt16()
      const header = decodeFolderItemHeader(await this.reader.read(headerLength))
      sink.onBytes(2 + headerLength)

      const localPath = join(destination, ...header.path.map(safeSegment))
      if (header.type === FolderItemType.folder) {
        await fsp.mkdir(localPath, { recursive: true })
      } else if (header.type === FolderItemType.file) {
        await this.writeAction(FolderAction.sendFile)
        const size = await this.reader.readUInt32()
        sink.onBytes(4)
        sink.onItemStart(header.path, size)
        await fsp.mkdir(dirname(localPath), { recursive: true })
        await this.receiveFlattened(localPath, sink)
        sink.onItemComplete(header.path)
      }
      // Any other item type is passed over with nextFile

      completed++
      if (completed < itemCount) await this.writeAction(FolderAction.nextFile)
    }
    this.finish()
  }

  private async receiveFlattened(destination: string, sink: TransferSink): Promise<InfoFork | undefined> {
    const forkCount = decodeFileHeader(await this.reader.read(FILE_HEADER_SIZE))
    sink.onBytes(FILE_HEADER_SIZE)

    let info: InfoFork | undefined
    let wroteData = false
    for (let i = 0; i < forkCount; i++) {
      const fork = decodeForkHeader(await this.reader.read(FORK_HEADER_SIZE))
      sink.onBytes(FORK_HEADER_SIZE)

      if (fork.type === 'INFO') {
        info = decodeInfoFork(await this.reader.read(fork.dataSize))
        sink.onBytes(fork.dataSize)
      } else if (fork.type === 'DATA') {
        await this.receiveToFile(destination, fork.dataSize, sink)
        wroteData = true
      } else {
        // Resource forks and unknown forks are skipped
        await this.skip(fork.dataSize, sink)
      }
    }

    if (!wroteData) await fsp.writeFile(destination, Buffer.alloc(0))
    return info
  }

  private async receiveToFile(destination: string, size: number, sink: TransferSink): Promise<void> {
    const handle = await fsp.open(destination, 'w')
    try {
      let remaining = size
      while (remaining > 0) {
        const chunk = await this.reader.readSome(Math.min(remaining, CHUNK_SIZE))
        await handle.write(chunk)
        remaining -= chunk.length
        sink.onBytes(chunk.length)
      }
    } finally {
      await handle.close()
    }
  }

  private async skip(size: number, sink: TransferSink): Promise<void> {
    let remaining = size
    while (remaining > 0) {
      const chunk = await this.reader.readSome(Math.min(remaining, CHUNK_SIZE))
      remaining -= chunk.length
      sink.onBytes(chunk.length)
    }
  }

  // ── Uploads ──

  /** Send `localPath` as a flattened file named `name` */
  async uploadFile(localPath: string, name: string, sink: TransferSink): Promise<void> {
    await this.sendFlattened(localPath, name, sink)
    this.finish()
  }

  /** Send the items of a folder, answering the server's per-item actions */
  async uploadFolder(items: FolderUploadItem[], sink: TransferSink): Promise<void> {
    let action = await this.reader.readUInt16()

    for (const item of items) {
      if (action !== FolderAction.nextFile) {
        throw new TransferError(`Unexpected folder action ${action}`)
      }

      const header = encodeFolderItemHeader(item.path, item.isFolder)
      await this.write(header)
      sink.onBytes(header.length)

      if (item.isFolder) {
        action = await this.reader.readUInt16()
        continue
      }

      sink.onItemStart(item.path, item.size)
      const reply = await this.reader.readUInt16()
      if (reply === FolderAction.resumeFile) {
        // Resume data is read and ignored: the whole file is sent again
        const resumeLength = await this.reader.readUInt16()
        await this.reader.read(resumeLength)
      }

      if (reply === FolderAction.sendFile || reply === FolderAction.resumeFile) {
        const name = item.path.at(-1) ?? 'untitled'
        const size = await flattenedUploadSize(item.localPath, name, item.size)
        const sizeField = Buffer.alloc(4)
        sizeField.writeUInt32BE(size)
        await this.write(sizeField)
        sink.onBytes(4)
        await this.sendFlattened(item.localPath, name, sink)
        sink.onItemComplete(item.path)
        action = await this.reader.readUInt16()
      } else if (reply === FolderAction.nextFile) {
        // Server already has this file
        sink.onItemComplete(item.path)
        action = reply
      } else {
        throw new TransferError(`Unexpected folder action ${reply}`)
      }
    }
    this.finish()
  }

  private async sendFlattened(localPath: string, name: string, sink: TransferSink): Promise<void> {
    const stat = await fsp.stat(localPath)
    const info = encodeInfoFork(infoForkFor(name, stat.birthtime, stat.mtime))

    const head = Buffer.concat([
      encodeFileHeader(2),
      encodeForkHeader('INFO', info.length),
      info,
      encodeForkHeader('DATA', stat.size)
    ])
    await this.write(head)
    sink.onBytes(head.length)

    const handle = await fsp.open(localPath, 'r')
    try {
      const buffer = Buffer.alloc(CHUNK_SIZE)
      let remaining = stat.size
      while (remaining > 0) {
        const { bytesRead } = await handle.read(buffer, 0, Math.min(CHUNK_SIZE, remaining), null)
        if (bytesRead === 0) throw new TransferError(`${localPath} shrank during upload`)
        await this.write(Buffer.from(buffer.subarray(0, bytesRead)))
        remaining -= bytesRead
        sink.onBytes(bytesRead)
      }
    } finally {
      await handle.close()
    }
  }
}
