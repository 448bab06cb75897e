import { ConnectivityError } from '../errors'
import { FieldType, TransactionType } from '../protocol/constants'
import {
  FrameDecoder,
  encodeTransaction,
  stringField,
  u32Field,
  bufferField,
  type Transaction,
  type TransactionField
} from '../protocol/Transaction'
import { ALL_CAPABILITIES, encodePermissions } from '../protocol/permissions'
import { encodeFileHeader, encodeForkHeader, encodeInfoFork, infoForkFor } from '../protocol/flattenedFile'
import { DataReader } from '../services/TransferConnection'
import { MemorySocket } from './MemorySocket'
import type { SocketConnector } from '../services/HotlineSession'
import type { Capability, ServerAddress } from '../../src/types/hotline'

export interface FakeReply {
  fields?: TransactionField[]
  errorCode?: number
  errorText?: string
}

/** Answers one request; null sends no reply at all */
export type RequestHandler = (request: Transaction, client: FakeClient) => FakeReply | null | Promise<FakeReply | null>

export interface DataHeader {
  referenceNumber: number
  dataSize: number
  folder: boolean
}

/** Serves one data connection after its HTXF header has been read */
export type DataHandler = (reader: DataReader, socket: MemorySocket, header: DataHeader) => Promise<void>

export interface FakeServerOptions {
  name?: string
  version?: number
  /** Capabilities granted at login */
  capabilities?: Iterable<Capability>
  /** Non-zero refuses the handshake with this code */
  handshakeError?: number
  /** Read the handshake but never answer it */
  silentHandshake?: boolean
}

const HANDSHAKE_SIZE = 12

/** The server's side of one control connection */
export class FakeClient {
  readonly socket: MemorySocket
  private decoder = new FrameDecoder()

  constructor(socket: MemorySocket) {
    this.socket = socket
  }

  /** Send a server-initiated transaction */
  push(type: number, fields: TransactionField[] = []): void {
    this.socket.write(encodeTransaction({ flags: 0, isReply: false, type, id: 0, errorCode: 0, fields }))
  }

  reply(request: Transaction, reply: FakeReply): void {
    const fields = [...(reply.fields ?? [])]
    if (reply.errorText !== undefined) fields.push(stringField(FieldType.errorText, reply.errorText))
    this.socket.write(
      encodeTransaction({
        flags: 0,
        isReply: true,
        type: request.type,
        id: request.id,
        errorCode: reply.errorCode ?? 0,
        fields
      })
    )
  }

  /** Drop the connection without a goodbye */
  close(): void {
    this.socket.destroy()
  }

  decode(chunk: Buffer): Transaction[] {
    return this.decoder.push(chunk)
  }
}

/**
 * In-process Hotline server for tests. Speaks the handshake, decodes
 * requests with the package's own codec and answers through scripted
 * handlers. Data connections (port + 1) go to handlers keyed by reference
 * number.
 */
export class FakeHotlineServer {
  readonly address: ServerAddress = { host: 'hotline.test', port: 5500 }
  /** Every request received, in arrival order */
  readonly received: Transaction[] = []
  readonly clients: FakeClient[] = []
  /** Failures inside handlers, for assertions */
  readonly errors: Error[] = []
  /** Refuse new connections while set */
  refuseConnections = false

  private handlers: Map<number, RequestHandler> = new Map()
  private dataHandlers: Map<number, DataHandler> = new Map()
  private options: FakeServerOptions

  constructor(options: FakeServerOptions = {}) {
    this.options = options
    this.handle(TransactionType.login, () => ({
      fields: [
        stringField(FieldType.serverName, options.name ?? 'Test Server'),
        u32Field(FieldType.versionNumber, options.version ?? 190),
        bufferField(FieldType.userAccess, encodePermissions(options.capabilities ?? ALL_CAPABILITIES))
      ]
    }))
  }

  readonly connector: SocketConnector = async (address) => {
    if (this.refuseConnections) throw new ConnectivityError('Connection refused')
    const [clientSide, serverSide] = MemorySocket.pair()

    if (address.port === this.address.port + 1) {
      this.serveData(serverSide).catch((err: unknown) => this.recordError(err))
    } else {
      this.serveControl(serverSide)
    }
    return clientSide
  }

  /** Script the answer to one transaction type */
  handle(type: number, handler: RequestHandler): void {
    this.handlers.set(type, handler)
  }

  /** Script the data connection that presents `referenceNumber` */
  onTransfer(referenceNumber: number, handler: DataHandler): void {
    this.dataHandlers.set(referenceNumber, handler)
  }

  /** Requests of one type received so far */
  requestsOf(type: number): Transaction[] {
    return this.received.filter((t) => t.type === type)
  }

  /** Push a transaction to every connected client */
  broadcast(type: number, fields: TransactionField[] = []): void {
    for (const client of this.clients) client.push(type, fields)
  }

  private serveControl(socket: MemorySocket): void {
    const client = new FakeClient(socket)
    this.clients.push(client)
    let handshake: Buffer | null = Buffer.alloc(0)

    socket.on('data', (chunk: Buffer) => {
      let data = chunk
      if (handshake) {
        handshake = Buffer.concat([handshake, data])
        if (handshake.length < HANDSHAKE_SIZE) return
        data = handshake.subarray(HANDSHAKE_SIZE)
        handshake = null
        if (this.options.silentHandshake) return

        const reply = Buffer.alloc(8)
        reply.write('TRTP', 0, 'ascii')
        reply.writeUInt32BE(this.options.handshakeError ?? 0, 4)
        socket.write(reply)
        if (this.options.handshakeError) return
        if (data.length === 0) return
      }

      for (const request of client.decode(data)) {
        this.received.push(request)
        this.dispatch(request, client).catch((err: unknown) => this.recordError(err))
      }
    })
  }

  private async dispatch(request: Transaction, client: FakeClient): Promise<void> {
    const handler = this.handlers.get(request.type)
    const reply = handler ? await handler(request, client) : {}
    if (reply && !client.socket.destroyed) client.reply(request, reply)
  }

  private async serveData(socket: MemorySocket): Promise<void> {
    const reader = new DataReader(socket)
    const head = await reader.read(16)
    const header: DataHeader = {
      referenceNumber: head.readUInt32BE(4),
      dataSize: head.readUInt32BE(8),
      folder: head.readUInt16BE(12) === 1
    }

    const handler = this.dataHandlers.get(header.referenceNumber)
    if (!handler) {
      socket.destroy()
      return
    }
    await handler(reader, socket, header)
  }

  private recordError(err: unknown): void {
    this.errors.push(err instanceof Error ? err : new Error(String(err)))
  }
}

/** A flattened file with INFO and DATA forks, as servers send them */
export function flattenFile(name: string, data: Buffer): Buffer {
  const info = encodeInfoFork(infoForkFor(name))
  return Buffer.concat([
    encodeFileHeader(2),
    encodeForkHeader('INFO', info.length),
    info,
    encodeForkHeader('DATA', data.length),
    data
  ])
}

/** Write to a data socket and wait until the bytes were handed over */
export function writeData(socket: MemorySocket, data: Buffer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    socket.write(data, (err) => (err ? reject(err) : resolve()))
  })
}
