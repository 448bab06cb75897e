import { EventEmitter } from 'events'
import { connect as netConnect } from 'net'
import type { Duplex } from 'stream'
import {
  AuthenticationError,
  ConnectionLostError,
  ConnectivityError,
  HotlineError,
  PermissionDeniedError,
  ProtocolError,
  ServerError,
  TimeoutError,
  errorMessage
} from '../errors'
import {
  CLIENT_VERSION,
  FieldType,
  KEEP_ALIVE_MIN_SERVER_VERSION,
  TransactionType
} from '../protocol/constants'
import {
  FrameDecoder,
  HANDSHAKE_REPLY_SIZE,
  createTransaction,
  decodeHandshakeReply,
  encodeHandshake,
  encodeTransaction,
  encodedStringField,
  getField,
  readInteger,
  readString,
  stringField,
  u16Field,
  u32Field,
  type Transaction
} from '../protocol/Transaction'
import { Permissions, parsePermissions } from '../protocol/permissions'
import { getLogService, LogService } from './LogService'
import type {
  Capability,
  HotlineUser,
  LoginCredentials,
  ServerAddress,
  ServerInfo,
  SessionSnapshot,
  SessionStatus
} from '../../src/types/hotline'

/** Opens the byte stream to a server; replaced in tests by an in-memory pair */
export type SocketConnector = (address: ServerAddress) => Promise<Duplex>

/** Server pushes, as a tagged union */
export type ServerEvent =
  | { type: 'chat'; text: string; chatId?: number }
  | { type: 'user-changed'; user: HotlineUser }
  | { type: 'user-left'; userId: number }
  | { type: 'server-message'; text: string }
  | { type: 'private-message'; userId: number; userName?: string; text: string }
  | { type: 'agreement'; text?: string }
  | { type: 'user-access'; capabilities: Capability[] }
  | { type: 'board-post'; text: string }
  | { type: 'disconnect-message'; text: string }

export interface HotlineSessionOptions {
  address: ServerAddress
  credentials: LoginCredentials
  connector?: SocketConnector
  /** Default per-request timeout */
  requestTimeoutMs?: number
  /** 0 disables keep-alive */
  keepAliveIntervalMs?: number
  /** Bounds opening the socket and the handshake reply */
  connectTimeoutMs?: number
  log?: LogService
}

export interface RequestOptions {
  timeoutMs?: number
  /** Capability the request is gated on, reported on remote denials */
  capability?: Capability
}

interface PendingRequest {
  type: number
  capability?: Capability
  timer: NodeJS.Timeout
  resolve: (reply: Transaction) => void
  reject: (err: Error) => void
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000
const DEFAULT_KEEP_ALIVE_MS = 180_000
const DEFAULT_CONNECT_TIMEOUT_MS = 15_000

const DENIAL_TEXT = /privilege|permission|not allowed|access denied/i

/** Default connector: a plain TCP socket */
export function tcpConnector(timeoutMs: number = DEFAULT_CONNECT_TIMEOUT_MS): SocketConnector {
  return (address) =>
    new Promise<Duplex>((resolve, reject) => {
      const socket = netConnect({ host: address.host, port: address.port })
      socket.setNoDelay(true)
      socket.setTimeout(timeoutMs)
      const onError = (err: Error): void => {
        socket.destroy()
        reject(new ConnectivityError(`Cannot reach ${address.host}:${address.port}: ${err.message}`))
      }
      socket.once('error', onError)
      socket.once('timeout', () => onError(new Error('connection timed out')))
      socket.once('connect', () => {
        socket.removeListener('error', onError)
        socket.removeAllListeners('timeout')
        socket.setTimeout(0)
        resolve(socket)
      })
    })
}

/**
 * Manages one control connection: handshake, login, the pending-request
 * table keyed by transaction id, the serialized write path and the read loop.
 *
 * Emits:
 *   'status'       → (status: SessionStatus)
 *   'permissions'  → (permissions: Permissions)
 *   'event'        → (event: ServerEvent)
 *   'close'        → (error: HotlineError)
 */
export class HotlineSession extends EventEmitter {
  readonly id: string
  readonly address: ServerAddress
  private credentials: LoginCredentials
  /** Also opens the data connections of this server's transfers */
  readonly connector: SocketConnector
  private requestTimeoutMs: number
  private connectTimeoutMs: number
  private keepAliveIntervalMs: number
  private log: LogService

  private socket: Duplex | null = null
  private decoder = new FrameDecoder()
  private pending: Map<number, PendingRequest> = new Map()
  private nextTransactionId = 1
  private writeChain: Promise<void> = Promise.resolve()
  private keepAliveTimer: NodeJS.Timeout | null = null

  private handshakeBuffer: Buffer | null = null
  private handshakeWaiter: { resolve: (code: number) => void; reject: (err: Error) => void } | null = null

  private _status: SessionStatus = 'disconnected'
  private _permissions: Permissions = Permissions.none()
  private _serverInfo: ServerInfo | undefined
  private _agreementText: string | undefined
  private _agreementAccepted = false
  private _lastError: HotlineError | undefined

  constructor(id: string, options: HotlineSessionOptions) {
    super()
    this.id = id
    this.address = options.address
    this.credentials = options.credentials
    this.connector = options.connector ?? tcpConnector(options.connectTimeoutMs)
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS
    this.keepAliveIntervalMs = options.keepAliveIntervalMs ?? DEFAULT_KEEP_ALIVE_MS
    this.log = options.log ?? getLogService()
  }

  get status(): SessionStatus {
    return this._status
  }

  get permissions(): Permissions {
    return this._permissions
  }

  get serverInfo(): ServerInfo | undefined {
    return this._serverInfo
  }

  get agreementText(): string | undefined {
    return this._agreementText
  }

  get agreementAccepted(): boolean {
    return this._agreementAccepted
  }

  get nickname(): string {
    return this.credentials.nickname
  }

  /** Outstanding requests awaiting a reply */
  get pendingCount(): number {
    return this.pending.size
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      address: this.address,
      status: this._status,
      serverInfo: this._serverInfo,
      capabilities: this._permissions.list(),
      agreementAccepted: this._agreementAccepted,
      error: this._lastError?.message
    }
  }

  /** Subscribe to server pushes; returns the unsubscribe function */
  onEvent(listener: (event: ServerEvent) => void): () => void {
    this.on('event', listener)
    return () => this.off('event', listener)
  }

  // ── Lifecycle ──

  /** Connect, perform the handshake and log in */
  async connect(): Promise<ServerInfo> {
    if (this._status === 'logged-in' && this._serverInfo) return this._serverInfo
    if (this._status === 'connecting' || this._status === 'logging-in') {
      throw new ConnectivityError('Connection already in progress')
    }

    this._lastError = undefined
    this.decoder = new FrameDecoder()
    this.setStatus('connecting')
    LogService.connecting(this.log, this.id, this.address.host, this.address.port)

    let socket: Duplex
    try {
      socket = await this.connector(this.address)
    } catch (err) {
      const error = err instanceof HotlineError ? err : new ConnectivityError(errorMessage(err, 'Connection failed'))
      this.fail(error)
      throw error
    }

    // disconnect() may have run while the connector was pending
    if (this.status !== 'connecting') {
      socket.destroy()
      throw new ConnectionLostError('Disconnected while connecting')
    }

    this.socket = socket
    this.attachSocket(socket)

    const handshake = this.awaitHandshake()
    this.enqueueWrite(encodeHandshake()).catch((err: unknown) => {
      this.fail(new ConnectivityError(errorMessage(err, 'Handshake write failed')))
    })

    const code = await handshake
    if (this.status !== 'connecting') throw new ConnectionLostError('Disconnected while connecting')
    if (code !== 0) {
      const error = new ConnectivityError(`Server refused handshake (code ${code})`)
      this.fail(error)
      throw error
    }
    LogService.handshakeComplete(this.log, this.id)

    return this.login()
  }

  /** Resolves with the handshake reply code; fails the session when none arrives in time */
  private awaitHandshake(): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.fail(new ConnectivityError(`No handshake reply within ${this.connectTimeoutMs} ms`))
      }, this.connectTimeoutMs)

      this.handshakeBuffer = Buffer.alloc(0)
      this.handshakeWaiter = {
        resolve: (code) => {
          clearTimeout(timer)
          resolve(code)
        },
        reject: (err) => {
          clearTimeout(timer)
          reject(err)
        }
      }
    })
  }

  private async login(): Promise<ServerInfo> {
    this.setStatus('logging-in')
    LogService.loggingIn(this.log, this.id, this.credentials.login)

    const transaction = createTransaction(TransactionType.login, [
      encodedStringField(FieldType.userLogin, this.credentials.login),
      encodedStringField(FieldType.userPassword, this.credentials.password),
      u16Field(FieldType.userIconId, this.credentials.iconId),
      stringField(FieldType.userName, this.credentials.nickname),
      u32Field(FieldType.versionNumber, CLIENT_VERSION)
    ])

    let reply: Transaction
    try {
      reply = await this.request(transaction)
    } catch (err) {
      if (err instanceof ServerError || err instanceof PermissionDeniedError) {
        const error = new AuthenticationError(err.message)
        LogService.loginFailed(this.log, this.id, err.message)
        this.fail(error)
        throw error
      }
      const error = err instanceof HotlineError ? err : new ConnectivityError(errorMessage(err, 'Login failed'))
      LogService.loginFailed(this.log, this.id, error.message)
      // A disconnect during login already tore the session down
      if (this._status === 'logging-in') this.fail(error)
      throw error
    }

    const info: ServerInfo = {
      name: readString(reply, FieldType.serverName) ?? this.address.host,
      version: readInteger(reply, FieldType.versionNumber) ?? 0
    }
    this._serverInfo = info

    const access = getField(reply, FieldType.userAccess)
    if (access) this.applyPermissions(parsePermissions(access.data))

    this.setStatus('logged-in')
    LogService.loginSuccess(this.log, this.id, info.name, info.version)
    this.startKeepAlive()
    return info
  }

  /** Close the connection; every outstanding request fails with ConnectionLostError */
  disconnect(): void {
    if (!this.socket && this._status === 'disconnected') return
    LogService.disconnectedByUser(this.log, this.id)
    this.teardown('disconnected', new ConnectionLostError('Disconnected'))
  }

  // ── Requests ──

  /** Throws PermissionDeniedError('local') when the cached permissions lack `capability` */
  assertAllowed(capability: Capability): void {
    if (!this._permissions.has(capability)) {
      LogService.permissionDenied(this.log, this.id, capability)
      throw new PermissionDeniedError(`Not permitted: ${capability}`, 'local', capability)
    }
  }

  /** Send a transaction and wait for the reply with the same id */
  request(transaction: Transaction, options: RequestOptions = {}): Promise<Transaction> {
    if (!this.socket) return Promise.reject(new ConnectionLostError('Not connected'))

    const id = this.assignId(transaction)
    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs

    return new Promise<Transaction>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(id)) {
          reject(new TimeoutError(`No reply to transaction ${transaction.type} within ${timeoutMs} ms`))
        }
      }, timeoutMs)

      this.pending.set(id, { type: transaction.type, capability: options.capability, timer, resolve, reject })

      this.enqueueWrite(encodeTransaction(transaction)).catch((err: unknown) => {
        const slot = this.pending.get(id)
        if (!slot) return
        this.pending.delete(id)
        clearTimeout(slot.timer)
        slot.reject(new ConnectionLostError(errorMessage(err, 'Write failed')))
      })
    })
  }

  /** Send a transaction that expects no reply */
  async send(transaction: Transaction): Promise<void> {
    if (!this.socket) throw new ConnectionLostError('Not connected')
    this.assignId(transaction)
    await this.enqueueWrite(encodeTransaction(transaction))
  }

  /** Accept the server agreement with the identity used at login */
  async acceptAgreement(): Promise<void> {
    await this.send(
      createTransaction(TransactionType.agreed, [
        stringField(FieldType.userName, this.credentials.nickname),
        u16Field(FieldType.userIconId, this.credentials.iconId),
        u16Field(FieldType.options, 0)
      ])
    )
    this._agreementAccepted = true
    this.log.log(this.id, 'info', 'control', 'Agreement accepted.')
  }

  private assignId(transaction: Transaction): number {
    const id = this.nextTransactionId
    this.nextTransactionId = this.nextTransactionId >= 0xffffffff ? 1 : this.nextTransactionId + 1
    transaction.id = id
    return id
  }

  /** Writes go out one frame at a time in call order */
  private enqueueWrite(frame: Buffer): Promise<void> {
    const write = this.writeChain.then(() => this.writeFrame(frame))
    // Failures are reported to the caller through `write`
    this.writeChain = write.then(
      () => undefined,
      () => undefined
    )
    return write
  }

  private writeFrame(frame: Buffer): Promise<void> {
    const socket = this.socket
    if (!socket) return Promise.reject(new ConnectionLostError('Not connected'))
    return new Promise<void>((resolve, reject) => {
      socket.write(frame, (err) => (err ? reject(err) : resolve()))
    })
  }

  // ── Read loop ──

  private attachSocket(socket: Duplex): void {
    socket.on('data', (chunk: Buffer) => this.onData(chunk))
    socket.on('error', (err: Error) => {
      if (this.socket !== socket) return
      LogService.connectionLost(this.log, this.id, err.message)
      this.teardown('failed', new ConnectivityError(err.message))
    })
    socket.on('close', () => {
      if (this.socket !== socket) return
      LogService.connectionLost(this.log, this.id, 'closed by server')
      this.teardown('failed', new ConnectionLostError('Connection closed by server'))
    })
  }

  private onData(chunk: Buffer): void {
    let data = chunk

    if (this.handshakeBuffer) {
      const buffered = Buffer.concat([this.handshakeBuffer, data])
      if (buffered.length < HANDSHAKE_REPLY_SIZE) {
        this.handshakeBuffer = buffered
        return
      }
      this.handshakeBuffer = null
      const waiter = this.handshakeWaiter
      this.handshakeWaiter = null
      try {
        waiter?.resolve(decodeHandshakeReply(buffered.subarray(0, HANDSHAKE_REPLY_SIZE)))
      } catch (err) {
        const error = err instanceof HotlineError ? err : new ProtocolError('Invalid handshake reply')
        waiter?.reject(error)
        this.fail(error)
        return
      }
      data = buffered.subarray(HANDSHAKE_REPLY_SIZE)
      if (data.length === 0) return
    }

    let transactions: Transaction[]
    try {
      transactions = this.decoder.push(data)
    } catch (err) {
      const error = err instanceof HotlineError ? err : new ProtocolError(errorMessage(err, 'Bad frame'))
      this.log.log(this.id, 'error', 'control', 'Protocol violation, closing connection.', error.message)
      this.fail(error)
      return
    }

    for (const transaction of transactions) {
      // A disconnect message earlier in this batch ends dispatch
      if (!this.socket) break
      if (transaction.isReply || transaction.type === TransactionType.reply) {
        this.handleReply(transaction)
      } else {
        this.handlePush(transaction)
      }
    }
  }

  private handleReply(reply: Transaction): void {
    const slot = this.pending.get(reply.id)
    if (!slot) {
      LogService.unknownReply(this.log, this.id, reply.id)
      return
    }
    this.pending.delete(reply.id)
    clearTimeout(slot.timer)

    if (reply.errorCode === 0) {
      slot.resolve(reply)
      return
    }

    const text = readString(reply, FieldType.errorText) ?? `Server error ${reply.errorCode}`
    if (DENIAL_TEXT.test(text)) {
      slot.reject(new PermissionDeniedError(text, 'remote', slot.capability))
    } else {
      slot.reject(new ServerError(text, reply.errorCode))
    }
  }

  private handlePush(transaction: Transaction): void {
    const event = this.toServerEvent(transaction)
    if (!event) {
      this.log.log(this.id, 'debug', 'control', `Unhandled server transaction ${transaction.type}.`)
      return
    }

    if (event.type === 'agreement') {
      this._agreementText = event.text
      if (event.text === undefined) this._agreementAccepted = true
    }

    this.emit('event', event)

    if (event.type === 'disconnect-message') {
      LogService.disconnectedByServer(this.log, this.id, event.text)
      this.teardown('disconnected', new ConnectionLostError(`Disconnected by server: ${event.text}`))
    }
  }

  private toServerEvent(t: Transaction): ServerEvent | undefined {
    switch (t.type) {
      case TransactionType.chatMessage:
        return { type: 'chat', text: readString(t, FieldType.data) ?? '', chatId: readInteger(t, FieldType.chatId) }

      case TransactionType.notifyOfUserChange: {
        const id = readInteger(t, FieldType.userId)
        if (id === undefined) return undefined
        return {
          type: 'user-changed',
          user: {
            id,
            iconId: readInteger(t, FieldType.userIconId) ?? 0,
            flags: readInteger(t, FieldType.userFlags) ?? 0,
            name: readString(t, FieldType.userName) ?? ''
          }
        }
      }

      case TransactionType.notifyOfUserDelete: {
        const id = readInteger(t, FieldType.userId)
        return id === undefined ? undefined : { type: 'user-left', userId: id }
      }

      case TransactionType.serverMessage: {
        const text = readString(t, FieldType.data) ?? ''
        const userId = readInteger(t, FieldType.userId)
        if (userId === undefined) return { type: 'server-message', text }
        return { type: 'private-message', userId, userName: readString(t, FieldType.userName), text }
      }

      case TransactionType.showAgreement:
        if (getField(t, FieldType.noServerAgreement)) return { type: 'agreement' }
        return {
          type: 'agreement',
          text: readString(t, FieldType.data) ?? readString(t, FieldType.serverAgreement) ?? ''
        }

      case TransactionType.userAccess: {
        const access = getField(t, FieldType.userAccess)
        if (!access) return undefined
        this.applyPermissions(parsePermissions(access.data))
        return { type: 'user-access', capabilities: this._permissions.list() }
      }

      case TransactionType.newMessage:
        return { type: 'board-post', text: readString(t, FieldType.data) ?? '' }

      case TransactionType.disconnectMessage:
        return { type: 'disconnect-message', text: readString(t, FieldType.data) ?? '' }

      default:
        return undefined
    }
  }

  private applyPermissions(permissions: Permissions): void {
    this._permissions = permissions
    this.emit('permissions', permissions)
  }

  // ── Keep-alive ──

  private startKeepAlive(): void {
    this.stopKeepAlive()
    if (this.keepAliveIntervalMs <= 0) return
    this.keepAliveTimer = setInterval(() => this.sendKeepAlive(), this.keepAliveIntervalMs)
    this.keepAliveTimer.unref()
  }

  private stopKeepAlive(): void {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer)
      this.keepAliveTimer = null
    }
  }

  private sendKeepAlive(): void {
    const version = this._serverInfo?.version ?? 0
    const sent =
      version >= KEEP_ALIVE_MIN_SERVER_VERSION
        ? this.send(createTransaction(TransactionType.connectionKeepAlive))
        : this.request(createTransaction(TransactionType.getUserNameList)).then(() => undefined)

    sent.then(
      () => LogService.keepAliveSent(this.log, this.id),
      (err: unknown) => this.log.log(this.id, 'warning', 'control', 'Keep-alive failed.', errorMessage(err, ''))
    )
  }

  // ── Teardown ──

  private fail(error: HotlineError): void {
    this.teardown('failed', error)
  }

  private teardown(status: 'disconnected' | 'failed', error: HotlineError): void {
    const socket = this.socket
    this.socket = null
    this.stopKeepAlive()

    if (status === 'failed' || !this._lastError) this._lastError = error

    if (this.handshakeWaiter) {
      this.handshakeWaiter.reject(error)
      this.handshakeWaiter = null
    }
    this.handshakeBuffer = null

    const pending = Array.from(this.pending.values())
    this.pending.clear()
    for (const slot of pending) {
      clearTimeout(slot.timer)
      slot.reject(new ConnectionLostError(error.message))
    }

    if (socket) {
      socket.removeAllListeners('data')
      socket.removeAllListeners('close')
      socket.destroy()
    }

    if (this._status !== status || socket) {
      this.setStatus(status)
      this.emit('close', error)
    }
  }

  private setStatus(status: SessionStatus): void {
    if (this._status === status) return
    this._status = status
    this.emit('status', status)
  }
}
