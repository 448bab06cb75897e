import { ChatService } from './ChatService'
import { FileService } from './FileService'
import { BoardSource } from './BoardSource'
import { NewsSource } from './NewsSource'
import { HotlineSession, type SocketConnector } from './HotlineSession'
import { getLogService, LogService } from './LogService'
import { ThreadedContentStore } from './ThreadedContentStore'
import { TransferManager, type TransferEndpoint } from './TransferManager'
import type { SettingsStore } from './SettingsStore'
import { ConnectivityError, TransferError } from '../errors'
import { DEFAULT_ICON_ID, DEFAULT_PORT } from '../protocol/constants'
import type { FileEntry, LoginCredentials, ServerAddress, ThreadedContentNode } from '../../src/types/hotline'
import type { TransferItem } from '../../src/types/transfer'

export interface ServerConnectOptions {
  host: string
  port?: number
  login?: string
  password?: string
  /** Falls back to the nickname setting */
  nickname?: string
  iconId?: number
}

export interface ServerServiceOptions {
  settings?: SettingsStore
  /** Shared by every server; one is created when omitted */
  transfers?: TransferManager
  connector?: SocketConnector
  log?: LogService
}

/** One server: its session plus the services bound to it */
export class HotlineServer implements TransferEndpoint {
  readonly session: HotlineSession
  readonly files: FileService
  readonly chat: ChatService
  readonly news: ThreadedContentStore
  readonly board: ThreadedContentStore

  constructor(session: HotlineSession) {
    this.session = session
    this.files = new FileService(session)
    this.chat = new ChatService(session)
    this.news = new ThreadedContentStore(session, new NewsSource(session))
    this.board = new ThreadedContentStore(session, new BoardSource(session))
  }

  get id(): string {
    return this.session.id
  }
}

/**
 * ServerService: pool of server connections keyed by id, and the entry
 * point presentation code calls into.
 */
export class ServerService {
  readonly transfers: TransferManager
  private servers: Map<string, HotlineServer> = new Map()
  private settings: SettingsStore | undefined
  private connector: SocketConnector | undefined
  private log: LogService

  constructor(options: ServerServiceOptions = {}) {
    this.settings = options.settings
    this.connector = options.connector
    this.log = options.log ?? getLogService()

    const settings = this.settings?.getAll()
    if (settings) {
      this.log.setMaxEntries(settings.logMaxEntries)
      this.log.setDebugMode(settings.logDebugMode)
    }
    this.transfers =
      options.transfers ??
      new TransferManager({
        estimator: settings ? { alpha: settings.estimatorAlpha } : undefined,
        previewMaxBytes: settings?.previewMaxBytes,
        log: this.log
      })
  }

  // ── Pool ──

  /** Create a server without connecting (for attaching listeners first) */
  create(id: string, options: ServerConnectOptions): HotlineServer {
    this.disconnect(id)

    const settings = this.settings?.getAll()
    const address: ServerAddress = { host: options.host, port: options.port ?? DEFAULT_PORT }
    const credentials: LoginCredentials = {
      login: options.login ?? '',
      password: options.password ?? '',
      nickname: options.nickname ?? settings?.nickname ?? 'unnamed',
      iconId: options.iconId ?? settings?.iconId ?? DEFAULT_ICON_ID
    }

    const session = new HotlineSession(id, {
      address,
      credentials,
      connector: this.connector,
      requestTimeoutMs: settings ? settings.requestTimeout * 1000 : undefined,
      keepAliveIntervalMs: settings ? settings.keepAliveInterval * 1000 : undefined,
      log: this.log
    })
    const server = new HotlineServer(session)
    this.servers.set(id, server)
    return server
  }

  /** Create, connect and log in */
  async connect(id: string, options: ServerConnectOptions): Promise<HotlineServer> {
    const server = this.create(id, options)
    await server.session.connect()
    return server
  }

  get(id: string): HotlineServer | undefined {
    return this.servers.get(id)
  }

  /** Close the session; its transfers keep running */
  disconnect(id: string): void {
    const server = this.servers.get(id)
    if (server) {
      server.session.disconnect()
      server.session.removeAllListeners()
      this.servers.delete(id)
    }
  }

  disconnectAll(): void {
    for (const [id] of this.servers) {
      this.disconnect(id)
    }
  }

  isConnected(id: string): boolean {
    return this.servers.get(id)?.session.status === 'logged-in'
  }

  // ── Operations ──

  listFiles(id: string, path: string[] = []): Promise<FileEntry[]> {
    return this.require(id).files.listFiles(path)
  }

  listNews(id: string, path: string[] = []): Promise<ThreadedContentNode[]> {
    return this.require(id).news.listChildren(path)
  }

  listBoard(id: string): Promise<ThreadedContentNode[]> {
    return this.require(id).board.listChildren()
  }

  /** Post into a news category, or reply to an article */
  postNews(id: string, parentId: string, title: string, body: string): Promise<void> {
    return this.require(id).news.post(parentId, title, body)
  }

  postBoard(id: string, body: string): Promise<void> {
    return this.require(id).board.post(undefined, '', body)
  }

  /** Download into `destinationDir`, or the download folder setting */
  startDownload(id: string, entry: FileEntry, destinationDir?: string): TransferItem {
    const destination = destinationDir ?? this.settings?.get('downloadFolder')
    if (destination === undefined) throw new TransferError('No download folder given')
    return this.transfers.startDownload(this.require(id), entry, destination)
  }

  startUpload(id: string, localPath: string, remotePath: string[]): Promise<TransferItem> {
    return this.transfers.startUpload(this.require(id), localPath, remotePath)
  }

  startPreview(id: string, entry: FileEntry): TransferItem {
    return this.transfers.startPreview(this.require(id), entry)
  }

  cancelTransfer(transferId: string): void {
    this.transfers.cancel(transferId)
  }

  cancelAllTransfers(id: string): void {
    this.transfers.cancelAllForServer(id)
  }

  private require(id: string): HotlineServer {
    const server = this.servers.get(id)
    if (!server) throw new ConnectivityError(`Not connected to server "${id}"`)
    return server
  }
}
