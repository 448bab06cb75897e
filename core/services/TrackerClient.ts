import type { Duplex } from 'stream'
import { ConnectivityError, HotlineError, ProtocolError, errorMessage } from '../errors'
import { DataReader } from './TransferConnection'
import { tcpConnector, type SocketConnector } from './HotlineSession'
import type { LogService } from './LogService'
import type { TrackerServer } from '../../src/types/hotline'

export const DEFAULT_TRACKER_PORT = 5498

const TRACKER_ID = 'HTRK'
const TRACKER_VERSION = 1
const DEFAULT_TIMEOUT_MS = 15_000
const MAX_BATCHES = 100

export interface TrackerClientOptions {
  connector?: SocketConnector
  log?: LogService
  /** Whole exchange, connect to last record */
  timeoutMs?: number
}

/** Entries made of dashes only are listing separators, not servers */
function isSeparator(name: string): boolean {
  return name.length > 3 && /^-+$/.test(name)
}

/**
 * Reads the server listing of a Hotline tracker: an "HTRK" handshake, then
 * batches of server records until the count announced in the first batch
 * header has been read.
 */
export class TrackerClient {
  private connector: SocketConnector
  private log?: LogService
  private timeoutMs: number

  constructor(options: TrackerClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.connector = options.connector ?? tcpConnector(this.timeoutMs)
    this.log = options.log
  }

  async fetchServers(host: string, port: number = DEFAULT_TRACKER_PORT): Promise<TrackerServer[]> {
    const logId = `tracker:${host}`
    this.log?.log(logId, 'info', 'system', `Fetching server list from tracker ${host}:${port}...`)

    let socket: Duplex
    try {
      socket = await this.connector({ host, port })
    } catch (err) {
      throw this.failure(logId, err, host, port)
    }

    const timer = setTimeout(() => {
      socket.destroy(new Error(`no listing within ${this.timeoutMs} ms`))
    }, this.timeoutMs)

    try {
      const servers = await this.readListing(socket)
      this.log?.log(logId, 'success', 'system', `Tracker listed ${servers.length} servers.`)
      return servers
    } catch (err) {
      throw this.failure(logId, err, host, port)
    } finally {
      clearTimeout(timer)
      socket.destroy()
    }
  }

  private async readListing(socket: Duplex): Promise<TrackerServer[]> {
    const reader = new DataReader(socket)

    const hello = Buffer.alloc(6)
    hello.write(TRACKER_ID, 0, 'ascii')
    hello.writeUInt16BE(TRACKER_VERSION, 4)
    await new Promise<void>((resolve, reject) => {
      socket.write(hello, (err) => (err ? reject(err) : resolve()))
    })

    const reply = await reader.read(6)
    if (reply.toString('ascii', 0, 4) !== TRACKER_ID) {
      throw new ProtocolError(`Not a tracker: expected ${TRACKER_ID}, got ${JSON.stringify(reply.toString('latin1', 0, 4))}`)
    }

    const servers: TrackerServer[] = []
    let expected = 0
    let parsed = 0

    for (let batch = 0; batch < MAX_BATCHES; batch++) {
      const header = await reader.read(8)
      // message type (u16), data length (u16), total count (u16), count in this batch (u16)
      const inBatch = header.readUInt16BE(6)
      if (batch === 0) expected = header.readUInt16BE(4)

      for (let i = 0; i < inBatch; i++) {
        const fixed = await reader.read(10)
        const name = await this.readPascalString(reader)
        const description = await this.readPascalString(reader)
        parsed++
        if (isSeparator(name)) continue

        servers.push({
          address: `${fixed[0]}.${fixed[1]}.${fixed[2]}.${fixed[3]}`,
          port: fixed.readUInt16BE(4),
          users: fixed.readUInt16BE(6),
          name: name || undefined,
          description: description || undefined
        })
      }

      if (parsed >= expected) break
    }
    return servers
  }

  private async readPascalString(reader: DataReader): Promise<string> {
    const length = (await reader.read(1)).readUInt8(0)
    if (length === 0) return ''
    return (await reader.read(length)).toString('utf8')
  }

  private failure(logId: string, err: unknown, host: string, port: number): HotlineError {
    const error =
      err instanceof ProtocolError || err instanceof ConnectivityError
        ? err
        : new ConnectivityError(`Tracker ${host}:${port}: ${errorMessage(err, 'listing failed')}`)
    this.log?.log(logId, 'error', 'system', 'Tracker listing failed.', error.message)
    return error
  }
}
