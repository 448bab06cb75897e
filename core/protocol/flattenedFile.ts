import { ProtocolError } from '../errors'
import { encodeHotlineDate, readHotlineDate } from './fields'

/**
 * Flattened file object ("FILP"): a 24-byte header followed by forks, each
 * with a 16-byte fork header. INFO carries metadata, DATA the file bytes,
 * MACR the resource fork.
 */

export const FILE_HEADER_SIZE = 24
export const FORK_HEADER_SIZE = 16
const INFO_FORK_BASE_SIZE = 72

export interface ForkHeader {
  /** 'INFO', 'DATA' or 'MACR' */
  type: string
  compression: number
  dataSize: number
}

export interface InfoFork {
  platform: string
  type: string
  creator: string
  flags: number
  platformFlags: number
  created?: Date
  modified?: Date
  name: string
  comment?: string
}

export function encodeFileHeader(forkCount: number): Buffer {
  const buf = Buffer.alloc(FILE_HEADER_SIZE)
  buf.write('FILP', 0, 'ascii')
  buf.writeUInt16BE(1, 4)
  buf.writeUInt16BE(forkCount, 22)
  return buf
}

/** Returns the fork count */
export function decodeFileHeader(data: Buffer): number {
  if (data.length < FILE_HEADER_SIZE || data.toString('ascii', 0, 4) !== 'FILP') {
    throw new ProtocolError('Bad flattened file header')
  }
  return data.readUInt16BE(22)
}

export function encodeForkHeader(type: string, dataSize: number): Buffer {
  const buf = Buffer.alloc(FORK_HEADER_SIZE)
  buf.write(type.padEnd(4).slice(0, 4), 0, 'ascii')
  buf.writeUInt32BE(dataSize, 12)
  return buf
}

export function decodeForkHeader(data: Buffer): ForkHeader {
  if (data.length < FORK_HEADER_SIZE) throw new ProtocolError('Fork header too short')
  return {
    type: data.toString('ascii', 0, 4),
    compression: data.readUInt32BE(4),
    dataSize: data.readUInt32BE(12)
  }
}

export function encodeInfoFork(info: InfoFork): Buffer {
  const name = Buffer.from(info.name, 'utf8')
  const comment = info.comment ? Buffer.from(info.comment, 'utf8') : undefined

  const buf = Buffer.alloc(INFO_FORK_BASE_SIZE + name.length + (comment ? 2 + comment.length : 0))
  buf.write(info.platform.padEnd(4).slice(0, 4), 0, 'latin1')
  buf.write(info.type.padEnd(4).slice(0, 4), 4, 'latin1')
  buf.write(info.creator.padEnd(4).slice(0, 4), 8, 'latin1')
  buf.writeUInt32BE(info.flags, 12)
  buf.writeUInt32BE(info.platformFlags, 16)
  if (info.created) encodeHotlineDate(info.created).copy(buf, 52)
  if (info.modified) encodeHotlineDate(info.modified).copy(buf, 60)
  buf.writeUInt16BE(0, 68)
  buf.writeUInt16BE(name.length, 70)
  name.copy(buf, 72)
  if (comment) {
    buf.writeUInt16BE(comment.length, 72 + name.length)
    comment.copy(buf, 74 + name.length)
  }
  return buf
}

export function decodeInfoFork(data: Buffer): InfoFork {
  if (data.length < INFO_FORK_BASE_SIZE) throw new ProtocolError('INFO fork too short')
  const nameLength = data.readUInt16BE(70)
  if (data.length < INFO_FORK_BASE_SIZE + nameLength) throw new ProtocolError('INFO fork name overruns fork')

  const commentAt = INFO_FORK_BASE_SIZE + nameLength
  let comment: string | undefined
  if (data.length >= commentAt + 2) {
    const commentLength = data.readUInt16BE(commentAt)
    comment = data.toString('utf8', commentAt + 2, Math.min(data.length, commentAt + 2 + commentLength))
  }

  return {
    platform: data.toString('latin1', 0, 4),
    type: data.toString('latin1', 4, 8),
    creator: data.toString('latin1', 8, 12),
    flags: data.readUInt32BE(12),
    platformFlags: data.readUInt32BE(16),
    created: readHotlineDate(data, 52),
    modified: readHotlineDate(data, 60),
    name: data.toString('utf8', 72, 72 + nameLength),
    comment
  }
}

/** Default INFO fork for a local file of unknown Mac type */
export function infoForkFor(name: string, created?: Date, modified?: Date): InfoFork {
  return {
    platform: 'AMAC',
    type: '????',
    creator: '????',
    flags: 0,
    platformFlags: 0,
    created,
    modified,
    name
  }
}

/** Bytes of a flattened file with an INFO and a DATA fork */
export function flattenedSize(info: InfoFork, dataSize: number): number {
  return FILE_HEADER_SIZE + FORK_HEADER_SIZE + encodeInfoFork(info).length + FORK_HEADER_SIZE + dataSize
}
