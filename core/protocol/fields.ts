import { ProtocolError } from '../errors'
import type { FileEntry, HotlineUser } from '../../src/types/hotline'
import { FOLDER_TYPE_CODE } from './constants'

// ── Dates ──

/** Hotline date: year u16, milliseconds u16, seconds since the start of the year u32 */
export function readHotlineDate(data: Buffer, offset: number = 0): Date | undefined {
  if (data.length < offset + 8) return undefined
  const year = data.readUInt16BE(offset)
  const ms = data.readUInt16BE(offset + 2)
  const seconds = data.readUInt32BE(offset + 4)
  if (year === 0) return undefined
  return new Date(Date.UTC(year, 0, 1) + seconds * 1000 + ms)
}

export function encodeHotlineDate(date: Date): Buffer {
  const buf = Buffer.alloc(8)
  const year = date.getUTCFullYear()
  const sinceYearStart = date.getTime() - Date.UTC(year, 0, 1)
  buf.writeUInt16BE(year, 0)
  buf.writeUInt16BE(0, 2)
  buf.writeUInt32BE(Math.floor(sinceYearStart / 1000), 4)
  return buf
}

// ── Files ──

/** Parse a fileNameWithInfo field of a listing under `path` */
export function parseFileNameWithInfo(data: Buffer, path: string[]): FileEntry {
  if (data.length < 20) throw new ProtocolError('File entry too short')

  const type = data.toString('latin1', 0, 4)
  const creator = data.toString('latin1', 4, 8)
  const size = data.readUInt32BE(8)
  const nameLength = data.readUInt16BE(18)
  if (data.length < 20 + nameLength) throw new ProtocolError('File entry name overruns field')

  return {
    name: data.toString('utf8', 20, 20 + nameLength),
    path,
    isFolder: type === FOLDER_TYPE_CODE,
    size,
    type,
    creator
  }
}

/** Build a fileNameWithInfo payload (used by in-process test servers) */
export function encodeFileNameWithInfo(entry: Pick<FileEntry, 'name' | 'size' | 'type' | 'creator'>): Buffer {
  const name = Buffer.from(entry.name, 'utf8')
  const head = Buffer.alloc(20)
  head.write(entry.type.padEnd(4).slice(0, 4), 0, 'latin1')
  head.write(entry.creator.padEnd(4).slice(0, 4), 4, 'latin1')
  head.writeUInt32BE(entry.size, 8)
  head.writeUInt16BE(name.length, 18)
  return Buffer.concat([head, name])
}

// ── Users ──

/** userNameWithInfo: id u16, icon u16, flags u16, name length u16, name */
export function parseUserNameWithInfo(data: Buffer): HotlineUser {
  if (data.length < 8) throw new ProtocolError('User entry too short')
  const nameLength = data.readUInt16BE(6)
  return {
    id: data.readUInt16BE(0),
    iconId: data.readUInt16BE(2),
    flags: data.readUInt16BE(4),
    name: data.toString('utf8', 8, Math.min(data.length, 8 + nameLength))
  }
}

export function encodeUserNameWithInfo(user: HotlineUser): Buffer {
  const name = Buffer.from(user.name, 'utf8')
  const head = Buffer.alloc(8)
  head.writeUInt16BE(user.id, 0)
  head.writeUInt16BE(user.iconId, 2)
  head.writeUInt16BE(user.flags, 4)
  head.writeUInt16BE(name.length, 6)
  return Buffer.concat([head, name])
}

// ── News ──

export interface NewsCategoryRecord {
  /** 2 = bundle, 3 = category */
  type: number
  count: number
  name: string
  path: string[]
}

export interface NewsArticleRecord {
  id: number
  parentId: number
  flags: number
  title: string
  poster: string
  date?: Date
  path: string[]
}

/** Reads a length-prefixed string at `offset`; returns the string and the offset after it */
function readPString(data: Buffer, offset: number): [string, number] {
  if (offset >= data.length) throw new ProtocolError('String overruns news data')
  const length = data.readUInt8(offset)
  const end = offset + 1 + length
  if (end > data.length) throw new ProtocolError('String overruns news data')
  return [data.toString('utf8', offset + 1, end), end]
}

/** Parse one newsCategoryListData15 field */
export function parseNewsCategory(data: Buffer, parentPath: string[]): NewsCategoryRecord {
  if (data.length < 4) throw new ProtocolError('News category entry too short')
  const type = data.readUInt16BE(0)
  const count = data.readUInt16BE(2)

  let name: string
  if (type === 2) {
    ;[name] = readPString(data, 4)
  } else if (type === 3) {
    ;[name] = readPString(data, 28)
  } else {
    throw new ProtocolError(`Unknown news category type ${type}`)
  }

  return { type, count, name, path: [...parentPath, name] }
}

/** Parse the newsArticleListData field of a category */
export function parseNewsArticleList(data: Buffer, path: string[]): NewsArticleRecord[] {
  if (data.length < 8) throw new ProtocolError('Article list too short')
  const count = data.readUInt32BE(4)

  let offset = 8
  ;[, offset] = readPString(data, offset)
  ;[, offset] = readPString(data, offset)

  const articles: NewsArticleRecord[] = []
  for (let i = 0; i < count; i++) {
    if (offset + 22 > data.length) throw new ProtocolError('Article entry overruns list')
    const id = data.readUInt32BE(offset)
    const date = readHotlineDate(data, offset + 4)
    const parentId = data.readUInt32BE(offset + 12)
    const flags = data.readUInt32BE(offset + 16)
    const flavorCount = data.readUInt16BE(offset + 20)
    offset += 22

    let title: string
    let poster: string
    ;[title, offset] = readPString(data, offset)
    ;[poster, offset] = readPString(data, offset)

    for (let f = 0; f < flavorCount; f++) {
      ;[, offset] = readPString(data, offset)
      if (offset + 2 > data.length) throw new ProtocolError('Article flavor overruns list')
      offset += 2
    }

    articles.push({ id, parentId, flags, title, poster, date, path })
  }

  return articles
}

// ── Message board ──

export interface BoardPost {
  title: string
  author: string
  body: string
}

const BOARD_DIVIDER = /^\s*_{10,}\s*$/
const BOARD_FROM_LINE = /^From\s+(.+?)(?:\s+\(.*\))?:?\s*$/

/** Split the message board text into posts on divider lines; server order is kept */
export function splitMessageBoard(text: string): BoardPost[] {
  const posts: BoardPost[] = []
  let current: string[] = []

  const flush = (): void => {
    const body = current.join('\n').trim()
    current = []
    if (!body) return
    const firstLine = body.split('\n', 1)[0].trim()
    const from = BOARD_FROM_LINE.exec(firstLine)
    posts.push({ title: firstLine, author: from ? from[1] : '', body })
  }

  for (const line of text.replace(/\r\n?/g, '\n').split('\n')) {
    if (BOARD_DIVIDER.test(line)) flush()
    else current.push(line)
  }
  flush()

  return posts
}
