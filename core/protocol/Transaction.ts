import { ProtocolError } from '../errors'
import { HEADER_SIZE, MAX_FRAME_PAYLOAD, PROTOCOL_ID, SUB_PROTOCOL_ID } from './constants'

/** A typed field of a transaction body */
export interface TransactionField {
  type: number
  data: Buffer
}

/** One request, reply or server push on the control connection */
export interface Transaction {
  flags: number
  isReply: boolean
  type: number
  id: number
  errorCode: number
  fields: TransactionField[]
}

export type DecodeResult =
  | { kind: 'transaction'; transaction: Transaction; bytesConsumed: number }
  | { kind: 'incomplete' }
  | { kind: 'malformed'; reason: string }

/** Create a request transaction; the session assigns the id when sending */
export function createTransaction(type: number, fields: TransactionField[] = []): Transaction {
  return { flags: 0, isReply: false, type, id: 0, errorCode: 0, fields }
}

/** Size of the body (field count + fields) for a list of fields */
export function bodySize(fields: TransactionField[]): number {
  return fields.reduce((size, field) => size + 4 + field.data.length, 2)
}

/** Encode a transaction into its wire frame */
export function encodeTransaction(transaction: Transaction): Buffer {
  if (transaction.fields.length > 0xffff) {
    throw new ProtocolError(`Too many fields: ${transaction.fields.length}`)
  }

  const size = bodySize(transaction.fields)
  const frame = Buffer.alloc(HEADER_SIZE + size)

  frame.writeUInt8(transaction.flags, 0)
  frame.writeUInt8(transaction.isReply ? 1 : 0, 1)
  frame.writeUInt16BE(transaction.type, 2)
  frame.writeUInt32BE(transaction.id, 4)
  frame.writeUInt32BE(transaction.errorCode, 8)
  frame.writeUInt32BE(size, 12)
  frame.writeUInt32BE(size, 16)
  frame.writeUInt16BE(transaction.fields.length, HEADER_SIZE)

  let offset = HEADER_SIZE + 2
  for (const field of transaction.fields) {
    if (field.data.length > 0xffff) {
      throw new ProtocolError(`Field ${field.type} too large: ${field.data.length} bytes`)
    }
    frame.writeUInt16BE(field.type, offset)
    frame.writeUInt16BE(field.data.length, offset + 2)
    field.data.copy(frame, offset + 4)
    offset += 4 + field.data.length
  }

  return frame
}

/**
 * Decode one frame from the start of `buffer`. Never reads past the declared
 * size, so trailing bytes belong to the next frame.
 */
export function decodeFrame(buffer: Buffer): DecodeResult {
  if (buffer.length < HEADER_SIZE) return { kind: 'incomplete' }

  const totalSize = buffer.readUInt32BE(12)
  const dataSize = buffer.readUInt32BE(16)

  if (totalSize !== dataSize) {
    return { kind: 'malformed', reason: `Total size ${totalSize} does not match data size ${dataSize}` }
  }
  if (dataSize > MAX_FRAME_PAYLOAD) {
    return { kind: 'malformed', reason: `Declared size ${dataSize} exceeds limit` }
  }
  if (dataSize === 1) {
    return { kind: 'malformed', reason: 'Body too short for a field count' }
  }
  if (buffer.length < HEADER_SIZE + dataSize) return { kind: 'incomplete' }

  const body = buffer.subarray(HEADER_SIZE, HEADER_SIZE + dataSize)
  const fields: TransactionField[] = []

  if (dataSize > 0) {
    const count = body.readUInt16BE(0)
    let offset = 2
    for (let i = 0; i < count; i++) {
      if (offset + 4 > body.length) {
        return { kind: 'malformed', reason: `Field ${i} header overruns payload` }
      }
      const type = body.readUInt16BE(offset)
      const size = body.readUInt16BE(offset + 2)
      offset += 4
      if (offset + size > body.length) {
        return { kind: 'malformed', reason: `Field ${type} overruns payload` }
      }
      fields.push({ type, data: Buffer.from(body.subarray(offset, offset + size)) })
      offset += size
    }
    if (offset !== body.length) {
      return { kind: 'malformed', reason: `${body.length - offset} trailing bytes after fields` }
    }
  }

  return {
    kind: 'transaction',
    transaction: {
      flags: buffer.readUInt8(0),
      isReply: buffer.readUInt8(1) === 1,
      type: buffer.readUInt16BE(2),
      id: buffer.readUInt32BE(4),
      errorCode: buffer.readUInt32BE(8),
      fields
    },
    bytesConsumed: HEADER_SIZE + dataSize
  }
}

/**
 * FrameDecoder: accumulates socket chunks and yields complete transactions,
 * independent of how the byte stream was split.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0)

  /** Feed a chunk; returns every transaction completed by it. Throws on malformed input. */
  push(chunk: Buffer): Transaction[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk])

    const out: Transaction[] = []
    for (;;) {
      const result = decodeFrame(this.buffer)
      if (result.kind === 'incomplete') break
      if (result.kind === 'malformed') {
        this.buffer = Buffer.alloc(0)
        throw new ProtocolError(`Malformed transaction: ${result.reason}`)
      }
      out.push(result.transaction)
      this.buffer = this.buffer.subarray(result.bytesConsumed)
    }
    return out
  }

  /** Bytes waiting for the rest of their frame */
  get pending(): number {
    return this.buffer.length
  }
}

// ── Handshake ──

export function encodeHandshake(): Buffer {
  const buf = Buffer.alloc(12)
  buf.write(PROTOCOL_ID, 0, 'ascii')
  buf.write(SUB_PROTOCOL_ID, 4, 'ascii')
  buf.writeUInt16BE(1, 8)
  buf.writeUInt16BE(2, 10)
  return buf
}

/** Handshake reply size sent by the server */
export const HANDSHAKE_REPLY_SIZE = 8

/** Validate the 8-byte server handshake reply; returns its error code */
export function decodeHandshakeReply(reply: Buffer): number {
  if (reply.length < HANDSHAKE_REPLY_SIZE || reply.toString('ascii', 0, 4) !== PROTOCOL_ID) {
    throw new ProtocolError('Invalid handshake reply')
  }
  return reply.readUInt32BE(4)
}

// ── Field builders ──

export function stringField(type: number, value: string): TransactionField {
  return { type, data: Buffer.from(value, 'utf8') }
}

/** Obfuscated string: every byte XOR 0xFF (login and password) */
export function encodedStringField(type: number, value: string): TransactionField {
  const data = Buffer.from(value, 'utf8')
  for (let i = 0; i < data.length; i++) data[i] = data[i] ^ 0xff
  return { type, data }
}

export function u16Field(type: number, value: number): TransactionField {
  const data = Buffer.alloc(2)
  data.writeUInt16BE(value)
  return { type, data }
}

export function u32Field(type: number, value: number): TransactionField {
  const data = Buffer.alloc(4)
  data.writeUInt32BE(value)
  return { type, data }
}

export function bufferField(type: number, data: Buffer): TransactionField {
  return { type, data }
}

/** Path list: count, then per segment 0x0000, a length byte and the name */
export function pathField(type: number, segments: string[]): TransactionField {
  const parts: Buffer[] = []
  const head = Buffer.alloc(2)
  head.writeUInt16BE(segments.length)
  parts.push(head)

  for (const segment of segments) {
    const name = Buffer.from(segment, 'utf8')
    if (name.length > 0xff) throw new ProtocolError(`Path segment too long: ${segment}`)
    const prefix = Buffer.alloc(3)
    prefix.writeUInt8(name.length, 2)
    parts.push(prefix, name)
  }

  return { type, data: Buffer.concat(parts) }
}

// ── Field readers ──

export function getField(transaction: Transaction, type: number): TransactionField | undefined {
  return transaction.fields.find((f) => f.type === type)
}

export function getFields(transaction: Transaction, type: number): TransactionField[] {
  return transaction.fields.filter((f) => f.type === type)
}

export function readString(transaction: Transaction, type: number): string | undefined {
  return getField(transaction, type)?.data.toString('utf8')
}

export function decodeObfuscated(data: Buffer): string {
  return Buffer.from(data.map((b) => b ^ 0xff)).toString('utf8')
}

/** Integer fields are 1, 2, 4 or 8 bytes big endian depending on the value */
export function readIntegerData(data: Buffer): number | undefined {
  switch (data.length) {
    case 1:
      return data.readUInt8(0)
    case 2:
      return data.readUInt16BE(0)
    case 4:
      return data.readUInt32BE(0)
    case 8:
      return Number(data.readBigUInt64BE(0))
    default:
      return undefined
  }
}

export function readInteger(transaction: Transaction, type: number): number | undefined {
  const field = getField(transaction, type)
  return field ? readIntegerData(field.data) : undefined
}

export function readPathData(data: Buffer): string[] {
  if (data.length < 2) return []
  const count = data.readUInt16BE(0)
  const segments: string[] = []
  let offset = 2
  for (let i = 0; i < count; i++) {
    if (offset + 3 > data.length) throw new ProtocolError('Path segment header overruns field')
    const len = data.readUInt8(offset + 2)
    offset += 3
    if (offset + len > data.length) throw new ProtocolError('Path segment overruns field')
    segments.push(data.toString('utf8', offset, offset + len))
    offset += len
  }
  return segments
}
