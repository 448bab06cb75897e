import type { Capability } from '../../src/types/hotline'

/**
 * Bit index of each capability in the 64-bit access field. Bit 0 is the most
 * significant bit of the first byte. The message board shares the news
 * read/post bits.
 */
export const CAPABILITY_BITS: Readonly<Record<Capability, number>> = {
  deleteFiles: 0,
  uploadFiles: 1,
  downloadFiles: 2,
  renameFiles: 3,
  createFolders: 5,
  deleteFolders: 6,
  renameFolders: 7,
  readChat: 9,
  sendChat: 10,
  createUsers: 14,
  deleteUsers: 15,
  openUsers: 16,
  modifyUsers: 17,
  readNews: 20,
  postNews: 21,
  readBoard: 20,
  postBoard: 21,
  disconnectUsers: 22,
  getClientInfo: 24,
  noAgreement: 27,
  setFileComment: 28,
  setFolderComment: 29,
  broadcast: 32,
  deleteNews: 33,
  uploadFolders: 38,
  downloadFolders: 39,
  sendPrivateMessage: 40
}

export const ALL_CAPABILITIES = Object.keys(CAPABILITY_BITS).filter(isCapability)

function isCapability(name: string): name is Capability {
  return Object.prototype.hasOwnProperty.call(CAPABILITY_BITS, name)
}

/** Immutable view of the server-granted access bitmask */
export class Permissions {
  readonly mask: bigint

  constructor(mask: bigint = 0n) {
    this.mask = BigInt.asUintN(64, mask)
  }

  /** No capabilities: the state before the server has told us anything */
  static none(): Permissions {
    return new Permissions(0n)
  }

  static fromCapabilities(capabilities: Iterable<Capability>): Permissions {
    let mask = 0n
    for (const capability of capabilities) {
      mask |= bitMask(CAPABILITY_BITS[capability])
    }
    return new Permissions(mask)
  }

  has(capability: Capability): boolean {
    return (this.mask & bitMask(CAPABILITY_BITS[capability])) !== 0n
  }

  list(): Capability[] {
    return ALL_CAPABILITIES.filter((c) => this.has(c))
  }

  toBuffer(): Buffer {
    const buf = Buffer.alloc(8)
    buf.writeBigUInt64BE(this.mask)
    return buf
  }
}

function bitMask(bit: number): bigint {
  return 1n << BigInt(63 - bit)
}

/** Pure capability check */
export function isAllowed(permissions: Permissions, capability: Capability): boolean {
  return permissions.has(capability)
}

/** Parse the userAccess field; shorter fields are zero-padded on the right */
export function parsePermissions(data: Buffer): Permissions {
  const buf = Buffer.alloc(8)
  data.copy(buf, 0, 0, Math.min(8, data.length))
  return new Permissions(buf.readBigUInt64BE(0))
}

export function encodePermissions(capabilities: Iterable<Capability>): Buffer {
  return Permissions.fromCapabilities(capabilities).toBuffer()
}
