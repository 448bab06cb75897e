import { EventEmitter } from 'events'
import { ProtocolError } from '../errors'
import { FieldType, PREVIEW_TRANSFER_OPTION, TransactionType } from '../protocol/constants'
import {
  createTransaction,
  getField,
  getFields,
  pathField,
  readInteger,
  readString,
  stringField,
  u16Field,
  u32Field,
  type Transaction,
  type TransactionField
} from '../protocol/Transaction'
import { parseFileNameWithInfo, readHotlineDate } from '../protocol/fields'
import type { HotlineSession } from './HotlineSession'
import type { FileDetails, FileEntry } from '../../src/types/hotline'

export interface DownloadTicket {
  referenceNumber: number
  /** Bytes that will cross the data connection, headers included */
  transferSize: number
  fileSize: number
  waitingCount: number
}

export interface FolderDownloadTicket {
  referenceNumber: number
  transferSize: number
  itemCount: number
  waitingCount: number
}

export interface FileInfoChanges {
  newName?: string
  comment?: string
}

function pathKey(path: string[]): string {
  return JSON.stringify(path)
}

/**
 * FileService: path-addressed remote file operations over one session.
 * Keeps the latest listing per directory; a re-list replaces the snapshot.
 *
 * Emits:
 *   'listing' → (path: string[], entries: FileEntry[])
 */
export class FileService extends EventEmitter {
  private listings: Map<string, FileEntry[]> = new Map()
  private listSequence: Map<string, number> = new Map()
  private session: HotlineSession

  constructor(session: HotlineSession) {
    super()
    this.session = session
  }

  /** List a directory; root is [] */
  async listFiles(path: string[] = []): Promise<FileEntry[]> {
    const key = pathKey(path)
    const sequence = (this.listSequence.get(key) ?? 0) + 1
    this.listSequence.set(key, sequence)

    const fields: TransactionField[] = path.length > 0 ? [pathField(FieldType.filePath, path)] : []
    const reply = await this.session.request(createTransaction(TransactionType.getFileNameList, fields))

    const entries = getFields(reply, FieldType.fileNameWithInfo).map((f) => parseFileNameWithInfo(f.data, path))

    // An older listing of the same path never overwrites a newer one
    if (this.listSequence.get(key) === sequence) {
      this.listings.set(key, entries)
      this.emit('listing', path, entries)
    }
    return entries
  }

  /** Last listing received for a path */
  getCachedListing(path: string[]): FileEntry[] | undefined {
    return this.listings.get(pathKey(path))
  }

  clearCache(): void {
    this.listings.clear()
    this.listSequence.clear()
  }

  async getFileInfo(name: string, path: string[]): Promise<FileDetails> {
    const reply = await this.session.request(
      createTransaction(TransactionType.getFileInfo, [
        stringField(FieldType.fileName, name),
        pathField(FieldType.filePath, path)
      ])
    )

    const created = getField(reply, FieldType.fileCreateDate)
    const modified = getField(reply, FieldType.fileModifyDate)

    return {
      name: readString(reply, FieldType.fileName) ?? name,
      path,
      // Folders carry no size field
      size: readInteger(reply, FieldType.fileSize) ?? 0,
      type: readString(reply, FieldType.fileTypeString) ?? '',
      creator: readString(reply, FieldType.fileCreatorString) ?? '',
      comment: readString(reply, FieldType.fileComment) ?? '',
      created: created ? readHotlineDate(created.data) : undefined,
      modified: modified ? readHotlineDate(modified.data) : undefined
    }
  }

  /** Rename an item or change its comment */
  async setFileInfo(entry: Pick<FileEntry, 'name' | 'path' | 'isFolder'>, changes: FileInfoChanges): Promise<void> {
    const fields: TransactionField[] = [
      stringField(FieldType.fileName, entry.name),
      pathField(FieldType.filePath, entry.path)
    ]

    if (changes.newName !== undefined) {
      this.session.assertAllowed(entry.isFolder ? 'renameFolders' : 'renameFiles')
      fields.push(stringField(FieldType.fileNewName, changes.newName))
    }
    if (changes.comment !== undefined) {
      this.session.assertAllowed(entry.isFolder ? 'setFolderComment' : 'setFileComment')
      fields.push(stringField(FieldType.fileComment, changes.comment))
    }
    if (fields.length === 2) return

    await this.session.request(createTransaction(TransactionType.setFileInfo, fields))
  }

  async deleteFile(entry: Pick<FileEntry, 'name' | 'path' | 'isFolder'>): Promise<void> {
    const capability = entry.isFolder ? 'deleteFolders' : 'deleteFiles'
    this.session.assertAllowed(capability)
    await this.session.request(
      createTransaction(TransactionType.deleteFile, [
        stringField(FieldType.fileName, entry.name),
        pathField(FieldType.filePath, entry.path)
      ]),
      { capability }
    )
  }

  async newFolder(name: string, path: string[]): Promise<void> {
    this.session.assertAllowed('createFolders')
    await this.session.request(
      createTransaction(TransactionType.newFolder, [
        stringField(FieldType.fileName, name),
        pathField(FieldType.filePath, path)
      ]),
      { capability: 'createFolders' }
    )
  }

  // ── Transfer tickets (control-channel half of a transfer) ──

  async requestDownload(name: string, path: string[], preview: boolean = false): Promise<DownloadTicket> {
    this.session.assertAllowed('downloadFiles')
    const fields = [stringField(FieldType.fileName, name), pathField(FieldType.filePath, path)]
    if (preview) fields.push(u32Field(FieldType.fileTransferOptions, PREVIEW_TRANSFER_OPTION))

    const reply = await this.session.request(createTransaction(TransactionType.downloadFile, fields), {
      capability: 'downloadFiles'
    })

    const referenceNumber = requireInteger(reply, FieldType.referenceNumber)
    const transferSize = requireInteger(reply, FieldType.transferSize)
    return {
      referenceNumber,
      transferSize,
      fileSize: readInteger(reply, FieldType.fileSize) ?? transferSize,
      waitingCount: readInteger(reply, FieldType.waitingCount) ?? 0
    }
  }

  async requestFolderDownload(name: string, path: string[]): Promise<FolderDownloadTicket> {
    this.session.assertAllowed('downloadFolders')
    const reply = await this.session.request(
      createTransaction(TransactionType.downloadFolder, [
        stringField(FieldType.fileName, name),
        pathField(FieldType.filePath, path)
      ]),
      { capability: 'downloadFolders' }
    )

    return {
      referenceNumber: requireInteger(reply, FieldType.referenceNumber),
      transferSize: requireInteger(reply, FieldType.transferSize),
      itemCount: readInteger(reply, FieldType.folderItemCount) ?? 0,
      waitingCount: readInteger(reply, FieldType.waitingCount) ?? 0
    }
  }

  /** Returns the reference number for the upload */
  async requestUpload(name: string, path: string[], size?: number): Promise<number> {
    this.session.assertAllowed('uploadFiles')
    const fields = [stringField(FieldType.fileName, name), pathField(FieldType.filePath, path)]
    if (size !== undefined) fields.push(u32Field(FieldType.transferSize, size))

    const reply = await this.session.request(createTransaction(TransactionType.uploadFile, fields), {
      capability: 'uploadFiles'
    })
    return requireInteger(reply, FieldType.referenceNumber)
  }

  async requestFolderUpload(name: string, path: string[], itemCount: number, totalSize: number): Promise<number> {
    this.session.assertAllowed('uploadFolders')
    const reply = await this.session.request(
      createTransaction(TransactionType.uploadFolder, [
        stringField(FieldType.fileName, name),
        pathField(FieldType.filePath, path),
        u32Field(FieldType.transferSize, totalSize),
        u16Field(FieldType.folderItemCount, itemCount & 0xffff)
      ]),
      { capability: 'uploadFolders' }
    )
    return requireInteger(reply, FieldType.referenceNumber)
  }
}

function requireInteger(reply: Transaction, type: number): number {
  const value = readInteger(reply, type)
  if (value === undefined) throw new ProtocolError(`Reply is missing field ${type}`)
  return value
}
