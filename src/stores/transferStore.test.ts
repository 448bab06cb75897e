import { beforeEach, describe, expect, it } from 'vitest'
import { LogService } from '../../core/services/LogService'
import { TransferManager, type TransferEndpoint } from '../../core/services/TransferManager'
import { FileService } from '../../core/services/FileService'
import { FakeHotlineServer } from '../../core/testing/FakeHotlineServer'
import { createTestSession } from '../../core/testing/session'
import { TransactionType } from '../../core/protocol/constants'
import { bindTransferStore, transferStore } from './transferStore'
import type { TransferItem } from '../types/transfer'

beforeEach(() => {
  transferStore.setState({ transfers: [] })
})

describe('bindTransferStore', () => {
  it('mirrors updates and removals of the manager', async () => {
    const fake = new FakeHotlineServer()
    fake.handle(TransactionType.downloadFile, () => null)
    const session = createTestSession(fake)
    await session.connect()
    const endpoint: TransferEndpoint = { session, files: new FileService(session) }
    const manager = new TransferManager({ log: new LogService() })

    const unbind = bindTransferStore(manager)
    const item = manager.startDownload(endpoint, { name: 'a.txt', path: [], isFolder: false, size: 1, type: 'TEXT', creator: 'ttxt' }, '/tmp')
    expect(transferStore.getState().transfers.map((t) => [t.id, t.status])).toEqual([[item.id, 'pending']])

    manager.cancel(item.id)
    expect(transferStore.getState().transfers[0].status).toBe('cancelled')

    manager.remove(item.id)
    expect(transferStore.getState().transfers).toEqual([])

    unbind()
    manager.startDownload(endpoint, { name: 'b.txt', path: [], isFolder: false, size: 1, type: 'TEXT', creator: 'ttxt' }, '/tmp')
    expect(transferStore.getState().transfers).toEqual([])
    session.disconnect()
  })

  it('clears finished transfers from the store', () => {
    const base: Omit<TransferItem, 'id' | 'title' | 'status'> = {
      serverId: 's',
      direction: 'download',
      isFolder: false,
      isPreview: false,
      remotePath: ['x'],
      totalSize: 1,
      transferredBytes: 0
    }
    const { setTransfers, clearFinished } = transferStore.getState()
    setTransfers([
      { ...base, id: '1', title: 'done', status: 'completed' },
      { ...base, id: '2', title: 'running', status: 'active' },
      { ...base, id: '3', title: 'broken', status: 'failed' }
    ])

    clearFinished()

    expect(transferStore.getState().transfers.map((t) => t.id)).toEqual(['2'])
  })
})
