import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { promises as fsp } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { ConnectivityError, TransferError } from '../errors'
import { FieldType, TransactionType } from '../protocol/constants'
import { bufferField, readInteger, readString, u32Field } from '../protocol/Transaction'
import { encodeFileNameWithInfo } from '../protocol/fields'
import { FakeHotlineServer, flattenFile, writeData } from '../testing/FakeHotlineServer'
import { LogService } from './LogService'
import { ServerService } from './ServerService'
import { SettingsStore } from './SettingsStore'
import type { TransferItem } from '../../src/types/transfer'

let dir: string
let service: ServerService

beforeEach(async () => {
  dir = await fsp.mkdtemp(join(tmpdir(), 'hotline-servers-'))
})

afterEach(async () => {
  service.disconnectAll()
  await fsp.rm(dir, { recursive: true, force: true })
})

function setup(fake: FakeHotlineServer, withSettings = true) {
  const settings = withSettings ? new SettingsStore({ cwd: dir }) : undefined
  settings?.update({ nickname: 'captain', iconId: 128, keepAliveInterval: 0, logMaxEntries: 50 })
  const log = new LogService()
  service = new ServerService({ settings, connector: fake.connector, log })
  return { settings, log }
}

describe('ServerService', () => {
  it('connects with the nickname and icon from the settings', async () => {
    const fake = new FakeHotlineServer({ name: 'Harbor' })
    setup(fake)

    const server = await service.connect('harbor', { host: fake.address.host, port: fake.address.port })

    expect(server.id).toBe('harbor')
    expect(service.isConnected('harbor')).toBe(true)
    expect(server.session.serverInfo).toEqual({ name: 'Harbor', version: 190 })
    const [login] = fake.requestsOf(TransactionType.login)
    expect(readString(login, FieldType.userName)).toBe('captain')
    expect(readInteger(login, FieldType.userIconId)).toBe(128)
  })

  it('lets explicit options win over the settings', async () => {
    const fake = new FakeHotlineServer()
    setup(fake)

    await service.connect('harbor', { host: fake.address.host, port: fake.address.port, nickname: 'mate' })

    const [login] = fake.requestsOf(TransactionType.login)
    expect(readString(login, FieldType.userName)).toBe('mate')
  })

  it('routes operations to the named server', async () => {
    const fake = new FakeHotlineServer()
    setup(fake)
    fake.handle(TransactionType.getFileNameList, () => ({
      fields: [bufferField(FieldType.fileNameWithInfo, encodeFileNameWithInfo({ name: 'readme.txt', size: 5, type: 'TEXT', creator: 'ttxt' }))]
    }))
    await service.connect('harbor', { host: fake.address.host, port: fake.address.port })

    const entries = await service.listFiles('harbor')

    expect(entries.map((e) => e.name)).toEqual(['readme.txt'])
  })

  it('rejects operations on unknown servers', async () => {
    setup(new FakeHotlineServer())

    expect(() => service.listFiles('nowhere')).toThrow(ConnectivityError)
    expect(() => service.listFiles('nowhere')).toThrow('Not connected to server "nowhere"')
  })

  it('drops the server on disconnect', async () => {
    const fake = new FakeHotlineServer()
    setup(fake)
    const server = await service.connect('harbor', { host: fake.address.host, port: fake.address.port })

    service.disconnect('harbor')

    expect(service.get('harbor')).toBeUndefined()
    expect(service.isConnected('harbor')).toBe(false)
    expect(server.session.status).toBe('disconnected')
  })

  it('lets a running download finish after the server is disconnected', async () => {
    const fake = new FakeHotlineServer()
    setup(fake)
    const flat = flattenFile('keep.txt', Buffer.from('still here'))
    fake.handle(TransactionType.downloadFile, () => ({
      fields: [u32Field(FieldType.referenceNumber, 5), u32Field(FieldType.transferSize, flat.length)]
    }))
    let started = false
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    fake.onTransfer(5, async (_reader, socket) => {
      started = true
      await gate
      await writeData(socket, flat)
      socket.end()
    })
    await service.connect('harbor', { host: fake.address.host, port: fake.address.port })
    const done = new Promise<TransferItem>((resolve) => service.transfers.once('complete', resolve))

    service.startDownload('harbor', { name: 'keep.txt', path: [], isFolder: false, size: 10, type: 'TEXT', creator: 'ttxt' }, dir)
    await vi.waitFor(() => expect(started).toBe(true))
    service.disconnect('harbor')
    release()

    expect((await done).status).toBe('completed')
    expect(await fsp.readFile(join(dir, 'keep.txt'), 'utf8')).toBe('still here')
  })

  it('needs a destination when no settings are given', async () => {
    const fake = new FakeHotlineServer()
    setup(fake, false)
    await service.connect('harbor', { host: fake.address.host, port: fake.address.port })

    expect(() =>
      service.startDownload('harbor', { name: 'a.txt', path: [], isFolder: false, size: 1, type: 'TEXT', creator: 'ttxt' })
    ).toThrow(TransferError)
  })

  it('applies the log settings', () => {
    const { log } = setup(new FakeHotlineServer())
    for (let i = 0; i < 60; i++) log.log('x', 'info', 'system', `line ${i}`)

    expect(log.getEntries('x')).toHaveLength(50)
  })
})
