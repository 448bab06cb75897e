import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { FieldType, TransactionType } from '../../core/protocol/constants'
import { bufferField, stringField, u16Field } from '../../core/protocol/Transaction'
import { encodeUserNameWithInfo } from '../../core/protocol/fields'
import { HotlineServer } from '../../core/services/ServerService'
import { FakeHotlineServer } from '../../core/testing/FakeHotlineServer'
import { createTestSession } from '../../core/testing/session'
import { bindServerStore, refreshUsers, serverStore } from './serverStore'

let server: HotlineServer
let fake: FakeHotlineServer

beforeEach(() => {
  serverStore.setState({ servers: {}, users: {}, chat: {} })
  fake = new FakeHotlineServer()
  server = new HotlineServer(createTestSession(fake))
})

afterEach(() => {
  server.session.disconnect()
})

describe('bindServerStore', () => {
  it('follows the session status', async () => {
    const unbind = bindServerStore(server)
    expect(serverStore.getState().servers['server-1'].status).toBe('disconnected')

    await server.session.connect()

    expect(serverStore.getState().servers['server-1'].status).toBe('logged-in')
    unbind()
  })

  it('collects chat and private messages', async () => {
    bindServerStore(server)
    await server.session.connect()

    fake.broadcast(TransactionType.chatMessage, [stringField(FieldType.data, 'alice: hi')])
    fake.broadcast(TransactionType.serverMessage, [
      u16Field(FieldType.userId, 3),
      stringField(FieldType.userName, 'bob'),
      stringField(FieldType.data, 'psst')
    ])

    await vi.waitFor(() => expect(serverStore.getState().chat['server-1']).toHaveLength(2))
    expect(serverStore.getState().chat['server-1'].map((l) => [l.kind, l.text, l.userName])).toEqual([
      ['chat', 'alice: hi', undefined],
      ['private-message', 'psst', 'bob']
    ])
  })

  it('keeps the user list current', async () => {
    bindServerStore(server)
    await server.session.connect()
    fake.handle(TransactionType.getUserNameList, () => ({
      fields: [bufferField(FieldType.userNameWithInfo, encodeUserNameWithInfo({ id: 1, iconId: 414, flags: 0, name: 'alice' }))]
    }))

    await refreshUsers(server)
    fake.broadcast(TransactionType.notifyOfUserChange, [
      u16Field(FieldType.userId, 2),
      u16Field(FieldType.userIconId, 128),
      u16Field(FieldType.userFlags, 0),
      stringField(FieldType.userName, 'bob')
    ])
    fake.broadcast(TransactionType.notifyOfUserDelete, [u16Field(FieldType.userId, 1)])

    await vi.waitFor(() => expect(Object.keys(serverStore.getState().users['server-1'])).toEqual(['2']))
    expect(serverStore.getState().users['server-1'][2]).toEqual({ id: 2, iconId: 128, flags: 0, name: 'bob' })
  })

  it('forgets a removed server', () => {
    bindServerStore(server)
    serverStore.getState().removeServer('server-1')
    expect(serverStore.getState().servers).toEqual({})
  })
})
