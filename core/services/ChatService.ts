import { FieldType, TransactionType } from '../protocol/constants'
import {
  createTransaction,
  getFields,
  readString,
  stringField,
  u16Field,
  u32Field
} from '../protocol/Transaction'
import { parseUserNameWithInfo } from '../protocol/fields'
import type { HotlineSession } from './HotlineSession'
import type { HotlineUser } from '../../src/types/hotline'

/** Options field of a disconnectUser request */
const BAN_OPTION = { temporary: 1, permanent: 2 } as const

export type BanKind = keyof typeof BAN_OPTION

/** Public chat, private messages, broadcasts and the user list */
export class ChatService {
  private session: HotlineSession

  constructor(session: HotlineSession) {
    this.session = session
  }

  /** Send a line to public chat; `announce` marks an emote/announcement */
  async sendChat(text: string, announce: boolean = false): Promise<void> {
    this.session.assertAllowed('sendChat')
    await this.session.send(
      createTransaction(TransactionType.sendChat, [
        stringField(FieldType.data, text),
        u16Field(FieldType.chatOptions, announce ? 1 : 0)
      ])
    )
  }

  async sendInstantMessage(userId: number, text: string): Promise<void> {
    this.session.assertAllowed('sendPrivateMessage')
    await this.session.send(
      createTransaction(TransactionType.sendInstantMessage, [
        u16Field(FieldType.userId, userId),
        u32Field(FieldType.options, 1),
        stringField(FieldType.data, text)
      ])
    )
  }

  async sendBroadcast(text: string): Promise<void> {
    this.session.assertAllowed('broadcast')
    await this.session.send(createTransaction(TransactionType.userBroadcast, [stringField(FieldType.data, text)]))
  }

  async getUserList(): Promise<HotlineUser[]> {
    const reply = await this.session.request(createTransaction(TransactionType.getUserNameList))
    return getFields(reply, FieldType.userNameWithInfo).map((f) => parseUserNameWithInfo(f.data))
  }

  /** Info text the server keeps about a connected user */
  async getClientInfo(userId: number): Promise<string> {
    this.session.assertAllowed('getClientInfo')
    const reply = await this.session.request(
      createTransaction(TransactionType.getClientInfoText, [u16Field(FieldType.userId, userId)]),
      { capability: 'getClientInfo' }
    )
    return readString(reply, FieldType.data) ?? ''
  }

  /** Kick a user off the server, optionally banning their address */
  async disconnectUser(userId: number, ban?: BanKind): Promise<void> {
    this.session.assertAllowed('disconnectUsers')
    const fields = [u16Field(FieldType.userId, userId)]
    if (ban) fields.push(u16Field(FieldType.options, BAN_OPTION[ban]))
    await this.session.request(createTransaction(TransactionType.disconnectUser, fields), {
      capability: 'disconnectUsers'
    })
  }

  acceptAgreement(): Promise<void> {
    return this.session.acceptAgreement()
  }
}
