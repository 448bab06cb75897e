import { FieldType, TransactionType } from '../protocol/constants'
import { createTransaction, readString, stringField } from '../protocol/Transaction'
import { splitMessageBoard } from '../protocol/fields'
import type { ContentSource } from './ThreadedContentStore'
import type { HotlineSession } from './HotlineSession'
import type { ThreadedContentNode } from '../../src/types/hotline'

/** The flat message board: one text blob, split into posts */
export class BoardSource implements ContentSource {
  readonly name = 'board'
  readonly readCapability = 'readBoard'
  readonly postCapability = 'postBoard'
  private session: HotlineSession
  private postBodies: Map<string, Buffer> = new Map()

  constructor(session: HotlineSession) {
    this.session = session
  }

  containerId(path: string[]): string {
    return `board:${JSON.stringify(path)}`
  }

  async list(): Promise<ThreadedContentNode[]> {
    const reply = await this.session.request(createTransaction(TransactionType.getMessageBoard))
    const posts = splitMessageBoard(readString(reply, FieldType.data) ?? '')

    this.postBodies.clear()
    return posts.map((post, index): ThreadedContentNode => {
      const localId = `board#${index}`
      this.postBodies.set(localId, Buffer.from(post.body, 'utf8'))
      return {
        localId,
        serverId: index,
        kind: 'post',
        title: post.title,
        author: post.author,
        path: [],
        hasChildren: false,
        loaded: true
      }
    })
  }

  /** Bodies arrive with the listing */
  async fetchBody(node: ThreadedContentNode): Promise<Buffer> {
    return this.postBodies.get(node.localId) ?? Buffer.alloc(0)
  }

  /** Board posts are flat and untitled; only the body is sent */
  async post(_parent: ThreadedContentNode | undefined, _title: string, body: string): Promise<void> {
    if (!body) return
    await this.session.send(createTransaction(TransactionType.oldPostNews, [stringField(FieldType.data, body)]))
  }
}
