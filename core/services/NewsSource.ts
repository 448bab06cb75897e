import { ProtocolError } from '../errors'
import { FieldType, NEWS_FLAVOR_PLAIN, TransactionType } from '../protocol/constants'
import {
  createTransaction,
  getField,
  getFields,
  pathField,
  stringField,
  u32Field,
  type TransactionField
} from '../protocol/Transaction'
import { parseNewsArticleList, parseNewsCategory } from '../protocol/fields'
import type { ContentSource } from './ThreadedContentStore'
import type { HotlineSession } from './HotlineSession'
import type { ThreadedContentNode } from '../../src/types/hotline'

/**
 * Threaded news: bundles contain categories, categories contain articles,
 * articles thread by parent id.
 */
export class NewsSource implements ContentSource {
  readonly name = 'news'
  readonly readCapability = 'readNews'
  readonly postCapability = 'postNews'
  private session: HotlineSession

  constructor(session: HotlineSession) {
    this.session = session
  }

  containerId(path: string[]): string {
    return `news:${JSON.stringify(path)}`
  }

  private articleId(path: string[], id: number): string {
    return `${this.containerId(path)}#${id}`
  }

  list(path: string[], container: ThreadedContentNode | undefined): Promise<ThreadedContentNode[]> {
    return container?.kind === 'category' ? this.listArticles(path) : this.listCategories(path)
  }

  private async listCategories(path: string[]): Promise<ThreadedContentNode[]> {
    const fields: TransactionField[] = path.length > 0 ? [pathField(FieldType.newsPath, path)] : []
    const reply = await this.session.request(createTransaction(TransactionType.getNewsCategoryNameList, fields))

    return getFields(reply, FieldType.newsCategoryListData15).map((f): ThreadedContentNode => {
      const category = parseNewsCategory(f.data, path)
      return {
        localId: this.containerId(category.path),
        parentId: path.length > 0 ? this.containerId(path) : undefined,
        kind: category.type === 2 ? 'bundle' : 'category',
        title: category.name,
        author: '',
        path: category.path,
        hasChildren: category.count > 0,
        loaded: false
      }
    })
  }

  private async listArticles(path: string[]): Promise<ThreadedContentNode[]> {
    const reply = await this.session.request(
      createTransaction(TransactionType.getNewsArticleNameList, [pathField(FieldType.newsPath, path)])
    )

    const data = getField(reply, FieldType.newsArticleListData)
    if (!data) return []

    const articles = parseNewsArticleList(data.data, path)
    const parentIds = new Set(articles.map((a) => a.parentId))

    return articles.map((article): ThreadedContentNode => ({
      localId: this.articleId(path, article.id),
      parentId: article.parentId !== 0 ? this.articleId(path, article.parentId) : this.containerId(path),
      serverId: article.id,
      kind: 'article',
      title: article.title,
      author: article.poster,
      path,
      date: article.date,
      hasChildren: parentIds.has(article.id),
      loaded: true
    }))
  }

  async fetchBody(node: ThreadedContentNode): Promise<Buffer> {
    if (node.kind !== 'article' || node.serverId === undefined) {
      throw new ProtocolError(`${node.kind} "${node.title}" has no body`)
    }

    const reply = await this.session.request(
      createTransaction(TransactionType.getNewsArticleData, [
        pathField(FieldType.newsPath, node.path),
        u32Field(FieldType.newsArticleId, node.serverId),
        stringField(FieldType.newsArticleDataFlavor, NEWS_FLAVOR_PLAIN)
      ])
    )
    return getField(reply, FieldType.newsArticleData)?.data ?? Buffer.alloc(0)
  }

  /** Post into a category, or reply to an article */
  async post(parent: ThreadedContentNode | undefined, title: string, body: string): Promise<void> {
    if (!parent || (parent.kind !== 'category' && parent.kind !== 'article')) {
      throw new ProtocolError('News articles are posted into a category or as a reply')
    }

    const parentArticleId = parent.kind === 'article' ? parent.serverId ?? 0 : 0
    await this.session.request(
      createTransaction(TransactionType.postNewsArticle, [
        pathField(FieldType.newsPath, parent.path),
        u32Field(FieldType.newsArticleId, parentArticleId),
        stringField(FieldType.newsArticleTitle, title),
        stringField(FieldType.newsArticleDataFlavor, NEWS_FLAVOR_PLAIN),
        u32Field(FieldType.newsArticleFlags, 0),
        stringField(FieldType.newsArticleData, body)
      ]),
      { capability: this.postCapability }
    )
  }
}
