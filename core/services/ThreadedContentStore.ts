import { createStore, type StoreApi } from 'zustand/vanilla'
import type { Capability, ThreadedContentNode } from '../../src/types/hotline'
import type { HotlineSession } from './HotlineSession'

/** Children key of the tree root */
export const ROOT_KEY = ':root'

/** Backend of a threaded tree (news or message board) */
export interface ContentSource {
  readonly name: string
  readonly readCapability: Capability
  readonly postCapability: Capability
  /** Local id of the container node listed at `path` */
  containerId(path: string[]): string
  /** Nodes found at `path`, in server order */
  list(path: string[], container: ThreadedContentNode | undefined): Promise<ThreadedContentNode[]>
  fetchBody(node: ThreadedContentNode): Promise<Buffer>
  post(parent: ThreadedContentNode | undefined, title: string, body: string): Promise<void>
}

interface ThreadedContentState {
  nodes: Record<string, ThreadedContentNode>
  /** Ordered child ids per parent id (ROOT_KEY for the root) */
  children: Record<string, string[]>
  /** Containers whose children have been listed */
  loaded: Record<string, boolean>

  /** Replace everything previously listed under `parentKey` with `listing` */
  applyListing: (parentKey: string, listing: ThreadedContentNode[]) => void
  reset: () => void
}

function createContentState(): StoreApi<ThreadedContentState> {
  return createStore<ThreadedContentState>()((set) => ({
    nodes: {},
    children: {},
    loaded: {},

    applyListing: (parentKey, listing) =>
      set((state) => {
        const nodes = { ...state.nodes }
        const children = { ...state.children }
        const loaded = { ...state.loaded }

        const drop = (key: string): void => {
          for (const childId of children[key] ?? []) {
            drop(childId)
            delete nodes[childId]
            delete loaded[childId]
          }
          delete children[key]
        }
        drop(parentKey)

        const listedIds = new Set(listing.map((n) => n.localId))
        children[parentKey] = []
        for (const node of listing) {
          nodes[node.localId] = node
          // Threaded replies hang under their parent; anything else under the listed container
          const parent = node.parentId !== undefined && listedIds.has(node.parentId) ? node.parentId : parentKey
          ;(children[parent] ??= []).push(node.localId)
        }

        loaded[parentKey] = true
        const container = nodes[parentKey]
        if (container) nodes[parentKey] = { ...container, loaded: true }

        return { nodes, children, loaded }
      }),

    reset: () => set({ nodes: {}, children: {}, loaded: {} })
  }))
}

/**
 * ThreadedContentStore: lazily expanded parent/child tree over a
 * ContentSource. Single writer; consumers read snapshots or subscribe.
 */
export class ThreadedContentStore {
  readonly source: ContentSource
  private session: HotlineSession
  private state: StoreApi<ThreadedContentState>
  private bodies: Map<string, Buffer> = new Map()

  constructor(session: HotlineSession, source: ContentSource) {
    this.session = session
    this.source = source
    this.state = createContentState()
  }

  /** List the children at `path`, replacing what was cached there */
  async listChildren(path: string[] = []): Promise<ThreadedContentNode[]> {
    this.session.assertAllowed(this.source.readCapability)

    const parentKey = this.keyFor(path)
    const container = parentKey === ROOT_KEY ? undefined : this.state.getState().nodes[parentKey]
    const listing = await this.source.list(path, container)

    for (const node of listing) this.bodies.delete(node.localId)
    this.state.getState().applyListing(parentKey, listing)
    return listing
  }

  /** Fetch the body of a node on explicit request; cached per node */
  async fetchBody(node: ThreadedContentNode): Promise<Buffer> {
    const cached = this.bodies.get(node.localId)
    if (cached) return cached

    this.session.assertAllowed(this.source.readCapability)
    const body = await this.source.fetchBody(node)
    this.bodies.set(node.localId, body)
    return body
  }

  /**
   * Post under `parentId` (a container or a node to reply to). The tree is
   * not updated; re-list the parent to see the post.
   */
  async post(parentId: string | undefined, title: string, body: string): Promise<void> {
    this.session.assertAllowed(this.source.postCapability)
    const parent = parentId === undefined ? undefined : this.state.getState().nodes[parentId]
    await this.source.post(parent, title, body)
  }

  getNode(localId: string): ThreadedContentNode | undefined {
    return this.state.getState().nodes[localId]
  }

  /** Direct children of a node, in server order */
  getChildren(parentId: string = ROOT_KEY): ThreadedContentNode[] {
    const { nodes, children } = this.state.getState()
    return (children[parentId] ?? []).flatMap((id) => {
      const node = nodes[id]
      return node ? [node] : []
    })
  }

  isLoaded(path: string[]): boolean {
    return this.state.getState().loaded[this.keyFor(path)] === true
  }

  getSnapshot(): Pick<ThreadedContentState, 'nodes' | 'children' | 'loaded'> {
    const { nodes, children, loaded } = this.state.getState()
    return { nodes, children, loaded }
  }

  subscribe(listener: () => void): () => void {
    return this.state.subscribe(() => listener())
  }

  clear(): void {
    this.bodies.clear()
    this.state.getState().reset()
  }

  private keyFor(path: string[]): string {
    return path.length === 0 ? ROOT_KEY : this.source.containerId(path)
  }
}
