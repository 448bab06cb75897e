import { createStore } from 'zustand/vanilla'
import type { HotlineUser, SessionSnapshot } from '../types/hotline'
import type { HotlineServer } from '../../core/services/ServerService'
import type { ServerEvent } from '../../core/services/HotlineSession'

/** A line in a server's chat pane */
export interface ChatLine {
  kind: 'chat' | 'server-message' | 'private-message'
  text: string
  userId?: number
  userName?: string
  timestamp: number
}

const MAX_CHAT_LINES = 1000

interface ServerState {
  /** Session snapshots keyed by server id */
  servers: Record<string, SessionSnapshot>
  /** Online users per server, keyed by user id */
  users: Record<string, Record<number, HotlineUser>>
  chat: Record<string, ChatLine[]>

  setSnapshot: (snapshot: SessionSnapshot) => void
  setUsers: (serverId: string, users: HotlineUser[]) => void
  upsertUser: (serverId: string, user: HotlineUser) => void
  removeUser: (serverId: string, userId: number) => void
  addChatLine: (serverId: string, line: ChatLine) => void
  removeServer: (serverId: string) => void
}

export const serverStore = createStore<ServerState>()((set) => ({
  servers: {},
  users: {},
  chat: {},

  setSnapshot: (snapshot) =>
    set((state) => ({ servers: { ...state.servers, [snapshot.id]: snapshot } })),

  setUsers: (serverId, users) =>
    set((state) => ({
      users: { ...state.users, [serverId]: Object.fromEntries(users.map((u) => [u.id, u])) }
    })),

  upsertUser: (serverId, user) =>
    set((state) => ({
      users: { ...state.users, [serverId]: { ...state.users[serverId], [user.id]: user } }
    })),

  removeUser: (serverId, userId) =>
    set((state) => {
      const remaining = { ...state.users[serverId] }
      delete remaining[userId]
      return { users: { ...state.users, [serverId]: remaining } }
    }),

  addChatLine: (serverId, line) =>
    set((state) => {
      const lines = [...(state.chat[serverId] ?? []), line]
      if (lines.length > MAX_CHAT_LINES) lines.splice(0, lines.length - MAX_CHAT_LINES)
      return { chat: { ...state.chat, [serverId]: lines } }
    }),

  removeServer: (serverId) =>
    set((state) => {
      const servers = { ...state.servers }
      const users = { ...state.users }
      const chat = { ...state.chat }
      delete servers[serverId]
      delete users[serverId]
      delete chat[serverId]
      return { servers, users, chat }
    })
}))

/** Mirror one server's session into the store; returns the unbind function */
export function bindServerStore(server: HotlineServer, store = serverStore): () => void {
  const { session } = server
  const { setSnapshot, upsertUser, removeUser, addChatLine } = store.getState()

  const onSnapshot = () => setSnapshot(session.snapshot())
  const onEvent = (event: ServerEvent) => {
    const timestamp = Date.now()
    switch (event.type) {
      case 'user-changed':
        upsertUser(server.id, event.user)
        break
      case 'user-left':
        removeUser(server.id, event.userId)
        break
      case 'chat':
        addChatLine(server.id, { kind: 'chat', text: event.text, timestamp })
        break
      case 'server-message':
        addChatLine(server.id, { kind: 'server-message', text: event.text, timestamp })
        break
      case 'private-message':
        addChatLine(server.id, {
          kind: 'private-message',
          text: event.text,
          userId: event.userId,
          userName: event.userName,
          timestamp
        })
        break
      case 'agreement':
        onSnapshot()
        break
    }
  }

  onSnapshot()
  session.on('status', onSnapshot)
  session.on('permissions', onSnapshot)
  session.on('event', onEvent)
  return () => {
    session.off('status', onSnapshot)
    session.off('permissions', onSnapshot)
    session.off('event', onEvent)
  }
}

/** Replace a server's user list with a fresh one from the server */
export async function refreshUsers(server: HotlineServer, store = serverStore): Promise<HotlineUser[]> {
  const users = await server.chat.getUserList()
  store.getState().setUsers(server.id, users)
  return users
}
