/** Named privileges granted by the server's access bitmask */
export type Capability =
  | 'deleteFiles'
  | 'uploadFiles'
  | 'downloadFiles'
  | 'renameFiles'
  | 'createFolders'
  | 'deleteFolders'
  | 'renameFolders'
  | 'readChat'
  | 'sendChat'
  | 'createUsers'
  | 'deleteUsers'
  | 'openUsers'
  | 'modifyUsers'
  | 'readNews'
  | 'postNews'
  | 'readBoard'
  | 'postBoard'
  | 'disconnectUsers'
  | 'getClientInfo'
  | 'noAgreement'
  | 'setFileComment'
  | 'setFolderComment'
  | 'broadcast'
  | 'deleteNews'
  | 'uploadFolders'
  | 'downloadFolders'
  | 'sendPrivateMessage'

/** Connection lifecycle of a server session */
export type SessionStatus = 'disconnected' | 'connecting' | 'logging-in' | 'logged-in' | 'failed'

/** Host/port of a Hotline server */
export interface ServerAddress {
  host: string
  port: number
}

/** Login credentials and the identity shown to other users */
export interface LoginCredentials {
  login: string
  password: string
  nickname: string
  iconId: number
}

/** A user connected to the server */
export interface HotlineUser {
  id: number
  iconId: number
  flags: number
  name: string
}

/** A file or folder in a remote listing */
export interface FileEntry {
  name: string
  /** Directory containing the entry, root is [] */
  path: string[]
  isFolder: boolean
  /** Byte size for files, item count for folders */
  size: number
  type: string
  creator: string
}

/** Result of getFileInfo */
export interface FileDetails {
  name: string
  path: string[]
  size: number
  type: string
  creator: string
  comment: string
  created?: Date
  modified?: Date
}

export type ThreadedNodeKind = 'bundle' | 'category' | 'article' | 'post'

/** A node of the news or message board tree */
export interface ThreadedContentNode {
  localId: string
  parentId?: string
  /** Server-side id: article id for news, post index for the board */
  serverId?: number
  kind: ThreadedNodeKind
  title: string
  author: string
  /** Path a container lists its children at, or the category an article lives in */
  path: string[]
  date?: Date
  hasChildren: boolean
  loaded: boolean
}

/** One server listed by a tracker */
export interface TrackerServer {
  address: string
  port: number
  users: number
  name?: string
  description?: string
}

/** Server info read from the login reply */
export interface ServerInfo {
  name: string
  version: number
}

/** Snapshot of a session for observers */
export interface SessionSnapshot {
  id: string
  address: ServerAddress
  status: SessionStatus
  serverInfo?: ServerInfo
  capabilities: Capability[]
  agreementAccepted: boolean
  error?: string
}
