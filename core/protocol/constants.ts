/** Transaction type ids used by the client */
export const TransactionType = {
  reply: 0,
  error: 100,
  getMessageBoard: 101,
  newMessage: 102,
  oldPostNews: 103,
  serverMessage: 104,
  sendChat: 105,
  chatMessage: 106,
  login: 107,
  sendInstantMessage: 108,
  showAgreement: 109,
  disconnectUser: 110,
  disconnectMessage: 111,
  agreed: 121,
  getFileNameList: 200,
  downloadFile: 202,
  uploadFile: 203,
  deleteFile: 204,
  newFolder: 205,
  getFileInfo: 206,
  setFileInfo: 207,
  downloadFolder: 210,
  uploadFolder: 213,
  getUserNameList: 300,
  notifyOfUserChange: 301,
  notifyOfUserDelete: 302,
  getClientInfoText: 303,
  userAccess: 354,
  userBroadcast: 355,
  getNewsCategoryNameList: 370,
  getNewsArticleNameList: 371,
  getNewsArticleData: 400,
  postNewsArticle: 410,
  connectionKeepAlive: 500
} as const

export type TransactionTypeId = (typeof TransactionType)[keyof typeof TransactionType]

/** Field type ids used by the client */
export const FieldType = {
  errorText: 100,
  data: 101,
  userName: 102,
  userId: 103,
  userIconId: 104,
  userLogin: 105,
  userPassword: 106,
  referenceNumber: 107,
  transferSize: 108,
  chatOptions: 109,
  userAccess: 110,
  userFlags: 112,
  options: 113,
  chatId: 114,
  waitingCount: 116,
  serverAgreement: 150,
  noServerAgreement: 154,
  versionNumber: 160,
  serverName: 162,
  fileNameWithInfo: 200,
  fileName: 201,
  filePath: 202,
  fileTransferOptions: 204,
  fileTypeString: 205,
  fileCreatorString: 206,
  fileSize: 207,
  fileCreateDate: 208,
  fileModifyDate: 209,
  fileComment: 210,
  fileNewName: 211,
  folderItemCount: 220,
  userNameWithInfo: 300,
  newsArticleListData: 321,
  newsCategoryListData15: 323,
  newsPath: 325,
  newsArticleId: 326,
  newsArticleDataFlavor: 327,
  newsArticleTitle: 328,
  newsArticleFlags: 334,
  newsArticleData: 333
} as const

export type FieldTypeId = (typeof FieldType)[keyof typeof FieldType]

export const HEADER_SIZE = 20

/** Frames declaring a larger payload are treated as malformed */
export const MAX_FRAME_PAYLOAD = 16 * 1024 * 1024

/** Version number the client reports at login */
export const CLIENT_VERSION = 123

/** Servers at or above this version understand connectionKeepAlive */
export const KEEP_ALIVE_MIN_SERVER_VERSION = 185

export const DEFAULT_PORT = 5500
export const DEFAULT_ICON_ID = 414

export const PROTOCOL_ID = 'TRTP'
export const SUB_PROTOCOL_ID = 'HOTL'
export const TRANSFER_PROTOCOL_ID = 'HTXF'

/** fileTransferOptions value requesting a preview */
export const PREVIEW_TRANSFER_OPTION = 2

export const FOLDER_TYPE_CODE = 'fldr'

export const NEWS_FLAVOR_PLAIN = 'text/plain'
