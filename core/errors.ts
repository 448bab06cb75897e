export type HotlineErrorKind =
  | 'connectivity'
  | 'protocol'
  | 'authentication'
  | 'permission-denied'
  | 'transfer'
  | 'connection-lost'
  | 'timeout'
  | 'server'

/** Base class for every error surfaced by the client */
export abstract class HotlineError extends Error {
  abstract readonly kind: HotlineErrorKind
}

/** Host unreachable, refused, or the socket failed before the session was up */
export class ConnectivityError extends HotlineError {
  readonly kind = 'connectivity'

  constructor(message: string) {
    super(message)
    this.name = 'ConnectivityError'
  }
}

/** Malformed frame, bad handshake, or an unexpected reply shape */
export class ProtocolError extends HotlineError {
  readonly kind = 'protocol'

  constructor(message: string) {
    super(message)
    this.name = 'ProtocolError'
  }
}

/** The server rejected the login */
export class AuthenticationError extends HotlineError {
  readonly kind = 'authentication'

  constructor(message: string) {
    super(message)
    this.name = 'AuthenticationError'
  }
}

export type PermissionOrigin = 'local' | 'remote'

/**
 * A privileged operation was refused. `local` means the request was never
 * sent because the cached permissions lack the capability; `remote` means
 * the server denied it.
 */
export class PermissionDeniedError extends HotlineError {
  readonly kind = 'permission-denied'
  readonly origin: PermissionOrigin
  readonly capability?: string

  constructor(message: string, origin: PermissionOrigin, capability?: string) {
    super(message)
    this.name = 'PermissionDeniedError'
    this.origin = origin
    this.capability = capability
  }
}

/** Data connection failure or bad transfer stream */
export class TransferError extends HotlineError {
  readonly kind = 'transfer'

  constructor(message: string) {
    super(message)
    this.name = 'TransferError'
  }
}

/** The control connection closed while a request was outstanding */
export class ConnectionLostError extends HotlineError {
  readonly kind = 'connection-lost'

  constructor(message: string = 'Connection lost') {
    super(message)
    this.name = 'ConnectionLostError'
  }
}

export class TimeoutError extends HotlineError {
  readonly kind = 'timeout'

  constructor(message: string) {
    super(message)
    this.name = 'TimeoutError'
  }
}

/** A reply carried a non-zero error code */
export class ServerError extends HotlineError {
  readonly kind = 'server'
  readonly code: number

  constructor(message: string, code: number) {
    super(message)
    this.name = 'ServerError'
    this.code = code
  }
}

/** Human-readable message from an unknown thrown value */
export function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error ? err.message : fallback
}
