export type SyncErrorCode =
  | 'DECODE'
  | 'AUTH'
  | 'SESSION_EXPIRED'
  | 'TRANSPORT'

/** Base class for every error raised by the sync runtime. */
export class SyncError extends Error {
  readonly code: SyncErrorCode

  constructor(code: SyncErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SyncError'
    this.code = code
  }
}

/** A frame or payload did not match any known shape. */
export class DecodeError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super('DECODE', message, options)
    this.name = 'DecodeError'
  }
}

/** The server rejected the current token mid-stream. */
export class AuthError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super('AUTH', message, options)
    this.name = 'AuthError'
  }
}

/** Terminal: the session cannot be refreshed and the user must sign in again. */
export class SessionExpiredError extends SyncError {
  constructor(message = '[sync:session] Session expired', options?: ErrorOptions) {
    super('SESSION_EXPIRED', message, options)
    this.name = 'SessionExpiredError'
  }
}

export class TransportError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super('TRANSPORT', message, options)
    this.name = 'TransportError'
  }
}
