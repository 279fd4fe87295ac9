/**
 * Error taxonomy shared by every BlobStore and MessageQueue adapter.
 *
 * Callers can switch on `code` instead of `instanceof` when errors cross
 * package boundaries.
 */

export type PersistenceErrorCode =
  | 'BLOB_NOT_FOUND'
  | 'BLOB_ALREADY_EXISTS'
  | 'LEASE_CONFLICT'
  | 'LEASE_NOT_FOUND'
  | 'LEASE_RETRY_EXHAUSTED'
  | 'MESSAGE_NOT_FOUND'
  | 'RACE_LOST'

export class PersistenceError extends Error {
  public readonly code: PersistenceErrorCode
  public readonly details?: Record<string, unknown>

  constructor(code: PersistenceErrorCode, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'PersistenceError'
    this.code = code
    this.details = details
  }
}

export class BlobNotFoundError extends PersistenceError {
  constructor(blob: string) {
    super('BLOB_NOT_FOUND', `Blob "${blob}" not found`, { blob })
    this.name = 'BlobNotFoundError'
  }
}

export class BlobAlreadyExistsError extends PersistenceError {
  constructor(blob: string) {
    super('BLOB_ALREADY_EXISTS', `Blob "${blob}" already exists`, { blob })
    this.name = 'BlobAlreadyExistsError'
  }
}

/**
 * Thrown when a valid lease is held by someone else, or when an upload
 * against a leased blob presents no lease id or the wrong one.
 */
export class LeaseAlreadyExistsError extends PersistenceError {
  constructor(message: string, blob: string) {
    super('LEASE_CONFLICT', message, { blob })
    this.name = 'LeaseAlreadyExistsError'
  }
}

/**
 * Thrown when the caller presents a lease id but the blob carries no lease.
 */
export class LeaseNotFoundError extends PersistenceError {
  constructor(blob: string) {
    super('LEASE_NOT_FOUND', `Lease for blob "${blob}" not found`, { blob })
    this.name = 'LeaseNotFoundError'
  }
}

export class LeaseRetryExhaustedError extends PersistenceError {
  constructor(blob: string, attempts: number) {
    super(
      'LEASE_RETRY_EXHAUSTED',
      `Gave up on lease file for blob "${blob}" after ${attempts} attempts`,
      { blob, attempts }
    )
    this.name = 'LeaseRetryExhaustedError'
  }
}

export class MessageNotFoundError extends PersistenceError {
  constructor(messageId: string) {
    super('MESSAGE_NOT_FOUND', `Message with id "${messageId}" not found`, { messageId })
    this.name = 'MessageNotFoundError'
  }
}

/**
 * A concurrent actor changed the state an attempt was based on.
 * Only raised inside retryOnRace; callers never see it.
 */
export class RaceLostError extends PersistenceError {
  constructor(message: string, cause?: unknown) {
    super('RACE_LOST', message)
    this.name = 'RaceLostError'
    if (cause !== undefined) {
      this.cause = cause
    }
  }
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError
}

/**
 * Narrow a Node.js system error by its errno code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  )
}
