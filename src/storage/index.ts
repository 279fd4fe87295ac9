// Adapter interfaces
export type { BlobStore, UploadBlobOptions } from './blob-store'
export { RESERVED_BLOB_SUFFIXES, assertBlobName } from './blob-store'
export type { MessageQueue } from './message-queue'
export { assertMaxMessages } from './message-queue'
export * from './errors'

// Implementations
export * from './local-disk-blob-store'
export * from './local-disk-message-queue'
export * from './in-memory-blob-store'
export * from './in-memory-message-queue'
export * from './adapter-factory'

// Building blocks
export { withFileLock, lockPathFor, LOCK_SUFFIX } from './file-lock'
export type { FileLockOptions } from './file-lock'
export { retryOnRace, conditionalWriteResult } from './optimistic'
export type { RaceRetryPolicy, ConditionalWriteResult } from './optimistic'
export { LEASE_SUFFIX, LeaseRecordSchema } from './lease'
export type { LeaseRecord } from './lease'
