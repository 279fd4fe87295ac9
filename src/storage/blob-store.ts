import { LOCK_SUFFIX } from './file-lock'
import { LEASE_SUFFIX } from './lease'

export const TEMP_SUFFIX = '.tmp'

/**
 * Endings of the files a store keeps beside each blob; blob names may not use them
 */
export const RESERVED_BLOB_SUFFIXES = [LEASE_SUFFIX, LOCK_SUFFIX, TEMP_SUFFIX] as const

export function assertBlobName(blob: string): void {
  const suffix = RESERVED_BLOB_SUFFIXES.find(reserved => blob.endsWith(reserved))
  if (suffix) {
    throw new Error(`Blob name "${blob}" ends in reserved suffix "${suffix}"`)
  }
}

/**
 * Options for BlobStore.uploadBlob
 */
export interface UploadBlobOptions {
  /** Replace an existing blob instead of failing with BlobAlreadyExistsError */
  overwrite: boolean
  /** Lease held by the caller; required while the blob carries an active lease */
  leaseId?: string
  /** Store only the first `length` bytes of the data */
  length?: number
}

/**
 * BlobStore - Named byte payloads with exclusive, time-bounded leases
 */
export interface BlobStore {
  /**
   * Take an exclusive lease on an existing blob for `durationSeconds` and run
   * `fn` with the lease id. The lease is released when `fn` settles.
   *
   * @throws BlobNotFoundError, LeaseAlreadyExistsError
   */
  leaseBlob<T>(blob: string, durationSeconds: number, fn: (leaseId: string) => Promise<T>): Promise<T>

  /**
   * Create or replace a blob.
   *
   * @throws BlobAlreadyExistsError, LeaseAlreadyExistsError, LeaseNotFoundError
   */
  uploadBlob(blob: string, data: Buffer | string, options: UploadBlobOptions): Promise<void>

  /**
   * Read a blob as text
   *
   * @throws BlobNotFoundError
   */
  downloadBlob(blob: string): Promise<string>

  /**
   * Remove every blob and lease in the container
   */
  deleteContainer(): Promise<void>
}
