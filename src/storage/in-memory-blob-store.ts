import { v4 as uuidv4 } from 'uuid'
import { assertBlobName, type BlobStore, type UploadBlobOptions } from './blob-store'
import {
  BlobAlreadyExistsError,
  BlobNotFoundError,
  LeaseAlreadyExistsError,
  LeaseNotFoundError,
} from './errors'

interface MemoryLease {
  leaseId: string
  until: number
}

/**
 * InMemoryBlobStore - Single-process BlobStore for tests and local tooling
 *
 * Same lease rules as LocalDiskBlobStore; the event loop stands in for the
 * file lock.
 */
export class InMemoryBlobStore implements BlobStore {
  private blobs = new Map<string, Buffer>()
  private leases = new Map<string, MemoryLease>()

  constructor(private encoding: BufferEncoding = 'utf-8') {
    if (process.env.NODE_ENV === 'production') {
      console.warn(
        '⚠️  [InMemoryBlobStore] Using in-memory adapter in production. ' +
        'Blobs are lost on restart and invisible to other processes. ' +
        'Use LocalDiskBlobStore instead.'
      )
    }
  }

  async leaseBlob<T>(blob: string, durationSeconds: number, fn: (leaseId: string) => Promise<T>): Promise<T> {
    assertBlobName(blob)
    if (!this.blobs.has(blob)) {
      throw new BlobNotFoundError(blob)
    }

    const existing = this.activeLease(blob)
    if (existing) {
      throw new LeaseAlreadyExistsError(`Lease for blob "${blob}" already exists`, blob)
    }

    const lease: MemoryLease = { leaseId: uuidv4(), until: Date.now() + durationSeconds * 1000 }
    this.leases.set(blob, lease)

    try {
      return await fn(lease.leaseId)
    } finally {
      if (this.leases.get(blob)?.leaseId === lease.leaseId) {
        this.leases.delete(blob)
      }
    }
  }

  async uploadBlob(blob: string, data: Buffer | string, options: UploadBlobOptions): Promise<void> {
    assertBlobName(blob)
    if (this.blobs.has(blob) && !options.overwrite) {
      throw new BlobAlreadyExistsError(blob)
    }

    const lease = this.activeLease(blob)
    if (!lease) {
      if (options.leaseId) {
        throw new LeaseNotFoundError(blob)
      }
    } else if (!options.leaseId) {
      throw new LeaseAlreadyExistsError('Lease ID is required to overwrite a blob with an existing lease', blob)
    } else if (lease.leaseId !== options.leaseId) {
      throw new LeaseAlreadyExistsError('Provided lease ID does not match the existing one', blob)
    }

    const buffer = typeof data === 'string' ? Buffer.from(data, this.encoding) : Buffer.from(data)
    if (options.length !== undefined && (options.length < 0 || options.length > buffer.length)) {
      throw new RangeError(`Length ${options.length} is outside the ${buffer.length} bytes of data`)
    }
    this.blobs.set(blob, options.length === undefined ? buffer : buffer.subarray(0, options.length))
  }

  async downloadBlob(blob: string): Promise<string> {
    assertBlobName(blob)
    const data = this.blobs.get(blob)
    if (!data) {
      throw new BlobNotFoundError(blob)
    }
    return data.toString(this.encoding)
  }

  async deleteContainer(): Promise<void> {
    this.blobs.clear()
    this.leases.clear()
  }

  /**
   * Current unexpired lease; expired ones are dropped on sight
   */
  private activeLease(blob: string): MemoryLease | undefined {
    const lease = this.leases.get(blob)
    if (lease && lease.until <= Date.now()) {
      this.leases.delete(blob)
      return undefined
    }
    return lease
  }
}
