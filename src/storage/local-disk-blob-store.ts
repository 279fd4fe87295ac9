import type { Dirent } from 'fs'
import { link, mkdir, readFile, readdir, rename, rmdir, unlink, writeFile } from 'fs/promises'
import { dirname, join, resolve, sep } from 'path'
import type { Logger } from 'pino'
import { v4 as uuidv4 } from 'uuid'
import { BlobStoreConfigSchema, type BlobStoreConfig, type BlobStoreConfigInput } from '../config/schema'
import { blobWorkingPath } from '../config/environment'
import { obs } from '../observability'
import { TEMP_SUFFIX, assertBlobName, type BlobStore, type UploadBlobOptions } from './blob-store'
import {
  BlobAlreadyExistsError,
  BlobNotFoundError,
  LeaseAlreadyExistsError,
  LeaseNotFoundError,
  LeaseRetryExhaustedError,
  RaceLostError,
  hasErrorCode,
} from './errors'
import { exists, removeIfPresent, withFileLock } from './file-lock'
import {
  LEASE_SUFFIX,
  createLeaseRecord,
  isLeaseActive,
  readLeaseRecord,
  writeLeaseRecord,
  type LeaseRecord,
} from './lease'
import { retryOnRace } from './optimistic'

/**
 * LocalDiskBlobStore - BlobStore backed by a directory tree
 *
 * Each blob is one file under the container directory; an active lease is a
 * JSON sibling `<blob>.lease`. Lease creation is serialized across processes
 * by a `<blob>.lease.lock` marker (see withFileLock). Lease expiry is checked
 * lazily by whoever touches the blob next.
 *
 * Usage:
 *   const store = new LocalDiskBlobStore({ name: 'results', path: './data' })
 *   await store.leaseBlob('page.json', 30, async leaseId => {
 *     await store.uploadBlob('page.json', body, { overwrite: true, leaseId })
 *   })
 */
export class LocalDiskBlobStore implements BlobStore {
  readonly workingPath: string
  private readonly config: BlobStoreConfig
  private readonly log: Logger

  constructor(config: BlobStoreConfigInput) {
    this.config = BlobStoreConfigSchema.parse(config)
    this.workingPath = blobWorkingPath(this.config)
    this.log = obs.createChildLogger({ component: 'LocalDiskBlobStore', container: this.config.name })

    this.log.info(
      { workingPath: this.workingPath },
      `Local disk blob store "${this.config.name}" is configured at "${this.workingPath}"`
    )
    this.log.warn(
      'Local disk blob store is configured, it is not recommended for production. ' +
        'Prefer a redundant, highly available blob service.'
    )
  }

  async leaseBlob<T>(
    blob: string,
    durationSeconds: number,
    fn: (leaseId: string) => Promise<T>
  ): Promise<T> {
    if (!(await exists(this.blobPath(blob)))) {
      throw new BlobNotFoundError(blob)
    }

    const leaseFile = this.leasePath(blob)
    const lease = await retryOnRace(
      () =>
        withFileLock(
          leaseFile,
          async () => {
            if (await exists(leaseFile)) {
              const previous = await readLeaseRecord(leaseFile, this.config.encoding)
              if (isLeaseActive(previous)) {
                throw new LeaseAlreadyExistsError(`Lease for blob "${blob}" already exists`, blob)
              }
            }

            const next = createLeaseRecord(durationSeconds)
            await writeLeaseRecord(leaseFile, next, this.config.encoding)
            return next
          },
          { retryIntervalMs: this.config.lockRetryIntervalMs }
        ),
      this.config.leaseRetry,
      this.raceHooks(blob)
    )

    let result: T
    try {
      result = await fn(lease.leaseId)
    } catch (error) {
      await this.releaseLease(leaseFile, lease).catch((releaseError: unknown) => {
        this.log.error({ blob, err: releaseError }, 'Failed to release lease after the lease scope failed')
      })
      throw error
    }
    await this.releaseLease(leaseFile, lease)
    return result
  }

  async uploadBlob(blob: string, data: Buffer | string, options: UploadBlobOptions): Promise<void> {
    const blobPath = this.blobPath(blob)
    const payload = this.toPayload(data, options.length)

    if (!options.overwrite && (await exists(blobPath))) {
      throw new BlobAlreadyExistsError(blob)
    }

    const leaseFile = this.leasePath(blob)
    await retryOnRace(
      () => this.validateLease(blob, leaseFile, options.leaseId),
      this.config.leaseRetry,
      this.raceHooks(blob)
    )

    await mkdir(dirname(blobPath), { recursive: true })
    await this.install(blob, blobPath, payload, options.overwrite)
  }

  async downloadBlob(blob: string): Promise<string> {
    try {
      return await readFile(this.blobPath(blob), { encoding: this.config.encoding })
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new BlobNotFoundError(blob)
      }
      throw error
    }
  }

  async deleteContainer(): Promise<void> {
    if (!(await exists(this.workingPath))) {
      return
    }
    await removeTree(this.workingPath)
    this.log.info(`Deleted local disk blob store "${this.config.name}"`)
  }

  /**
   * Check the caller's lease against the lease file, reclaiming it if expired
   */
  private async validateLease(blob: string, leaseFile: string, leaseId?: string): Promise<void> {
    if (!(await exists(leaseFile))) {
      if (leaseId) {
        throw new LeaseNotFoundError(blob)
      }
      return
    }

    const lease = await readLeaseRecord(leaseFile, this.config.encoding)

    if (!isLeaseActive(lease)) {
      await this.reclaimExpiredLease(leaseFile, lease)
      return
    }

    if (!leaseId) {
      throw new LeaseAlreadyExistsError(
        'Lease ID is required to overwrite a blob with an existing lease',
        blob
      )
    }
    if (lease.leaseId !== leaseId) {
      throw new LeaseAlreadyExistsError('Provided lease ID does not match the existing one', blob)
    }
  }

  /**
   * Remove an expired lease, unless a new lease replaced it meanwhile
   */
  private async reclaimExpiredLease(leaseFile: string, expired: LeaseRecord): Promise<void> {
    await withFileLock(
      leaseFile,
      async () => {
        const current = await this.readLeaseIfPresent(leaseFile)
        if (current && current.leaseId === expired.leaseId) {
          await removeIfPresent(leaseFile)
        }
      },
      { retryIntervalMs: this.config.lockRetryIntervalMs }
    )
  }

  /**
   * Drop the lease file at the end of a lease scope, leaving alone a lease
   * someone else took after ours expired
   */
  private async releaseLease(leaseFile: string, lease: LeaseRecord): Promise<void> {
    await withFileLock(
      leaseFile,
      async () => {
        let current: LeaseRecord | null
        try {
          current = await this.readLeaseIfPresent(leaseFile)
        } catch (error) {
          if (!(error instanceof RaceLostError)) {
            throw error
          }
          // Unreadable leftovers are not anyone's lease
          await removeIfPresent(leaseFile)
          return
        }
        if (current && current.leaseId === lease.leaseId) {
          await removeIfPresent(leaseFile)
        }
      },
      { retryIntervalMs: this.config.lockRetryIntervalMs }
    )
  }

  private async readLeaseIfPresent(leaseFile: string): Promise<LeaseRecord | null> {
    if (!(await exists(leaseFile))) {
      return null
    }
    try {
      return await readLeaseRecord(leaseFile, this.config.encoding)
    } catch (error) {
      if (error instanceof RaceLostError && !(await exists(leaseFile))) {
        return null
      }
      throw error
    }
  }

  /**
   * Write to a temporary sibling and move it into place, so readers never
   * observe a partial payload. Without overwrite, the hard link fails if the
   * blob appeared meanwhile.
   */
  private async install(blob: string, blobPath: string, payload: Buffer, overwrite: boolean): Promise<void> {
    const tempPath = `${blobPath}.${uuidv4()}${TEMP_SUFFIX}`
    await writeFile(tempPath, payload)

    try {
      if (overwrite) {
        await rename(tempPath, blobPath)
        return
      }
      try {
        await link(tempPath, blobPath)
      } catch (error) {
        if (hasErrorCode(error, 'EEXIST')) {
          throw new BlobAlreadyExistsError(blob)
        }
        throw error
      }
    } finally {
      await removeIfPresent(tempPath)
    }
  }

  private toPayload(data: Buffer | string, length?: number): Buffer {
    const buffer = typeof data === 'string' ? Buffer.from(data, this.config.encoding) : data
    if (length === undefined) {
      return buffer
    }
    if (!Number.isInteger(length) || length < 0 || length > buffer.length) {
      throw new RangeError(`Length ${length} is outside the ${buffer.length} bytes of data`)
    }
    return buffer.subarray(0, length)
  }

  private raceHooks(blob: string) {
    return {
      onRaceLost: (error: RaceLostError, attempt: number) => {
        obs.metrics.increment('blob.lease.retry', 1, { container: this.config.name })
        this.log.debug({ blob, attempt, reason: error.message }, 'Lease file changed concurrently, retrying')
      },
      onExhausted: (attempts: number) => new LeaseRetryExhaustedError(blob, attempts),
    }
  }

  private blobPath(blob: string): string {
    assertBlobName(blob)
    const path = resolve(this.workingPath, blob)
    if (!path.startsWith(this.workingPath + sep)) {
      throw new Error(`Blob name "${blob}" resolves outside of container "${this.config.name}"`)
    }
    return path
  }

  private leasePath(blob: string): string {
    return `${this.blobPath(blob)}${LEASE_SUFFIX}`
  }
}

/**
 * Delete a directory tree deepest-first. Not atomic: a crash leaves it
 * partially emptied. Entries removed concurrently by others are skipped.
 */
async function removeTree(directory: string): Promise<void> {
  let entries: Dirent[]
  try {
    entries = await readdir(directory, { withFileTypes: true })
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return
    throw error
  }

  for (const entry of entries) {
    const entryPath = join(directory, entry.name)
    if (entry.isDirectory()) {
      await removeTree(entryPath)
    } else {
      try {
        await unlink(entryPath)
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) throw error
      }
    }
  }

  try {
    await rmdir(directory)
  } catch (error) {
    if (!hasErrorCode(error, 'ENOENT')) throw error
  }
}
