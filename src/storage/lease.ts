import { readFile, writeFile } from 'fs/promises'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import { RaceLostError, hasErrorCode } from './errors'

export const LEASE_SUFFIX = '.lease'

/**
 * On-disk lease record, stored as JSON beside the blob
 */
export const LeaseRecordSchema = z.object({
  leaseId: z.string().min(1),
  until: z.string().datetime({ offset: true }),
})

export type LeaseRecord = z.infer<typeof LeaseRecordSchema>

export function createLeaseRecord(durationSeconds: number, now = Date.now()): LeaseRecord {
  return {
    leaseId: uuidv4(),
    until: new Date(now + durationSeconds * 1000).toISOString(),
  }
}

export function isLeaseActive(lease: LeaseRecord, now = Date.now()): boolean {
  return Date.parse(lease.until) > now
}

/**
 * Read a lease file.
 *
 * A file that vanished or holds a half-written record means another actor is
 * mid-cleanup or mid-write: reported as RaceLostError.
 */
export async function readLeaseRecord(file: string, encoding: BufferEncoding): Promise<LeaseRecord> {
  let raw: string
  try {
    raw = await readFile(file, { encoding })
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new RaceLostError(`Lease file "${file}" disappeared while reading`, error)
    }
    throw error
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new RaceLostError(`Lease file "${file}" is not valid JSON`, error)
  }

  const result = LeaseRecordSchema.safeParse(parsed)
  if (!result.success) {
    throw new RaceLostError(`Lease file "${file}" is malformed`, result.error)
  }
  return result.data
}

export async function writeLeaseRecord(
  file: string,
  lease: LeaseRecord,
  encoding: BufferEncoding
): Promise<void> {
  await writeFile(file, JSON.stringify(lease), { encoding })
}
