import { mkdir, open, stat, unlink } from 'fs/promises'
import { dirname, resolve } from 'path'
import { hasErrorCode } from './errors'
import { sleep } from './optimistic'

export const LOCK_SUFFIX = '.lock'

export interface FileLockOptions {
  /** Poll interval while another holder owns the marker */
  retryIntervalMs?: number
}

/**
 * Cross-process mutual exclusion through an exclusively created marker file.
 *
 * Waits for `<path>.lock` to disappear, creates it with `wx` (create-or-fail),
 * runs `fn`, and removes the marker on every exit path. Losing the
 * exclusive create to another process sends the caller back to polling.
 * No fairness between waiters.
 */
export async function withFileLock<T>(
  path: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  const retryIntervalMs = options.retryIntervalMs ?? 100
  const lockFile = lockPathFor(path)

  await mkdir(dirname(lockFile), { recursive: true })

  for (;;) {
    while (await exists(lockFile)) {
      await sleep(retryIntervalMs)
    }
    if (await tryCreateMarker(lockFile)) {
      break
    }
  }

  try {
    return await fn()
  } finally {
    await removeIfPresent(lockFile)
  }
}

export function lockPathFor(path: string): string {
  return `${resolve(path)}${LOCK_SUFFIX}`
}

/**
 * Delete a file, tolerating that another actor already removed it
 */
export async function removeIfPresent(file: string): Promise<boolean> {
  try {
    await unlink(file)
    return true
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return false
    }
    throw error
  }
}

export async function exists(file: string): Promise<boolean> {
  try {
    await stat(file)
    return true
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return false
    }
    throw error
  }
}

async function tryCreateMarker(lockFile: string): Promise<boolean> {
  try {
    const handle = await open(lockFile, 'wx')
    await handle.close()
    return true
  } catch (error) {
    if (hasErrorCode(error, 'EEXIST')) {
      return false
    }
    throw error
  }
}
