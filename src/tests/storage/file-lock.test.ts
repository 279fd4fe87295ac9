import { describe, it, expect, afterEach } from 'vitest'
import { unlink, writeFile } from 'fs/promises'
import { join } from 'path'
import { exists, lockPathFor, removeIfPresent, withFileLock } from '../../storage/file-lock'
import { createTempDir, delay, removeTempDirs } from '../utils/temp-dir-utils'

describe('withFileLock', () => {
  afterEach(async () => {
    await removeTempDirs()
  })

  it('should hold the marker only while the critical section runs', async () => {
    const dir = await createTempDir()
    const resource = join(dir, 'doc.txt.lease')

    const heldDuring = await withFileLock(resource, async () => exists(`${resource}.lock`))

    expect(heldDuring).toBe(true)
    expect(await exists(`${resource}.lock`)).toBe(false)
  })

  it('should create missing parent directories for the marker', async () => {
    const dir = await createTempDir()
    const resource = join(dir, 'a', 'b', 'doc.txt')

    await withFileLock(resource, async () => undefined)

    expect(await exists(join(dir, 'a', 'b'))).toBe(true)
  })

  it('should release the marker when the critical section throws', async () => {
    const dir = await createTempDir()
    const resource = join(dir, 'doc.txt')

    await expect(
      withFileLock(resource, async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    expect(await exists(lockPathFor(resource))).toBe(false)
  })

  it('should tolerate the marker being removed by someone else', async () => {
    const dir = await createTempDir()
    const resource = join(dir, 'doc.txt')

    await expect(
      withFileLock(resource, async () => {
        await unlink(lockPathFor(resource))
        return 'done'
      })
    ).resolves.toBe('done')
  })

  it('should never run two critical sections at once', async () => {
    const dir = await createTempDir()
    const resource = join(dir, 'counter')
    let inside = 0
    let maxInside = 0
    const order: number[] = []

    await Promise.all(
      [1, 2, 3, 4].map(n =>
        withFileLock(
          resource,
          async () => {
            inside++
            maxInside = Math.max(maxInside, inside)
            await delay(15)
            order.push(n)
            inside--
          },
          { retryIntervalMs: 5 }
        )
      )
    )

    expect(maxInside).toBe(1)
    expect([...order].sort()).toEqual([1, 2, 3, 4])
  })

  it('should wait for a marker held by another process', async () => {
    const dir = await createTempDir()
    const resource = join(dir, 'doc.txt')
    await writeFile(lockPathFor(resource), '')
    let entered = false

    const pending = withFileLock(
      resource,
      async () => {
        entered = true
      },
      { retryIntervalMs: 10 }
    )
    await delay(60)
    expect(entered).toBe(false)

    await unlink(lockPathFor(resource))
    await pending
    expect(entered).toBe(true)
  })
})

describe('removeIfPresent', () => {
  afterEach(async () => {
    await removeTempDirs()
  })

  it('should report whether a file was removed', async () => {
    const dir = await createTempDir()
    const file = join(dir, 'x')
    await writeFile(file, 'x')

    expect(await removeIfPresent(file)).toBe(true)
    expect(await removeIfPresent(file)).toBe(false)
  })
})
