import { describe, it, expect, afterEach } from 'vitest'
import { join } from 'path'
import { AdapterFactory } from '../../storage/adapter-factory'
import { InMemoryBlobStore } from '../../storage/in-memory-blob-store'
import { InMemoryMessageQueue } from '../../storage/in-memory-message-queue'
import { LocalDiskBlobStore } from '../../storage/local-disk-blob-store'
import { LocalDiskMessageQueue } from '../../storage/local-disk-message-queue'
import { validateConfig } from '../../config/schema'
import { obs } from '../../observability'
import { collect } from './message-queue-tests'
import { createTempDir, removeTempDirs } from '../utils/temp-dir-utils'

describe('AdapterFactory', () => {
  const originalLevel = obs.logger.level

  afterEach(async () => {
    obs.configure({ pretty: false })
    obs.logger.level = originalLevel
    await removeTempDirs()
  })

  it('should default to in-memory adapters', async () => {
    expect(AdapterFactory.createBlobStore()).toBeInstanceOf(InMemoryBlobStore)
    expect(await AdapterFactory.createMessageQueue()).toBeInstanceOf(InMemoryMessageQueue)
  })

  it('should create a local disk blob store from config', async () => {
    const root = await createTempDir()
    const config = validateConfig({
      blobStore: { type: 'local-disk', localDisk: { name: 'results', path: root } },
    })

    const store = AdapterFactory.createBlobStore(config.blobStore)

    expect(store).toBeInstanceOf(LocalDiskBlobStore)
    await store.uploadBlob('a.txt', 'a', { overwrite: false })
    expect(await store.downloadBlob('a.txt')).toBe('a')
  })

  it('should return local disk queues ready to use', async () => {
    const cachePath = await createTempDir()
    const config = validateConfig({
      messageQueue: { type: 'local-disk', localDisk: { name: 'factory', cachePath } },
    })

    const queue = await AdapterFactory.createMessageQueue(config.messageQueue)

    expect(queue).toBeInstanceOf(LocalDiskMessageQueue)
    await queue.sendMessage('ready')
    expect((await collect(queue.receiveMessages(1, 30))).map(m => m.content)).toEqual(['ready'])
    await queue.deleteQueue()
  })

  it('should create only the configured adapters and apply logging', async () => {
    const root = await createTempDir()
    const config = validateConfig({
      blobStore: { type: 'local-disk', localDisk: { name: 'results', path: root } },
      logging: { level: 'warn' },
    })

    const adapters = await AdapterFactory.createAll(config)

    if (!(adapters.blobStore instanceof LocalDiskBlobStore)) {
      throw new Error('expected a LocalDiskBlobStore')
    }
    expect(adapters.blobStore.workingPath).toBe(join(root, 'results'))
    expect(adapters.messageQueue).toBeUndefined()
    expect(obs.logger.level).toBe('warn')
  })

  it('should switch to pretty output when the logging config asks for it', async () => {
    const config = validateConfig({ logging: { level: 'info', pretty: true } })

    await AdapterFactory.createAll(config)

    expect(obs.isPretty).toBe(true)
    expect(obs.logger.level).toBe('info')
  })
})
