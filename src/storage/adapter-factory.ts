/**
 * Adapter Factory - Configuration-based adapter instantiation
 *
 * Lets callers pick local-disk or in-memory persistence from configuration
 * while depending only on the BlobStore and MessageQueue interfaces.
 */

import type { BlobStoreAdapterConfig, MessageQueueAdapterConfig, PersistenceConfig } from '../config/schema'
import { obs } from '../observability'
import type { BlobStore } from './blob-store'
import type { MessageQueue } from './message-queue'
import { InMemoryBlobStore } from './in-memory-blob-store'
import { InMemoryMessageQueue } from './in-memory-message-queue'
import { LocalDiskBlobStore } from './local-disk-blob-store'
import { LocalDiskMessageQueue } from './local-disk-message-queue'

export interface PersistenceAdapters {
  blobStore?: BlobStore
  messageQueue?: MessageQueue
}

/**
 * Factory for creating adapters from configuration
 */
export class AdapterFactory {
  /**
   * Create BlobStore adapter, in-memory when unconfigured
   */
  static createBlobStore(config?: BlobStoreAdapterConfig): BlobStore {
    if (!config || config.type === 'in-memory') {
      return new InMemoryBlobStore()
    }
    return new LocalDiskBlobStore(config.localDisk)
  }

  /**
   * Create MessageQueue adapter, in-memory when unconfigured.
   * Local disk queues are initialized before they are returned.
   */
  static async createMessageQueue(config?: MessageQueueAdapterConfig): Promise<MessageQueue> {
    if (!config || config.type === 'in-memory') {
      return new InMemoryMessageQueue()
    }
    const queue = new LocalDiskMessageQueue(config.localDisk)
    await queue.initialize()
    return queue
  }

  /**
   * Create every configured adapter; sections left out stay undefined
   */
  static async createAll(config: PersistenceConfig): Promise<PersistenceAdapters> {
    if (config.logging) {
      obs.configure(config.logging)
    }
    return {
      blobStore: config.blobStore ? this.createBlobStore(config.blobStore) : undefined,
      messageQueue: config.messageQueue ? await this.createMessageQueue(config.messageQueue) : undefined,
    }
  }
}
