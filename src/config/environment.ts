/**
 * Environment Configuration
 *
 * Centralizes environment variable loading and the on-disk locations derived
 * from configuration. Use this instead of reading process.env elsewhere.
 */

import { tmpdir } from 'os'
import { join, resolve } from 'path'
import type { BlobStoreConfig, PersistenceConfig, QueueConfig } from './schema'
import { PersistenceConfigSchema } from './schema'

export class ConfigurationError extends Error {
  public readonly details?: {
    key?: string
    searchedPaths?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

/**
 * Root directory for locally cached state (queue databases)
 */
export function localCachePath(): string {
  return resolve(process.env.LOCAL_PERSISTENCE_CACHE_PATH || join(tmpdir(), 'local-persistence'))
}

/**
 * Absolute directory holding a blob container
 */
export function blobWorkingPath(config: Pick<BlobStoreConfig, 'name' | 'path'>): string {
  return resolve(config.path, config.name)
}

/**
 * Absolute path of a queue's SQLite database
 */
export function queueDatabasePath(config: Pick<QueueConfig, 'name' | 'cachePath'>): string {
  return resolve(config.cachePath ?? localCachePath(), 'queues', `${config.name}.db`)
}

/**
 * Build persistence config from environment variables.
 * Only the adapters whose name variable is set are configured.
 */
export function loadPersistenceConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PersistenceConfig {
  const raw: Record<string, unknown> = {}

  if (env.BLOB_CONTAINER_NAME) {
    raw.blobStore = {
      type: 'local-disk',
      localDisk: {
        name: env.BLOB_CONTAINER_NAME,
        ...(env.BLOB_CONTAINER_PATH && { path: env.BLOB_CONTAINER_PATH }),
      },
    }
  }

  if (env.QUEUE_NAME) {
    raw.messageQueue = {
      type: 'local-disk',
      localDisk: {
        name: env.QUEUE_NAME,
        ...(env.QUEUE_BUSY_TIMEOUT_MS && { busyTimeoutMs: parseInt(env.QUEUE_BUSY_TIMEOUT_MS, 10) }),
      },
    }
  }

  if (env.LOG_LEVEL) {
    raw.logging = { level: env.LOG_LEVEL }
  }

  const result = PersistenceConfigSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(
      `Environment configuration is invalid:\n  - ${issues.join('\n  - ')}`
    )
  }
  return result.data
}
