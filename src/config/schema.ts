/**
 * Zod schemas for local persistence configuration
 * Validates YAML config files and programmatic config objects
 */

import { z } from 'zod'

/**
 * Retry policy for the lease-file read race
 */
export const LeaseRetryConfigSchema = z.object({
  backoffMs: z.number().int().nonnegative().default(100),
  // Unset keeps retrying until the race resolves
  maxAttempts: z.number().int().positive().optional(),
})

export type LeaseRetryConfig = z.infer<typeof LeaseRetryConfigSchema>

/**
 * Local disk blob container
 */
export const BlobStoreConfigSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1).default('scraping-results'),
  encoding: z.enum(['utf-8', 'utf8', 'ascii', 'latin1', 'utf16le']).default('utf-8'),
  lockRetryIntervalMs: z.number().int().positive().default(100),
  leaseRetry: LeaseRetryConfigSchema.default({}),
})

export type BlobStoreConfig = z.infer<typeof BlobStoreConfigSchema>
export type BlobStoreConfigInput = z.input<typeof BlobStoreConfigSchema>

/**
 * Local disk (SQLite) queue
 */
export const QueueConfigSchema = z.object({
  name: z.string().min(1).regex(/^[\w.-]+$/, 'Queue name must be usable as a file name'),
  table: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Table must be a plain SQL identifier')
    .default('queue'),
  busyTimeoutMs: z.number().int().positive().default(30000), // 30 seconds
  cachePath: z.string().min(1).optional(),
})

export type QueueConfig = z.infer<typeof QueueConfigSchema>
export type QueueConfigInput = z.input<typeof QueueConfigSchema>

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: z.boolean().default(false),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

export const BlobStoreAdapterConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('local-disk'), localDisk: BlobStoreConfigSchema }),
  z.object({ type: z.literal('in-memory') }),
])

export type BlobStoreAdapterConfig = z.infer<typeof BlobStoreAdapterConfigSchema>

export const MessageQueueAdapterConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('local-disk'), localDisk: QueueConfigSchema }),
  z.object({ type: z.literal('in-memory') }),
])

export type MessageQueueAdapterConfig = z.infer<typeof MessageQueueAdapterConfigSchema>

/**
 * Complete persistence configuration
 */
export const PersistenceConfigSchema = z.object({
  blobStore: BlobStoreAdapterConfigSchema.optional(),
  messageQueue: MessageQueueAdapterConfigSchema.optional(),
  logging: LoggingConfigSchema.optional(),
})

export type PersistenceConfig = z.infer<typeof PersistenceConfigSchema>

/**
 * Validate and parse config with defaults
 */
export function validateConfig(config: unknown): PersistenceConfig {
  return PersistenceConfigSchema.parse(config)
}

/**
 * Validate config with detailed error messages
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: PersistenceConfig } | { success: false; errors: string[] } {
  const result = PersistenceConfigSchema.safeParse(config)

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })

  return { success: false, errors }
}
