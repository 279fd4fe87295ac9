// Core exports
export type { QueueMessage } from './types'
export * from './storage'
export * from './observability'

// Configuration exports
export * from './config'
