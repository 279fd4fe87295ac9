/**
 * Configuration module
 * Provides YAML and environment based config with Zod validation
 */

export * from './schema'
export * from './loader'
export * from './environment'
