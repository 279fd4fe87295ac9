/**
 * YAML configuration loader with type-safe parsing
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { validateConfig, validateConfigSafe, type PersistenceConfig } from './schema'
import { ConfigurationError } from './environment'

/**
 * Load and validate config from YAML file
 * @throws ConfigurationError if file doesn't exist or validation fails
 */
export function loadConfig(filePath: string): PersistenceConfig {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`, {
      searchedPaths: [absolutePath],
    })
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    const rawConfig = yaml.load(fileContent)

    return validateConfig(rawConfig)
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config from ${filePath}: ${error.message}`)
    }
    throw error
  }
}

/**
 * Load config with detailed error reporting
 * Returns success/failure with error messages
 */
export function loadConfigSafe(
  filePath: string
): { success: true; data: PersistenceConfig } | { success: false; errors: string[] } {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    return {
      success: false,
      errors: [`Config file not found: ${absolutePath}`],
    }
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    const rawConfig = yaml.load(fileContent)

    return validateConfigSafe(rawConfig)
  } catch (error) {
    if (error instanceof Error) {
      return {
        success: false,
        errors: [`Failed to parse YAML: ${error.message}`],
      }
    }
    return {
      success: false,
      errors: ['Unknown error loading config'],
    }
  }
}

export const DEFAULT_CONFIG_PATHS = [
  'local-persistence.yaml',
  'local-persistence.yml',
  'config/local-persistence.yaml',
  'config/local-persistence.yml',
]

/**
 * Try to load config from default locations, relative to `cwd`
 * Returns first valid config or undefined
 */
export function loadConfigFromDefaults(cwd: string = process.cwd()): PersistenceConfig | undefined {
  for (const candidate of DEFAULT_CONFIG_PATHS) {
    const path = resolve(cwd, candidate)
    if (!existsSync(path)) {
      continue
    }
    const result = loadConfigSafe(path)
    if (result.success) {
      return result.data
    }
    throw new ConfigurationError(`Invalid config in ${path}:\n  - ${result.errors.join('\n  - ')}`, {
      searchedPaths: [path],
    })
  }

  return undefined
}

/**
 * Load config from LOCAL_PERSISTENCE_CONFIG or default paths
 */
export function loadConfigAuto(): PersistenceConfig | undefined {
  const configPath = process.env.LOCAL_PERSISTENCE_CONFIG

  if (configPath) {
    return loadConfig(configPath)
  }

  return loadConfigFromDefaults()
}
