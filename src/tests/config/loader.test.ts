import { describe, it, expect, afterEach } from 'vitest'
import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import { loadConfig, loadConfigFromDefaults, loadConfigSafe } from '../../config/loader'
import { ConfigurationError } from '../../config/environment'
import { createTempDir, removeTempDirs } from '../utils/temp-dir-utils'

const YAML_CONFIG = `
blobStore:
  type: local-disk
  localDisk:
    name: results
    path: ./data
    leaseRetry:
      maxAttempts: 10
messageQueue:
  type: local-disk
  localDisk:
    name: to-scrape
    busyTimeoutMs: 5000
logging:
  level: debug
`

describe('Config loader', () => {
  afterEach(async () => {
    await removeTempDirs()
  })

  it('should load and validate a YAML file', async () => {
    const file = join(await createTempDir(), 'local-persistence.yaml')
    await writeFile(file, YAML_CONFIG)

    const config = loadConfig(file)

    expect(config.blobStore).toEqual({
      type: 'local-disk',
      localDisk: {
        name: 'results',
        path: './data',
        encoding: 'utf-8',
        lockRetryIntervalMs: 100,
        leaseRetry: { backoffMs: 100, maxAttempts: 10 },
      },
    })
    expect(config.messageQueue).toEqual({
      type: 'local-disk',
      localDisk: { name: 'to-scrape', table: 'queue', busyTimeoutMs: 5000 },
    })
    expect(config.logging).toEqual({ level: 'debug', pretty: false })
  })

  it('should throw ConfigurationError for a missing file', async () => {
    const file = join(await createTempDir(), 'nope.yaml')

    expect(() => loadConfig(file)).toThrow(ConfigurationError)
  })

  it('should throw ConfigurationError for an invalid file', async () => {
    const file = join(await createTempDir(), 'bad.yaml')
    await writeFile(file, 'blobStore:\n  type: s3\n')

    expect(() => loadConfig(file)).toThrow(ConfigurationError)
  })

  it('should report YAML syntax errors without throwing', async () => {
    const file = join(await createTempDir(), 'broken.yaml')
    await writeFile(file, 'blobStore: [unclosed\n')

    const result = loadConfigSafe(file)

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.errors[0]).toMatch(/^Failed to parse YAML: /)
    }
  })

  it('should find config in the default locations', async () => {
    const cwd = await createTempDir()
    await mkdir(join(cwd, 'config'))
    await writeFile(join(cwd, 'config', 'local-persistence.yml'), 'blobStore:\n  type: in-memory\n')

    expect(loadConfigFromDefaults(cwd)).toEqual({ blobStore: { type: 'in-memory' } })
  })

  it('should return undefined when no default config exists', async () => {
    expect(loadConfigFromDefaults(await createTempDir())).toBeUndefined()
  })
})
