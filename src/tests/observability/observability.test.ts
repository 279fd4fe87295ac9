import { describe, it, expect, beforeEach } from 'vitest'
import { InMemoryMetrics, Observability, createLoggerOptions, obs } from '../../observability'

describe('Observability', () => {
  it('should be a singleton', () => {
    expect(Observability.getInstance()).toBe(obs)
  })

  it('should create child loggers carrying their context', () => {
    const child = obs.createChildLogger({ component: 'LocalDiskBlobStore', container: 'results' })

    expect(child.bindings()).toMatchObject({ component: 'LocalDiskBlobStore', container: 'results' })
  })

  it('should change the level through configure', () => {
    const original = obs.logger.level

    obs.configure({ level: 'error' })

    expect(obs.logger.level).toBe('error')
    obs.logger.level = original
  })

  it('should build pino-pretty options only when pretty is set', () => {
    expect(createLoggerOptions({ level: 'debug' })).toEqual({ level: 'debug' })
    expect(createLoggerOptions({ level: 'debug', pretty: true })).toEqual({
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' },
      },
    })
  })

  it('should replace the logger when pretty output is switched on', () => {
    const plain = obs.logger
    const original = plain.level

    obs.configure({ level: 'warn', pretty: true })

    expect(obs.isPretty).toBe(true)
    expect(obs.logger).not.toBe(plain)
    expect(obs.logger.level).toBe('warn')

    obs.configure({ pretty: false })
    expect(obs.isPretty).toBe(false)
    obs.logger.level = original
  })

  it('should keep the logger when pretty is unchanged', () => {
    const before = obs.logger
    const original = before.level

    obs.configure({ level: 'error', pretty: false })

    expect(obs.logger).toBe(before)
    obs.logger.level = original
  })
})

describe('InMemoryMetrics', () => {
  let metrics: InMemoryMetrics

  beforeEach(() => {
    metrics = new InMemoryMetrics()
  })

  it('should count per label set', () => {
    metrics.increment('queue.claim.skipped', 1, { queue: 'a' })
    metrics.increment('queue.claim.skipped', 2, { queue: 'a' })
    metrics.increment('queue.claim.skipped', 1, { queue: 'b' })

    expect(metrics.getCounter('queue.claim.skipped', { queue: 'a' })).toBe(3)
    expect(metrics.getCounter('queue.claim.skipped', { queue: 'b' })).toBe(1)
    expect(metrics.getCounter('queue.claim.skipped')).toBe(0)
  })

  it('should clear counters on reset', () => {
    metrics.increment('blob.lease.retry', 2, { container: 'results' })

    metrics.reset()

    expect(metrics.getCounter('blob.lease.retry', { container: 'results' })).toBe(0)
  })
})
