import pino from 'pino'
import type { Logger, LoggerOptions } from 'pino'
import type { LoggingConfig } from '../config/schema'

/**
 * Observability - Structured logging and counters
 *
 * - Structured JSON logging via Pino (pino-pretty in development)
 * - Child loggers carrying the store or queue name
 * - In-process counters for lease retries and queue claims
 */

/**
 * Metrics interface - simple counters
 */
export interface Metrics {
  increment(name: string, value?: number, labels?: Record<string, string>): void
}

/**
 * Simple in-memory metrics
 */
export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + value)
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels) return name
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',')
    return `${name}{${labelStr}}`
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) || 0
  }

  reset(): void {
    this.counters.clear()
  }
}

/**
 * Pino options for a logging config; `pretty` routes output through pino-pretty
 */
export function createLoggerOptions(options?: { level?: string; pretty?: boolean }): LoggerOptions {
  return {
    level: options?.level || process.env.LOG_LEVEL || 'info',
    ...(options?.pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  }
}

/**
 * Observability singleton - global logger and metrics
 */
export class Observability {
  private static instance: Observability

  public logger: Logger
  public metrics: InMemoryMetrics
  private pretty: boolean

  private constructor(options?: Partial<LoggingConfig>) {
    this.pretty = options?.pretty ?? false
    this.logger = pino(createLoggerOptions(options))
    this.metrics = new InMemoryMetrics()
  }

  static getInstance(options?: Partial<LoggingConfig>): Observability {
    if (!Observability.instance) {
      Observability.instance = new Observability(options)
    }
    return Observability.instance
  }

  get isPretty(): boolean {
    return this.pretty
  }

  /**
   * Apply a logging config after startup. Switching `pretty` replaces the
   * logger, so child loggers created earlier keep the old output.
   */
  configure(config: Partial<LoggingConfig>): void {
    if (config.pretty !== undefined && config.pretty !== this.pretty) {
      this.pretty = config.pretty
      this.logger = pino(createLoggerOptions({ level: config.level ?? this.logger.level, pretty: config.pretty }))
      return
    }
    if (config.level) {
      this.logger.level = config.level
    }
  }

  /**
   * Create a child logger bound to a component and its context
   */
  createChildLogger(context: Record<string, unknown>): Logger {
    return this.logger.child(context)
  }

  getMetrics(): InMemoryMetrics {
    return this.metrics
  }
}

export const obs = Observability.getInstance()
