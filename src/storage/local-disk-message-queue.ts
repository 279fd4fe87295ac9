import Database from 'better-sqlite3'
import { mkdir } from 'fs/promises'
import { dirname } from 'path'
import type { Logger } from 'pino'
import { v4 as uuidv4 } from 'uuid'
import { QueueConfigSchema, type QueueConfig, type QueueConfigInput } from '../config/schema'
import { queueDatabasePath } from '../config/environment'
import { obs } from '../observability'
import type { QueueMessage } from '../types'
import { MessageNotFoundError } from './errors'
import { exists, removeIfPresent } from './file-lock'
import { assertMaxMessages, type MessageQueue } from './message-queue'
import { conditionalWriteResult } from './optimistic'

interface CandidateRow {
  id: number
  message: string
  dequeue_count: number
}

/**
 * LocalDiskMessageQueue - MessageQueue backed by one SQLite file per queue
 *
 * Rows stay in the table until acknowledged. A claim hides a row by pushing
 * its visibility_timeout forward; the claim only applies if dequeue_count is
 * still the value seen when the row was selected, so two receivers never get
 * the same claim. WAL mode lets any number of processes read while one
 * writes; the busy timeout bounds the wait for the writer lock.
 *
 * Usage:
 *   const queue = new LocalDiskMessageQueue({ name: 'to-scrape' })
 *   await queue.initialize()
 *   await queue.sendMessage('https://example.com')
 *   for await (const message of queue.receiveMessages(10, 30)) {
 *     await queue.deleteMessage(message)
 *   }
 */
export class LocalDiskMessageQueue implements MessageQueue {
  readonly databasePath: string
  private readonly config: QueueConfig
  private readonly log: Logger
  private db: Database.Database | null = null

  constructor(config: QueueConfigInput) {
    this.config = QueueConfigSchema.parse(config)
    this.databasePath = queueDatabasePath(this.config)
    this.log = obs.createChildLogger({ component: 'LocalDiskMessageQueue', queue: this.config.name })

    this.log.info({ databasePath: this.databasePath }, `Local disk queue "${this.config.name}" is configured`)
    this.log.warn(
      'Local disk queue is configured, it is not recommended for production. ' +
        'Prefer a redundant, highly available queue service.'
    )
  }

  /**
   * Open the database, creating file and table if absent. Safe to call again
   * and from several processes at once.
   */
  async initialize(): Promise<void> {
    if (this.db) {
      return
    }

    const firstRun = !(await exists(this.databasePath))
    await mkdir(dirname(this.databasePath), { recursive: true })

    const db = new Database(this.databasePath, { timeout: this.config.busyTimeoutMs })
    db.pragma('journal_mode = WAL')
    db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.config.table} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        message TEXT NOT NULL,
        visibility_timeout INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER) * 1000),
        dequeue_count INTEGER NOT NULL DEFAULT 0,
        delete_token TEXT DEFAULT NULL
      )
    `)

    if (firstRun) {
      this.log.info(`Created local disk queue table "${this.config.table}"`)
    }
    this.db = db
  }

  private ensureInitialized(): Database.Database {
    if (!this.db) {
      throw new Error('LocalDiskMessageQueue not initialized. Call initialize() first.')
    }
    return this.db
  }

  async sendMessage(content: string): Promise<void> {
    const db = this.ensureInitialized()
    db.prepare<[string, number]>(
      `INSERT INTO ${this.config.table} (message, visibility_timeout) VALUES (?, ?)`
    ).run(content, Date.now())
  }

  /**
   * Candidates are selected when iteration starts; each one is claimed only
   * when the caller pulls it, so abandoning the iteration leaves the rest
   * visible.
   */
  async *receiveMessages(
    maxMessages: number,
    visibilityTimeoutSeconds: number
  ): AsyncGenerator<QueueMessage, void, undefined> {
    assertMaxMessages(maxMessages)
    const candidates = this.ensureInitialized()
      .prepare<[number, number], CandidateRow>(
        `SELECT id, message, dequeue_count FROM ${this.config.table}
         WHERE visibility_timeout <= ?
         LIMIT ?`
      )
      .all(Date.now(), maxMessages)

    for (const candidate of candidates) {
      const visibleAt = Date.now() + visibilityTimeoutSeconds * 1000
      const deleteToken = uuidv4()

      const { changes } = this.ensureInitialized()
        .prepare<[number, string, number, number]>(
          `UPDATE ${this.config.table}
           SET visibility_timeout = ?, delete_token = ?, dequeue_count = dequeue_count + 1
           WHERE id = ? AND dequeue_count = ?`
        )
        .run(visibleAt, deleteToken, candidate.id, candidate.dequeue_count)

      if (!conditionalWriteResult(changes).applied) {
        // Claimed or deleted by another receiver since the select
        obs.metrics.increment('queue.claim.skipped', 1, { queue: this.config.name })
        this.log.debug({ messageId: candidate.id }, 'Message claimed concurrently, skipping')
        continue
      }

      obs.metrics.increment('queue.message.claimed', 1, { queue: this.config.name })
      yield {
        messageId: String(candidate.id),
        content: candidate.message,
        deleteToken,
        visibilityTimeout: new Date(visibleAt),
        dequeueCount: candidate.dequeue_count + 1,
      }
    }
  }

  async deleteMessage(message: QueueMessage): Promise<void> {
    const db = this.ensureInitialized()
    const id = Number(message.messageId)
    if (!Number.isSafeInteger(id)) {
      throw new MessageNotFoundError(message.messageId)
    }

    const { changes } = db
      .prepare<[number, string]>(`DELETE FROM ${this.config.table} WHERE id = ? AND delete_token = ?`)
      .run(id, message.deleteToken)

    if (!conditionalWriteResult(changes).applied) {
      throw new MessageNotFoundError(message.messageId)
    }
  }

  /**
   * Number of stored messages, hidden ones included
   */
  async approximateMessageCount(): Promise<number> {
    const row = this.ensureInitialized()
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${this.config.table}`)
      .get()
    return row?.count ?? 0
  }

  /**
   * Close the connection and remove the database file with its WAL side
   * files. Not atomic.
   */
  async deleteQueue(): Promise<void> {
    await this.close()
    for (const file of [this.databasePath, `${this.databasePath}-wal`, `${this.databasePath}-shm`]) {
      await removeIfPresent(file)
    }
    this.log.info(`Deleted local disk queue "${this.config.name}"`)
  }

  async close(): Promise<void> {
    this.db?.close()
    this.db = null
  }
}
