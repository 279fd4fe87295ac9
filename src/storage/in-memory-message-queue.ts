import { v4 as uuidv4 } from 'uuid'
import type { QueueMessage } from '../types'
import { MessageNotFoundError } from './errors'
import { assertMaxMessages, type MessageQueue } from './message-queue'

interface QueuedMessage {
  id: number
  content: string
  visibleAt: number
  dequeueCount: number
  deleteToken: string | null
}

/**
 * InMemoryMessageQueue - Single-process MessageQueue for tests
 *
 * Mirrors LocalDiskMessageQueue: claims bump dequeueCount and hand out a
 * fresh delete token, unacknowledged messages reappear after their
 * visibility timeout.
 */
export class InMemoryMessageQueue implements MessageQueue {
  private messages = new Map<number, QueuedMessage>()
  private nextId = 1

  constructor() {
    if (process.env.NODE_ENV === 'production') {
      console.warn(
        '⚠️  [InMemoryMessageQueue] Using in-memory adapter in production. ' +
        'Messages are lost on restart and invisible to other processes. ' +
        'Use LocalDiskMessageQueue instead.'
      )
    }
  }

  async sendMessage(content: string): Promise<void> {
    const id = this.nextId++
    this.messages.set(id, {
      id,
      content,
      visibleAt: Date.now(),
      dequeueCount: 0,
      deleteToken: null,
    })
  }

  async *receiveMessages(
    maxMessages: number,
    visibilityTimeoutSeconds: number
  ): AsyncGenerator<QueueMessage, void, undefined> {
    assertMaxMessages(maxMessages)
    const now = Date.now()
    const candidates = Array.from(this.messages.values())
      .filter(item => item.visibleAt <= now)
      .slice(0, maxMessages)
      .map(item => ({ id: item.id, dequeueCount: item.dequeueCount }))

    for (const candidate of candidates) {
      const item = this.messages.get(candidate.id)
      // Deleted or claimed by another receiver since selection
      if (!item || item.dequeueCount !== candidate.dequeueCount) {
        continue
      }

      item.visibleAt = Date.now() + visibilityTimeoutSeconds * 1000
      item.deleteToken = uuidv4()
      item.dequeueCount++

      yield {
        messageId: String(item.id),
        content: item.content,
        deleteToken: item.deleteToken,
        visibilityTimeout: new Date(item.visibleAt),
        dequeueCount: item.dequeueCount,
      }
    }
  }

  async deleteMessage(message: QueueMessage): Promise<void> {
    const item = this.messages.get(Number(message.messageId))
    if (!item || item.deleteToken !== message.deleteToken) {
      throw new MessageNotFoundError(message.messageId)
    }
    this.messages.delete(item.id)
  }

  async deleteQueue(): Promise<void> {
    this.messages.clear()
  }

  // Helper for testing
  size(): number {
    return this.messages.size
  }
}
