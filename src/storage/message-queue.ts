import type { QueueMessage } from '../types'

/**
 * MessageQueue - At-least-once delivery with visibility timeouts
 */
export interface MessageQueue {
  /**
   * Enqueue a message, immediately visible to receivers
   */
  sendMessage(content: string): Promise<void>

  /**
   * Claim up to `maxMessages` visible messages, hiding each from other
   * receivers for `visibilityTimeoutSeconds`. Messages claimed by a
   * concurrent receiver are skipped.
   */
  receiveMessages(maxMessages: number, visibilityTimeoutSeconds: number): AsyncIterable<QueueMessage>

  /**
   * Acknowledge a message using the delete token of its latest claim
   *
   * @throws MessageNotFoundError when already deleted or reclaimed by someone else
   */
  deleteMessage(message: QueueMessage): Promise<void>

  /**
   * Remove the queue and everything in it
   */
  deleteQueue(): Promise<void>
}

export function assertMaxMessages(maxMessages: number): void {
  if (!Number.isInteger(maxMessages) || maxMessages < 1) {
    throw new RangeError(`maxMessages must be a positive integer, got ${maxMessages}`)
  }
}
