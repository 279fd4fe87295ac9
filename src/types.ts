/**
 * Snapshot of a queue message at the time it was claimed.
 * Produced by MessageQueue.receiveMessages, consumed by deleteMessage.
 */
export interface QueueMessage {
  messageId: string
  content: string
  /** Opaque credential of this claim; required to acknowledge */
  deleteToken: string
  /** When the message becomes visible to other receivers again */
  visibilityTimeout: Date
  /** Number of times the message has been claimed, this claim included */
  dequeueCount: number
}
