import { RaceLostError } from './errors'

/**
 * Optimistic concurrency helpers
 *
 * An attempt snapshots some shared state, then performs a mutation that is
 * only valid if the snapshot still holds. When it does not, the attempt
 * throws RaceLostError and the caller either retries (lease files) or skips
 * (queue claims, see LocalDiskMessageQueue).
 */

export interface RaceRetryPolicy {
  /** Delay before the next attempt */
  backoffMs: number
  /** Total attempts allowed, unbounded when undefined */
  maxAttempts?: number
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms))

/**
 * Run `attempt` until it completes without losing a race.
 *
 * Any error other than RaceLostError propagates immediately. When the policy
 * bound is reached, `onExhausted` builds the error to throw.
 */
export async function retryOnRace<T>(
  attempt: (attemptNumber: number) => Promise<T>,
  policy: RaceRetryPolicy,
  hooks: {
    onRaceLost?: (error: RaceLostError, attemptNumber: number) => void
    onExhausted: (attempts: number) => Error
  }
): Promise<T> {
  for (let attemptNumber = 1; ; attemptNumber++) {
    try {
      return await attempt(attemptNumber)
    } catch (error) {
      if (!(error instanceof RaceLostError)) {
        throw error
      }
      hooks.onRaceLost?.(error, attemptNumber)
      if (policy.maxAttempts !== undefined && attemptNumber >= policy.maxAttempts) {
        throw hooks.onExhausted(attemptNumber)
      }
      await sleep(policy.backoffMs)
    }
  }
}

/**
 * Outcome of a conditional write keyed on a snapshotted version
 */
export type ConditionalWriteResult = { applied: true } | { applied: false; reason: 'race-lost' }

/**
 * Interpret an affected-row count from a conditional UPDATE/DELETE
 */
export function conditionalWriteResult(changes: number): ConditionalWriteResult {
  return changes > 0 ? { applied: true } : { applied: false, reason: 'race-lost' }
}
