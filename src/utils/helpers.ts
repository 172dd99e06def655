/**
 * General utility helpers for storyloom
 */

import { randomUUID } from 'crypto'

/**
 * Sleep for a given number of milliseconds
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Generate a unique identifier using crypto.randomUUID()
 * @param prefix - Optional prefix for the ID
 */
export function generateId(prefix = ''): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}

/** Node errno check without casting every caught error by hand */
export function hasErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

/** Options for withRetry */
export interface RetryOptions {
  /** Number of retries after the first attempt */
  maxRetries: number
  /** Base delay in milliseconds (doubles each retry) */
  baseDelayMs: number
  /** Only errors for which this returns true are retried */
  shouldRetry?: (error: unknown) => boolean
  /** Called before each backoff sleep */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

/**
 * Retry an async operation with exponential backoff.
 *
 * Errors rejected by `shouldRetry` are rethrown immediately; the last error
 * is rethrown unchanged once retries run out.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxRetries, baseDelayMs, shouldRetry = () => true, onRetry } = options
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error
      }
      const delayMs = baseDelayMs * Math.pow(2, attempt)
      onRetry?.(error, attempt + 1, delayMs)
      await sleep(delayMs)
    }
  }
}
