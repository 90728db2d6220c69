/**
 * Resilience utilities: timeouts and bounded exponential backoff
 */

import pTimeout from 'p-timeout'
import { TimeoutError, RetryExhaustedError, ErrorUtils } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'

export interface TimeoutOptions {
  timeoutMs?: number
  operation?: string
}

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export interface RetryOptions {
  maxAttempts: number
  baseDelayMs: number
  isRetryable: (error: unknown) => boolean
  operationName?: string
  sleep?: Sleep
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

/**
 * Timeout wrapper for promises
 */
export class TimeoutWrapper {
  static async withTimeout<T>(promise: Promise<T>, options: TimeoutOptions = {}): Promise<T> {
    const { timeoutMs = 30000, operation = 'operation' } = options

    try {
      return await pTimeout(promise, timeoutMs, `Operation '${operation}' timed out after ${timeoutMs}ms`)
    } catch (error) {
      if (error instanceof pTimeout.TimeoutError) {
        logger.warn(`⏰ Timeout: ${operation} exceeded ${timeoutMs}ms`)
        throw new TimeoutError(operation, timeoutMs, { originalError: error.message })
      }
      throw error
    }
  }
}

/**
 * Bounded exponential backoff. The predicate decides which failures are
 * transient; anything else is rethrown untouched on the spot.
 */
export class RetryWrapper {
  /**
   * Delay before the attempt that follows `attempt` (1-based)
   */
  static backoffDelay(baseDelayMs: number, attempt: number): number {
    return baseDelayMs * 2 ** (attempt - 1)
  }

  static async withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const { maxAttempts, baseDelayMs, isRetryable, operationName: operation = 'operation', onRetry } = options
    const wait = options.sleep ?? sleep
    const attempts = Math.max(1, maxAttempts)

    let lastError: unknown
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await fn(attempt)
      } catch (error) {
        if (!isRetryable(error)) {
          throw error
        }
        lastError = error

        if (attempt < attempts) {
          const delayMs = RetryWrapper.backoffDelay(baseDelayMs, attempt)
          logger.warn(`⚠️ ${operation} failed, retrying in ${delayMs}ms (attempt ${attempt}/${attempts})`, {
            operation,
            attempt,
            delayMs,
            reason: ErrorUtils.describe(error),
          })
          onRetry?.(error, attempt, delayMs)
          await wait(delayMs)
        }
      }
    }

    throw new RetryExhaustedError(operation, attempts, lastError)
  }
}
