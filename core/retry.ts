/**
 * Retry logic for remote calls
 *
 * The remote store fails transiently now and then; every call to it goes
 * through {@link withRetry}, which retries server errors with a backoff delay
 * and gives up after a fixed number of attempts.
 *
 * Only errors carrying an HTTP status in the 500-599 range are retried by
 * default. Anything else (a 404, a 403, a TypeError from a broken response)
 * fails on the first attempt.
 *
 * @example
 * ```typescript
 * const file = await withRetry(() => store.getObject(id), {
 *   maxAttempts: 3,
 *   backoff: linearBackoff(1000),
 *   operation: 'getObject',
 * })
 * ```
 *
 * @module core/retry
 */

import { RETRY_BASE_DELAY_MS, RETRY_MAX_ATTEMPTS } from './constants.js'
import { getErrorMessage, getErrorStatus, isServerErrorStatus } from './errors.js'
import type { Logger } from '../utils/logger.js'

// =============================================================================
// Backoff Policies
// =============================================================================

/**
 * Delay in milliseconds before the retry that follows failed attempt `attempt`
 * (1-based).
 */
export type BackoffPolicy = (attempt: number) => number

/**
 * `baseMs * attempt`: 1s, 2s, 3s... with the default base. No jitter.
 */
export function linearBackoff(baseMs: number = RETRY_BASE_DELAY_MS): BackoffPolicy {
  return (attempt) => baseMs * attempt
}

/**
 * `baseMs * 2^(attempt - 1)`, capped at `maxMs`. No jitter.
 */
export function exponentialBackoff(baseMs: number = RETRY_BASE_DELAY_MS, maxMs: number = 30_000): BackoffPolicy {
  return (attempt) => Math.min(baseMs * Math.pow(2, attempt - 1), maxMs)
}

/**
 * Retry immediately. Meant for tests.
 */
export const noBackoff: BackoffPolicy = () => 0

// =============================================================================
// Retry
// =============================================================================

/**
 * Decides whether a failed attempt may be retried.
 */
export type RetryPredicate = (error: unknown) => boolean

/**
 * Default predicate: the error carries a 5xx status.
 */
export const isRetryableError: RetryPredicate = (error) => isServerErrorStatus(getErrorStatus(error))

/**
 * Options for {@link withRetry}.
 */
export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number
  /** Delay policy between attempts (default: linear, 1s step) */
  backoff?: BackoffPolicy
  /** Which errors are worth retrying (default: 5xx statuses) */
  isRetryable?: RetryPredicate
  /** Sleep implementation (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>
  /** Receives a warning for every retry */
  logger?: Pick<Logger, 'warn'>
  /** Label used in log messages */
  operation?: string
}

/**
 * Sleep for a specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Run `fn`, retrying retryable failures until it succeeds or the attempt
 * budget is spent.
 *
 * @returns The first successful result
 * @throws The first non-retryable error, or the last error once attempts run out
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? RETRY_MAX_ATTEMPTS)
  const backoff = options.backoff ?? linearBackoff()
  const isRetryable = options.isRetryable ?? isRetryableError
  const wait = options.sleep ?? sleep

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw error
      }

      const delay = backoff(attempt)
      options.logger?.warn(
        `${options.operation ?? 'remote call'} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms:`,
        getErrorMessage(error)
      )
      await wait(delay)
    }
  }
}
