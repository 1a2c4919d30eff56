/**
 * Retry with jittered exponential backoff for dispatcher store calls.
 * Only errors flagged retryable (StoreUnavailable) are retried; everything else propagates at once.
 */

import { isRetryableIngestionError } from '@story-engine/shared'
import type { RetryPolicy } from '../config/ingestionDispatcherConfig.js'
import { sleep } from '../utils/abort.js'

export interface RetryAttemptInfo {
    /** Zero-based index of the attempt that failed */
    attempt: number
    delayMs: number
    error: unknown
}

export interface RetryOptions {
    signal?: AbortSignal
    onRetry?: (info: RetryAttemptInfo) => void
    /** Source of jitter in [0, 1); defaults to Math.random */
    random?: () => number
}

/**
 * Delay before retrying after `attempt` failed: min(maxDelay, base * 2^attempt) scaled into [50%, 100%).
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
    const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt))
    return Math.floor(ceiling * (0.5 + random() * 0.5))
}

export async function withRetry<T>(operation: () => Promise<T>, policy: RetryPolicy, options: RetryOptions = {}): Promise<T> {
    const random = options.random ?? Math.random

    for (let attempt = 0; ; attempt++) {
        try {
            return await operation()
        } catch (err) {
            // Don't retry on the last attempt
            if (!isRetryableIngestionError(err) || attempt >= policy.maxAttempts - 1) {
                throw err
            }
            const delayMs = computeBackoffDelay(attempt, policy, random)
            options.onRetry?.({ attempt, delayMs, error: err })
            await sleep(delayMs, options.signal)
        }
    }
}
