/**
 * AbortSignal helpers shared by stores, queue and dispatcher.
 *
 * Backing-store clients cannot cancel a command already on the wire, so cancellation
 * rejects the caller promptly while the command settles in the background. Destructive
 * pops do not race the signal once sent.
 */
import { CancelledException } from '@story-engine/shared'
import { setTimeout as delay } from 'node:timers/promises'

export function throwIfAborted(signal: AbortSignal | undefined, context = 'Operation'): void {
    if (signal?.aborted) {
        throw new CancelledException(`${context} cancelled`, signal.reason)
    }
}

/**
 * Settle with `promise`, or reject with CancelledException as soon as `signal` aborts.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined, context = 'Operation'): Promise<T> {
    if (!signal) return promise
    if (signal.aborted) {
        // Observe the abandoned promise so a late rejection is not reported as unhandled
        promise.then(
            () => undefined,
            () => undefined
        )
        return Promise.reject(new CancelledException(`${context} cancelled`, signal.reason))
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new CancelledException(`${context} cancelled`, signal.reason))
        signal.addEventListener('abort', onAbort, { once: true })
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort)
                resolve(value)
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort)
                reject(error)
            }
        )
    })
}

/**
 * Sleep for `ms`, rejecting with CancelledException if `signal` aborts first.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    try {
        await delay(ms, undefined, { signal })
    } catch (error) {
        if (signal?.aborted) {
            throw new CancelledException('Sleep cancelled', error)
        }
        throw error
    }
}
