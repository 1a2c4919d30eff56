/**
 * Clock abstraction for testable time operations
 * Enables deterministic time control in tests while using system time in production
 */

/**
 * Clock interface for time operations.
 * Queue scores and dispatcher cutoffs are derived from this instead of `Date.now()`.
 */
export interface IClock {
    /**
     * Get current time as Date object
     */
    now(): Date

    /**
     * Get current time as whole seconds since the Unix epoch (queue score resolution)
     */
    nowEpochSeconds(): number
}

/**
 * Convert a Date to whole epoch seconds (floor).
 */
export function toEpochSeconds(date: Date): number {
    return Math.floor(date.getTime() / 1000)
}

/**
 * Convert epoch seconds back to a Date.
 */
export function fromEpochSeconds(seconds: number): Date {
    return new Date(seconds * 1000)
}

/**
 * Production implementation using system time
 */
export class SystemClock implements IClock {
    now(): Date {
        return new Date()
    }

    nowEpochSeconds(): number {
        return toEpochSeconds(new Date())
    }
}

/**
 * Test implementation with controllable time
 * Allows tests to advance time deterministically
 */
export class FakeClock implements IClock {
    private currentTime: Date

    constructor(initialTime: Date = new Date('2025-01-01T00:00:00.000Z')) {
        this.currentTime = new Date(initialTime)
    }

    now(): Date {
        return new Date(this.currentTime)
    }

    nowEpochSeconds(): number {
        return toEpochSeconds(this.currentTime)
    }

    /**
     * Advance clock by specified milliseconds
     */
    advance(ms: number): void {
        this.currentTime = new Date(this.currentTime.getTime() + ms)
    }

    /**
     * Advance clock by whole seconds
     */
    advanceSeconds(seconds: number): void {
        this.advance(seconds * 1000)
    }

    /**
     * Set clock to specific time
     */
    setTime(time: Date): void {
        this.currentTime = new Date(time)
    }
}
