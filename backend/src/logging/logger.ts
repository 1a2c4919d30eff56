/**
 * Structured logging (pino).
 *
 * The root logger is created once per process and bound into the container; components
 * take a child logger carrying `{ component }` so records can be filtered per subsystem.
 */
import { pino, type Logger } from 'pino'
import { SERVICE_INGESTION_DISPATCHER } from '@story-engine/shared'

export type { Logger }

export interface LoggerOptions {
    level?: string
    service?: string
}

const LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])

export function resolveLogLevel(value: string | undefined, fallback = 'info'): string {
    const normalized = value?.trim().toLowerCase()
    return normalized && LEVELS.has(normalized) ? normalized : fallback
}

export function createLogger(options: LoggerOptions = {}): Logger {
    return pino({
        level: options.level ?? resolveLogLevel(process.env.LOG_LEVEL),
        base: { service: options.service ?? SERVICE_INGESTION_DISPATCHER },
        timestamp: pino.stdTimeFunctions.isoTime
    })
}

/**
 * Logger that drops everything (tests and library embedding).
 */
export function createSilentLogger(): Logger {
    return pino({ level: 'silent' })
}
