/**
 * Input validation utilities for ingestion queue boundaries
 * Provides consistent validation results for identifiers, source types and batch limits
 */

import { NIL as NIL_UUID } from 'uuid'

/**
 * Validation error codes for structured error responses
 */
export type ValidationErrorCode =
    | 'INVALID_UUID'
    | 'NIL_UUID'
    | 'MISSING_SOURCE_TYPE'
    | 'INVALID_SOURCE_TYPE'
    | 'INVALID_LIMIT'
    | 'INVALID_TIMESTAMP'

/**
 * Validation result type
 */
export interface ValidationResult<T = unknown> {
    success: boolean
    value?: T
    error?: {
        code: ValidationErrorCode
        message: string
    }
}

/**
 * UUID validation regex (RFC 9562 versions 1-8, plus nil)
 */
const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-8][0-9a-f]{3}-[089ab][0-9a-f]{3}-[0-9a-f]{12}$/i

/**
 * Source types are identifier-like so they can never contain the member separator.
 */
export const SOURCE_TYPE_PATTERN = /^[a-z][a-z0-9_]*$/

/** Upper bound on sourceType length; keeps members short in the sorted set */
export const SOURCE_TYPE_MAX_LENGTH = 64

/**
 * Validates if a string is a valid UUID
 * @param value - String to validate
 * @returns true if valid UUID, false otherwise
 */
export function isValidUuid(value: string | undefined | null): boolean {
    if (!value) return false
    return UUID_REGEX.test(value)
}

/**
 * Validates an identifier (tenantId / sourceId) and returns its canonical lowercase form.
 * The nil UUID is rejected: it never identifies a real tenant or entity.
 * @param value - Identifier to validate
 * @param label - Field name used in the error message
 */
export function validateIdentifier(value: string | undefined | null, label: string): ValidationResult<string> {
    if (!isValidUuid(value) || !value) {
        return {
            success: false,
            error: {
                code: 'INVALID_UUID',
                message: `${label} must be a valid UUID`
            }
        }
    }

    const canonical = value.toLowerCase()
    if (canonical === NIL_UUID) {
        return {
            success: false,
            error: {
                code: 'NIL_UUID',
                message: `${label} must not be the nil UUID`
            }
        }
    }

    return { success: true, value: canonical }
}

/**
 * Validates a source type (short lowercase identifier)
 * @param sourceType - Source type to validate
 */
export function validateSourceType(sourceType: string | undefined | null): ValidationResult<string> {
    if (!sourceType) {
        return {
            success: false,
            error: {
                code: 'MISSING_SOURCE_TYPE',
                message: 'sourceType is required'
            }
        }
    }

    if (sourceType.length > SOURCE_TYPE_MAX_LENGTH || !SOURCE_TYPE_PATTERN.test(sourceType)) {
        return {
            success: false,
            error: {
                code: 'INVALID_SOURCE_TYPE',
                message: `sourceType '${sourceType}' must match ${SOURCE_TYPE_PATTERN.source} (max ${SOURCE_TYPE_MAX_LENGTH} chars)`
            }
        }
    }

    return { success: true, value: sourceType }
}

/**
 * Validates a batch limit (positive integer)
 */
export function validateLimit(limit: number): ValidationResult<number> {
    if (!Number.isInteger(limit) || limit <= 0) {
        return {
            success: false,
            error: {
                code: 'INVALID_LIMIT',
                message: `limit must be a positive integer (got ${limit})`
            }
        }
    }
    return { success: true, value: limit }
}

/**
 * Validates a Date instance (rejects Invalid Date)
 */
export function validateInstant(value: Date, label: string): ValidationResult<Date> {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
        return {
            success: false,
            error: {
                code: 'INVALID_TIMESTAMP',
                message: `${label} must be a valid Date`
            }
        }
    }
    return { success: true, value }
}
