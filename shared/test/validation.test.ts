import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import {
    isValidUuid,
    SOURCE_TYPE_MAX_LENGTH,
    validateIdentifier,
    validateInstant,
    validateLimit,
    validateSourceType
} from '../src/utils/validation.js'

const TENANT = '550e8400-e29b-41d4-a716-446655440000'

describe('Validation Utilities', () => {
    describe('isValidUuid', () => {
        it('returns true for valid UUIDs', () => {
            assert.strictEqual(isValidUuid(TENANT), true)
            assert.strictEqual(isValidUuid('6ba7b810-9dad-11d1-80b4-00c04fd430c8'), true)
        })

        it('returns false for invalid UUIDs', () => {
            assert.strictEqual(isValidUuid('not-a-uuid'), false)
            assert.strictEqual(isValidUuid('550e8400-e29b-41d4-a716'), false)
            assert.strictEqual(isValidUuid(''), false)
        })

        it('returns false for null or undefined', () => {
            assert.strictEqual(isValidUuid(null), false)
            assert.strictEqual(isValidUuid(undefined), false)
        })
    })

    describe('validateIdentifier', () => {
        it('returns the canonical lowercase form', () => {
            const result = validateIdentifier('550E8400-E29B-41D4-A716-446655440000', 'tenantId')
            assert.strictEqual(result.success, true)
            assert.strictEqual(result.value, TENANT)
            assert.strictEqual(result.error, undefined)
        })

        it('rejects malformed identifiers with the field label', () => {
            const result = validateIdentifier('abc', 'sourceId')
            assert.strictEqual(result.success, false)
            assert.deepStrictEqual(result.error, { code: 'INVALID_UUID', message: 'sourceId must be a valid UUID' })
        })

        it('rejects the nil UUID', () => {
            const result = validateIdentifier('00000000-0000-0000-0000-000000000000', 'tenantId')
            assert.strictEqual(result.success, false)
            assert.deepStrictEqual(result.error, { code: 'NIL_UUID', message: 'tenantId must not be the nil UUID' })
        })
    })

    describe('validateSourceType', () => {
        it('accepts identifier-like source types', () => {
            assert.strictEqual(validateSourceType('character').value, 'character')
            assert.strictEqual(validateSourceType('content_block').value, 'content_block')
            assert.strictEqual(validateSourceType('v2_scene').success, true)
        })

        it('requires a value', () => {
            const result = validateSourceType('')
            assert.deepStrictEqual(result.error, { code: 'MISSING_SOURCE_TYPE', message: 'sourceType is required' })
        })

        it('rejects separators, uppercase and leading digits', () => {
            assert.strictEqual(validateSourceType('bad:type').error?.code, 'INVALID_SOURCE_TYPE')
            assert.strictEqual(validateSourceType('Character').error?.code, 'INVALID_SOURCE_TYPE')
            assert.strictEqual(validateSourceType('1scene').error?.code, 'INVALID_SOURCE_TYPE')
        })

        it('rejects overlong source types', () => {
            assert.strictEqual(validateSourceType('a'.repeat(SOURCE_TYPE_MAX_LENGTH)).success, true)
            assert.strictEqual(validateSourceType('a'.repeat(SOURCE_TYPE_MAX_LENGTH + 1)).success, false)
        })
    })

    describe('validateLimit', () => {
        it('accepts positive integers', () => {
            assert.strictEqual(validateLimit(1).value, 1)
            assert.strictEqual(validateLimit(100).value, 100)
        })

        it('rejects zero, negatives, fractions and NaN', () => {
            assert.deepStrictEqual(validateLimit(0).error, { code: 'INVALID_LIMIT', message: 'limit must be a positive integer (got 0)' })
            assert.strictEqual(validateLimit(-1).success, false)
            assert.strictEqual(validateLimit(1.5).success, false)
            assert.strictEqual(validateLimit(Number.NaN).success, false)
        })
    })

    describe('validateInstant', () => {
        it('accepts valid dates', () => {
            const date = new Date('2025-01-01T00:00:00.000Z')
            assert.strictEqual(validateInstant(date, 'stableAt').value, date)
        })

        it('rejects Invalid Date', () => {
            assert.deepStrictEqual(validateInstant(new Date('not a date'), 'stableAt').error, {
                code: 'INVALID_TIMESTAMP',
                message: 'stableAt must be a valid Date'
            })
        })
    })
})
