import assert from 'node:assert/strict'
import test from 'node:test'
import {
    CancelledException,
    InvalidArgumentException,
    isIngestionQueueException,
    isRetryableIngestionError,
    StoreCorruptException,
    StoreUnavailableException,
    translateStoreError
} from '../src/exceptions/index.js'

test('InvalidArgumentException: code, argument, not retryable', () => {
    const error = new InvalidArgumentException('limit must be a positive integer (got 0)', 'limit')
    assert.equal(error.code, 'InvalidArgument')
    assert.equal(error.argument, 'limit')
    assert.equal(error.retryable, false)
    assert.equal(error.name, 'InvalidArgumentException')
    assert.ok(error instanceof Error)
})

test('StoreUnavailableException: retryable and carries cause', () => {
    const cause = new Error('ECONNREFUSED')
    const error = new StoreUnavailableException('store down', cause)
    assert.equal(error.code, 'StoreUnavailable')
    assert.equal(error.retryable, true)
    assert.equal(error.cause, cause)
})

test('StoreCorruptException: message identifies tenant, member and score', () => {
    const error = new StoreCorruptException('t1', 'garbage', 1735689600)
    assert.equal(error.code, 'StoreCorrupt')
    assert.equal(error.message, "Undecodable queue member 'garbage' for tenant t1 (score 1735689600)")
    assert.equal(error.member, 'garbage')
})

test('CancelledException: default message', () => {
    const error = new CancelledException()
    assert.equal(error.code, 'Cancelled')
    assert.equal(error.message, 'Operation cancelled')
    assert.equal(error.retryable, false)
})

test('isRetryableIngestionError: only StoreUnavailable', () => {
    assert.equal(isRetryableIngestionError(new StoreUnavailableException('down')), true)
    assert.equal(isRetryableIngestionError(new InvalidArgumentException('bad', 'x')), false)
    assert.equal(isRetryableIngestionError(new CancelledException()), false)
    assert.equal(isRetryableIngestionError(new Error('plain')), false)
})

test('translateStoreError: transport errors become StoreUnavailable', () => {
    const raw = new Error('ECONNRESET')
    const translated = translateStoreError(raw, 'Redis popByScore')
    assert.ok(translated instanceof StoreUnavailableException)
    assert.equal(translated.message, 'Redis popByScore: ECONNRESET')
    assert.equal(translated.cause, raw)
})

test('translateStoreError: non-Error values and empty messages', () => {
    assert.equal(translateStoreError('boom').message, 'boom')
    assert.equal(translateStoreError(new Error('')).message, 'Unknown store error')
})

test('translateStoreError: abort and timeout errors become Cancelled', () => {
    const abort = new Error('The operation was aborted')
    abort.name = 'AbortError'
    const timeout = new Error('The operation timed out')
    timeout.name = 'TimeoutError'

    const fromAbort = translateStoreError(abort, 'Redis listTenants')
    assert.ok(fromAbort instanceof CancelledException)
    assert.equal(fromAbort.message, 'Redis listTenants: cancelled')
    assert.ok(translateStoreError(timeout) instanceof CancelledException)
})

test('translateStoreError: queue exceptions pass through unchanged', () => {
    const original = new InvalidArgumentException('bad', 'tenantId')
    assert.equal(translateStoreError(original, 'ctx'), original)
    assert.ok(isIngestionQueueException(original))
    assert.equal(isIngestionQueueException(new Error('x')), false)
})
