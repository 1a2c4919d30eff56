import assert from 'node:assert/strict'
import test from 'node:test'
import { queueItemIdentity } from '../src/ingestion/queueItem.js'
import {
    buildQueueKey,
    decodeMember,
    encodeMember,
    INGESTION_QUEUE_KEY_PREFIX,
    memberPrefix,
    parseQueueKey
} from '../src/ingestion/queueKeys.js'
import { SOURCE_TYPES } from '../src/ingestion/sourceTypes.js'

const TENANT = '550e8400-e29b-41d4-a716-446655440000'
const SOURCE = '6ba7b810-9dad-11d1-80b4-00c04fd430c8'

// ---------------------------------------------------------------------------
// Key layout (wire-level strings)
// ---------------------------------------------------------------------------
test('buildQueueKey: per-tenant namespace', () => {
    assert.equal(INGESTION_QUEUE_KEY_PREFIX, 'ingestion:queue')
    assert.equal(buildQueueKey(TENANT), 'ingestion:queue:550e8400-e29b-41d4-a716-446655440000')
})

test('parseQueueKey: extracts canonical tenant id', () => {
    assert.equal(parseQueueKey('ingestion:queue:550E8400-E29B-41D4-A716-446655440000'), TENANT)
    assert.equal(parseQueueKey(buildQueueKey(TENANT)), TENANT)
})

test('parseQueueKey: rejects foreign keys', () => {
    assert.equal(parseQueueKey('ingestion:tenants'), null)
    assert.equal(parseQueueKey('ingestion:queue:not-a-uuid'), null)
    assert.equal(parseQueueKey(`processing:queue:${TENANT}`), null)
})

test('encodeMember: sourceType, separator, lowercase id', () => {
    assert.equal(encodeMember('character', SOURCE.toUpperCase()), `character:${SOURCE}`)
    assert.equal(memberPrefix('scene'), 'scene:')
})

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------
test('decodeMember: round-trips every source type', () => {
    for (const sourceType of SOURCE_TYPES) {
        assert.deepEqual(decodeMember(encodeMember(sourceType, SOURCE)), { sourceType, sourceId: SOURCE })
    }
})

test('decodeMember: splits on the first separator only', () => {
    // A well-formed UUID never contains ':', so a second separator makes the id invalid
    assert.equal(decodeMember(`character:${SOURCE}:extra`), null)
})

test('decodeMember: returns null for corrupt members', () => {
    assert.equal(decodeMember('character'), null)
    assert.equal(decodeMember(`:${SOURCE}`), null)
    assert.equal(decodeMember('character:not-a-uuid'), null)
    assert.equal(decodeMember(`Character:${SOURCE}`), null)
    assert.equal(decodeMember(''), null)
})

// ---------------------------------------------------------------------------
// Queue item identity
// ---------------------------------------------------------------------------
test('queueItemIdentity: tenant, type and id', () => {
    assert.equal(queueItemIdentity({ tenantId: TENANT, sourceType: 'event', sourceId: SOURCE }), `${TENANT}:event:${SOURCE}`)
})
