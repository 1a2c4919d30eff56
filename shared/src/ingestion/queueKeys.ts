/**
 * Backing store key layout for the ingestion queue.
 *
 * These strings are wire-level: existing producers write the same keys, so changing
 * them requires a migration.
 * - Per-tenant sorted set: ingestion:queue:<tenantId>
 * - Member: <sourceType>:<sourceId>
 * - Score: integer seconds since the Unix epoch
 * - Optional active-tenant index set: ingestion:tenants
 */

import { isValidUuid, SOURCE_TYPE_PATTERN } from '../utils/validation.js'

export const INGESTION_QUEUE_KEY_PREFIX = 'ingestion:queue'
export const INGESTION_TENANT_INDEX_KEY = 'ingestion:tenants'
export const MEMBER_SEPARATOR = ':'

export interface DecodedMember {
    sourceType: string
    sourceId: string
}

/**
 * Build the sorted-set key for a tenant.
 */
export function buildQueueKey(tenantId: string): string {
    return `${INGESTION_QUEUE_KEY_PREFIX}:${tenantId}`
}

/**
 * Extract the tenant id from a queue key, or null when the key is not a tenant queue key.
 */
export function parseQueueKey(key: string): string | null {
    const prefix = `${INGESTION_QUEUE_KEY_PREFIX}:`
    if (!key.startsWith(prefix)) return null
    const tenantId = key.slice(prefix.length)
    return isValidUuid(tenantId) ? tenantId.toLowerCase() : null
}

/**
 * Encode (sourceType, sourceId) into a sorted-set member.
 * Inputs are expected to be validated already.
 */
export function encodeMember(sourceType: string, sourceId: string): string {
    return `${sourceType}${MEMBER_SEPARATOR}${sourceId.toLowerCase()}`
}

/**
 * Member prefix matching every member of one source type.
 */
export function memberPrefix(sourceType: string): string {
    return `${sourceType}${MEMBER_SEPARATOR}`
}

/**
 * Decode a member by splitting on the first separator.
 * @returns Decoded parts, or null when the member is corrupt
 */
export function decodeMember(member: string): DecodedMember | null {
    const idx = member.indexOf(MEMBER_SEPARATOR)
    if (idx <= 0) return null

    const sourceType = member.slice(0, idx)
    const sourceId = member.slice(idx + 1)
    if (!SOURCE_TYPE_PATTERN.test(sourceType) || !isValidUuid(sourceId)) {
        return null
    }

    return { sourceType, sourceId: sourceId.toLowerCase() }
}
