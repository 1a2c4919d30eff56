/**
 * Source type vocabulary (Zod validation)
 *
 * Closed set of entity kinds that domain write paths signal through the ingestion queue.
 * The queue itself treats sourceType opaquely; this vocabulary is the contract between
 * producers, the dispatcher and the per-type ingestion handlers.
 */
import { z } from 'zod'

export const SourceTypeSchema = z.enum([
    'world',
    'story',
    'chapter',
    'scene',
    'content_block',
    'character',
    'location',
    'faction',
    'artifact',
    'event',
    'lore'
])
export type SourceType = z.infer<typeof SourceTypeSchema>

export const SOURCE_TYPES: readonly SourceType[] = SourceTypeSchema.options

/**
 * Type guard for the closed source type vocabulary.
 */
export function isSourceType(value: string): value is SourceType {
    return SourceTypeSchema.safeParse(value).success
}
