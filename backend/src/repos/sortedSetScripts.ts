/**
 * Server-side scripts for atomic sorted-set operations.
 *
 * Redis runs a script without interleaving other commands, which is what makes
 * range-then-remove atomic with respect to concurrent ZADD/ZREM.
 */

/**
 * KEYS[1] tenant sorted set, KEYS[2] tenant index set (only when ARGV[5] == '1')
 * ARGV[1] max score ('+inf' allowed), ARGV[2] limit, ARGV[3] member prefix ('' for none),
 * ARGV[4] tenant id, ARGV[5] maintain index flag
 * Returns a flat [member, score, member, score, ...] array in ascending (score, member) order.
 */
export const POP_BY_SCORE_SCRIPT = `
local queue_key = KEYS[1]
local max_score = ARGV[1]
local limit = tonumber(ARGV[2])
local prefix = ARGV[3]
local tenant_id = ARGV[4]
local maintain_index = ARGV[5] == '1'

local result = {}
local items
if prefix == '' then
    items = redis.call('ZRANGEBYSCORE', queue_key, '-inf', max_score, 'WITHSCORES', 'LIMIT', 0, limit)
else
    items = redis.call('ZRANGEBYSCORE', queue_key, '-inf', max_score, 'WITHSCORES')
end

local taken = 0
for i = 1, #items, 2 do
    if taken >= limit then
        break
    end
    local member = items[i]
    if prefix == '' or string.sub(member, 1, string.len(prefix)) == prefix then
        redis.call('ZREM', queue_key, member)
        result[#result + 1] = member
        result[#result + 1] = items[i + 1]
        taken = taken + 1
    end
end

if maintain_index and redis.call('ZCARD', queue_key) == 0 then
    redis.call('SREM', KEYS[2], tenant_id)
end

return result
`

/**
 * KEYS[1] tenant sorted set, KEYS[2] tenant index set
 * ARGV[1] member, ARGV[2] tenant id
 * Returns 1 when the member existed, 0 otherwise.
 */
export const REMOVE_MEMBER_SCRIPT = `
local removed = redis.call('ZREM', KEYS[1], ARGV[1])
if redis.call('ZCARD', KEYS[1]) == 0 then
    redis.call('SREM', KEYS[2], ARGV[2])
end
return removed
`
