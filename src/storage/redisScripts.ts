/**
 * Lua scripts for the Redis backend. Each one runs atomically on the server
 * and follows the rules in taskTransitions.ts field by field. Timestamps are
 * epoch milliseconds passed in ARGV; scripts never read the server clock.
 *
 * Lease checks return 'ok' or a reason string; 'missing' means no task.
 */

export type RedisScriptName =
  | 'enqueue'
  | 'claim'
  | 'start'
  | 'complete'
  | 'fail'
  | 'extend'
  | 'cancel'
  | 'reap'
  | 'transitionUpdate';

export interface RedisScript {
  name: RedisScriptName;
  source: string;
}

const RANKS = `local ranks = { low = 0, normal = 1, high = 2, urgent = 3 }
local function queueScore(priority, sequence)
  return (3 - ranks[priority]) * 1e12 + tonumber(sequence)
end
local function ms(value)
  return string.format('%.0f', value)
end`;

const LEASE_CHECK = `local function leaseProblem(key, workerId, now)
  local f = redis.call('HMGET', key, 'status', 'claimedBy', 'leaseExpiresAt')
  if not f[1] then return 'missing' end
  if f[1] ~= 'claimed' and f[1] ~= 'running' then return 'status ' .. f[1] end
  if f[2] ~= workerId then return 'held by another worker' end
  if (tonumber(f[3]) or 0) <= now then return 'lease expired' end
  return nil
end`;

// KEYS: seq, tasks, pending  ARGV: taskKey, id, priority, field/value pairs...
const ENQUEUE = `${RANKS}
local sequence = redis.call('INCR', KEYS[1])
redis.call('HSET', ARGV[1], unpack(ARGV, 4))
redis.call('HSET', ARGV[1], 'sequence', sequence)
redis.call('ZADD', KEYS[2], sequence, ARGV[2])
redis.call('ZADD', KEYS[3], queueScore(ARGV[3], sequence), ARGV[2])
return sequence`;

// KEYS: pending, delayed, leases  ARGV: taskPrefix, now, workerId, leaseMs
const CLAIM = `${RANKS}
local prefix = ARGV[1]
local now = tonumber(ARGV[2])

local due = redis.call('ZRANGEBYSCORE', KEYS[2], '-inf', now)
for _, id in ipairs(due) do
  local key = prefix .. id
  redis.call('ZREM', KEYS[2], id)
  local f = redis.call('HMGET', key, 'status', 'priority', 'sequence')
  if f[1] == 'retrying' then
    redis.call('HSET', key, 'status', 'pending', 'retryAt', '', 'updatedAt', ARGV[2])
    redis.call('ZADD', KEYS[1], queueScore(f[2], f[3]), id)
  end
end

while true do
  local head = redis.call('ZRANGE', KEYS[1], 0, 0)
  if #head == 0 then return false end
  local id = head[1]
  local key = prefix .. id
  redis.call('ZREM', KEYS[1], id)
  if redis.call('HGET', key, 'status') == 'pending' then
    local expires = ms(now + tonumber(ARGV[4]))
    redis.call('HSET', key, 'status', 'claimed', 'claimedBy', ARGV[3], 'claimedAt', ARGV[2],
      'leaseExpiresAt', expires, 'updatedAt', ARGV[2])
    redis.call('ZADD', KEYS[3], expires, id)
    return id
  end
end`;

// KEYS: task  ARGV: now, workerId
const START = `${LEASE_CHECK}
local problem = leaseProblem(KEYS[1], ARGV[2], tonumber(ARGV[1]))
if problem then return problem end
redis.call('HSET', KEYS[1], 'status', 'running', 'updatedAt', ARGV[1])
return 'ok'`;

// KEYS: task, leases  ARGV: now, workerId, id, resultJson, verdictsJson ('' keeps)
const COMPLETE = `${LEASE_CHECK}
local problem = leaseProblem(KEYS[1], ARGV[2], tonumber(ARGV[1]))
if problem then return problem end
redis.call('ZREM', KEYS[2], ARGV[3])
if ARGV[5] ~= '' then redis.call('HSET', KEYS[1], 'verdicts', ARGV[5]) end
redis.call('HSET', KEYS[1], 'claimedBy', '', 'leaseExpiresAt', '', 'updatedAt', ARGV[1], 'completedAt', ARGV[1])
if redis.call('HGET', KEYS[1], 'cancelRequested') == '1' then
  redis.call('HSET', KEYS[1], 'status', 'cancelled', 'result', '')
else
  redis.call('HSET', KEYS[1], 'status', 'completed', 'result', ARGV[4])
end
return 'ok'`;

// KEYS: task, leases, delayed
// ARGV: now, workerId, id, errorJson, canRetry, baseDelayMs, maxDelayMs, verdictsJson ('' keeps)
const FAIL = `${RANKS}
${LEASE_CHECK}
local now = tonumber(ARGV[1])
local problem = leaseProblem(KEYS[1], ARGV[2], now)
if problem then return problem end
redis.call('ZREM', KEYS[2], ARGV[3])
local f = redis.call('HMGET', KEYS[1], 'attemptCount', 'maxAttempts', 'cancelRequested')
local attempts = tonumber(f[1]) + 1
if ARGV[8] ~= '' then redis.call('HSET', KEYS[1], 'verdicts', ARGV[8]) end
redis.call('HSET', KEYS[1], 'attemptCount', attempts, 'error', ARGV[4], 'claimedBy', '',
  'leaseExpiresAt', '', 'updatedAt', ARGV[1])
if f[3] == '1' then
  redis.call('HSET', KEYS[1], 'status', 'cancelled', 'completedAt', ARGV[1])
elseif ARGV[5] == '1' and attempts < tonumber(f[2]) then
  local delay = math.min(tonumber(ARGV[7]), tonumber(ARGV[6]) * 2 ^ math.max(0, attempts - 1))
  local retryAt = ms(now + delay)
  redis.call('HSET', KEYS[1], 'status', 'retrying', 'retryAt', retryAt)
  redis.call('ZADD', KEYS[3], retryAt, ARGV[3])
else
  redis.call('HSET', KEYS[1], 'status', 'failed', 'completedAt', ARGV[1])
end
return 'ok'`;

// KEYS: task, leases  ARGV: now, workerId, id, extraMs
const EXTEND = `${RANKS}
${LEASE_CHECK}
local problem = leaseProblem(KEYS[1], ARGV[2], tonumber(ARGV[1]))
if problem then return problem end
local expires = ms(tonumber(redis.call('HGET', KEYS[1], 'leaseExpiresAt')) + tonumber(ARGV[4]))
redis.call('HSET', KEYS[1], 'leaseExpiresAt', expires, 'updatedAt', ARGV[1])
redis.call('ZADD', KEYS[2], expires, ARGV[3])
return 'ok'`;

// KEYS: task, pending, delayed  ARGV: now, id
const CANCEL = `local status = redis.call('HGET', KEYS[1], 'status')
if not status then return 'missing' end
if status == 'completed' or status == 'failed' or status == 'cancelled' then
  return 'terminal ' .. status
end
if status == 'pending' or status == 'retrying' then
  redis.call('ZREM', KEYS[2], ARGV[2])
  redis.call('ZREM', KEYS[3], ARGV[2])
  redis.call('HSET', KEYS[1], 'status', 'cancelled', 'retryAt', '', 'completedAt', ARGV[1], 'updatedAt', ARGV[1])
elseif redis.call('HGET', KEYS[1], 'cancelRequested') ~= '1' then
  redis.call('HSET', KEYS[1], 'cancelRequested', '1', 'updatedAt', ARGV[1])
end
return 'ok'`;

// KEYS: leases, pending  ARGV: taskPrefix, now
// Returns { id, outcome, id, outcome, ... }
const REAP = `${RANKS}
local prefix = ARGV[1]
local now = tonumber(ARGV[2])
local out = {}
local expired = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', now)
for _, id in ipairs(expired) do
  redis.call('ZREM', KEYS[1], id)
  local key = prefix .. id
  local f = redis.call('HMGET', key, 'status', 'attemptCount', 'maxAttempts', 'cancelRequested', 'priority', 'sequence')
  if f[1] == 'claimed' or f[1] == 'running' then
    local attempts = tonumber(f[2]) + 1
    redis.call('HSET', key, 'attemptCount', attempts, 'claimedBy', '', 'leaseExpiresAt', '', 'updatedAt', ARGV[2])
    local outcome
    if f[4] == '1' then
      outcome = 'cancelled'
      redis.call('HSET', key, 'status', 'cancelled', 'completedAt', ARGV[2])
    elseif attempts >= tonumber(f[3]) then
      outcome = 'failed'
      local message = 'Lease expired after ' .. attempts .. ' attempts'
      redis.call('HSET', key, 'status', 'failed', 'completedAt', ARGV[2],
        'error', '{"kind":"LeaseExpired","message":"' .. message .. '"}')
    else
      outcome = 'requeued'
      redis.call('HSET', key, 'status', 'pending')
      redis.call('ZADD', KEYS[2], queueScore(f[5], f[6]), id)
    end
    table.insert(out, id)
    table.insert(out, outcome)
  end
end
return out`;

// KEYS: update  ARGV: comma-separated expected statuses, field/value pairs...
const TRANSITION_UPDATE = `local status = redis.call('HGET', KEYS[1], 'status')
if not status then return 'missing' end
local allowed = false
for expected in string.gmatch(ARGV[1], '[^,]+') do
  if expected == status then allowed = true end
end
if not allowed then return status end
redis.call('HSET', KEYS[1], unpack(ARGV, 2))
return 'ok'`;

export const REDIS_SCRIPTS: Record<RedisScriptName, RedisScript> = {
  enqueue: { name: 'enqueue', source: ENQUEUE },
  claim: { name: 'claim', source: CLAIM },
  start: { name: 'start', source: START },
  complete: { name: 'complete', source: COMPLETE },
  fail: { name: 'fail', source: FAIL },
  extend: { name: 'extend', source: EXTEND },
  cancel: { name: 'cancel', source: CANCEL },
  reap: { name: 'reap', source: REAP },
  transitionUpdate: { name: 'transitionUpdate', source: TRANSITION_UPDATE },
};
