/*
 * Lua scripts for bucket mutations. Redis runs each script atomically, so a
 * member and its counter never change apart.
 *
 * Shared KEYS layout: 1 bounds, 2 members, 3 counter, 4 bucket index of the
 * phenomenon, 5 phenomenon index.
 */

/** ARGV: bounds JSON, bucketId, phenomenon. Returns 1 when created. */
export const CREATE_BUCKET = `
if redis.call('SETNX', KEYS[1], ARGV[1]) == 0 then
  return 0
end
redis.call('SADD', KEYS[4], ARGV[2])
redis.call('SADD', KEYS[5], ARGV[3])
return 1
`;

/**
 * ARGV: member id, member JSON, bounds JSON, bucketId, phenomenon.
 * Returns {added, counter}.
 */
export const ADD_MEMBER = `
if redis.call('HSETNX', KEYS[2], ARGV[1], ARGV[2]) == 0 then
  return {0, tonumber(redis.call('GET', KEYS[3]) or '0')}
end
if redis.call('SETNX', KEYS[1], ARGV[3]) == 1 then
  redis.call('SADD', KEYS[4], ARGV[4])
  redis.call('SADD', KEYS[5], ARGV[5])
end
return {1, redis.call('INCR', KEYS[3])}
`;

/**
 * ARGV: member id, bucketId, phenomenon. Returns {removed, remaining}; the
 * bucket is deleted when remaining reaches 0.
 */
export const REMOVE_MEMBER = `
if redis.call('HDEL', KEYS[2], ARGV[1]) == 0 then
  return {0, tonumber(redis.call('GET', KEYS[3]) or '0')}
end
local remaining = redis.call('DECR', KEYS[3])
if remaining > 0 then
  return {1, remaining}
end
redis.call('DEL', KEYS[1], KEYS[2], KEYS[3])
redis.call('SREM', KEYS[4], ARGV[2])
if redis.call('SCARD', KEYS[4]) == 0 then
  redis.call('SREM', KEYS[5], ARGV[3])
end
return {1, 0}
`;

/**
 * ARGV: bucketId, phenomenon. Returns 1 when the bucket was deleted, 0 when
 * it has members or did not exist.
 */
export const DELETE_BUCKET_IF_EMPTY = `
if redis.call('HLEN', KEYS[2]) > 0 then
  return 0
end
local existed = redis.call('SREM', KEYS[4], ARGV[1])
redis.call('DEL', KEYS[1], KEYS[2], KEYS[3])
if redis.call('SCARD', KEYS[4]) == 0 then
  redis.call('SREM', KEYS[5], ARGV[2])
end
return existed
`;

/** ARGV: bucketId, phenomenon. Returns 1 when the bucket existed. */
export const DELETE_BUCKET = `
local existed = redis.call('SREM', KEYS[4], ARGV[1])
local deleted = redis.call('DEL', KEYS[1], KEYS[2], KEYS[3])
if redis.call('SCARD', KEYS[4]) == 0 then
  redis.call('SREM', KEYS[5], ARGV[2])
end
if existed == 1 or deleted > 0 then
  return 1
end
return 0
`;
