import type { Redis } from "ioredis";
import type { RateLimitDecision, RateLimiterPort } from "../../ports/rate-limiter.js";

interface RedisRateLimiterOptions {
  windowSeconds: number;
  maxRequests: number;
  keyPrefix: string;
  maxIdleWindows?: number;
  nowMs?: () => number;
}

const TOKEN_BUCKET_LUA = `
local key = KEYS[1]
local now_ms = tonumber(ARGV[1])
local window_ms = tonumber(ARGV[2])
local max_requests = tonumber(ARGV[3])
local max_idle_ms = tonumber(ARGV[4])

local refill_rate = max_requests / window_ms
local tokens = tonumber(redis.call('HGET', key, 'tokens'))
local last_refill_ms = tonumber(redis.call('HGET', key, 'last_refill_ms'))

if not tokens or not last_refill_ms then
  tokens = max_requests
  last_refill_ms = now_ms
end

if now_ms > last_refill_ms then
  local elapsed_ms = now_ms - last_refill_ms
  local refill_tokens = elapsed_ms * refill_rate
  tokens = math.min(max_requests, tokens + refill_tokens)
  last_refill_ms = now_ms
end

local allowed = 0
if tokens >= 1 then
  tokens = tokens - 1
  allowed = 1
end

local remaining = math.floor(tokens)
if remaining < 0 then
  remaining = 0
end

local tokens_needed = math.max(0, 1 - tokens)
local retry_ms = tokens_needed / refill_rate
local reset_ms = (max_requests - tokens) / refill_rate
local retry_seconds = 0
local retry_after_ms = 0
if allowed == 0 then
  retry_after_ms = math.ceil(retry_ms)
  retry_seconds = math.max(1, math.ceil(retry_ms / 1000))
end
local reset_seconds = math.max(1, math.ceil(reset_ms / 1000))

redis.call('HSET', key,
  'tokens', tokens,
  'last_refill_ms', last_refill_ms,
  'last_seen_ms', now_ms
)
redis.call('PEXPIRE', key, max_idle_ms)

return { allowed, max_requests, remaining, reset_seconds, retry_seconds, retry_after_ms }
`;

function toDecisionFields(raw: unknown): number[] {
  if (!Array.isArray(raw) || raw.length < 6) {
    throw new Error("Unexpected token bucket reply from Redis.");
  }
  return raw.map((item: unknown) => Number(item));
}

/** Same token bucket as the in-memory limiter, evaluated atomically in Redis so every instance shares it. */
export class RedisRateLimiter implements RateLimiterPort {
  private readonly windowMs: number;
  private readonly maxIdleMs: number;
  private readonly nowMs: () => number;

  constructor(
    private readonly redis: Redis,
    private readonly options: RedisRateLimiterOptions,
  ) {
    this.windowMs = options.windowSeconds * 1000;
    this.maxIdleMs = this.windowMs * (options.maxIdleWindows ?? 3);
    this.nowMs = options.nowMs ?? (() => Date.now());
  }

  async consume(identity: string): Promise<RateLimitDecision> {
    const reply: unknown = await this.redis.eval(
      TOKEN_BUCKET_LUA,
      1,
      `${this.options.keyPrefix}:${identity}`,
      this.nowMs(),
      this.windowMs,
      this.options.maxRequests,
      this.maxIdleMs,
    );
    const [
      allowed = 0,
      limit = this.options.maxRequests,
      remaining = 0,
      resetSeconds = 1,
      retryAfterSeconds = 0,
      retryAfterMs = 0,
    ] = toDecisionFields(reply);

    return {
      allowed: allowed === 1,
      limit,
      remaining,
      resetSeconds,
      retryAfterSeconds,
      retryAfterMs,
    };
  }
}
