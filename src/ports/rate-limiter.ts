export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetSeconds: number;
  /** Whole seconds, for the Retry-After header. */
  retryAfterSeconds: number;
  /** Exact wait until the next token, used to pace gateway dispatch. */
  retryAfterMs: number;
}

/** Token-bucket limiter keyed by an opaque identity (hashed API key, or the gateway name for dispatch). */
export interface RateLimiterPort {
  consume(identity: string): Promise<RateLimitDecision> | RateLimitDecision;
}
