const RETRYABLE_CLIENT_STATUSES = new Set([408, 425, 429]);

/** A 4xx from the gateway means the request itself is wrong; retrying it cannot help. */
export function isPermanentGatewayFailure(statusCode: number | undefined): boolean {
  if (statusCode === undefined) {
    return false;
  }
  if (RETRYABLE_CLIENT_STATUSES.has(statusCode)) {
    return false;
  }
  return statusCode >= 400 && statusCode < 500;
}

export function retryBackoffMs(attempt: number, baseMs: number, maxMs = 30_000): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * 2 ** exponent);
}
