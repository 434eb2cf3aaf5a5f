import { createHash } from "node:crypto";

function sha256Hex(value: string): string {
  return createHash("sha256").update(value).digest("hex");
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item));
  }
  if (value && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, item]) => [key, canonicalize(item)]);
    return Object.fromEntries(entries);
  }
  return value;
}

/** Key-order independent digest of a request body, compared on Idempotency-Key replays. */
export function fingerprintPayload(payload: unknown): string {
  return sha256Hex(JSON.stringify(canonicalize(payload)));
}

/** Opaque identity for per-credential buckets, so raw API keys never reach a store. */
export function hashIdentity(secret: string): string {
  return sha256Hex(secret);
}
