import type { GatewayOutcome, TransactionStatus } from "./types.js";

const ALLOWED_TRANSITIONS: Record<TransactionStatus, TransactionStatus[]> = {
  queued: ["processing", "cancelled", "error", "timeout"],
  processing: ["pending", "completed", "failed", "cancelled", "error", "timeout"],
  pending: ["completed", "failed", "cancelled", "error", "timeout"],
  completed: [],
  failed: [],
  cancelled: [],
  error: [],
  timeout: [],
};

const TERMINAL_STATUSES: Set<TransactionStatus> = new Set([
  "completed",
  "failed",
  "cancelled",
  "error",
  "timeout",
]);

const OUTCOME_STATUS: Record<GatewayOutcome, TransactionStatus> = {
  pending: "pending",
  completed: "completed",
  failed: "failed",
  cancelled: "cancelled",
  error: "error",
};

const OUTCOME_ALIASES: Record<string, GatewayOutcome> = {
  pending: "pending",
  processing: "pending",
  completed: "completed",
  success: "completed",
  successful: "completed",
  failed: "failed",
  cancelled: "cancelled",
  canceled: "cancelled",
  error: "error",
};

export function canTransition(current: TransactionStatus, next: TransactionStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

export function isTerminalStatus(status: TransactionStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function statusForOutcome(outcome: GatewayOutcome): TransactionStatus {
  return OUTCOME_STATUS[outcome];
}

/** Maps a gateway status word (case-insensitive, with common spellings) to an outcome. */
export function parseGatewayOutcome(raw: string | undefined): GatewayOutcome | undefined {
  if (!raw) {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  return Object.hasOwn(OUTCOME_ALIASES, normalized) ? OUTCOME_ALIASES[normalized] : undefined;
}
