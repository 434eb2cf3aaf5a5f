import { DEFAULT_PLAN_CATALOG, type PlanCatalog } from "../domain/plan-catalog.js";
import { AppError } from "./app-error.js";
import type { LogLevel } from "./logger.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

function parsePlanCatalogEnv(name: string): PlanCatalog {
  const raw = process.env[name];
  if (raw === undefined) {
    return { ...DEFAULT_PLAN_CATALOG };
  }
  const catalog: Record<string, number> = {};
  const entries = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  for (const entry of entries) {
    const [plan, units, ...rest] = entry.split(":").map((part) => part.trim());
    const parsedUnits = Number(units);
    if (!plan || rest.length > 0 || !Number.isInteger(parsedUnits) || parsedUnits < 1) {
      throw invalidConfig(name, "must be a comma-separated list of plan:units pairs with positive integer units");
    }
    catalog[plan] = parsedUnits;
  }
  if (Object.keys(catalog).length === 0) {
    throw invalidConfig(name, "must declare at least one plan");
  }
  return catalog;
}

export type StoreBackend = "memory" | "postgres";
export type QueueBackend = "memory" | "redis";
export type RateLimitBackend = "memory" | "redis";
export type GatewayBackend = "mock" | "http";
export type CreditBackend = "memory" | "http";

export interface RuntimeConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  apiKey: string;
  apiKeys: string[];
  idempotencyKeyMaxLength: number;
  idempotencyTtlSeconds: number;
  listDefaultLimit: number;
  listMaxLimit: number;
  metricsEnabled: boolean;
  rateLimitEnabled: boolean;
  rateLimitWindowSeconds: number;
  rateLimitMaxRequests: number;
  planCatalog: PlanCatalog;
  dedupWindowSeconds: number;
  lockLeaseSeconds: number;
  lockWaitMs: number;
  dispatchConcurrency: number;
  dispatchMaxAttempts: number;
  dispatchBackoffBaseMs: number;
  dispatchBlockMs: number;
  gatewayRateLimitMaxRequests: number;
  gatewayRateLimitWindowSeconds: number;
  gatewayBackend: GatewayBackend;
  gatewayBaseUrl?: string;
  gatewayApiKey?: string;
  gatewayTimeoutMs: number;
  callbackUrl: string;
  callbackToken?: string;
  pollIntervalSeconds: number;
  callbackGraceSeconds: number;
  timeoutThresholdSeconds: number;
  sweepIntervalSeconds: number;
  creditBackend: CreditBackend;
  creditHookUrl?: string;
  creditHookApiKey?: string;
  creditHookTimeoutMs: number;
  creditMaxAttempts: number;
  creditRetryDelaySeconds: number;
  creditRecoveryIntervalSeconds: number;
  backgroundWorkersEnabled: boolean;
  storeBackend: StoreBackend;
  idempotencyBackend: StoreBackend;
  queueBackend: QueueBackend;
  rateLimitBackend: RateLimitBackend;
  postgresUrl?: string;
  redisUrl?: string;
  redisRateLimitPrefix: string;
  queueStreamKey: string;
  queueConsumerGroup: string;
  queueConsumerName: string;
}

const DEFAULT_API_KEY = "dev_momo_key";

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const logLevel = parseEnumEnv(
    "MOMO_LOG_LEVEL",
    ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const,
    "info",
  );
  const configuredApiKeys = parseStringListEnv("MOMO_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("MOMO_API_KEY", DEFAULT_API_KEY, 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const apiKey = apiKeys[0] ?? fallbackApiKey;
  const idempotencyKeyMaxLength = parseIntegerEnv("MOMO_IDEMPOTENCY_KEY_MAX_LENGTH", 128, 16, 1024);
  const idempotencyTtlSeconds = parseIntegerEnv("MOMO_IDEMPOTENCY_TTL_SECONDS", 86400, 1, 2_592_000);
  const listDefaultLimit = parseIntegerEnv("MOMO_LIST_DEFAULT_LIMIT", 20, 1, 1000);
  const listMaxLimit = parseIntegerEnv("MOMO_LIST_MAX_LIMIT", 100, 1, 5000);
  const metricsEnabled = parseBooleanEnv("MOMO_METRICS_ENABLED", true);
  const rateLimitEnabled = parseBooleanEnv("MOMO_RATE_LIMIT_ENABLED", true);
  const rateLimitWindowSeconds = parseIntegerEnv("MOMO_RATE_LIMIT_WINDOW_SECONDS", 1, 1, 3600);
  const rateLimitMaxRequests = parseIntegerEnv("MOMO_RATE_LIMIT_MAX_REQUESTS", 100, 1, 1_000_000);
  const planCatalog = parsePlanCatalogEnv("MOMO_PLAN_CATALOG");
  const dedupWindowSeconds = parseIntegerEnv("MOMO_DEDUP_WINDOW_SECONDS", 120, 0, 86400);
  const lockLeaseSeconds = parseIntegerEnv("MOMO_LOCK_LEASE_SECONDS", 300, 5, 3600);
  const lockWaitMs = parseIntegerEnv("MOMO_LOCK_WAIT_MS", 10000, 100, 600000);
  const dispatchConcurrency = parseIntegerEnv("MOMO_DISPATCH_CONCURRENCY", 2, 1, 64);
  const dispatchMaxAttempts = parseIntegerEnv("MOMO_DISPATCH_MAX_ATTEMPTS", 3, 1, 20);
  const dispatchBackoffBaseMs = parseIntegerEnv("MOMO_DISPATCH_BACKOFF_BASE_MS", 500, 0, 60000);
  const dispatchBlockMs = parseIntegerEnv("MOMO_DISPATCH_BLOCK_MS", 1000, 10, 60000);
  const gatewayRateLimitMaxRequests = parseIntegerEnv("MOMO_GATEWAY_RATE_LIMIT_MAX_REQUESTS", 5, 1, 10000);
  const gatewayRateLimitWindowSeconds = parseIntegerEnv("MOMO_GATEWAY_RATE_LIMIT_WINDOW_SECONDS", 1, 1, 3600);
  const gatewayBackend = parseEnumEnv("MOMO_GATEWAY_BACKEND", ["mock", "http"] as const, "mock");
  const gatewayBaseUrl = parseOptionalStringEnv("MOMO_GATEWAY_BASE_URL", 8);
  const gatewayApiKey = parseOptionalStringEnv("MOMO_GATEWAY_API_KEY", 8);
  const gatewayTimeoutMs = parseIntegerEnv("MOMO_GATEWAY_TIMEOUT_MS", 30000, 100, 120000);
  const callbackUrl = parseStringEnv(
    "MOMO_CALLBACK_URL",
    `http://localhost:${port}/v1/callbacks/gateway`,
    8,
  );
  const callbackToken = parseOptionalStringEnv("MOMO_CALLBACK_TOKEN", 8);
  const pollIntervalSeconds = parseIntegerEnv("MOMO_POLL_INTERVAL_SECONDS", 15, 1, 3600);
  const callbackGraceSeconds = parseIntegerEnv("MOMO_CALLBACK_GRACE_SECONDS", 30, 0, 3600);
  const timeoutThresholdSeconds = parseIntegerEnv("MOMO_TIMEOUT_THRESHOLD_SECONDS", 180, 10, 86400);
  const sweepIntervalSeconds = parseIntegerEnv("MOMO_SWEEP_INTERVAL_SECONDS", 30, 1, 3600);
  const creditBackend = parseEnumEnv("MOMO_CREDIT_BACKEND", ["memory", "http"] as const, "memory");
  const creditHookUrl = parseOptionalStringEnv("MOMO_CREDIT_HOOK_URL", 8);
  const creditHookApiKey = parseOptionalStringEnv("MOMO_CREDIT_HOOK_API_KEY", 8);
  const creditHookTimeoutMs = parseIntegerEnv("MOMO_CREDIT_HOOK_TIMEOUT_MS", 5000, 100, 120000);
  const creditMaxAttempts = parseIntegerEnv("MOMO_CREDIT_MAX_ATTEMPTS", 5, 1, 100);
  const creditRetryDelaySeconds = parseIntegerEnv("MOMO_CREDIT_RETRY_DELAY_SECONDS", 15, 1, 3600);
  const creditRecoveryIntervalSeconds = parseIntegerEnv("MOMO_CREDIT_RECOVERY_INTERVAL_SECONDS", 15, 1, 3600);
  const backgroundWorkersEnabled = parseBooleanEnv("MOMO_BACKGROUND_WORKERS_ENABLED", true);
  const storeBackend = parseEnumEnv("MOMO_STORE_BACKEND", ["memory", "postgres"] as const, "memory");
  const idempotencyBackend = parseEnumEnv(
    "MOMO_IDEMPOTENCY_BACKEND",
    ["memory", "postgres"] as const,
    "memory",
  );
  const queueBackend = parseEnumEnv("MOMO_QUEUE_BACKEND", ["memory", "redis"] as const, "memory");
  const rateLimitBackend = parseEnumEnv(
    "MOMO_RATE_LIMIT_BACKEND",
    ["memory", "redis"] as const,
    "memory",
  );
  const postgresUrl = parseOptionalStringEnv("MOMO_POSTGRES_URL", 12);
  const redisUrl = parseOptionalStringEnv("MOMO_REDIS_URL", 8);
  const redisRateLimitPrefix = parseStringEnv("MOMO_REDIS_RATE_LIMIT_PREFIX", "momo:ratelimit", 3);
  const queueStreamKey = parseStringEnv("MOMO_QUEUE_STREAM_KEY", "momo:payments", 3);
  const queueConsumerGroup = parseStringEnv("MOMO_QUEUE_CONSUMER_GROUP", "momo:dispatch", 3);
  const queueConsumerName = parseStringEnv("MOMO_QUEUE_CONSUMER_NAME", `momo-${process.pid}`, 3);

  if (process.env.NODE_ENV === "production" && apiKeys.includes(DEFAULT_API_KEY)) {
    throw invalidConfig(
      configuredApiKeys ? "MOMO_API_KEYS" : "MOMO_API_KEY",
      "must not include default key value in production",
    );
  }
  if (listDefaultLimit > listMaxLimit) {
    throw invalidConfig("MOMO_LIST_DEFAULT_LIMIT", "must be lower or equal to MOMO_LIST_MAX_LIMIT");
  }
  if (lockLeaseSeconds * 1000 <= dispatchMaxAttempts * gatewayTimeoutMs) {
    throw invalidConfig(
      "MOMO_LOCK_LEASE_SECONDS",
      "must outlast MOMO_DISPATCH_MAX_ATTEMPTS gateway calls of MOMO_GATEWAY_TIMEOUT_MS each",
    );
  }
  if (gatewayBackend === "http" && !gatewayBaseUrl) {
    throw invalidConfig("MOMO_GATEWAY_BASE_URL", "is required when MOMO_GATEWAY_BACKEND is http");
  }
  if (gatewayBackend === "http" && !gatewayApiKey) {
    throw invalidConfig("MOMO_GATEWAY_API_KEY", "is required when MOMO_GATEWAY_BACKEND is http");
  }
  if (creditBackend === "http" && !creditHookUrl) {
    throw invalidConfig("MOMO_CREDIT_HOOK_URL", "is required when MOMO_CREDIT_BACKEND is http");
  }
  if ((storeBackend === "postgres" || idempotencyBackend === "postgres") && !postgresUrl) {
    throw invalidConfig("MOMO_POSTGRES_URL", "is required when postgres-backed runtime features are enabled");
  }
  if ((rateLimitBackend === "redis" || queueBackend === "redis") && !redisUrl) {
    throw invalidConfig("MOMO_REDIS_URL", "is required when redis-backed runtime features are enabled");
  }

  return {
    host,
    port,
    logLevel,
    apiKey,
    apiKeys,
    idempotencyKeyMaxLength,
    idempotencyTtlSeconds,
    listDefaultLimit,
    listMaxLimit,
    metricsEnabled,
    rateLimitEnabled,
    rateLimitWindowSeconds,
    rateLimitMaxRequests,
    planCatalog,
    dedupWindowSeconds,
    lockLeaseSeconds,
    lockWaitMs,
    dispatchConcurrency,
    dispatchMaxAttempts,
    dispatchBackoffBaseMs,
    dispatchBlockMs,
    gatewayRateLimitMaxRequests,
    gatewayRateLimitWindowSeconds,
    gatewayBackend,
    gatewayTimeoutMs,
    callbackUrl,
    pollIntervalSeconds,
    callbackGraceSeconds,
    timeoutThresholdSeconds,
    sweepIntervalSeconds,
    creditBackend,
    creditHookTimeoutMs,
    creditMaxAttempts,
    creditRetryDelaySeconds,
    creditRecoveryIntervalSeconds,
    backgroundWorkersEnabled,
    storeBackend,
    idempotencyBackend,
    queueBackend,
    rateLimitBackend,
    redisRateLimitPrefix,
    queueStreamKey,
    queueConsumerGroup,
    queueConsumerName,
    ...(gatewayBaseUrl ? { gatewayBaseUrl } : {}),
    ...(gatewayApiKey ? { gatewayApiKey } : {}),
    ...(callbackToken ? { callbackToken } : {}),
    ...(creditHookUrl ? { creditHookUrl } : {}),
    ...(creditHookApiKey ? { creditHookApiKey } : {}),
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
  };
}
