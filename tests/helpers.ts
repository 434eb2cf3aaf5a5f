import type { TransactionRecord } from "../src/domain/types.js";
import type { ClockPort } from "../src/infra/clock.js";
import type { RuntimeConfig } from "../src/infra/config.js";
import { createLogger } from "../src/infra/logger.js";
import type { BalanceCreditInput, BalanceCreditPort } from "../src/ports/balance-credit.js";

export class MutableClock implements ClockPort {
  constructor(private now: string) {}

  nowIso(): string {
    return this.now;
  }

  setNow(nextNow: string): void {
    this.now = nextNow;
  }

  advanceSeconds(seconds: number): void {
    this.now = new Date(Date.parse(this.now) + seconds * 1000).toISOString();
  }
}

export const silentLogger = createLogger("silent");

/** Credit hook whose calls stay in flight until `open()` is called. */
export class GatedBalanceCredit implements BalanceCreditPort {
  public readonly calls: BalanceCreditInput[] = [];
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async credit(input: BalanceCreditInput): Promise<void> {
    this.calls.push(input);
    await this.gate;
  }

  open(): void {
    this.release();
  }
}

export function makeRecord(overrides: Partial<TransactionRecord> = {}): TransactionRecord {
  return {
    checkout_id: "chk_test_1",
    remote_checkout_id: null,
    owner_reference: "user_1",
    amount: 500,
    plan_reference: "basic",
    msisdn: "0712345678",
    status: "queued",
    error_detail: null,
    reference: null,
    credit_state: "none",
    credit_attempts: 0,
    created_at: "2026-03-01T10:00:00.000Z",
    updated_at: "2026-03-01T10:00:00.000Z",
    ...overrides,
  };
}

export function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: "127.0.0.1",
    port: 8080,
    logLevel: "silent",
    apiKey: "test-api-key",
    apiKeys: ["test-api-key"],
    idempotencyKeyMaxLength: 128,
    idempotencyTtlSeconds: 86400,
    listDefaultLimit: 20,
    listMaxLimit: 100,
    metricsEnabled: true,
    rateLimitEnabled: true,
    rateLimitWindowSeconds: 1,
    rateLimitMaxRequests: 1000,
    planCatalog: { basic: 100, premium: 1000 },
    dedupWindowSeconds: 120,
    lockLeaseSeconds: 300,
    lockWaitMs: 10000,
    dispatchConcurrency: 1,
    dispatchMaxAttempts: 3,
    dispatchBackoffBaseMs: 0,
    dispatchBlockMs: 10,
    gatewayRateLimitMaxRequests: 1000,
    gatewayRateLimitWindowSeconds: 1,
    gatewayBackend: "mock",
    gatewayTimeoutMs: 1000,
    callbackUrl: "http://localhost:8080/v1/callbacks/gateway",
    pollIntervalSeconds: 15,
    callbackGraceSeconds: 30,
    timeoutThresholdSeconds: 180,
    sweepIntervalSeconds: 30,
    creditBackend: "memory",
    creditHookTimeoutMs: 1000,
    creditMaxAttempts: 3,
    creditRetryDelaySeconds: 15,
    creditRecoveryIntervalSeconds: 15,
    backgroundWorkersEnabled: false,
    storeBackend: "memory",
    idempotencyBackend: "memory",
    queueBackend: "memory",
    rateLimitBackend: "memory",
    redisRateLimitPrefix: "momo:ratelimit",
    queueStreamKey: "momo:payments",
    queueConsumerGroup: "momo:dispatch",
    queueConsumerName: "momo-test",
    ...overrides,
  };
}
