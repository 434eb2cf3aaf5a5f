import type { TransactionRecord } from "../domain/types.js";
import type { DispatchAttemptResult } from "../infra/metrics.js";
import { errorMessage, type EngineLogger } from "../infra/logger.js";
import type { IdempotencyStorePort } from "../ports/idempotency-store.js";
import type { CheckoutRequestResult, PaymentGatewayPort } from "../ports/payment-gateway.js";
import type { RateLimiterPort } from "../ports/rate-limiter.js";
import type { QueuedPaymentMessage, RequestQueuePort } from "../ports/request-queue.js";
import type { TransactionRepositoryPort } from "../ports/transaction-repository.js";
import { retryBackoffMs } from "./gateway-failure-policy.js";
import type { TransitionService } from "./transition-service.js";

type SettledCheckoutResult = Exclude<CheckoutRequestResult, { kind: "unavailable" }>;

type DispatchCallResult =
  | { kind: "settled"; result: SettledCheckoutResult; attempts: number }
  | { kind: "exhausted"; attempts: number; code: string; message: string };

interface DispatchWorkerOptions {
  concurrency: number;
  maxAttempts: number;
  backoffBaseMs: number;
  blockMs: number;
  callbackUrl: string;
  requeueBatchSize?: number;
  sleep?: (ms: number) => Promise<void>;
  onAttempt?: (result: DispatchAttemptResult, durationSeconds: number) => void;
}

const DISPATCH_LOCK_SCOPE = "dispatch";

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Drains the request queue with a bounded number of loops. Each message is dispatched under a
 * per-checkout lock, so a redelivered message for a record that already left `queued` is a no-op.
 */
export class DispatchWorker {
  private readonly loops: Promise<void>[] = [];
  private readonly sleep: (ms: number) => Promise<void>;
  private stopping = false;

  constructor(
    private readonly repository: TransactionRepositoryPort,
    private readonly queue: RequestQueuePort,
    private readonly gateway: PaymentGatewayPort,
    private readonly transitions: TransitionService,
    private readonly locks: IdempotencyStorePort,
    private readonly gatewayRateLimiter: RateLimiterPort,
    private readonly logger: EngineLogger,
    private readonly options: DispatchWorkerOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  start(): void {
    if (this.loops.length > 0) {
      return;
    }
    this.stopping = false;
    for (let index = 0; index < this.options.concurrency; index += 1) {
      this.loops.push(this.runLoop(index));
    }
  }

  async stop(): Promise<void> {
    this.stopping = true;
    await Promise.all(this.loops.splice(0));
  }

  /** Processes every message currently in the queue without waiting for new ones. */
  async drain(): Promise<number> {
    let processed = 0;
    for (;;) {
      const message = await this.queue.pull(0);
      if (!message) {
        return processed;
      }
      await this.processMessage(message);
      processed += 1;
    }
  }

  /** Re-queues records still `queued` in the store, e.g. after a restart lost the in-memory queue. */
  async requeueStranded(): Promise<number> {
    const stranded = await this.repository.listByStatus({
      statuses: ["queued"],
      limit: this.options.requeueBatchSize ?? 500,
    });
    for (const record of stranded) {
      await this.queue.push(record.checkout_id);
    }
    if (stranded.length > 0) {
      this.logger.info({ count: stranded.length }, "re-queued stranded transactions");
    }
    return stranded.length;
  }

  async processMessage(message: QueuedPaymentMessage): Promise<void> {
    try {
      await this.dispatch(message.checkoutId);
      await this.queue.ack(message);
    } catch (error) {
      // Left unacknowledged; the record stays queued until a redelivery or the timeout sweeper.
      this.logger.error(
        { checkout_id: message.checkoutId, err: errorMessage(error) },
        "dispatch failed unexpectedly",
      );
    }
  }

  async dispatch(checkoutId: string): Promise<TransactionRecord | null> {
    return this.locks.withKeyLock(DISPATCH_LOCK_SCOPE, checkoutId, async () => {
      const record = await this.repository.getByCheckoutId(checkoutId);
      if (!record) {
        this.logger.warn({ checkout_id: checkoutId }, "queued message for unknown transaction");
        return null;
      }
      if (record.status !== "queued") {
        this.logger.debug({ checkout_id: checkoutId, status: record.status }, "transaction already dispatched");
        return record;
      }

      const call = await this.requestWithRetry(record);
      return this.applyCallResult(record, call);
    });
  }

  private async runLoop(index: number): Promise<void> {
    while (!this.stopping) {
      let message: QueuedPaymentMessage | null;
      try {
        message = await this.queue.pull(this.options.blockMs);
      } catch (error) {
        this.logger.error({ loop: index, err: errorMessage(error) }, "request queue pull failed");
        await this.sleep(this.options.blockMs);
        continue;
      }
      if (message) {
        await this.processMessage(message);
      }
    }
  }

  private async requestWithRetry(record: TransactionRecord): Promise<DispatchCallResult> {
    let lastFailure = { code: "gateway_unavailable", message: "no attempt made" };

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      await this.acquireGatewaySlot();
      const startedAt = Date.now();
      let result: CheckoutRequestResult;
      try {
        result = await this.gateway.requestCheckout({
          checkoutId: record.checkout_id,
          msisdn: record.msisdn,
          amount: record.amount,
          callbackUrl: this.options.callbackUrl,
        });
      } catch (error) {
        result = { kind: "unavailable", code: "gateway_exception", message: errorMessage(error) };
      }
      this.options.onAttempt?.(result.kind, (Date.now() - startedAt) / 1000);

      if (result.kind !== "unavailable") {
        return { kind: "settled", result, attempts: attempt };
      }

      lastFailure = { code: result.code, message: result.message };
      this.logger.warn(
        {
          checkout_id: record.checkout_id,
          attempt,
          max_attempts: this.options.maxAttempts,
          code: result.code,
        },
        "gateway unavailable",
      );
      if (attempt < this.options.maxAttempts) {
        await this.sleep(retryBackoffMs(attempt, this.options.backoffBaseMs));
      }
    }

    return { kind: "exhausted", attempts: this.options.maxAttempts, ...lastFailure };
  }

  private async acquireGatewaySlot(): Promise<void> {
    for (;;) {
      const decision = await this.gatewayRateLimiter.consume(`gateway:${this.gateway.name}`);
      if (decision.allowed) {
        return;
      }
      await this.sleep(Math.max(1, decision.retryAfterMs));
    }
  }

  private async applyCallResult(record: TransactionRecord, call: DispatchCallResult): Promise<TransactionRecord> {
    const checkoutId = record.checkout_id;

    if (call.kind === "exhausted") {
      const outcome = await this.transitions.transition(checkoutId, {
        next: "error",
        source: "dispatch",
        errorDetail: `gateway unavailable after ${call.attempts} attempts: ${call.message}`,
      });
      return outcome.record;
    }

    const { result } = call;
    switch (result.kind) {
      case "rejected": {
        const outcome = await this.transitions.transition(checkoutId, {
          next: "error",
          source: "dispatch",
          errorDetail: `gateway rejected request: ${result.message}`,
        });
        return outcome.record;
      }
      case "accepted": {
        const outcome = await this.transitions.transition(checkoutId, {
          next: "processing",
          source: "dispatch",
          remoteCheckoutId: result.remoteCheckoutId,
        });
        if (!outcome.applied) {
          this.logger.warn(
            { checkout_id: checkoutId, remote_checkout_id: result.remoteCheckoutId, reason: outcome.reason },
            "gateway accepted a transaction that is no longer queued",
          );
        }
        return outcome.record;
      }
      case "completed": {
        const processing = await this.transitions.transition(checkoutId, {
          next: "processing",
          source: "dispatch",
          remoteCheckoutId: result.remoteCheckoutId,
        });
        if (!processing.applied) {
          this.logger.warn(
            { checkout_id: checkoutId, reason: processing.reason },
            "gateway settled a transaction that is no longer queued",
          );
          return processing.record;
        }
        const completed = await this.transitions.transition(checkoutId, {
          next: "completed",
          source: "dispatch",
          reference: result.reference,
        });
        return completed.record;
      }
    }
  }
}
