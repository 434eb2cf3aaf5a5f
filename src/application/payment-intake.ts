import { randomUUID } from "node:crypto";
import { normalizeMsisdn } from "../domain/msisdn.js";
import { isKnownPlan, type PlanCatalog } from "../domain/plan-catalog.js";
import type { EnqueuePaymentInput, EnqueuePaymentResponse, TransactionRecord } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import { isoSecondsAgo, type ClockPort } from "../infra/clock.js";
import { fingerprintPayload } from "../infra/fingerprint.js";
import type { EngineLogger } from "../infra/logger.js";
import type { IdempotencyStorePort } from "../ports/idempotency-store.js";
import type { RequestQueuePort } from "../ports/request-queue.js";
import type { TransactionRepositoryPort } from "../ports/transaction-repository.js";

export interface IdempotentResult<TBody> {
  statusCode: number;
  body: TBody;
  idempotencyReplayed: boolean;
}

interface PaymentIntakeOptions {
  planCatalog: PlanCatalog;
  dedupWindowSeconds: number;
}

const IDEMPOTENCY_SCOPE = "enqueue_payment";
const DEDUP_LOCK_SCOPE = "enqueue_dedup";

/**
 * Request Queue entry point. Creates the `queued` record and hands its id to the queue;
 * never talks to the gateway.
 */
export class PaymentIntake {
  constructor(
    private readonly repository: TransactionRepositoryPort,
    private readonly queue: RequestQueuePort,
    private readonly idempotencyStore: IdempotencyStorePort,
    private readonly clock: ClockPort,
    private readonly logger: EngineLogger,
    private readonly options: PaymentIntakeOptions,
  ) {}

  async enqueue(
    input: EnqueuePaymentInput,
    idempotencyKey?: string,
  ): Promise<IdempotentResult<EnqueuePaymentResponse>> {
    if (!Number.isSafeInteger(input.amount) || input.amount <= 0) {
      throw new AppError(400, "invalid_request", "amount must be a positive integer in minor units.");
    }
    if (!isKnownPlan(this.options.planCatalog, input.plan_reference)) {
      throw new AppError(400, "invalid_request", `Unknown plan_reference '${input.plan_reference}'.`);
    }
    if (!idempotencyKey) {
      const body = await this.createTransaction(input);
      return { statusCode: 202, body, idempotencyReplayed: false };
    }

    const fingerprint = fingerprintPayload(input);
    const scopeKey = `${input.owner_reference}:${idempotencyKey}`;
    return this.idempotencyStore.withKeyLock(IDEMPOTENCY_SCOPE, scopeKey, async () => {
      const existing = await this.idempotencyStore.get<EnqueuePaymentResponse>(IDEMPOTENCY_SCOPE, scopeKey);
      if (existing) {
        if (existing.fingerprint !== fingerprint) {
          throw new AppError(
            409,
            "idempotency_key_reused",
            "Idempotency key already used with a different payload.",
          );
        }
        return { statusCode: existing.statusCode, body: existing.body, idempotencyReplayed: true };
      }

      const body = await this.createTransaction(input);
      await this.idempotencyStore.put(IDEMPOTENCY_SCOPE, scopeKey, {
        fingerprint,
        statusCode: 202,
        body,
        createdAt: this.clock.nowIso(),
      });
      return { statusCode: 202, body, idempotencyReplayed: false };
    });
  }

  private async createTransaction(input: EnqueuePaymentInput): Promise<EnqueuePaymentResponse> {
    const msisdn = this.resolveMsisdn(input);

    // The dedup check and the insert run under one per-owner lock so two identical
    // submissions cannot both see "no live duplicate".
    const record = await this.idempotencyStore.withKeyLock(DEDUP_LOCK_SCOPE, input.owner_reference, async () => {
      if (this.options.dedupWindowSeconds > 0) {
        const duplicate = await this.repository.findLiveDuplicate({
          ownerReference: input.owner_reference,
          amount: input.amount,
          planReference: input.plan_reference,
          createdAfter: isoSecondsAgo(this.clock, this.options.dedupWindowSeconds),
        });
        if (duplicate) {
          throw new AppError(
            409,
            "duplicate_request",
            `An identical payment '${duplicate.checkout_id}' is already in progress.`,
          );
        }
      }

      const timestamp = this.clock.nowIso();
      const created: TransactionRecord = {
        checkout_id: `chk_${randomUUID()}`,
        remote_checkout_id: null,
        owner_reference: input.owner_reference,
        amount: input.amount,
        plan_reference: input.plan_reference,
        msisdn,
        status: "queued",
        error_detail: null,
        reference: null,
        credit_state: "none",
        credit_attempts: 0,
        created_at: timestamp,
        updated_at: timestamp,
      };
      await this.repository.insert(created);
      return created;
    });

    // A failed push leaves the record queued; the dispatch worker re-queues stranded records on start.
    await this.queue.push(record.checkout_id);
    this.logger.info(
      { checkout_id: record.checkout_id, owner_reference: record.owner_reference, plan: record.plan_reference },
      "payment enqueued",
    );
    return { checkout_id: record.checkout_id, status: record.status };
  }

  private resolveMsisdn(input: EnqueuePaymentInput): string | null {
    if (input.phone_number === undefined) {
      return null;
    }
    const { msisdn, complete } = normalizeMsisdn(input.phone_number);
    if (!complete) {
      this.logger.warn({ owner_reference: input.owner_reference, msisdn }, "phone number shorter than expected");
    }
    return msisdn;
  }
}
