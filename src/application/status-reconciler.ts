import { statusForOutcome } from "../domain/state-machine.js";
import type { GatewayCallback, GatewayOutcome, TransactionRecord, TransitionSource } from "../domain/types.js";
import { isoSecondsAgo, type ClockPort } from "../infra/clock.js";
import { errorMessage, type EngineLogger } from "../infra/logger.js";
import type { CheckoutStatusResult, PaymentGatewayPort } from "../ports/payment-gateway.js";
import type { TransactionRepositoryPort } from "../ports/transaction-repository.js";
import type { TransitionResult, TransitionService } from "./transition-service.js";

export type CallbackResult =
  | { matched: false }
  | { matched: true; checkoutId: string; result: TransitionResult };

interface StatusReconcilerOptions {
  callbackGraceSeconds: number;
  pollBatchSize?: number;
  onCallback?: (matched: boolean) => void;
}

const DEFAULT_FAILURE_DETAIL: Record<Exclude<GatewayOutcome, "pending" | "completed">, string> = {
  failed: "payment failed",
  cancelled: "payment cancelled by subscriber",
  error: "gateway reported an error",
};

/**
 * Applies gateway outcomes from the two confirmation channels, callbacks and polling.
 * Both end in `TransitionService.transition`, so whichever arrives first wins.
 */
export class StatusReconciler {
  constructor(
    private readonly repository: TransactionRepositoryPort,
    private readonly gateway: PaymentGatewayPort,
    private readonly transitions: TransitionService,
    private readonly clock: ClockPort,
    private readonly logger: EngineLogger,
    private readonly options: StatusReconcilerOptions,
  ) {}

  async handleCallback(callback: GatewayCallback): Promise<CallbackResult> {
    const record =
      (await this.repository.getByRemoteCheckoutId(callback.remote_checkout_id))
      ?? (await this.findByLocalId(callback.remote_checkout_id));
    this.options.onCallback?.(record !== null);

    if (!record) {
      this.logger.warn(
        { remote_checkout_id: callback.remote_checkout_id, outcome: callback.outcome, code: "unknown_transaction" },
        "callback for unknown transaction",
      );
      return { matched: false };
    }

    const result = await this.applyOutcome(record, callback.outcome, "callback", callback.reference, callback.message);
    if (!result.applied) {
      this.logger.debug(
        { checkout_id: record.checkout_id, outcome: callback.outcome, reason: result.reason },
        "callback did not change transaction",
      );
    }
    return { matched: true, checkoutId: record.checkout_id, result };
  }

  /** A local id only matches while the gateway has not assigned a different remote id. */
  private async findByLocalId(id: string): Promise<TransactionRecord | null> {
    const record = await this.repository.getByCheckoutId(id);
    if (record && record.remote_checkout_id !== null && record.remote_checkout_id !== id) {
      return null;
    }
    return record;
  }

  /** Polls the gateway for records that have heard nothing for longer than the callback grace period. */
  async pollOnce(): Promise<number> {
    const candidates = await this.repository.listAwaitingConfirmation({
      statuses: ["processing", "pending"],
      updatedBefore: isoSecondsAgo(this.clock, this.options.callbackGraceSeconds),
      limit: this.options.pollBatchSize ?? 100,
    });

    let applied = 0;
    for (const record of candidates) {
      try {
        if (await this.pollRecord(record)) {
          applied += 1;
        }
      } catch (error) {
        this.logger.error({ checkout_id: record.checkout_id, err: errorMessage(error) }, "status poll failed");
      }
    }
    return applied;
  }

  private async pollRecord(record: TransactionRecord): Promise<boolean> {
    if (!record.remote_checkout_id) {
      return false;
    }

    let status: CheckoutStatusResult;
    try {
      status = await this.gateway.queryCheckoutStatus(record.remote_checkout_id);
    } catch (error) {
      status = { kind: "unavailable", code: "gateway_exception", message: errorMessage(error) };
    }
    if (status.kind === "unavailable") {
      this.logger.debug(
        { checkout_id: record.checkout_id, code: status.code },
        "gateway status unavailable; will poll again",
      );
      return false;
    }

    const result = await this.applyOutcome(record, status.outcome, "poll", status.reference, status.message);
    return result.applied;
  }

  private async applyOutcome(
    record: TransactionRecord,
    outcome: GatewayOutcome,
    source: TransitionSource,
    reference?: string,
    message?: string,
  ): Promise<TransitionResult> {
    const next = statusForOutcome(outcome);
    if (outcome === "pending" || outcome === "completed") {
      return this.transitions.transition(record.checkout_id, {
        next,
        source,
        ...(reference ? { reference } : {}),
      });
    }
    return this.transitions.transition(record.checkout_id, {
      next,
      source,
      errorDetail: message ?? DEFAULT_FAILURE_DETAIL[outcome],
    });
  }
}
