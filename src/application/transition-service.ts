import { canTransition, isTerminalStatus } from "../domain/state-machine.js";
import type {
  TransactionPatch,
  TransactionRecord,
  TransactionStatus,
  TransitionSource,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import { errorMessage, type EngineLogger } from "../infra/logger.js";
import type { BalanceCreditPort } from "../ports/balance-credit.js";
import type { CompareAndSetExpectation, TransactionRepositoryPort } from "../ports/transaction-repository.js";

export interface TransitionRequest {
  next: TransactionStatus;
  source: TransitionSource;
  errorDetail?: string | null;
  reference?: string;
  remoteCheckoutId?: string;
}

export type TransitionNoopReason =
  | "already_terminal"
  | "same_status"
  | "not_allowed"
  | "credit_in_progress"
  | "credit_failed"
  | "contended";

export type TransitionResult =
  | { applied: true; record: TransactionRecord; previousStatus: TransactionStatus }
  | { applied: false; record: TransactionRecord; reason: TransitionNoopReason };

export interface AppliedTransition {
  record: TransactionRecord;
  previousStatus: TransactionStatus;
  source: TransitionSource;
}

export interface CreditAttemptOutcome {
  ok: boolean;
  source: TransitionSource;
}

interface TransitionServiceOptions {
  creditMaxAttempts: number;
  maxCasAttempts?: number;
  onTransition?: (transition: AppliedTransition) => void;
  onCreditAttempt?: (outcome: CreditAttemptOutcome) => void;
}

function expectationOf(record: TransactionRecord): CompareAndSetExpectation {
  return { status: record.status, creditState: record.credit_state };
}

/**
 * Every status change goes through `transition`. Each write is a compare-and-set against the
 * status and credit state that were read, so concurrent callbacks, polls, sweeps and cancels
 * for one checkout are serialized by the store without a shared lock.
 */
export class TransitionService {
  private readonly maxCasAttempts: number;

  constructor(
    private readonly repository: TransactionRepositoryPort,
    private readonly creditHook: BalanceCreditPort,
    private readonly clock: ClockPort,
    private readonly logger: EngineLogger,
    private readonly options: TransitionServiceOptions,
  ) {
    this.maxCasAttempts = options.maxCasAttempts ?? 5;
  }

  async transition(checkoutId: string, request: TransitionRequest): Promise<TransitionResult> {
    for (let attempt = 1; attempt <= this.maxCasAttempts; attempt += 1) {
      const current = await this.getOrThrow(checkoutId);
      const blocked = this.evaluate(current, request);
      if (blocked) {
        return blocked;
      }

      if (request.next === "completed") {
        const claimed = await this.repository.compareAndSet(checkoutId, expectationOf(current), {
          credit_state: "in_flight",
          credit_attempts: current.credit_attempts + 1,
          ...this.settlementFields(current, request),
          updated_at: this.clock.nowIso(),
        });
        if (claimed) {
          return this.runCredit(claimed, request.source);
        }
        continue;
      }

      const updated = await this.repository.compareAndSet(
        checkoutId,
        expectationOf(current),
        this.patchFor(current, request),
      );
      if (updated) {
        return this.applied(updated, current.status, request.source);
      }
    }

    return this.noop(await this.getOrThrow(checkoutId), "contended");
  }

  /**
   * Re-drives the credit hook for a record whose crediting was interrupted (`in_flight`)
   * or failed (`retry_pending`). The stale claim is fenced on `updated_at`.
   */
  async retryCredit(record: TransactionRecord): Promise<TransitionResult> {
    if (isTerminalStatus(record.status) || record.credit_state === "none" || record.credit_state === "credited") {
      return this.noop(record, isTerminalStatus(record.status) ? "already_terminal" : "not_allowed");
    }
    const claimed = await this.repository.compareAndSet(
      record.checkout_id,
      { ...expectationOf(record), updatedAt: record.updated_at },
      {
        credit_state: "in_flight",
        credit_attempts: record.credit_attempts + 1,
        updated_at: this.clock.nowIso(),
      },
    );
    if (!claimed) {
      return this.noop(await this.getOrThrow(record.checkout_id), "contended");
    }
    return this.runCredit(claimed, "credit_recovery");
  }

  private evaluate(current: TransactionRecord, request: TransitionRequest): TransitionResult | null {
    if (isTerminalStatus(current.status)) {
      return this.noop(current, "already_terminal");
    }
    if (current.credit_state === "in_flight") {
      return this.noop(current, "credit_in_progress");
    }
    // Once the gateway has confirmed payment only another completion may touch the record.
    if (current.credit_state === "retry_pending" && request.next !== "completed") {
      return this.noop(current, "credit_in_progress");
    }
    if (current.status === request.next) {
      return this.noop(current, "same_status");
    }
    if (!canTransition(current.status, request.next)) {
      return this.noop(current, "not_allowed");
    }
    return null;
  }

  private async runCredit(claimed: TransactionRecord, source: TransitionSource): Promise<TransitionResult> {
    try {
      await this.creditHook.credit({
        checkoutId: claimed.checkout_id,
        ownerReference: claimed.owner_reference,
        planReference: claimed.plan_reference,
        amount: claimed.amount,
      });
    } catch (error) {
      this.options.onCreditAttempt?.({ ok: false, source });
      return this.recordCreditFailure(claimed, source, `balance credit failed: ${errorMessage(error)}`);
    }
    this.options.onCreditAttempt?.({ ok: true, source });

    const completed = await this.repository.compareAndSet(claimed.checkout_id, expectationOf(claimed), {
      status: "completed",
      credit_state: "credited",
      error_detail: null,
      updated_at: this.clock.nowIso(),
    });
    if (!completed) {
      return this.noop(await this.getOrThrow(claimed.checkout_id), "contended");
    }
    return this.applied(completed, claimed.status, source);
  }

  private async recordCreditFailure(
    claimed: TransactionRecord,
    source: TransitionSource,
    detail: string,
  ): Promise<TransitionResult> {
    const exhausted = claimed.credit_attempts >= this.options.creditMaxAttempts;
    this.logger.error(
      {
        checkout_id: claimed.checkout_id,
        code: "credit_hook_failure",
        credit_attempts: claimed.credit_attempts,
        exhausted,
        detail,
      },
      "balance credit hook failed",
    );

    const updated = await this.repository.compareAndSet(claimed.checkout_id, expectationOf(claimed), {
      credit_state: "retry_pending",
      updated_at: this.clock.nowIso(),
      ...(exhausted
        ? {
          status: "error",
          error_detail: `${detail} (gave up after ${claimed.credit_attempts} attempts)`,
        }
        : { error_detail: detail }),
    });
    if (!updated) {
      return this.noop(await this.getOrThrow(claimed.checkout_id), "contended");
    }
    if (exhausted) {
      return this.applied(updated, claimed.status, source);
    }
    return this.noop(updated, "credit_failed");
  }

  private patchFor(current: TransactionRecord, request: TransitionRequest): TransactionPatch {
    return {
      status: request.next,
      ...this.settlementFields(current, request),
      ...(request.errorDetail !== undefined ? { error_detail: request.errorDetail } : {}),
      updated_at: this.clock.nowIso(),
    };
  }

  private settlementFields(current: TransactionRecord, request: TransitionRequest): TransactionPatch {
    return {
      ...(request.reference !== undefined ? { reference: request.reference } : {}),
      ...(request.remoteCheckoutId && current.remote_checkout_id === null
        ? { remote_checkout_id: request.remoteCheckoutId }
        : {}),
    };
  }

  private applied(
    record: TransactionRecord,
    previousStatus: TransactionStatus,
    source: TransitionSource,
  ): TransitionResult {
    this.logger.info(
      { checkout_id: record.checkout_id, from: previousStatus, to: record.status, source },
      "transaction status changed",
    );
    this.options.onTransition?.({ record, previousStatus, source });
    return { applied: true, record, previousStatus };
  }

  private noop(record: TransactionRecord, reason: TransitionNoopReason): TransitionResult {
    return { applied: false, record, reason };
  }

  private async getOrThrow(checkoutId: string): Promise<TransactionRecord> {
    const record = await this.repository.getByCheckoutId(checkoutId);
    if (!record) {
      throw new AppError(404, "unknown_transaction", `Transaction '${checkoutId}' not found.`);
    }
    return record;
  }
}
