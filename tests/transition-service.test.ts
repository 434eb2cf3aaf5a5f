import { describe, expect, it } from "vitest";
import { InMemoryBalanceCredit } from "../src/adapters/inmemory/balance-credit.js";
import { InMemoryTransactionRepository } from "../src/adapters/inmemory/transaction-repository.js";
import { TransitionService, type AppliedTransition } from "../src/application/transition-service.js";
import type { TransactionRecord } from "../src/domain/types.js";
import type { BalanceCreditInput, BalanceCreditPort } from "../src/ports/balance-credit.js";
import { MutableClock, makeRecord, silentLogger } from "./helpers.js";

class FlakyBalanceCredit implements BalanceCreditPort {
  public readonly calls: BalanceCreditInput[] = [];

  constructor(private failuresLeft: number) {}

  async credit(input: BalanceCreditInput): Promise<void> {
    this.calls.push(input);
    if (this.failuresLeft > 0) {
      this.failuresLeft -= 1;
      throw new Error("account service unavailable");
    }
  }
}

async function setup(record: TransactionRecord, creditHook?: BalanceCreditPort, creditMaxAttempts = 3) {
  const repository = new InMemoryTransactionRepository();
  await repository.insert(record);
  const clock = new MutableClock("2026-03-01T10:01:00.000Z");
  const credit = creditHook ?? new InMemoryBalanceCredit({ basic: 100, premium: 1000 });
  const applied: AppliedTransition[] = [];
  const transitions = new TransitionService(repository, credit, clock, silentLogger, {
    creditMaxAttempts,
    onTransition: (transition) => {
      applied.push(transition);
    },
  });
  return { repository, clock, credit, transitions, applied };
}

describe("TransitionService", () => {
  it("applies an allowed transition and records the remote checkout id", async () => {
    const { transitions, applied } = await setup(makeRecord());

    const result = await transitions.transition("chk_test_1", {
      next: "processing",
      source: "dispatch",
      remoteCheckoutId: "ws_CO_1",
    });

    expect(result.applied).toBe(true);
    expect(result.record.status).toBe("processing");
    expect(result.record.remote_checkout_id).toBe("ws_CO_1");
    expect(result.record.updated_at).toBe("2026-03-01T10:01:00.000Z");
    expect(applied).toHaveLength(1);
    expect(applied[0]?.previousStatus).toBe("queued");
    expect(applied[0]?.source).toBe("dispatch");
  });

  it("refuses transitions the state machine does not allow", async () => {
    const { transitions } = await setup(makeRecord());

    const result = await transitions.transition("chk_test_1", { next: "failed", source: "callback" });

    expect(result).toMatchObject({ applied: false, reason: "not_allowed" });
    expect(result.record.status).toBe("queued");
  });

  it("treats a repeated status as a no-op", async () => {
    const { transitions, applied } = await setup(makeRecord({ status: "pending" }));

    const result = await transitions.transition("chk_test_1", { next: "pending", source: "poll" });

    expect(result).toMatchObject({ applied: false, reason: "same_status" });
    expect(applied).toHaveLength(0);
  });

  it("never moves a terminal record", async () => {
    const { transitions } = await setup(makeRecord({ status: "failed", error_detail: "payment failed" }));

    const result = await transitions.transition("chk_test_1", { next: "timeout", source: "sweeper" });

    expect(result).toMatchObject({ applied: false, reason: "already_terminal" });
    expect(result.record.error_detail).toBe("payment failed");
  });

  it("credits the balance exactly once when completing", async () => {
    const credit = new InMemoryBalanceCredit({ basic: 100, premium: 1000 });
    const { transitions, repository } = await setup(makeRecord({ status: "pending" }), credit);

    const first = await transitions.transition("chk_test_1", {
      next: "completed",
      source: "callback",
      reference: "REF123",
    });
    const second = await transitions.transition("chk_test_1", {
      next: "completed",
      source: "poll",
      reference: "REF123",
    });

    expect(first.applied).toBe(true);
    expect(first.record).toMatchObject({
      status: "completed",
      credit_state: "credited",
      credit_attempts: 1,
      reference: "REF123",
      error_detail: null,
    });
    expect(second).toMatchObject({ applied: false, reason: "already_terminal" });
    expect(credit.balanceOf("user_1")).toBe(100);
    expect(credit.entries()).toHaveLength(1);
    expect((await repository.getByCheckoutId("chk_test_1"))?.status).toBe("completed");
  });

  it("keeps a confirmed payment non-terminal when the credit hook fails", async () => {
    const hook = new FlakyBalanceCredit(1);
    const { transitions } = await setup(makeRecord({ status: "pending" }), hook);

    const result = await transitions.transition("chk_test_1", {
      next: "completed",
      source: "callback",
      reference: "REF123",
    });

    expect(result).toMatchObject({ applied: false, reason: "credit_failed" });
    expect(result.record).toMatchObject({
      status: "pending",
      credit_state: "retry_pending",
      credit_attempts: 1,
      reference: "REF123",
      error_detail: "balance credit failed: account service unavailable",
    });
  });

  it("blocks failure outcomes once the gateway has confirmed payment", async () => {
    const { transitions } = await setup(
      makeRecord({ status: "pending", credit_state: "retry_pending", credit_attempts: 1 }),
    );

    const timeout = await transitions.transition("chk_test_1", { next: "timeout", source: "sweeper" });
    const cancel = await transitions.transition("chk_test_1", { next: "cancelled", source: "client_cancel" });

    expect(timeout).toMatchObject({ applied: false, reason: "credit_in_progress" });
    expect(cancel).toMatchObject({ applied: false, reason: "credit_in_progress" });
  });

  it("completes on a later retry and clears the failure detail", async () => {
    const hook = new FlakyBalanceCredit(1);
    const { transitions, clock } = await setup(makeRecord({ status: "pending" }), hook);

    const failed = await transitions.transition("chk_test_1", { next: "completed", source: "callback" });
    clock.advanceSeconds(30);
    const retried = await transitions.retryCredit(failed.record);

    expect(retried.applied).toBe(true);
    expect(retried.record).toMatchObject({
      status: "completed",
      credit_state: "credited",
      credit_attempts: 2,
      error_detail: null,
    });
    expect(hook.calls).toHaveLength(2);
  });

  it("gives up with an error status after the configured number of credit attempts", async () => {
    const hook = new FlakyBalanceCredit(10);
    const { transitions, clock } = await setup(makeRecord({ status: "pending" }), hook, 2);

    const first = await transitions.transition("chk_test_1", { next: "completed", source: "callback" });
    clock.advanceSeconds(30);
    const second = await transitions.retryCredit(first.record);

    expect(second.applied).toBe(true);
    expect(second.record.status).toBe("error");
    expect(second.record.credit_attempts).toBe(2);
    expect(second.record.error_detail).toBe(
      "balance credit failed: account service unavailable (gave up after 2 attempts)",
    );
  });

  it("does not retry a credit claimed by someone else since it was read", async () => {
    const hook = new FlakyBalanceCredit(1);
    const { transitions, clock, repository } = await setup(makeRecord({ status: "pending" }), hook);

    const failed = await transitions.transition("chk_test_1", { next: "completed", source: "callback" });
    await repository.compareAndSet(
      "chk_test_1",
      { status: "pending", creditState: "retry_pending" },
      { updated_at: "2026-03-01T10:05:00.000Z" },
    );
    clock.advanceSeconds(30);
    const retried = await transitions.retryCredit(failed.record);

    expect(retried).toMatchObject({ applied: false, reason: "contended" });
    expect(hook.calls).toHaveLength(1);
  });

  it("throws for unknown transactions", async () => {
    const { transitions } = await setup(makeRecord());

    await expect(
      transitions.transition("chk_missing", { next: "processing", source: "dispatch" }),
    ).rejects.toMatchObject({ statusCode: 404, code: "unknown_transaction" });
  });
});
