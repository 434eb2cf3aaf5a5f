import { describe, expect, it } from "vitest";
import { InMemoryTransactionRepository } from "../src/adapters/inmemory/transaction-repository.js";
import { AppError } from "../src/infra/app-error.js";
import { makeRecord } from "./helpers.js";

describe("InMemoryTransactionRepository", () => {
  it("rejects a second insert with the same checkout id", async () => {
    const repository = new InMemoryTransactionRepository();
    await repository.insert(makeRecord());

    await expect(repository.insert(makeRecord())).rejects.toBeInstanceOf(AppError);
  });

  it("returns copies so callers cannot mutate stored records", async () => {
    const repository = new InMemoryTransactionRepository();
    await repository.insert(makeRecord());

    const loaded = await repository.getByCheckoutId("chk_test_1");
    if (loaded) {
      loaded.status = "completed";
    }

    const reloaded = await repository.getByCheckoutId("chk_test_1");
    expect(reloaded?.status).toBe("queued");
  });

  it("applies a compare-and-set only when status and credit state still match", async () => {
    const repository = new InMemoryTransactionRepository();
    await repository.insert(makeRecord());

    const stale = await repository.compareAndSet(
      "chk_test_1",
      { status: "processing", creditState: "none" },
      { status: "pending" },
    );
    expect(stale).toBeNull();

    const updated = await repository.compareAndSet(
      "chk_test_1",
      { status: "queued", creditState: "none" },
      { status: "processing", remote_checkout_id: "ws_CO_1", updated_at: "2026-03-01T10:00:05.000Z" },
    );
    expect(updated?.status).toBe("processing");
    expect(updated?.remote_checkout_id).toBe("ws_CO_1");

    const byRemote = await repository.getByRemoteCheckoutId("ws_CO_1");
    expect(byRemote?.checkout_id).toBe("chk_test_1");
  });

  it("fences a compare-and-set on updated_at when asked to", async () => {
    const repository = new InMemoryTransactionRepository();
    await repository.insert(
      makeRecord({ status: "pending", credit_state: "retry_pending", updated_at: "2026-03-01T10:01:00.000Z" }),
    );

    const fenced = await repository.compareAndSet(
      "chk_test_1",
      { status: "pending", creditState: "retry_pending", updatedAt: "2026-03-01T10:00:00.000Z" },
      { credit_state: "in_flight" },
    );
    expect(fenced).toBeNull();

    const claimed = await repository.compareAndSet(
      "chk_test_1",
      { status: "pending", creditState: "retry_pending", updatedAt: "2026-03-01T10:01:00.000Z" },
      { credit_state: "in_flight" },
    );
    expect(claimed?.credit_state).toBe("in_flight");
  });

  it("finds live duplicates inside the window only", async () => {
    const repository = new InMemoryTransactionRepository();
    await repository.insert(makeRecord({ checkout_id: "chk_live", created_at: "2026-03-01T10:00:00.000Z" }));
    await repository.insert(
      makeRecord({ checkout_id: "chk_done", status: "completed", created_at: "2026-03-01T10:00:30.000Z" }),
    );

    const duplicate = await repository.findLiveDuplicate({
      ownerReference: "user_1",
      amount: 500,
      planReference: "basic",
      createdAfter: "2026-03-01T09:59:00.000Z",
    });
    expect(duplicate?.checkout_id).toBe("chk_live");

    const outsideWindow = await repository.findLiveDuplicate({
      ownerReference: "user_1",
      amount: 500,
      planReference: "basic",
      createdAfter: "2026-03-01T10:00:10.000Z",
    });
    expect(outsideWindow).toBeNull();

    const otherAmount = await repository.findLiveDuplicate({
      ownerReference: "user_1",
      amount: 600,
      planReference: "basic",
      createdAfter: "2026-03-01T09:59:00.000Z",
    });
    expect(otherAmount).toBeNull();
  });

  it("selects records awaiting confirmation, stale records and credits to recover", async () => {
    const repository = new InMemoryTransactionRepository();
    await repository.insert(
      makeRecord({
        checkout_id: "chk_waiting",
        status: "pending",
        remote_checkout_id: "ws_CO_waiting",
        updated_at: "2026-03-01T10:00:00.000Z",
      }),
    );
    await repository.insert(
      makeRecord({
        checkout_id: "chk_no_remote",
        status: "processing",
        updated_at: "2026-03-01T10:00:00.000Z",
      }),
    );
    await repository.insert(
      makeRecord({
        checkout_id: "chk_crediting",
        status: "pending",
        remote_checkout_id: "ws_CO_crediting",
        credit_state: "retry_pending",
        updated_at: "2026-03-01T10:00:00.000Z",
      }),
    );

    const awaiting = await repository.listAwaitingConfirmation({
      statuses: ["processing", "pending"],
      updatedBefore: "2026-03-01T10:00:30.000Z",
      limit: 10,
    });
    expect(awaiting.map((record) => record.checkout_id)).toEqual(["chk_waiting"]);

    const stale = await repository.listStale({
      statuses: ["queued", "processing", "pending"],
      createdBefore: "2026-03-01T10:03:00.000Z",
      limit: 10,
    });
    expect(stale.map((record) => record.checkout_id)).toEqual(["chk_crediting", "chk_no_remote", "chk_waiting"]);

    const credits = await repository.listCreditsToRecover({
      updatedBefore: "2026-03-01T10:00:30.000Z",
      limit: 10,
    });
    expect(credits.map((record) => record.checkout_id)).toEqual(["chk_crediting"]);
  });

  it("pages transactions newest first with a checkout id cursor", async () => {
    const repository = new InMemoryTransactionRepository();
    await repository.insert(makeRecord({ checkout_id: "chk_a", created_at: "2026-03-01T10:00:00.000Z" }));
    await repository.insert(makeRecord({ checkout_id: "chk_b", created_at: "2026-03-01T10:01:00.000Z" }));
    await repository.insert(
      makeRecord({ checkout_id: "chk_c", owner_reference: "user_2", created_at: "2026-03-01T10:02:00.000Z" }),
    );

    const first = await repository.listTransactions({ limit: 2 });
    expect(first.data.map((record) => record.checkout_id)).toEqual(["chk_c", "chk_b"]);
    expect(first.hasMore).toBe(true);
    expect(first.nextCursor).toBe("chk_b");

    const second = await repository.listTransactions({ limit: 2, cursor: "chk_b" });
    expect(second.data.map((record) => record.checkout_id)).toEqual(["chk_a"]);
    expect(second.hasMore).toBe(false);
    expect(second.nextCursor).toBeUndefined();

    const owned = await repository.listTransactions({ limit: 10, ownerReference: "user_2" });
    expect(owned.data.map((record) => record.checkout_id)).toEqual(["chk_c"]);

    await expect(repository.listTransactions({ limit: 2, cursor: "chk_missing" })).rejects.toMatchObject({
      code: "invalid_cursor",
    });
  });
});
