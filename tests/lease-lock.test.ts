import { describe, expect, it } from "vitest";
import { PostgresLeaseLock, type LeaseLockExecutor } from "../src/adapters/postgres/lease-lock.js";

interface LeaseRow {
  owner: string;
  expiresAt: string;
}

/** Applies the lock statements to a Map the way PostgreSQL applies them to `momo_locks`. */
class LockTable implements LeaseLockExecutor {
  public readonly rows = new Map<string, LeaseRow>();
  public readonly statements: string[] = [];

  async query(text: string, values: unknown[]): Promise<{ rowCount: number | null }> {
    const id = `${String(values[0])}:${String(values[1])}`;
    const owner = String(values[2]);
    const existing = this.rows.get(id);

    if (text.includes("INSERT INTO momo_locks")) {
      this.statements.push("acquire");
      const expiresAt = String(values[3]);
      const now = String(values[4]);
      if (existing && existing.expiresAt > now) {
        return { rowCount: 0 };
      }
      this.rows.set(id, { owner, expiresAt });
      return { rowCount: 1 };
    }

    this.statements.push("release");
    if (existing?.owner === owner) {
      this.rows.delete(id);
      return { rowCount: 1 };
    }
    return { rowCount: 0 };
  }
}

const START_MS = Date.parse("2026-03-01T10:00:00.000Z");

function lockWith(table: LockTable, sleep?: (ms: number) => Promise<void>, nowMs: () => number = () => START_MS) {
  return new PostgresLeaseLock(table, {
    leaseSeconds: 300,
    waitMs: 100,
    retryMs: 25,
    nowMs,
    ...(sleep ? { sleep } : {}),
  });
}

describe("PostgresLeaseLock", () => {
  it("holds a lease row only while the operation runs", async () => {
    const table = new LockTable();
    const lock = lockWith(table);

    const result = await lock.withLock("dispatch", "chk_1", async () => {
      expect(table.rows.get("dispatch:chk_1")?.expiresAt).toBe("2026-03-01T10:05:00.000Z");
      return "done";
    });

    expect(result).toBe("done");
    expect(table.rows.size).toBe(0);
    expect(table.statements).toEqual(["acquire", "release"]);
  });

  it("releases the lease when the operation throws", async () => {
    const table = new LockTable();
    const lock = lockWith(table);

    await expect(
      lock.withLock("dispatch", "chk_1", async () => {
        throw new Error("gateway exploded");
      }),
    ).rejects.toThrow("gateway exploded");

    expect(table.rows.size).toBe(0);
  });

  it("makes a second holder wait until the first releases", async () => {
    const table = new LockTable();
    const order: string[] = [];
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const waits: number[] = [];
    const lock = lockWith(table, async (ms) => {
      waits.push(ms);
      openGate();
      await new Promise((resolve) => {
        setTimeout(resolve, 0);
      });
    });

    const first = lock.withLock("enqueue_dedup", "user_1", async () => {
      order.push("first:start");
      await gate;
      order.push("first:end");
    });
    const second = lock.withLock("enqueue_dedup", "user_1", async () => {
      order.push("second");
    });
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(waits).toEqual([25]);
    expect(table.rows.size).toBe(0);
  });

  it("lets different keys proceed independently", async () => {
    const table = new LockTable();
    const lock = lockWith(table, async () => {
      throw new Error("should not wait");
    });

    await lock.withLock("dispatch", "chk_1", async () => {
      await lock.withLock("dispatch", "chk_2", async () => undefined);
    });

    expect(table.statements).toEqual(["acquire", "acquire", "release", "release"]);
  });

  it("takes over a lease whose holder never released it", async () => {
    const table = new LockTable();
    table.rows.set("dispatch:chk_1", { owner: "crashed-worker", expiresAt: "2026-03-01T09:59:00.000Z" });
    const lock = lockWith(table);

    expect(await lock.withLock("dispatch", "chk_1", async () => "recovered")).toBe("recovered");
    expect(table.rows.size).toBe(0);
  });

  it("gives up once the wait budget is spent", async () => {
    const table = new LockTable();
    table.rows.set("dispatch:chk_1", { owner: "other-worker", expiresAt: "2026-03-01T10:05:00.000Z" });
    let nowMs = START_MS;
    const lock = lockWith(
      table,
      async (ms) => {
        nowMs += ms;
      },
      () => nowMs,
    );

    await expect(lock.withLock("dispatch", "chk_1", async () => "never")).rejects.toMatchObject({
      statusCode: 503,
      code: "lock_timeout",
    });
    expect(table.rows.get("dispatch:chk_1")?.owner).toBe("other-worker");
    expect(table.statements).toEqual(["acquire", "acquire", "acquire", "acquire", "acquire"]);
  });
});
