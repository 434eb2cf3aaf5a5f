import { describe, expect, it } from "vitest";
import { InMemoryRequestQueue } from "../src/adapters/inmemory/request-queue.js";

describe("InMemoryRequestQueue", () => {
  it("delivers messages in push order", async () => {
    const queue = new InMemoryRequestQueue();
    await queue.push("chk_1");
    await queue.push("chk_2");

    const first = await queue.pull(0);
    const second = await queue.pull(0);
    const empty = await queue.pull(0);

    expect(first?.checkoutId).toBe("chk_1");
    expect(second?.checkoutId).toBe("chk_2");
    expect(empty).toBeNull();
  });

  it("does not hold on to deliveries that are never acknowledged", async () => {
    const queue = new InMemoryRequestQueue();
    await queue.push("chk_1");
    await queue.push("chk_2");

    const first = await queue.pull(0);
    const second = await queue.pull(0);
    if (second) {
      await queue.ack(second);
    }

    expect(first).toEqual({ checkoutId: "chk_1", receipt: "mem-1" });
    expect(second).toEqual({ checkoutId: "chk_2", receipt: "mem-2" });
    expect(queue.size()).toBe(0);
    expect(await queue.pull(0)).toBeNull();
  });

  it("hands a push straight to a waiting consumer", async () => {
    const queue = new InMemoryRequestQueue();
    const waiting = queue.pull(1_000);

    await queue.push("chk_late");

    const message = await waiting;
    expect(message?.checkoutId).toBe("chk_late");
    expect(queue.size()).toBe(0);
  });

  it("returns null when the wait elapses", async () => {
    const queue = new InMemoryRequestQueue();
    const message = await queue.pull(5);
    expect(message).toBeNull();
  });

  it("releases waiting consumers on close", async () => {
    const queue = new InMemoryRequestQueue();
    const waiting = queue.pull(60_000);

    await queue.close();

    expect(await waiting).toBeNull();
    expect(await queue.pull(60_000)).toBeNull();
  });
});
