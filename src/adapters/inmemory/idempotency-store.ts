import type {
  IdempotencyRecord,
  IdempotencyStorePort,
} from "../../ports/idempotency-store.js";
import { SystemClock, clockNowMs, type ClockPort } from "../../infra/clock.js";

interface InMemoryIdempotencyStoreOptions {
  ttlSeconds?: number;
  clock?: ClockPort;
}

interface KeyLock {
  tail: Promise<void>;
  holders: number;
}

function compositeKey(scope: string, key: string): string {
  return `${scope}:${key}`;
}

export class InMemoryIdempotencyStore implements IdempotencyStorePort {
  private readonly records = new Map<string, IdempotencyRecord<unknown>>();
  private readonly locks = new Map<string, KeyLock>();
  private readonly ttlMs: number;
  private readonly clock: ClockPort;

  constructor(options: InMemoryIdempotencyStoreOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? 86400) * 1000;
    this.clock = options.clock ?? new SystemClock();
  }

  async get<TBody>(scope: string, key: string): Promise<IdempotencyRecord<TBody> | null> {
    const id = compositeKey(scope, key);
    const record = this.records.get(id);
    if (!record) {
      return null;
    }
    if (this.isExpired(record.createdAt)) {
      this.records.delete(id);
      return null;
    }
    // Bodies are stored exactly as the owning scope wrote them.
    return record as IdempotencyRecord<TBody>;
  }

  async put<TBody>(scope: string, key: string, record: IdempotencyRecord<TBody>): Promise<void> {
    const id = compositeKey(scope, key);
    if (this.records.has(id)) {
      return;
    }
    this.records.set(id, record);
  }

  async withKeyLock<TOutput>(
    scope: string,
    key: string,
    operation: () => Promise<TOutput>,
  ): Promise<TOutput> {
    const id = compositeKey(scope, key);
    const lock = this.locks.get(id) ?? { tail: Promise.resolve(), holders: 0 };
    this.locks.set(id, lock);
    lock.holders += 1;

    let release: () => void = () => {};
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = lock.tail;
    lock.tail = previous.then(() => released);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      lock.holders -= 1;
      if (lock.holders === 0) {
        this.locks.delete(id);
      }
    }
  }

  private isExpired(createdAt: string): boolean {
    const createdAtMs = Date.parse(createdAt);
    if (!Number.isFinite(createdAtMs)) {
      return true;
    }
    const nowMs = clockNowMs(this.clock);
    if (!Number.isFinite(nowMs)) {
      return false;
    }
    return nowMs - createdAtMs >= this.ttlMs;
  }
}
