import { randomUUID } from "node:crypto";
import { AppError } from "../../infra/app-error.js";

/** The one call the lock makes; a `pg` Pool satisfies it. */
export interface LeaseLockExecutor {
  query(text: string, values: unknown[]): Promise<{ rowCount: number | null }>;
}

export interface PostgresLeaseLockOptions {
  leaseSeconds: number;
  waitMs: number;
  retryMs?: number;
  nowMs?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Exclusive locks kept as rows in `momo_locks`. Acquiring and releasing are single statements,
 * so no pool client stays checked out while the guarded operation runs. A lease left behind by a
 * crashed holder can be taken over once it expires.
 */
export class PostgresLeaseLock {
  private readonly retryMs: number;
  private readonly nowMs: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly executor: LeaseLockExecutor,
    private readonly options: PostgresLeaseLockOptions,
  ) {
    this.retryMs = options.retryMs ?? 25;
    this.nowMs = options.nowMs ?? (() => Date.now());
    this.sleep = options.sleep ?? defaultSleep;
  }

  async withLock<TOutput>(scope: string, key: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    const owner = randomUUID();
    await this.acquire(scope, key, owner);
    try {
      return await operation();
    } finally {
      await this.executor.query(
        `
          DELETE FROM momo_locks
          WHERE scope = $1
            AND key = $2
            AND owner = $3
        `,
        [scope, key, owner],
      );
    }
  }

  private async acquire(scope: string, key: string, owner: string): Promise<void> {
    const deadline = this.nowMs() + this.options.waitMs;
    for (;;) {
      if (await this.tryAcquire(scope, key, owner)) {
        return;
      }
      if (this.nowMs() >= deadline) {
        throw new AppError(503, "lock_timeout", `Timed out waiting for lock '${scope}:${key}'.`);
      }
      await this.sleep(this.retryMs);
    }
  }

  private async tryAcquire(scope: string, key: string, owner: string): Promise<boolean> {
    const nowMs = this.nowMs();
    const result = await this.executor.query(
      `
        INSERT INTO momo_locks (scope, key, owner, expires_at)
        VALUES ($1, $2, $3, $4::timestamptz)
        ON CONFLICT (scope, key) DO UPDATE
          SET owner = EXCLUDED.owner,
              expires_at = EXCLUDED.expires_at
          WHERE momo_locks.expires_at <= $5::timestamptz
      `,
      [
        scope,
        key,
        owner,
        new Date(nowMs + this.options.leaseSeconds * 1000).toISOString(),
        new Date(nowMs).toISOString(),
      ],
    );
    return result.rowCount === 1;
  }
}
