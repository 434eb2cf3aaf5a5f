import type { Pool } from "pg";
import type {
  IdempotencyRecord,
  IdempotencyStorePort,
} from "../../ports/idempotency-store.js";
import { PostgresLeaseLock } from "./lease-lock.js";

interface PostgresIdempotencyStoreOptions {
  ttlSeconds: number;
  lockLeaseSeconds: number;
  lockWaitMs: number;
}

function mapTimestamp(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Replay records in `momo_idempotency_keys`; `withKeyLock` is a lease row in `momo_locks`, which
 * also serializes dedup checks and dispatch claims across instances.
 */
export class PostgresIdempotencyStore implements IdempotencyStorePort {
  private readonly locks: PostgresLeaseLock;

  constructor(
    private readonly pool: Pool,
    private readonly options: PostgresIdempotencyStoreOptions,
  ) {
    this.locks = new PostgresLeaseLock(pool, {
      leaseSeconds: options.lockLeaseSeconds,
      waitMs: options.lockWaitMs,
    });
  }

  async get<TBody>(scope: string, key: string): Promise<IdempotencyRecord<TBody> | null> {
    const result = await this.pool.query<{
      fingerprint: string;
      status_code: number;
      body: TBody;
      created_at: unknown;
      expires_at: unknown;
    }>(
      `
        SELECT fingerprint, status_code, body, created_at, expires_at
        FROM momo_idempotency_keys
        WHERE scope = $1
          AND key = $2
      `,
      [scope, key],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }

    if (Date.parse(mapTimestamp(row.expires_at)) <= Date.now()) {
      await this.pool.query(
        `
          DELETE FROM momo_idempotency_keys
          WHERE scope = $1
            AND key = $2
        `,
        [scope, key],
      );
      return null;
    }

    return {
      fingerprint: row.fingerprint,
      statusCode: row.status_code,
      body: row.body,
      createdAt: mapTimestamp(row.created_at),
    };
  }

  async put<TBody>(scope: string, key: string, record: IdempotencyRecord<TBody>): Promise<void> {
    const expiresAtMs = Date.parse(record.createdAt) + this.options.ttlSeconds * 1000;
    const expiresAt = new Date(expiresAtMs).toISOString();
    await this.pool.query(
      `
        INSERT INTO momo_idempotency_keys (
          scope,
          key,
          fingerprint,
          status_code,
          body,
          created_at,
          expires_at
        )
        VALUES ($1, $2, $3, $4, $5::jsonb, $6::timestamptz, $7::timestamptz)
        ON CONFLICT (scope, key) DO NOTHING
      `,
      [
        scope,
        key,
        record.fingerprint,
        record.statusCode,
        JSON.stringify(record.body),
        record.createdAt,
        expiresAt,
      ],
    );
  }

  async withKeyLock<TOutput>(
    scope: string,
    key: string,
    operation: () => Promise<TOutput>,
  ): Promise<TOutput> {
    return this.locks.withLock(scope, key, operation);
  }
}
