import type { Pool } from "pg";
import type {
  CreditState,
  TransactionPatch,
  TransactionRecord,
  TransactionStatus,
} from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type {
  AwaitingConfirmationInput,
  CompareAndSetExpectation,
  CreditRecoveryInput,
  LiveDuplicateQuery,
  StaleTransactionInput,
  StatusScanInput,
  TransactionListInput,
  TransactionListResult,
  TransactionRepositoryPort,
} from "../../ports/transaction-repository.js";

interface TransactionRow {
  checkout_id: string;
  remote_checkout_id: string | null;
  owner_reference: string;
  amount: unknown;
  plan_reference: string;
  msisdn: string | null;
  status: TransactionStatus;
  error_detail: string | null;
  reference: string | null;
  credit_state: CreditState;
  credit_attempts: unknown;
  created_at: unknown;
  updated_at: unknown;
}

const COLUMNS = `
  checkout_id,
  remote_checkout_id,
  owner_reference,
  amount,
  plan_reference,
  msisdn,
  status,
  error_detail,
  reference,
  credit_state,
  credit_attempts,
  created_at,
  updated_at
`;

const PATCHABLE_COLUMNS = [
  "remote_checkout_id",
  "status",
  "error_detail",
  "reference",
  "credit_state",
  "credit_attempts",
  "updated_at",
] as const satisfies ReadonlyArray<keyof TransactionPatch>;

function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function toNumber(value: unknown, field: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new AppError(500, "persistence_mapping_error", `Unable to map numeric field '${field}'.`);
  }
  return parsed;
}

function mapRow(row: TransactionRow): TransactionRecord {
  return {
    checkout_id: row.checkout_id,
    remote_checkout_id: row.remote_checkout_id,
    owner_reference: row.owner_reference,
    amount: toNumber(row.amount, "amount"),
    plan_reference: row.plan_reference,
    msisdn: row.msisdn,
    status: row.status,
    error_detail: row.error_detail,
    reference: row.reference,
    credit_state: row.credit_state,
    credit_attempts: toNumber(row.credit_attempts, "credit_attempts"),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

/**
 * Transactions in `momo_transactions`. Every status change is a single conditional
 * `UPDATE … WHERE status = … AND credit_state = … RETURNING`, so the row lock taken by
 * the update is the only serialization point per checkout.
 */
export class PostgresTransactionRepository implements TransactionRepositoryPort {
  constructor(private readonly pool: Pool) {}

  async insert(record: TransactionRecord): Promise<void> {
    const result = await this.pool.query(
      `
        INSERT INTO momo_transactions (
          checkout_id,
          remote_checkout_id,
          owner_reference,
          amount,
          plan_reference,
          msisdn,
          status,
          error_detail,
          reference,
          credit_state,
          credit_attempts,
          created_at,
          updated_at
        )
        VALUES ($1, $2, $3, $4::bigint, $5, $6, $7, $8, $9, $10, $11, $12::timestamptz, $13::timestamptz)
        ON CONFLICT (checkout_id) DO NOTHING
      `,
      [
        record.checkout_id,
        record.remote_checkout_id,
        record.owner_reference,
        record.amount,
        record.plan_reference,
        record.msisdn,
        record.status,
        record.error_detail,
        record.reference,
        record.credit_state,
        record.credit_attempts,
        record.created_at,
        record.updated_at,
      ],
    );
    if (result.rowCount === 0) {
      throw new AppError(409, "duplicate_checkout_id", `Transaction '${record.checkout_id}' already exists.`);
    }
  }

  async getByCheckoutId(checkoutId: string): Promise<TransactionRecord | null> {
    const result = await this.pool.query<TransactionRow>(
      `SELECT ${COLUMNS} FROM momo_transactions WHERE checkout_id = $1`,
      [checkoutId],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async getByRemoteCheckoutId(remoteCheckoutId: string): Promise<TransactionRecord | null> {
    const result = await this.pool.query<TransactionRow>(
      `SELECT ${COLUMNS} FROM momo_transactions WHERE remote_checkout_id = $1 LIMIT 1`,
      [remoteCheckoutId],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async compareAndSet(
    checkoutId: string,
    expected: CompareAndSetExpectation,
    patch: TransactionPatch,
  ): Promise<TransactionRecord | null> {
    const assignments: string[] = [];
    const values: unknown[] = [checkoutId, expected.status, expected.creditState];
    for (const column of PATCHABLE_COLUMNS) {
      const value = patch[column];
      if (value === undefined) {
        continue;
      }
      values.push(value);
      const cast = column === "updated_at" ? "::timestamptz" : "";
      assignments.push(`${column} = $${values.length}${cast}`);
    }
    if (assignments.length === 0) {
      return this.getByCheckoutId(checkoutId);
    }

    let fence = "";
    if (expected.updatedAt !== undefined) {
      values.push(expected.updatedAt);
      fence = `AND updated_at = $${values.length}::timestamptz`;
    }

    const result = await this.pool.query<TransactionRow>(
      `
        UPDATE momo_transactions
        SET ${assignments.join(", ")}
        WHERE checkout_id = $1
          AND status = $2
          AND credit_state = $3
          ${fence}
        RETURNING ${COLUMNS}
      `,
      values,
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async findLiveDuplicate(query: LiveDuplicateQuery): Promise<TransactionRecord | null> {
    const result = await this.pool.query<TransactionRow>(
      `
        SELECT ${COLUMNS}
        FROM momo_transactions
        WHERE owner_reference = $1
          AND amount = $2::bigint
          AND plan_reference = $3
          AND status IN ('queued', 'processing', 'pending')
          AND created_at >= $4::timestamptz
        ORDER BY created_at DESC
        LIMIT 1
      `,
      [query.ownerReference, query.amount, query.planReference, query.createdAfter],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async listByStatus(input: StatusScanInput): Promise<TransactionRecord[]> {
    return this.scan("status = ANY($1::text[])", [[...input.statuses]], input.limit);
  }

  async listAwaitingConfirmation(input: AwaitingConfirmationInput): Promise<TransactionRecord[]> {
    return this.scan(
      `status = ANY($1::text[])
        AND remote_checkout_id IS NOT NULL
        AND credit_state = 'none'
        AND updated_at < $2::timestamptz`,
      [[...input.statuses], input.updatedBefore],
      input.limit,
    );
  }

  async listStale(input: StaleTransactionInput): Promise<TransactionRecord[]> {
    return this.scan(
      "status = ANY($1::text[]) AND created_at < $2::timestamptz",
      [[...input.statuses], input.createdBefore],
      input.limit,
    );
  }

  async listCreditsToRecover(input: CreditRecoveryInput): Promise<TransactionRecord[]> {
    return this.scan(
      `credit_state IN ('in_flight', 'retry_pending')
        AND status IN ('queued', 'processing', 'pending')
        AND updated_at < $1::timestamptz`,
      [input.updatedBefore],
      input.limit,
    );
  }

  async listTransactions(input: TransactionListInput): Promise<TransactionListResult> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (input.ownerReference) {
      values.push(input.ownerReference);
      conditions.push(`owner_reference = $${values.length}`);
    }
    if (input.status) {
      values.push(input.status);
      conditions.push(`status = $${values.length}`);
    }
    if (input.cursor) {
      const anchor = await this.getByCheckoutId(input.cursor);
      if (!anchor) {
        throw new AppError(400, "invalid_cursor", "cursor not found for current collection.");
      }
      values.push(anchor.created_at, anchor.checkout_id);
      conditions.push(`(created_at, checkout_id) < ($${values.length - 1}::timestamptz, $${values.length})`);
    }

    const limit = Math.max(1, input.limit);
    values.push(limit + 1);
    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const result = await this.pool.query<TransactionRow>(
      `
        SELECT ${COLUMNS}
        FROM momo_transactions
        ${whereClause}
        ORDER BY created_at DESC, checkout_id DESC
        LIMIT $${values.length}
      `,
      values,
    );

    const rows = result.rows.map((row) => mapRow(row));
    const hasMore = rows.length > limit;
    const page = rows.slice(0, limit);
    const nextCursor = hasMore ? page.at(-1)?.checkout_id : undefined;
    return {
      data: page,
      hasMore,
      ...(nextCursor ? { nextCursor } : {}),
    };
  }

  private async scan(whereClause: string, values: unknown[], limit: number): Promise<TransactionRecord[]> {
    values.push(Math.max(1, limit));
    const result = await this.pool.query<TransactionRow>(
      `
        SELECT ${COLUMNS}
        FROM momo_transactions
        WHERE ${whereClause}
        ORDER BY created_at ASC, checkout_id ASC
        LIMIT $${values.length}
      `,
      values,
    );
    return result.rows.map((row) => mapRow(row));
  }
}
