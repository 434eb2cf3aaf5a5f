import type { TransactionPatch, TransactionRecord } from "../../domain/types.js";
import { isTerminalStatus } from "../../domain/state-machine.js";
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

function byCreatedAtAsc(a: TransactionRecord, b: TransactionRecord): number {
  const byCreatedAt = a.created_at.localeCompare(b.created_at);
  return byCreatedAt !== 0 ? byCreatedAt : a.checkout_id.localeCompare(b.checkout_id);
}

function isBefore(value: string, bound: string): boolean {
  const valueMs = Date.parse(value);
  const boundMs = Date.parse(bound);
  return Number.isFinite(valueMs) && Number.isFinite(boundMs) && valueMs < boundMs;
}

export class InMemoryTransactionRepository implements TransactionRepositoryPort {
  private readonly transactions = new Map<string, TransactionRecord>();
  private readonly remoteIndex = new Map<string, string>();

  async insert(record: TransactionRecord): Promise<void> {
    if (this.transactions.has(record.checkout_id)) {
      throw new AppError(409, "duplicate_checkout_id", `Transaction '${record.checkout_id}' already exists.`);
    }
    this.transactions.set(record.checkout_id, { ...record });
    if (record.remote_checkout_id) {
      this.remoteIndex.set(record.remote_checkout_id, record.checkout_id);
    }
  }

  async getByCheckoutId(checkoutId: string): Promise<TransactionRecord | null> {
    const record = this.transactions.get(checkoutId);
    return record ? { ...record } : null;
  }

  async getByRemoteCheckoutId(remoteCheckoutId: string): Promise<TransactionRecord | null> {
    const checkoutId = this.remoteIndex.get(remoteCheckoutId);
    if (!checkoutId) {
      return null;
    }
    return this.getByCheckoutId(checkoutId);
  }

  async compareAndSet(
    checkoutId: string,
    expected: CompareAndSetExpectation,
    patch: TransactionPatch,
  ): Promise<TransactionRecord | null> {
    const current = this.transactions.get(checkoutId);
    if (!current) {
      return null;
    }
    if (current.status !== expected.status || current.credit_state !== expected.creditState) {
      return null;
    }
    if (expected.updatedAt !== undefined && current.updated_at !== expected.updatedAt) {
      return null;
    }
    const updated: TransactionRecord = { ...current, ...patch };
    this.transactions.set(checkoutId, updated);
    if (updated.remote_checkout_id && updated.remote_checkout_id !== current.remote_checkout_id) {
      this.remoteIndex.set(updated.remote_checkout_id, checkoutId);
    }
    return { ...updated };
  }

  async findLiveDuplicate(query: LiveDuplicateQuery): Promise<TransactionRecord | null> {
    for (const record of this.transactions.values()) {
      if (
        record.owner_reference === query.ownerReference
        && record.amount === query.amount
        && record.plan_reference === query.planReference
        && !isTerminalStatus(record.status)
        && !isBefore(record.created_at, query.createdAfter)
      ) {
        return { ...record };
      }
    }
    return null;
  }

  async listByStatus(input: StatusScanInput): Promise<TransactionRecord[]> {
    return this.scan((record) => input.statuses.includes(record.status), input.limit);
  }

  async listAwaitingConfirmation(input: AwaitingConfirmationInput): Promise<TransactionRecord[]> {
    return this.scan(
      (record) =>
        input.statuses.includes(record.status)
        && record.remote_checkout_id !== null
        && record.credit_state === "none"
        && isBefore(record.updated_at, input.updatedBefore),
      input.limit,
    );
  }

  async listStale(input: StaleTransactionInput): Promise<TransactionRecord[]> {
    return this.scan(
      (record) => input.statuses.includes(record.status) && isBefore(record.created_at, input.createdBefore),
      input.limit,
    );
  }

  async listCreditsToRecover(input: CreditRecoveryInput): Promise<TransactionRecord[]> {
    return this.scan(
      (record) =>
        (record.credit_state === "in_flight" || record.credit_state === "retry_pending")
        && !isTerminalStatus(record.status)
        && isBefore(record.updated_at, input.updatedBefore),
      input.limit,
    );
  }

  async listTransactions(input: TransactionListInput): Promise<TransactionListResult> {
    const items = [...this.transactions.values()]
      .filter((record) => {
        if (input.ownerReference && record.owner_reference !== input.ownerReference) {
          return false;
        }
        if (input.status && record.status !== input.status) {
          return false;
        }
        return true;
      })
      .sort((a, b) => byCreatedAtAsc(b, a));

    const limit = Math.max(1, input.limit);
    let startIndex = 0;
    if (input.cursor) {
      const cursorIndex = items.findIndex((item) => item.checkout_id === input.cursor);
      if (cursorIndex < 0) {
        throw new AppError(400, "invalid_cursor", "cursor not found for current collection.");
      }
      startIndex = cursorIndex + 1;
    }

    const page = items.slice(startIndex, startIndex + limit);
    const hasMore = startIndex + page.length < items.length;
    const nextCursor = hasMore ? page.at(-1)?.checkout_id : undefined;

    return {
      data: page.map((record) => ({ ...record })),
      hasMore,
      ...(nextCursor ? { nextCursor } : {}),
    };
  }

  private scan(predicate: (record: TransactionRecord) => boolean, limit: number): TransactionRecord[] {
    return [...this.transactions.values()]
      .filter(predicate)
      .sort(byCreatedAtAsc)
      .slice(0, Math.max(1, limit))
      .map((record) => ({ ...record }));
  }
}
