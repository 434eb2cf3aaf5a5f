import type {
  CreditState,
  TransactionPatch,
  TransactionRecord,
  TransactionStatus,
} from "../domain/types.js";

export interface CompareAndSetExpectation {
  status: TransactionStatus;
  creditState: CreditState;
  /** Also require this exact `updated_at`, to fence stale claims. */
  updatedAt?: string;
}

export interface LiveDuplicateQuery {
  ownerReference: string;
  amount: number;
  planReference: string;
  createdAfter: string;
}

export interface StatusScanInput {
  statuses: readonly TransactionStatus[];
  limit: number;
}

export interface AwaitingConfirmationInput {
  statuses: readonly TransactionStatus[];
  updatedBefore: string;
  limit: number;
}

export interface StaleTransactionInput {
  statuses: readonly TransactionStatus[];
  createdBefore: string;
  limit: number;
}

export interface CreditRecoveryInput {
  updatedBefore: string;
  limit: number;
}

export interface TransactionListInput {
  limit: number;
  cursor?: string;
  ownerReference?: string;
  status?: TransactionStatus;
}

export interface TransactionListResult {
  data: TransactionRecord[];
  hasMore: boolean;
  nextCursor?: string;
}

export interface TransactionRepositoryPort {
  insert(record: TransactionRecord): Promise<void>;
  getByCheckoutId(checkoutId: string): Promise<TransactionRecord | null>;
  getByRemoteCheckoutId(remoteCheckoutId: string): Promise<TransactionRecord | null>;
  /**
   * Applies `patch` only when the stored record still has the expected status and credit state.
   * Returns the updated record, or null when the expectation no longer holds.
   */
  compareAndSet(
    checkoutId: string,
    expected: CompareAndSetExpectation,
    patch: TransactionPatch,
  ): Promise<TransactionRecord | null>;
  findLiveDuplicate(query: LiveDuplicateQuery): Promise<TransactionRecord | null>;
  listByStatus(input: StatusScanInput): Promise<TransactionRecord[]>;
  listAwaitingConfirmation(input: AwaitingConfirmationInput): Promise<TransactionRecord[]>;
  listStale(input: StaleTransactionInput): Promise<TransactionRecord[]>;
  listCreditsToRecover(input: CreditRecoveryInput): Promise<TransactionRecord[]>;
  listTransactions(input: TransactionListInput): Promise<TransactionListResult>;
}
