import type {
  TransactionRecord,
  TransactionResponse,
  TransactionStatusResponse,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { TransactionListInput, TransactionRepositoryPort } from "../ports/transaction-repository.js";

export interface TransactionPage {
  data: TransactionResponse[];
  hasMore: boolean;
  nextCursor?: string;
}

export function mapStatus(record: TransactionRecord): TransactionStatusResponse {
  return {
    checkout_id: record.checkout_id,
    status: record.status,
    ...(record.error_detail ? { error_detail: record.error_detail } : {}),
    ...(record.reference ? { reference: record.reference } : {}),
    updated_at: record.updated_at,
  };
}

function mapTransaction(record: TransactionRecord): TransactionResponse {
  return {
    checkout_id: record.checkout_id,
    remote_checkout_id: record.remote_checkout_id,
    owner_reference: record.owner_reference,
    amount: record.amount,
    plan_reference: record.plan_reference,
    status: record.status,
    error_detail: record.error_detail,
    reference: record.reference,
    created_at: record.created_at,
    updated_at: record.updated_at,
  };
}

/** Read side for polling clients. Reads straight from the store; never calls the gateway. */
export class StatusQuery {
  constructor(private readonly repository: TransactionRepositoryPort) {}

  async getStatus(checkoutId: string): Promise<TransactionStatusResponse> {
    const record = await this.repository.getByCheckoutId(checkoutId);
    if (!record) {
      throw new AppError(404, "not_found", `Transaction '${checkoutId}' not found.`);
    }
    return mapStatus(record);
  }

  async listTransactions(input: TransactionListInput): Promise<TransactionPage> {
    const page = await this.repository.listTransactions(input);
    return {
      data: page.data.map((record) => mapTransaction(record)),
      hasMore: page.hasMore,
      ...(page.nextCursor ? { nextCursor: page.nextCursor } : {}),
    };
  }
}
