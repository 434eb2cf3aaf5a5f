import type { TransactionStatusResponse } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { TransactionRepositoryPort } from "../ports/transaction-repository.js";
import { mapStatus } from "./status-query.js";
import type { TransitionService } from "./transition-service.js";

export const CLIENT_CANCEL_DETAIL = "cancelled by client request";

/** Client-initiated cancel: one more transition attempt, refused once the record is terminal or being credited. */
export class PaymentCancellation {
  constructor(
    private readonly repository: TransactionRepositoryPort,
    private readonly transitions: TransitionService,
  ) {}

  async cancel(checkoutId: string): Promise<TransactionStatusResponse> {
    const record = await this.repository.getByCheckoutId(checkoutId);
    if (!record) {
      throw new AppError(404, "not_found", `Transaction '${checkoutId}' not found.`);
    }

    const result = await this.transitions.transition(checkoutId, {
      next: "cancelled",
      source: "client_cancel",
      errorDetail: CLIENT_CANCEL_DETAIL,
    });
    if (result.applied) {
      return mapStatus(result.record);
    }

    switch (result.reason) {
      case "already_terminal":
      case "same_status":
        throw new AppError(
          409,
          "transaction_already_terminal",
          `Transaction '${checkoutId}' is already ${result.record.status}.`,
        );
      case "credit_in_progress":
      case "credit_failed":
        throw new AppError(
          409,
          "credit_in_progress",
          `Transaction '${checkoutId}' has been paid and is being credited.`,
        );
      default:
        throw new AppError(
          409,
          "transaction_busy",
          `Transaction '${checkoutId}' changed concurrently; retry the request.`,
        );
    }
  }
}
