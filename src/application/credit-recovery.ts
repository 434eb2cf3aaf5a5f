import { isoSecondsAgo, type ClockPort } from "../infra/clock.js";
import { errorMessage, type EngineLogger } from "../infra/logger.js";
import type { TransactionRepositoryPort } from "../ports/transaction-repository.js";
import type { TransitionService } from "./transition-service.js";

interface CreditRecoveryOptions {
  retryDelaySeconds: number;
  batchSize?: number;
}

/**
 * Finishes credits that a crash interrupted (`in_flight`) or that failed (`retry_pending`).
 * Only records untouched for the retry delay are picked up, so a credit still running elsewhere is left alone.
 */
export class CreditRecovery {
  constructor(
    private readonly repository: TransactionRepositoryPort,
    private readonly transitions: TransitionService,
    private readonly clock: ClockPort,
    private readonly logger: EngineLogger,
    private readonly options: CreditRecoveryOptions,
  ) {}

  async recoverOnce(): Promise<number> {
    const pending = await this.repository.listCreditsToRecover({
      updatedBefore: isoSecondsAgo(this.clock, this.options.retryDelaySeconds),
      limit: this.options.batchSize ?? 100,
    });

    let settled = 0;
    for (const record of pending) {
      try {
        const result = await this.transitions.retryCredit(record);
        if (result.applied) {
          settled += 1;
        }
      } catch (error) {
        this.logger.error({ checkout_id: record.checkout_id, err: errorMessage(error) }, "credit recovery failed");
      }
    }
    return settled;
  }
}
