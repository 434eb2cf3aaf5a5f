import { NON_TERMINAL_STATUSES } from "../domain/types.js";
import { isoSecondsAgo, type ClockPort } from "../infra/clock.js";
import { errorMessage, type EngineLogger } from "../infra/logger.js";
import type { TransactionRepositoryPort } from "../ports/transaction-repository.js";
import type { TransitionService } from "./transition-service.js";

export const TIMEOUT_ERROR_DETAIL = "exceeded maximum processing time";

interface TimeoutSweeperOptions {
  thresholdSeconds: number;
  batchSize?: number;
}

export class TimeoutSweeper {
  constructor(
    private readonly repository: TransactionRepositoryPort,
    private readonly transitions: TransitionService,
    private readonly clock: ClockPort,
    private readonly logger: EngineLogger,
    private readonly options: TimeoutSweeperOptions,
  ) {}

  /** Moves every non-terminal record older than the threshold to `timeout`; returns how many moved. */
  async sweepOnce(): Promise<number> {
    const stale = await this.repository.listStale({
      statuses: NON_TERMINAL_STATUSES,
      createdBefore: isoSecondsAgo(this.clock, this.options.thresholdSeconds),
      limit: this.options.batchSize ?? 500,
    });

    let timedOut = 0;
    for (const record of stale) {
      try {
        const result = await this.transitions.transition(record.checkout_id, {
          next: "timeout",
          source: "sweeper",
          errorDetail: TIMEOUT_ERROR_DETAIL,
        });
        if (result.applied) {
          timedOut += 1;
        }
      } catch (error) {
        this.logger.error({ checkout_id: record.checkout_id, err: errorMessage(error) }, "timeout sweep failed");
      }
    }
    if (timedOut > 0) {
      this.logger.info({ count: timedOut }, "timed out stale transactions");
    }
    return timedOut;
  }
}
