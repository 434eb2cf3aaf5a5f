import { errorMessage, type EngineLogger } from "../infra/logger.js";

interface IntervalTaskOptions {
  name: string;
  intervalMs: number;
  runImmediately?: boolean;
}

/**
 * Runs `tick` every `intervalMs`. A tick that is still running when the next one is due is
 * skipped, and a failing tick is logged; neither stops the schedule.
 */
export class IntervalTask {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly tick: () => Promise<unknown>,
    private readonly logger: EngineLogger,
    private readonly options: IntervalTaskOptions,
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.trigger();
    }, this.options.intervalMs);
    this.timer.unref();
    if (this.options.runImmediately) {
      this.trigger();
    }
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.running;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  private trigger(): void {
    if (this.running) {
      this.logger.debug({ task: this.options.name }, "previous tick still running; skipping");
      return;
    }
    this.running = this.tick()
      .then(() => undefined, (error: unknown) => {
        this.logger.error({ task: this.options.name, err: errorMessage(error) }, "background task failed");
      })
      .finally(() => {
        this.running = null;
      });
  }
}
