import type { QueuedPaymentMessage, RequestQueuePort } from "../../ports/request-queue.js";

interface PendingPull {
  resolve: (message: QueuedPaymentMessage | null) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Process-local FIFO. Receipts are not tracked: a delivery whose dispatch failed leaves its record
 * `queued`, and `requeueStranded` or the timeout sweeper picks it up from the store.
 */
export class InMemoryRequestQueue implements RequestQueuePort {
  private readonly items: string[] = [];
  private readonly waiters: PendingPull[] = [];
  private sequence = 0;
  private closed = false;

  async push(checkoutId: string): Promise<void> {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(this.deliver(checkoutId));
      return;
    }
    this.items.push(checkoutId);
  }

  async pull(blockMs: number): Promise<QueuedPaymentMessage | null> {
    const next = this.items.shift();
    if (next !== undefined) {
      return this.deliver(next);
    }
    if (blockMs <= 0 || this.closed) {
      return null;
    }
    return new Promise<QueuedPaymentMessage | null>((resolve) => {
      const waiter: PendingPull = {
        resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          resolve(null);
        }, blockMs),
      };
      this.waiters.push(waiter);
    });
  }

  async ack(_message: QueuedPaymentMessage): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }

  size(): number {
    return this.items.length;
  }

  private deliver(checkoutId: string): QueuedPaymentMessage {
    this.sequence += 1;
    return { checkoutId, receipt: `mem-${this.sequence}` };
  }
}
