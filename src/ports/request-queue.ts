export interface QueuedPaymentMessage {
  checkoutId: string;
  receipt: string;
}

export interface RequestQueuePort {
  push(checkoutId: string): Promise<void>;
  /** Waits up to `blockMs` for the next message; `0` returns immediately. */
  pull(blockMs: number): Promise<QueuedPaymentMessage | null>;
  ack(message: QueuedPaymentMessage): Promise<void>;
  close?(): Promise<void>;
}
