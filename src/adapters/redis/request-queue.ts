import type { Redis } from "ioredis";
import type { QueuedPaymentMessage, RequestQueuePort } from "../../ports/request-queue.js";

interface RedisStreamRequestQueueOptions {
  streamKey: string;
  consumerGroup: string;
  consumerName: string;
}

interface StreamEntry {
  id: string;
  checkoutId: string | undefined;
}

function fieldValue(fields: unknown[], name: string): string | undefined {
  for (let index = 0; index < fields.length; index += 2) {
    const value = fields[index + 1];
    if (fields[index] === name && typeof value === "string") {
      return value;
    }
  }
  return undefined;
}

/** Reads the first entry out of an XREADGROUP reply: `[[stream, [[id, [field, value, …]], …]], …]`. */
function firstEntry(reply: unknown): StreamEntry | null {
  if (!Array.isArray(reply)) {
    return null;
  }
  for (const stream of reply) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) {
      continue;
    }
    for (const entry of stream[1]) {
      if (Array.isArray(entry) && typeof entry[0] === "string") {
        const fields = Array.isArray(entry[1]) ? entry[1] : [];
        return { id: entry[0], checkoutId: fieldValue(fields, "checkout_id") };
      }
    }
  }
  return null;
}

/**
 * Request queue on a Redis Stream consumer group. Entries stay pending until acked, and a
 * restarted consumer first re-reads its own pending entries before taking new ones.
 */
export class RedisStreamRequestQueue implements RequestQueuePort {
  private readonly consumerRedis: Redis;
  private groupReady: Promise<void> | null = null;
  private pendingCursor: string | null = "0";

  constructor(
    private readonly redis: Redis,
    private readonly options: RedisStreamRequestQueueOptions,
  ) {
    // Blocking reads get their own connection so pushes are never queued behind them.
    this.consumerRedis = this.redis.duplicate();
  }

  async push(checkoutId: string): Promise<void> {
    await this.redis.xadd(this.options.streamKey, "*", "checkout_id", checkoutId);
  }

  async pull(blockMs: number): Promise<QueuedPaymentMessage | null> {
    await this.ensureConsumerGroup();

    for (;;) {
      const entry = await this.readNext(blockMs);
      if (!entry) {
        return null;
      }
      if (entry.checkoutId) {
        return { checkoutId: entry.checkoutId, receipt: entry.id };
      }
      await this.redis.xack(this.options.streamKey, this.options.consumerGroup, entry.id);
    }
  }

  async ack(message: QueuedPaymentMessage): Promise<void> {
    await this.redis.xack(this.options.streamKey, this.options.consumerGroup, message.receipt);
  }

  async close(): Promise<void> {
    await this.consumerRedis.quit();
  }

  private async readNext(blockMs: number): Promise<StreamEntry | null> {
    if (this.pendingCursor !== null) {
      const pending = firstEntry(
        await this.consumerRedis.xreadgroup(
          "GROUP",
          this.options.consumerGroup,
          this.options.consumerName,
          "COUNT",
          "1",
          "STREAMS",
          this.options.streamKey,
          this.pendingCursor,
        ),
      );
      if (pending) {
        this.pendingCursor = pending.id;
        return pending;
      }
      this.pendingCursor = null;
    }

    // BLOCK 0 would wait forever, so a non-positive wait is a plain read.
    const reply =
      blockMs > 0
        ? await this.consumerRedis.xreadgroup(
          "GROUP",
          this.options.consumerGroup,
          this.options.consumerName,
          "COUNT",
          "1",
          "BLOCK",
          String(blockMs),
          "STREAMS",
          this.options.streamKey,
          ">",
        )
        : await this.consumerRedis.xreadgroup(
          "GROUP",
          this.options.consumerGroup,
          this.options.consumerName,
          "COUNT",
          "1",
          "STREAMS",
          this.options.streamKey,
          ">",
        );
    return firstEntry(reply);
  }

  private ensureConsumerGroup(): Promise<void> {
    this.groupReady ??= this.createConsumerGroup().catch((error: unknown) => {
      this.groupReady = null;
      throw error;
    });
    return this.groupReady;
  }

  private async createConsumerGroup(): Promise<void> {
    try {
      await this.redis.xgroup("CREATE", this.options.streamKey, this.options.consumerGroup, "0", "MKSTREAM");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (!message.includes("BUSYGROUP")) {
        throw error;
      }
    }
  }
}
