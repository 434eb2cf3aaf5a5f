import type { BalanceCreditInput, BalanceCreditPort } from "../../ports/balance-credit.js";

interface HttpBalanceCreditOptions {
  url: string;
  timeoutMs: number;
  apiKey?: string;
  fetchImpl?: typeof fetch;
}

/** Forwards confirmed payments to the account service that owns balances. */
export class HttpBalanceCredit implements BalanceCreditPort {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpBalanceCreditOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async credit(input: BalanceCreditInput): Promise<void> {
    const response = await this.fetchImpl(this.options.url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "Idempotency-Key": input.checkoutId,
        ...(this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {}),
      },
      body: JSON.stringify({
        checkout_id: input.checkoutId,
        owner_reference: input.ownerReference,
        plan_reference: input.planReference,
        amount: input.amount,
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`credit hook responded with status ${response.status}`);
    }
  }
}
