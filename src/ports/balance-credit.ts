export interface BalanceCreditInput {
  checkoutId: string;
  ownerReference: string;
  planReference: string;
  amount: number;
}

/** Credits the owner's balance for a confirmed payment. Must be idempotent on `checkoutId`; throws on failure. */
export interface BalanceCreditPort {
  credit(input: BalanceCreditInput): Promise<void>;
}
