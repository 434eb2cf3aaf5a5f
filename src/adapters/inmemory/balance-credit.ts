import { creditUnitsForPlan, type PlanCatalog } from "../../domain/plan-catalog.js";
import type { BalanceCreditInput, BalanceCreditPort } from "../../ports/balance-credit.js";

export interface BalanceCreditEntry extends BalanceCreditInput {
  units: number;
}

export class InMemoryBalanceCredit implements BalanceCreditPort {
  private readonly balances = new Map<string, number>();
  private readonly credited = new Map<string, BalanceCreditEntry>();

  constructor(private readonly catalog: PlanCatalog) {}

  async credit(input: BalanceCreditInput): Promise<void> {
    if (this.credited.has(input.checkoutId)) {
      return;
    }
    const units = creditUnitsForPlan(this.catalog, input.planReference);
    if (units === undefined) {
      throw new Error(`Unknown plan '${input.planReference}'.`);
    }
    this.credited.set(input.checkoutId, { ...input, units });
    this.balances.set(input.ownerReference, (this.balances.get(input.ownerReference) ?? 0) + units);
  }

  balanceOf(ownerReference: string): number {
    return this.balances.get(ownerReference) ?? 0;
  }

  entries(): BalanceCreditEntry[] {
    return [...this.credited.values()];
  }
}
