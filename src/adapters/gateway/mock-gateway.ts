import { randomUUID } from "node:crypto";
import type { GatewayOutcome } from "../../domain/types.js";
import type {
  CheckoutRequestInput,
  CheckoutRequestResult,
  CheckoutStatusResult,
  PaymentGatewayPort,
} from "../../ports/payment-gateway.js";

export const MOCK_UNAVAILABLE_MSISDN = "0700000001";
export const MOCK_REJECTED_MSISDN = "0700000002";
export const MOCK_INSTANT_SUCCESS_MSISDN = "0700000003";

interface SettledCheckout {
  outcome: GatewayOutcome;
  reference?: string;
}

/** Development gateway: accepts every STK push except a few reserved subscriber numbers. */
export class MockMobileMoneyGateway implements PaymentGatewayPort {
  public readonly name = "mock_gateway";
  private readonly checkouts = new Map<string, SettledCheckout>();

  async requestCheckout(input: CheckoutRequestInput): Promise<CheckoutRequestResult> {
    if (input.msisdn === MOCK_UNAVAILABLE_MSISDN) {
      return { kind: "unavailable", code: "gateway_unavailable", message: "Mock gateway is unavailable." };
    }
    if (input.msisdn === MOCK_REJECTED_MSISDN) {
      return { kind: "rejected", code: "gateway_rejected", message: "Mock gateway rejected the subscriber." };
    }

    const remoteCheckoutId = `ws_CO_${randomUUID()}`;
    if (input.msisdn === MOCK_INSTANT_SUCCESS_MSISDN) {
      const reference = `MOCK${randomUUID().slice(0, 8).toUpperCase()}`;
      this.checkouts.set(remoteCheckoutId, { outcome: "completed", reference });
      return { kind: "completed", remoteCheckoutId, reference };
    }

    this.checkouts.set(remoteCheckoutId, { outcome: "pending" });
    return { kind: "accepted", remoteCheckoutId };
  }

  async queryCheckoutStatus(remoteCheckoutId: string): Promise<CheckoutStatusResult> {
    const checkout = this.checkouts.get(remoteCheckoutId);
    if (!checkout) {
      return { kind: "outcome", outcome: "error", message: `Unknown checkout '${remoteCheckoutId}'.` };
    }
    return {
      kind: "outcome",
      outcome: checkout.outcome,
      ...(checkout.reference ? { reference: checkout.reference } : {}),
    };
  }

  settle(remoteCheckoutId: string, outcome: GatewayOutcome, reference?: string): void {
    this.checkouts.set(remoteCheckoutId, { outcome, ...(reference ? { reference } : {}) });
  }
}
