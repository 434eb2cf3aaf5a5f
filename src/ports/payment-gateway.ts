import type { GatewayOutcome } from "../domain/types.js";

export interface CheckoutRequestInput {
  checkoutId: string;
  msisdn: string | null;
  amount: number;
  callbackUrl: string;
}

export type CheckoutRequestResult =
  | { kind: "accepted"; remoteCheckoutId: string }
  | { kind: "completed"; remoteCheckoutId: string; reference: string }
  | { kind: "rejected"; code: string; message: string }
  | { kind: "unavailable"; code: string; message: string };

export type CheckoutStatusResult =
  | { kind: "outcome"; outcome: GatewayOutcome; reference?: string; message?: string }
  | { kind: "unavailable"; code: string; message: string };

export interface PaymentGatewayPort {
  readonly name: string;
  requestCheckout(input: CheckoutRequestInput): Promise<CheckoutRequestResult>;
  queryCheckoutStatus(remoteCheckoutId: string): Promise<CheckoutStatusResult>;
}
