import { parseGatewayOutcome } from "../../domain/state-machine.js";
import { isPermanentGatewayFailure } from "../../application/gateway-failure-policy.js";
import { errorMessage } from "../../infra/logger.js";
import type {
  CheckoutRequestInput,
  CheckoutRequestResult,
  CheckoutStatusResult,
  PaymentGatewayPort,
} from "../../ports/payment-gateway.js";

type FetchFn = typeof fetch;

interface HttpMobileMoneyGatewayOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  fetchImpl?: FetchFn;
}

type HttpReply =
  | { ok: true; statusCode: number; body: unknown }
  | { ok: false; statusCode?: number; code: string; message: string };

const INSTANT_SUCCESS_MESSAGE = "callback received successfully";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = source[name];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

export class HttpMobileMoneyGateway implements PaymentGatewayPort {
  public readonly name = "http_gateway";
  private readonly fetchImpl: FetchFn;
  private readonly baseUrl: string;

  constructor(private readonly options: HttpMobileMoneyGatewayOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  async requestCheckout(input: CheckoutRequestInput): Promise<CheckoutRequestResult> {
    if (!input.msisdn) {
      return { kind: "rejected", code: "missing_msisdn", message: "A subscriber phone number is required." };
    }

    const reply = await this.send("POST", "/request/stk", {
      phone: input.msisdn,
      amount: String(input.amount),
      callback_url: input.callbackUrl,
      reference: input.checkoutId,
    });
    if (!reply.ok) {
      const kind = isPermanentGatewayFailure(reply.statusCode) ? "rejected" : "unavailable";
      return { kind, code: reply.code, message: reply.message };
    }

    const body = isObject(reply.body) ? reply.body : {};
    const data = isObject(body.data) ? body.data : undefined;
    const message = stringField(body, "message");

    if (data && message?.toLowerCase() === INSTANT_SUCCESS_MESSAGE) {
      return {
        kind: "completed",
        remoteCheckoutId: stringField(data, "CheckoutRequestID") ?? input.checkoutId,
        reference: stringField(data, "refference", "reference") ?? "DIRECT",
      };
    }

    const remoteCheckoutId = data ? stringField(data, "CheckoutRequestID") : undefined;
    if (remoteCheckoutId) {
      return { kind: "accepted", remoteCheckoutId };
    }

    return { kind: "rejected", code: "gateway_rejected", message: message ?? "Unknown payment error" };
  }

  async queryCheckoutStatus(remoteCheckoutId: string): Promise<CheckoutStatusResult> {
    const reply = await this.send("GET", `/request/status/${encodeURIComponent(remoteCheckoutId)}`);
    if (!reply.ok) {
      if (isPermanentGatewayFailure(reply.statusCode)) {
        return { kind: "outcome", outcome: "error", message: reply.message };
      }
      return { kind: "unavailable", code: reply.code, message: reply.message };
    }

    const body = isObject(reply.body) ? reply.body : {};
    const data = isObject(body.data) ? body.data : body;
    const outcome = parseGatewayOutcome(stringField(data, "status", "ResultStatus"));
    if (!outcome) {
      return { kind: "outcome", outcome: "error", message: "Malformed status response from gateway." };
    }
    const reference = stringField(data, "refference", "reference");
    const message = stringField(data, "message", "reason") ?? stringField(body, "message");
    return {
      kind: "outcome",
      outcome,
      ...(reference ? { reference } : {}),
      ...(message ? { message } : {}),
    };
  }

  private async send(method: "GET" | "POST", path: string, payload?: unknown): Promise<HttpReply> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          Accept: "application/json",
          ...(payload === undefined ? {} : { "Content-Type": "application/json" }),
        },
        ...(payload === undefined ? {} : { body: JSON.stringify(payload) }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === "TimeoutError";
      return {
        ok: false,
        code: timedOut ? "gateway_timeout" : "gateway_network_error",
        message: timedOut ? `Gateway did not answer within ${this.options.timeoutMs}ms.` : errorMessage(error),
      };
    }

    if (!response.ok) {
      return {
        ok: false,
        statusCode: response.status,
        code: `gateway_http_${response.status}`,
        message: `Payment request failed with status code: ${response.status}`,
      };
    }

    try {
      return { ok: true, statusCode: response.status, body: await response.json() };
    } catch {
      return {
        ok: false,
        statusCode: response.status,
        code: "gateway_invalid_json",
        message: "Gateway returned a body that is not JSON.",
      };
    }
  }
}
