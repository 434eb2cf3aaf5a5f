import { describe, expect, it } from "vitest";
import { HttpMobileMoneyGateway } from "../src/adapters/gateway/http-gateway.js";

interface RecordedCall {
  url: string;
  method: string | undefined;
  authorization: string | null;
  body: unknown;
}

function stubFetch(reply: () => Response | Promise<Response>) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      authorization: new Headers(init?.headers).get("authorization"),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    return reply();
  };
  return { calls, fetchImpl };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const CHECKOUT = {
  checkoutId: "chk_1",
  msisdn: "0712345678",
  amount: 500,
  callbackUrl: "https://engine.test/v1/callbacks/gateway?token=test-callback-token",
};

function gatewayWith(fetchImpl: typeof fetch): HttpMobileMoneyGateway {
  return new HttpMobileMoneyGateway({
    baseUrl: "https://gateway.test/api/",
    apiKey: "test-secret",
    timeoutMs: 1000,
    fetchImpl,
  });
}

describe("HttpMobileMoneyGateway", () => {
  it("sends an STK push and returns the remote checkout id", async () => {
    const { calls, fetchImpl } = stubFetch(() =>
      jsonResponse({ message: "Success. Request accepted for processing", data: { CheckoutRequestID: "ws_CO_9" } }),
    );

    const result = await gatewayWith(fetchImpl).requestCheckout(CHECKOUT);

    expect(result).toEqual({ kind: "accepted", remoteCheckoutId: "ws_CO_9" });
    expect(calls).toEqual([
      {
        url: "https://gateway.test/api/request/stk",
        method: "POST",
        authorization: "Bearer test-secret",
        body: {
          phone: "0712345678",
          amount: "500",
          callback_url: "https://engine.test/v1/callbacks/gateway?token=test-callback-token",
          reference: "chk_1",
        },
      },
    ]);
  });

  it("reports an instant settlement as completed", async () => {
    const { fetchImpl } = stubFetch(() =>
      jsonResponse({
        message: "Callback received successfully",
        data: { CheckoutRequestID: "ws_CO_10", refference: "QWE123RTY" },
      }),
    );

    const result = await gatewayWith(fetchImpl).requestCheckout(CHECKOUT);

    expect(result).toEqual({ kind: "completed", remoteCheckoutId: "ws_CO_10", reference: "QWE123RTY" });
  });

  it("rejects a request without a phone number without calling the gateway", async () => {
    const { calls, fetchImpl } = stubFetch(() => jsonResponse({}));

    const result = await gatewayWith(fetchImpl).requestCheckout({ ...CHECKOUT, msisdn: null });

    expect(result).toMatchObject({ kind: "rejected", code: "missing_msisdn" });
    expect(calls).toHaveLength(0);
  });

  it("treats client errors as rejections and server errors as unavailability", async () => {
    const badRequest = stubFetch(() => jsonResponse({ message: "bad phone" }, 400));
    const throttled = stubFetch(() => jsonResponse({}, 429));
    const unavailable = stubFetch(() => jsonResponse({}, 503));

    expect(await gatewayWith(badRequest.fetchImpl).requestCheckout(CHECKOUT)).toEqual({
      kind: "rejected",
      code: "gateway_http_400",
      message: "Payment request failed with status code: 400",
    });
    expect(await gatewayWith(throttled.fetchImpl).requestCheckout(CHECKOUT)).toMatchObject({
      kind: "unavailable",
      code: "gateway_http_429",
    });
    expect(await gatewayWith(unavailable.fetchImpl).requestCheckout(CHECKOUT)).toMatchObject({
      kind: "unavailable",
      code: "gateway_http_503",
    });
  });

  it("reports network failures as unavailable", async () => {
    const { fetchImpl } = stubFetch(() => {
      throw new Error("getaddrinfo ENOTFOUND gateway.test");
    });

    const result = await gatewayWith(fetchImpl).requestCheckout(CHECKOUT);

    expect(result).toEqual({
      kind: "unavailable",
      code: "gateway_network_error",
      message: "getaddrinfo ENOTFOUND gateway.test",
    });
  });

  it("rejects an accepted response that carries no checkout id", async () => {
    const { fetchImpl } = stubFetch(() => jsonResponse({ message: "Insufficient float" }));

    const result = await gatewayWith(fetchImpl).requestCheckout(CHECKOUT);

    expect(result).toEqual({ kind: "rejected", code: "gateway_rejected", message: "Insufficient float" });
  });

  it("maps status query answers to outcomes", async () => {
    const { calls, fetchImpl } = stubFetch(() =>
      jsonResponse({ data: { status: "SUCCESS", refference: "ABC123" } }),
    );

    const result = await gatewayWith(fetchImpl).queryCheckoutStatus("ws_CO_9");

    expect(result).toEqual({ kind: "outcome", outcome: "completed", reference: "ABC123" });
    expect(calls[0]?.url).toBe("https://gateway.test/api/request/status/ws_CO_9");
    expect(calls[0]?.method).toBe("GET");
  });

  it("reports an unknown checkout as an error outcome and a server error as unavailable", async () => {
    const notFound = stubFetch(() => jsonResponse({}, 404));
    const serverError = stubFetch(() => jsonResponse({}, 500));

    expect(await gatewayWith(notFound.fetchImpl).queryCheckoutStatus("ws_CO_9")).toEqual({
      kind: "outcome",
      outcome: "error",
      message: "Payment request failed with status code: 404",
    });
    expect(await gatewayWith(serverError.fetchImpl).queryCheckoutStatus("ws_CO_9")).toMatchObject({
      kind: "unavailable",
      code: "gateway_http_500",
    });
  });

  it("reports an unreadable status body as an error outcome", async () => {
    const { fetchImpl } = stubFetch(() => jsonResponse({ data: { status: "mystery" } }));

    const result = await gatewayWith(fetchImpl).queryCheckoutStatus("ws_CO_9");

    expect(result).toEqual({ kind: "outcome", outcome: "error", message: "Malformed status response from gateway." });
  });
});
