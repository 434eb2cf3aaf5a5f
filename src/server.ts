import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import {
  assertEnqueueInput,
  normalizeGatewayCallback,
  normalizeLimit,
  normalizeResourceId,
  normalizeTransactionStatus,
  requireCheckoutId,
} from "./api/validators.js";
import { buildEngine, type PaymentEngine } from "./engine.js";
import { AppError } from "./infra/app-error.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { hashIdentity } from "./infra/fingerprint.js";
import { errorMessage } from "./infra/logger.js";

const IDEMPOTENCY_KEY_PATTERN = /^[A-Za-z0-9._:-]+$/;
const CALLBACK_ROUTE = "/v1/callbacks/gateway";

interface BuildAppOptions {
  /** Pre-built engine, e.g. with test doubles; otherwise one is built from `config`. */
  engine?: PaymentEngine;
  /** Starts dispatch loops and periodic tasks when the server is ready. Defaults to the config switch. */
  startBackgroundWorkers?: boolean;
}

declare module "fastify" {
  interface FastifyRequest {
    momoStartNs?: bigint;
  }
}

function setIdempotencyReplayedHeader(
  reply: { header(name: string, value: string): unknown },
  replayed: boolean,
): void {
  reply.header("X-Idempotency-Replayed", replayed ? "true" : "false");
}

function optionalIdempotencyKey(headers: Record<string, unknown>, maxLength: number): string | undefined {
  const keyHeader = headers["idempotency-key"];
  if (keyHeader === undefined) {
    return undefined;
  }
  if (typeof keyHeader !== "string" || keyHeader.trim().length === 0) {
    throw new AppError(400, "invalid_idempotency_key", "Idempotency-Key header must not be empty.");
  }
  const key = keyHeader.trim();
  if (key.length > maxLength) {
    throw new AppError(400, "invalid_idempotency_key", `Idempotency-Key length must be <= ${maxLength}.`);
  }
  if (!IDEMPOTENCY_KEY_PATTERN.test(key)) {
    throw new AppError(400, "invalid_idempotency_key", "Idempotency-Key contains invalid characters.");
  }
  return key;
}

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function setRateLimitHeaders(
  reply: { header(name: string, value: string): unknown },
  options: {
    limit: number;
    remaining: number;
    resetSeconds: number;
  },
): void {
  reply.header("RateLimit-Limit", String(options.limit));
  reply.header("RateLimit-Remaining", String(options.remaining));
  reply.header("RateLimit-Reset", String(options.resetSeconds));
}

function isPublicRoute(url: string, metricsEnabled: boolean): boolean {
  const path = url.split("?")[0] ?? url;
  return path.startsWith("/health/") || path === CALLBACK_ROUTE || (metricsEnabled && path === "/metrics");
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  options: BuildAppOptions = {},
): FastifyInstance {
  const app = Fastify({
    logger: config.logLevel === "silent" ? false : { level: config.logLevel },
  });
  const engine = options.engine ?? buildEngine(config, { logger: app.log });
  const { metrics } = engine;
  const validApiKeys = new Set<string>(config.apiKeys.length > 0 ? config.apiKeys : [config.apiKey]);
  const startBackgroundWorkers = options.startBackgroundWorkers ?? config.backgroundWorkersEnabled;

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    return reply.status(200).send({ status: "ready", gateway: engine.gateway.name });
  });

  app.addHook("onRequest", async (request, reply) => {
    request.momoStartNs = process.hrtime.bigint();
    reply.header("X-Request-Id", request.id);
    if (isPublicRoute(request.url, config.metricsEnabled)) {
      return;
    }
    const apiKey = requireBearerApiKey(request.headers, validApiKeys);
    if (!config.rateLimitEnabled) {
      return;
    }
    const rateLimitDecision = await engine.apiRateLimiter.consume(hashIdentity(apiKey));
    setRateLimitHeaders(reply, rateLimitDecision);
    if (!rateLimitDecision.allowed) {
      if (config.metricsEnabled) {
        metrics.recordRateLimitRejection("api_key");
      }
      reply.header("Retry-After", String(rateLimitDecision.retryAfterSeconds));
      throw new AppError(429, "rate_limit_exceeded", "Rate limit exceeded. Retry later.");
    }
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled || request.momoStartNs === undefined) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - request.momoStartNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.post("/v1/payments", async (request, reply) => {
    const idempotencyKey = optionalIdempotencyKey(request.headers, config.idempotencyKeyMaxLength);
    if (idempotencyKey) {
      reply.header("Idempotency-Key", idempotencyKey);
    }
    assertEnqueueInput(request.body);
    const result = await engine.intake.enqueue(request.body, idempotencyKey);
    if (idempotencyKey) {
      setIdempotencyReplayedHeader(reply, result.idempotencyReplayed);
    }
    if (result.idempotencyReplayed && config.metricsEnabled) {
      metrics.recordIdempotencyReplay("enqueue_payment");
    }
    return reply.status(result.statusCode).send(result.body);
  });

  app.get<{ Params: { checkoutId?: string } }>("/v1/status/:checkoutId", async (request, reply) => {
    const checkoutId = requireCheckoutId(request.params.checkoutId);
    const status = await engine.statusQuery.getStatus(checkoutId);
    return reply.status(200).header("Cache-Control", "no-store").send(status);
  });

  app.post<{ Params: { checkoutId?: string } }>("/v1/cancel/:checkoutId", async (request, reply) => {
    const checkoutId = requireCheckoutId(request.params.checkoutId);
    const status = await engine.cancellation.cancel(checkoutId);
    return reply.status(200).send({ checkout_id: status.checkout_id, status: status.status });
  });

  app.get<{
    Querystring: { limit?: string; cursor?: string; owner_reference?: string; status?: string };
  }>("/v1/transactions", async (request, reply) => {
    const limit = normalizeLimit(request.query.limit, config.listDefaultLimit, config.listMaxLimit);
    const cursor = normalizeResourceId(request.query.cursor, "cursor");
    const ownerReference = normalizeResourceId(request.query.owner_reference, "owner_reference");
    const status = normalizeTransactionStatus(request.query.status);
    const page = await engine.statusQuery.listTransactions({
      limit,
      ...(cursor ? { cursor } : {}),
      ...(ownerReference ? { ownerReference } : {}),
      ...(status ? { status } : {}),
    });
    return reply.status(200).send({
      data: page.data,
      pagination: {
        limit,
        has_more: page.hasMore,
        next_cursor: page.nextCursor ?? null,
      },
    });
  });

  // Always acknowledged: the provider must not retry because of anything on this side.
  app.post<{ Querystring: { token?: string } }>(CALLBACK_ROUTE, async (request, reply) => {
    if (config.callbackToken && request.query.token !== config.callbackToken) {
      throw new AppError(401, "invalid_callback_token", "Callback token is missing or invalid.");
    }
    const callback = normalizeGatewayCallback(request.body);
    if (!callback) {
      request.log.warn("unparseable gateway callback acknowledged");
      return reply.status(200).send({ received: true });
    }
    try {
      await engine.reconciler.handleCallback(callback);
    } catch (error) {
      request.log.error(
        { remote_checkout_id: callback.remote_checkout_id, err: errorMessage(error) },
        "gateway callback processing failed",
      );
    }
    return reply.status(200).send({ received: true });
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
        request_id: request.id,
      },
    });
  });

  app.setErrorHandler<FastifyError>(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (error.validation || error.statusCode === 400 || error.statusCode === 415) {
      return reply.status(error.statusCode ?? 400).send({
        error: {
          code: "invalid_request",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  if (startBackgroundWorkers) {
    app.addHook("onReady", async () => {
      await engine.start();
    });
  }

  app.addHook("onClose", async () => {
    await engine.stop();
  });

  return app;
}
