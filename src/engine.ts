import { Redis } from "ioredis";
import { Pool } from "pg";
import { IntervalTask } from "./application/background-task.js";
import { CreditRecovery } from "./application/credit-recovery.js";
import { DispatchWorker } from "./application/dispatch-worker.js";
import { PaymentCancellation } from "./application/payment-cancellation.js";
import { PaymentIntake } from "./application/payment-intake.js";
import { StatusQuery } from "./application/status-query.js";
import { StatusReconciler } from "./application/status-reconciler.js";
import { TimeoutSweeper } from "./application/timeout-sweeper.js";
import { TransitionService } from "./application/transition-service.js";
import { HttpMobileMoneyGateway } from "./adapters/gateway/http-gateway.js";
import { MockMobileMoneyGateway } from "./adapters/gateway/mock-gateway.js";
import { HttpBalanceCredit } from "./adapters/http/balance-credit.js";
import { InMemoryBalanceCredit } from "./adapters/inmemory/balance-credit.js";
import { InMemoryIdempotencyStore } from "./adapters/inmemory/idempotency-store.js";
import { InMemoryRequestQueue } from "./adapters/inmemory/request-queue.js";
import { InMemoryTransactionRepository } from "./adapters/inmemory/transaction-repository.js";
import { PostgresIdempotencyStore } from "./adapters/postgres/idempotency-store.js";
import { PostgresTransactionRepository } from "./adapters/postgres/transaction-repository.js";
import { RedisRateLimiter } from "./adapters/redis/rate-limiter.js";
import { RedisStreamRequestQueue } from "./adapters/redis/request-queue.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import type { RuntimeConfig } from "./infra/config.js";
import { createLogger, type EngineLogger } from "./infra/logger.js";
import { EngineMetricsRegistry } from "./infra/metrics.js";
import { InMemoryRateLimiter } from "./infra/rate-limiter.js";
import type { BalanceCreditPort } from "./ports/balance-credit.js";
import type { IdempotencyStorePort } from "./ports/idempotency-store.js";
import type { PaymentGatewayPort } from "./ports/payment-gateway.js";
import type { RateLimiterPort } from "./ports/rate-limiter.js";
import type { RequestQueuePort } from "./ports/request-queue.js";
import type { TransactionRepositoryPort } from "./ports/transaction-repository.js";

/** Collaborators a caller (usually a test) may supply instead of the configured adapters. */
export interface EngineOverrides {
  clock?: ClockPort;
  logger?: EngineLogger;
  metrics?: EngineMetricsRegistry;
  repository?: TransactionRepositoryPort;
  queue?: RequestQueuePort;
  idempotencyStore?: IdempotencyStorePort;
  gateway?: PaymentGatewayPort;
  creditHook?: BalanceCreditPort;
  apiRateLimiter?: RateLimiterPort;
  gatewayRateLimiter?: RateLimiterPort;
  sleep?: (ms: number) => Promise<void>;
}

export interface PaymentEngine {
  readonly config: RuntimeConfig;
  readonly clock: ClockPort;
  readonly logger: EngineLogger;
  readonly metrics: EngineMetricsRegistry;
  readonly repository: TransactionRepositoryPort;
  readonly queue: RequestQueuePort;
  readonly idempotencyStore: IdempotencyStorePort;
  readonly gateway: PaymentGatewayPort;
  readonly creditHook: BalanceCreditPort;
  readonly apiRateLimiter: RateLimiterPort;
  readonly transitions: TransitionService;
  readonly intake: PaymentIntake;
  readonly dispatchWorker: DispatchWorker;
  readonly reconciler: StatusReconciler;
  readonly statusQuery: StatusQuery;
  readonly cancellation: PaymentCancellation;
  readonly sweeper: TimeoutSweeper;
  readonly creditRecovery: CreditRecovery;
  /** Re-queues stranded records, then starts the dispatch loops and the periodic tasks. */
  start(): Promise<void>;
  stop(): Promise<void>;
}

function requireResource<TResource>(resource: TResource | null, description: string): TResource {
  if (!resource) {
    throw new AppError(500, "invalid_runtime_config", description);
  }
  return resource;
}

function callbackUrlWithToken(config: RuntimeConfig): string {
  if (!config.callbackToken) {
    return config.callbackUrl;
  }
  const url = new URL(config.callbackUrl);
  url.searchParams.set("token", config.callbackToken);
  return url.toString();
}

export function buildEngine(config: RuntimeConfig, overrides: EngineOverrides = {}): PaymentEngine {
  const clock = overrides.clock ?? new SystemClock();
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const metrics = overrides.metrics ?? new EngineMetricsRegistry();
  const closeActions: Array<() => Promise<void>> = [];

  const needsPostgres =
    (config.storeBackend === "postgres" && !overrides.repository)
    || (config.idempotencyBackend === "postgres" && !overrides.idempotencyStore);
  const postgresPool =
    config.postgresUrl && needsPostgres ? new Pool({ connectionString: config.postgresUrl }) : null;
  if (postgresPool) {
    closeActions.push(async () => {
      await postgresPool.end();
    });
  }

  const needsRedis =
    (config.queueBackend === "redis" && !overrides.queue)
    || (config.rateLimitBackend === "redis" && (!overrides.apiRateLimiter || !overrides.gatewayRateLimiter));
  const redisClient =
    config.redisUrl && needsRedis
      ? new Redis(config.redisUrl, {
        lazyConnect: false,
        maxRetriesPerRequest: 1,
      })
      : null;
  if (redisClient) {
    closeActions.push(async () => {
      await redisClient.quit();
    });
  }

  const repository =
    overrides.repository
    ?? (config.storeBackend === "postgres"
      ? new PostgresTransactionRepository(
        requireResource(postgresPool, "Postgres transaction store requested without PostgreSQL."),
      )
      : new InMemoryTransactionRepository());

  const idempotencyStore =
    overrides.idempotencyStore
    ?? (config.idempotencyBackend === "postgres"
      ? new PostgresIdempotencyStore(
        requireResource(postgresPool, "Postgres idempotency requested without PostgreSQL."),
        {
          ttlSeconds: config.idempotencyTtlSeconds,
          lockLeaseSeconds: config.lockLeaseSeconds,
          lockWaitMs: config.lockWaitMs,
        },
      )
      : new InMemoryIdempotencyStore({ ttlSeconds: config.idempotencyTtlSeconds, clock }));

  let queue: RequestQueuePort;
  if (overrides.queue) {
    queue = overrides.queue;
  } else if (config.queueBackend === "redis") {
    queue = new RedisStreamRequestQueue(
      requireResource(redisClient, "Redis request queue requested without Redis client."),
      {
        streamKey: config.queueStreamKey,
        consumerGroup: config.queueConsumerGroup,
        consumerName: config.queueConsumerName,
      },
    );
  } else {
    queue = new InMemoryRequestQueue();
  }

  const buildRateLimiter = (scope: string, windowSeconds: number, maxRequests: number): RateLimiterPort => {
    if (config.rateLimitBackend === "redis") {
      return new RedisRateLimiter(requireResource(redisClient, "Redis rate limiting requested without Redis client."), {
        windowSeconds,
        maxRequests,
        keyPrefix: `${config.redisRateLimitPrefix}:${scope}`,
      });
    }
    return new InMemoryRateLimiter({ windowSeconds, maxRequests });
  };
  const apiRateLimiter =
    overrides.apiRateLimiter
    ?? buildRateLimiter("api", config.rateLimitWindowSeconds, config.rateLimitMaxRequests);
  const gatewayRateLimiter =
    overrides.gatewayRateLimiter
    ?? buildRateLimiter("gateway", config.gatewayRateLimitWindowSeconds, config.gatewayRateLimitMaxRequests);

  let gateway: PaymentGatewayPort;
  if (overrides.gateway) {
    gateway = overrides.gateway;
  } else if (config.gatewayBackend === "http") {
    gateway = new HttpMobileMoneyGateway({
      baseUrl: requireResource(config.gatewayBaseUrl ?? null, "HTTP gateway requested without base URL."),
      apiKey: requireResource(config.gatewayApiKey ?? null, "HTTP gateway requested without API key."),
      timeoutMs: config.gatewayTimeoutMs,
    });
  } else {
    gateway = new MockMobileMoneyGateway();
  }

  let creditHook: BalanceCreditPort;
  if (overrides.creditHook) {
    creditHook = overrides.creditHook;
  } else if (config.creditBackend === "http") {
    creditHook = new HttpBalanceCredit({
      url: requireResource(config.creditHookUrl ?? null, "HTTP credit hook requested without URL."),
      timeoutMs: config.creditHookTimeoutMs,
      ...(config.creditHookApiKey ? { apiKey: config.creditHookApiKey } : {}),
    });
  } else {
    creditHook = new InMemoryBalanceCredit(config.planCatalog);
  }

  const transitions = new TransitionService(repository, creditHook, clock, logger, {
    creditMaxAttempts: config.creditMaxAttempts,
    onTransition: ({ record, source }) => {
      metrics.recordTransition(record.status, source);
    },
    onCreditAttempt: ({ ok }) => {
      metrics.recordCreditResult(ok);
    },
  });
  const intake = new PaymentIntake(repository, queue, idempotencyStore, clock, logger, {
    planCatalog: config.planCatalog,
    dedupWindowSeconds: config.dedupWindowSeconds,
  });
  const dispatchWorker = new DispatchWorker(
    repository,
    queue,
    gateway,
    transitions,
    idempotencyStore,
    gatewayRateLimiter,
    logger,
    {
      concurrency: config.dispatchConcurrency,
      maxAttempts: config.dispatchMaxAttempts,
      backoffBaseMs: config.dispatchBackoffBaseMs,
      blockMs: config.dispatchBlockMs,
      callbackUrl: callbackUrlWithToken(config),
      ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
      onAttempt: (result, durationSeconds) => {
        metrics.recordDispatchAttempt(result, durationSeconds);
      },
    },
  );
  const reconciler = new StatusReconciler(repository, gateway, transitions, clock, logger, {
    callbackGraceSeconds: config.callbackGraceSeconds,
    onCallback: (matched) => {
      metrics.recordCallback(matched);
    },
  });
  const statusQuery = new StatusQuery(repository);
  const cancellation = new PaymentCancellation(repository, transitions);
  const sweeper = new TimeoutSweeper(repository, transitions, clock, logger, {
    thresholdSeconds: config.timeoutThresholdSeconds,
  });
  const creditRecovery = new CreditRecovery(repository, transitions, clock, logger, {
    retryDelaySeconds: config.creditRetryDelaySeconds,
  });

  const tasks = [
    new IntervalTask(() => reconciler.pollOnce(), logger, {
      name: "status_poll",
      intervalMs: config.pollIntervalSeconds * 1000,
    }),
    new IntervalTask(() => sweeper.sweepOnce(), logger, {
      name: "timeout_sweep",
      intervalMs: config.sweepIntervalSeconds * 1000,
    }),
    new IntervalTask(() => creditRecovery.recoverOnce(), logger, {
      name: "credit_recovery",
      intervalMs: config.creditRecoveryIntervalSeconds * 1000,
      runImmediately: true,
    }),
  ];

  let started = false;

  return {
    config,
    clock,
    logger,
    metrics,
    repository,
    queue,
    idempotencyStore,
    gateway,
    creditHook,
    apiRateLimiter,
    transitions,
    intake,
    dispatchWorker,
    reconciler,
    statusQuery,
    cancellation,
    sweeper,
    creditRecovery,
    async start() {
      if (started) {
        return;
      }
      started = true;
      await dispatchWorker.requeueStranded();
      dispatchWorker.start();
      for (const task of tasks) {
        task.start();
      }
      logger.info(
        {
          gateway: gateway.name,
          dispatch_concurrency: config.dispatchConcurrency,
          store: config.storeBackend,
          queue: config.queueBackend,
        },
        "payment engine started",
      );
    },
    async stop() {
      if (started) {
        started = false;
        await Promise.all(tasks.map((task) => task.stop()));
        const draining = dispatchWorker.stop();
        await queue.close?.();
        await draining;
      }
      for (const closeAction of closeActions.splice(0).reverse()) {
        await closeAction();
      }
    },
  };
}
