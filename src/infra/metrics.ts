import type { TransactionStatus, TransitionSource } from "../domain/types.js";

type LabelSet = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function buildLabelKey(labelNames: string[], labels: LabelSet): string {
  return labelNames.map((name) => `${name}=${labels[name] ?? ""}`).join("|");
}

function parseLabelKey(labelNames: string[], key: string): LabelSet {
  const parts = key.split("|");
  const labels: LabelSet = {};
  for (const [index, name] of labelNames.entries()) {
    const value = parts[index];
    labels[name] = value ? value.slice(name.length + 1) : "";
  }
  return labels;
}

function formatLabels(labels: LabelSet): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return "";
  }
  const inner = entries.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",");
  return `{${inner}}`;
}

class CounterMetric {
  private readonly values = new Map<string, number>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: string[],
  ) {}

  inc(labels: LabelSet, value = 1): void {
    const key = buildLabelKey(this.labelNames, labels);
    const current = this.values.get(key) ?? 0;
    this.values.set(key, current + value);
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    for (const [key, value] of this.values.entries()) {
      const labels = parseLabelKey(this.labelNames, key);
      lines.push(`${this.name}${formatLabels(labels)} ${value}`);
    }
    return lines;
  }
}

class HistogramMetric {
  private readonly values = new Map<string, { count: number; sum: number; buckets: number[] }>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: string[],
    private readonly buckets: number[],
  ) {}

  observe(labels: LabelSet, value: number): void {
    const key = buildLabelKey(this.labelNames, labels);
    const current =
      this.values.get(key) ?? {
        count: 0,
        sum: 0,
        buckets: this.buckets.map(() => 0),
      };
    current.count += 1;
    current.sum += value;
    for (const [index, bucket] of this.buckets.entries()) {
      if (value <= bucket) {
        current.buckets[index] = (current.buckets[index] ?? 0) + 1;
      }
    }
    this.values.set(key, current);
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const [key, stats] of this.values.entries()) {
      const baseLabels = parseLabelKey(this.labelNames, key);
      for (const [index, bucket] of this.buckets.entries()) {
        lines.push(
          `${this.name}_bucket${formatLabels({ ...baseLabels, le: String(bucket) })} ${stats.buckets[index] ?? 0}`,
        );
      }
      lines.push(`${this.name}_bucket${formatLabels({ ...baseLabels, le: "+Inf" })} ${stats.count}`);
      lines.push(`${this.name}_sum${formatLabels(baseLabels)} ${stats.sum}`);
      lines.push(`${this.name}_count${formatLabels(baseLabels)} ${stats.count}`);
    }
    return lines;
  }
}

export type DispatchAttemptResult = "accepted" | "completed" | "rejected" | "unavailable";

export class EngineMetricsRegistry {
  private readonly httpRequests = new CounterMetric(
    "momo_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new HistogramMetric(
    "momo_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  );
  private readonly idempotencyReplays = new CounterMetric(
    "momo_idempotency_replays_total",
    "Total number of idempotent replay responses by operation.",
    ["operation"],
  );
  private readonly rateLimitRejections = new CounterMetric(
    "momo_http_rate_limited_total",
    "Total number of HTTP requests rejected by rate limiting.",
    ["scope"],
  );
  private readonly transitions = new CounterMetric(
    "momo_transaction_transitions_total",
    "Total number of applied transaction status transitions by target status and source.",
    ["status", "source"],
  );
  private readonly dispatchAttempts = new CounterMetric(
    "momo_dispatch_attempts_total",
    "Total number of gateway dispatch attempts by result.",
    ["result"],
  );
  private readonly gatewayLatency = new HistogramMetric(
    "momo_gateway_request_duration_seconds",
    "Gateway checkout request duration in seconds.",
    [],
    [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  );
  private readonly callbacks = new CounterMetric(
    "momo_gateway_callbacks_total",
    "Total number of gateway callbacks received by match result.",
    ["matched"],
  );
  private readonly creditResults = new CounterMetric(
    "momo_credit_hook_results_total",
    "Total number of balance-credit hook invocations by result.",
    ["result"],
  );
  private readonly sweeperTimeouts = new CounterMetric(
    "momo_sweeper_timeouts_total",
    "Total number of transactions closed out as timed out by the sweeper.",
    [],
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    this.httpRequests.inc({
      method: method.toUpperCase(),
      route,
      status_code: String(statusCode),
    });
    this.httpDuration.observe(
      {
        method: method.toUpperCase(),
        route,
      },
      durationSeconds,
    );
  }

  recordIdempotencyReplay(operation: string): void {
    this.idempotencyReplays.inc({ operation });
  }

  recordRateLimitRejection(scope: string): void {
    this.rateLimitRejections.inc({ scope });
  }

  recordTransition(status: TransactionStatus, source: TransitionSource): void {
    this.transitions.inc({ status, source });
    if (status === "timeout" && source === "sweeper") {
      this.sweeperTimeouts.inc({});
    }
  }

  recordDispatchAttempt(result: DispatchAttemptResult, durationSeconds: number): void {
    this.dispatchAttempts.inc({ result });
    this.gatewayLatency.observe({}, durationSeconds);
  }

  recordCallback(matched: boolean): void {
    this.callbacks.inc({ matched: matched ? "true" : "false" });
  }

  recordCreditResult(ok: boolean): void {
    this.creditResults.inc({ result: ok ? "credited" : "failed" });
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.idempotencyReplays.render(),
      ...this.rateLimitRejections.render(),
      ...this.transitions.render(),
      ...this.dispatchAttempts.render(),
      ...this.gatewayLatency.render(),
      ...this.callbacks.render(),
      ...this.creditResults.render(),
      ...this.sweeperTimeouts.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
