import { pino, type BaseLogger } from "pino";

export type EngineLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export function createLogger(level: LogLevel, name = "momo-async-payments"): EngineLogger {
  return pino({ name, level });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
