import { parseGatewayOutcome } from "../domain/state-machine.js";
import {
  TRANSACTION_STATUSES,
  type EnqueuePaymentInput,
  type GatewayCallback,
  type TransactionStatus,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function invalidRequest(message: string): AppError {
  return new AppError(400, "invalid_request", message);
}

export function assertEnqueueInput(payload: unknown): asserts payload is EnqueuePaymentInput {
  if (!isObject(payload)) {
    throw invalidRequest("Request body must be an object.");
  }

  const { owner_reference, amount, plan_reference, phone_number } = payload;

  if (!isString(owner_reference) || owner_reference.length > 255) {
    throw invalidRequest("owner_reference must be a non-empty string up to 255 characters.");
  }
  if (typeof amount !== "number" || !Number.isSafeInteger(amount) || amount <= 0) {
    throw invalidRequest("amount must be an integer greater than zero.");
  }
  if (!isString(plan_reference) || plan_reference.length > 64) {
    throw invalidRequest("plan_reference must be a non-empty string up to 64 characters.");
  }
  if (phone_number !== undefined && (!isString(phone_number) || !/\d/.test(phone_number))) {
    throw invalidRequest("phone_number must be a string containing digits.");
  }
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

function nativeOutcome(payload: Record<string, unknown>): GatewayCallback["outcome"] | undefined {
  const success = payload.success;
  if (success === true || success === "true") {
    return "completed";
  }
  const status = parseGatewayOutcome(stringField(payload, "status", "ResultStatus"));
  if (status) {
    return status;
  }
  if (success === false || success === "false") {
    return "failed";
  }
  return undefined;
}

/**
 * Accepts both the engine's callback body (`remote_checkout_id`, `outcome`) and the provider's
 * native one (`CheckoutRequestID`, `success`/`status`, `refference`/`reference`, `reason`).
 * Returns null for bodies that carry no usable id or outcome; the route acknowledges those anyway.
 */
export function normalizeGatewayCallback(payload: unknown): GatewayCallback | null {
  if (!isObject(payload)) {
    return null;
  }
  const source = isObject(payload.data) ? { ...payload, ...payload.data } : payload;

  const remoteCheckoutId = stringField(source, "remote_checkout_id", "CheckoutRequestID", "checkout_id");
  const outcome = parseGatewayOutcome(stringField(source, "outcome")) ?? nativeOutcome(source);
  if (!remoteCheckoutId || !outcome) {
    return null;
  }

  const reference = stringField(source, "reference", "refference");
  const message = stringField(source, "message", "reason", "ResultDesc");
  return {
    remote_checkout_id: remoteCheckoutId,
    outcome,
    ...(reference ? { reference } : {}),
    ...(message ? { message } : {}),
  };
}

export function normalizeLimit(value: unknown, fallback = 20, max = 100): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new AppError(400, "invalid_limit", "limit must be a positive integer.");
  }
  return Math.min(parsed, max);
}

export function normalizeTransactionStatus(value: unknown): TransactionStatus | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(400, "invalid_status", "status must be a string.");
  }

  const status = TRANSACTION_STATUSES.find((candidate) => candidate === value.trim());
  if (!status) {
    throw new AppError(400, "invalid_status", `status must be one of: ${TRANSACTION_STATUSES.join(", ")}.`);
  }
  return status;
}

export function normalizeResourceId(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(400, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      400,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
  return normalized;
}

export function requireCheckoutId(value: unknown): string {
  const checkoutId = normalizeResourceId(value, "checkout_id");
  if (!checkoutId) {
    throw new AppError(400, "invalid_path_parameter", "Checkout id is required.");
  }
  return checkoutId;
}
