export type TransactionStatus =
  | "queued"
  | "processing"
  | "pending"
  | "completed"
  | "failed"
  | "cancelled"
  | "error"
  | "timeout";

export const TRANSACTION_STATUSES: readonly TransactionStatus[] = [
  "queued",
  "processing",
  "pending",
  "completed",
  "failed",
  "cancelled",
  "error",
  "timeout",
];

export const NON_TERMINAL_STATUSES: readonly TransactionStatus[] = ["queued", "processing", "pending"];

export type CreditState = "none" | "in_flight" | "retry_pending" | "credited";

export interface TransactionRecord {
  checkout_id: string;
  remote_checkout_id: string | null;
  owner_reference: string;
  amount: number;
  plan_reference: string;
  msisdn: string | null;
  status: TransactionStatus;
  error_detail: string | null;
  reference: string | null;
  credit_state: CreditState;
  credit_attempts: number;
  created_at: string;
  updated_at: string;
}

export type TransactionPatch = Partial<
  Pick<
    TransactionRecord,
    | "remote_checkout_id"
    | "status"
    | "error_detail"
    | "reference"
    | "credit_state"
    | "credit_attempts"
    | "updated_at"
  >
>;

export interface EnqueuePaymentInput {
  owner_reference: string;
  amount: number;
  plan_reference: string;
  phone_number?: string;
}

export interface EnqueuePaymentResponse {
  checkout_id: string;
  status: TransactionStatus;
}

export interface TransactionStatusResponse {
  checkout_id: string;
  status: TransactionStatus;
  error_detail?: string;
  reference?: string;
  updated_at: string;
}

export interface TransactionResponse {
  checkout_id: string;
  remote_checkout_id: string | null;
  owner_reference: string;
  amount: number;
  plan_reference: string;
  status: TransactionStatus;
  error_detail: string | null;
  reference: string | null;
  created_at: string;
  updated_at: string;
}

/** Outcome a gateway reports for a checkout, through a callback or a status poll. */
export type GatewayOutcome = "pending" | "completed" | "failed" | "cancelled" | "error";

export interface GatewayCallback {
  remote_checkout_id: string;
  outcome: GatewayOutcome;
  reference?: string;
  message?: string;
}

export type TransitionSource =
  | "dispatch"
  | "callback"
  | "poll"
  | "sweeper"
  | "client_cancel"
  | "credit_recovery";
