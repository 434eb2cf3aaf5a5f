import { describe, expect, it } from "vitest";
import {
  canTransition,
  isTerminalStatus,
  parseGatewayOutcome,
  statusForOutcome,
} from "../src/domain/state-machine.js";
import { TRANSACTION_STATUSES } from "../src/domain/types.js";

describe("Transaction state machine", () => {
  it("allows the forward transitions", () => {
    expect(canTransition("queued", "processing")).toBe(true);
    expect(canTransition("processing", "pending")).toBe(true);
    expect(canTransition("processing", "completed")).toBe(true);
    expect(canTransition("pending", "completed")).toBe(true);
    expect(canTransition("pending", "failed")).toBe(true);
    expect(canTransition("queued", "cancelled")).toBe(true);
    expect(canTransition("queued", "timeout")).toBe(true);
  });

  it("blocks skipping dispatch and moving backwards", () => {
    expect(canTransition("queued", "completed")).toBe(false);
    expect(canTransition("queued", "pending")).toBe(false);
    expect(canTransition("queued", "failed")).toBe(false);
    expect(canTransition("pending", "processing")).toBe(false);
    expect(canTransition("processing", "queued")).toBe(false);
  });

  it("never leaves a terminal status", () => {
    const terminal = TRANSACTION_STATUSES.filter((status) => isTerminalStatus(status));
    expect(terminal).toEqual(["completed", "failed", "cancelled", "error", "timeout"]);
    for (const from of terminal) {
      for (const to of TRANSACTION_STATUSES) {
        expect(canTransition(from, to)).toBe(false);
      }
    }
  });

  it("maps gateway outcomes to statuses", () => {
    expect(statusForOutcome("pending")).toBe("pending");
    expect(statusForOutcome("completed")).toBe("completed");
    expect(statusForOutcome("cancelled")).toBe("cancelled");
  });

  it("parses gateway status words case-insensitively", () => {
    expect(parseGatewayOutcome("SUCCESS")).toBe("completed");
    expect(parseGatewayOutcome(" Processing ")).toBe("pending");
    expect(parseGatewayOutcome("canceled")).toBe("cancelled");
    expect(parseGatewayOutcome("Failed")).toBe("failed");
    expect(parseGatewayOutcome("toString")).toBeUndefined();
    expect(parseGatewayOutcome("unknown")).toBeUndefined();
    expect(parseGatewayOutcome(undefined)).toBeUndefined();
  });
});
