import { describe, it, expect } from "vitest";
import { InvalidStatusTransition } from "./errors";
import {
  createStateMachine,
  orderStateMachine,
  paymentStateMachine,
  payoutStateMachine,
  referralStateMachine,
} from "./stateMachines";

describe("orderStateMachine", () => {
  it.each([
    ["pending", "processing"],
    ["pending", "cancelled"],
    ["processing", "shipped"],
    ["processing", "cancelled"],
    ["shipped", "delivered"],
    ["delivered", "refunded"],
  ] as const)("allows %s → %s", (from, to) => {
    expect(orderStateMachine.canTransition(from, to)).toBe(true);
  });

  it.each([
    ["pending", "shipped"],
    ["shipped", "cancelled"],
    ["delivered", "processing"],
    ["cancelled", "pending"],
    ["refunded", "delivered"],
  ] as const)("forbids %s → %s", (from, to) => {
    expect(orderStateMachine.canTransition(from, to)).toBe(false);
  });

  it("marks cancelled and refunded as terminal", () => {
    expect(orderStateMachine.isTerminal("cancelled")).toBe(true);
    expect(orderStateMachine.isTerminal("refunded")).toBe(true);
    expect(orderStateMachine.isTerminal("delivered")).toBe(false);
  });
});

describe("other machines", () => {
  it("settles payments once", () => {
    expect(paymentStateMachine.canTransition("pending", "completed")).toBe(true);
    expect(paymentStateMachine.canTransition("completed", "failed")).toBe(false);
    expect(paymentStateMachine.isTerminal("failed")).toBe(true);
  });

  it("converts referrals only from pending", () => {
    expect(referralStateMachine.canTransition("pending", "completed")).toBe(true);
    expect(referralStateMachine.canTransition("expired", "completed")).toBe(false);
  });

  it("routes payouts through processing", () => {
    expect(payoutStateMachine.canTransition("pending", "completed")).toBe(false);
    expect(payoutStateMachine.canTransition("processing", "failed")).toBe(true);
  });
});

describe("assertTransition", () => {
  it("throws a 409 naming the entity and both states", () => {
    const lamp = createStateMachine<"off" | "on">("lamp", { off: ["on"], on: ["off"] });

    expect(() => lamp.assertTransition("off", "on")).not.toThrow();
    try {
      lamp.assertTransition("on", "on");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidStatusTransition);
      expect(error).toMatchObject({
        status: 409,
        message: "Cannot move lamp from on to on",
        details: { entity: "lamp", from: "on", to: "on" },
      });
    }
  });
});
