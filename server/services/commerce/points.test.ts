import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { BASE_TIME, createManualClock, pointsAccount } from "../../__tests__/helpers/commerce";
import { InsufficientPoints } from "./errors";
import { PointsLedger } from "./points";
import { createMemoryCommerceStore, type MemoryCommerceStore } from "./store/memoryStore";

describe("PointsLedger", () => {
  let store: MemoryCommerceStore;
  let points: PointsLedger;

  beforeEach(() => {
    store = createMemoryCommerceStore();
    points = new PointsLedger(store, createManualClock().clock);
  });

  it("opens an empty account on first read", async () => {
    await expect(points.getAccount("newcomer")).resolves.toEqual({
      userId: "newcomer",
      currentBalance: 0,
      totalEarned: 0,
      totalSpent: 0,
      updatedAt: BASE_TIME,
    });
  });

  it("keeps balance equal to earned minus spent", async () => {
    await points.earn("buyer", 300, "Welcome bonus");
    await points.spend("buyer", 120, "Redeemed");
    const account = await points.refund("buyer", 20, "Order cancelled");

    expect(account).toMatchObject({ currentBalance: 200, totalEarned: 320, totalSpent: 120 });
    expect(account.currentBalance).toBe(account.totalEarned - account.totalSpent);
  });

  it("records every entry with the balance after it, newest first", async () => {
    await points.earn("buyer", 300, "Welcome bonus");
    await points.spend("buyer", 120, "Redeemed");

    const summary = await points.getSummary("buyer");

    expect(summary.recentTransactions.map((entry) => [entry.type, entry.points, entry.balanceAfter])).toEqual([
      ["spent_discount", -120, 180],
      ["earned_bonus", 300, 300],
    ]);
  });

  it("limits history to the requested size", async () => {
    store.seed.pointsAccount(pointsAccount({ currentBalance: 10 }));
    await points.spend("buyer", 1, "one");
    await points.spend("buyer", 1, "two");
    await points.spend("buyer", 1, "three");

    const summary = await points.getSummary("buyer", 2);
    expect(summary.recentTransactions.map((entry) => entry.reason)).toEqual(["three", "two"]);
  });

  it("refuses to overdraw and leaves the account as it was", async () => {
    store.seed.pointsAccount(pointsAccount({ currentBalance: 50 }));

    const attempt = points.spend("buyer", 51, "Too much");
    await expect(attempt).rejects.toBeInstanceOf(InsufficientPoints);
    await expect(attempt).rejects.toMatchObject({
      code: "INSUFFICIENT_POINTS",
      details: { requested: 51, available: 50 },
    });
    await expect(points.getAccount("buyer")).resolves.toMatchObject({ currentBalance: 50 });
  });

  it("credits refunds like earnings and keeps the recorded spend", async () => {
    await points.earn("buyer", 30, "Welcome bonus");
    await points.spend("buyer", 20, "Redeemed");
    await points.refund("buyer", 20, "Order cancelled");
    const account = await points.refund("buyer", 5, "Goodwill");

    expect(account).toMatchObject({ currentBalance: 35, totalEarned: 55, totalSpent: 20 });
    const summary = await points.getSummary("buyer");
    expect(summary.recentTransactions.map((entry) => [entry.type, entry.points, entry.balanceAfter])).toEqual([
      ["refund_cancellation", 5, 35],
      ["refund_cancellation", 20, 30],
      ["spent_discount", -20, 10],
      ["earned_bonus", 30, 30],
    ]);
  });

  it("serializes concurrent spends against one account", async () => {
    store.seed.pointsAccount(pointsAccount({ currentBalance: 100 }));

    const results = await Promise.allSettled([
      points.spend("buyer", 70, "First redemption"),
      points.spend("buyer", 70, "Second redemption"),
    ]);

    expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
    expect(results[1]).toMatchObject({ reason: { code: "INSUFFICIENT_POINTS", details: { available: 30 } } });
    await expect(points.getAccount("buyer")).resolves.toMatchObject({ currentBalance: 30, totalSpent: 70 });
  });

  it("only moves whole positive amounts", async () => {
    await expect(points.earn("buyer", 0, "Nothing")).rejects.toMatchObject({ code: "INVALID_POINTS" });
    await expect(points.earn("buyer", 2.5, "Half")).rejects.toMatchObject({ code: "INVALID_POINTS" });
  });
});
