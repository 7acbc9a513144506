import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import logger from "../../logger";
import { createSweepScheduler, type SweepScheduler } from "./scheduler";

describe("createSweepScheduler", () => {
  const carts = { sweepExpired: vi.fn<(now?: Date) => Promise<number>>() };
  const referrals = { sweepExpired: vi.fn<(now?: Date) => Promise<number>>() };
  let scheduler: SweepScheduler;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    carts.sweepExpired.mockResolvedValue(2);
    referrals.sweepExpired.mockResolvedValue(3);
    scheduler = createSweepScheduler({ carts, referrals, intervalMs: 60_000 });
  });

  afterEach(() => {
    scheduler.stop();
    vi.useRealTimers();
  });

  it("starts and sweeps immediately", () => {
    scheduler.start();

    expect(scheduler.isStarted()).toBe(true);
    expect(carts.sweepExpired).toHaveBeenCalledTimes(1);
    expect(referrals.sweepExpired).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith("[Scheduler] Commerce sweep scheduler started", {
      intervalMs: 60_000,
    });
  });

  it("sweeps again on every interval", async () => {
    scheduler.start();
    await vi.advanceTimersByTimeAsync(120_000);

    expect(carts.sweepExpired).toHaveBeenCalledTimes(3);
  });

  it("warns when started twice", () => {
    scheduler.start();
    scheduler.start();
    expect(logger.warn).toHaveBeenCalledWith("[Scheduler] Commerce sweep scheduler already running");
  });

  it("stops cleanly", async () => {
    scheduler.start();
    scheduler.stop();
    await vi.advanceTimersByTimeAsync(120_000);

    expect(scheduler.isStarted()).toBe(false);
    expect(carts.sweepExpired).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith("[Scheduler] Commerce sweep scheduler stopped");
  });

  it("reports what one sweep removed", async () => {
    await expect(scheduler.runOnce()).resolves.toEqual({ expiredCarts: 2, expiredReferrals: 3 });
  });

  it("skips a sweep while another is running", async () => {
    let finish: (count: number) => void = () => undefined;
    carts.sweepExpired.mockReturnValueOnce(
      new Promise<number>((resolve) => {
        finish = resolve;
      })
    );

    const first = scheduler.runOnce();
    await expect(scheduler.runOnce()).resolves.toBeNull();

    finish(1);
    await expect(first).resolves.toEqual({ expiredCarts: 1, expiredReferrals: 3 });
  });

  it("logs a failing sweep and counts it as zero", async () => {
    carts.sweepExpired.mockRejectedValueOnce(new Error("db down"));

    await expect(scheduler.runOnce()).resolves.toEqual({ expiredCarts: 0, expiredReferrals: 3 });
    expect(logger.error).toHaveBeenCalledWith("[Scheduler] Cart sweep failed", {
      error: expect.any(Error),
    });
  });
});
