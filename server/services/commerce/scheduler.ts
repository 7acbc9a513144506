/**
 * Commerce Sweep Scheduler
 *
 * Periodically:
 * - removes carts idle past the cart expiry
 * - marks pending referrals past their expiry as expired
 *
 * A tick that starts while the previous one is still running is skipped.
 */

import logger from "../../logger";

export type SweepResult = {
  expiredCarts: number;
  expiredReferrals: number;
};

export interface CartSweeper {
  sweepExpired(now?: Date): Promise<number>;
}

export interface ReferralSweeper {
  sweepExpired(now?: Date): Promise<number>;
}

export type SweepSchedulerOptions = {
  carts: CartSweeper;
  referrals: ReferralSweeper;
  intervalMs: number;
};

export interface SweepScheduler {
  start(): void;
  stop(): void;
  /** Runs one sweep now; resolves to null when a sweep is already in flight */
  runOnce(): Promise<SweepResult | null>;
  isStarted(): boolean;
}

export function createSweepScheduler(options: SweepSchedulerOptions): SweepScheduler {
  let interval: NodeJS.Timeout | null = null;
  let isRunning = false;

  async function runOnce(): Promise<SweepResult | null> {
    if (isRunning) {
      return null;
    }

    isRunning = true;
    try {
      const [expiredCarts, expiredReferrals] = await Promise.all([
        options.carts.sweepExpired().catch((error: unknown) => {
          logger.error("[Scheduler] Cart sweep failed", { error });
          return 0;
        }),
        options.referrals.sweepExpired().catch((error: unknown) => {
          logger.error("[Scheduler] Referral sweep failed", { error });
          return 0;
        }),
      ]);
      return { expiredCarts, expiredReferrals };
    } finally {
      isRunning = false;
    }
  }

  const tick = () => {
    void runOnce();
  };

  return {
    start() {
      if (interval) {
        logger.warn("[Scheduler] Commerce sweep scheduler already running");
        return;
      }

      interval = setInterval(tick, options.intervalMs);
      interval.unref();
      tick();

      logger.info("[Scheduler] Commerce sweep scheduler started", {
        intervalMs: options.intervalMs,
      });
    },

    stop() {
      if (interval) {
        clearInterval(interval);
        interval = null;
        logger.info("[Scheduler] Commerce sweep scheduler stopped");
      }
    },

    runOnce,

    isStarted() {
      return interval !== null;
    },
  };
}
