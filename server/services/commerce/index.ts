/**
 * Commerce Engine
 *
 * Wires the ledgers and engines over one store, one config and one clock.
 */

import type { CommerceConfig } from "../../config/commerce";
import { CartStore } from "./cart";
import { CouponService } from "./coupons";
import { CommerceEvents } from "./events";
import { InventoryLedger } from "./inventory";
import { OrderEngine } from "./orders";
import type { PaymentGateway } from "./paymentGateway";
import { PayoutLedger } from "./payouts";
import { PointsLedger } from "./points";
import { ReferralEngine } from "./referrals";
import { createSweepScheduler, type SweepScheduler } from "./scheduler";
import type { CommerceStore } from "./store/types";
import type { Clock } from "./types";

export type CommerceEngineOptions = {
  store: CommerceStore;
  config: CommerceConfig;
  gateway?: PaymentGateway;
  clock?: Clock;
};

export type CommerceEngine = {
  config: CommerceConfig;
  events: CommerceEvents;
  carts: CartStore;
  orders: OrderEngine;
  referrals: ReferralEngine;
  payouts: PayoutLedger;
  points: PointsLedger;
  inventory: InventoryLedger;
  coupons: CouponService;
  createScheduler(intervalMs?: number): SweepScheduler;
};

const systemClock: Clock = () => new Date();

export function createCommerceEngine(options: CommerceEngineOptions): CommerceEngine {
  const { store, config, gateway } = options;
  const clock = options.clock ?? systemClock;
  const events = new CommerceEvents();

  const carts = new CartStore(store, config, clock);
  const referrals = new ReferralEngine({ store, config, events, clock });
  const orders = new OrderEngine({
    store,
    config,
    events,
    clock,
    gateway,
    attribution: referrals,
  });

  return {
    config,
    events,
    carts,
    orders,
    referrals,
    payouts: new PayoutLedger({ store, config, clock }),
    points: new PointsLedger(store, clock),
    inventory: new InventoryLedger(store),
    coupons: new CouponService(store, clock),
    createScheduler: (intervalMs = config.sweepIntervalMs) =>
      createSweepScheduler({ carts, referrals, intervalMs }),
  };
}

export { CommerceError } from "./errors";
export type { PaymentGateway } from "./paymentGateway";
export type { CommerceStore, UnitOfWork } from "./store/types";
