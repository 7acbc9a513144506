import type { OrderStatus, PaymentStatus, PayoutStatus, ReferralStatus } from "@shared/schema";
import { InvalidStatusTransition } from "./errors";

export type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export type StateMachine<S extends string> = {
  canTransition(from: S, to: S): boolean;
  /** @throws {InvalidStatusTransition} */
  assertTransition(from: S, to: S): void;
  isTerminal(status: S): boolean;
};

export function createStateMachine<S extends string>(
  entity: string,
  transitions: TransitionTable<S>
): StateMachine<S> {
  const canTransition = (from: S, to: S) => transitions[from].includes(to);

  return {
    canTransition,
    assertTransition(from, to) {
      if (!canTransition(from, to)) {
        throw new InvalidStatusTransition(entity, from, to);
      }
    },
    isTerminal(status) {
      return transitions[status].length === 0;
    },
  };
}

export const orderStateMachine = createStateMachine<OrderStatus>("order", {
  pending: ["processing", "cancelled"],
  processing: ["shipped", "cancelled"],
  shipped: ["delivered"],
  delivered: ["refunded"],
  cancelled: [],
  refunded: [],
});

export const paymentStateMachine = createStateMachine<PaymentStatus>("payment", {
  pending: ["completed", "failed"],
  completed: [],
  failed: [],
});

export const referralStateMachine = createStateMachine<ReferralStatus>("referral", {
  pending: ["completed", "cancelled", "expired"],
  completed: [],
  cancelled: [],
  expired: [],
});

export const payoutStateMachine = createStateMachine<PayoutStatus>("payout", {
  pending: ["processing"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
});
