/**
 * Points Ledger
 *
 * Balance identity: currentBalance = totalEarned - totalSpent, never negative.
 * A refund is credited like an earning: totalSpent keeps the historical spend.
 */

import { POINTS_HISTORY_LIMIT } from "../../config/constants";
import logger from "../../logger";
import { InsufficientPoints, ValidationError } from "./errors";
import { newId } from "./ids";
import type { CommerceStore, UnitOfWork } from "./store/types";
import type { Clock, PointsAccount, PointsTransaction, PointsTransactionType } from "./types";

type EarnType = Extract<PointsTransactionType, `earned_${string}`>;

export type PointsEntryOptions = {
  reason: string;
  orderId?: string | null;
  now: Date;
};

export type PointsSummary = {
  account: PointsAccount;
  recentTransactions: PointsTransaction[];
};

function assertPoints(points: number): void {
  if (!Number.isInteger(points) || points <= 0) {
    throw new ValidationError("INVALID_POINTS", "Points must be a positive integer");
  }
}

const emptyAccount = (userId: string, now: Date): PointsAccount => ({
  userId,
  currentBalance: 0,
  totalEarned: 0,
  totalSpent: 0,
  updatedAt: now,
});

async function lockAccount(uow: UnitOfWork, userId: string, now: Date): Promise<PointsAccount> {
  const account = await uow.points.findAccount(userId, { forUpdate: true });
  return account ?? emptyAccount(userId, now);
}

async function applyEntry(
  uow: UnitOfWork,
  account: PointsAccount,
  type: PointsTransactionType,
  signedPoints: number,
  options: PointsEntryOptions
): Promise<PointsAccount> {
  await uow.points.saveAccount(account);
  await uow.points.appendTransaction({
    id: newId(),
    userId: account.userId,
    type,
    points: signedPoints,
    balanceAfter: account.currentBalance,
    reason: options.reason,
    orderId: options.orderId ?? null,
    createdAt: options.now,
  });
  return account;
}

export async function earnPoints(
  uow: UnitOfWork,
  userId: string,
  points: number,
  type: EarnType,
  options: PointsEntryOptions
): Promise<PointsAccount> {
  assertPoints(points);
  const account = await lockAccount(uow, userId, options.now);
  const updated: PointsAccount = {
    ...account,
    currentBalance: account.currentBalance + points,
    totalEarned: account.totalEarned + points,
    updatedAt: options.now,
  };
  return applyEntry(uow, updated, type, points, options);
}

/** @throws {InsufficientPoints} when the balance cannot cover `points` */
export async function spendPoints(
  uow: UnitOfWork,
  userId: string,
  points: number,
  options: PointsEntryOptions
): Promise<PointsAccount> {
  assertPoints(points);
  const account = await lockAccount(uow, userId, options.now);
  if (account.currentBalance < points) {
    throw new InsufficientPoints(points, account.currentBalance);
  }
  const updated: PointsAccount = {
    ...account,
    currentBalance: account.currentBalance - points,
    totalSpent: account.totalSpent + points,
    updatedAt: options.now,
  };
  return applyEntry(uow, updated, "spent_discount", -points, options);
}

/** Returns previously spent points, e.g. when the order that used them is cancelled. */
export async function refundPoints(
  uow: UnitOfWork,
  userId: string,
  points: number,
  options: PointsEntryOptions
): Promise<PointsAccount> {
  assertPoints(points);
  const account = await lockAccount(uow, userId, options.now);
  const updated: PointsAccount = {
    ...account,
    currentBalance: account.currentBalance + points,
    totalEarned: account.totalEarned + points,
    updatedAt: options.now,
  };
  return applyEntry(uow, updated, "refund_cancellation", points, options);
}

export class PointsLedger {
  constructor(
    private readonly store: CommerceStore,
    private readonly clock: Clock
  ) {}

  async earn(
    userId: string,
    points: number,
    reason: string,
    type: EarnType = "earned_bonus"
  ): Promise<PointsAccount> {
    const account = await this.store.transaction((uow) =>
      earnPoints(uow, userId, points, type, { reason, now: this.clock() })
    );
    logger.info("[Points] Points earned", { userId, points, type });
    return account;
  }

  async spend(userId: string, points: number, reason: string): Promise<PointsAccount> {
    const account = await this.store.transaction((uow) =>
      spendPoints(uow, userId, points, { reason, now: this.clock() })
    );
    logger.info("[Points] Points spent", { userId, points });
    return account;
  }

  async refund(userId: string, points: number, reason: string): Promise<PointsAccount> {
    const account = await this.store.transaction((uow) =>
      refundPoints(uow, userId, points, { reason, now: this.clock() })
    );
    logger.info("[Points] Points refunded", { userId, points });
    return account;
  }

  getAccount(userId: string): Promise<PointsAccount> {
    return this.store.transaction(async (uow) => {
      const account = await uow.points.findAccount(userId);
      return account ?? emptyAccount(userId, this.clock());
    });
  }

  getSummary(userId: string, limit = POINTS_HISTORY_LIMIT): Promise<PointsSummary> {
    return this.store.transaction(async (uow) => {
      const account = await uow.points.findAccount(userId);
      return {
        account: account ?? emptyAccount(userId, this.clock()),
        recentTransactions: await uow.points.listTransactions(userId, limit),
      };
    });
  }
}
