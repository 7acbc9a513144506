/**
 * Merchant Payout Ledger
 *
 * pendingEarnings = totalEarnings - Σ completed payouts. Completed payouts
 * never add up to more than totalEarnings.
 */

import type { CommerceConfig } from "../../config/commerce";
import { MONEY_EPSILON } from "../../config/constants";
import logger from "../../logger";
import { NotFoundError, ValidationError } from "./errors";
import { newId } from "./ids";
import { assertMerchantAccess, loadMerchant } from "./merchantAccess";
import { roundMoney } from "./money";
import { payoutStateMachine } from "./stateMachines";
import type { CommerceStore } from "./store/types";
import type { Actor, Clock, PayoutRecord } from "./types";

export type MerchantEarnings = {
  merchantId: string;
  totalEarnings: number;
  totalPaid: number;
  pendingEarnings: number;
  totalPointsEarned: number;
  totalReferrals: number;
  successfulReferrals: number;
  conversionRate: number;
  minimumPayout: number;
  canRequestPayout: boolean;
};

export type PayoutRequest = {
  amount?: number;
  method?: string;
};

export type PayoutResult = {
  success: boolean;
  transactionId?: string;
  notes?: string;
  processorId: string;
};

export type PayoutLedgerDeps = {
  store: CommerceStore;
  config: Pick<CommerceConfig, "currency">;
  clock: Clock;
};

export class PayoutLedger {
  private readonly store: CommerceStore;
  private readonly config: Pick<CommerceConfig, "currency">;
  private readonly clock: Clock;

  constructor(deps: PayoutLedgerDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.clock = deps.clock;
  }

  getEarnings(merchantId: string, actor: Actor): Promise<MerchantEarnings> {
    return this.store.transaction(async (uow) => {
      const merchant = await loadMerchant(uow, merchantId);
      assertMerchantAccess(merchant, actor);
      const totalPaid = await uow.payouts.sumCompleted(merchant.id);
      const pendingEarnings = roundMoney(Math.max(0, merchant.totalEarnings - totalPaid));

      return {
        merchantId: merchant.id,
        totalEarnings: merchant.totalEarnings,
        totalPaid,
        pendingEarnings,
        totalPointsEarned: merchant.totalPointsEarned,
        totalReferrals: merchant.totalReferrals,
        successfulReferrals: merchant.successfulReferrals,
        conversionRate:
          merchant.totalReferrals > 0
            ? roundMoney((merchant.successfulReferrals / merchant.totalReferrals) * 100)
            : 0,
        minimumPayout: merchant.minimumPayout,
        canRequestPayout:
          merchant.status === "approved" &&
          merchant.isActive &&
          pendingEarnings + MONEY_EPSILON >= merchant.minimumPayout,
      };
    });
  }

  listPayouts(merchantId: string, actor: Actor): Promise<PayoutRecord[]> {
    return this.store.transaction(async (uow) => {
      const merchant = await loadMerchant(uow, merchantId);
      assertMerchantAccess(merchant, actor);
      return uow.payouts.listByMerchant(merchant.id);
    });
  }

  /**
   * Opens a pending payout. Only one payout may be open per merchant; the
   * merchant row lock serializes concurrent requests.
   */
  async requestPayout(
    merchantId: string,
    request: PayoutRequest,
    actor: Actor
  ): Promise<PayoutRecord> {
    const payout = await this.store.transaction(async (uow) => {
      const merchant = await loadMerchant(uow, merchantId, true);
      assertMerchantAccess(merchant, actor);

      if (merchant.status !== "approved" || !merchant.isActive) {
        throw new ValidationError("MERCHANT_INACTIVE", "Merchant is not eligible for payouts", {
          status: merchant.status,
        });
      }
      if (await uow.payouts.hasOpenPayout(merchant.id)) {
        throw new ValidationError("PAYOUT_IN_PROGRESS", "A payout is already pending");
      }

      const totalPaid = await uow.payouts.sumCompleted(merchant.id);
      const pendingEarnings = roundMoney(Math.max(0, merchant.totalEarnings - totalPaid));
      if (pendingEarnings + MONEY_EPSILON < merchant.minimumPayout) {
        throw new ValidationError(
          "BELOW_MINIMUM_PAYOUT",
          `Minimum payout amount is ${merchant.minimumPayout}`,
          { pendingEarnings, minimumPayout: merchant.minimumPayout }
        );
      }

      const amount = roundMoney(request.amount ?? pendingEarnings);
      if (!Number.isFinite(amount) || amount <= 0) {
        throw new ValidationError("INVALID_AMOUNT", "Payout amount must be positive");
      }
      if (amount > pendingEarnings + MONEY_EPSILON) {
        throw new ValidationError("INSUFFICIENT_EARNINGS", "Payout exceeds pending earnings", {
          pendingEarnings,
        });
      }

      const payoutMethod = request.method ?? merchant.payoutMethod;
      if (!payoutMethod) {
        throw new ValidationError("PAYOUT_METHOD_REQUIRED", "No payout method on file");
      }

      const record: PayoutRecord = {
        id: newId(),
        merchantId: merchant.id,
        amount,
        currency: this.config.currency,
        status: "pending",
        payoutMethod,
        externalTransactionId: null,
        processedBy: null,
        processingNotes: null,
        failureReason: null,
        requestedAt: this.clock(),
        processedAt: null,
        completedAt: null,
      };
      await uow.payouts.insert(record);
      return record;
    });

    logger.info("[Payouts] Payout requested", {
      payoutId: payout.id,
      merchantId,
      amount: payout.amount,
    });
    return payout;
  }

  async startPayout(payoutId: string, processorId: string): Promise<PayoutRecord> {
    const payout = await this.store.transaction(async (uow) => {
      const current = await uow.payouts.findById(payoutId, { forUpdate: true });
      if (!current) throw new NotFoundError("Payout", payoutId);
      payoutStateMachine.assertTransition(current.status, "processing");
      return uow.payouts.update(current.id, {
        status: "processing",
        processedBy: processorId,
        processedAt: this.clock(),
      });
    });

    logger.info("[Payouts] Payout processing", { payoutId, processorId });
    return payout;
  }

  /**
   * Completes or fails a payout. A pending payout is first written as
   * `processing` in the same transaction. Completion re-checks the merchant's
   * earnings under lock.
   */
  async processPayout(payoutId: string, result: PayoutResult): Promise<PayoutRecord> {
    const payout = await this.store.transaction(async (uow) => {
      const found = await uow.payouts.findById(payoutId, { forUpdate: true });
      if (!found) throw new NotFoundError("Payout", payoutId);

      const now = this.clock();
      let current = found;
      if (current.status === "pending") {
        payoutStateMachine.assertTransition(current.status, "processing");
        current = await uow.payouts.update(current.id, {
          status: "processing",
          processedBy: result.processorId,
          processedAt: now,
        });
      }
      payoutStateMachine.assertTransition(current.status, result.success ? "completed" : "failed");

      if (!result.success) {
        return uow.payouts.update(current.id, {
          status: "failed",
          processedBy: result.processorId,
          processedAt: current.processedAt ?? now,
          processingNotes: result.notes ?? null,
          failureReason: result.notes ?? "Payout processing failed",
        });
      }

      const merchant = await loadMerchant(uow, current.merchantId, true);
      const totalPaid = await uow.payouts.sumCompleted(merchant.id);
      if (totalPaid + current.amount > merchant.totalEarnings + MONEY_EPSILON) {
        throw new ValidationError(
          "PAYOUT_EXCEEDS_EARNINGS",
          "Completing this payout would exceed total earnings",
          { totalPaid, amount: current.amount, totalEarnings: merchant.totalEarnings }
        );
      }

      return uow.payouts.update(current.id, {
        status: "completed",
        processedBy: result.processorId,
        processedAt: current.processedAt ?? now,
        completedAt: now,
        externalTransactionId: result.transactionId ?? null,
        processingNotes: result.notes ?? null,
      });
    });

    logger.info("[Payouts] Payout processed", {
      payoutId,
      status: payout.status,
      merchantId: payout.merchantId,
    });
    return payout;
  }
}
