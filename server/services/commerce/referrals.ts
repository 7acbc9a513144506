/**
 * Referral Attribution Engine
 *
 * click → registration → first delivered purchase. A referral converts at
 * most once: conversion locks the referral row and the order id is unique
 * across referrals.
 *
 * Merchants may also publish named campaign links. A click through a link
 * opens an ordinary referral tagged with the link, and the link counts the
 * conversion when that referral converts.
 */

import type { CommerceConfig } from "../../config/commerce";
import { DAY_MS } from "../../config/constants";
import logger from "../../logger";
import {
  NotFoundError,
  ReferralAlreadyConverted,
  ReferralExpired,
  ValidationError,
} from "./errors";
import type { CommerceEvents } from "./events";
import { newId, newReferralToken, slugify } from "./ids";
import { assertMerchantAccess, loadMerchant } from "./merchantAccess";
import { roundMoney } from "./money";
import { earnPoints } from "./points";
import { referralStateMachine } from "./stateMachines";
import type { CommerceStore, UnitOfWork } from "./store/types";
import type { Actor, Clock, MerchantRecord, ReferralLinkRecord, ReferralRecord } from "./types";

export type VisitorMeta = {
  email?: string;
  source?: string;
  landingPage?: string;
  userAgent?: string;
  ipAddress?: string;
};

export type ClickResult = {
  referralToken: string;
  expiresAt: Date;
};

export type ReferralLinkInput = {
  name: string;
  targetUrl: string;
  campaignName?: string;
  campaignSource?: string;
  campaignMedium?: string;
  expiresAt?: Date;
};

export type ReferralLinkView = ReferralLinkRecord & {
  /** conversions per unique click, as a percentage */
  conversionRate: number;
};

export type LinkClickResult = ClickResult & { link: ReferralLinkView };

export const toLinkView = (link: ReferralLinkRecord): ReferralLinkView => ({
  ...link,
  conversionRate: link.uniqueClicks > 0 ? roundMoney((link.conversions / link.uniqueClicks) * 100) : 0,
});

export type ConversionOutcome =
  | { converted: true; referral: ReferralRecord; commission: number; pointsAwarded: number }
  | {
      converted: false;
      reason: "order_not_found" | "order_not_delivered" | "no_referral" | "expired" | "already_converted";
    };

export type ReferralEngineDeps = {
  store: CommerceStore;
  config: Pick<CommerceConfig, "referralExpiryDays">;
  events: CommerceEvents;
  clock: Clock;
};

/** Why a pending-looking referral cannot convert right now, if anything */
export function conversionBlocker(
  referral: ReferralRecord,
  now: Date
): ReferralExpired | ReferralAlreadyConverted | null {
  if (referral.status !== "pending" || referral.orderId !== null) {
    return new ReferralAlreadyConverted(referral.id, referral.orderId);
  }
  if (now.getTime() > referral.expiresAt.getTime()) {
    return new ReferralExpired(referral.id, referral.expiresAt);
  }
  return null;
}

export class ReferralEngine {
  private readonly store: CommerceStore;
  private readonly config: Pick<CommerceConfig, "referralExpiryDays">;
  private readonly events: CommerceEvents;
  private readonly clock: Clock;

  constructor(deps: ReferralEngineDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.events = deps.events;
    this.clock = deps.clock;
  }

  /**
   * Records a visit through a merchant's referral link. The merchant's
   * commission rate and points per referral are frozen onto the referral.
   */
  async trackClick(referralCode: string, meta: VisitorMeta = {}): Promise<ClickResult> {
    const code = referralCode.trim();

    const referral = await this.store.transaction(async (uow) => {
      const merchant = await uow.merchants.findByReferralCode(code, { forUpdate: true });
      if (!merchant) throw new NotFoundError("Merchant", code);
      return this.openReferral(uow, merchant, meta, null);
    });

    logger.info("[Referrals] Click tracked", {
      referralId: referral.id,
      merchantId: referral.merchantId,
      source: referral.source,
    });
    return { referralToken: referral.referralToken, expiresAt: referral.expiresAt };
  }

  /**
   * Records a visit through a campaign link. Every click is counted; unique
   * clicks only when the caller says the visitor is new to the link.
   */
  async trackLinkClick(
    slug: string,
    options: VisitorMeta & { unique?: boolean } = {}
  ): Promise<LinkClickResult> {
    const { unique = false, ...meta } = options;

    const result = await this.store.transaction(async (uow) => {
      const link = await uow.referralLinks.findBySlug(slug.trim().toLowerCase(), { forUpdate: true });
      if (!link) throw new NotFoundError("Referral link", slug);

      const now = this.clock();
      if (!link.isActive || (link.expiresAt !== null && link.expiresAt.getTime() <= now.getTime())) {
        throw new ValidationError("REFERRAL_LINK_INACTIVE", "Referral link is no longer active", {
          slug: link.slug,
        });
      }

      const merchant = await loadMerchant(uow, link.merchantId, true);
      const referral = await this.openReferral(
        uow,
        merchant,
        {
          ...meta,
          source: meta.source ?? link.campaignSource ?? undefined,
          landingPage: meta.landingPage ?? link.targetUrl,
        },
        link.id
      );
      const counted = await uow.referralLinks.update(link.id, {
        clickCount: link.clickCount + 1,
        uniqueClicks: link.uniqueClicks + (unique ? 1 : 0),
        updatedAt: now,
      });
      return { referral, link: counted };
    });

    logger.info("[Referrals] Link click tracked", {
      referralId: result.referral.id,
      linkId: result.link.id,
      merchantId: result.link.merchantId,
      unique,
    });
    return {
      referralToken: result.referral.referralToken,
      expiresAt: result.referral.expiresAt,
      link: toLinkView(result.link),
    };
  }

  /**
   * Creates a named campaign link. The slug comes from the name and gets a
   * numeric suffix while it collides with an existing link.
   */
  async createLink(
    merchantId: string,
    input: ReferralLinkInput,
    actor: Actor
  ): Promise<ReferralLinkView> {
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError("INVALID_LINK_NAME", "Link name is required");
    }

    const link = await this.store.transaction(async (uow) => {
      const merchant = await loadMerchant(uow, merchantId);
      assertMerchantAccess(merchant, actor);

      const now = this.clock();
      if (input.expiresAt && input.expiresAt.getTime() <= now.getTime()) {
        throw new ValidationError("INVALID_LINK_EXPIRY", "Link expiry must be in the future");
      }

      const base = slugify(name);
      let slug = base;
      for (let suffix = 1; await uow.referralLinks.findBySlug(slug); suffix += 1) {
        slug = `${base}-${suffix}`;
      }

      const record: ReferralLinkRecord = {
        id: newId(),
        merchantId: merchant.id,
        name,
        slug,
        targetUrl: input.targetUrl,
        campaignName: input.campaignName ?? null,
        campaignSource: input.campaignSource ?? null,
        campaignMedium: input.campaignMedium ?? null,
        clickCount: 0,
        uniqueClicks: 0,
        conversions: 0,
        isActive: true,
        expiresAt: input.expiresAt ?? null,
        createdAt: now,
        updatedAt: now,
      };
      await uow.referralLinks.insert(record);
      return record;
    });

    logger.info("[Referrals] Link created", { linkId: link.id, merchantId, slug: link.slug });
    return toLinkView(link);
  }

  /** A merchant's campaign links, newest first */
  listLinks(merchantId: string, actor: Actor): Promise<ReferralLinkView[]> {
    return this.store.transaction(async (uow) => {
      const merchant = await loadMerchant(uow, merchantId);
      assertMerchantAccess(merchant, actor);
      const links = await uow.referralLinks.listByMerchant(merchant.id);
      return links.map(toLinkView);
    });
  }

  private async openReferral(
    uow: UnitOfWork,
    merchant: MerchantRecord,
    meta: VisitorMeta,
    referralLinkId: string | null
  ): Promise<ReferralRecord> {
    if (merchant.status !== "approved" || !merchant.isActive) {
      throw new ValidationError("MERCHANT_INACTIVE", "Merchant is not accepting referrals", {
        status: merchant.status,
      });
    }

    const now = this.clock();
    const record: ReferralRecord = {
      id: newId(),
      merchantId: merchant.id,
      referralToken: newReferralToken(),
      referralLinkId,
      referredEmail: meta.email ?? null,
      referredUserId: null,
      orderId: null,
      commissionRate: merchant.commissionRate,
      pointsPerReferral: merchant.pointsPerReferral,
      commissionAmount: 0,
      pointsAwarded: 0,
      status: "pending",
      source: meta.source ?? null,
      landingPage: meta.landingPage ?? null,
      userAgent: meta.userAgent ?? null,
      ipAddress: meta.ipAddress ?? null,
      clickedAt: now,
      registeredAt: null,
      firstPurchaseAt: null,
      expiresAt: new Date(now.getTime() + this.config.referralExpiryDays * DAY_MS),
      updatedAt: now,
    };

    await uow.referrals.insert(record);
    await uow.merchants.update(merchant.id, { totalReferrals: merchant.totalReferrals + 1 });
    return record;
  }

  /**
   * Links a newly registered user to the referral they arrived through.
   * Never throws: anything that prevents the link is logged and yields null.
   */
  async attributeRegistration(token: string, userId: string): Promise<ReferralRecord | null> {
    try {
      return await this.store.transaction(async (uow) => {
        const referral = await uow.referrals.findByToken(token, { forUpdate: true });
        if (!referral) {
          logger.debug("[Referrals] Registration with unknown token", { userId });
          return null;
        }

        const now = this.clock();
        const blocker = conversionBlocker(referral, now);
        if (blocker || referral.referredUserId !== null) {
          logger.info("[Referrals] Registration not attributed", {
            referralId: referral.id,
            userId,
            reason: blocker?.code ?? "ALREADY_REGISTERED",
          });
          return null;
        }

        const existing = await uow.referrals.findPendingByUser(userId);
        if (existing && existing.id !== referral.id) {
          logger.info("[Referrals] User already has a pending referral", {
            referralId: referral.id,
            existingReferralId: existing.id,
            userId,
          });
          return null;
        }

        const updated = await uow.referrals.update(referral.id, {
          referredUserId: userId,
          registeredAt: now,
          updatedAt: now,
        });
        logger.info("[Referrals] Registration attributed", {
          referralId: referral.id,
          merchantId: referral.merchantId,
          userId,
        });
        return updated;
      });
    } catch (error) {
      logger.error("[Referrals] Registration attribution failed", {
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Converts the buyer's pending referral for a delivered order: commission
   * and points go to the merchant in the same transaction that completes the
   * referral. Blocked conversions are logged and reported, never thrown.
   */
  async attributeFirstPurchase(orderId: string): Promise<ConversionOutcome> {
    const outcome = await this.store.transaction(async (uow): Promise<ConversionOutcome> => {
      const order = await uow.orders.findById(orderId);
      if (!order) return { converted: false, reason: "order_not_found" };
      if (order.status !== "delivered") return { converted: false, reason: "order_not_delivered" };

      const linked = await uow.referrals.findByOrderId(order.id);
      if (linked) {
        const blocker = new ReferralAlreadyConverted(linked.id, linked.orderId);
        logger.warn("[Referrals] Conversion skipped", { orderId, code: blocker.code });
        return { converted: false, reason: "already_converted" };
      }

      const referral = await uow.referrals.findPendingByUser(order.userId, { forUpdate: true });
      if (!referral) return { converted: false, reason: "no_referral" };

      const now = this.clock();
      const blocker = conversionBlocker(referral, now);
      if (blocker instanceof ReferralExpired) {
        referralStateMachine.assertTransition(referral.status, "expired");
        await uow.referrals.update(referral.id, { status: "expired", updatedAt: now });
        logger.warn("[Referrals] Conversion skipped", {
          orderId,
          referralId: referral.id,
          code: blocker.code,
        });
        return { converted: false, reason: "expired" };
      }
      if (blocker) {
        logger.warn("[Referrals] Conversion skipped", {
          orderId,
          referralId: referral.id,
          code: blocker.code,
        });
        return { converted: false, reason: "already_converted" };
      }

      const merchant = await uow.merchants.findById(referral.merchantId, { forUpdate: true });
      if (!merchant) throw new NotFoundError("Merchant", referral.merchantId);

      referralStateMachine.assertTransition(referral.status, "completed");
      const commission = roundMoney(order.totalAmount * referral.commissionRate);
      const points = referral.pointsPerReferral;

      const completed = await uow.referrals.update(referral.id, {
        status: "completed",
        orderId: order.id,
        commissionAmount: commission,
        pointsAwarded: points,
        firstPurchaseAt: now,
        updatedAt: now,
      });

      await uow.merchants.update(merchant.id, {
        successfulReferrals: merchant.successfulReferrals + 1,
        totalEarnings: roundMoney(merchant.totalEarnings + commission),
        totalPointsEarned: merchant.totalPointsEarned + points,
        lastReferralAt: now,
      });

      if (completed.referralLinkId) {
        const link = await uow.referralLinks.findById(completed.referralLinkId, { forUpdate: true });
        if (link) {
          await uow.referralLinks.update(link.id, { conversions: link.conversions + 1, updatedAt: now });
        }
      }

      if (points > 0) {
        await earnPoints(uow, merchant.userId, points, "earned_referral", {
          reason: `Referral commission for order ${order.orderNumber}`,
          orderId: order.id,
          now,
        });
      }

      return { converted: true, referral: completed, commission, pointsAwarded: points };
    });

    if (outcome.converted) {
      logger.info("[Referrals] Referral converted", {
        referralId: outcome.referral.id,
        merchantId: outcome.referral.merchantId,
        orderId,
        commission: outcome.commission,
        pointsAwarded: outcome.pointsAwarded,
      });
      this.events.emit("referral.converted", {
        referral: outcome.referral,
        orderId,
        commission: outcome.commission,
        pointsAwarded: outcome.pointsAwarded,
      });
    }
    return outcome;
  }

  /** Marks pending referrals past their expiry as expired; returns how many. */
  async sweepExpired(now: Date = this.clock()): Promise<number> {
    const expired = await this.store.transaction((uow) => uow.referrals.expirePendingBefore(now));
    if (expired > 0) {
      logger.info("[Referrals] Expired referrals swept", { expired });
    }
    return expired;
  }

  async cancelReferral(token: string): Promise<ReferralRecord> {
    const referral = await this.store.transaction(async (uow) => {
      const current = await uow.referrals.findByToken(token, { forUpdate: true });
      if (!current) throw new NotFoundError("Referral", token);
      referralStateMachine.assertTransition(current.status, "cancelled");
      return uow.referrals.update(current.id, { status: "cancelled", updatedAt: this.clock() });
    });

    logger.info("[Referrals] Referral cancelled", { referralId: referral.id });
    return referral;
  }
}
