/**
 * Coupon Validator & Service
 *
 * `validateCoupon` is stateless: the caller supplies the coupon row and the
 * user's usage count, so the same rules run inside checkout and for previews.
 */

import type { InsertCoupon } from "@shared/schema";
import logger from "../../logger";
import { InvalidCouponError, ValidationError } from "./errors";
import { newId } from "./ids";
import { roundMoney } from "./money";
import type { CommerceStore } from "./store/types";
import type { Clock, CouponRecord } from "./types";

export type CouponPreview = {
  code: string;
  name: string;
  discountType: CouponRecord["discountType"];
  discount: number;
};

export function normalizeCouponCode(code: string): string {
  return code.trim().toUpperCase();
}

/** Discount the coupon grants on `orderAmount`, before eligibility checks. */
export function calculateCouponDiscount(coupon: CouponRecord, orderAmount: number): number {
  let discount =
    coupon.discountType === "percentage"
      ? orderAmount * (coupon.discountValue / 100)
      : coupon.discountValue;

  if (coupon.maximumDiscountAmount !== null) {
    discount = Math.min(discount, coupon.maximumDiscountAmount);
  }

  return roundMoney(Math.max(0, Math.min(discount, orderAmount)));
}

/**
 * Checks, in order: active, validity window, global limit, per-user limit,
 * minimum order amount. Returns the discount or throws {@link InvalidCouponError}.
 */
export function validateCoupon(
  coupon: CouponRecord | undefined,
  orderAmount: number,
  userUsageCount: number,
  now: Date
): number {
  if (!coupon) {
    throw new InvalidCouponError("not_found", "Coupon not found");
  }

  if (!coupon.isActive) {
    throw new InvalidCouponError("inactive", "Coupon is not active", { code: coupon.code });
  }

  if (coupon.validFrom && now.getTime() < coupon.validFrom.getTime()) {
    throw new InvalidCouponError("not_yet_valid", "Coupon is not valid yet", {
      code: coupon.code,
      validFrom: coupon.validFrom.toISOString(),
    });
  }

  if (coupon.validUntil && now.getTime() > coupon.validUntil.getTime()) {
    throw new InvalidCouponError("expired", "Coupon has expired", {
      code: coupon.code,
      validUntil: coupon.validUntil.toISOString(),
    });
  }

  if (coupon.usageLimit !== null && coupon.usageCount >= coupon.usageLimit) {
    throw new InvalidCouponError("usage_limit_reached", "Coupon usage limit reached", {
      code: coupon.code,
    });
  }

  if (coupon.usageLimitPerUser !== null && userUsageCount >= coupon.usageLimitPerUser) {
    throw new InvalidCouponError(
      "user_limit_reached",
      "You have already used this coupon the maximum number of times",
      { code: coupon.code }
    );
  }

  if (coupon.minimumOrderAmount !== null && orderAmount < coupon.minimumOrderAmount) {
    throw new InvalidCouponError(
      "minimum_not_met",
      `Minimum order amount of ${coupon.minimumOrderAmount} required`,
      { code: coupon.code, minimumOrderAmount: coupon.minimumOrderAmount }
    );
  }

  return calculateCouponDiscount(coupon, orderAmount);
}

export class CouponService {
  constructor(
    private readonly store: CommerceStore,
    private readonly clock: Clock
  ) {}

  /** Validates a code for a would-be order without recording any usage. */
  async previewCoupon(code: string, userId: string, orderAmount: number): Promise<CouponPreview> {
    if (!Number.isFinite(orderAmount) || orderAmount < 0) {
      throw new ValidationError("INVALID_AMOUNT", "Order amount must be a non-negative number");
    }

    return this.store.transaction(async (uow) => {
      const normalized = normalizeCouponCode(code);
      const coupon = await uow.coupons.findByCode(normalized);
      const usage = coupon ? await uow.coupons.countUsageByUser(coupon.id, userId) : 0;
      const discount = validateCoupon(coupon, orderAmount, usage, this.clock());

      return {
        code: normalized,
        name: coupon?.name ?? normalized,
        discountType: coupon?.discountType ?? "fixed",
        discount,
      };
    });
  }

  async createCoupon(input: InsertCoupon): Promise<CouponRecord> {
    if (input.discountType === "percentage" && input.discountValue > 100) {
      throw new ValidationError("INVALID_DISCOUNT", "Percentage discount cannot exceed 100");
    }
    if (input.validFrom && input.validUntil && input.validFrom > input.validUntil) {
      throw new ValidationError("INVALID_WINDOW", "validFrom must be before validUntil");
    }

    const coupon: CouponRecord = {
      id: newId(),
      code: normalizeCouponCode(input.code),
      name: input.name,
      discountType: input.discountType,
      discountValue: input.discountValue,
      minimumOrderAmount: input.minimumOrderAmount ?? null,
      maximumDiscountAmount: input.maximumDiscountAmount ?? null,
      usageLimit: input.usageLimit ?? null,
      usageLimitPerUser: input.usageLimitPerUser ?? null,
      usageCount: 0,
      validFrom: input.validFrom ?? null,
      validUntil: input.validUntil ?? null,
      isActive: input.isActive ?? true,
      createdAt: this.clock(),
    };

    await this.store.transaction(async (uow) => {
      if (await uow.coupons.findByCode(coupon.code)) {
        throw new ValidationError("COUPON_EXISTS", `Coupon ${coupon.code} already exists`);
      }
      await uow.coupons.insert(coupon);
    });

    logger.info("[Coupons] Coupon created", { couponId: coupon.id, code: coupon.code });
    return coupon;
  }
}
