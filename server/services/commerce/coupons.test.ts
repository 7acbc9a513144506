import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { BASE_TIME, couponRecord, createManualClock } from "../../__tests__/helpers/commerce";
import { CouponService, calculateCouponDiscount, normalizeCouponCode, validateCoupon } from "./coupons";
import { InvalidCouponError } from "./errors";
import { createMemoryCommerceStore, type MemoryCommerceStore } from "./store/memoryStore";

function rejectionReason(run: () => unknown): string | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof InvalidCouponError) return error.reason;
    throw error;
  }
  return undefined;
}

describe("calculateCouponDiscount", () => {
  it("takes a percentage of the order amount", () => {
    expect(calculateCouponDiscount(couponRecord(), 250)).toBe(25);
  });

  it("caps percentage discounts at the maximum", () => {
    expect(calculateCouponDiscount(couponRecord({ maximumDiscountAmount: 15 }), 250)).toBe(15);
  });

  it("never discounts more than the order amount", () => {
    const fixed = couponRecord({ discountType: "fixed", discountValue: 50 });
    expect(calculateCouponDiscount(fixed, 30)).toBe(30);
    expect(calculateCouponDiscount(fixed, 80)).toBe(50);
  });
});

describe("validateCoupon", () => {
  const now = BASE_TIME;

  it("returns the discount for a usable coupon", () => {
    expect(validateCoupon(couponRecord(), 200, 0, now)).toBe(20);
  });

  it("rejects each failing rule with its reason", () => {
    expect(rejectionReason(() => validateCoupon(undefined, 200, 0, now))).toBe("not_found");
    expect(rejectionReason(() => validateCoupon(couponRecord({ isActive: false }), 200, 0, now))).toBe(
      "inactive"
    );
    expect(
      rejectionReason(() =>
        validateCoupon(couponRecord({ validFrom: new Date("2026-03-03T00:00:00Z") }), 200, 0, now)
      )
    ).toBe("not_yet_valid");
    expect(
      rejectionReason(() =>
        validateCoupon(couponRecord({ validUntil: new Date("2026-03-01T00:00:00Z") }), 200, 0, now)
      )
    ).toBe("expired");
    expect(
      rejectionReason(() =>
        validateCoupon(couponRecord({ usageLimit: 5, usageCount: 5 }), 200, 0, now)
      )
    ).toBe("usage_limit_reached");
    expect(
      rejectionReason(() => validateCoupon(couponRecord({ usageLimitPerUser: 1 }), 200, 1, now))
    ).toBe("user_limit_reached");
    expect(
      rejectionReason(() => validateCoupon(couponRecord({ minimumOrderAmount: 500 }), 200, 0, now))
    ).toBe("minimum_not_met");
  });

  it("checks activity before the validity window", () => {
    const coupon = couponRecord({
      isActive: false,
      validUntil: new Date("2026-01-01T00:00:00Z"),
    });
    expect(rejectionReason(() => validateCoupon(coupon, 200, 0, now))).toBe("inactive");
  });

  it("accepts an order exactly at the minimum", () => {
    expect(validateCoupon(couponRecord({ minimumOrderAmount: 200 }), 200, 0, now)).toBe(20);
  });

  it("reports INVALID_COUPON with the reason in details", () => {
    try {
      validateCoupon(couponRecord({ isActive: false }), 200, 0, now);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({
        code: "INVALID_COUPON",
        status: 400,
        details: { reason: "inactive", code: "SAVE10" },
      });
    }
  });
});

describe("normalizeCouponCode", () => {
  it("trims and upper-cases", () => {
    expect(normalizeCouponCode("  save10 ")).toBe("SAVE10");
  });
});

describe("CouponService", () => {
  let store: MemoryCommerceStore;
  let service: CouponService;

  beforeEach(() => {
    store = createMemoryCommerceStore();
    service = new CouponService(store, createManualClock().clock);
  });

  it("previews a discount without recording usage", async () => {
    store.seed.coupon(couponRecord());

    const preview = await service.previewCoupon("save10", "buyer", 300);

    expect(preview).toEqual({
      code: "SAVE10",
      name: "Ten percent off",
      discountType: "percentage",
      discount: 30,
    });
    const stored = await store.transaction((uow) => uow.coupons.findByCode("SAVE10"));
    expect(stored?.usageCount).toBe(0);
  });

  it("counts the user's past redemptions in previews", async () => {
    store.seed.coupon(couponRecord({ usageLimitPerUser: 1 }));
    await store.transaction((uow) =>
      uow.coupons.recordUsage({
        id: "usage-1",
        couponId: "coupon-1",
        userId: "buyer",
        orderId: "order-1",
        discountAmount: 10,
        createdAt: BASE_TIME,
      })
    );

    await expect(service.previewCoupon("SAVE10", "buyer", 300)).rejects.toMatchObject({
      reason: "user_limit_reached",
    });
    await expect(service.previewCoupon("SAVE10", "someone-else", 300)).resolves.toMatchObject({
      discount: 30,
    });
  });

  it("rejects a negative order amount", async () => {
    await expect(service.previewCoupon("SAVE10", "buyer", -1)).rejects.toMatchObject({
      code: "INVALID_AMOUNT",
    });
  });

  it("creates coupons with normalized codes", async () => {
    const coupon = await service.createCoupon({
      code: " spring5 ",
      name: "Spring",
      discountType: "fixed",
      discountValue: 5,
    });

    expect(coupon).toMatchObject({
      code: "SPRING5",
      usageCount: 0,
      isActive: true,
      minimumOrderAmount: null,
      createdAt: BASE_TIME,
    });
    await expect(service.previewCoupon("spring5", "buyer", 40)).resolves.toMatchObject({
      discount: 5,
    });
  });

  it("refuses duplicate codes", async () => {
    store.seed.coupon(couponRecord());
    await expect(
      service.createCoupon({ code: "save10", name: "Again", discountType: "fixed", discountValue: 1 })
    ).rejects.toMatchObject({ code: "COUPON_EXISTS" });
  });

  it("refuses percentages above 100 and inverted windows", async () => {
    await expect(
      service.createCoupon({ code: "TOO", name: "Too much", discountType: "percentage", discountValue: 120 })
    ).rejects.toMatchObject({ code: "INVALID_DISCOUNT" });
    await expect(
      service.createCoupon({
        code: "BACKWARDS",
        name: "Backwards",
        discountType: "fixed",
        discountValue: 1,
        validFrom: new Date("2026-05-01T00:00:00Z"),
        validUntil: new Date("2026-04-01T00:00:00Z"),
      })
    ).rejects.toMatchObject({ code: "INVALID_WINDOW" });
  });
});
