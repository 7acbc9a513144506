import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import {
  BASE_TIME,
  createManualClock,
  productRecord,
  testConfig,
  variantRecord,
  type ManualClock,
} from "../../__tests__/helpers/commerce";
import { CartStore } from "./cart";
import { createMemoryCommerceStore, type MemoryCommerceStore } from "./store/memoryStore";

describe("CartStore", () => {
  let store: MemoryCommerceStore;
  let time: ManualClock;
  let carts: CartStore;

  beforeEach(() => {
    store = createMemoryCommerceStore();
    store.seed.product(productRecord());
    store.seed.variant(variantRecord());
    time = createManualClock();
    carts = new CartStore(store, testConfig, time.clock);
  });

  it("returns an empty summary for a user without a cart", async () => {
    await expect(carts.getSummary("buyer")).resolves.toEqual({
      userId: "buyer",
      items: [],
      subtotal: 0,
      itemCount: 0,
      unavailableCount: 0,
      updatedAt: null,
    });
  });

  it("adds items and merges repeats of the same line", async () => {
    await carts.addItem("buyer", { productId: "prod-1", quantity: 1 });
    await carts.addItem("buyer", { productId: "prod-1", variantId: "var-1", quantity: 1 });
    const summary = await carts.addItem("buyer", { productId: "prod-1", quantity: 2 });

    expect(summary.items.map((item) => [item.name, item.quantity, item.unitPrice, item.lineTotal])).toEqual([
      ["Canvas Tote", 3, 100, 300],
      ["Canvas Tote (Large)", 1, 120, 120],
    ]);
    expect(summary.subtotal).toBe(420);
    expect(summary.itemCount).toBe(4);
  });

  it("refuses quantities beyond stock", async () => {
    await carts.addItem("buyer", { productId: "prod-1", quantity: 4 });
    await expect(carts.addItem("buyer", { productId: "prod-1", quantity: 2 })).rejects.toMatchObject({
      code: "INSUFFICIENT_STOCK",
      details: { requested: 6, available: 5 },
    });
  });

  it("refuses inactive or unknown products", async () => {
    store.seed.product(productRecord({ id: "prod-off", isActive: false }));
    await expect(carts.addItem("buyer", { productId: "prod-off", quantity: 1 })).rejects.toMatchObject({
      code: "PRODUCT_UNAVAILABLE",
    });
    await expect(carts.addItem("buyer", { productId: "nope", quantity: 1 })).rejects.toMatchObject({
      code: "PRODUCT_UNAVAILABLE",
    });
  });

  it("validates quantities", async () => {
    await expect(carts.addItem("buyer", { productId: "prod-1", quantity: 0 })).rejects.toMatchObject({
      code: "INVALID_QUANTITY",
    });
    await expect(carts.addItem("buyer", { productId: "prod-1", quantity: 1000 })).rejects.toMatchObject({
      code: "QUANTITY_LIMIT",
    });
  });

  it("sets, then removes, a line by quantity", async () => {
    await carts.addItem("buyer", { productId: "prod-1", quantity: 1 });

    const updated = await carts.updateQuantity("buyer", { productId: "prod-1" }, 4);
    expect(updated.items[0]?.quantity).toBe(4);

    const removed = await carts.removeItem("buyer", { productId: "prod-1" });
    expect(removed.items).toEqual([]);
  });

  it("reports a missing line", async () => {
    await expect(
      carts.updateQuantity("buyer", { productId: "prod-1", variantId: "var-1" }, 1)
    ).rejects.toMatchObject({ code: "CART_ITEM_NOT_FOUND", status: 404 });
  });

  it("flags price changes since the line was added", async () => {
    await carts.addItem("buyer", { productId: "prod-1", quantity: 1 });
    store.seed.product(productRecord({ price: 110 }));

    const summary = await carts.getSummary("buyer");
    expect(summary.items[0]).toMatchObject({ unitPrice: 110, addedPrice: 100, priceChanged: true });

    const validation = await carts.validateForCheckout("buyer");
    expect(validation).toEqual({
      isValid: true,
      errors: [],
      warnings: ["Price of Canvas Tote changed from 100 to 110"],
    });
  });

  it("excludes unavailable lines from totals", async () => {
    await carts.addItem("buyer", { productId: "prod-1", quantity: 1 });
    await carts.addItem("buyer", { productId: "prod-1", variantId: "var-1", quantity: 2 });
    store.seed.variant(variantRecord({ inventoryCount: 0 }));

    const summary = await carts.getSummary("buyer");
    expect(summary).toMatchObject({ subtotal: 100, itemCount: 1, unavailableCount: 1 });
    expect(summary.items[1]?.isAvailable).toBe(false);
  });

  it("fails validation when stock no longer covers a line", async () => {
    await carts.addItem("buyer", { productId: "prod-1", quantity: 4 });
    store.seed.product(productRecord({ inventoryCount: 3 }));

    await expect(carts.validateForCheckout("buyer")).resolves.toEqual({
      isValid: false,
      errors: ["Only 3 of Canvas Tote available"],
      warnings: [],
    });
  });

  it("treats an empty cart as invalid", async () => {
    await expect(carts.validateForCheckout("buyer")).resolves.toEqual({
      isValid: false,
      errors: ["Cart is empty"],
      warnings: [],
    });
  });

  it("clears the cart", async () => {
    await carts.addItem("buyer", { productId: "prod-1", quantity: 1 });
    await carts.clear("buyer");
    await expect(carts.getSummary("buyer")).resolves.toMatchObject({ items: [], updatedAt: null });
  });

  it("sweeps carts idle past the expiry", async () => {
    await carts.addItem("idle", { productId: "prod-1", quantity: 1 });
    time.advanceDays(20);
    await carts.addItem("busy", { productId: "prod-1", quantity: 1 });
    time.advanceDays(11);

    await expect(carts.sweepExpired()).resolves.toBe(1);
    await expect(carts.getSummary("idle")).resolves.toMatchObject({ items: [] });
    await expect(carts.getSummary("busy")).resolves.toMatchObject({
      itemCount: 1,
      updatedAt: new Date(BASE_TIME.getTime() + 20 * 24 * 60 * 60 * 1000),
    });
  });
});
