/**
 * Tests for the cart routes: handlers are called directly against an
 * in-memory engine.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { createTestHarness, productRecord, type TestHarness } from "../../__tests__/helpers/commerce";
import {
  createMockRequest,
  createMockResponse,
  jsonBody,
  type MockRequestOptions,
} from "../../__tests__/helpers/mockRequest";
import { cartHandlers } from "../cart";

const buyer = { id: "buyer", role: "customer" } as const;

function buyerRequest(options: MockRequestOptions = {}) {
  return createMockRequest({ currentUser: buyer, ...options });
}

describe("Cart Routes", () => {
  let harness: TestHarness;
  let handlers: ReturnType<typeof cartHandlers>;

  beforeEach(() => {
    harness = createTestHarness();
    harness.store.seed.product(productRecord());
    handlers = cartHandlers(harness.engine);
  });

  describe("POST /items", () => {
    it("adds a line and answers with the cart", async () => {
      const res = createMockResponse();

      await handlers.addItem(buyerRequest({ body: { productId: "prod-1", quantity: 2 } }), res);

      expect(res.statusCode).toBe(200);
      expect(jsonBody(res)).toMatchObject({ userId: "buyer", subtotal: 200, itemCount: 2 });
    });

    it("defaults the quantity to one", async () => {
      const res = createMockResponse();

      await handlers.addItem(buyerRequest({ body: { productId: "prod-1" } }), res);

      expect(jsonBody(res)).toMatchObject({ subtotal: 100, itemCount: 1 });
    });

    it("rejects malformed bodies with 400", async () => {
      const res = createMockResponse();

      await handlers.addItem(buyerRequest({ body: { productId: "", quantity: 1.5 } }), res);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(jsonBody(res)).toMatchObject({ error: "VALIDATION_ERROR" });
    });

    it("maps stock shortfalls to 409", async () => {
      const res = createMockResponse();

      await handlers.addItem(buyerRequest({ body: { productId: "prod-1", quantity: 6 } }), res);

      expect(res.status).toHaveBeenCalledWith(409);
      expect(jsonBody(res)).toEqual({
        error: "INSUFFICIENT_STOCK",
        message: "Only 5 of Canvas Tote available",
        details: { productId: "prod-1", variantId: null, requested: 6, available: 5 },
      });
    });
  });

  describe("PATCH and DELETE /items", () => {
    beforeEach(async () => {
      await harness.engine.carts.addItem("buyer", { productId: "prod-1", quantity: 1 });
    });

    it("changes the quantity of a line", async () => {
      const res = createMockResponse();

      await handlers.updateItem(buyerRequest({ body: { productId: "prod-1", quantity: 3 } }), res);

      expect(jsonBody(res)).toMatchObject({ subtotal: 300, itemCount: 3 });
    });

    it("removes a line", async () => {
      const res = createMockResponse();

      await handlers.removeItem(buyerRequest({ body: { productId: "prod-1" } }), res);

      expect(jsonBody(res)).toMatchObject({ items: [], subtotal: 0 });
    });

    it("answers 404 for a line that is not in the cart", async () => {
      const res = createMockResponse();

      await handlers.removeItem(buyerRequest({ body: { productId: "prod-9" } }), res);

      expect(res.status).toHaveBeenCalledWith(404);
      expect(jsonBody(res)).toMatchObject({ error: "CART_ITEM_NOT_FOUND" });
    });

    it("clears the cart", async () => {
      const res = createMockResponse();

      await handlers.clearCart(buyerRequest(), res);

      expect(jsonBody(res)).toMatchObject({ items: [], itemCount: 0 });
      await expect(harness.engine.carts.getSummary("buyer")).resolves.toMatchObject({ items: [] });
    });
  });

  describe("GET /validate", () => {
    it("reports an empty cart", async () => {
      const res = createMockResponse();

      await handlers.validate(buyerRequest(), res);

      expect(jsonBody(res)).toEqual({ isValid: false, errors: ["Cart is empty"], warnings: [] });
    });

    it("flags lines that outgrew the stock", async () => {
      await harness.engine.carts.addItem("buyer", { productId: "prod-1", quantity: 4 });
      harness.store.seed.product(productRecord({ inventoryCount: 2 }));
      const res = createMockResponse();

      await handlers.validate(buyerRequest(), res);

      expect(jsonBody(res)).toEqual({
        isValid: false,
        errors: ["Only 2 of Canvas Tote available"],
        warnings: [],
      });
    });
  });

  describe("GET /shipping-rates", () => {
    it("lists the international options for a foreign destination", async () => {
      await harness.engine.carts.addItem("buyer", { productId: "prod-1", quantity: 1 });
      const res = createMockResponse();

      await handlers.shippingRates(buyerRequest({ query: { country: "de" } }), res);

      expect(jsonBody(res)).toEqual({
        country: "DE",
        rates: [
          { method: "standard", name: "Standard Shipping", cost: 25, estimatedDays: "3-5" },
          { method: "express", name: "Express Shipping", cost: 50, estimatedDays: "1-2" },
        ],
      });
    });

    it("requires a two-letter country", async () => {
      const res = createMockResponse();

      await handlers.shippingRates(buyerRequest({ query: {} }), res);

      expect(res.status).toHaveBeenCalledWith(400);
    });
  });
});
