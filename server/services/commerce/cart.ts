/**
 * Cart Store
 *
 * One mutable draft per user. Availability checks here are advisory; stock is
 * only reserved when the cart becomes an order.
 */

import type { CommerceConfig } from "../../config/commerce";
import { DAY_MS, MAX_CART_LINE_QUANTITY, MAX_CART_LINES } from "../../config/constants";
import logger from "../../logger";
import { displayName, resolvePurchasable, stockKey, type Purchasable } from "./catalog";
import { InsufficientStock, NotFoundError, ValidationError } from "./errors";
import { hasStock, isInStock } from "./inventory";
import { roundMoney, sumMoney } from "./money";
import type { CommerceStore, UnitOfWork } from "./store/types";
import type { CartItem, CartRecord, Clock, StockLine, StockRef } from "./types";

export type CartItemInput = StockLine;

export type CartLineView = {
  productId: string;
  variantId: string | null;
  name: string;
  sku: string | null;
  quantity: number;
  /** Current catalog price, or the remembered price when the product is gone */
  unitPrice: number;
  /** Price when the line was last added or updated */
  addedPrice: number;
  priceChanged: boolean;
  lineTotal: number;
  isAvailable: boolean;
  isDigital: boolean;
};

export type CartSummary = {
  userId: string;
  items: CartLineView[];
  subtotal: number;
  itemCount: number;
  unavailableCount: number;
  updatedAt: Date | null;
};

export type CartValidation = {
  isValid: boolean;
  errors: string[];
  warnings: string[];
};

type ResolvedLine = { item: CartItem; purchasable: Purchasable | undefined; view: CartLineView };

const emptySummary = (userId: string): CartSummary => ({
  userId,
  items: [],
  subtotal: 0,
  itemCount: 0,
  unavailableCount: 0,
  updatedAt: null,
});

const sameLine = (item: CartItem, ref: StockRef) =>
  item.productId === ref.productId && (item.variantId ?? null) === (ref.variantId ?? null);

function assertQuantity(quantity: number, allowZero: boolean): void {
  const min = allowZero ? 0 : 1;
  if (!Number.isInteger(quantity) || quantity < min) {
    throw new ValidationError(
      "INVALID_QUANTITY",
      allowZero ? "Quantity must be a non-negative integer" : "Quantity must be a positive integer"
    );
  }
  if (quantity > MAX_CART_LINE_QUANTITY) {
    throw new ValidationError(
      "QUANTITY_LIMIT",
      `Quantity cannot exceed ${MAX_CART_LINE_QUANTITY}`
    );
  }
}

async function resolveLines(uow: UnitOfWork, cart: CartRecord): Promise<ResolvedLine[]> {
  const resolved: ResolvedLine[] = [];
  for (const item of cart.items) {
    const purchasable = await resolvePurchasable(uow.catalog, item);
    const isAvailable =
      purchasable !== undefined && purchasable.isActive && isInStock(purchasable);
    const unitPrice = purchasable ? purchasable.priceable.currentPrice() : item.unitPrice;

    resolved.push({
      item,
      purchasable,
      view: {
        productId: item.productId,
        variantId: item.variantId,
        name: purchasable ? displayName(purchasable) : "Unavailable product",
        sku: purchasable?.variant?.sku ?? purchasable?.product.sku ?? null,
        quantity: item.quantity,
        unitPrice,
        addedPrice: item.unitPrice,
        priceChanged: purchasable !== undefined && unitPrice !== item.unitPrice,
        lineTotal: roundMoney(unitPrice * item.quantity),
        isAvailable,
        isDigital: purchasable?.product.isDigital ?? false,
      },
    });
  }
  return resolved;
}

function summarize(cart: CartRecord, lines: ResolvedLine[]): CartSummary {
  const available = lines.filter((line) => line.view.isAvailable);
  return {
    userId: cart.userId,
    items: lines.map((line) => line.view),
    subtotal: sumMoney(available.map((line) => line.view.lineTotal)),
    itemCount: available.reduce((count, line) => count + line.view.quantity, 0),
    unavailableCount: lines.length - available.length,
    updatedAt: cart.updatedAt,
  };
}

/** Lines that can still be bought, as a checkout snapshot */
export async function availableCartLines(uow: UnitOfWork, userId: string): Promise<StockLine[]> {
  const cart = await uow.carts.findByUser(userId);
  if (!cart) return [];
  const lines = await resolveLines(uow, cart);
  return lines
    .filter((line) => line.view.isAvailable)
    .map((line) => ({
      productId: line.item.productId,
      variantId: line.item.variantId,
      quantity: line.item.quantity,
    }));
}

function requireSellable(purchasable: Purchasable | undefined, ref: StockRef): Purchasable {
  if (!purchasable || !purchasable.isActive) {
    throw new ValidationError("PRODUCT_UNAVAILABLE", "Product is not available", {
      productId: ref.productId,
      variantId: ref.variantId ?? null,
    });
  }
  return purchasable;
}

function requireStock(purchasable: Purchasable, quantity: number): void {
  if (!hasStock(purchasable, quantity)) {
    throw new InsufficientStock({
      productId: purchasable.ref.productId,
      variantId: purchasable.ref.variantId,
      productName: displayName(purchasable),
      requested: quantity,
      available: purchasable.available,
    });
  }
}

export class CartStore {
  constructor(
    private readonly store: CommerceStore,
    private readonly config: Pick<CommerceConfig, "cartExpiryDays">,
    private readonly clock: Clock
  ) {}

  async addItem(userId: string, input: CartItemInput): Promise<CartSummary> {
    assertQuantity(input.quantity, false);

    const summary = await this.store.transaction(async (uow) => {
      const purchasable = requireSellable(await resolvePurchasable(uow.catalog, input), input);
      const now = this.clock();
      const cart = (await uow.carts.findByUser(userId)) ?? {
        userId,
        items: [],
        subtotal: 0,
        itemCount: 0,
        createdAt: now,
        updatedAt: now,
      };

      const existing = cart.items.find((item) => sameLine(item, input));
      const quantity = (existing?.quantity ?? 0) + input.quantity;
      if (quantity > MAX_CART_LINE_QUANTITY) {
        throw new ValidationError(
          "QUANTITY_LIMIT",
          `Quantity cannot exceed ${MAX_CART_LINE_QUANTITY}`
        );
      }
      requireStock(purchasable, quantity);

      const unitPrice = purchasable.priceable.currentPrice();
      let items: CartItem[];
      if (existing) {
        items = cart.items.map((item) =>
          sameLine(item, input) ? { ...item, quantity, unitPrice } : item
        );
      } else {
        if (cart.items.length >= MAX_CART_LINES) {
          throw new ValidationError("CART_FULL", `A cart holds at most ${MAX_CART_LINES} lines`);
        }
        items = [
          ...cart.items,
          {
            productId: purchasable.ref.productId,
            variantId: purchasable.ref.variantId,
            quantity,
            unitPrice,
            addedAt: now,
          },
        ];
      }

      return this.persist(uow, { ...cart, items, updatedAt: now });
    });

    logger.debug("[Cart] Item added", {
      userId,
      productId: input.productId,
      variantId: input.variantId ?? null,
      quantity: input.quantity,
    });
    return summary;
  }

  /** Sets a line's quantity; zero removes the line. */
  async updateQuantity(userId: string, ref: StockRef, quantity: number): Promise<CartSummary> {
    assertQuantity(quantity, true);

    return this.store.transaction(async (uow) => {
      const cart = await uow.carts.findByUser(userId);
      const existing = cart?.items.find((item) => sameLine(item, ref));
      if (!cart || !existing) {
        throw new NotFoundError("Cart item", stockKey(ref));
      }

      const now = this.clock();
      if (quantity === 0) {
        const items = cart.items.filter((item) => !sameLine(item, ref));
        return this.persist(uow, { ...cart, items, updatedAt: now });
      }

      const purchasable = requireSellable(await resolvePurchasable(uow.catalog, ref), ref);
      requireStock(purchasable, quantity);
      const unitPrice = purchasable.priceable.currentPrice();
      const items = cart.items.map((item) =>
        sameLine(item, ref) ? { ...item, quantity, unitPrice } : item
      );
      return this.persist(uow, { ...cart, items, updatedAt: now });
    });
  }

  removeItem(userId: string, ref: StockRef): Promise<CartSummary> {
    return this.updateQuantity(userId, ref, 0);
  }

  async clear(userId: string): Promise<CartSummary> {
    await this.store.transaction((uow) => uow.carts.delete(userId));
    return emptySummary(userId);
  }

  getSummary(userId: string): Promise<CartSummary> {
    return this.store.transaction(async (uow) => {
      const cart = await uow.carts.findByUser(userId);
      if (!cart) return emptySummary(userId);
      return summarize(cart, await resolveLines(uow, cart));
    });
  }

  validateForCheckout(userId: string): Promise<CartValidation> {
    return this.store.transaction(async (uow) => {
      const cart = await uow.carts.findByUser(userId);
      if (!cart || cart.items.length === 0) {
        return { isValid: false, errors: ["Cart is empty"], warnings: [] };
      }

      const lines = await resolveLines(uow, cart);
      const errors: string[] = [];
      const warnings: string[] = [];

      for (const line of lines) {
        if (!line.view.isAvailable || !line.purchasable) {
          warnings.push(`${line.view.name} is unavailable and will not be ordered`);
          continue;
        }
        if (!hasStock(line.purchasable, line.item.quantity)) {
          errors.push(
            `Only ${Math.max(0, line.purchasable.available)} of ${line.view.name} available`
          );
        }
        if (line.view.priceChanged) {
          warnings.push(
            `Price of ${line.view.name} changed from ${line.view.addedPrice} to ${line.view.unitPrice}`
          );
        }
      }

      if (!lines.some((line) => line.view.isAvailable)) {
        errors.push("No items in the cart are available");
      }

      return { isValid: errors.length === 0, errors, warnings };
    });
  }

  /** Deletes carts untouched for longer than the configured expiry. */
  async sweepExpired(now: Date = this.clock()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.config.cartExpiryDays * DAY_MS);
    const removed = await this.store.transaction((uow) => uow.carts.deleteUpdatedBefore(cutoff));
    if (removed > 0) {
      logger.info("[Cart] Expired carts removed", { removed, cutoff: cutoff.toISOString() });
    }
    return removed;
  }

  private async persist(uow: UnitOfWork, cart: CartRecord): Promise<CartSummary> {
    const summary = summarize(cart, await resolveLines(uow, cart));
    await uow.carts.save({ ...cart, subtotal: summary.subtotal, itemCount: summary.itemCount });
    return summary;
  }
}
