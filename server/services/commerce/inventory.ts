/**
 * Inventory Ledger
 *
 * Stock commands take the caller's unit of work so a reservation commits or
 * rolls back together with the order that needs it.
 */

import logger from "../../logger";
import { displayName, resolvePurchasable, stockKey, type Purchasable } from "./catalog";
import { InsufficientStock, NotFoundError, ValidationError } from "./errors";
import type { CommerceStore, UnitOfWork } from "./store/types";
import type { StockLine, StockRef } from "./types";

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError("INVALID_QUANTITY", "Quantity must be a positive integer");
  }
}

/** Untracked and backorder products always have stock. */
export function hasStock(item: Purchasable, quantity: number): boolean {
  return !item.product.trackInventory || item.product.allowBackorder || item.available >= quantity;
}

/** In stock at all, ignoring the requested quantity */
export function isInStock(item: Purchasable): boolean {
  return hasStock(item, 1);
}

async function writeStock(uow: UnitOfWork, item: Purchasable, inventoryCount: number) {
  if (item.variant) {
    await uow.catalog.setVariantInventory(item.variant.id, inventoryCount);
  } else {
    await uow.catalog.setProductInventory(item.product.id, inventoryCount);
  }
}

export async function checkAvailable(
  uow: UnitOfWork,
  ref: StockRef,
  quantity: number
): Promise<boolean> {
  assertQuantity(quantity);
  const item = await resolvePurchasable(uow.catalog, ref);
  return item !== undefined && item.isActive && hasStock(item, quantity);
}

/** Returns the stock level after the decrement. */
export async function decrementStock(
  uow: UnitOfWork,
  ref: StockRef,
  quantity: number
): Promise<number> {
  assertQuantity(quantity);
  const item = await resolvePurchasable(uow.catalog, ref, { forUpdate: true });
  if (!item) throw new NotFoundError("Product", stockKey(ref));

  if (!hasStock(item, quantity)) {
    throw new InsufficientStock({
      productId: item.ref.productId,
      variantId: item.ref.variantId,
      productName: displayName(item),
      requested: quantity,
      available: item.available,
    });
  }
  if (!item.product.trackInventory) return item.available;

  const remaining = item.available - quantity;
  await writeStock(uow, item, remaining);
  return remaining;
}

/** Returns the stock level after the increment. */
export async function incrementStock(
  uow: UnitOfWork,
  ref: StockRef,
  quantity: number
): Promise<number> {
  assertQuantity(quantity);
  const item = await resolvePurchasable(uow.catalog, ref, { forUpdate: true });
  if (!item) throw new NotFoundError("Product", stockKey(ref));
  if (!item.product.trackInventory) return item.available;

  const restored = item.available + quantity;
  await writeStock(uow, item, restored);
  return restored;
}

function mergeLines(lines: readonly StockLine[]): Map<string, StockLine> {
  const merged = new Map<string, StockLine>();
  for (const line of lines) {
    assertQuantity(line.quantity);
    const key = stockKey(line);
    const existing = merged.get(key);
    merged.set(key, {
      productId: line.productId,
      variantId: line.variantId ?? null,
      quantity: (existing?.quantity ?? 0) + line.quantity,
    });
  }
  return merged;
}

/**
 * All-or-nothing reservation. Every stock row is locked in key order (so two
 * reservations never wait on each other in opposite orders), every line is
 * checked, and only then are the decrements written.
 *
 * @returns the purchasables as they were before the decrement, keyed by {@link stockKey}
 * @throws {ValidationError} PRODUCT_UNAVAILABLE for missing or inactive items
 * @throws {InsufficientStock} for the first line that cannot be covered
 */
export async function reserveStock(
  uow: UnitOfWork,
  lines: readonly StockLine[]
): Promise<Map<string, Purchasable>> {
  const merged = mergeLines(lines);
  const keys = [...merged.keys()].sort();
  const resolved = new Map<string, Purchasable>();

  for (const key of keys) {
    const line = merged.get(key);
    if (!line) continue;
    const item = await resolvePurchasable(uow.catalog, line, { forUpdate: true });
    if (!item || !item.isActive) {
      throw new ValidationError("PRODUCT_UNAVAILABLE", "A product in your cart is no longer available", {
        productId: line.productId,
        variantId: line.variantId ?? null,
      });
    }
    resolved.set(key, item);
  }

  for (const key of keys) {
    const line = merged.get(key);
    const item = resolved.get(key);
    if (!line || !item) continue;
    if (!hasStock(item, line.quantity)) {
      throw new InsufficientStock({
        productId: item.ref.productId,
        variantId: item.ref.variantId,
        productName: displayName(item),
        requested: line.quantity,
        available: item.available,
      });
    }
  }

  for (const key of keys) {
    const line = merged.get(key);
    const item = resolved.get(key);
    if (!line || !item || !item.product.trackInventory) continue;
    await writeStock(uow, item, item.available - line.quantity);
  }

  return resolved;
}

/** Puts reserved stock back, e.g. when an order is cancelled. */
export async function releaseStock(uow: UnitOfWork, lines: readonly StockLine[]): Promise<void> {
  const merged = mergeLines(lines);
  for (const key of [...merged.keys()].sort()) {
    const line = merged.get(key);
    if (!line) continue;
    const item = await resolvePurchasable(uow.catalog, line, { forUpdate: true });
    if (!item) {
      // Deleted from the catalog since the order was placed; nothing to restore
      logger.warn("[Inventory] Skipping stock release for missing product", {
        productId: line.productId,
        variantId: line.variantId ?? null,
      });
      continue;
    }
    if (!item.product.trackInventory) continue;
    await writeStock(uow, item, item.available + line.quantity);
  }
}

/** Standalone entry points, each in its own transaction. */
export class InventoryLedger {
  constructor(private readonly store: CommerceStore) {}

  checkAvailable(ref: StockRef, quantity: number): Promise<boolean> {
    return this.store.transaction((uow) => checkAvailable(uow, ref, quantity));
  }

  decrement(ref: StockRef, quantity: number): Promise<number> {
    return this.store.transaction((uow) => decrementStock(uow, ref, quantity));
  }

  increment(ref: StockRef, quantity: number): Promise<number> {
    return this.store.transaction((uow) => incrementStock(uow, ref, quantity));
  }

  async reserveAll(lines: readonly StockLine[]): Promise<void> {
    await this.store.transaction((uow) => reserveStock(uow, lines));
  }
}
