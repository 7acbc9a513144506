import { roundMoney } from "./money";
import type { CatalogRepository } from "./store/types";
import type { ProductRecord, StockRef, VariantRecord } from "./types";

/** Anything with a price that can be read right now */
export interface Priceable {
  currentPrice(): number;
}

export class CatalogProduct implements Priceable {
  constructor(readonly record: ProductRecord) {}

  currentPrice(): number {
    return this.record.price;
  }
}

export class CatalogVariant implements Priceable {
  constructor(
    readonly record: VariantRecord,
    readonly product: ProductRecord
  ) {}

  currentPrice(): number {
    return roundMoney(this.product.price + this.record.priceModifier);
  }
}

/**
 * A product, or one of its variants, resolved for sale. Stock lives on the
 * variant when there is one; tracking and backorder flags always come from
 * the product.
 */
export type Purchasable = {
  ref: { productId: string; variantId: string | null };
  product: ProductRecord;
  variant: VariantRecord | null;
  priceable: Priceable;
  isActive: boolean;
  available: number;
};

export function stockKey(ref: StockRef): string {
  return `${ref.productId}:${ref.variantId ?? "-"}`;
}

export function displayName(item: Purchasable): string {
  return item.variant ? `${item.product.name} (${item.variant.name})` : item.product.name;
}

/**
 * Loads the product and variant behind `ref`. With `forUpdate`, only the row
 * holding the stock is locked.
 */
export async function resolvePurchasable(
  catalog: CatalogRepository,
  ref: StockRef,
  options: { forUpdate?: boolean } = {}
): Promise<Purchasable | undefined> {
  const variantId = ref.variantId ?? null;
  const product = await catalog.findProduct(ref.productId, {
    forUpdate: options.forUpdate === true && variantId === null,
  });
  if (!product) return undefined;

  if (variantId === null) {
    return {
      ref: { productId: product.id, variantId: null },
      product,
      variant: null,
      priceable: new CatalogProduct(product),
      isActive: product.isActive,
      available: product.inventoryCount,
    };
  }

  const variant = await catalog.findVariant(variantId, { forUpdate: options.forUpdate });
  if (!variant || variant.productId !== product.id) return undefined;

  return {
    ref: { productId: product.id, variantId: variant.id },
    product,
    variant,
    priceable: new CatalogVariant(variant, product),
    isActive: product.isActive && variant.isActive,
    available: variant.inventoryCount,
  };
}
