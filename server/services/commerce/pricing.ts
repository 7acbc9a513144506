/**
 * Pricing Calculator
 *
 * Pure functions: the same input always yields the same breakdown and
 * nothing is read or written along the way.
 */

import { SHIPPING_METHODS } from "@shared/schema";
import type { CommerceConfig } from "../../config/commerce";
import { ValidationError } from "./errors";
import { roundMoney, sumMoney } from "./money";
import type { ShippingMethod } from "./types";

export type PricingConfig = Pick<
  CommerceConfig,
  "pointsUnitValue" | "taxRate" | "homeCountry" | "shippingRates"
>;

export type PricedLine = {
  unitPrice: number;
  quantity: number;
  isDigital?: boolean;
};

export type PricingInput = {
  lines: readonly PricedLine[];
  shippingMethod: ShippingMethod;
  destinationCountry: string;
  /** Discount granted by an already validated coupon */
  couponDiscount?: number;
  pointsToUse?: number;
};

export type PriceBreakdown = {
  subtotal: number;
  shipping: number;
  tax: number;
  discount: number;
  pointsDiscount: number;
  /** Points actually consumed by pointsDiscount; may be fewer than requested */
  pointsUsed: number;
  total: number;
};

export type ShippingOption = {
  method: ShippingMethod;
  name: string;
  cost: number;
  estimatedDays: string;
};

// Guards floor() against values like 99.99999999 from binary division
const POINTS_FLOOR_EPSILON = 1e-9;

function assertLines(lines: readonly PricedLine[]): void {
  if (lines.length === 0) {
    throw new ValidationError("EMPTY_ORDER", "At least one line is required");
  }
  lines.forEach((line, index) => {
    if (!Number.isFinite(line.unitPrice) || line.unitPrice <= 0) {
      throw new ValidationError("INVALID_PRICE", "Unit price must be positive", { index });
    }
    if (!Number.isInteger(line.quantity) || line.quantity < 1) {
      throw new ValidationError("INVALID_QUANTITY", "Quantity must be a positive integer", {
        index,
      });
    }
  });
}

export function isDomestic(destinationCountry: string, config: Pick<PricingConfig, "homeCountry">) {
  return destinationCountry.trim().toUpperCase() === config.homeCountry.toUpperCase();
}

export function calculateSubtotal(lines: readonly PricedLine[]): number {
  return sumMoney(lines.map((line) => line.unitPrice * line.quantity));
}

export function calculateShipping(
  lines: readonly PricedLine[],
  method: ShippingMethod,
  destinationCountry: string,
  config: Pick<PricingConfig, "homeCountry" | "shippingRates">
): number {
  if (lines.length > 0 && lines.every((line) => line.isDigital)) return 0;
  const rate = config.shippingRates[method];
  return isDomestic(destinationCountry, config) ? rate.domestic : rate.international;
}

/** Shipping methods offered for a destination, cheapest first. */
export function shippingRates(
  lines: readonly PricedLine[],
  destinationCountry: string,
  config: Pick<PricingConfig, "homeCountry" | "shippingRates">
): ShippingOption[] {
  if (lines.length > 0 && lines.every((line) => line.isDigital)) {
    const digital = config.shippingRates.digital;
    return [{ method: "digital", name: digital.label, cost: 0, estimatedDays: digital.estimatedDays }];
  }

  const domestic = isDomestic(destinationCountry, config);
  const options: ShippingOption[] = [];
  for (const method of SHIPPING_METHODS) {
    const rate = config.shippingRates[method];
    if (method === "digital" || (rate.domesticOnly && !domestic)) continue;
    options.push({
      method,
      name: rate.label,
      cost: domestic ? rate.domestic : rate.international,
      estimatedDays: rate.estimatedDays,
    });
  }
  return options.sort((a, b) => a.cost - b.cost);
}

export function calculatePointsEarned(total: number, earnRate: number): number {
  if (total <= 0 || earnRate <= 0) return 0;
  return Math.floor(total * earnRate + POINTS_FLOOR_EPSILON);
}

export function calculatePricing(input: PricingInput, config: PricingConfig): PriceBreakdown {
  assertLines(input.lines);

  const pointsToUse = input.pointsToUse ?? 0;
  if (!Number.isInteger(pointsToUse) || pointsToUse < 0) {
    throw new ValidationError("INVALID_POINTS", "Points to use must be a non-negative integer");
  }
  const couponDiscount = input.couponDiscount ?? 0;
  if (!Number.isFinite(couponDiscount) || couponDiscount < 0) {
    throw new ValidationError("INVALID_DISCOUNT", "Discount cannot be negative");
  }

  const subtotal = calculateSubtotal(input.lines);
  const shipping = calculateShipping(
    input.lines,
    input.shippingMethod,
    input.destinationCountry,
    config
  );
  const tax = roundMoney(subtotal * config.taxRate);
  const discount = roundMoney(Math.min(couponDiscount, subtotal));

  const requestedPointsValue = roundMoney(pointsToUse * config.pointsUnitValue);
  const pointsDiscount = roundMoney(Math.max(0, Math.min(requestedPointsValue, subtotal - discount)));
  const pointsUsed = Math.floor(pointsDiscount / config.pointsUnitValue + POINTS_FLOOR_EPSILON);

  const total = roundMoney(Math.max(0, subtotal + tax + shipping - discount - pointsDiscount));

  return { subtotal, shipping, tax, discount, pointsDiscount, pointsUsed, total };
}
