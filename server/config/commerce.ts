import type { ShippingMethod } from "@shared/schema";
import type { Env } from "./env";

export interface ShippingRate {
  domestic: number;
  international: number;
  /** Shown to the customer when listing rates */
  label: string;
  estimatedDays: string;
  /** Offered only for destinations in the home country */
  domesticOnly?: boolean;
}

export type ShippingRateTable = Record<ShippingMethod, ShippingRate>;

/**
 * Commerce rules passed explicitly to every engine.
 * Built once at startup from the environment; tests build their own.
 */
export interface CommerceConfig {
  currency: string;
  /** Monetary value of a single loyalty point */
  pointsUnitValue: number;
  /** Share of an order total credited back as points on delivery */
  pointsEarnRate: number;
  taxRate: number;
  referralExpiryDays: number;
  cartExpiryDays: number;
  homeCountry: string;
  shippingRates: ShippingRateTable;
  sweepIntervalMs: number;
}

export const DEFAULT_SHIPPING_RATES: ShippingRateTable = {
  standard: { domestic: 10, international: 25, label: "Standard Shipping", estimatedDays: "3-5" },
  express: { domestic: 25, international: 50, label: "Express Shipping", estimatedDays: "1-2" },
  overnight: {
    domestic: 50,
    international: 100,
    label: "Overnight Shipping",
    estimatedDays: "1",
    domesticOnly: true,
  },
  pickup: {
    domestic: 0,
    international: 0,
    label: "Store Pickup",
    estimatedDays: "0",
    domesticOnly: true,
  },
  digital: { domestic: 0, international: 0, label: "Digital Delivery", estimatedDays: "0" },
};

export const DEFAULT_COMMERCE_CONFIG: CommerceConfig = {
  currency: "KES",
  pointsUnitValue: 0.01,
  pointsEarnRate: 0.01,
  taxRate: 0,
  referralExpiryDays: 30,
  cartExpiryDays: 30,
  homeCountry: "KE",
  shippingRates: DEFAULT_SHIPPING_RATES,
  sweepIntervalMs: 60 * 60 * 1000,
};

export function loadCommerceConfig(source: Env): CommerceConfig {
  return {
    ...DEFAULT_COMMERCE_CONFIG,
    currency: source.COMMERCE_CURRENCY.toUpperCase(),
    pointsUnitValue: source.POINTS_UNIT_VALUE,
    pointsEarnRate: source.POINTS_EARN_RATE,
    taxRate: source.TAX_RATE,
    referralExpiryDays: source.REFERRAL_EXPIRY_DAYS,
    cartExpiryDays: source.CART_EXPIRY_DAYS,
    homeCountry: source.SHIPPING_HOME_COUNTRY.toUpperCase(),
    sweepIntervalMs: source.COMMERCE_SWEEP_INTERVAL_MS,
  };
}
