import { describe, it, expect } from "vitest";
import { DEFAULT_COMMERCE_CONFIG, loadCommerceConfig } from "../commerce";
import { parseEnv } from "../env";
import { DEV_ORIGINS, getAllowedOrigins } from "../server";

describe("loadCommerceConfig", () => {
  it("matches the defaults for an empty environment", () => {
    const config = loadCommerceConfig(parseEnv({ DATABASE_URL: "postgres://localhost/test" }));

    expect(config).toEqual(DEFAULT_COMMERCE_CONFIG);
  });

  it("normalizes currency and home country", () => {
    const config = loadCommerceConfig(
      parseEnv({
        DATABASE_URL: "postgres://localhost/test",
        COMMERCE_CURRENCY: "usd",
        SHIPPING_HOME_COUNTRY: "us",
        POINTS_EARN_RATE: "0.05",
      })
    );

    expect(config).toMatchObject({ currency: "USD", homeCountry: "US", pointsEarnRate: 0.05 });
    expect(config.shippingRates).toBe(DEFAULT_COMMERCE_CONFIG.shippingRates);
  });

  it("keeps pickup and overnight domestic only", () => {
    expect(DEFAULT_COMMERCE_CONFIG.shippingRates.pickup.domesticOnly).toBe(true);
    expect(DEFAULT_COMMERCE_CONFIG.shippingRates.overnight.domesticOnly).toBe(true);
  });
});

describe("getAllowedOrigins", () => {
  it("adds the development origins outside production", () => {
    expect(getAllowedOrigins(" https://shop.test , ", "development")).toEqual([
      "https://shop.test",
      ...DEV_ORIGINS,
    ]);
  });

  it("uses only the configured origins in production", () => {
    expect(getAllowedOrigins("https://shop.test,https://admin.shop.test", "production")).toEqual([
      "https://shop.test",
      "https://admin.shop.test",
    ]);
    expect(getAllowedOrigins(undefined, "production")).toEqual([]);
  });
});
