import { describe, it, expect, beforeEach } from "vitest";
import { createMockDb, type MockDb } from "../../../__tests__/helpers/mockDb";
import { productRecord, referralLinkRecord } from "../../../__tests__/helpers/commerce";
import type { Database } from "../../../db";
import { createPostgresCommerceStore } from "./postgresStore";
import type { CommerceStore } from "./types";

describe("createPostgresCommerceStore", () => {
  let db: MockDb;
  let store: CommerceStore;

  beforeEach(() => {
    db = createMockDb().db;
    store = createPostgresCommerceStore(db as unknown as Database);
  });

  it("runs each unit of work inside one database transaction", async () => {
    db._setSequentialResults([[productRecord()]]);

    const product = await store.transaction((uow) => uow.catalog.findProduct("prod-1"));

    expect(db.transaction).toHaveBeenCalledTimes(1);
    expect(product?.sku).toBe("SKU-1");
    expect(db.for).not.toHaveBeenCalled();
  });

  it("takes a row lock for forUpdate reads", async () => {
    db._setSequentialResults([[productRecord()]]);

    await store.transaction((uow) => uow.catalog.findProduct("prod-1", { forUpdate: true }));

    expect(db.for).toHaveBeenCalledWith("update");
  });

  it("locks a campaign link looked up by slug", async () => {
    db._setSequentialResults([[referralLinkRecord()]]);

    const link = await store.transaction((uow) =>
      uow.referralLinks.findBySlug("spring-newsletter", { forUpdate: true })
    );

    expect(link?.id).toBe("link-1");
    expect(db.for).toHaveBeenCalledWith("update");
  });

  it("returns undefined when no row matches", async () => {
    db._setSequentialResults([[]]);
    await expect(
      store.transaction((uow) => uow.merchants.findByReferralCode("NOPE"))
    ).resolves.toBeUndefined();
  });

  it("counts rows removed by the cart sweep", async () => {
    db._setSequentialResults([[{ userId: "a" }, { userId: "b" }]]);
    await expect(
      store.transaction((uow) => uow.carts.deleteUpdatedBefore(new Date(0)))
    ).resolves.toBe(2);
  });

  it("reports an open payout only when one exists", async () => {
    db._setSequentialResults([[], [{ id: "payout-1" }]]);
    await expect(store.transaction((uow) => uow.payouts.hasOpenPayout("merchant-1"))).resolves.toBe(
      false
    );
    await expect(store.transaction((uow) => uow.payouts.hasOpenPayout("merchant-1"))).resolves.toBe(
      true
    );
  });

  it("fails an update that matched nothing", async () => {
    db._setSequentialResults([[]]);
    await expect(
      store.transaction((uow) => uow.payments.update("missing", { status: "failed" }))
    ).rejects.toThrow("Payment missing does not exist");
  });

  it("propagates query errors", async () => {
    db._setError(new Error("connection lost"));
    await expect(store.transaction((uow) => uow.orders.findById("order-1"))).rejects.toThrow(
      "connection lost"
    );
  });
});
