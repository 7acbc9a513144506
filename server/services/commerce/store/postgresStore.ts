import { and, asc, count, desc, eq, inArray, lt, sql } from "drizzle-orm";
import {
  cartItems,
  carts,
  couponUsages,
  coupons,
  merchantPayouts,
  merchantReferrals,
  merchants,
  orderLines,
  orders,
  payments,
  pointsAccounts,
  pointsTransactions,
  productVariants,
  products,
  referralLinks,
  type OrderLineRow,
  type OrderRow,
} from "@shared/schema";
import type { Database } from "../../../db";
import type { OrderLine, OrderRecord } from "../types";
import type { CommerceStore, UnitOfWork } from "./types";

/** Anything that can run queries: the pool-backed database or an open transaction */
type Executor = Pick<Database, "select" | "insert" | "update" | "delete">;

const toOrderLine = (row: OrderLineRow): OrderLine => ({
  productId: row.productId,
  variantId: row.variantId,
  productName: row.productName,
  sku: row.sku,
  variantName: row.variantName,
  quantity: row.quantity,
  unitPrice: row.unitPrice,
  lineTotal: row.lineTotal,
  isDigital: row.isDigital,
});

const withLines = (row: OrderRow, lines: OrderLineRow[]): OrderRecord => ({
  ...row,
  lines: lines.filter((line) => line.orderId === row.id).map(toOrderLine),
});

function requireRow<T>(row: T | undefined, entity: string, id: string): T {
  if (!row) {
    throw new Error(`${entity} ${id} does not exist`);
  }
  return row;
}

export const createUnitOfWork = (tx: Executor): UnitOfWork => {
  const loadLines = async (orderIds: string[]): Promise<OrderLineRow[]> => {
    if (orderIds.length === 0) return [];
    return tx
      .select()
      .from(orderLines)
      .where(inArray(orderLines.orderId, orderIds))
      .orderBy(asc(orderLines.id));
  };

  return {
    catalog: {
      async findProduct(id, options) {
        const query = tx.select().from(products).where(eq(products.id, id)).limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async findVariant(id, options) {
        const query = tx.select().from(productVariants).where(eq(productVariants.id, id)).limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async setProductInventory(id, inventoryCount) {
        await tx
          .update(products)
          .set({ inventoryCount, updatedAt: new Date() })
          .where(eq(products.id, id));
      },
      async setVariantInventory(id, inventoryCount) {
        await tx
          .update(productVariants)
          .set({ inventoryCount, updatedAt: new Date() })
          .where(eq(productVariants.id, id));
      },
    },

    carts: {
      async findByUser(userId) {
        const [cart] = await tx.select().from(carts).where(eq(carts.userId, userId)).limit(1);
        if (!cart) return undefined;

        const items = await tx
          .select()
          .from(cartItems)
          .where(eq(cartItems.userId, userId))
          .orderBy(asc(cartItems.id));

        return {
          ...cart,
          items: items.map((item) => ({
            productId: item.productId,
            variantId: item.variantId,
            quantity: item.quantity,
            unitPrice: item.unitPrice,
            addedAt: item.addedAt,
          })),
        };
      },
      async save(cart) {
        await tx
          .insert(carts)
          .values({
            userId: cart.userId,
            subtotal: cart.subtotal,
            itemCount: cart.itemCount,
            createdAt: cart.createdAt,
            updatedAt: cart.updatedAt,
          })
          .onConflictDoUpdate({
            target: carts.userId,
            set: { subtotal: cart.subtotal, itemCount: cart.itemCount, updatedAt: cart.updatedAt },
          });

        await tx.delete(cartItems).where(eq(cartItems.userId, cart.userId));
        if (cart.items.length > 0) {
          await tx
            .insert(cartItems)
            .values(cart.items.map((item) => ({ ...item, userId: cart.userId })));
        }
      },
      async delete(userId) {
        const removed = await tx
          .delete(carts)
          .where(eq(carts.userId, userId))
          .returning({ userId: carts.userId });
        return removed.length > 0;
      },
      async deleteUpdatedBefore(cutoff) {
        const removed = await tx
          .delete(carts)
          .where(lt(carts.updatedAt, cutoff))
          .returning({ userId: carts.userId });
        return removed.length;
      },
    },

    orders: {
      async insert(order) {
        const { lines, ...row } = order;
        await tx.insert(orders).values(row);
        if (lines.length > 0) {
          await tx.insert(orderLines).values(lines.map((line) => ({ ...line, orderId: order.id })));
        }
      },
      async findById(id, options) {
        const query = tx.select().from(orders).where(eq(orders.id, id)).limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        if (!row) return undefined;
        return withLines(row, await loadLines([row.id]));
      },
      async listByUser(userId, limit) {
        const rows = await tx
          .select()
          .from(orders)
          .where(eq(orders.userId, userId))
          .orderBy(desc(orders.createdAt))
          .limit(limit);
        const lines = await loadLines(rows.map((row) => row.id));
        return rows.map((row) => withLines(row, lines));
      },
      async update(id, patch) {
        const [row] = await tx.update(orders).set(patch).where(eq(orders.id, id)).returning();
        const updated = requireRow(row, "Order", id);
        return withLines(updated, await loadLines([updated.id]));
      },
    },

    payments: {
      async insert(payment) {
        await tx.insert(payments).values(payment);
      },
      async findById(id, options) {
        const query = tx.select().from(payments).where(eq(payments.id, id)).limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async listByOrder(orderId) {
        return tx
          .select()
          .from(payments)
          .where(eq(payments.orderId, orderId))
          .orderBy(asc(payments.createdAt));
      },
      async update(id, patch) {
        const [row] = await tx.update(payments).set(patch).where(eq(payments.id, id)).returning();
        return requireRow(row, "Payment", id);
      },
    },

    points: {
      async findAccount(userId, options) {
        const query = tx
          .select()
          .from(pointsAccounts)
          .where(eq(pointsAccounts.userId, userId))
          .limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async saveAccount(account) {
        await tx
          .insert(pointsAccounts)
          .values(account)
          .onConflictDoUpdate({
            target: pointsAccounts.userId,
            set: {
              currentBalance: account.currentBalance,
              totalEarned: account.totalEarned,
              totalSpent: account.totalSpent,
              updatedAt: account.updatedAt,
            },
          });
      },
      async appendTransaction(entry) {
        await tx.insert(pointsTransactions).values(entry);
      },
      async listTransactions(userId, limit) {
        return tx
          .select()
          .from(pointsTransactions)
          .where(eq(pointsTransactions.userId, userId))
          .orderBy(desc(pointsTransactions.createdAt))
          .limit(limit);
      },
    },

    coupons: {
      async findByCode(code, options) {
        const query = tx.select().from(coupons).where(eq(coupons.code, code)).limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async insert(coupon) {
        await tx.insert(coupons).values(coupon);
      },
      async incrementUsage(id) {
        await tx
          .update(coupons)
          .set({ usageCount: sql`${coupons.usageCount} + 1` })
          .where(eq(coupons.id, id));
      },
      async countUsageByUser(couponId, userId) {
        const [result] = await tx
          .select({ value: count() })
          .from(couponUsages)
          .where(and(eq(couponUsages.couponId, couponId), eq(couponUsages.userId, userId)));
        return result?.value ?? 0;
      },
      async recordUsage(usage) {
        await tx.insert(couponUsages).values(usage);
      },
    },

    merchants: {
      async findById(id, options) {
        const query = tx.select().from(merchants).where(eq(merchants.id, id)).limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async findByReferralCode(code, options) {
        const query = tx
          .select()
          .from(merchants)
          .where(eq(merchants.referralCode, code))
          .limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async update(id, patch) {
        const [row] = await tx.update(merchants).set(patch).where(eq(merchants.id, id)).returning();
        return requireRow(row, "Merchant", id);
      },
    },

    referrals: {
      async insert(referral) {
        await tx.insert(merchantReferrals).values(referral);
      },
      async findByToken(token, options) {
        const query = tx
          .select()
          .from(merchantReferrals)
          .where(eq(merchantReferrals.referralToken, token))
          .limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async findByOrderId(orderId) {
        const [row] = await tx
          .select()
          .from(merchantReferrals)
          .where(eq(merchantReferrals.orderId, orderId))
          .limit(1);
        return row;
      },
      async findPendingByUser(userId, options) {
        const query = tx
          .select()
          .from(merchantReferrals)
          .where(
            and(
              eq(merchantReferrals.referredUserId, userId),
              eq(merchantReferrals.status, "pending")
            )
          )
          .orderBy(desc(merchantReferrals.clickedAt))
          .limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async update(id, patch) {
        const [row] = await tx
          .update(merchantReferrals)
          .set(patch)
          .where(eq(merchantReferrals.id, id))
          .returning();
        return requireRow(row, "Referral", id);
      },
      async expirePendingBefore(now) {
        const expired = await tx
          .update(merchantReferrals)
          .set({ status: "expired", updatedAt: now })
          .where(and(eq(merchantReferrals.status, "pending"), lt(merchantReferrals.expiresAt, now)))
          .returning({ id: merchantReferrals.id });
        return expired.length;
      },
    },

    referralLinks: {
      async insert(link) {
        await tx.insert(referralLinks).values(link);
      },
      async findById(id, options) {
        const query = tx.select().from(referralLinks).where(eq(referralLinks.id, id)).limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async findBySlug(slug, options) {
        const query = tx.select().from(referralLinks).where(eq(referralLinks.slug, slug)).limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async listByMerchant(merchantId) {
        return tx
          .select()
          .from(referralLinks)
          .where(eq(referralLinks.merchantId, merchantId))
          .orderBy(desc(referralLinks.createdAt));
      },
      async update(id, patch) {
        const [row] = await tx
          .update(referralLinks)
          .set(patch)
          .where(eq(referralLinks.id, id))
          .returning();
        return requireRow(row, "Referral link", id);
      },
    },

    payouts: {
      async insert(payout) {
        await tx.insert(merchantPayouts).values(payout);
      },
      async findById(id, options) {
        const query = tx.select().from(merchantPayouts).where(eq(merchantPayouts.id, id)).limit(1);
        const [row] = options?.forUpdate ? await query.for("update") : await query;
        return row;
      },
      async listByMerchant(merchantId) {
        return tx
          .select()
          .from(merchantPayouts)
          .where(eq(merchantPayouts.merchantId, merchantId))
          .orderBy(desc(merchantPayouts.requestedAt));
      },
      async update(id, patch) {
        const [row] = await tx
          .update(merchantPayouts)
          .set(patch)
          .where(eq(merchantPayouts.id, id))
          .returning();
        return requireRow(row, "Payout", id);
      },
      async sumCompleted(merchantId) {
        const [result] = await tx
          .select({
            total: sql<number>`coalesce(sum(${merchantPayouts.amount}), 0)`.mapWith(Number),
          })
          .from(merchantPayouts)
          .where(
            and(eq(merchantPayouts.merchantId, merchantId), eq(merchantPayouts.status, "completed"))
          );
        return result?.total ?? 0;
      },
      async hasOpenPayout(merchantId) {
        const [open] = await tx
          .select({ id: merchantPayouts.id })
          .from(merchantPayouts)
          .where(
            and(
              eq(merchantPayouts.merchantId, merchantId),
              inArray(merchantPayouts.status, ["pending", "processing"])
            )
          )
          .limit(1);
        return open !== undefined;
      },
    },
  };
};

/**
 * Postgres-backed store. Each unit of work is one Drizzle transaction and
 * `forUpdate` reads take `SELECT … FOR UPDATE` row locks.
 */
export const createPostgresCommerceStore = (db: Database): CommerceStore => ({
  transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    return db.transaction(async (tx) => work(createUnitOfWork(tx)));
  },
});
