import { ForbiddenError, NotFoundError } from "./errors";
import type { UnitOfWork } from "./store/types";
import type { Actor, MerchantRecord } from "./types";

/** Customers may only act on the merchant account they own */
export function assertMerchantAccess(merchant: MerchantRecord, actor: Actor): void {
  if (actor.type === "customer" && merchant.userId !== actor.id) {
    throw new ForbiddenError("Not allowed to access this merchant");
  }
}

export async function loadMerchant(
  uow: UnitOfWork,
  merchantId: string,
  forUpdate = false
): Promise<MerchantRecord> {
  const merchant = await uow.merchants.findById(merchantId, { forUpdate });
  if (!merchant) throw new NotFoundError("Merchant", merchantId);
  return merchant;
}
