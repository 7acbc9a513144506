import { randomUUID } from "node:crypto";
import { customAlphabet } from "nanoid";
import {
  ORDER_NUMBER_PREFIX,
  ORDER_NUMBER_SUFFIX_LENGTH,
  REFERRAL_LINK_SLUG_LENGTH,
  REFERRAL_TOKEN_LENGTH,
  REFERRAL_TOKEN_PREFIX,
} from "../../config/constants";

const orderSuffix = customAlphabet("0123456789ABCDEFGHJKLMNPQRSTUVWXYZ", ORDER_NUMBER_SUFFIX_LENGTH);
const referralSuffix = customAlphabet("0123456789abcdef", REFERRAL_TOKEN_LENGTH);

export const newId = (): string => randomUUID();

/** ORD-YYYYMMDD-XXXXXXXX, dated in UTC */
export const newOrderNumber = (now: Date): string => {
  const date = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${ORDER_NUMBER_PREFIX}-${date}-${orderSuffix()}`;
};

export const newReferralToken = (): string => `${REFERRAL_TOKEN_PREFIX}${referralSuffix()}`;

/** URL-safe base slug for a campaign link name; "link" when nothing usable remains */
export const slugify = (name: string): string => {
  const slug = name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, REFERRAL_LINK_SLUG_LENGTH)
    .replace(/-+$/, "");
  return slug || "link";
};
