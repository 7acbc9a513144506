import { MONEY_EPSILON } from "../../config/constants";

/** Rounds to two decimals, half away from zero for positive amounts. */
export function roundMoney(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

export function sumMoney(amounts: Iterable<number>): number {
  let total = 0;
  for (const amount of amounts) total += amount;
  return roundMoney(total);
}

/** a ≥ b, tolerating float noise below half a cent. */
export function isAtLeast(a: number, b: number): boolean {
  return a + MONEY_EPSILON >= b;
}
