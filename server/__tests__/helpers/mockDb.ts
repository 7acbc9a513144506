/**
 * Typed Drizzle mock chain for store tests.
 *
 * Every builder method returns the same chain, and awaiting the chain yields
 * the next queued result. `db.transaction(work)` hands the chain to `work` as
 * the transaction handle.
 */

import { vi } from "vitest";
import type { Mock } from "vitest";

const CHAIN_METHODS = [
  "select",
  "from",
  "where",
  "limit",
  "orderBy",
  "for",
  "insert",
  "values",
  "update",
  "set",
  "delete",
  "returning",
  "onConflictDoUpdate",
] as const;

type ChainMethod = (typeof CHAIN_METHODS)[number];

export type MockQueryChain = Record<ChainMethod, Mock> & {
  then: (
    onFulfilled?: (value: unknown) => unknown,
    onRejected?: (reason: unknown) => unknown
  ) => Promise<unknown>;
};

export interface MockDb extends MockQueryChain {
  transaction: Mock;
  /** Queue the values resolved by successive awaits, in order. */
  _setSequentialResults(results: unknown[]): void;
  /** Make the next await reject with `err`. */
  _setError(err: unknown): void;
}

/**
 * Create a mock Drizzle database.
 *
 * @example
 * ```ts
 * const { db, chain } = createMockDb();
 * chain._setSequentialResults([[productRow]]);
 * const store = createPostgresCommerceStore(db as unknown as Database);
 * ```
 */
export function createMockDb(defaultResult: unknown = []): { db: MockDb; chain: MockDb } {
  let queued: unknown[] = [];
  let error: unknown = undefined;

  const chain = {} as MockDb;
  for (const method of CHAIN_METHODS) {
    chain[method] = vi.fn(() => chain);
  }

  chain.then = (onFulfilled, onRejected) => {
    if (error !== undefined) {
      const rejection = error;
      error = undefined;
      return Promise.reject(rejection).then(onFulfilled, onRejected);
    }
    const value = queued.length > 0 ? queued.shift() : defaultResult;
    return Promise.resolve(value).then(onFulfilled, onRejected);
  };

  chain.transaction = vi.fn(async (work: (tx: MockDb) => Promise<unknown>) => work(chain));

  chain._setSequentialResults = (results) => {
    queued = [...results];
    error = undefined;
  };

  chain._setError = (err) => {
    error = err;
  };

  return { db: chain, chain };
}
