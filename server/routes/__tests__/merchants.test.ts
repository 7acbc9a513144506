import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { createTestHarness, merchantRecord, type TestHarness } from "../../__tests__/helpers/commerce";
import { createMockRequest, createMockResponse, jsonBody } from "../../__tests__/helpers/mockRequest";
import { merchantHandlers } from "../merchants";

const owner = { id: "merchant-user", role: "customer" } as const;
const admin = { id: "ops", role: "admin" } as const;

describe("Merchant and Payout Routes", () => {
  let harness: TestHarness;
  let handlers: ReturnType<typeof merchantHandlers>;

  beforeEach(() => {
    harness = createTestHarness();
    harness.store.seed.merchant(
      merchantRecord({ totalEarnings: 150, totalReferrals: 4, successfulReferrals: 1 })
    );
    handlers = merchantHandlers(harness.engine);
  });

  describe("GET /api/merchants/:id/earnings", () => {
    it("summarizes earnings for the owner", async () => {
      const res = createMockResponse();

      await handlers.earnings(createMockRequest({ currentUser: owner, params: { id: "merchant-1" } }), res);

      expect(jsonBody(res)).toEqual({
        merchantId: "merchant-1",
        totalEarnings: 150,
        totalPaid: 0,
        pendingEarnings: 150,
        totalPointsEarned: 0,
        totalReferrals: 4,
        successfulReferrals: 1,
        conversionRate: 25,
        minimumPayout: 100,
        canRequestPayout: true,
      });
    });

    it("refuses other customers with 403", async () => {
      const res = createMockResponse();

      await handlers.earnings(
        createMockRequest({ currentUser: { id: "someone", role: "customer" }, params: { id: "merchant-1" } }),
        res
      );

      expect(res.status).toHaveBeenCalledWith(403);
      expect(jsonBody(res)).toEqual({
        error: "FORBIDDEN",
        message: "Not allowed to access this merchant",
      });
    });
  });

  describe("/api/merchants/:id/links", () => {
    it("creates a campaign link and lists it", async () => {
      const created = createMockResponse();
      await handlers.createLink(
        createMockRequest({
          currentUser: owner,
          params: { id: "merchant-1" },
          body: {
            name: "Launch Week",
            targetUrl: "https://shop.example.com/launch",
            campaignSource: "newsletter",
            expiresAt: "2026-06-01T00:00:00.000Z",
          },
        }),
        created
      );

      expect(created.status).toHaveBeenCalledWith(201);
      expect(jsonBody(created)).toMatchObject({
        link: {
          slug: "launch-week",
          campaignSource: "newsletter",
          expiresAt: new Date("2026-06-01T00:00:00.000Z"),
          conversionRate: 0,
        },
      });

      const listed = createMockResponse();
      await handlers.listLinks(createMockRequest({ currentUser: owner, params: { id: "merchant-1" } }), listed);
      expect(jsonBody(listed)).toMatchObject({ links: [{ slug: "launch-week" }] });
    });

    it("validates link bodies", async () => {
      const res = createMockResponse();

      await handlers.createLink(
        createMockRequest({
          currentUser: admin,
          params: { id: "merchant-1" },
          body: { name: "Launch Week", targetUrl: "not a url" },
        }),
        res
      );

      expect(res.status).toHaveBeenCalledWith(400);
      expect(jsonBody(res)).toMatchObject({ error: "VALIDATION_ERROR" });
    });
  });

  describe("payout lifecycle", () => {
    it("requests, starts and completes a payout", async () => {
      const requested = createMockResponse();
      await handlers.requestPayout(
        createMockRequest({ currentUser: owner, params: { id: "merchant-1" }, body: {} }),
        requested
      );
      expect(requested.status).toHaveBeenCalledWith(201);
      expect(jsonBody(requested)).toMatchObject({
        payout: { amount: 150, status: "pending", payoutMethod: "mpesa", currency: "KES" },
      });

      const [payout] = await harness.engine.payouts.listPayouts("merchant-1", { type: "admin", id: "ops" });
      const payoutId = payout?.id ?? "";

      const started = createMockResponse();
      await handlers.startPayout(createMockRequest({ currentUser: admin, params: { id: payoutId } }), started);
      expect(jsonBody(started)).toMatchObject({ payout: { status: "processing", processedBy: "ops" } });

      const processed = createMockResponse();
      await handlers.processPayout(
        createMockRequest({
          currentUser: admin,
          params: { id: payoutId },
          body: { success: true, transactionId: "txn-1" },
        }),
        processed
      );
      expect(jsonBody(processed)).toMatchObject({
        payout: { status: "completed", externalTransactionId: "txn-1" },
      });

      const listed = createMockResponse();
      await handlers.listPayouts(createMockRequest({ currentUser: owner, params: { id: "merchant-1" } }), listed);
      expect(jsonBody(listed)).toMatchObject({ payouts: [{ id: payoutId, status: "completed" }] });
    });

    it("refuses a second payout while one is open", async () => {
      await harness.engine.payouts.requestPayout("merchant-1", {}, { type: "customer", id: "merchant-user" });
      const res = createMockResponse();

      await handlers.requestPayout(
        createMockRequest({ currentUser: owner, params: { id: "merchant-1" }, body: { amount: 10 } }),
        res
      );

      expect(res.status).toHaveBeenCalledWith(400);
      expect(jsonBody(res)).toMatchObject({ error: "PAYOUT_IN_PROGRESS" });
    });

    it("validates payout bodies", async () => {
      const badRequest = createMockResponse();
      const badProcess = createMockResponse();

      await handlers.requestPayout(
        createMockRequest({ currentUser: owner, params: { id: "merchant-1" }, body: { amount: -5 } }),
        badRequest
      );
      await handlers.processPayout(
        createMockRequest({ currentUser: admin, params: { id: "payout-1" }, body: {} }),
        badProcess
      );

      expect(badRequest.status).toHaveBeenCalledWith(400);
      expect(badProcess.status).toHaveBeenCalledWith(400);
    });

    it("answers 404 for an unknown payout", async () => {
      const res = createMockResponse();

      await handlers.startPayout(createMockRequest({ currentUser: admin, params: { id: "missing" } }), res);

      expect(res.status).toHaveBeenCalledWith(404);
      expect(jsonBody(res)).toMatchObject({ error: "PAYOUT_NOT_FOUND" });
    });
  });
});
