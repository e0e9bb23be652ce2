import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { authHeader, buildTestApp, registerUser, type RegisteredUser, type TestApp } from "./helpers.js";

let ctx: TestApp;
let account: RegisteredUser;

const checkoutBody = {
  priceId: "price_mock_pro",
  successUrl: "http://localhost:3000/dashboard?checkout=success",
  cancelUrl: "http://localhost:3000/pricing",
};

async function post(url: string, payload?: object) {
  return ctx.app.inject({ method: "POST", url, headers: authHeader(account.token), payload });
}

async function seedSubscription(subscriptionId = "sub_seeded") {
  const db = ctx.app.platform.db;
  await db.create("subscriptions", {
    id: db.newId(),
    userId: account.user.id,
    stripeCustomerId: "cus_seeded",
    stripeSubscriptionId: subscriptionId,
    status: "active",
    currentPeriodStart: "2026-01-01T00:00:00.000Z",
    currentPeriodEnd: "2026-02-01T00:00:00.000Z",
    cancelAtPeriodEnd: false,
    createdAt: db.nowIso(),
    updatedAt: null,
  });
  ctx.payments.addSubscription({
    id: subscriptionId,
    customerId: "cus_seeded",
    status: "active",
    currentPeriodStart: 1767225600,
    currentPeriodEnd: 1769904000,
    cancelAtPeriodEnd: false,
  });
}

describe("subscription routes", () => {
  beforeEach(async () => {
    ctx = await buildTestApp();
    account = await registerUser(ctx.app);
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it("lists prices without authentication", async () => {
    const response = await ctx.app.inject({ method: "GET", url: "/api/subscriptions/prices" });

    expect(response.statusCode).toBe(200);
    const prices = response.json() as Array<{ id: string; unitAmount: number }>;
    expect(prices.map((price) => [price.id, price.unitAmount])).toEqual([
      ["price_mock_basic", 900],
      ["price_mock_pro", 2900],
    ]);
  });

  it("creates a checkout session and the customer on first use", async () => {
    const response = await post("/api/subscriptions/checkout", checkoutBody);

    expect(response.statusCode).toBe(200);
    const session = response.json() as { sessionId: string; url: string };
    expect(session.sessionId).toMatch(/^cs_mock_[0-9a-f]{16}$/);
    expect(session.url).toBe(`https://checkout.mock.local/${session.sessionId}`);

    const profile = await ctx.app.platform.db.getById("profiles", account.user.id);
    expect(profile?.stripeCustomerId).toMatch(/^cus_mock_[0-9a-f]{16}$/);

    const second = await post("/api/subscriptions/checkout", checkoutBody);
    expect(second.statusCode).toBe(200);
    const unchanged = await ctx.app.platform.db.getById("profiles", account.user.id);
    expect(unchanged?.stripeCustomerId).toBe(profile?.stripeCustomerId);

    const tracked = await ctx.app.platform.db.getAll("usage_events", { eventType: "checkout.session_created" });
    expect(tracked).toHaveLength(2);
  });

  it("reports provider failures as 502", async () => {
    const response = await post("/api/subscriptions/checkout", { ...checkoutBody, priceId: "price_missing" });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({ error: "Payment provider error: No such price: price_missing" });
  });

  it("validates checkout urls", async () => {
    const response = await post("/api/subscriptions/checkout", { ...checkoutBody, successUrl: "not a url" });
    expect(response.statusCode).toBe(400);
  });

  it("reports no subscription, then the refreshed row", async () => {
    const none = await ctx.app.inject({ method: "GET", url: "/api/subscriptions/me", headers: authHeader(account.token) });
    expect(none.json()).toEqual({ status: "no_subscription" });

    await seedSubscription();
    ctx.payments.addSubscription({
      id: "sub_seeded",
      customerId: "cus_seeded",
      status: "past_due",
      currentPeriodStart: 1767225600,
      currentPeriodEnd: 1772323200,
      cancelAtPeriodEnd: true,
    });

    const current = await ctx.app.inject({ method: "GET", url: "/api/subscriptions/me", headers: authHeader(account.token) });
    expect(current.json()).toMatchObject({
      stripeSubscriptionId: "sub_seeded",
      status: "past_due",
      currentPeriodEnd: "2026-03-01T00:00:00.000Z",
      cancelAtPeriodEnd: true,
    });
  });

  it("answers 404 when there is nothing to cancel", async () => {
    const response = await post("/api/subscriptions/cancel");

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: "No active subscription found" });
  });

  it("cancels at period end by default and keeps the status", async () => {
    await seedSubscription();

    const response = await post("/api/subscriptions/cancel", {});
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: "active", cancelAtPeriodEnd: true });

    const cancellation = ctx.email.sent.at(-1);
    expect(cancellation?.subject).toBe("Subscription Cancelled");
    expect(cancellation?.text).toContain("Access until: 2026-02-01");
  });

  it("cancels immediately when asked", async () => {
    await seedSubscription();

    const response = await post("/api/subscriptions/cancel", { immediately: true });
    expect(response.json()).toMatchObject({ status: "canceled", cancelAtPeriodEnd: false });

    const remote = await ctx.payments.getSubscription("sub_seeded");
    expect(remote.success && remote.data?.status).toBe("canceled");
  });

  it("opens the billing portal for known customers only", async () => {
    const missing = await post("/api/subscriptions/billing-portal", { returnUrl: "http://localhost:3000/dashboard" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: "Customer not found" });

    await ctx.app.platform.db.updateById("profiles", account.user.id, { stripeCustomerId: "cus_portal" });
    const portal = await post("/api/subscriptions/billing-portal", { returnUrl: "http://localhost:3000/dashboard" });
    expect(portal.statusCode).toBe(200);
    expect(portal.json()).toEqual({ url: "https://billing.mock.local/cus_portal" });
  });
});
