import type { Database, Profile, Subscription } from "@saasrelay/db";
import type { CheckoutMode } from "@saasrelay/shared";
import { HttpError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { CheckoutSession, PaymentPrice, PaymentProvider } from "../providers/payment.js";

const ACCESS_STATUSES = new Set(["active", "trialing"]);

export function unixToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

/** Most recently created subscription row for the user. */
export async function findCurrentSubscription(db: Database, userId: string): Promise<Subscription | null> {
  const rows = await db.getAll("subscriptions", { userId });
  if (rows.length === 0) {
    return null;
  }
  return rows.reduce((latest, row) => (row.createdAt > latest.createdAt ? row : latest));
}

export function grantsAccess(subscription: Subscription | null): boolean {
  return subscription !== null && ACCESS_STATUSES.has(subscription.status);
}

export class SubscriptionService {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly payments: PaymentProvider,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "subscriptions" });
  }

  /** Returns the profile's customer id, creating the customer on first use. */
  async ensureCustomer(profile: Profile): Promise<string> {
    if (profile.stripeCustomerId) {
      return profile.stripeCustomerId;
    }

    const created = await this.payments.createCustomer(profile.id, profile.email);
    if (!created.success) {
      throw new HttpError(502, `Payment provider error: ${created.error}`);
    }
    await this.db.updateById("profiles", profile.id, { stripeCustomerId: created.data.id, updatedAt: this.db.nowIso() });
    return created.data.id;
  }

  async createCheckout(
    profile: Profile,
    input: { priceId: string; successUrl: string; cancelUrl: string; mode: CheckoutMode },
  ): Promise<CheckoutSession> {
    const customerId = await this.ensureCustomer(profile);
    const session = await this.payments.createCheckoutSession({ ...input, userId: profile.id, customerId });
    if (!session.success) {
      throw new HttpError(502, `Payment provider error: ${session.error}`);
    }
    return session.data;
  }

  /** Stored row, refreshed with the provider's status and period end when it answers. */
  async getForUser(userId: string): Promise<Subscription | null> {
    const subscription = await findCurrentSubscription(this.db, userId);
    if (!subscription) {
      return null;
    }

    const remote = await this.payments.getSubscription(subscription.stripeSubscriptionId);
    if (!remote.success) {
      this.logger.error({ userId, error: remote.error }, "Could not refresh subscription from provider");
      return subscription;
    }
    if (!remote.data) {
      return subscription;
    }
    return {
      ...subscription,
      status: remote.data.status,
      currentPeriodEnd: unixToIso(remote.data.currentPeriodEnd),
      cancelAtPeriodEnd: remote.data.cancelAtPeriodEnd,
    };
  }

  async cancel(userId: string, immediately: boolean): Promise<Subscription> {
    const subscription = await findCurrentSubscription(this.db, userId);
    if (!subscription) {
      throw new HttpError(404, "No active subscription found");
    }

    const result = await this.payments.cancelSubscription(subscription.stripeSubscriptionId, immediately);
    if (!result.success) {
      throw new HttpError(502, `Payment provider error: ${result.error}`);
    }

    const updated = await this.db.updateById("subscriptions", subscription.id, {
      status: immediately ? "canceled" : subscription.status,
      cancelAtPeriodEnd: !immediately,
      updatedAt: this.db.nowIso(),
    });
    return updated ?? subscription;
  }

  async createBillingPortal(userId: string, returnUrl: string): Promise<{ url: string }> {
    const profile = await this.db.getById("profiles", userId);
    if (!profile || !profile.stripeCustomerId) {
      throw new HttpError(404, "Customer not found");
    }

    const session = await this.payments.createBillingPortalSession(profile.stripeCustomerId, returnUrl);
    if (!session.success) {
      throw new HttpError(502, `Payment provider error: ${session.error}`);
    }
    return session.data;
  }

  async listPrices(): Promise<PaymentPrice[]> {
    const prices = await this.payments.listPrices();
    if (!prices.success) {
      throw new HttpError(502, `Payment provider error: ${prices.error}`);
    }
    return prices.data;
  }
}
