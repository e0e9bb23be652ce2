import type { Database, Profile } from "@saasrelay/db";
import {
  invoiceObjectSchema,
  paymentIntentObjectSchema,
  subscriptionObjectSchema,
  type WebhookEvent,
} from "@saasrelay/shared";
import type { EventBus } from "../event-bus.js";
import type { Logger } from "../logger.js";
import { unixToIso } from "../services/subscriptions.js";

export type WebhookHandler = (event: WebhookEvent) => Promise<void>;

async function profileForCustomer(db: Database, customerId: string): Promise<Profile | null> {
  return db.findOne("profiles", { stripeCustomerId: customerId });
}

export class SubscriptionWebhookHandlers {
  constructor(
    private readonly db: Database,
    private readonly bus: EventBus,
    private readonly logger: Logger,
  ) {}

  created: WebhookHandler = async (event) => {
    const subscription = subscriptionObjectSchema.parse(event.data.object);
    const profile = await profileForCustomer(this.db, subscription.customer);
    if (!profile) {
      this.logger.error({ customerId: subscription.customer }, "Profile not found for customer");
      return;
    }

    await this.db.create("subscriptions", {
      id: this.db.newId(),
      userId: profile.id,
      stripeCustomerId: subscription.customer,
      stripeSubscriptionId: subscription.id,
      status: subscription.status,
      currentPeriodStart: unixToIso(subscription.current_period_start),
      currentPeriodEnd: unixToIso(subscription.current_period_end),
      cancelAtPeriodEnd: subscription.cancel_at_period_end,
      createdAt: this.db.nowIso(),
      updatedAt: null,
    });

    await this.bus.publish("subscription.created", { userId: profile.id, subscriptionId: subscription.id });
    this.logger.info({ userId: profile.id, subscriptionId: subscription.id }, "Subscription created");
  };

  updated: WebhookHandler = async (event) => {
    const subscription = subscriptionObjectSchema.parse(event.data.object);
    const existing = await this.db.findOne("subscriptions", { stripeSubscriptionId: subscription.id });
    if (!existing) {
      await this.created(event);
      return;
    }

    await this.db.updateById("subscriptions", existing.id, {
      status: subscription.status,
      currentPeriodEnd: unixToIso(subscription.current_period_end),
      cancelAtPeriodEnd: subscription.cancel_at_period_end,
      updatedAt: this.db.nowIso(),
    });

    await this.bus.publish("subscription.updated", {
      userId: existing.userId,
      subscriptionId: subscription.id,
      status: subscription.status,
    });
    this.logger.info({ subscriptionId: subscription.id, status: subscription.status }, "Subscription updated");
  };

  deleted: WebhookHandler = async (event) => {
    const subscription = subscriptionObjectSchema.pick({ id: true }).parse(event.data.object);
    const existing = await this.db.findOne("subscriptions", { stripeSubscriptionId: subscription.id });
    if (!existing) {
      this.logger.warn({ subscriptionId: subscription.id }, "Subscription not found");
      return;
    }

    await this.db.updateById("subscriptions", existing.id, { status: "canceled", updatedAt: this.db.nowIso() });
    await this.bus.publish("subscription.deleted", { userId: existing.userId, subscriptionId: subscription.id });
    this.logger.info({ subscriptionId: subscription.id }, "Subscription deleted");
  };
}

export class PaymentWebhookHandlers {
  constructor(
    private readonly db: Database,
    private readonly bus: EventBus,
    private readonly logger: Logger,
  ) {}

  succeeded: WebhookHandler = async (event) => {
    const intent = paymentIntentObjectSchema.parse(event.data.object);
    const profile = await this.profileFor(intent.customer);
    if (!profile) {
      return;
    }

    await this.bus.publish("payment.succeeded", {
      userId: profile.id,
      paymentIntentId: intent.id,
      amount: intent.amount,
      currency: intent.currency,
    });
    this.logger.info({ userId: profile.id, paymentIntentId: intent.id }, "Payment succeeded");
  };

  failed: WebhookHandler = async (event) => {
    const intent = paymentIntentObjectSchema.parse(event.data.object);
    const profile = await this.profileFor(intent.customer);
    if (!profile) {
      return;
    }

    await this.bus.publish("payment.failed", {
      userId: profile.id,
      paymentIntentId: intent.id,
      error: intent.last_payment_error?.message ?? null,
    });
    this.logger.warn({ userId: profile.id, paymentIntentId: intent.id }, "Payment failed");
  };

  actionRequired: WebhookHandler = async (event) => {
    const intent = paymentIntentObjectSchema.parse(event.data.object);
    const profile = await this.profileFor(intent.customer);
    if (!profile) {
      return;
    }

    await this.bus.publish("payment.action_required", {
      userId: profile.id,
      paymentIntentId: intent.id,
      clientSecret: intent.client_secret ?? null,
    });
    this.logger.info({ userId: profile.id, paymentIntentId: intent.id }, "Payment action required");
  };

  private async profileFor(customerId: string | null | undefined): Promise<Profile | null> {
    if (!customerId) {
      this.logger.warn("Payment intent has no customer");
      return null;
    }
    const profile = await profileForCustomer(this.db, customerId);
    if (!profile) {
      this.logger.error({ customerId }, "Profile not found for customer");
    }
    return profile;
  }
}

export class InvoiceWebhookHandlers {
  constructor(
    private readonly db: Database,
    private readonly bus: EventBus,
    private readonly logger: Logger,
  ) {}

  paid: WebhookHandler = async (event) => {
    const invoice = invoiceObjectSchema.parse(event.data.object);
    const profile = await this.profileFor(invoice.customer);
    if (!profile) {
      return;
    }

    await this.bus.publish("invoice.paid", {
      userId: profile.id,
      invoiceId: invoice.id,
      amountPaid: invoice.amount_paid,
      currency: invoice.currency,
      periodStart: invoice.period_start ?? null,
      periodEnd: invoice.period_end ?? null,
    });
    this.logger.info({ userId: profile.id, invoiceId: invoice.id }, "Invoice paid");
  };

  paymentFailed: WebhookHandler = async (event) => {
    const invoice = invoiceObjectSchema.parse(event.data.object);
    const profile = await this.profileFor(invoice.customer);
    if (!profile) {
      return;
    }

    await this.bus.publish("invoice.payment_failed", {
      userId: profile.id,
      invoiceId: invoice.id,
      amountDue: invoice.amount_due,
      attemptCount: invoice.attempt_count,
    });
    this.logger.warn({ userId: profile.id, invoiceId: invoice.id }, "Invoice payment failed");
  };

  upcoming: WebhookHandler = async (event) => {
    const invoice = invoiceObjectSchema.parse(event.data.object);
    const profile = await this.profileFor(invoice.customer);
    if (!profile) {
      return;
    }

    await this.bus.publish("invoice.upcoming", {
      userId: profile.id,
      amountDue: invoice.amount_due,
      nextPaymentAttempt: invoice.next_payment_attempt ?? null,
    });
    this.logger.info({ userId: profile.id }, "Invoice upcoming");
  };

  private async profileFor(customerId: string | null | undefined): Promise<Profile | null> {
    if (!customerId) {
      return null;
    }
    const profile = await profileForCustomer(this.db, customerId);
    if (!profile) {
      this.logger.error({ customerId }, "Profile not found for customer");
    }
    return profile;
  }
}

/** Handlers for every provider event type the platform reacts to. */
export function createDefaultHandlers(db: Database, bus: EventBus, logger: Logger): Record<string, WebhookHandler> {
  const subscriptions = new SubscriptionWebhookHandlers(db, bus, logger);
  const payments = new PaymentWebhookHandlers(db, bus, logger);
  const invoices = new InvoiceWebhookHandlers(db, bus, logger);

  return {
    "customer.subscription.created": subscriptions.created,
    "customer.subscription.updated": subscriptions.updated,
    "customer.subscription.deleted": subscriptions.deleted,
    "payment_intent.succeeded": payments.succeeded,
    "payment_intent.payment_failed": payments.failed,
    "payment_intent.requires_action": payments.actionRequired,
    "invoice.paid": invoices.paid,
    "invoice.payment_failed": invoices.paymentFailed,
    "invoice.upcoming": invoices.upcoming,
  };
}
