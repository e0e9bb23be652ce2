import Stripe from "stripe";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  fail,
  ok,
  WebhookVerificationError,
  type CheckoutSession,
  type CheckoutSessionInput,
  type PaymentCustomer,
  type PaymentPrice,
  type PaymentProvider,
  type PaymentSubscription,
  type ProviderResult,
} from "./payment.js";

export interface StripePaymentOptions {
  secretKey: string;
  webhookSecret: string;
}

function toSubscription(subscription: Stripe.Subscription): PaymentSubscription {
  return {
    id: subscription.id,
    customerId: typeof subscription.customer === "string" ? subscription.customer : subscription.customer.id,
    status: subscription.status,
    currentPeriodStart: subscription.current_period_start,
    currentPeriodEnd: subscription.current_period_end,
    cancelAtPeriodEnd: subscription.cancel_at_period_end,
  };
}

function toPrice(price: Stripe.Price): PaymentPrice {
  return {
    id: price.id,
    productId: typeof price.product === "string" ? price.product : price.product.id,
    unitAmount: price.unit_amount,
    currency: price.currency,
    interval: price.recurring?.interval ?? null,
    active: price.active,
  };
}

export class StripePaymentProvider implements PaymentProvider {
  readonly name = "stripe";
  readonly signatureHeader = "stripe-signature";
  private readonly stripe: Stripe;
  private readonly webhookSecret: string;
  private readonly logger: Logger;

  constructor(options: StripePaymentOptions, logger: Logger) {
    this.stripe = new Stripe(options.secretKey);
    this.webhookSecret = options.webhookSecret;
    this.logger = logger.child({ component: "stripe" });
  }

  private failure<T>(operation: string, error: unknown): ProviderResult<T> {
    this.logger.error({ err: error, operation }, "Stripe request failed");
    return fail(errorMessage(error));
  }

  async createCheckoutSession(input: CheckoutSessionInput): Promise<ProviderResult<CheckoutSession>> {
    try {
      const session = await this.stripe.checkout.sessions.create({
        customer: input.customerId,
        mode: input.mode,
        line_items: [{ price: input.priceId, quantity: 1 }],
        success_url: input.successUrl,
        cancel_url: input.cancelUrl,
        client_reference_id: input.userId,
        metadata: { user_id: input.userId },
      });
      return ok({ sessionId: session.id, url: session.url });
    } catch (error) {
      return this.failure("createCheckoutSession", error);
    }
  }

  async createCustomer(userId: string, email: string): Promise<ProviderResult<PaymentCustomer>> {
    try {
      const customer = await this.stripe.customers.create({ email, metadata: { user_id: userId } });
      this.logger.info({ customerId: customer.id, userId }, "Created Stripe customer");
      return ok({ id: customer.id, email: customer.email, metadata: customer.metadata });
    } catch (error) {
      return this.failure("createCustomer", error);
    }
  }

  async getCustomer(customerId: string): Promise<ProviderResult<PaymentCustomer | null>> {
    try {
      const customer = await this.stripe.customers.retrieve(customerId);
      if (customer.deleted) {
        return ok(null);
      }
      return ok({ id: customer.id, email: customer.email, metadata: customer.metadata });
    } catch (error) {
      return this.failure("getCustomer", error);
    }
  }

  async getSubscription(subscriptionId: string): Promise<ProviderResult<PaymentSubscription | null>> {
    try {
      const subscription = await this.stripe.subscriptions.retrieve(subscriptionId);
      return ok(toSubscription(subscription));
    } catch (error) {
      return this.failure("getSubscription", error);
    }
  }

  async cancelSubscription(subscriptionId: string, immediately: boolean): Promise<ProviderResult<PaymentSubscription>> {
    try {
      const subscription = immediately
        ? await this.stripe.subscriptions.cancel(subscriptionId)
        : await this.stripe.subscriptions.update(subscriptionId, { cancel_at_period_end: true });
      return ok(toSubscription(subscription));
    } catch (error) {
      return this.failure("cancelSubscription", error);
    }
  }

  async createBillingPortalSession(customerId: string, returnUrl: string): Promise<ProviderResult<{ url: string }>> {
    try {
      const session = await this.stripe.billingPortal.sessions.create({ customer: customerId, return_url: returnUrl });
      return ok({ url: session.url });
    } catch (error) {
      return this.failure("createBillingPortalSession", error);
    }
  }

  async listPrices(): Promise<ProviderResult<PaymentPrice[]>> {
    try {
      const prices = await this.stripe.prices.list({ active: true, limit: 100 });
      return ok(prices.data.map(toPrice));
    } catch (error) {
      return this.failure("listPrices", error);
    }
  }

  async verifyWebhook(rawBody: Buffer, signature: string): Promise<unknown> {
    try {
      return this.stripe.webhooks.constructEvent(rawBody, signature, this.webhookSecret);
    } catch (error) {
      if (error instanceof Stripe.errors.StripeSignatureVerificationError) {
        throw new WebhookVerificationError("invalid_signature", "Invalid signature");
      }
      throw new WebhookVerificationError("invalid_payload", "Invalid payload");
    }
  }
}
