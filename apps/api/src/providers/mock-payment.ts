import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";
import {
  ok,
  fail,
  WebhookVerificationError,
  type CheckoutSession,
  type CheckoutSessionInput,
  type PaymentCustomer,
  type PaymentPrice,
  type PaymentProvider,
  type PaymentSubscription,
  type ProviderResult,
} from "./payment.js";

export function signMockPayload(rawBody: Buffer | string, secret: string): string {
  return createHmac("sha256", secret).update(rawBody).digest("hex");
}

function mockId(prefix: string): string {
  return `${prefix}_mock_${randomBytes(8).toString("hex")}`;
}

/**
 * In-process payment provider for development and tests. Webhooks are signed
 * with HMAC-SHA256 (hex) over the raw body in the `x-mock-signature` header.
 */
export class MockPaymentProvider implements PaymentProvider {
  readonly name = "mock";
  readonly signatureHeader = "x-mock-signature";
  private readonly customers = new Map<string, PaymentCustomer>();
  private readonly subscriptions = new Map<string, PaymentSubscription>();
  private readonly prices: PaymentPrice[] = [
    { id: "price_mock_basic", productId: "prod_mock_basic", unitAmount: 900, currency: "usd", interval: "month", active: true },
    { id: "price_mock_pro", productId: "prod_mock_pro", unitAmount: 2900, currency: "usd", interval: "month", active: true },
  ];

  constructor(private readonly webhookSecret: string) {}

  /** Seeds a subscription so lookups and cancellation have something to act on. */
  addSubscription(subscription: PaymentSubscription): void {
    this.subscriptions.set(subscription.id, { ...subscription });
  }

  async createCheckoutSession(input: CheckoutSessionInput): Promise<ProviderResult<CheckoutSession>> {
    if (!this.prices.some((price) => price.id === input.priceId)) {
      return fail(`No such price: ${input.priceId}`);
    }
    const sessionId = mockId("cs");
    return ok({ sessionId, url: `https://checkout.mock.local/${sessionId}` });
  }

  async createCustomer(userId: string, email: string): Promise<ProviderResult<PaymentCustomer>> {
    const customer: PaymentCustomer = { id: mockId("cus"), email, metadata: { user_id: userId } };
    this.customers.set(customer.id, customer);
    return ok({ ...customer });
  }

  async getCustomer(customerId: string): Promise<ProviderResult<PaymentCustomer | null>> {
    const customer = this.customers.get(customerId);
    return ok(customer ? { ...customer } : null);
  }

  async getSubscription(subscriptionId: string): Promise<ProviderResult<PaymentSubscription | null>> {
    const subscription = this.subscriptions.get(subscriptionId);
    return ok(subscription ? { ...subscription } : null);
  }

  async cancelSubscription(subscriptionId: string, immediately: boolean): Promise<ProviderResult<PaymentSubscription>> {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return fail(`No such subscription: ${subscriptionId}`);
    }

    if (immediately) {
      subscription.status = "canceled";
      subscription.currentPeriodEnd = Math.floor(Date.now() / 1000);
    } else {
      subscription.cancelAtPeriodEnd = true;
    }
    return ok({ ...subscription });
  }

  async createBillingPortalSession(customerId: string, _returnUrl: string): Promise<ProviderResult<{ url: string }>> {
    return ok({ url: `https://billing.mock.local/${customerId}` });
  }

  async listPrices(): Promise<ProviderResult<PaymentPrice[]>> {
    return ok(this.prices.map((price) => ({ ...price })));
  }

  async verifyWebhook(rawBody: Buffer, signature: string): Promise<unknown> {
    const expected = Buffer.from(signMockPayload(rawBody, this.webhookSecret), "hex");
    const provided = /^[0-9a-f]+$/i.test(signature) ? Buffer.from(signature, "hex") : Buffer.alloc(0);
    if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
      throw new WebhookVerificationError("invalid_signature", "Invalid signature");
    }

    try {
      const event: unknown = JSON.parse(rawBody.toString("utf8"));
      return event;
    } catch {
      throw new WebhookVerificationError("invalid_payload", "Invalid payload");
    }
  }
}
