import type { CheckoutMode, SubscriptionStatus } from "@saasrelay/shared";

export type ProviderResult<T> = { success: true; data: T } | { success: false; error: string };

export function ok<T>(data: T): ProviderResult<T> {
  return { success: true, data };
}

export function fail<T>(error: string): ProviderResult<T> {
  return { success: false, error };
}

export interface CheckoutSessionInput {
  userId: string;
  customerId: string;
  priceId: string;
  successUrl: string;
  cancelUrl: string;
  mode: CheckoutMode;
}

export interface CheckoutSession {
  sessionId: string;
  url: string | null;
}

export interface PaymentCustomer {
  id: string;
  email: string | null;
  metadata: Record<string, string>;
}

export interface PaymentSubscription {
  id: string;
  customerId: string;
  status: SubscriptionStatus | string;
  /** Unix seconds. */
  currentPeriodStart: number;
  /** Unix seconds. */
  currentPeriodEnd: number;
  cancelAtPeriodEnd: boolean;
}

export interface PaymentPrice {
  id: string;
  productId: string | null;
  unitAmount: number | null;
  currency: string;
  interval: string | null;
  active: boolean;
}

export type WebhookVerificationFailure = "invalid_payload" | "invalid_signature";

export class WebhookVerificationError extends Error {
  constructor(
    readonly reason: WebhookVerificationFailure,
    message: string,
  ) {
    super(message);
    this.name = "WebhookVerificationError";
  }
}

export interface PaymentProvider {
  readonly name: string;
  /** Request header carrying the webhook signature, lower-case. */
  readonly signatureHeader: string;
  createCheckoutSession(input: CheckoutSessionInput): Promise<ProviderResult<CheckoutSession>>;
  createCustomer(userId: string, email: string): Promise<ProviderResult<PaymentCustomer>>;
  getCustomer(customerId: string): Promise<ProviderResult<PaymentCustomer | null>>;
  getSubscription(subscriptionId: string): Promise<ProviderResult<PaymentSubscription | null>>;
  cancelSubscription(subscriptionId: string, immediately: boolean): Promise<ProviderResult<PaymentSubscription>>;
  createBillingPortalSession(customerId: string, returnUrl: string): Promise<ProviderResult<{ url: string }>>;
  listPrices(): Promise<ProviderResult<PaymentPrice[]>>;
  /**
   * Checks the signature over the raw request body and returns the parsed
   * event. Throws `WebhookVerificationError` when either check fails.
   */
  verifyWebhook(rawBody: Buffer, signature: string): Promise<unknown>;
}
