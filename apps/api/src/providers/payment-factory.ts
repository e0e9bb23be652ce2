import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { MockPaymentProvider } from "./mock-payment.js";
import type { PaymentProvider } from "./payment.js";
import { StripePaymentProvider } from "./stripe-payment.js";

export function createPaymentProvider(payment: AppConfig["payment"], logger: Logger): PaymentProvider {
  switch (payment.provider) {
    case "stripe":
      if (!payment.stripeSecretKey || !payment.stripeWebhookSecret) {
        throw new Error("STRIPE_SECRET_KEY and STRIPE_WEBHOOK_SECRET are required for the stripe payment provider");
      }
      return new StripePaymentProvider(
        { secretKey: payment.stripeSecretKey, webhookSecret: payment.stripeWebhookSecret },
        logger,
      );
    case "mock":
      return new MockPaymentProvider(payment.mockWebhookSecret);
    default:
      throw new Error(`Unknown payment provider: ${String(payment.provider)}`);
  }
}
