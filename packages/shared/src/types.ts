export type SubscriptionStatus =
  | "active"
  | "trialing"
  | "past_due"
  | "canceled"
  | "unpaid"
  | "incomplete"
  | "incomplete_expired"
  | "paused";

export type CheckoutMode = "subscription" | "payment";

export type TwoFactorMethod = "totp";

export type TwoFactorVerificationMethod = "totp" | "backup_code";

export type WebhookAck = { status: "received" } | { status: "duplicate" };

export type DomainEventName =
  | "user.registered"
  | "user.logged_in"
  | "user.logged_out"
  | "subscription.created"
  | "subscription.updated"
  | "subscription.deleted"
  | "subscription.cancelled"
  | "checkout.session_created"
  | "payment.succeeded"
  | "payment.failed"
  | "payment.action_required"
  | "invoice.paid"
  | "invoice.payment_failed"
  | "invoice.upcoming"
  | "2fa.enabled"
  | "2fa.disabled"
  | "docker.download_requested";

export interface RateLimitInfo {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: Date;
  retryAfter: number | null;
}

export interface TwoFactorStatus {
  enabled: boolean;
  method: TwoFactorMethod | null;
  backupCodesRemaining: number;
}
