import type { DomainEventName } from "@saasrelay/shared";
import type { Plugin, Unsubscribe } from "./types.js";

export const trackedEvents: readonly DomainEventName[] = [
  "user.registered",
  "user.logged_in",
  "subscription.created",
  "subscription.updated",
  "subscription.deleted",
  "subscription.cancelled",
  "checkout.session_created",
  "payment.succeeded",
  "payment.failed",
  "invoice.paid",
  "2fa.enabled",
  "2fa.disabled",
  "docker.download_requested",
];

export const analyticsPlugin: Plugin = {
  name: "analytics",
  version: "1.0.0",

  registerEventListeners(bus, { analytics }): Unsubscribe[] {
    const unsubscribes = trackedEvents.map((event) =>
      bus.subscribe(event, async (data) => {
        const userId = typeof data.userId === "string" ? data.userId : null;
        await analytics.trackEvent(event, userId, data);
      }),
    );

    unsubscribes.push(
      bus.subscribe("user.registered", async (data) => {
        if (typeof data.userId === "string") {
          await analytics.identifyUser(data.userId, { email: data.email, fullName: data.fullName });
        }
      }),
      // Stripe amounts are in the smallest currency unit.
      bus.subscribe("payment.succeeded", async (data) => {
        if (typeof data.userId === "string" && typeof data.amount === "number" && typeof data.currency === "string") {
          await analytics.trackRevenue(data.userId, data.amount / 100, data.currency, {
            paymentIntentId: data.paymentIntentId,
          });
        }
      }),
    );
    return unsubscribes;
  },
};
