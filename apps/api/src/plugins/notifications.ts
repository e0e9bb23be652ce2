import type { Profile } from "@saasrelay/db";
import type { DomainEventName } from "@saasrelay/shared";
import type { EventData } from "../event-bus.js";
import { findCurrentSubscription } from "../services/subscriptions.js";
import type { PluginContext, Plugin, Unsubscribe } from "./types.js";

type Notifier = (profile: Profile, data: EventData) => Promise<void>;

function stringField(data: EventData, field: string): string | null {
  const value = data[field];
  return typeof value === "string" ? value : null;
}

function formatDate(iso: string): string {
  return iso.slice(0, 10);
}

/** Maps domain events onto emails, texts and push notifications for the affected user. */
function notifiers(context: PluginContext): Array<[DomainEventName, Notifier]> {
  const { config, db, email, sms, push } = context;
  const links = {
    app_name: config.appName,
    login_url: `${config.frontendUrl}/login`,
    dashboard_url: `${config.frontendUrl}/dashboard`,
    billing_url: `${config.frontendUrl}/dashboard/billing`,
  };

  return [
    [
      "user.registered",
      async (profile) => {
        await email.sendTemplate([profile.email], "welcome", { ...links, name: profile.fullName });
      },
    ],
    [
      "subscription.created",
      async (profile, data) => {
        const subscriptionId = stringField(data, "subscriptionId");
        const row = subscriptionId ? await db.findOne("subscriptions", { stripeSubscriptionId: subscriptionId }) : null;
        await email.sendTemplate([profile.email], "subscription_created", {
          ...links,
          name: profile.fullName,
          plan_name: config.appName,
          next_billing_date: row ? formatDate(row.currentPeriodEnd) : "",
        });
      },
    ],
    [
      "subscription.cancelled",
      async (profile) => {
        const row = await findCurrentSubscription(db, profile.id);
        await email.sendTemplate([profile.email], "subscription_cancelled", {
          ...links,
          name: profile.fullName,
          end_date: row ? formatDate(row.currentPeriodEnd) : "",
        });
      },
    ],
    [
      "payment.failed",
      async (profile) => {
        await email.sendTemplate([profile.email], "payment_failed", { ...links, name: profile.fullName });
        if (profile.phone) {
          await sms.sendSms(profile.phone, `${config.appName}: your payment failed. Update your payment method at ${links.billing_url}`);
        }
        await push.sendNotification(profile.id, {
          title: "Payment failed",
          body: "Update your payment method to keep your subscription active.",
          url: links.billing_url,
        });
      },
    ],
    [
      "invoice.payment_failed",
      async (profile) => {
        await push.sendNotification(profile.id, {
          title: "Invoice payment failed",
          body: "We could not collect your latest invoice.",
          url: links.billing_url,
        });
      },
    ],
    [
      "2fa.enabled",
      async (profile) => {
        await email.sendTemplate([profile.email], "2fa_enabled", { ...links, name: profile.fullName });
        if (profile.phone) {
          await sms.sendSms(profile.phone, `${config.appName}: two-factor authentication was enabled on your account.`);
        }
      },
    ],
  ];
}

export const notificationsPlugin: Plugin = {
  name: "notifications",
  version: "1.0.0",

  registerEventListeners(bus, context): Unsubscribe[] {
    const logger = context.logger.child({ component: "notifications" });

    return notifiers(context).map(([event, notify]) =>
      bus.subscribe(event, async (data) => {
        const userId = stringField(data, "userId");
        const profile = userId ? await context.db.getById("profiles", userId) : null;
        if (!profile) {
          logger.warn({ event, userId }, "Notification skipped, user not found");
          return;
        }
        await notify(profile, data);
        logger.debug({ event, userId }, "Notification sent");
      }),
    );
  },
};
