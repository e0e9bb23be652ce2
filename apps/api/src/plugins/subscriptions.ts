import { billingPortalSchema, cancelSubscriptionSchema, checkoutSessionSchema } from "@saasrelay/shared";
import { requireUser } from "../auth.js";
import type { Plugin } from "./types.js";

export const subscriptionsPlugin: Plugin = {
  name: "subscriptions",
  version: "1.0.0",
  prefix: "/api/subscriptions",

  async routes(app, { authenticate, bus, services }) {
    const subscriptions = services.subscriptions;

    app.get("/prices", async () => subscriptions.listPrices());

    app.post("/checkout", { preHandler: authenticate }, async (request, reply) => {
      const parsed = checkoutSessionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const user = requireUser(request);
      const session = await subscriptions.createCheckout(user, parsed.data);
      await bus.publish("checkout.session_created", {
        userId: user.id,
        sessionId: session.sessionId,
        priceId: parsed.data.priceId,
      });
      return reply.send(session);
    });

    app.get("/me", { preHandler: authenticate }, async (request) => {
      const subscription = await subscriptions.getForUser(requireUser(request).id);
      return subscription ?? { status: "no_subscription" };
    });

    app.post("/cancel", { preHandler: authenticate }, async (request, reply) => {
      const parsed = cancelSubscriptionSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const user = requireUser(request);
      const subscription = await subscriptions.cancel(user.id, parsed.data.immediately);
      await bus.publish("subscription.cancelled", {
        userId: user.id,
        subscriptionId: subscription.stripeSubscriptionId,
        immediately: parsed.data.immediately,
      });
      return reply.send(subscription);
    });

    app.post("/billing-portal", { preHandler: authenticate }, async (request, reply) => {
      const parsed = billingPortalSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }
      return reply.send(await subscriptions.createBillingPortal(requireUser(request).id, parsed.data.returnUrl));
    });
  },
};
