import { webhookEventSchema, type WebhookAck } from "@saasrelay/shared";
import { HttpError } from "../errors.js";
import { WebhookVerificationError } from "../providers/payment.js";
import { createDefaultHandlers } from "../webhooks/handlers.js";
import type { Plugin } from "./types.js";

export const WEBHOOK_BODY_LIMIT_BYTES = 1024 * 1024;
export const WEBHOOK_IDEMPOTENCY_TTL_SECONDS = 24 * 60 * 60;

export function webhookEventKey(eventId: string): string {
  return `webhook_event:${eventId}`;
}

export const webhooksPlugin: Plugin = {
  name: "webhooks",
  version: "1.0.0",
  prefix: "/api/webhooks",

  async initialize({ db, bus, logger, services }) {
    services.webhooks.registerHandlers(createDefaultHandlers(db, bus, logger.child({ component: "webhook-handlers" })));
  },

  async routes(app, { payments, cache, tasks, services, logger }) {
    // Signatures cover the exact bytes received, so every content type arrives as a Buffer.
    app.removeAllContentTypeParsers();
    app.addContentTypeParser("*", { parseAs: "buffer", bodyLimit: WEBHOOK_BODY_LIMIT_BYTES }, (_request, body, done) => {
      done(null, body);
    });

    app.post<{ Params: { provider: string } }>("/:provider", async (request): Promise<WebhookAck> => {
      const { provider } = request.params;
      if (provider !== payments.name) {
        throw new HttpError(404, `Unknown webhook provider: ${provider}`);
      }

      const signature = request.headers[payments.signatureHeader];
      if (typeof signature !== "string" || signature.length === 0) {
        throw new HttpError(400, `Missing ${payments.signatureHeader} header`);
      }

      const rawBody = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
      let payload: unknown;
      try {
        payload = await payments.verifyWebhook(rawBody, signature);
      } catch (error) {
        if (error instanceof WebhookVerificationError) {
          logger.warn({ provider, reason: error.reason }, "Webhook verification failed");
          throw error.reason === "invalid_signature"
            ? new HttpError(401, "Invalid signature")
            : new HttpError(400, "Invalid payload");
        }
        throw error;
      }

      const parsed = webhookEventSchema.safeParse(payload);
      if (!parsed.success) {
        throw new HttpError(400, "Invalid event");
      }
      const event = parsed.data;

      const first = await cache.setIfAbsent(webhookEventKey(event.id), "1", WEBHOOK_IDEMPOTENCY_TTL_SECONDS);
      if (!first) {
        logger.info({ eventId: event.id, eventType: event.type }, "Duplicate webhook event ignored");
        return { status: "duplicate" };
      }

      tasks.enqueue(`webhook:${event.type}`, async () => {
        await services.webhooks.processEvent(event, provider);
      });
      return { status: "received" };
    });
  },
};
