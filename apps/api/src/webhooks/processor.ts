import type { Database } from "@saasrelay/db";
import type { WebhookEvent } from "@saasrelay/shared";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { MonitoringProvider } from "../providers/monitoring.js";
import type { WebhookHandler } from "./handlers.js";

export type WebhookOutcome = "processed" | "unhandled" | "failed";

/**
 * Records each verified event in `webhook_events` and dispatches it to the
 * handler registered for its type. Handler failures are recorded on the row
 * and reported; they are not retried.
 */
export class WebhookProcessor {
  private readonly handlers = new Map<string, WebhookHandler>();
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly monitoring: MonitoringProvider,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "webhook-processor" });
  }

  registerHandler(eventType: string, handler: WebhookHandler): void {
    this.handlers.set(eventType, handler);
  }

  registerHandlers(handlers: Record<string, WebhookHandler>): void {
    for (const [eventType, handler] of Object.entries(handlers)) {
      this.registerHandler(eventType, handler);
    }
  }

  hasHandler(eventType: string): boolean {
    return this.handlers.has(eventType);
  }

  async processEvent(event: WebhookEvent, provider: string): Promise<WebhookOutcome> {
    await this.record(event, provider);

    const handler = this.handlers.get(event.type);
    if (!handler) {
      this.logger.warn({ eventId: event.id, eventType: event.type }, "No handler for webhook event type");
      return "unhandled";
    }

    try {
      await handler(event);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ err: error, eventId: event.id, eventType: event.type }, "Webhook handler failed");
      await this.monitoring.captureException(error, { extra: { eventId: event.id, eventType: event.type, provider } });
      await this.db.updateWhere("webhook_events", { eventId: event.id }, { error: message });
      return "failed";
    }

    await this.db.updateWhere("webhook_events", { eventId: event.id }, { processed: true });
    this.logger.info({ eventId: event.id, eventType: event.type }, "Webhook event processed");
    return "processed";
  }

  private async record(event: WebhookEvent, provider: string): Promise<void> {
    try {
      await this.db.create("webhook_events", {
        id: this.db.newId(),
        eventId: event.id,
        eventType: event.type,
        provider,
        data: event.data.object,
        processed: false,
        error: null,
        createdAt: this.db.nowIso(),
      });
    } catch (error) {
      this.logger.error({ err: error, eventId: event.id }, "Failed to log webhook event");
    }
  }
}
