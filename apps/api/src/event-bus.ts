import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type { DomainEventName } from "@saasrelay/shared";
import { z } from "zod";
import type { Logger } from "./logger.js";
import { createRedisClient, type RedisClient } from "./providers/redis-cache.js";

export type EventData = Record<string, unknown>;

export type EventListener = (data: EventData, event: DomainEventName) => void | Promise<void>;

export interface BusMessage {
  instanceId: string;
  event: string;
  data: EventData;
  publishedAt: string;
}

const busMessageSchema = z.object({
  instanceId: z.string().min(1),
  event: z.string().min(1),
  data: z.record(z.unknown()),
  publishedAt: z.string(),
});

/** Carries bus messages between instances. */
export interface EventTransport {
  publish(message: BusMessage): Promise<void>;
  subscribe(events: string[], onMessage: (raw: string) => void): Promise<void>;
  close(): Promise<void>;
}

/**
 * Publish/subscribe for domain events. Local listeners run first, in
 * subscription order; a failing listener is logged and does not stop the
 * others. With a transport, messages from other instances reach the local
 * listeners and the bus ignores its own.
 */
export class EventBus {
  readonly instanceId: string;
  private readonly listeners = new Map<DomainEventName, EventListener[]>();
  private readonly logger: Logger;
  private started = false;
  private readonly transportEvents = new Set<string>();

  constructor(
    logger: Logger,
    private readonly transport: EventTransport | null = null,
    instanceId: string = randomUUID(),
  ) {
    this.logger = logger.child({ component: "event-bus" });
    this.instanceId = instanceId;
  }

  subscribe(event: DomainEventName, listener: EventListener): () => void {
    const listeners = this.listeners.get(event) ?? [];
    listeners.push(listener);
    this.listeners.set(event, listeners);
    if (this.started) {
      this.listen([event]).catch((error: unknown) => {
        this.logger.error({ err: error, event }, "Failed to subscribe transport channel");
      });
    }

    return () => {
      const current = this.listeners.get(event) ?? [];
      this.listeners.set(
        event,
        current.filter((candidate) => candidate !== listener),
      );
    };
  }

  listenerCount(event: DomainEventName): number {
    return this.listeners.get(event)?.length ?? 0;
  }

  async publish(event: DomainEventName, data: EventData = {}): Promise<void> {
    await this.dispatch(event, data);

    if (this.transport) {
      const message: BusMessage = { instanceId: this.instanceId, event, data, publishedAt: new Date().toISOString() };
      try {
        await this.transport.publish(message);
      } catch (error) {
        this.logger.error({ err: error, event }, "Failed to forward event to transport");
      }
    }
  }

  async start(): Promise<void> {
    if (!this.transport || this.started) {
      return;
    }
    this.started = true;
    await this.listen([...this.listeners.keys()]);
  }

  /** Subscribes the transport to events it does not carry yet. */
  private async listen(events: string[]): Promise<void> {
    const fresh = events.filter((event) => !this.transportEvents.has(event));
    if (!this.transport || fresh.length === 0) {
      return;
    }
    for (const event of fresh) {
      this.transportEvents.add(event);
    }

    try {
      await this.transport.subscribe(fresh, (raw) => {
        this.receive(raw).catch((error: unknown) => {
          this.logger.error({ err: error }, "Failed to handle transported event");
        });
      });
    } catch (error) {
      for (const event of fresh) {
        this.transportEvents.delete(event);
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    this.listeners.clear();
    this.transportEvents.clear();
    this.started = false;
    if (this.transport) {
      await this.transport.close();
    }
  }

  private async receive(raw: string): Promise<void> {
    const parsed = busMessageSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, "Dropped malformed bus message");
      return;
    }
    if (parsed.data.instanceId === this.instanceId) {
      return;
    }

    const event = [...this.listeners.keys()].find((name) => name === parsed.data.event);
    if (event) {
      await this.dispatch(event, parsed.data.data);
    }
  }

  private async dispatch(event: DomainEventName, data: EventData): Promise<void> {
    for (const listener of [...(this.listeners.get(event) ?? [])]) {
      try {
        await listener(data, event);
      } catch (error) {
        this.logger.error({ err: error, event }, "Event listener failed");
      }
    }
  }
}

const CHANNEL_PREFIX = "saasrelay:events:";

/** Redis pub/sub transport. Subscribing needs its own connection. */
export class RedisEventTransport implements EventTransport {
  private readonly publisher: RedisClient;
  private readonly subscriber: RedisClient;

  constructor(url: string, logger: Logger) {
    const transportLogger = logger.child({ component: "redis-event" });
    this.publisher = createRedisClient(url, transportLogger);
    this.subscriber = this.publisher.duplicate();
    this.subscriber.on("error", (error: unknown) => {
      transportLogger.error({ err: error }, "Redis subscriber error");
    });
  }

  async publish(message: BusMessage): Promise<void> {
    if (!this.publisher.isOpen) {
      await this.publisher.connect();
    }
    await this.publisher.publish(`${CHANNEL_PREFIX}${message.event}`, JSON.stringify(message));
  }

  async subscribe(events: string[], onMessage: (raw: string) => void): Promise<void> {
    if (!this.subscriber.isOpen) {
      await this.subscriber.connect();
    }
    for (const event of events) {
      await this.subscriber.subscribe(`${CHANNEL_PREFIX}${event}`, (raw) => onMessage(raw));
    }
  }

  async close(): Promise<void> {
    await Promise.all(
      [this.publisher, this.subscriber].filter((client) => client.isOpen).map((client) => client.quit()),
    );
  }
}

/** Transport over a shared in-process emitter, for several buses in one process. */
export class InProcessEventTransport implements EventTransport {
  private readonly handlers: Array<{ channel: string; handler: (raw: string) => void }> = [];

  constructor(private readonly hub: EventEmitter = new EventEmitter()) {}

  async publish(message: BusMessage): Promise<void> {
    this.hub.emit(`${CHANNEL_PREFIX}${message.event}`, JSON.stringify(message));
  }

  async subscribe(events: string[], onMessage: (raw: string) => void): Promise<void> {
    for (const event of events) {
      const channel = `${CHANNEL_PREFIX}${event}`;
      const handler = (raw: string) => onMessage(raw);
      this.hub.on(channel, handler);
      this.handlers.push({ channel, handler });
    }
  }

  async close(): Promise<void> {
    for (const { channel, handler } of this.handlers.splice(0)) {
      this.hub.off(channel, handler);
    }
  }
}
