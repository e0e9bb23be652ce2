import type { Database } from "@saasrelay/db";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export type AnalyticsProperties = Record<string, unknown>;

export interface AnalyticsProvider {
  readonly name: string;
  trackEvent(eventName: string, userId: string | null, properties?: AnalyticsProperties): Promise<boolean>;
  identifyUser(userId: string, traits?: AnalyticsProperties): Promise<boolean>;
  trackRevenue(userId: string, amount: number, currency: string, properties?: AnalyticsProperties): Promise<boolean>;
}

/** Records events as `usage_events` rows. */
export class InternalAnalyticsProvider implements AnalyticsProvider {
  readonly name = "internal";
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "analytics-internal" });
  }

  async trackEvent(eventName: string, userId: string | null, properties: AnalyticsProperties = {}): Promise<boolean> {
    try {
      await this.db.create("usage_events", {
        id: this.db.newId(),
        userId,
        eventType: eventName,
        metadata: properties,
        createdAt: this.db.nowIso(),
      });
      return true;
    } catch (error) {
      this.logger.error({ err: error, eventName }, "Failed to record usage event");
      return false;
    }
  }

  async identifyUser(userId: string, traits: AnalyticsProperties = {}): Promise<boolean> {
    return this.trackEvent("user_identified", userId, traits);
  }

  async trackRevenue(userId: string, amount: number, currency: string, properties: AnalyticsProperties = {}): Promise<boolean> {
    return this.trackEvent("revenue", userId, { ...properties, amount, currency });
  }
}

export class ConsoleAnalyticsProvider implements AnalyticsProvider {
  readonly name = "console";
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "analytics-console" });
  }

  async trackEvent(eventName: string, userId: string | null, properties: AnalyticsProperties = {}): Promise<boolean> {
    this.logger.info({ eventName, userId, properties }, "Analytics event");
    return true;
  }

  async identifyUser(userId: string, traits: AnalyticsProperties = {}): Promise<boolean> {
    this.logger.info({ userId, traits }, "Analytics identify");
    return true;
  }

  async trackRevenue(userId: string, amount: number, currency: string, properties: AnalyticsProperties = {}): Promise<boolean> {
    this.logger.info({ userId, amount, currency, properties }, "Analytics revenue");
    return true;
  }
}

/** Fans out to every configured provider; true only when all of them succeed. */
export class CompositeAnalyticsProvider implements AnalyticsProvider {
  readonly name: string;

  constructor(
    readonly providers: AnalyticsProvider[],
    private readonly logger: Logger,
  ) {
    this.name = providers.map((provider) => provider.name).join(",");
  }

  private async all(operation: string, call: (provider: AnalyticsProvider) => Promise<boolean>): Promise<boolean> {
    const results = await Promise.allSettled(this.providers.map(call));
    let succeeded = true;
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.error({ provider: this.providers[index].name, operation, error: errorMessage(result.reason) }, "Analytics provider failed");
        succeeded = false;
      } else if (!result.value) {
        succeeded = false;
      }
    });
    return succeeded;
  }

  async trackEvent(eventName: string, userId: string | null, properties?: AnalyticsProperties): Promise<boolean> {
    return this.all("trackEvent", (provider) => provider.trackEvent(eventName, userId, properties));
  }

  async identifyUser(userId: string, traits?: AnalyticsProperties): Promise<boolean> {
    return this.all("identifyUser", (provider) => provider.identifyUser(userId, traits));
  }

  async trackRevenue(userId: string, amount: number, currency: string, properties?: AnalyticsProperties): Promise<boolean> {
    return this.all("trackRevenue", (provider) => provider.trackRevenue(userId, amount, currency, properties));
  }
}

export function createAnalyticsProvider(names: string[], db: Database, logger: Logger): CompositeAnalyticsProvider {
  const providers = names.map((name): AnalyticsProvider => {
    switch (name) {
      case "internal":
        return new InternalAnalyticsProvider(db, logger);
      case "console":
        return new ConsoleAnalyticsProvider(logger);
      default:
        throw new Error(`Unknown analytics provider: ${name}`);
    }
  });
  return new CompositeAnalyticsProvider(providers, logger.child({ component: "analytics" }));
}
