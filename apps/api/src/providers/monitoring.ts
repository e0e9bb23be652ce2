import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export type Severity = "debug" | "info" | "warning" | "error" | "fatal";

export interface MonitoringContext {
  userId?: string;
  requestId?: string;
  path?: string;
  extra?: Record<string, unknown>;
}

export interface MonitoringUser {
  id: string;
  email?: string;
}

export interface MonitoringProvider {
  readonly name: string;
  captureException(error: unknown, context?: MonitoringContext): Promise<void>;
  captureMessage(message: string, severity?: Severity, context?: MonitoringContext): Promise<void>;
  setUserContext(user: MonitoringUser | null): Promise<void>;
}

export class ConsoleMonitoringProvider implements MonitoringProvider {
  readonly name = "console";
  readonly captured: Array<{ message: string; severity: Severity; context: MonitoringContext }> = [];
  private readonly logger: Logger;
  private user: MonitoringUser | null = null;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "monitoring" });
  }

  async captureException(error: unknown, context: MonitoringContext = {}): Promise<void> {
    this.captured.push({ message: errorMessage(error), severity: "error", context });
    this.logger.error({ err: error, ...context, user: this.user?.id }, "Exception captured");
  }

  async captureMessage(message: string, severity: Severity = "info", context: MonitoringContext = {}): Promise<void> {
    this.captured.push({ message, severity, context });
    const level = severity === "warning" ? "warn" : severity;
    this.logger[level]({ ...context, user: this.user?.id }, message);
  }

  async setUserContext(user: MonitoringUser | null): Promise<void> {
    this.user = user;
  }
}

export class CompositeMonitoringProvider implements MonitoringProvider {
  readonly name: string;

  constructor(
    readonly providers: MonitoringProvider[],
    private readonly logger: Logger,
  ) {
    this.name = providers.map((provider) => provider.name).join(",");
  }

  private async all(call: (provider: MonitoringProvider) => Promise<void>): Promise<void> {
    const results = await Promise.allSettled(this.providers.map(call));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.error({ provider: this.providers[index].name, error: errorMessage(result.reason) }, "Monitoring provider failed");
      }
    });
  }

  async captureException(error: unknown, context?: MonitoringContext): Promise<void> {
    await this.all((provider) => provider.captureException(error, context));
  }

  async captureMessage(message: string, severity?: Severity, context?: MonitoringContext): Promise<void> {
    await this.all((provider) => provider.captureMessage(message, severity, context));
  }

  async setUserContext(user: MonitoringUser | null): Promise<void> {
    await this.all((provider) => provider.setUserContext(user));
  }
}

export function createMonitoringProvider(names: string[], logger: Logger): CompositeMonitoringProvider {
  const providers = names.map((name): MonitoringProvider => {
    switch (name) {
      case "console":
        return new ConsoleMonitoringProvider(logger);
      default:
        throw new Error(`Unknown monitoring provider: ${name}`);
    }
  });
  return new CompositeMonitoringProvider(providers, logger.child({ component: "monitoring" }));
}
