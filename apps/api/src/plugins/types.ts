import type { FastifyInstance } from "fastify";
import type { Database } from "@saasrelay/db";
import type { AuthGuard, TokenService } from "../auth.js";
import type { BackgroundTasks } from "../background-tasks.js";
import type { AppConfig, PluginName } from "../config.js";
import type { EventBus } from "../event-bus.js";
import type { Logger } from "../logger.js";
import type { AnalyticsProvider } from "../providers/analytics.js";
import type { CacheProvider } from "../providers/cache.js";
import type { EmailProvider } from "../providers/email.js";
import type { PushNotificationProvider, SmsProvider } from "../providers/messaging.js";
import type { MonitoringProvider } from "../providers/monitoring.js";
import type { PaymentProvider } from "../providers/payment.js";
import type { RateLimitProvider } from "../providers/rate-limit.js";
import type { StorageProvider } from "../providers/storage.js";
import type { DownloadTokenService } from "../services/download-tokens.js";
import type { SubscriptionService } from "../services/subscriptions.js";
import type { TwoFactorService } from "../services/two-factor.js";
import type { WebhookProcessor } from "../webhooks/processor.js";

export interface PluginServices {
  twoFactor: TwoFactorService;
  subscriptions: SubscriptionService;
  downloads: DownloadTokenService;
  webhooks: WebhookProcessor;
}

/** Everything a plugin may use. Built once per app by `createApp`. */
export interface PluginContext {
  config: Readonly<AppConfig>;
  logger: Logger;
  db: Database;
  cache: CacheProvider;
  rateLimiter: RateLimitProvider;
  bus: EventBus;
  tasks: BackgroundTasks;
  payments: PaymentProvider;
  email: EmailProvider;
  sms: SmsProvider;
  push: PushNotificationProvider;
  storage: StorageProvider;
  analytics: AnalyticsProvider;
  monitoring: MonitoringProvider;
  tokens: TokenService;
  authenticate: AuthGuard;
  services: PluginServices;
}

export type Unsubscribe = () => void;

export interface Plugin {
  readonly name: PluginName;
  readonly version: string;
  /** Mount point for `routes`; omitted for plugins without HTTP routes. */
  readonly prefix?: string;
  routes?(app: FastifyInstance, context: PluginContext): Promise<void>;
  initialize?(context: PluginContext): Promise<void>;
  /** Subscriptions made here are undone when the plugin shuts down or reloads. */
  registerEventListeners?(bus: EventBus, context: PluginContext): Unsubscribe[];
  shutdown?(): Promise<void>;
}

export interface PluginMetadata {
  name: PluginName;
  version: string;
  enabled: boolean;
}
