import cors from "@fastify/cors";
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import { JsonDatabase, SupabaseDatabase, type Database } from "@saasrelay/db";
import { createAuthenticate, requireAdmin, TokenService } from "./auth.js";
import { BackgroundTasks } from "./background-tasks.js";
import { loadConfig, type AppConfig } from "./config.js";
import { HttpError, statusCodeOf } from "./errors.js";
import { EventBus, RedisEventTransport, type EventTransport } from "./event-bus.js";
import { createLogger, type Logger } from "./logger.js";
import { builtinPlugins, PluginRegistry, type Plugin, type PluginContext } from "./plugins/index.js";
import { createAnalyticsProvider, type AnalyticsProvider } from "./providers/analytics.js";
import type { CacheProvider } from "./providers/cache.js";
import { createCacheProvider } from "./providers/cache-factory.js";
import { createEmailProvider, type EmailProvider } from "./providers/email.js";
import {
  createPushProvider,
  createSmsProvider,
  type PushNotificationProvider,
  type SmsProvider,
} from "./providers/messaging.js";
import { createMonitoringProvider, type MonitoringProvider } from "./providers/monitoring.js";
import type { PaymentProvider } from "./providers/payment.js";
import { createPaymentProvider } from "./providers/payment-factory.js";
import { createRateLimitProvider, type RateLimitProvider } from "./providers/rate-limit.js";
import { createStorageProvider, type StorageProvider } from "./providers/storage.js";
import { createRateLimitHook } from "./rate-limit-hook.js";
import { DownloadTokenService } from "./services/download-tokens.js";
import { SubscriptionService } from "./services/subscriptions.js";
import { TwoFactorService } from "./services/two-factor.js";
import { WebhookProcessor } from "./webhooks/processor.js";

declare module "fastify" {
  interface FastifyInstance {
    platform: PluginContext;
    pluginRegistry: PluginRegistry;
  }
}

export interface CreateAppOptions {
  config?: Readonly<AppConfig>;
  /** `false` builds a silent logger. */
  logger?: boolean;
  db?: Database;
  cache?: CacheProvider;
  rateLimiter?: RateLimitProvider;
  payments?: PaymentProvider;
  email?: EmailProvider;
  sms?: SmsProvider;
  push?: PushNotificationProvider;
  storage?: StorageProvider;
  analytics?: AnalyticsProvider;
  monitoring?: MonitoringProvider;
  eventTransport?: EventTransport | null;
  plugins?: Plugin[];
}

async function createDatabase(database: AppConfig["database"]): Promise<Database> {
  switch (database.provider) {
    case "json": {
      const db = new JsonDatabase(database.filePath);
      await db.init();
      return db;
    }
    case "supabase":
      if (!database.supabaseUrl || !database.supabaseServiceKey) {
        throw new Error("SUPABASE_URL and SUPABASE_SERVICE_KEY are required for the supabase database provider");
      }
      return new SupabaseDatabase({ url: database.supabaseUrl, serviceKey: database.supabaseServiceKey });
    default:
      throw new Error(`Unknown database provider: ${String(database.provider)}`);
  }
}

function createEventTransport(config: Readonly<AppConfig>, logger: Logger): EventTransport | null {
  return config.eventBus.transport === "redis" ? new RedisEventTransport(config.cache.redisUrl, logger) : null;
}

export async function createApp(options: CreateAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  const logger = createLogger(config.logging, options.logger ?? true);
  const baseLogger: FastifyBaseLogger = logger;

  const db = options.db ?? (await createDatabase(config.database));
  const cache = options.cache ?? createCacheProvider(config.cache.provider, config.cache, logger);
  const rateLimiter = options.rateLimiter ?? createRateLimitProvider(config, cache, logger);
  const payments = options.payments ?? createPaymentProvider(config.payment, logger);
  const monitoring = options.monitoring ?? createMonitoringProvider(config.monitoringProviders, logger);
  const bus = new EventBus(
    logger,
    options.eventTransport === undefined ? createEventTransport(config, logger) : options.eventTransport,
  );
  const tasks = new BackgroundTasks(logger.child({ component: "background-tasks" }));
  const tokens = new TokenService(config.jwt.secret, config.jwt.expirationMinutes);
  const authenticate = createAuthenticate(db, tokens);

  const context: PluginContext = {
    config,
    logger,
    db,
    cache,
    rateLimiter,
    bus,
    tasks,
    payments,
    email: options.email ?? createEmailProvider(config.email, logger),
    sms: options.sms ?? createSmsProvider(config.sms, logger),
    push: options.push ?? createPushProvider(config.push, logger),
    storage: options.storage ?? createStorageProvider(config.storage),
    analytics: options.analytics ?? createAnalyticsProvider(config.analyticsProviders, db, logger),
    monitoring,
    tokens,
    authenticate,
    services: {
      twoFactor: new TwoFactorService(db, cache, logger),
      subscriptions: new SubscriptionService(db, payments, logger),
      downloads: new DownloadTokenService(db, cache, config.dockerRegistryUrl, logger),
      webhooks: new WebhookProcessor(db, monitoring, logger),
    },
  };

  const app = Fastify({ logger: baseLogger });
  await app.register(cors, { origin: config.corsOrigins, credentials: true });

  app.decorateRequest("user", null);
  app.decorate("platform", context);

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof HttpError) {
      return reply.status(error.statusCode).headers(error.headers).send({ error: error.message });
    }

    const statusCode = statusCodeOf(error);
    if (statusCode !== null && statusCode < 500) {
      return reply.status(statusCode).send({ error: error.message });
    }

    request.log.error({ err: error }, "Unhandled request error");
    await monitoring.captureException(error, { requestId: request.id, path: request.url, userId: request.user?.id });
    return reply.status(500).send({ error: "Internal server error" });
  });

  app.addHook(
    "onRequest",
    createRateLimitHook({
      limiter: rateLimiter,
      tokens,
      defaultLimit: config.rateLimit.defaultLimit,
      defaultWindowSeconds: config.rateLimit.defaultWindowSeconds,
    }),
  );

  app.get("/health", async () => ({ status: "healthy", environment: config.environment }));

  app.get("/", async () => ({ message: `${config.appName} API`, version: config.version }));

  const registry = new PluginRegistry(options.plugins ?? builtinPlugins(), context, logger);
  await registry.load(app, config.enabledPlugins);
  app.decorate("pluginRegistry", registry);

  app.get("/api/plugins", { preHandler: [authenticate, requireAdmin] }, async () => ({ plugins: registry.list() }));

  await bus.start();

  app.addHook("onClose", async () => {
    await tasks.drain();
    await registry.shutdownAll();
    await bus.close();
    await rateLimiter.close();
    await cache.close();
  });

  return app;
}
