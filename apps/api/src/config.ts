import path from "node:path";
import { z } from "zod";

export const pluginNames = [
  "auth",
  "two_factor",
  "webhooks",
  "subscriptions",
  "docker_registry",
  "storage",
  "analytics",
  "notifications",
] as const;

export type PluginName = (typeof pluginNames)[number];

function commaList(defaultValue: string) {
  return z
    .string()
    .default(defaultValue)
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );
}

const envSchema = z.object({
  ENVIRONMENT: z.string().default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  APP_NAME: z.string().default("SaaS Platform"),
  APP_VERSION: z.string().default("1.0.0"),
  FRONTEND_URL: z.string().url().default("http://localhost:3000"),
  CORS_ORIGINS: commaList("http://localhost:3000,http://localhost:8000"),

  LOGGING_PROVIDER: z.enum(["console", "json", "file"]).default("console"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FILE_PATH: z.string().default("logs/app.log"),

  DATABASE_PROVIDER: z.enum(["json", "supabase"]).default("json"),
  DB_FILE: z.string().default(path.join(process.cwd(), "data", "saasrelay-db.json")),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_KEY: z.string().optional(),

  CACHE_PROVIDER: z.enum(["memory", "redis", "upstash"]).default("memory"),
  RATE_LIMIT_PROVIDER: z.enum(["memory", "redis", "upstash"]).default("memory"),
  RATE_LIMIT_DEFAULT_LIMIT: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_DEFAULT_WINDOW: z.coerce.number().int().positive().default(60),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  UPSTASH_REDIS_REST_URL: z.string().url().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().optional(),
  EVENT_BUS_TRANSPORT: z.enum(["local", "redis"]).default("local"),

  PAYMENT_PROVIDER: z.enum(["stripe", "mock"]).default("mock"),
  STRIPE_SECRET_KEY: z.string().optional(),
  STRIPE_WEBHOOK_SECRET: z.string().optional(),
  MOCK_PAYMENT_WEBHOOK_SECRET: z.string().default("mock-webhook-secret"),

  EMAIL_PROVIDER: z.enum(["console"]).default("console"),
  EMAIL_FROM: z.string().email().default("noreply@saasrelay.local"),
  SMS_PROVIDER: z.enum(["console"]).default("console"),
  PUSH_NOTIFICATION_PROVIDER: z.enum(["console"]).default("console"),
  STORAGE_PROVIDER: z.enum(["local", "memory"]).default("local"),
  STORAGE_LOCAL_DIR: z.string().default(path.join(process.cwd(), "data", "uploads")),
  STORAGE_PUBLIC_URL: z.string().default("http://localhost:8000/files"),
  ANALYTICS_PROVIDERS: commaList("internal"),
  MONITORING_PROVIDERS: commaList("console"),

  JWT_SECRET: z.string().min(1).default("default-secret-key-change-in-production"),
  JWT_EXPIRATION_MINUTES: z.coerce.number().int().positive().default(60),

  DOCKER_REGISTRY_URL: z.string().default("registry.saasrelay.local"),
  ENABLED_PLUGINS: commaList(pluginNames.join(",")),
});

export interface AppConfig {
  environment: string;
  appName: string;
  version: string;
  frontendUrl: string;
  port: number;
  host: string;
  corsOrigins: string[];
  logging: {
    provider: "console" | "json" | "file";
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
    filePath: string;
  };
  database: {
    provider: "json" | "supabase";
    filePath: string;
    supabaseUrl: string | null;
    supabaseServiceKey: string | null;
  };
  cache: {
    provider: "memory" | "redis" | "upstash";
    redisUrl: string;
    upstashUrl: string | null;
    upstashToken: string | null;
  };
  rateLimit: {
    provider: "memory" | "redis" | "upstash";
    defaultLimit: number;
    defaultWindowSeconds: number;
  };
  eventBus: {
    transport: "local" | "redis";
  };
  payment: {
    provider: "stripe" | "mock";
    stripeSecretKey: string | null;
    stripeWebhookSecret: string | null;
    mockWebhookSecret: string;
  };
  email: { provider: "console"; from: string };
  sms: { provider: "console" };
  push: { provider: "console" };
  storage: { provider: "local" | "memory"; localDir: string; publicUrl: string };
  analyticsProviders: string[];
  monitoringProviders: string[];
  jwt: { secret: string; expirationMinutes: number };
  dockerRegistryUrl: string;
  enabledPlugins: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${issues.join("\n")}`);
  }

  const vars = parsed.data;
  return Object.freeze({
    environment: vars.ENVIRONMENT,
    appName: vars.APP_NAME,
    version: vars.APP_VERSION,
    frontendUrl: vars.FRONTEND_URL,
    port: vars.PORT,
    host: vars.HOST,
    corsOrigins: vars.CORS_ORIGINS,
    logging: {
      provider: vars.LOGGING_PROVIDER,
      level: vars.LOG_LEVEL,
      filePath: vars.LOG_FILE_PATH,
    },
    database: {
      provider: vars.DATABASE_PROVIDER,
      filePath: vars.DB_FILE,
      supabaseUrl: vars.SUPABASE_URL ?? null,
      supabaseServiceKey: vars.SUPABASE_SERVICE_KEY ?? null,
    },
    cache: {
      provider: vars.CACHE_PROVIDER,
      redisUrl: vars.REDIS_URL,
      upstashUrl: vars.UPSTASH_REDIS_REST_URL ?? null,
      upstashToken: vars.UPSTASH_REDIS_REST_TOKEN ?? null,
    },
    rateLimit: {
      provider: vars.RATE_LIMIT_PROVIDER,
      defaultLimit: vars.RATE_LIMIT_DEFAULT_LIMIT,
      defaultWindowSeconds: vars.RATE_LIMIT_DEFAULT_WINDOW,
    },
    eventBus: {
      transport: vars.EVENT_BUS_TRANSPORT,
    },
    payment: {
      provider: vars.PAYMENT_PROVIDER,
      stripeSecretKey: vars.STRIPE_SECRET_KEY ?? null,
      stripeWebhookSecret: vars.STRIPE_WEBHOOK_SECRET ?? null,
      mockWebhookSecret: vars.MOCK_PAYMENT_WEBHOOK_SECRET,
    },
    email: { provider: vars.EMAIL_PROVIDER, from: vars.EMAIL_FROM },
    sms: { provider: vars.SMS_PROVIDER },
    push: { provider: vars.PUSH_NOTIFICATION_PROVIDER },
    storage: {
      provider: vars.STORAGE_PROVIDER,
      localDir: vars.STORAGE_LOCAL_DIR,
      publicUrl: vars.STORAGE_PUBLIC_URL,
    },
    analyticsProviders: vars.ANALYTICS_PROVIDERS,
    monitoringProviders: vars.MONITORING_PROVIDERS,
    jwt: { secret: vars.JWT_SECRET, expirationMinutes: vars.JWT_EXPIRATION_MINUTES },
    dockerRegistryUrl: vars.DOCKER_REGISTRY_URL,
    enabledPlugins: vars.ENABLED_PLUGINS,
  });
}
