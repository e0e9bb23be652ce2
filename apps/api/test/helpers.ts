import { randomUUID } from "node:crypto";
import os from "node:os";
import path from "node:path";
import type { FastifyInstance } from "fastify";
import { expect } from "vitest";
import { createApp, type CreateAppOptions } from "../src/app.js";
import { loadConfig, type AppConfig } from "../src/config.js";
import { createLogger } from "../src/logger.js";
import { ConsoleEmailProvider } from "../src/providers/email.js";
import { ConsolePushProvider, ConsoleSmsProvider } from "../src/providers/messaging.js";
import { MockPaymentProvider } from "../src/providers/mock-payment.js";
import { ConsoleMonitoringProvider } from "../src/providers/monitoring.js";

export const WEBHOOK_SECRET = "test-webhook-secret";

export interface TestApp {
  app: FastifyInstance;
  config: Readonly<AppConfig>;
  payments: MockPaymentProvider;
  email: ConsoleEmailProvider;
  sms: ConsoleSmsProvider;
  push: ConsolePushProvider;
  monitoring: ConsoleMonitoringProvider;
}

export function testConfig(env: Record<string, string> = {}): Readonly<AppConfig> {
  return loadConfig({
    DB_FILE: path.join(os.tmpdir(), `saasrelay-test-${randomUUID()}.json`),
    STORAGE_PROVIDER: "memory",
    JWT_SECRET: "test-secret",
    MOCK_PAYMENT_WEBHOOK_SECRET: WEBHOOK_SECRET,
    LOG_LEVEL: "silent",
    ...env,
  });
}

export const silentLogger = createLogger({ provider: "console", level: "silent", filePath: "" }, false);

export async function buildTestApp(
  env: Record<string, string> = {},
  overrides: Partial<CreateAppOptions> = {},
): Promise<TestApp> {
  const config = testConfig(env);
  const payments = new MockPaymentProvider(config.payment.mockWebhookSecret);
  const email = new ConsoleEmailProvider(config.email.from, silentLogger);
  const sms = new ConsoleSmsProvider(silentLogger);
  const push = new ConsolePushProvider(silentLogger);
  const monitoring = new ConsoleMonitoringProvider(silentLogger);

  const app = await createApp({ config, logger: false, payments, email, sms, push, monitoring, ...overrides });
  return { app, config, payments, email, sms, push, monitoring };
}

export function authHeader(token: string) {
  return { authorization: `Bearer ${token}` };
}

export interface RegisteredUser {
  token: string;
  user: { id: string; email: string; fullName: string; isAdmin: boolean; twoFactorEnabled: boolean };
}

export async function registerUser(
  app: FastifyInstance,
  email = "ada@example.test",
  password = "correct-horse",
  fullName = "Ada Lovelace",
): Promise<RegisteredUser> {
  const response = await app.inject({
    method: "POST",
    url: "/api/auth/register",
    payload: { email, password, fullName },
  });

  expect(response.statusCode).toBe(201);
  const body = response.json() as { accessToken: string; user: RegisteredUser["user"] };
  return { token: body.accessToken, user: body.user };
}

/** Gives the user a subscription row with the given status. */
export async function grantSubscription(app: FastifyInstance, userId: string, status = "active"): Promise<void> {
  const db = app.platform.db;
  await db.create("subscriptions", {
    id: db.newId(),
    userId,
    stripeCustomerId: "cus_test",
    stripeSubscriptionId: `sub_${randomUUID()}`,
    status,
    currentPeriodStart: "2026-01-01T00:00:00.000Z",
    currentPeriodEnd: "2026-02-01T00:00:00.000Z",
    cancelAtPeriodEnd: false,
    createdAt: db.nowIso(),
    updatedAt: null,
  });
}
