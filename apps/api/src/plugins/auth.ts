import { loginSchema, registerSchema, twoFactorLoginSchema, updateProfileSchema } from "@saasrelay/shared";
import { hashPassword, requireUser, toPublicProfile, verifyPassword } from "../auth.js";
import { HttpError } from "../errors.js";
import type { PluginContext, Plugin } from "./types.js";

const PENDING_2FA_TTL_SECONDS = 300;
const ATTEMPT_LIMIT = 10;
const ATTEMPT_WINDOW_SECONDS = 60;

export function pending2faKey(userId: string): string {
  return `pending_2fa:${userId}`;
}

async function checkAttempts(context: PluginContext, identifier: string, message: string): Promise<void> {
  const info = await context.rateLimiter.checkRateLimit(identifier, ATTEMPT_LIMIT, ATTEMPT_WINDOW_SECONDS);
  if (!info.allowed) {
    throw new HttpError(429, message, { "Retry-After": String(info.retryAfter ?? ATTEMPT_WINDOW_SECONDS) });
  }
}

export const authPlugin: Plugin = {
  name: "auth",
  version: "1.0.0",
  prefix: "/api/auth",

  async routes(app, context) {
    const { db, tokens, bus, cache, authenticate } = context;
    const twoFactor = context.services.twoFactor;

    app.post("/register", async (request, reply) => {
      const parsed = registerSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const email = parsed.data.email.toLowerCase();
      await checkAttempts(context, `register:${email}`, "Too many registration attempts");

      if (await db.findOne("profiles", { email })) {
        throw new HttpError(409, "Email already registered");
      }

      const passwordHash = await hashPassword(parsed.data.password);
      const profile = await db.createUnique(
        "profiles",
        {
          id: db.newId(),
          email,
          fullName: parsed.data.fullName,
          passwordHash,
          phone: null,
          isAdmin: false,
          stripeCustomerId: null,
          twoFactorEnabled: false,
          twoFactorSecret: null,
          twoFactorMethod: null,
          backupCodes: [],
          twoFactorEnabledAt: null,
          createdAt: db.nowIso(),
          updatedAt: null,
        },
        { email },
      );
      if (!profile) {
        throw new HttpError(409, "Email already registered");
      }

      await bus.publish("user.registered", { userId: profile.id, email: profile.email, fullName: profile.fullName });

      return reply.status(201).send({
        accessToken: await tokens.issue(profile),
        tokenType: "bearer",
        user: toPublicProfile(profile),
      });
    });

    app.post("/login", async (request, reply) => {
      const parsed = loginSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const email = parsed.data.email.toLowerCase();
      await checkAttempts(context, `login:${email}`, "Too many login attempts");

      const profile = await db.findOne("profiles", { email });
      if (!profile || !(await verifyPassword(parsed.data.password, profile.passwordHash))) {
        throw new HttpError(401, "Invalid email or password");
      }

      if (profile.twoFactorEnabled) {
        await cache.setJson(pending2faKey(profile.id), { email: profile.email }, PENDING_2FA_TTL_SECONDS);
        return reply
          .status(403)
          .header("X-Requires-2FA", "true")
          .header("X-User-ID", profile.id)
          .send({ error: "2FA verification required" });
      }

      await bus.publish("user.logged_in", { userId: profile.id, email: profile.email });
      return reply.send({
        accessToken: await tokens.issue(profile),
        tokenType: "bearer",
        user: toPublicProfile(profile),
      });
    });

    app.post("/2fa-login", async (request, reply) => {
      const parsed = twoFactorLoginSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const { userId, code } = parsed.data;
      if (!(await cache.exists(pending2faKey(userId)))) {
        throw new HttpError(401, "No pending 2FA login");
      }

      const valid = /^\d{6}$/.test(code)
        ? await twoFactor.verifyTotp(userId, code, request.ip)
        : await twoFactor.verifyBackupCode(userId, code, request.ip);
      if (!valid) {
        throw new HttpError(401, "Invalid 2FA code");
      }

      const profile = await db.getById("profiles", userId);
      if (!profile) {
        throw new HttpError(401, "User not found");
      }

      await cache.delete(pending2faKey(userId));
      await bus.publish("user.logged_in", { userId: profile.id, email: profile.email, method: "2fa" });
      return reply.send({
        accessToken: await tokens.issue(profile),
        tokenType: "bearer",
        user: toPublicProfile(profile),
      });
    });

    app.post("/logout", { preHandler: authenticate }, async (request) => {
      const user = requireUser(request);
      await bus.publish("user.logged_out", { userId: user.id });
      return { message: "Logged out successfully" };
    });

    app.get("/me", { preHandler: authenticate }, async (request) => toPublicProfile(requireUser(request)));

    app.put("/me", { preHandler: authenticate }, async (request, reply) => {
      const parsed = updateProfileSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const user = requireUser(request);
      if (parsed.data.fullName === undefined) {
        return reply.send(toPublicProfile(user));
      }

      const updated = await db.updateById("profiles", user.id, {
        fullName: parsed.data.fullName,
        updatedAt: db.nowIso(),
      });
      return reply.send(toPublicProfile(updated ?? user));
    });

    app.get("/verify-token", { preHandler: authenticate }, async (request) => ({
      valid: true,
      user: toPublicProfile(requireUser(request)),
    }));
  },
};
