import { SignJWT } from "jose";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TokenService, hashPassword, verifyPassword } from "../src/auth.js";
import { authHeader, buildTestApp, registerUser, type TestApp } from "./helpers.js";

let ctx: TestApp;

describe("TokenService", () => {
  const tokens = new TokenService("test-secret", 60);

  it("issues tokens that verify back to the profile id and email", async () => {
    const token = await tokens.issue({ id: "user-1", email: "ada@example.test" });
    expect(await tokens.verify(token)).toEqual({ sub: "user-1", email: "ada@example.test" });
  });

  it("rejects tokens signed with another secret", async () => {
    const forged = await new TokenService("other-secret", 60).issue({ id: "user-1", email: "ada@example.test" });
    expect(await tokens.verify(forged)).toBeNull();
  });

  it("rejects expired tokens", async () => {
    const expired = await new SignJWT({ email: "ada@example.test" })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject("user-1")
      .setIssuedAt(Math.floor(Date.now() / 1000) - 7200)
      .setExpirationTime(Math.floor(Date.now() / 1000) - 3600)
      .sign(new TextEncoder().encode("test-secret"));

    expect(await tokens.verify(expired)).toBeNull();
  });

  it("rejects malformed tokens", async () => {
    expect(await tokens.verify("not-a-jwt")).toBeNull();
  });

  it("hashes passwords with bcrypt", async () => {
    const hash = await hashPassword("correct-horse");
    expect(hash.startsWith("$2")).toBe(true);
    expect(await verifyPassword("correct-horse", hash)).toBe(true);
    expect(await verifyPassword("wrong-horse", hash)).toBe(false);
  });
});

describe("auth routes", () => {
  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it("registers a user and returns a bearer token without the password hash", async () => {
    const response = await ctx.app.inject({
      method: "POST",
      url: "/api/auth/register",
      payload: { email: "Ada@Example.test", password: "correct-horse", fullName: "Ada Lovelace" },
    });

    expect(response.statusCode).toBe(201);
    const body = response.json() as { accessToken: string; tokenType: string; user: Record<string, unknown> };
    expect(body.tokenType).toBe("bearer");
    expect(body.user).toMatchObject({ email: "ada@example.test", fullName: "Ada Lovelace", isAdmin: false, twoFactorEnabled: false });
    expect(body.user).not.toHaveProperty("passwordHash");

    const events = await ctx.app.platform.db.getAll("usage_events", { userId: String(body.user.id) });
    expect(events.map((event) => event.eventType).sort()).toEqual(["user.registered", "user_identified"]);
    expect(ctx.email.sent.map((message) => message.to)).toEqual([["ada@example.test"]]);
  });

  it("refuses a second account for the same email", async () => {
    await registerUser(ctx.app);
    const response = await ctx.app.inject({
      method: "POST",
      url: "/api/auth/register",
      payload: { email: "ada@example.test", password: "another-pass", fullName: "Someone Else" },
    });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({ error: "Email already registered" });
  });

  it("creates one account when the same email registers twice at once", async () => {
    const register = () =>
      ctx.app.inject({
        method: "POST",
        url: "/api/auth/register",
        payload: { email: "ada@example.test", password: "correct-horse", fullName: "Ada Lovelace" },
      });

    const responses = await Promise.all([register(), register()]);

    expect(responses.map((response) => response.statusCode).sort()).toEqual([201, 409]);
    expect(await ctx.app.platform.db.getAll("profiles", { email: "ada@example.test" })).toHaveLength(1);
  });

  it("validates the registration body", async () => {
    const response = await ctx.app.inject({
      method: "POST",
      url: "/api/auth/register",
      payload: { email: "not-an-email", password: "short", fullName: "" },
    });

    expect(response.statusCode).toBe(400);
    const body = response.json() as { error: { fieldErrors: Record<string, string[]> } };
    expect(Object.keys(body.error.fieldErrors).sort()).toEqual(["email", "fullName", "password"]);
  });

  it("logs in with the right password only", async () => {
    await registerUser(ctx.app);

    const ok = await ctx.app.inject({
      method: "POST",
      url: "/api/auth/login",
      payload: { email: "ada@example.test", password: "correct-horse" },
    });
    expect(ok.statusCode).toBe(200);
    const body = ok.json() as { accessToken: string };
    const me = await ctx.app.inject({ method: "GET", url: "/api/auth/me", headers: authHeader(body.accessToken) });
    expect(me.json()).toMatchObject({ email: "ada@example.test" });

    const wrong = await ctx.app.inject({
      method: "POST",
      url: "/api/auth/login",
      payload: { email: "ada@example.test", password: "wrong-horse" },
    });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json()).toEqual({ error: "Invalid email or password" });
  });

  it("rejects requests without a usable token", async () => {
    const missing = await ctx.app.inject({ method: "GET", url: "/api/auth/me" });
    expect(missing.statusCode).toBe(401);
    expect(missing.headers["www-authenticate"]).toBe("Bearer");
    expect(missing.json()).toEqual({ error: "Not authenticated" });

    const garbage = await ctx.app.inject({ method: "GET", url: "/api/auth/me", headers: authHeader("garbage") });
    expect(garbage.statusCode).toBe(401);
    expect(garbage.json()).toEqual({ error: "Could not validate credentials" });
  });

  it("rejects a valid token whose user no longer exists", async () => {
    const { token, user } = await registerUser(ctx.app);
    await ctx.app.platform.db.deleteById("profiles", user.id);

    const response = await ctx.app.inject({ method: "GET", url: "/api/auth/me", headers: authHeader(token) });
    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: "User not found" });
  });

  it("updates the profile name and verifies tokens", async () => {
    const { token, user } = await registerUser(ctx.app);

    const updated = await ctx.app.inject({
      method: "PUT",
      url: "/api/auth/me",
      headers: authHeader(token),
      payload: { fullName: "Augusta Ada King" },
    });
    expect(updated.statusCode).toBe(200);
    expect(updated.json()).toMatchObject({ id: user.id, fullName: "Augusta Ada King" });

    const verified = await ctx.app.inject({ method: "GET", url: "/api/auth/verify-token", headers: authHeader(token) });
    expect(verified.json()).toMatchObject({ valid: true, user: { id: user.id, fullName: "Augusta Ada King" } });
  });

  it("publishes a logout event", async () => {
    const { token, user } = await registerUser(ctx.app);
    const received: unknown[] = [];
    ctx.app.platform.bus.subscribe("user.logged_out", (data) => {
      received.push(data);
    });

    const response = await ctx.app.inject({ method: "POST", url: "/api/auth/logout", headers: authHeader(token) });
    expect(response.json()).toEqual({ message: "Logged out successfully" });
    expect(received).toEqual([{ userId: user.id }]);
  });
});

describe("app surface", () => {
  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it("serves health and root", async () => {
    const health = await ctx.app.inject({ method: "GET", url: "/health" });
    expect(health.json()).toEqual({ status: "healthy", environment: "development" });

    const root = await ctx.app.inject({ method: "GET", url: "/" });
    expect(root.json()).toEqual({ message: "SaaS Platform API", version: "1.0.0" });
  });

  it("lists plugins for admins only", async () => {
    const { token, user } = await registerUser(ctx.app);

    const denied = await ctx.app.inject({ method: "GET", url: "/api/plugins", headers: authHeader(token) });
    expect(denied.statusCode).toBe(403);
    expect(denied.json()).toEqual({ error: "Admin access required" });

    await ctx.app.platform.db.updateById("profiles", user.id, { isAdmin: true });
    const allowed = await ctx.app.inject({ method: "GET", url: "/api/plugins", headers: authHeader(token) });
    expect(allowed.statusCode).toBe(200);
    const body = allowed.json() as { plugins: Array<{ name: string; version: string; enabled: boolean }> };
    expect(body.plugins.map((plugin) => plugin.name)).toEqual([
      "auth",
      "two_factor",
      "webhooks",
      "subscriptions",
      "docker_registry",
      "storage",
      "analytics",
      "notifications",
    ]);
    expect(body.plugins.every((plugin) => plugin.enabled && plugin.version === "1.0.0")).toBe(true);
  });
});
