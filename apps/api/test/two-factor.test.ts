import speakeasy from "speakeasy";
import { hashBackupCode } from "@saasrelay/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { generateBackupCodes, verifyTotpCode } from "../src/services/two-factor.js";
import { authHeader, buildTestApp, registerUser, type RegisteredUser, type TestApp } from "./helpers.js";

interface SetupBody {
  secret: string;
  provisioningUri: string;
  qrCodeUrl: string;
  backupCodes: string[];
}

let ctx: TestApp;
let account: RegisteredUser;

function currentCode(secret: string): string {
  return speakeasy.totp({ secret, encoding: "base32" });
}

function wrongCode(secret: string): string {
  return String((Number(currentCode(secret)) + 500000) % 1000000).padStart(6, "0");
}

async function post(url: string, payload: object = {}, token = account.token) {
  return ctx.app.inject({ method: "POST", url, headers: authHeader(token), payload });
}

async function setupAndEnable(): Promise<SetupBody> {
  const setup = await post("/api/2fa/setup");
  expect(setup.statusCode).toBe(200);
  const body = setup.json() as SetupBody;

  const enable = await post("/api/2fa/enable", { code: currentCode(body.secret) });
  expect(enable.statusCode).toBe(200);
  return body;
}

describe("two-factor helpers", () => {
  it("formats backup codes as three groups of four hex digits", () => {
    const codes = generateBackupCodes();
    expect(codes).toHaveLength(8);
    for (const code of codes) {
      expect(code).toMatch(/^[0-9A-F]{4}-[0-9A-F]{4}-[0-9A-F]{4}$/);
    }
  });

  it("accepts codes from the neighbouring time steps only", () => {
    vi.useFakeTimers({ toFake: ["Date"], now: new Date("2026-01-01T00:00:15Z") });
    const secret = speakeasy.generateSecret({ length: 20 }).base32;
    const now = Math.floor(Date.now() / 1000);
    const codeAt = (offsetSeconds: number) =>
      speakeasy.totp({ secret, encoding: "base32", time: now + offsetSeconds });

    expect(verifyTotpCode(secret, codeAt(0))).toBe(true);
    expect(verifyTotpCode(secret, codeAt(-30))).toBe(true);
    expect(verifyTotpCode(secret, codeAt(30))).toBe(true);
    expect(verifyTotpCode(secret, codeAt(-600))).toBe(false);
    vi.useRealTimers();
  });
});

describe("two-factor routes", () => {
  beforeEach(async () => {
    ctx = await buildTestApp();
    account = await registerUser(ctx.app);
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it("returns a secret, provisioning uri, qr code and eight backup codes", async () => {
    const response = await post("/api/2fa/setup");
    expect(response.statusCode).toBe(200);
    const body = response.json() as SetupBody;

    expect(body.secret).toMatch(/^[A-Z2-7]+=*$/);
    const uri = new URL(body.provisioningUri);
    expect(uri.protocol).toBe("otpauth:");
    expect(uri.searchParams.get("secret")).toBe(body.secret);
    expect(uri.searchParams.get("issuer")).toBe("SaaS Platform");
    expect(decodeURIComponent(uri.pathname)).toContain("ada@example.test");
    expect(body.qrCodeUrl.startsWith("data:image/png;base64,")).toBe(true);
    expect(body.backupCodes).toHaveLength(8);
  });

  it("requires a setup in progress before enabling", async () => {
    const response = await post("/api/2fa/enable", { code: "123456" });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: "No 2FA setup in progress" });
  });

  it("rejects an invalid code when enabling", async () => {
    const setup = (await post("/api/2fa/setup")).json() as SetupBody;
    const response = await post("/api/2fa/enable", { code: wrongCode(setup.secret) });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: "Invalid verification code" });
  });

  it("enables 2FA, stores hashed backup codes and notifies the user", async () => {
    const setup = await setupAndEnable();

    const status = await ctx.app.inject({ method: "GET", url: "/api/2fa/status", headers: authHeader(account.token) });
    expect(status.json()).toEqual({ enabled: true, method: "totp", backupCodesRemaining: 8 });

    const profile = await ctx.app.platform.db.getById("profiles", account.user.id);
    expect(profile?.twoFactorSecret).toBe(setup.secret);
    expect(profile?.backupCodes).toEqual(setup.backupCodes.map(hashBackupCode));
    expect(profile?.backupCodes).not.toContain(setup.backupCodes[0]);
    expect(await ctx.app.platform.cache.get(`2fa_setup:${account.user.id}`)).toBeNull();

    expect(ctx.email.sent.at(-1)?.subject).toBe("Two-factor authentication enabled");

    const again = await post("/api/2fa/setup");
    expect(again.statusCode).toBe(400);
    expect(again.json()).toEqual({ error: "2FA is already enabled" });
  });

  it("verifies TOTP codes and logs each attempt", async () => {
    const setup = await setupAndEnable();

    const valid = await post("/api/2fa/verify", { code: currentCode(setup.secret) });
    expect(valid.statusCode).toBe(200);
    expect(valid.json()).toEqual({ verified: true });

    const invalid = await post("/api/2fa/verify", { code: wrongCode(setup.secret) });
    expect(invalid.statusCode).toBe(401);
    expect(invalid.json()).toEqual({ error: "Invalid verification code" });

    const logs = await ctx.app.platform.db.getAll("two_factor_logs", { userId: account.user.id });
    expect(logs.map((log) => log.success).sort()).toEqual([false, true]);
    expect(logs.every((log) => log.method === "totp")).toBe(true);
  });

  it("consumes a backup code so it cannot be used twice", async () => {
    const setup = await setupAndEnable();

    const first = await post("/api/2fa/verify-backup", { backupCode: setup.backupCodes[0] });
    expect(first.statusCode).toBe(200);
    expect(first.json()).toEqual({ verified: true, backupCodesRemaining: 7 });

    const reused = await post("/api/2fa/verify-backup", { backupCode: setup.backupCodes[0] });
    expect(reused.statusCode).toBe(401);
    expect(reused.json()).toEqual({ error: "Invalid backup code" });

    const lowerCase = await post("/api/2fa/verify-backup", { backupCode: setup.backupCodes[1].toLowerCase() });
    expect(lowerCase.json()).toEqual({ verified: true, backupCodesRemaining: 6 });
  });

  it("requires a second factor at login when 2FA is on", async () => {
    const setup = await setupAndEnable();

    const login = await ctx.app.inject({
      method: "POST",
      url: "/api/auth/login",
      payload: { email: "ada@example.test", password: "correct-horse" },
    });
    expect(login.statusCode).toBe(403);
    expect(login.headers["x-requires-2fa"]).toBe("true");
    expect(login.headers["x-user-id"]).toBe(account.user.id);
    expect(login.json()).toEqual({ error: "2FA verification required" });

    const wrong = await ctx.app.inject({
      method: "POST",
      url: "/api/auth/2fa-login",
      payload: { userId: account.user.id, code: wrongCode(setup.secret) },
    });
    expect(wrong.statusCode).toBe(401);

    const completed = await ctx.app.inject({
      method: "POST",
      url: "/api/auth/2fa-login",
      payload: { userId: account.user.id, code: setup.backupCodes[2] },
    });
    expect(completed.statusCode).toBe(200);
    const body = completed.json() as { accessToken: string; tokenType: string };
    expect(body.tokenType).toBe("bearer");

    const me = await ctx.app.inject({ method: "GET", url: "/api/auth/me", headers: authHeader(body.accessToken) });
    expect(me.statusCode).toBe(200);

    const replay = await ctx.app.inject({
      method: "POST",
      url: "/api/auth/2fa-login",
      payload: { userId: account.user.id, code: currentCode(setup.secret) },
    });
    expect(replay.statusCode).toBe(401);
    expect(replay.json()).toEqual({ error: "No pending 2FA login" });
  });

  it("disables 2FA only with the account password", async () => {
    await setupAndEnable();

    const wrong = await post("/api/2fa/disable", { password: "not-my-password" });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json()).toEqual({ error: "Invalid password" });

    const disabled = await post("/api/2fa/disable", { password: "correct-horse" });
    expect(disabled.statusCode).toBe(200);

    const status = await ctx.app.inject({ method: "GET", url: "/api/2fa/status", headers: authHeader(account.token) });
    expect(status.json()).toEqual({ enabled: false, method: null, backupCodesRemaining: 0 });
  });
});
