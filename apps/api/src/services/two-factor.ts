import { randomBytes } from "node:crypto";
import QRCode from "qrcode";
import speakeasy from "speakeasy";
import type { Database } from "@saasrelay/db";
import { hashBackupCode, type TwoFactorStatus, type TwoFactorVerificationMethod } from "@saasrelay/shared";
import { z } from "zod";
import type { Logger } from "../logger.js";
import type { CacheProvider } from "../providers/cache.js";

export const TOTP_ISSUER = "SaaS Platform";
export const BACKUP_CODE_COUNT = 8;
const SETUP_TTL_SECONDS = 900;
const TOTP_STEP_SECONDS = 30;
const TOTP_WINDOW = 1;

export interface TwoFactorSetup {
  secret: string;
  provisioningUri: string;
  qrCodeUrl: string;
  backupCodes: string[];
}

const pendingSetupSchema = z.object({
  secret: z.string(),
  backupCodes: z.array(z.string()),
  createdAt: z.string(),
});

type PendingSetup = z.infer<typeof pendingSetupSchema>;

export class TwoFactorError extends Error {}

export function setupCacheKey(userId: string): string {
  return `2fa_setup:${userId}`;
}

export function generateBackupCodes(count = BACKUP_CODE_COUNT): string[] {
  return Array.from({ length: count }, () =>
    [0, 1, 2].map(() => randomBytes(2).toString("hex").toUpperCase()).join("-"),
  );
}

export function verifyTotpCode(secret: string, code: string): boolean {
  return speakeasy.totp.verify({
    secret,
    encoding: "base32",
    token: code,
    step: TOTP_STEP_SECONDS,
    window: TOTP_WINDOW,
  });
}

export class TwoFactorService {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly cache: CacheProvider,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "two-factor" });
  }

  async setup(userId: string, email: string): Promise<TwoFactorSetup> {
    const secret = speakeasy.generateSecret({ length: 20 }).base32;
    const provisioningUri = speakeasy.otpauthURL({
      secret,
      encoding: "base32",
      label: `${TOTP_ISSUER}:${email}`,
      issuer: TOTP_ISSUER,
    });
    const qrCodeUrl = await QRCode.toDataURL(provisioningUri);
    const backupCodes = generateBackupCodes();

    const pending: PendingSetup = { secret, backupCodes, createdAt: this.db.nowIso() };
    await this.cache.setJson(setupCacheKey(userId), pending, SETUP_TTL_SECONDS);

    return { secret, provisioningUri, qrCodeUrl, backupCodes };
  }

  async enable(userId: string, code: string): Promise<void> {
    const pending = await this.cache.getJson(setupCacheKey(userId), pendingSetupSchema);
    if (!pending) {
      throw new TwoFactorError("No 2FA setup in progress");
    }
    if (!verifyTotpCode(pending.secret, code)) {
      throw new TwoFactorError("Invalid verification code");
    }

    await this.db.updateById("profiles", userId, {
      twoFactorEnabled: true,
      twoFactorSecret: pending.secret,
      twoFactorMethod: "totp",
      backupCodes: pending.backupCodes.map(hashBackupCode),
      twoFactorEnabledAt: this.db.nowIso(),
      updatedAt: this.db.nowIso(),
    });
    await this.cache.delete(setupCacheKey(userId));
    this.logger.info({ userId }, "2FA enabled");
  }

  async verifyTotp(userId: string, code: string, ipAddress: string | null = null): Promise<boolean> {
    const profile = await this.db.getById("profiles", userId);
    if (!profile || !profile.twoFactorEnabled || !profile.twoFactorSecret) {
      return false;
    }

    const valid = verifyTotpCode(profile.twoFactorSecret, code);
    await this.logVerification(userId, "totp", valid, ipAddress);
    return valid;
  }

  /** A matching backup code is consumed and cannot be used again. */
  async verifyBackupCode(userId: string, backupCode: string, ipAddress: string | null = null): Promise<boolean> {
    const profile = await this.db.getById("profiles", userId);
    if (!profile || !profile.twoFactorEnabled) {
      return false;
    }

    const hash = hashBackupCode(backupCode);
    if (!profile.backupCodes.includes(hash)) {
      await this.logVerification(userId, "backup_code", false, ipAddress);
      return false;
    }

    const remaining = profile.backupCodes.filter((candidate) => candidate !== hash);
    await this.db.updateById("profiles", userId, { backupCodes: remaining, updatedAt: this.db.nowIso() });
    await this.logVerification(userId, "backup_code", true, ipAddress);
    this.logger.info({ userId, remaining: remaining.length }, "Backup code used");
    return true;
  }

  async disable(userId: string): Promise<void> {
    await this.db.updateById("profiles", userId, {
      twoFactorEnabled: false,
      twoFactorSecret: null,
      twoFactorMethod: null,
      backupCodes: [],
      twoFactorEnabledAt: null,
      updatedAt: this.db.nowIso(),
    });
    this.logger.info({ userId }, "2FA disabled");
  }

  async status(userId: string): Promise<TwoFactorStatus> {
    const profile = await this.db.getById("profiles", userId);
    return {
      enabled: profile?.twoFactorEnabled ?? false,
      method: profile?.twoFactorMethod ?? null,
      backupCodesRemaining: profile?.backupCodes.length ?? 0,
    };
  }

  private async logVerification(
    userId: string,
    method: TwoFactorVerificationMethod,
    success: boolean,
    ipAddress: string | null,
  ): Promise<void> {
    try {
      await this.db.create("two_factor_logs", {
        id: this.db.newId(),
        userId,
        method,
        success,
        ipAddress,
        createdAt: this.db.nowIso(),
      });
    } catch (error) {
      this.logger.error({ err: error, userId }, "Failed to log 2FA verification");
    }
  }
}
