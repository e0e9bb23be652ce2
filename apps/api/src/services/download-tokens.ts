import { randomBytes } from "node:crypto";
import type { Database, DownloadLog } from "@saasrelay/db";
import { z } from "zod";
import { HttpError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { CacheProvider } from "../providers/cache.js";
import { findCurrentSubscription, grantsAccess } from "./subscriptions.js";

export const DOWNLOAD_TOKEN_TTL_SECONDS = 24 * 60 * 60;

const downloadTokenDataSchema = z.object({
  userId: z.string(),
  imageName: z.string(),
  tag: z.string(),
  expiresAt: z.string(),
});

export type DownloadTokenData = z.infer<typeof downloadTokenDataSchema>;

export interface IssuedDownloadToken {
  token: string;
  imageName: string;
  tag: string;
  expiresAt: string;
  downloadUrl: string;
}

export interface RegistryImage {
  id: string;
  name: string;
  tag: string;
  registryUrl: string;
}

export function downloadTokenKey(token: string): string {
  return `download_token:${token}`;
}

/**
 * Opaque download tokens kept in the cache for 24 hours, issued only to users
 * whose subscription is active or trialing.
 */
export class DownloadTokenService {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly cache: CacheProvider,
    private readonly registryUrl: string,
    logger: Logger,
    private readonly now: () => number = Date.now,
  ) {
    this.logger = logger.child({ component: "download-tokens" });
  }

  async hasAccess(userId: string): Promise<boolean> {
    return grantsAccess(await findCurrentSubscription(this.db, userId));
  }

  async issue(userId: string, imageName: string, tag: string, ipAddress: string | null): Promise<IssuedDownloadToken> {
    if (!(await this.hasAccess(userId))) {
      this.logger.warn({ userId, imageName }, "Download denied without an active subscription");
      throw new HttpError(403, "Access denied. Active subscription required.");
    }

    const token = randomBytes(32).toString("base64url");
    const expiresAt = new Date(this.now() + DOWNLOAD_TOKEN_TTL_SECONDS * 1000).toISOString();
    const data: DownloadTokenData = { userId, imageName, tag, expiresAt };
    await this.cache.setJson(downloadTokenKey(token), data, DOWNLOAD_TOKEN_TTL_SECONDS);
    await this.recordDownload(userId, imageName, tag, ipAddress);

    return { token, imageName, tag, expiresAt, downloadUrl: `${this.registryUrl}/${imageName}:${tag}` };
  }

  /** Token data, or null when the token is unknown or past its expiry. */
  async verify(token: string): Promise<DownloadTokenData | null> {
    const data = await this.cache.getJson(downloadTokenKey(token), downloadTokenDataSchema);
    if (!data) {
      return null;
    }
    if (this.now() > Date.parse(data.expiresAt)) {
      await this.cache.delete(downloadTokenKey(token));
      return null;
    }
    return data;
  }

  async listImages(userId: string): Promise<RegistryImage[]> {
    if (!(await this.hasAccess(userId))) {
      return [];
    }
    return [{ id: "1", name: "saas-app", tag: "latest", registryUrl: this.registryUrl }];
  }

  async history(userId: string, limit = 50): Promise<DownloadLog[]> {
    return this.db.getAll("download_logs", { userId }, { orderBy: "createdAt", ascending: false, limit });
  }

  private async recordDownload(userId: string, imageName: string, tag: string, ipAddress: string | null): Promise<void> {
    try {
      await this.db.create("download_logs", {
        id: this.db.newId(),
        userId,
        imageName,
        tag,
        ipAddress,
        createdAt: this.db.nowIso(),
      });
    } catch (error) {
      this.logger.error({ err: error, userId }, "Failed to log download");
    }
  }
}
