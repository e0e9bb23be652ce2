import bcrypt from "bcryptjs";
import type { FastifyRequest } from "fastify";
import { errors as joseErrors, jwtVerify, SignJWT } from "jose";
import type { Database, Profile } from "@saasrelay/db";
import { HttpError } from "./errors.js";

declare module "fastify" {
  interface FastifyRequest {
    user: Profile | null;
  }
}

const BCRYPT_ROUNDS = 10;

export interface TokenClaims {
  sub: string;
  email: string;
}

export interface PublicProfile {
  id: string;
  email: string;
  fullName: string;
  phone: string | null;
  isAdmin: boolean;
  twoFactorEnabled: boolean;
  createdAt: string;
}

export function toPublicProfile(profile: Profile): PublicProfile {
  return {
    id: profile.id,
    email: profile.email,
    fullName: profile.fullName,
    phone: profile.phone,
    isAdmin: profile.isAdmin,
    twoFactorEnabled: profile.twoFactorEnabled,
    createdAt: profile.createdAt,
  };
}

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_ROUNDS);
}

export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}

export class TokenService {
  private readonly key: Uint8Array;

  constructor(
    secret: string,
    private readonly expirationMinutes: number,
  ) {
    this.key = new TextEncoder().encode(secret);
  }

  async issue(profile: Pick<Profile, "id" | "email">): Promise<string> {
    return new SignJWT({ email: profile.email })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject(profile.id)
      .setIssuedAt()
      .setExpirationTime(`${this.expirationMinutes}m`)
      .sign(this.key);
  }

  /** Returns the claims, or null for a malformed, forged or expired token. */
  async verify(token: string): Promise<TokenClaims | null> {
    try {
      const { payload } = await jwtVerify(token, this.key, { algorithms: ["HS256"] });
      if (typeof payload.sub !== "string" || typeof payload.email !== "string") {
        return null;
      }
      return { sub: payload.sub, email: payload.email };
    } catch (error) {
      if (error instanceof joseErrors.JOSEError) {
        return null;
      }
      throw error;
    }
  }
}

export function bearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header || !header.startsWith("Bearer ")) {
    return null;
  }
  const token = header.slice("Bearer ".length).trim();
  return token || null;
}

export type AuthGuard = (request: FastifyRequest) => Promise<void>;

/** preHandler that loads the caller's profile onto `request.user`, or rejects with 401. */
export function createAuthenticate(db: Database, tokens: TokenService): AuthGuard {
  return async (request) => {
    const token = bearerToken(request);
    if (!token) {
      throw new HttpError(401, "Not authenticated", { "WWW-Authenticate": "Bearer" });
    }

    const claims = await tokens.verify(token);
    if (!claims) {
      throw new HttpError(401, "Could not validate credentials", { "WWW-Authenticate": "Bearer" });
    }

    const profile = await db.getById("profiles", claims.sub);
    if (!profile) {
      throw new HttpError(401, "User not found", { "WWW-Authenticate": "Bearer" });
    }

    request.user = profile;
  };
}

export function requireUser(request: FastifyRequest): Profile {
  if (!request.user) {
    throw new HttpError(401, "Not authenticated");
  }
  return request.user;
}

export const requireAdmin: AuthGuard = async (request) => {
  if (!requireUser(request).isAdmin) {
    throw new HttpError(403, "Admin access required");
  }
};
