import type { FastifyReply, FastifyRequest } from "fastify";
import { bearerToken, type TokenService } from "./auth.js";
import type { RateLimitProvider } from "./providers/rate-limit.js";

const AUTH_LIMIT = 10;
const AUTH_WINDOW_SECONDS = 60;

export interface RateLimitHookOptions {
  limiter: RateLimitProvider;
  tokens: TokenService;
  defaultLimit: number;
  defaultWindowSeconds: number;
}

export function shouldSkipRateLimit(path: string): boolean {
  return !path.startsWith("/api/") || path.startsWith("/api/webhooks");
}

export function limitsFor(path: string, defaults: { limit: number; windowSeconds: number }): { limit: number; windowSeconds: number } {
  if (path.startsWith("/api/auth/")) {
    return { limit: AUTH_LIMIT, windowSeconds: AUTH_WINDOW_SECONDS };
  }
  return defaults;
}

async function identify(request: FastifyRequest, tokens: TokenService): Promise<string> {
  const token = bearerToken(request);
  const claims = token ? await tokens.verify(token) : null;
  return claims ? `user:${claims.sub}` : `ip:${request.ip}`;
}

/**
 * Fixed-window limit on `/api/*`, keyed by the caller's user id when the bearer
 * token is valid and by IP otherwise. Health checks and provider webhooks are
 * not limited.
 */
export type RateLimitHook = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;

export function createRateLimitHook(options: RateLimitHookOptions): RateLimitHook {
  const defaults = { limit: options.defaultLimit, windowSeconds: options.defaultWindowSeconds };

  return async (request, reply) => {
    const path = request.url.split("?")[0];
    if (shouldSkipRateLimit(path)) {
      return;
    }

    const { limit, windowSeconds } = limitsFor(path, defaults);
    const info = await options.limiter.checkRateLimit(await identify(request, options.tokens), limit, windowSeconds);

    reply.header("X-RateLimit-Limit", String(info.limit));
    reply.header("X-RateLimit-Remaining", String(info.remaining));
    reply.header("X-RateLimit-Reset", String(Math.floor(info.resetAt.getTime() / 1000)));

    if (!info.allowed) {
      request.log.warn({ path, limit }, "Rate limit exceeded");
      return reply
        .status(429)
        .header("Retry-After", String(info.retryAfter ?? windowSeconds))
        .send({ error: "Rate limit exceeded", retryAfter: info.retryAfter });
    }
  };
}
