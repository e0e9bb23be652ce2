export interface FixedWindow {
  index: number;
  startMs: number;
  endMs: number;
}

export function resolveFixedWindow(nowMs: number, windowSeconds: number): FixedWindow {
  if (!Number.isFinite(windowSeconds) || windowSeconds <= 0) {
    throw new Error("Rate limit window must be a positive number of seconds");
  }

  const windowMs = windowSeconds * 1000;
  const index = Math.floor(nowMs / windowMs);
  return { index, startMs: index * windowMs, endMs: (index + 1) * windowMs };
}

export function rateLimitKey(identifier: string, window: FixedWindow): string {
  return `rate_limit:${identifier}:${window.index}`;
}

export function secondsUntil(targetMs: number, nowMs: number): number {
  return Math.max(1, Math.ceil((targetMs - nowMs) / 1000));
}
