import type { JsonResponse } from '../types.js';

export interface RateLimitOptions {
  windowMs: number;
  maxPerWindow: number;
}

export interface ClientRequest {
  ip?: string;
  socket: { remoteAddress?: string };
}

export type RateLimitHandler = (req: ClientRequest, res: JsonResponse, next: () => void) => void;

/** Fixed-window request counter per client IP. */
export function createRateLimit({ windowMs, maxPerWindow }: RateLimitOptions): RateLimitHandler {
  const hits = new Map<string, { count: number; resetAt: number }>();

  return (req, res, next) => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const now = Date.now();

    let entry = hits.get(ip);
    if (!entry || now > entry.resetAt) {
      entry = { count: 0, resetAt: now + windowMs };
      hits.set(ip, entry);
    }

    entry.count++;

    if (entry.count > maxPerWindow) {
      console.warn(`[phonemize] Rate limited ${ip} (${entry.count}/${maxPerWindow} in window)`);
      res.status(429).json({ ok: false, error: "Too many requests. Try again later." });
      return;
    }

    next();
  };
}

export const rateLimit = createRateLimit({
  windowMs: 60_000,
  maxPerWindow: Number(process.env.RATE_LIMIT_RPM) || 20,
});
