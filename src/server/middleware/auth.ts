import type { Request } from 'express';
import type { JsonResponse } from '../types.js';

/** Bearer-token gate. With no AUTH_TOKEN configured every request passes. */
export function requireAuth(req: Pick<Request, 'headers' | 'query'>, res: JsonResponse, next: () => void) {
  const token = process.env.AUTH_TOKEN;
  if (!token) return next();

  if (req.headers.authorization === `Bearer ${token}`) return next();
  if (req.query.token === token) return next();

  res.status(401).json({ ok: false, error: "Unauthorized" });
}
