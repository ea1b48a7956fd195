import type { Request, Response, NextFunction, RequestHandler } from 'express';

/** Fixed-window request counter per client IP. */
export function createRateLimit(maxPerWindow: number, windowMs = 60_000): RequestHandler {
  const hits = new Map<string, { count: number; resetAt: number }>();

  return (req: Request, res: Response, next: NextFunction) => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const now = Date.now();

    let entry = hits.get(ip);
    if (!entry || now > entry.resetAt) {
      entry = { count: 0, resetAt: now + windowMs };
      hits.set(ip, entry);
    }

    entry.count++;

    if (entry.count > maxPerWindow) {
      res.status(429).json({ ok: false, error: 'Too many requests. Try again later.' });
      return;
    }

    next();
  };
}
