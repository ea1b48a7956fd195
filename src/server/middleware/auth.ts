import type { Request, Response, NextFunction, RequestHandler } from 'express';

/** Bearer-token guard. With no token configured every request passes. */
export function createRequireAuth(token: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!token) return next();

    if (req.headers.authorization === `Bearer ${token}`) return next();

    // Also accept ?token= for links opened outside a client
    if (req.query.token === token) return next();

    res.status(401).json({ ok: false, error: 'Unauthorized' });
  };
}
