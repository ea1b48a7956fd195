import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { healthRouter } from './routes/health.js';
import { infoRouter } from './routes/info.js';
import { transcribeRouter } from './routes/transcribe.js';
import { ipaRouter } from './routes/ipa.js';
import { createRequireAuth } from './middleware/auth.js';
import { createRateLimit } from './middleware/rateLimit.js';
import type { ServerConfig } from './config.js';
import type { Transcriber } from './services/transcriber.js';

export type AppConfig = Pick<ServerConfig, 'authToken' | 'rateLimitRpm' | 'corsOrigins' | 'version'>;

export function createApp(transcriber: Transcriber, config: AppConfig) {
  const app = express();
  const requireAuth = createRequireAuth(config.authToken);
  const rateLimit = createRateLimit(config.rateLimitRpm);

  app.use(cors(config.corsOrigins.length > 0 ? { origin: config.corsOrigins } : undefined));
  app.use(express.json({ limit: '1mb' }));

  // API Routes (auth-gated when AUTH_TOKEN is set)
  app.use('/', infoRouter(config.version));                                 // public
  app.use('/api/health', healthRouter(transcriber.info, config.version));   // public
  app.use('/api/transcribe', requireAuth, rateLimit, transcribeRouter(transcriber.engine));
  app.use('/api/ipa', requireAuth, rateLimit, ipaRouter(transcriber.engine));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: 'Not found' });
  });

  // Express recognises error handlers by arity, so `next` stays in the signature.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
      ? err.status
      : 500;
    const message = err instanceof Error ? err.message : String(err);
    if (status >= 500) console.error('[http] Unhandled error:', message);
    res.status(status).json({ ok: false, error: status >= 500 ? 'Internal server error' : message });
  });

  return app;
}
