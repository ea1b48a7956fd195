import { Router } from 'express';
import type { TranscriberInfo } from '../services/transcriber.js';

export function healthRouter(info: TranscriberInfo, version: string): Router {
  const router = Router();
  const startedAt = Date.now();

  router.get('/', (_req, res) => {
    res.json({
      ok: true,
      version,
      node: process.version,
      lexiconEntries: info.lexiconEntries,
      cmuLookup: info.cmuLookup,
      letterRuleFallback: info.letterRuleFallback,
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  return router;
}
