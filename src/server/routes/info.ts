import { Router } from 'express';

const ENDPOINTS = [
  { method: 'GET', path: '/api/health', description: 'Service status and lexicon size' },
  { method: 'POST', path: '/api/transcribe', description: 'Transcribe text to IPA' },
  { method: 'GET', path: '/api/ipa', description: 'Both dialects of a single word' },
] as const;

/** Service banner listing the API. */
export function infoRouter(version: string): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ ok: true, service: 'ipa-transcriber', version, endpoints: ENDPOINTS });
  });

  return router;
}
