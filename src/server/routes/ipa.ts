import { Router } from 'express';
import type { TranscriptionEngine } from '../../transcribe/index.js';
import { describeIssue, IpaQuerySchema } from './validation.js';

/** Single-word inspection: both dialects, strong and weak forms unresolved. */
export function ipaRouter(engine: TranscriptionEngine): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const parsed = IpaQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: describeIssue(parsed.error) });
      return;
    }

    res.json({ ok: true, ...engine.inspectWord(parsed.data.word) });
  });

  return router;
}
