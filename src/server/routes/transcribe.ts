import { Router } from 'express';
import type { TranscriptionEngine } from '../../transcribe/index.js';
import { describeIssue, TranscribeBodySchema } from './validation.js';

export function transcribeRouter(engine: TranscriptionEngine): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const parsed = TranscribeBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: describeIssue(parsed.error) });
      return;
    }

    const { text, accent, useWeakForms, ignoreStress } = parsed.data;
    const result = engine.transcribe(text, { dialect: accent, useWeakForms, ignoreStress });

    if (result.notFound.length > 0) {
      console.log(`[transcribe] not found (${accent}): ${result.notFound.join(', ')}`);
    }

    res.json({
      ok: true,
      text,
      accent,
      ipa: result.ipa,
      notFound: result.notFound,
      warnings: result.warnings,
      options: { useWeakForms, ignoreStress },
    });
  });

  return router;
}
