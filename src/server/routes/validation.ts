import { z } from 'zod';
import { parseDialect } from '../../transcribe/dialect.js';
import { DIALECTS } from '../../types/transcription.js';

export const AccentSchema = z.string().transform((value, ctx) => {
  const dialect = parseDialect(value);
  if (!dialect) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Accent must be ${DIALECTS.map(d => `'${d}'`).join(' or ')}` });
    return z.NEVER;
  }
  return dialect;
});

export const TranscribeBodySchema = z.object({
  text: z.string().refine(s => s.trim().length > 0, 'Text cannot be empty'),
  accent: AccentSchema.default('american'),
  useWeakForms: z.boolean().default(true),
  ignoreStress: z.boolean().default(false),
});

export const IpaQuerySchema = z.object({
  word: z.string().trim().min(1, 'Missing "word" query parameter'),
});

/** "field: message" for the first issue of a failed parse. */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}
