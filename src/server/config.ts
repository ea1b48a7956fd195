import path from 'node:path';
import { z } from 'zod';

const flag = (fallback: boolean) => z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .optional()
  .transform(v => (v === undefined ? fallback : v === 'true' || v === '1' || v === 'yes'));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8002),
  HOST: z.string().min(1).default('0.0.0.0'),
  LEXICON_PATH: z.string().min(1).default('data/lexicon.json'),
  CMU_LOOKUP: flag(true),
  LETTER_RULE_FALLBACK: flag(false),
  AUTH_TOKEN: z.string().min(1).optional(),
  RATE_LIMIT_RPM: z.coerce.number().int().positive().default(60),
  CORS_ORIGINS: z.string().optional(),
  APP_VERSION: z.string().default('dev'),
});

export interface ServerConfig {
  port: number;
  host: string;
  lexiconPath: string;
  cmuLookup: boolean;
  letterRuleFallback: boolean;
  authToken?: string;
  rateLimitRpm: number;
  /** Allowed origins; empty means any. */
  corsOrigins: string[];
  version: string;
}

/** Parse the environment once. Throws naming the offending variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration: ${issue.path.join('.')}: ${issue.message}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    lexiconPath: path.resolve(process.cwd(), e.LEXICON_PATH),
    cmuLookup: e.CMU_LOOKUP,
    letterRuleFallback: e.LETTER_RULE_FALLBACK,
    authToken: e.AUTH_TOKEN,
    rateLimitRpm: e.RATE_LIMIT_RPM,
    corsOrigins: (e.CORS_ORIGINS ?? '').split(',').map(s => s.trim()).filter(Boolean),
    version: e.APP_VERSION,
  };
}
