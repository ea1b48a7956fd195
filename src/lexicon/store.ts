/** JSON-backed lexicon and adapter composition. */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Dialect } from '../types/transcription.js';
import type { LexiconEntry, LookupAdapter } from '../types/lexicon.js';

export const LexiconFileSchema = z.object({
  entries: z.record(
    z.string().min(1),
    z.object({
      us: z.string().min(1).optional(),
      gb: z.string().min(1).optional(),
    }).refine(e => e.us !== undefined || e.gb !== undefined, {
      message: 'entry needs at least one of "us" or "gb"',
    }),
  ),
});

const DIALECT_COLUMN: Record<Dialect, keyof LexiconEntry> = {
  american: 'us',
  rp: 'gb',
};

/** In-memory word → { us, gb } store. Keys are lowercased. */
export class Lexicon implements LookupAdapter {
  private readonly entries: Map<string, LexiconEntry>;

  constructor(entries: Record<string, LexiconEntry> = {}) {
    this.entries = new Map(
      Object.entries(entries).map(([word, entry]) => [word.toLowerCase(), entry]),
    );
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(word: string, dialect: Dialect): string | null {
    return this.entries.get(word.toLowerCase())?.[DIALECT_COLUMN[dialect]] ?? null;
  }

  has(word: string): boolean {
    return this.entries.has(word.toLowerCase());
  }
}

export async function loadLexicon(filePath: string): Promise<Lexicon> {
  const content = await readFile(filePath, 'utf-8');
  const parsed = LexiconFileSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid lexicon ${filePath}: ${issue.path.join('.')}: ${issue.message}`);
  }
  return new Lexicon(parsed.data.entries);
}

/** First adapter with an answer for the requested dialect wins. */
export class CompositeLookup implements LookupAdapter {
  constructor(private readonly adapters: readonly LookupAdapter[]) {}

  lookup(word: string, dialect: Dialect): string | null {
    for (const adapter of this.adapters) {
      const hit = adapter.lookup(word, dialect);
      if (hit !== null) return hit;
    }
    return null;
  }
}
