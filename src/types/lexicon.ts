import type { Dialect } from './transcription.js';

/** Raw lexicon access for one dialect. Words arrive lowercased. */
export interface LookupAdapter {
  lookup(word: string, dialect: Dialect): string | null;
}

export interface FallbackCandidate {
  source: string;
  american: string | null;
  rp: string | null;
}

/** Consulted only when no lookup adapter knows the word in either dialect. */
export interface FallbackAdapter {
  fetch(word: string): FallbackCandidate[];
}

/** One dictionary row: `us` is the primary dialect, `gb` the secondary. */
export interface LexiconEntry {
  us?: string;
  gb?: string;
}
