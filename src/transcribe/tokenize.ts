/** Text → ordered word and punctuation tokens. */

import type { Token } from '../types/transcription.js';

/** Punctuation characters kept as tokens when they stand outside a word. */
export const PUNCTUATION_CHARS = ".,!?;:'-";

const WORD = String.raw`[\p{L}\p{N}_]+`;
const PUNCT = `[${PUNCTUATION_CHARS.replace(/[-\\\]^]/g, '\\$&')}]`;

// A word run with at most one internal apostrophe ("don't"), or one punctuation char.
const TOKEN_RE = new RegExp(`${WORD}'${WORD}|${WORD}|${PUNCT}`, 'gu');
const PUNCT_RE = new RegExp(`^${PUNCT}+$`, 'u');
const SPACE_BEFORE_PUNCT_RE = new RegExp(String.raw`\s+(${PUNCT})`, 'gu');

/**
 * Split raw text into tokens, left to right. Whitespace and any character
 * outside the word/punctuation sets is dropped.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_RE)) {
    const raw = match[0];
    const index = tokens.length;
    tokens.push(PUNCT_RE.test(raw)
      ? { kind: 'punctuation', text: raw, index }
      : { kind: 'word', text: raw, index });
  }
  return tokens;
}

/** Lowercase and strip everything but word characters and apostrophes. */
export function normalizeWord(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}_']/gu, '');
}

export function isPunctuation(token: Token | undefined): boolean {
  return token?.kind === 'punctuation';
}

/**
 * Join per-token strings with single spaces, then pull punctuation back
 * against the preceding token ("hi , there" → "hi, there").
 */
export function joinTokens(parts: readonly string[]): string {
  return parts.join(' ').replace(SPACE_BEFORE_PUNCT_RE, '$1');
}
