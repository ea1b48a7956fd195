/** Dual-form notation: "/ strong, weak /". */

import type { ParsedForm } from '../types/transcription.js';

const OPEN = '/ ';
const CLOSE = ' /';
const SEPARATOR = ', ';

/**
 * Interpret a raw lexicon string. Only the exact envelope
 * `"/ <strong>, <weak> /"` yields a pair; anything else is a single form,
 * verbatim when the envelope is missing.
 */
export function parseForm(raw: string): ParsedForm {
  if (raw.length < OPEN.length + CLOSE.length || !raw.startsWith(OPEN) || !raw.endsWith(CLOSE)) {
    return { kind: 'single', text: raw };
  }

  const content = raw.slice(OPEN.length, -CLOSE.length);
  const sep = content.indexOf(SEPARATOR);
  if (sep === -1) return { kind: 'single', text: content.trim() };

  return {
    kind: 'pair',
    strong: content.slice(0, sep).trim(),
    weak: content.slice(sep + SEPARATOR.length).trim(),
  };
}

/** Inverse of `parseForm` for pairs. */
export function formatPair(strong: string, weak: string): string {
  return `${OPEN}${strong}${SEPARATOR}${weak}${CLOSE}`;
}
