import type { Dialect } from '../types/transcription.js';

const DIALECT_ALIASES: Record<string, Dialect> = {
  american: 'american', primary: 'american', us: 'american', ga: 'american',
  rp: 'rp', secondary: 'rp', gb: 'rp', uk: 'rp', british: 'rp',
};

/** Case-insensitive dialect name → Dialect, or null when unknown. */
export function parseDialect(name: string): Dialect | null {
  const key = name.trim().toLowerCase();
  return Object.hasOwn(DIALECT_ALIASES, key) ? DIALECT_ALIASES[key] : null;
}
