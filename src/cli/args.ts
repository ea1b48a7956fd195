import type { Dialect } from '../types/transcription.js';
import { parseDialect } from '../transcribe/dialect.js';

export interface CliArgs {
  text: string;
  dialect: Dialect;
  useWeakForms: boolean;
  ignoreStress: boolean;
  /** Print the single-word inspection instead of a sentence transcription. */
  word: boolean;
}

export const USAGE = 'Usage: npx tsx src/cli/transcribe.ts [--accent american|rp] [--strong] [--no-stress] [--word] <text...>';

/** Parse argv (without node and script). Throws with a message on bad input. */
export function parseCliArgs(argv: string[]): CliArgs {
  const words: string[] = [];
  let dialect: Dialect = 'american';
  let useWeakForms = true;
  let ignoreStress = false;
  let word = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--accent':
      case '-a': {
        const value = argv[++i];
        const parsed = value === undefined ? null : parseDialect(value);
        if (!parsed) throw new Error(`Unknown accent: ${value ?? '(missing)'}`);
        dialect = parsed;
        break;
      }
      case '--strong':
        useWeakForms = false;
        break;
      case '--no-stress':
        ignoreStress = true;
        break;
      case '--word':
        word = true;
        break;
      default:
        if (arg.startsWith('--')) throw new Error(`Unknown option: ${arg}`);
        words.push(arg);
    }
  }

  const text = words.join(' ').trim();
  if (!text) throw new Error('No text given');
  if (word && words.length > 1) throw new Error('--word takes a single word');
  return { text, dialect, useWeakForms, ignoreStress, word };
}
