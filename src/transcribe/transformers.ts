/**
 * Post-resolution transformers. Three stages, each an ordered list:
 *
 *   word      per-word string cleanup (CharacterCorrector)
 *   sequence  passes that need neighbouring words and spellings (LinkingR)
 *   text      whole-sentence passes after the join (the-variation, symbols, stress)
 *
 * Transformers are stateless; `appliesTo` gates them per request.
 */

import type { Dialect, TranscribedToken, TranscriptionOptions } from '../types/transcription.js';
import { normalizeWord } from './tokenize.js';

export interface Transformer {
  readonly name: string;
  appliesTo?(options: TranscriptionOptions): boolean;
  transform(text: string, dialect: Dialect): string;
}

export interface SequenceTransformer {
  readonly name: string;
  appliesTo?(options: TranscriptionOptions): boolean;
  transformSequence(items: readonly TranscribedToken[], dialect: Dialect): TranscribedToken[];
}

export type TransformerStage = 'word' | 'sequence' | 'text';

export function isActive(t: { appliesTo?(options: TranscriptionOptions): boolean }, options: TranscriptionOptions): boolean {
  return t.appliesTo?.(options) ?? true;
}

// ── Character correction ───────────────────────────────────────

const BASIC_REPLACEMENTS: ReadonlyArray<[string, string]> = [
  ['ɹ', 'r'],
  ['ɛ', 'e'],
  ['ɐ', 'ə'],
];

// Applied in this order: ɛə → eə above must happen before eə → er.
const AMERICAN_REPLACEMENTS: ReadonlyArray<[string, string]> = [
  ['ɒ', 'ɑ'],   // LOT
  ['əʊ', 'oʊ'], // GOAT
  ['ɪə', 'ɪr'], // NEAR
  ['eə', 'er'], // SQUARE
  ['ʊə', 'ʊr'], // CURE
  ['ɜː', 'ɜr'], // NURSE
];

/** Normalizes lexicon symbols: slashes, syllable dots, preferred characters. */
export class CharacterCorrector implements Transformer {
  readonly name = 'character-corrector';

  transform(text: string, dialect: Dialect): string {
    let out = text.replace(/^\/([^/]+)\/$/, '$1').replaceAll('/', '');
    out = out.replaceAll('.', '');

    for (const [from, to] of BASIC_REPLACEMENTS) out = out.replaceAll(from, to);

    if (dialect === 'american') {
      for (const [from, to] of AMERICAN_REPLACEMENTS) out = out.replaceAll(from, to);
      out = out.replace(/ɑː(\s|$)/g, 'ɑr$1');
    }

    return out;
  }
}

// ── Vowel classes ───────────────────────────────────────────────

const VOWEL_END_RE = /[æɑɒɔʊuɪieoəʌɜaɛœ]ː?$/u;
const VOWEL_START_RE = /^[ˈˌ]?[æɑɒɔʊʉuiɪeəʌɜoɘaɟɨʎœɶɵɯɤɦɐɛɽ]/u;

export function endsWithVowel(ipa: string): boolean {
  return VOWEL_END_RE.test(ipa.trim());
}

export function startsWithVowel(ipa: string): boolean {
  return VOWEL_START_RE.test(ipa.trim());
}

// ── "the" allophony ─────────────────────────────────────────────

const THE_BEFORE_VOWEL_RE = /(?<![\p{L}\p{M}])ðə(?=\s+[ˈˌ]?[æɑɒɔʊuiɪeəʌɜaɛo])/gu;

/** Reduced "the" before a vowel-initial word becomes /ði/. */
export class TheVariationTransformer implements Transformer {
  readonly name = 'the-variation';

  transform(text: string): string {
    return text.replace(THE_BEFORE_VOWEL_RE, 'ði');
  }
}

// ── Linking R ───────────────────────────────────────────────────

const LINKING_R_EXCEPTIONS = new Set(['more', 'sure', 'pure']);
const SPELLED_R_RE = /r[\p{L}\p{N}_]*$/iu;

/**
 * Non-rhotic linking /r/: a word spelled with a final r-syllable whose
 * transcription ends in a vowel gains an `r` before a vowel-initial word.
 */
export class LinkingRTransformer implements SequenceTransformer {
  readonly name = 'linking-r';

  appliesTo(options: TranscriptionOptions): boolean {
    return options.dialect === 'rp';
  }

  transformSequence(items: readonly TranscribedToken[]): TranscribedToken[] {
    const out = items.map(item => ({ ...item }));

    for (let i = 0; i < out.length - 1; i++) {
      const current = out[i];
      const next = out[i + 1];
      if (next.token.kind === 'punctuation') continue;
      if (!SPELLED_R_RE.test(current.token.text)) continue;
      if (!endsWithVowel(current.ipa) || !startsWithVowel(next.ipa)) continue;
      if (LINKING_R_EXCEPTIONS.has(normalizeWord(current.token.text))) continue;
      if (current.ipa.endsWith('r')) continue;

      current.ipa = `${current.ipa}r`;
    }

    return out;
  }
}

// ── Symbols ─────────────────────────────────────────────────────

/** RP teaching notation: (!) (?), "/" for commas, "//" for full stops. */
export class SymbolTransformer implements Transformer {
  readonly name = 'symbols';

  appliesTo(options: TranscriptionOptions): boolean {
    return options.dialect === 'rp';
  }

  transform(text: string): string {
    return text
      .replaceAll('!', '(!)')
      .replaceAll('?', '(?)')
      .replaceAll(',', ' /')
      .replace(/\s*\.\s*/g, ' // ')
      .trimEnd();
  }
}

// ── Stress ──────────────────────────────────────────────────────

/** Drops primary and secondary stress marks. Runs last. */
export class StressRemover implements Transformer {
  readonly name = 'stress-remover';

  appliesTo(options: TranscriptionOptions): boolean {
    return options.ignoreStress;
  }

  transform(text: string): string {
    return text.replace(/[ˈˌ]/g, '');
  }
}

export interface TransformerStages {
  word: readonly Transformer[];
  sequence: readonly SequenceTransformer[];
  text: readonly Transformer[];
}

export function defaultTransformers(): TransformerStages {
  return {
    word: [new CharacterCorrector()],
    sequence: [new LinkingRTransformer()],
    text: [new TheVariationTransformer(), new SymbolTransformer(), new StressRemover()],
  };
}

/** Apply the active text-stage transformers in order. */
export function runTextStage(text: string, transformers: readonly Transformer[], options: TranscriptionOptions): string {
  let out = text;
  for (const t of transformers) {
    if (isActive(t, options)) out = t.transform(out, options.dialect);
  }
  return out;
}
