/** ARPAbet phoneme inventory, parsing, and ARPAbet → IPA rendering. */

import { syllabify } from './syllabify.js';

export const ARPABET_VOWELS = new Set([
  'AA', 'AE', 'AH', 'AO', 'AW', 'AX', 'AXR', 'AY',
  'EH', 'ER', 'EY',
  'IH', 'IX', 'IY',
  'OW', 'OY',
  'UH', 'UW', 'UX',
]);

export interface ParsedPhoneme {
  symbol: string;        // base ARPAbet (stress stripped)
  kind: 'vowel' | 'consonant';
  stress: number | null; // 0/1/2 for vowels, null for consonants
}

/** Strip stress marker from a CMU dict token. "AH0" → { base: "AH", stress: 0 } */
export function stripStress(token: string): { base: string; stress: number | null } {
  const last = token[token.length - 1];
  if (last === '0' || last === '1' || last === '2') {
    return { base: token.slice(0, -1), stress: Number(last) };
  }
  return { base: token, stress: null };
}

/** Parse a single ARPAbet token into a classified phoneme. */
export function parsePhoneme(token: string): ParsedPhoneme {
  const { base, stress } = stripStress(token);
  const kind = ARPABET_VOWELS.has(base) ? 'vowel' : 'consonant';
  return { symbol: base, kind, stress: kind === 'vowel' ? (stress ?? 0) : null };
}

/** Parse a CMU dict entry string into classified phonemes. "HH AH0 L OW1" → [...] */
export function parsePronunciation(cmuEntry: string): ParsedPhoneme[] {
  return cmuEntry.trim().split(/\s+/).map(parsePhoneme);
}

/**
 * General American values. AH and ER split on stress: reduced ə / ər,
 * stressed ʌ / ɜr.
 */
export const ARPABET_TO_IPA: Record<string, string> = {
  // vowels
  'AA': 'ɑ', 'AE': 'æ', 'AH': 'ʌ', 'AO': 'ɔ', 'AW': 'aʊ', 'AX': 'ə',
  'AXR': 'ər', 'AY': 'aɪ', 'EH': 'ɛ', 'ER': 'ɜr', 'EY': 'eɪ',
  'IH': 'ɪ', 'IX': 'ɪ', 'IY': 'i', 'OW': 'oʊ', 'OY': 'ɔɪ',
  'UH': 'ʊ', 'UW': 'u', 'UX': 'u',
  // consonants
  'B': 'b', 'CH': 'tʃ', 'D': 'd', 'DH': 'ð', 'DX': 'ɾ', 'EL': 'əl',
  'EM': 'əm', 'EN': 'ən', 'F': 'f', 'G': 'ɡ', 'HH': 'h', 'JH': 'dʒ',
  'K': 'k', 'L': 'l', 'M': 'm', 'N': 'n', 'NG': 'ŋ', 'NX': 'ŋ',
  'P': 'p', 'Q': 'ʔ', 'R': 'ɹ', 'S': 's', 'SH': 'ʃ', 'T': 't',
  'TH': 'θ', 'V': 'v', 'W': 'w', 'WH': 'ʍ', 'Y': 'j', 'Z': 'z', 'ZH': 'ʒ',
};

const REDUCED_VOWELS: Record<string, string> = { 'AH': 'ə', 'ER': 'ər' };

export function phonemeToIpa(p: ParsedPhoneme): string {
  if (p.kind === 'vowel' && p.stress === 0 && REDUCED_VOWELS[p.symbol]) {
    return REDUCED_VOWELS[p.symbol];
  }
  return ARPABET_TO_IPA[p.symbol] ?? p.symbol.toLowerCase();
}

/**
 * Render phonemes as an IPA string. Stress marks go before the onset of the
 * stressed syllable; monosyllables carry none. `render` maps one phoneme and
 * defaults to the General American values.
 */
export function arpabetToIpa(
  phonemes: ParsedPhoneme[],
  render: (p: ParsedPhoneme) => string = phonemeToIpa,
): string {
  const syllables = syllabify(phonemes);
  if (syllables.length === 0) return phonemes.map(render).join('');

  const marked = syllables.length > 1;
  return syllables.map((s) => {
    const body = [...s.onset, s.nucleus, ...s.coda].map(render).join('');
    if (!marked) return body;
    if (s.nucleus.stress === 1) return `ˈ${body}`;
    if (s.nucleus.stress === 2) return `ˌ${body}`;
    return body;
  }).join('');
}
