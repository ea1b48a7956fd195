/** Letter-to-sound fallback for words no lexicon knows. */

import type { FallbackAdapter, FallbackCandidate } from '../types/lexicon.js';
import { ARPABET_VOWELS, arpabetToIpa, phonemeToIpa, type ParsedPhoneme } from './arpabet.js';

// Spelling → ARPAbet. The scan tries three letters, then two, then one.
const GRAPHEMES = new Map<string, string[]>([
  ['tch', ['CH']], ['igh', ['AY']], ['air', ['EH', 'R']], ['ear', ['IH', 'R']],
  ['th', ['TH']], ['sh', ['SH']], ['ch', ['CH']], ['ph', ['F']], ['wh', ['W']],
  ['ng', ['NG']], ['ck', ['K']], ['qu', ['K', 'W']],
  ['ee', ['IY']], ['ea', ['IY']], ['oo', ['UW']], ['ou', ['AW']], ['ow', ['OW']],
  ['ai', ['EY']], ['ay', ['EY']], ['oi', ['OY']], ['oy', ['OY']], ['au', ['AO']], ['aw', ['AO']],
  ['ar', ['AA', 'R']], ['or', ['AO', 'R']], ['er', ['ER']], ['ir', ['ER']], ['ur', ['ER']],
  ['a', ['AE']], ['e', ['EH']], ['i', ['IH']], ['o', ['AA']], ['u', ['AH']],
  ['b', ['B']], ['c', ['K']], ['d', ['D']], ['f', ['F']], ['g', ['G']], ['h', ['HH']],
  ['j', ['JH']], ['k', ['K']], ['l', ['L']], ['m', ['M']], ['n', ['N']], ['p', ['P']],
  ['q', ['K']], ['r', ['R']], ['s', ['S']], ['t', ['T']], ['v', ['V']], ['w', ['W']],
  ['x', ['K', 'S']], ['y', ['Y']], ['z', ['Z']],
]);

/** Vowel letters lengthened by a silent final e ("shape", "note"). */
const LONG_VOWELS: Record<string, string> = { a: 'EY', e: 'IY', i: 'AY', o: 'OW', u: 'UW' };

const MAGIC_E_RE = /(?:^|[^aeiou])[aeiou][^aeiouwxy]e$/;

/**
 * Naive letter-to-phoneme rules: longest grapheme first, silent final e
 * lengthening the vowel before it, final y after a consonant as /i/.
 * The first vowel takes primary stress. Words with no vowel get a schwa.
 */
export function letterRulePhonemes(word: string): ParsedPhoneme[] {
  const w = word.toLowerCase().replace(/[^a-z]/g, '');
  const silentE = w.length > 2 && w.endsWith('e') && !/[aeiou]e$/.test(w);
  const end = silentE ? w.length - 1 : w.length;
  const longAt = silentE && MAGIC_E_RE.test(w) ? w.length - 3 : -1;

  const symbols: string[] = [];
  let i = 0;
  while (i < end) {
    if (i === longAt) {
      symbols.push(LONG_VOWELS[w[i]]);
      i++;
      continue;
    }
    if (w[i] === 'y' && i > 0 && i === end - 1 && !'aeiou'.includes(w[i - 1])) {
      symbols.push('IY');
      i++;
      continue;
    }

    let step = 1;
    for (const n of [3, 2, 1]) {
      const seq = n <= end - i ? GRAPHEMES.get(w.slice(i, i + n)) : undefined;
      if (seq) {
        symbols.push(...seq);
        step = n;
        break;
      }
    }
    i += step;
  }

  let stressed = false;
  const phonemes = symbols.map((symbol): ParsedPhoneme => {
    if (!ARPABET_VOWELS.has(symbol)) return { symbol, kind: 'consonant', stress: null };
    const stress = stressed ? 0 : 1;
    stressed = true;
    return { symbol, kind: 'vowel', stress };
  });

  if (w.length > 0 && !stressed) phonemes.push({ symbol: 'AH', kind: 'vowel', stress: 0 });
  return phonemes;
}

const RP_VOWELS: Record<string, string> = {
  AA: 'ɒ', AO: 'ɔː', IY: 'iː', UW: 'uː', OW: 'əʊ', EH: 'e', ER: 'ɜː',
};

// A vowel whose following R was dropped.
const RP_R_COLOURED: Record<string, string> = {
  AA: 'ɑː', AE: 'ɑː', AO: 'ɔː', OW: 'ɔː', AH: 'ɜː',
  EH: 'eə', EY: 'eə', IH: 'ɪə', IY: 'ɪə', UW: 'ʊə', AY: 'aɪə', AW: 'aʊə',
};

/**
 * Non-rhotic rendering: an R not followed by a vowel is dropped and the
 * vowel before it takes its long or centring value.
 */
export function nonRhoticIpa(phonemes: readonly ParsedPhoneme[]): string {
  const kept: ParsedPhoneme[] = [];
  const rColoured = new Set<ParsedPhoneme>();

  phonemes.forEach((p, i) => {
    const prev = kept.at(-1);
    const next = phonemes.at(i + 1);
    if (p.symbol === 'R' && next?.kind !== 'vowel' && prev?.kind === 'vowel') {
      rColoured.add(prev);
      return;
    }
    kept.push(p);
  });

  return arpabetToIpa(kept, (p) => {
    if (rColoured.has(p)) return RP_R_COLOURED[p.symbol] ?? `${phonemeToIpa(p)}ː`;
    if (p.kind === 'vowel' && p.stress === 0 && (p.symbol === 'AH' || p.symbol === 'ER')) return 'ə';
    return RP_VOWELS[p.symbol] ?? phonemeToIpa(p);
  });
}

/** Guesses for both dialects from the spelling of any word with a Latin letter. */
export class LetterRuleFallback implements FallbackAdapter {
  readonly source = 'letter-rules';

  fetch(word: string): FallbackCandidate[] {
    const phonemes = letterRulePhonemes(word);
    if (phonemes.length === 0) return [];
    return [{ source: this.source, american: arpabetToIpa(phonemes), rp: nonRhoticIpa(phonemes) }];
  }
}
