/** Syllabification using the Maximal Onset Principle. */

import type { ParsedPhoneme } from './arpabet.js';

export interface Syllable {
  onset: ParsedPhoneme[];    // leading consonants
  nucleus: ParsedPhoneme;    // the vowel
  coda: ParsedPhoneme[];     // trailing consonants
}

// Legal 2-consonant onsets in English
const LEGAL_ONSETS_2 = new Set([
  'P L', 'P R', 'B L', 'B R', 'T R', 'D R', 'K L', 'K R',
  'G L', 'G R', 'F L', 'F R', 'TH R', 'SH R',
  'S K', 'S L', 'S M', 'S N', 'S P', 'S T', 'S W',
]);

const LEGAL_ONSETS_3 = new Set([
  'S P L', 'S P R', 'S T R', 'S K R', 'S K W',
]);

function isLegalOnset(consonants: ParsedPhoneme[]): boolean {
  if (consonants.length <= 1) return true;
  const key = consonants.map(c => c.symbol).join(' ');
  if (consonants.length === 2) return LEGAL_ONSETS_2.has(key);
  if (consonants.length === 3) return LEGAL_ONSETS_3.has(key);
  return false;
}

/**
 * Split an intervocalic consonant cluster into [coda, onset] counts.
 * Maximal Onset: give as many consonants to the onset as legal.
 */
export function splitCluster(cluster: ParsedPhoneme[]): [number, number] {
  const n = cluster.length;
  if (n === 0) return [0, 0];

  for (let onsetStart = 0; onsetStart < n; onsetStart++) {
    if (isLegalOnset(cluster.slice(onsetStart))) {
      return [onsetStart, n - onsetStart];
    }
  }
  return [n, 0];
}

/**
 * Syllabify a phoneme sequence.
 *
 * Leading consonants go to the first onset, trailing ones to the last coda,
 * and each intervocalic cluster is split with `splitCluster`.
 */
export function syllabify(phonemes: ParsedPhoneme[]): Syllable[] {
  const nuclei: number[] = [];
  for (let i = 0; i < phonemes.length; i++) {
    if (phonemes[i].kind === 'vowel') nuclei.push(i);
  }
  if (nuclei.length === 0) return [];

  // Index where each syllable begins
  const starts = [0];
  for (let vi = 1; vi < nuclei.length; vi++) {
    const clusterStart = nuclei[vi - 1] + 1;
    const [codaCount] = splitCluster(phonemes.slice(clusterStart, nuclei[vi]));
    starts.push(clusterStart + codaCount);
  }

  return nuclei.map((nucleusIdx, vi) => {
    const end = vi + 1 < starts.length ? starts[vi + 1] : phonemes.length;
    return {
      onset: phonemes.slice(starts[vi], nucleusIdx),
      nucleus: phonemes[nucleusIdx],
      coda: phonemes.slice(nucleusIdx + 1, end),
    };
  });
}
