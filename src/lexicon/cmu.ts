/** General American lookups against the CMU Pronouncing Dictionary. */

import { dictionary } from 'cmu-pronouncing-dictionary';
import type { Dialect } from '../types/transcription.js';
import type { LookupAdapter } from '../types/lexicon.js';
import { arpabetToIpa, parsePronunciation } from './arpabet.js';

/** CMU entry for a word, or null. Alternate pronunciations ("word(2)") are ignored. */
export function lookupArpabet(word: string): string | null {
  const key = word.toLowerCase();
  return Object.hasOwn(dictionary, key) ? dictionary[key] : null;
}

/** Answers the primary dialect only; CMU has no non-rhotic data. */
export class CmuLookup implements LookupAdapter {
  lookup(word: string, dialect: Dialect): string | null {
    if (dialect !== 'american') return null;
    const entry = lookupArpabet(word);
    return entry ? arpabetToIpa(parsePronunciation(entry)) : null;
  }
}
