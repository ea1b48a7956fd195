/** Shared data model for the IPA transcription engine. */

/** `american` is the primary (rhotic) dialect, `rp` the secondary (non-rhotic) one. */
export type Dialect = 'american' | 'rp';

export const DIALECTS: readonly Dialect[] = ['american', 'rp'];

export interface WordToken {
  kind: 'word';
  text: string;
  index: number;
}

export interface PunctuationToken {
  kind: 'punctuation';
  text: string;
  index: number;
}

export type Token = WordToken | PunctuationToken;

export type ParsedForm =
  | { kind: 'single'; text: string }
  | { kind: 'pair'; strong: string; weak: string };

export interface TranscriptionOptions {
  dialect: Dialect;
  useWeakForms: boolean;
  ignoreStress: boolean;
}

export interface TranscriptionResult {
  ipa: string;
  /** Surface spellings with no entry anywhere, first occurrence order, no duplicates. */
  notFound: string[];
  warnings: string[];
}

export type InspectedForm = string | { strong: string; weak: string };

export interface WordInspection {
  word: string;
  found: boolean;
  american: InspectedForm | null;
  rp: InspectedForm | null;
}

/** One per-word transcription paired with the token it came from. */
export interface TranscribedToken {
  token: Token;
  ipa: string;
}
