/** Public API: English text → IPA with weak forms and connected-speech rules. */

import type { FallbackAdapter, LookupAdapter } from '../types/lexicon.js';
import { TranscriptionEngine, type EngineProfile } from './engine.js';

export { TranscriptionEngine, ALWAYS_STRONG, DEFAULT_OPTIONS, defaultProfile, otherDialect } from './engine.js';
export { tokenize, normalizeWord, isPunctuation, joinTokens, PUNCTUATION_CHARS } from './tokenize.js';
export { parseForm, formatPair } from './forms.js';
export { parseDialect } from './dialect.js';
export {
  ContractionRule, TheVariationRule, ThereRule, ThatRule, HaveRule, MustRule, PositionalRule,
  createRuleContext, decideWeakForm, defaultRules, resolveWeak, PAST_PARTICIPLES,
} from './rules.js';
export {
  CharacterCorrector, TheVariationTransformer, LinkingRTransformer, SymbolTransformer, StressRemover,
  defaultTransformers, runTextStage, endsWithVowel, startsWithVowel,
} from './transformers.js';
export type { EngineProfile, EngineOptions } from './engine.js';
export type { RuleContext, RuleDecision, WeakFormRule } from './rules.js';
export type { Transformer, SequenceTransformer, TransformerStage, TransformerStages } from './transformers.js';

/** Engine over one or more lookup adapters, tried in order. */
export function createTranscriptionEngine(
  lookup: LookupAdapter,
  opts: { fallback?: FallbackAdapter; profile?: Partial<EngineProfile> } = {},
): TranscriptionEngine {
  return new TranscriptionEngine({ lookup, fallback: opts.fallback, profile: opts.profile });
}
