/**
 * Transcription engine: tokenize → resolve each word → sequence passes →
 * join → text passes.
 *
 * Rules and transformers live in an immutable `EngineProfile`. Registration
 * methods build a new frozen profile and swap it in one assignment, and each
 * request reads the profile once, so in-flight requests never see a
 * half-edited list.
 */

import type {
  Dialect,
  InspectedForm,
  Token,
  TranscribedToken,
  TranscriptionOptions,
  TranscriptionResult,
  WordInspection,
  WordToken,
} from '../types/transcription.js';
import type { FallbackAdapter, LookupAdapter } from '../types/lexicon.js';
import { parseForm } from './forms.js';
import { createRuleContext, decideWeakForm, defaultRules, type WeakFormRule } from './rules.js';
import {
  defaultTransformers,
  isActive,
  runTextStage,
  type SequenceTransformer,
  type Transformer,
  type TransformerStage,
} from './transformers.js';
import { joinTokens, normalizeWord, tokenize } from './tokenize.js';

/** Closed-class words that never reduce, checked before the rule chain. */
export const ALWAYS_STRONG: readonly string[] = ['i', 'my', 'may', 'might', 'ought', 'by', 'so', 'while'];

export interface EngineProfile {
  readonly rules: readonly WeakFormRule[];
  readonly alwaysStrong: ReadonlySet<string>;
  readonly wordTransformers: readonly Transformer[];
  readonly sequenceTransformers: readonly SequenceTransformer[];
  readonly textTransformers: readonly Transformer[];
}

export interface EngineOptions {
  lookup: LookupAdapter;
  fallback?: FallbackAdapter;
  profile?: Partial<EngineProfile>;
}

export const DEFAULT_OPTIONS: TranscriptionOptions = {
  dialect: 'american',
  useWeakForms: true,
  ignoreStress: false,
};

export function otherDialect(dialect: Dialect): Dialect {
  return dialect === 'american' ? 'rp' : 'american';
}

export function defaultProfile(): EngineProfile {
  const stages = defaultTransformers();
  return freezeProfile({
    rules: defaultRules(),
    alwaysStrong: new Set(ALWAYS_STRONG),
    wordTransformers: stages.word,
    sequenceTransformers: stages.sequence,
    textTransformers: stages.text,
  });
}

function freezeProfile(profile: EngineProfile): EngineProfile {
  return Object.freeze({
    rules: Object.freeze([...profile.rules]),
    alwaysStrong: profile.alwaysStrong,
    wordTransformers: Object.freeze([...profile.wordTransformers]),
    sequenceTransformers: Object.freeze([...profile.sequenceTransformers]),
    textTransformers: Object.freeze([...profile.textTransformers]),
  });
}

// Entries that must stay last in their list: the catch-all rule and stress removal.
const TERMINAL_RULE = 'positional';
const TERMINAL_TEXT_TRANSFORMER = 'stress-remover';

/**
 * Insert `item` at `position`. Without a position it goes just before the
 * entry named `terminal`, or at the end when that entry is absent.
 */
function insertAt<T extends { readonly name: string }>(
  list: readonly T[],
  item: T,
  position: number | undefined,
  terminal?: string,
): T[] {
  const next = [...list];
  const at = position ?? next.findIndex(entry => entry.name === terminal);
  if (at < 0 || at >= next.length) next.push(item);
  else next.splice(at, 0, item);
  return next;
}

interface RawHit {
  raw: string;
  source: string | null;
}

export class TranscriptionEngine {
  private profile: EngineProfile;
  private readonly lookup: LookupAdapter;
  private readonly fallback?: FallbackAdapter;

  constructor(opts: EngineOptions) {
    this.lookup = opts.lookup;
    this.fallback = opts.fallback;
    this.profile = freezeProfile({ ...defaultProfile(), ...opts.profile });
  }

  /** The active snapshot. Safe to hold on to; it is never mutated. */
  get currentProfile(): EngineProfile {
    return this.profile;
  }

  // ── Registration ──────────────────────────────────────────────

  /** Without a position the rule joins the chain just ahead of the positional catch-all. */
  addRule(rule: WeakFormRule, position?: number): void {
    this.profile = freezeProfile({ ...this.profile, rules: insertAt(this.profile.rules, rule, position, TERMINAL_RULE) });
  }

  removeRule(name: string): void {
    this.profile = freezeProfile({ ...this.profile, rules: this.profile.rules.filter(r => r.name !== name) });
  }

  /** Text transformers added without a position still run before stress removal. */
  addTransformer(stage: 'word' | 'text', transformer: Transformer, position?: number): void;
  addTransformer(stage: 'sequence', transformer: SequenceTransformer, position?: number): void;
  addTransformer(stage: TransformerStage, transformer: Transformer | SequenceTransformer, position?: number): void {
    const p = this.profile;
    if (stage === 'sequence' && 'transformSequence' in transformer) {
      this.profile = freezeProfile({ ...p, sequenceTransformers: insertAt(p.sequenceTransformers, transformer, position) });
    } else if (stage === 'word' && 'transform' in transformer) {
      this.profile = freezeProfile({ ...p, wordTransformers: insertAt(p.wordTransformers, transformer, position) });
    } else if (stage === 'text' && 'transform' in transformer) {
      this.profile = freezeProfile({ ...p, textTransformers: insertAt(p.textTransformers, transformer, position, TERMINAL_TEXT_TRANSFORMER) });
    } else {
      throw new Error(`Transformer "${transformer.name}" does not fit the ${stage} stage`);
    }
  }

  /** Remove every transformer called `name`, from all stages. */
  removeTransformer(name: string): void {
    const p = this.profile;
    this.profile = freezeProfile({
      ...p,
      wordTransformers: p.wordTransformers.filter(t => t.name !== name),
      sequenceTransformers: p.sequenceTransformers.filter(t => t.name !== name),
      textTransformers: p.textTransformers.filter(t => t.name !== name),
    });
  }

  // ── Lookup ────────────────────────────────────────────────────

  /** Raw lexicon string for one word, falling back to the other dialect. */
  lookupRaw(word: string, dialect: Dialect): string | null {
    const key = normalizeWord(word);
    if (!key) return null;
    return this.lookup.lookup(key, dialect) ?? this.lookup.lookup(key, otherDialect(dialect));
  }

  private findRaw(key: string, dialect: Dialect): RawHit | null {
    const direct = this.lookupRaw(key, dialect);
    if (direct !== null) return { raw: direct, source: null };
    if (!this.fallback || !key) return null;

    const candidates = this.fallback.fetch(key);
    const pick = candidates.find(c => c[dialect] !== null)
      ?? candidates.find(c => c[otherDialect(dialect)] !== null);
    if (!pick) return null;

    const raw = pick[dialect] ?? pick[otherDialect(dialect)];
    return raw === null ? null : { raw, source: pick.source };
  }

  /** Both dialects of one word, parsed and corrected, without sentence context. */
  inspectWord(word: string): WordInspection {
    const key = normalizeWord(word);
    const profile = this.profile;
    const inspect = (dialect: Dialect): InspectedForm | null => {
      const raw = key ? this.lookup.lookup(key, dialect) : null;
      if (raw === null) return null;
      const opts: TranscriptionOptions = { ...DEFAULT_OPTIONS, dialect };
      const correct = (s: string) => this.applyWordStage(s, opts, profile);
      const parsed = parseForm(raw);
      return parsed.kind === 'pair'
        ? { strong: correct(parsed.strong), weak: correct(parsed.weak) }
        : correct(parsed.text);
    };

    const american = inspect('american');
    const rp = inspect('rp');
    return { word, found: american !== null || rp !== null, american, rp };
  }

  // ── Transcription ─────────────────────────────────────────────

  transcribe(text: string, options: Partial<TranscriptionOptions> = {}): TranscriptionResult {
    const opts: TranscriptionOptions = { ...DEFAULT_OPTIONS, ...options };
    const profile = this.profile;
    const tokens = tokenize(text);
    const notFound: string[] = [];
    const warnings: string[] = [];

    let items: TranscribedToken[] = tokens.map((token) => {
      if (token.kind === 'punctuation') return { token, ipa: token.text };

      const key = normalizeWord(token.text);
      const hit = this.findRaw(key, opts.dialect);
      if (!hit) {
        if (!notFound.includes(token.text)) notFound.push(token.text);
        return { token, ipa: token.text };
      }
      if (hit.source) warnings.push(`"${token.text}" not in lexicon, using ${hit.source} fallback`);

      const form = this.selectForm(token, key, hit.raw, tokens, opts, profile);
      return { token, ipa: this.applyWordStage(form, opts, profile) };
    });

    for (const t of profile.sequenceTransformers) {
      if (isActive(t, opts)) items = t.transformSequence(items, opts.dialect);
    }

    const joined = joinTokens(items.map(item => item.ipa));
    return { ipa: runTextStage(joined, profile.textTransformers, opts).trim(), notFound, warnings };
  }

  private selectForm(
    token: WordToken,
    key: string,
    raw: string,
    tokens: readonly Token[],
    opts: TranscriptionOptions,
    profile: EngineProfile,
  ): string {
    const parsed = parseForm(raw);
    if (parsed.kind === 'single') return parsed.text;
    if (!opts.useWeakForms) return parsed.strong;

    // Pre-filter: closed-class strong words and contractions skip the chain.
    if (profile.alwaysStrong.has(key) || key.includes("'")) return parsed.strong;

    const ctx = createRuleContext(token.text, token.index, tokens);
    const decision = decideWeakForm(profile.rules, key, ctx);
    if (!decision.weak) return parsed.strong;
    return decision.rule?.weakForm?.(key, ctx) ?? parsed.weak;
  }

  private applyWordStage(ipa: string, opts: TranscriptionOptions, profile: EngineProfile): string {
    return runTextStage(ipa, profile.wordTransformers, opts);
  }
}
