/**
 * Weak-form rule chain: ordered context rules deciding whether a function
 * word takes its weak (reduced) or strong (citation) form.
 *
 * Order matters. The first rule whose `appliesTo` matches decides; when
 * nothing matches the word goes weak.
 */

import type { Token } from '../types/transcription.js';
import { isPunctuation, normalizeWord } from './tokenize.js';

/** Read-only view of one word in its sentence. */
export interface RuleContext {
  /** Raw surface text of the word being resolved. */
  word: string;
  index: number;
  tokens: readonly Token[];
  isPunctuation(token: Token | undefined): boolean;
}

export interface WeakFormRule {
  readonly name: string;
  /** `normalized` is the lowercased, punctuation-stripped word. */
  appliesTo(normalized: string, ctx: RuleContext): boolean;
  /** true = weak form, false = strong form. */
  useWeak(normalized: string, ctx: RuleContext): boolean;
  /** Replaces the lexicon's weak member when the rule decided weak. */
  weakForm?(normalized: string, ctx: RuleContext): string;
}

export interface RuleDecision {
  weak: boolean;
  /** The rule that decided, or null when no rule matched. */
  rule: WeakFormRule | null;
}

export function createRuleContext(word: string, index: number, tokens: readonly Token[]): RuleContext {
  return { word, index, tokens, isPunctuation };
}

function normalizedAt(ctx: RuleContext, index: number): string | undefined {
  const token = ctx.tokens[index];
  return token === undefined ? undefined : normalizeWord(token.text);
}

// ── Rules ───────────────────────────────────────────────────────

/** Contracted forms carry their own reduction; pair selection is skipped. */
export class ContractionRule implements WeakFormRule {
  readonly name = 'contraction';

  appliesTo(_normalized: string, ctx: RuleContext): boolean {
    return ctx.word.includes("'");
  }

  useWeak(): boolean {
    return false;
  }
}

/**
 * "the" takes the reduced member; the pre-vocalic /ði/ is produced later by
 * `TheVariationTransformer`, which sees across word boundaries.
 */
export class TheVariationRule implements WeakFormRule {
  readonly name = 'the-variation';

  appliesTo(normalized: string): boolean {
    return normalized === 'the';
  }

  useWeak(): boolean {
    return true;
  }
}

const BE_VERBS = new Set(['is', 'are', 'was', 'were', 'will', 'would', "'s", "'re", "'ll"]);

/** Existential "there is/are…" reduces; locative "there" stays strong. */
export class ThereRule implements WeakFormRule {
  readonly name = 'there';

  appliesTo(normalized: string): boolean {
    return normalized === 'there';
  }

  useWeak(_normalized: string, ctx: RuleContext): boolean {
    const next = normalizedAt(ctx, ctx.index + 1);
    return next !== undefined && BE_VERBS.has(next);
  }
}

const REPORTING_VERBS = new Set([
  'know', 'think', 'believe', 'feel', 'say', 'said', 'tell', 'told',
  'see', 'saw', 'hear', 'heard', 'understand', 'realize', 'realized',
  'assume', 'suppose', 'hope', 'wish', 'remember', 'forget', 'noticed',
  'mean', 'means', 'meant', 'show', 'shows', 'showed', 'prove', 'proves',
]);

const SUBJECT_PRONOUNS = new Set(['he', 'she', 'it', 'they', 'we', 'you', 'i']);

/** Conjunction "that" reduces; demonstrative "that" stays strong. */
export class ThatRule implements WeakFormRule {
  readonly name = 'that';

  appliesTo(normalized: string): boolean {
    return normalized === 'that';
  }

  useWeak(_normalized: string, ctx: RuleContext): boolean {
    const prev = ctx.index > 0 ? normalizedAt(ctx, ctx.index - 1) : undefined;
    if (prev !== undefined && REPORTING_VERBS.has(prev)) return true;

    if (ctx.index < ctx.tokens.length - 2) {
      const next = normalizedAt(ctx, ctx.index + 1);
      if (next !== undefined && SUBJECT_PRONOUNS.has(next)) return true;
    }
    return false;
  }
}

export const PAST_PARTICIPLES: ReadonlySet<string> = new Set([
  'been', 'done', 'gone', 'seen', 'said', 'made', 'come', 'taken', 'given',
  'found', 'thought', 'worked', 'called', 'asked', 'looked', 'used', 'tried',
  'left', 'felt', 'kept', 'heard', 'brought', 'written', 'shown', 'moved',
  'played', 'turned', 'started', 'opened', 'closed', 'happened', 'become',
  'known', 'put', 'told', 'helped', 'changed', 'wanted', 'learned', 'lived',
]);

const POSSESSION_OBJECTS = new Set([
  'a', 'an', 'the', 'my', 'your', 'his', 'her', 'our', 'their', 'some',
  'money', 'time', 'car', 'house', 'food', 'water', 'coffee', 'tea',
  'breakfast', 'lunch', 'dinner', 'problem', 'question', 'idea', 'plan',
]);

const QUESTION_SUBJECTS = new Set(['you', 'we', 'they', 'i']);

/**
 * Auxiliary "have" reduces, main-verb "have" (possession, "have to") does not.
 * The weak form keeps /h/ after a pause: `həv` at the start or within two
 * tokens of punctuation, `əv` elsewhere.
 */
export class HaveRule implements WeakFormRule {
  readonly name = 'have';

  appliesTo(normalized: string): boolean {
    return normalized === 'have';
  }

  useWeak(_normalized: string, ctx: RuleContext): boolean {
    const next = normalizedAt(ctx, ctx.index + 1);
    if (next !== undefined) {
      if (next === 'to') return false;
      if (POSSESSION_OBJECTS.has(next)) return false;
      if (PAST_PARTICIPLES.has(next)) return true;
    }

    // "Have you seen…?"
    if (ctx.index === 0 && ctx.tokens.length > 2) {
      const second = normalizedAt(ctx, 1);
      if (second !== undefined && QUESTION_SUBJECTS.has(second)) return true;
    }

    return false;
  }

  weakForm(_normalized: string, ctx: RuleContext): string {
    if (ctx.index === 0) return 'həv';
    for (let i = Math.max(0, ctx.index - 2); i < ctx.index; i++) {
      if (ctx.isPunctuation(ctx.tokens[i])) return 'həv';
    }
    return 'əv';
  }
}

const EMPHASIS_ADVERBS = new Set(['always', 'never', 'really', 'definitely', 'absolutely', 'certainly']);

/**
 * "must" stays strong in "must have done" and after an emphasis adverb.
 * Its weak form drops /t/ before a consonant-initial word, judged by the next
 * word's first letter.
 */
export class MustRule implements WeakFormRule {
  readonly name = 'must';

  appliesTo(normalized: string): boolean {
    return normalized === 'must';
  }

  useWeak(_normalized: string, ctx: RuleContext): boolean {
    const next = normalizedAt(ctx, ctx.index + 1);
    const afterNext = normalizedAt(ctx, ctx.index + 2);
    if (next === 'have' && afterNext !== undefined && PAST_PARTICIPLES.has(afterNext)) {
      return false;
    }

    const prev = ctx.index > 0 ? normalizedAt(ctx, ctx.index - 1) : undefined;
    if (prev !== undefined && EMPHASIS_ADVERBS.has(prev)) return false;

    return true;
  }

  weakForm(_normalized: string, ctx: RuleContext): string {
    const next = normalizedAt(ctx, ctx.index + 1);
    if (!next) return 'məst';
    return 'aeiouy'.includes(next[0]) ? 'məst' : 'məs';
  }
}

const WEAK_AT_START = new Set(['the', 'a', 'an']);

/** Strong at the start, before a pause and at the end; weak elsewhere. */
export class PositionalRule implements WeakFormRule {
  readonly name = 'positional';

  appliesTo(): boolean {
    return true;
  }

  useWeak(normalized: string, ctx: RuleContext): boolean {
    if (ctx.index === 0 && !WEAK_AT_START.has(normalized)) return false;
    if (ctx.isPunctuation(ctx.tokens[ctx.index + 1])) return false;
    if (ctx.index === ctx.tokens.length - 1) return false;
    return true;
  }
}

// ── Chain ───────────────────────────────────────────────────────

export function defaultRules(): WeakFormRule[] {
  return [
    new ContractionRule(),
    new TheVariationRule(),
    new ThereRule(),
    new ThatRule(),
    new HaveRule(),
    new MustRule(),
    new PositionalRule(),
  ];
}

/** Run `rules` in order; the first applicable rule decides. */
export function decideWeakForm(
  rules: readonly WeakFormRule[],
  normalized: string,
  ctx: RuleContext,
): RuleDecision {
  for (const rule of rules) {
    if (rule.appliesTo(normalized, ctx)) {
      return { weak: rule.useWeak(normalized, ctx), rule };
    }
  }
  return { weak: true, rule: null };
}

/** Convenience form of `decideWeakForm` for a token in a token list. */
export function resolveWeak(
  word: string,
  index: number,
  tokens: readonly Token[],
  rules: readonly WeakFormRule[] = defaultRules(),
): boolean {
  return decideWeakForm(rules, normalizeWord(word), createRuleContext(word, index, tokens)).weak;
}
