import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import {
  createRuleContext,
  decideWeakForm,
  defaultRules,
  HaveRule,
  MustRule,
  resolveWeak,
} from '../../src/transcribe/rules.js';
import { normalizeWord, tokenize } from '../../src/transcribe/tokenize.js';

/** Decide for the first token spelled `word` in `sentence`. */
function decide(sentence: string, word: string) {
  const tokens = tokenize(sentence);
  const token = tokens.find(t => t.text === word);
  assert.ok(token, `"${word}" not in "${sentence}"`);
  const ctx = createRuleContext(token.text, token.index, tokens);
  const key = normalizeWord(token.text);
  const decision = decideWeakForm(defaultRules(), key, ctx);
  const weakForm = decision.weak ? decision.rule?.weakForm?.(key, ctx) : undefined;
  return { weak: decision.weak, rule: decision.rule?.name ?? null, weakForm };
}

test('the default chain runs in a fixed order', () => {
  assert.deepEqual(defaultRules().map(r => r.name), [
    'contraction', 'the-variation', 'there', 'that', 'have', 'must', 'positional',
  ]);
});

test('contractions are decided strong by the contraction rule', () => {
  assert.deepEqual(decide("I don't know", "don't"), { weak: false, rule: 'contraction', weakForm: undefined });
});

test('"the" is claimed by the the-variation rule', () => {
  assert.equal(decide('the apple', 'the').rule, 'the-variation');
});

describe('there', () => {
  test('weak before a form of be', () => {
    assert.deepEqual(decide('there is a problem', 'there'), { weak: true, rule: 'there', weakForm: undefined });
    assert.equal(decide('there were two', 'there').weak, true);
  });

  test('strong as a place adverb', () => {
    assert.equal(decide('I live there.', 'there').weak, false);
    assert.equal(decide('go there now', 'there').weak, false);
  });
});

describe('that', () => {
  test('weak after a reporting verb', () => {
    assert.equal(decide('I know that story', 'that').weak, true);
  });

  test('weak before a subject pronoun with a following token', () => {
    assert.equal(decide('that he left', 'that').weak, true);
  });

  test('strong when the pronoun is the last token', () => {
    assert.equal(decide('and that it', 'that').weak, false);
  });

  test('strong as a demonstrative', () => {
    assert.equal(decide('that is mine', 'that').weak, false);
  });
});

describe('have', () => {
  test('strong before an object', () => {
    assert.deepEqual(decide('I have a car', 'have'), { weak: false, rule: 'have', weakForm: undefined });
  });

  test('strong in "have to"', () => {
    assert.equal(decide('I have to go', 'have').weak, false);
  });

  test('weak before a past participle, without h mid-sentence', () => {
    assert.deepEqual(decide('I have seen it', 'have'), { weak: true, rule: 'have', weakForm: 'əv' });
  });

  test('weak at the start of a question, keeping h', () => {
    assert.deepEqual(decide('Have you done it?', 'Have'), { weak: true, rule: 'have', weakForm: 'həv' });
  });

  test('a sentence-initial question needs more than two tokens', () => {
    assert.deepEqual(decide('Have you', 'Have'), { weak: false, rule: 'have', weakForm: undefined });
    assert.deepEqual(decide('Have you seen', 'Have'), { weak: true, rule: 'have', weakForm: 'həv' });
  });

  test('keeps h within two tokens of punctuation', () => {
    assert.equal(decide('Well, we have gone', 'have').weakForm, 'həv');
  });

  test('strong when nothing signals an auxiliary', () => {
    assert.equal(decide('They have', 'have').weak, false);
  });
});

describe('must', () => {
  test('weak, dropping t before a consonant', () => {
    assert.deepEqual(decide('You must go', 'must'), { weak: true, rule: 'must', weakForm: 'məs' });
  });

  test('weak, keeping t before a vowel letter or y', () => {
    assert.equal(decide('You must eat', 'must').weakForm, 'məst');
    assert.equal(decide('You must yield', 'must').weakForm, 'məst');
  });

  test('keeps t when nothing follows', () => {
    assert.equal(decide('You must', 'must').weakForm, 'məst');
  });

  test('strong in "must have" + participle', () => {
    assert.equal(decide('You must have done it', 'must').weak, false);
  });

  test('weak when "have" is not followed by a participle', () => {
    assert.deepEqual(decide('You must have lunch', 'must'), { weak: true, rule: 'must', weakForm: 'məs' });
  });

  test('strong after an emphasis adverb', () => {
    assert.equal(decide('You really must go', 'must').weak, false);
  });
});

describe('positional', () => {
  test('weak mid-sentence', () => {
    assert.deepEqual(decide('I want to go', 'to'), { weak: true, rule: 'positional', weakForm: undefined });
  });

  test('strong before punctuation', () => {
    assert.equal(decide('Where are you from?', 'from').weak, false);
  });

  test('strong at the start unless an article', () => {
    assert.equal(decide('to be fair', 'to').weak, false);
    assert.equal(decide('a car', 'a').weak, true);
  });

  test('strong at the end', () => {
    assert.equal(decide('who is it for', 'for').weak, false);
  });
});

test('an empty chain defaults to weak', () => {
  const tokens = tokenize('of course');
  assert.deepEqual(decideWeakForm([], 'of', createRuleContext('of', 0, tokens)), { weak: true, rule: null });
});

test('resolveWeak gives the same answer on every call', () => {
  const tokens = tokenize('I have seen it');
  const first = resolveWeak('have', 1, tokens);
  assert.equal(first, true);
  for (let i = 0; i < 5; i++) assert.equal(resolveWeak('have', 1, tokens), first);
});

test('rules expose custom weak forms only where they compute one', () => {
  assert.equal(typeof new HaveRule().weakForm, 'function');
  assert.equal(typeof new MustRule().weakForm, 'function');
  assert.equal(defaultRules().filter(r => r.weakForm).length, 2);
});
