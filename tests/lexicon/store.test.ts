import assert from 'node:assert/strict';
import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { fileURLToPath } from 'node:url';
import { CompositeLookup, Lexicon, loadLexicon } from '../../src/lexicon/store.js';
import { CmuLookup, lookupArpabet } from '../../src/lexicon/cmu.js';

const bundledLexicon = fileURLToPath(new URL('../../data/lexicon.json', import.meta.url));

test('Lexicon lookups are case-insensitive and per dialect', () => {
  const lexicon = new Lexicon({ Colour: { gb: '/ˈkʌl.ə/' } });
  assert.equal(lexicon.lookup('COLOUR', 'rp'), '/ˈkʌl.ə/');
  assert.equal(lexicon.lookup('colour', 'american'), null);
  assert.equal(lexicon.has('colour'), true);
  assert.equal(lexicon.size, 1);
});

test('loadLexicon reads the bundled lexicon', async () => {
  const lexicon = await loadLexicon(bundledLexicon);
  assert.equal(lexicon.size, 72);
  assert.equal(lexicon.lookup('have', 'rp'), '/ hæv, əv /');
  assert.equal(lexicon.lookup('have', 'american'), '/hæv/');
});

test('loadLexicon rejects an entry without pronunciations', async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'ipa-lexicon-'));
  const file = path.join(dir, 'bad.json');
  await writeFile(file, JSON.stringify({ entries: { blorf: {} } }), 'utf-8');

  await assert.rejects(() => loadLexicon(file), /Invalid lexicon .*bad\.json: entries\.blorf: entry needs at least one/);
});

test('CompositeLookup returns the first answer', () => {
  const first = new Lexicon({ car: { gb: '/kɑː/' } });
  const second = new Lexicon({ car: { us: '/kɑɹ/', gb: '/kɑːɹ/' } });
  const lookup = new CompositeLookup([first, second]);
  assert.equal(lookup.lookup('car', 'rp'), '/kɑː/');
  assert.equal(lookup.lookup('car', 'american'), '/kɑɹ/');
  assert.equal(lookup.lookup('bus', 'american'), null);
});

test('CmuLookup renders American entries only', () => {
  const cmu = new CmuLookup();
  assert.equal(lookupArpabet('Hello'), 'HH AH0 L OW1');
  assert.equal(cmu.lookup('hello', 'american'), 'həˈloʊ');
  assert.equal(cmu.lookup('hello', 'rp'), null);
  assert.equal(cmu.lookup('qzxv', 'american'), null);
});
