import assert from 'node:assert/strict';
import type { Server } from 'node:http';
import path from 'node:path';
import { after, before, describe, test } from 'node:test';
import { fileURLToPath } from 'node:url';
import { createApp, type AppConfig } from '../../src/server/app.js';
import { createTranscriber, type Transcriber } from '../../src/server/services/transcriber.js';
import { Lexicon } from '../../src/lexicon/store.js';
import { TranscriptionEngine } from '../../src/transcribe/engine.js';

const bundledLexicon = fileURLToPath(new URL('../../data/lexicon.json', import.meta.url));

function testTranscriber(): Transcriber {
  const lexicon = new Lexicon({
    i: { us: '/aɪ/', gb: '/aɪ/' },
    have: { us: '/hæv/', gb: '/ hæv, əv /' },
    seen: { us: '/sin/', gb: '/siːn/' },
    it: { us: '/ɪt/', gb: '/ɪt/' },
  });
  return {
    engine: new TranscriptionEngine({ lookup: lexicon }),
    info: { lexiconPath: 'memory', lexiconEntries: lexicon.size, cmuLookup: false, letterRuleFallback: false },
  };
}

const baseConfig: AppConfig = { rateLimitRpm: 100, corsOrigins: [], version: 'test' };

async function startServer(config: AppConfig): Promise<{ server: Server; baseUrl: string }> {
  const app = createApp(testTranscriber(), config);
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server is not listening on a TCP port');
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

function postJson(url: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

async function jsonBody(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  assert.ok(typeof body === 'object' && body !== null && !Array.isArray(body));
  return Object.fromEntries(Object.entries(body));
}

describe('open server', () => {
  let server: Server;
  let baseUrl = '';

  before(async () => {
    ({ server, baseUrl } = await startServer(baseConfig));
  });

  after(() => closeServer(server));

  test('GET /api/health reports the lexicon', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    assert.equal(res.status, 200);
    const body = await jsonBody(res);
    assert.equal(body.ok, true);
    assert.equal(body.version, 'test');
    assert.equal(body.lexiconEntries, 4);
    assert.equal(body.cmuLookup, false);
  });

  test('GET / lists the endpoints', async () => {
    const res = await fetch(`${baseUrl}/`);
    assert.equal(res.status, 200);
    const body = await jsonBody(res);
    assert.equal(body.service, 'ipa-transcriber');
    assert.equal(body.version, 'test');
    assert.deepEqual(body.endpoints, [
      { method: 'GET', path: '/api/health', description: 'Service status and lexicon size' },
      { method: 'POST', path: '/api/transcribe', description: 'Transcribe text to IPA' },
      { method: 'GET', path: '/api/ipa', description: 'Both dialects of a single word' },
    ]);
  });

  test('POST /api/transcribe returns IPA with defaults filled in', async () => {
    const res = await postJson(`${baseUrl}/api/transcribe`, { text: 'I have seen it' });
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
      ok: true,
      text: 'I have seen it',
      accent: 'american',
      ipa: 'aɪ hæv sin ɪt',
      notFound: [],
      warnings: [],
      options: { useWeakForms: true, ignoreStress: false },
    });
  });

  test('POST /api/transcribe accepts accent aliases', async () => {
    const res = await postJson(`${baseUrl}/api/transcribe`, { text: 'I have seen it', accent: 'GB' });
    const body = await jsonBody(res);
    assert.equal(body.accent, 'rp');
    assert.equal(body.ipa, 'aɪ əv siːn ɪt');
  });

  test('POST /api/transcribe lists unknown words', async () => {
    const res = await postJson(`${baseUrl}/api/transcribe`, { text: 'I have blorf', accent: 'rp' });
    const body = await jsonBody(res);
    assert.equal(body.ipa, 'aɪ hæv blorf');
    assert.deepEqual(body.notFound, ['blorf']);
  });

  test('POST /api/transcribe rejects bad input', async () => {
    const empty = await postJson(`${baseUrl}/api/transcribe`, { text: '   ' });
    assert.equal(empty.status, 400);
    assert.deepEqual(await empty.json(), { ok: false, error: 'text: Text cannot be empty' });

    const accent = await postJson(`${baseUrl}/api/transcribe`, { text: 'hi', accent: 'french' });
    assert.equal(accent.status, 400);
    assert.deepEqual(await accent.json(), { ok: false, error: "accent: Accent must be 'american' or 'rp'" });

    const missing = await postJson(`${baseUrl}/api/transcribe`, {});
    assert.equal(missing.status, 400);
    assert.deepEqual(await missing.json(), { ok: false, error: 'text: Required' });
  });

  test('malformed JSON is a client error', async () => {
    const res = await fetch(`${baseUrl}/api/transcribe`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"text":',
    });
    assert.equal(res.status, 400);
    assert.equal((await jsonBody(res)).ok, false);
  });

  test('GET /api/ipa shows both dialects', async () => {
    const res = await fetch(`${baseUrl}/api/ipa?word=Have`);
    assert.deepEqual(await res.json(), {
      ok: true,
      word: 'Have',
      found: true,
      american: 'hæv',
      rp: { strong: 'hæv', weak: 'əv' },
    });
  });

  test('GET /api/ipa needs a word', async () => {
    const res = await fetch(`${baseUrl}/api/ipa?word=%20`);
    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), { ok: false, error: 'word: Missing "word" query parameter' });
  });

  test('unknown routes are 404', async () => {
    const res = await fetch(`${baseUrl}/api/nope`);
    assert.equal(res.status, 404);
    assert.deepEqual(await res.json(), { ok: false, error: 'Not found' });
  });
});

describe('guarded server', () => {
  let server: Server;
  let baseUrl = '';

  before(async () => {
    ({ server, baseUrl } = await startServer({ ...baseConfig, authToken: 'test-secret', rateLimitRpm: 2 }));
  });

  after(() => closeServer(server));

  test('health stays public', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    assert.equal(res.status, 200);
  });

  test('requests without the token are refused', async () => {
    const res = await postJson(`${baseUrl}/api/transcribe`, { text: 'it' });
    assert.equal(res.status, 401);
    assert.deepEqual(await res.json(), { ok: false, error: 'Unauthorized' });
  });

  test('the token unlocks the API until the rate limit trips', async () => {
    const auth = { authorization: 'Bearer test-secret' };
    assert.equal((await postJson(`${baseUrl}/api/transcribe`, { text: 'it' }, auth)).status, 200);
    assert.equal((await fetch(`${baseUrl}/api/ipa?word=it&token=test-secret`)).status, 200);

    const limited = await postJson(`${baseUrl}/api/transcribe`, { text: 'it' }, auth);
    assert.equal(limited.status, 429);
    assert.deepEqual(await limited.json(), { ok: false, error: 'Too many requests. Try again later.' });
  });
});

describe('createTranscriber', () => {
  test('loads the bundled lexicon ahead of CMU', async () => {
    const { engine, info } = await createTranscriber({
      lexiconPath: bundledLexicon,
      cmuLookup: true,
      letterRuleFallback: false,
    });
    assert.equal(info.lexiconEntries, 72);
    assert.equal(engine.transcribe('hello', { dialect: 'american' }).ipa, 'həˈloʊ');
    assert.equal(engine.lookupRaw('have', 'american'), '/hæv/');
  });

  test('starts empty when the lexicon file is missing', async () => {
    const { engine, info } = await createTranscriber({
      lexiconPath: path.join(path.dirname(bundledLexicon), 'missing.json'),
      cmuLookup: false,
      letterRuleFallback: true,
    });
    assert.equal(info.lexiconEntries, 0);
    const result = engine.transcribe('shape');
    assert.equal(result.ipa, 'ʃeɪp');
    assert.deepEqual(result.warnings, ['"shape" not in lexicon, using letter-rules fallback']);
  });
});
