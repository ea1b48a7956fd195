import { createServer } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createTranscriber } from './services/transcriber.js';

async function main() {
  const config = loadConfig();
  const transcriber = await createTranscriber(config);

  // Boot log: lexicon info
  const { info } = transcriber;
  console.log(`[boot] LEXICON_PATH = ${info.lexiconPath} (${info.lexiconEntries} entries)`);
  console.log(`[boot] CMU_LOOKUP = ${info.cmuLookup}, LETTER_RULE_FALLBACK = ${info.letterRuleFallback}`);
  if (!config.authToken) {
    console.warn('[boot] WARNING: AUTH_TOKEN not set; transcription routes are open.');
  }

  const server = createServer(createApp(transcriber, config));
  server.listen(config.port, config.host, () => {
    console.log(`IPA transcription API running at http://${config.host}:${config.port}`);
  });
}

main().catch((err: unknown) => {
  console.error('[boot] Failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
});
