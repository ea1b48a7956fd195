import { existsSync } from 'node:fs';
import { CmuLookup } from '../../lexicon/cmu.js';
import { LetterRuleFallback } from '../../lexicon/letterRules.js';
import { CompositeLookup, Lexicon, loadLexicon } from '../../lexicon/store.js';
import { createTranscriptionEngine, TranscriptionEngine } from '../../transcribe/index.js';
import type { LookupAdapter } from '../../types/lexicon.js';
import type { ServerConfig } from '../config.js';

export interface TranscriberInfo {
  lexiconPath: string;
  lexiconEntries: number;
  cmuLookup: boolean;
  letterRuleFallback: boolean;
}

export interface Transcriber {
  engine: TranscriptionEngine;
  info: TranscriberInfo;
}

/**
 * Build the engine the server uses: the JSON lexicon first, then CMU for
 * General American, with the letter-rule fallback when enabled.
 */
export async function createTranscriber(
  config: Pick<ServerConfig, 'lexiconPath' | 'cmuLookup' | 'letterRuleFallback'>,
): Promise<Transcriber> {
  let lexicon = new Lexicon();
  if (existsSync(config.lexiconPath)) {
    lexicon = await loadLexicon(config.lexiconPath);
  } else {
    console.warn(`[lexicon] WARNING: ${config.lexiconPath} not found; starting with an empty lexicon.`);
  }

  const adapters: LookupAdapter[] = [lexicon];
  if (config.cmuLookup) adapters.push(new CmuLookup());

  const engine = createTranscriptionEngine(new CompositeLookup(adapters), {
    fallback: config.letterRuleFallback ? new LetterRuleFallback() : undefined,
  });

  return {
    engine,
    info: {
      lexiconPath: config.lexiconPath,
      lexiconEntries: lexicon.size,
      cmuLookup: config.cmuLookup,
      letterRuleFallback: config.letterRuleFallback,
    },
  };
}
