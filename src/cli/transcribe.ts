/**
 * Transcribe text from the command line.
 *
 * Usage: npx tsx src/cli/transcribe.ts --accent rp "There is a problem."
 */
import { loadConfig } from '../server/config.js';
import { createTranscriber } from '../server/services/transcriber.js';
import { parseCliArgs, USAGE, type CliArgs } from './args.js';

async function main() {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    console.error(USAGE);
    process.exit(1);
  }

  const { engine } = await createTranscriber(loadConfig());

  if (args.word) {
    console.log(JSON.stringify(engine.inspectWord(args.text), null, 2));
    return;
  }

  const result = engine.transcribe(args.text, {
    dialect: args.dialect,
    useWeakForms: args.useWeakForms,
    ignoreStress: args.ignoreStress,
  });

  console.log(result.ipa);
  for (const w of result.warnings) console.warn(`  warning: ${w}`);
  if (result.notFound.length > 0) console.log(`  not found: ${result.notFound.join(', ')}`);
}

main().catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
