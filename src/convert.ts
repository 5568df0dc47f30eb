#!/usr/bin/env node
/**
 * Convert CLI
 *
 * One-shot conversion of a Hoarder export into a Linkwarden import file.
 */

import { env } from './env.js';

import { parseConvertArgs, USAGE } from './cli-args.js';
import { convertExport, describeFailure } from './converter.js';
import { toErrorStack } from './utils/errors.js';

async function main(): Promise<void> {
  const parsed = parseConvertArgs(process.argv);

  if (!parsed.ok) {
    console.error(`Error: ${parsed.error.message}\n`);
    console.error(USAGE);
    process.exit(2);
    return;
  }

  if (parsed.value.kind === 'help') {
    console.log(USAGE);
    process.exit(0);
    return;
  }

  const summary = await convertExport(parsed.value.options);
  console.log(
    `Converted ${summary.links} bookmarks into ${summary.collections} Linkwarden collection(s) -> ${summary.outputPath}`
  );
  if (summary.skipped > 0) {
    console.log(`Skipped ${summary.skipped} non-link bookmark(s)`);
  }
  process.exit(0);
}

main().catch((error) => {
  console.error(`Error: ${describeFailure(error)}`);
  if (env.DEBUG) {
    const stack = toErrorStack(error);
    if (stack) console.error(stack);
  }
  process.exit(1);
});
