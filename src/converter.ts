/**
 * Export Converter
 *
 * Hoarder export file in, Linkwarden import file out.
 */

import { config } from './config.js';
import { collectLinks } from './hoarder-export.js';
import { buildLinkwardenPayload, loadUserSettings } from './linkwarden-payload.js';
import type { ConvertOptions, ConvertSummary } from './types.js';
import { ConvertError, isConvertError, toErrorMessage } from './utils/errors.js';
import { readJsonFile } from './utils/read-json.js';
import { writeJsonAtomic } from './utils/write-json-atomic.js';

async function writeOutput(outputPath: string, payload: unknown): Promise<void> {
  try {
    await writeJsonAtomic(outputPath, payload, {
      mode: config.output.fileMode,
      indent: config.output.indent,
      asciiOnly: config.output.asciiOnly,
    });
  } catch (e) {
    throw new ConvertError('output-io', `Could not write ${outputPath}: ${toErrorMessage(e)}`, { cause: e });
  }
}

export async function convertExport(options: ConvertOptions): Promise<ConvertSummary> {
  const userId = options.userId ?? config.defaults.userId;
  const collectionColor = options.collectionColor ?? config.defaults.collectionColor;

  const source = await readJsonFile(options.inputPath);
  const collected = collectLinks(source);

  if (collected.links.length === 0) {
    console.warn(`[Convert] No link bookmarks found in ${options.inputPath}; writing an empty collection`);
  }

  const userSettings = await loadUserSettings();
  const payload = buildLinkwardenPayload(collected, { userId, collectionColor, userSettings });

  await writeOutput(options.outputPath, payload);

  return {
    links: collected.links.length,
    skipped: collected.skipped,
    collections: payload.collections.length,
    outputPath: options.outputPath,
  };
}

export function describeFailure(e: unknown): string {
  if (isConvertError(e)) {
    return e.message;
  }
  return `Unexpected failure: ${toErrorMessage(e)}`;
}
