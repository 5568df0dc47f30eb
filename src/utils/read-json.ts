/**
 * JSON File Reading
 *
 * Reads the source export and sorts failures into "could not read" and
 * "could not parse", which the CLI reports differently.
 */

import { readFile } from 'fs/promises';
import { ConvertError, isDirectoryError, isNotFoundError, isPermissionError, toErrorMessage } from './errors.js';

/**
 * Read and parse a JSON file.
 *
 * @throws ConvertError `input-io` when the file is missing or unreadable,
 *   `parse` when it is empty, not valid UTF-8 or not valid JSON
 */
export async function readJsonFile(filepath: string): Promise<unknown> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filepath);
  } catch (e) {
    if (isNotFoundError(e)) {
      throw new ConvertError('input-io', `Input file not found: ${filepath}`, { cause: e });
    }
    if (isPermissionError(e)) {
      throw new ConvertError('input-io', `Permission denied reading ${filepath}`, { cause: e });
    }
    if (isDirectoryError(e)) {
      throw new ConvertError('input-io', `Input path is a directory: ${filepath}`, { cause: e });
    }
    throw new ConvertError('input-io', `Could not read ${filepath}: ${toErrorMessage(e)}`, { cause: e });
  }

  // fatal: malformed UTF-8 is an error, not U+FFFD; a leading BOM is dropped
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (decodeError) {
    throw new ConvertError('parse', `Invalid JSON in ${filepath}: file is not valid UTF-8`, { cause: decodeError });
  }

  if (!text.trim()) {
    throw new ConvertError('parse', `Invalid JSON in ${filepath}: file is empty`);
  }

  try {
    return JSON.parse(text);
  } catch (parseError) {
    throw new ConvertError('parse', `Invalid JSON in ${filepath}: ${toErrorMessage(parseError)}`, {
      cause: parseError,
    });
  }
}
