/**
 * Atomic JSON File Writing
 *
 * The output path either keeps its previous content or receives the whole
 * new document, never a partial write.
 */

import { existsSync } from 'fs';
import { chmod, mkdir, rename, unlink, writeFile } from 'fs/promises';
import path from 'path';

interface WriteOptions {
  /** File mode (permissions) to set. Default: 0o644 */
  mode?: number;
  /** Whether to create parent directories. Default: true */
  createDir?: boolean;
  /** Indentation passed to JSON.stringify. Default: 2 */
  indent?: number;
  /** Escape every non-ASCII character as \uXXXX. Default: false */
  asciiOnly?: boolean;
}

/**
 * Serialize data the way it will land on disk.
 */
export function serializeJson(data: unknown, options: Pick<WriteOptions, 'indent' | 'asciiOnly'> = {}): string {
  const { indent = 2, asciiOnly = false } = options;
  const json = JSON.stringify(data, null, indent);
  if (!asciiOnly) {
    return json;
  }
  // Non-ASCII only occurs inside string literals
  return json.replace(/[\u0080-\uffff]/g, (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

/**
 * Write JSON to a file atomically.
 *
 * Uses write-to-temp-then-rename. The temp file sits in the destination
 * directory so the rename never crosses filesystems.
 */
export async function writeJsonAtomic(filepath: string, data: unknown, options: WriteOptions = {}): Promise<void> {
  const { mode = 0o644, createDir = true } = options;

  const dir = path.dirname(filepath);
  if (createDir && !existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }

  const tempPath = `${filepath}.tmp.${process.pid}.${Date.now()}`;

  try {
    const json = serializeJson(data, options);
    await writeFile(tempPath, json, { encoding: 'utf-8' });
    await chmod(tempPath, mode);
    await rename(tempPath, filepath);
  } catch (e) {
    try {
      await unlink(tempPath);
    } catch {
      // temp file may never have been created
    }
    throw e;
  }
}
