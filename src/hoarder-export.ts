/**
 * Hoarder Export Reader
 *
 * Narrows the parsed export document into link records. Structural
 * problems become `schema` errors naming the offending entry; entries that
 * are notes or uploaded assets are counted and skipped.
 */

import { config } from './config.js';
import type { CollectedLinks, HoarderBookmark, HoarderExport, LinkRecord } from './types.js';
import { ConvertError } from './utils/errors.js';
import { parseTimestamp } from './utils/timestamp.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeEntry(index: number, entry: HoarderBookmark): string {
  return typeof entry.id === 'string' ? `bookmarks[${index}] (id ${entry.id})` : `bookmarks[${index}]`;
}

/**
 * Check the top-level shape of a Hoarder export.
 */
export function assertHoarderExport(data: unknown): asserts data is HoarderExport {
  if (!isRecord(data) || !('bookmarks' in data)) {
    throw new ConvertError('schema', "The Hoarder export does not contain a 'bookmarks' key.");
  }
  if (!Array.isArray(data.bookmarks)) {
    throw new ConvertError('schema', "'bookmarks' should be a list in the Hoarder export.");
  }
}

function toBookmark(entry: unknown, index: number): HoarderBookmark {
  if (!isRecord(entry)) {
    throw new ConvertError('schema', `bookmarks[${index}] should be an object.`);
  }
  const content = entry.content;
  return {
    id: typeof entry.id === 'string' ? entry.id : undefined,
    createdAt: entry.createdAt,
    title: entry.title,
    tags: entry.tags,
    content: isRecord(content)
      ? { type: typeof content.type === 'string' ? content.type : undefined, url: content.url }
      : null,
    note: entry.note,
    url: entry.url,
  };
}

/**
 * Hoarder marks notes and uploads with a content type other than "link".
 * Entries without a content type are treated as links.
 */
export function isLinkBookmark(bookmark: HoarderBookmark): boolean {
  const type = bookmark.content?.type;
  return type === undefined || type === 'link';
}

function readUrl(bookmark: HoarderBookmark, label: string): string {
  const url = bookmark.content?.url ?? bookmark.url;
  if (typeof url !== 'string' || !url) {
    throw new ConvertError('schema', `${label} is a link bookmark without a url.`);
  }
  return url;
}

function readTitle(bookmark: HoarderBookmark, url: string, label: string): string {
  const { title } = bookmark;
  if (title === undefined || title === null || title === '') {
    return url;
  }
  if (typeof title !== 'string') {
    throw new ConvertError('schema', `${label} has a non-string title.`);
  }
  return title;
}

/**
 * Tags are copied verbatim: same strings, same order, duplicates kept.
 */
function readTags(bookmark: HoarderBookmark, label: string): string[] {
  const { tags } = bookmark;
  if (tags === undefined || tags === null) {
    return [];
  }
  if (!Array.isArray(tags)) {
    throw new ConvertError('schema', `${label} has 'tags' that is not a list.`);
  }
  const result: string[] = [];
  for (const tag of tags) {
    if (typeof tag !== 'string') {
      throw new ConvertError('schema', `${label} has a tag that is not a string.`);
    }
    result.push(tag);
  }
  return result;
}

function readDescription(bookmark: HoarderBookmark): string {
  return typeof bookmark.note === 'string' ? bookmark.note : '';
}

/**
 * The latest valid timestamp in the export, so that output never depends
 * on the wall clock.
 */
export function findReferenceTime(bookmarks: HoarderBookmark[]): Date {
  let latest: Date | null = null;
  for (const bookmark of bookmarks) {
    const created = parseTimestamp(bookmark.createdAt);
    if (created && (!latest || created.getTime() > latest.getTime())) {
      latest = created;
    }
  }
  return latest ?? new Date(config.epochFallback);
}

/**
 * Validate a parsed export and collect its link bookmarks, oldest first.
 */
export function collectLinks(data: unknown): CollectedLinks {
  assertHoarderExport(data);

  const bookmarks = data.bookmarks.map(toBookmark);
  const referenceTime = findReferenceTime(bookmarks);
  const links: LinkRecord[] = [];
  let skipped = 0;

  // Hoarder exports newest first
  for (let index = bookmarks.length - 1; index >= 0; index -= 1) {
    const bookmark = bookmarks[index];
    if (!isLinkBookmark(bookmark)) {
      skipped += 1;
      continue;
    }

    const label = describeEntry(index, bookmark);
    const url = readUrl(bookmark, label);
    links.push({
      title: readTitle(bookmark, url, label),
      url,
      description: readDescription(bookmark),
      tags: readTags(bookmark, label),
      createdAt: parseTimestamp(bookmark.createdAt) ?? referenceTime,
    });
  }

  return { links, skipped, referenceTime };
}
