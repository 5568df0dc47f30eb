/**
 * Linkwarden Payload Builder
 *
 * Wraps the collected links in a single collection inside the account
 * object Linkwarden's backup importer reads.
 */

import { readFile } from 'fs/promises';
import { config } from './config.js';
import { LINKWARDEN_USER_TEMPLATE } from './paths.js';
import type {
  CollectedLinks,
  LinkRecord,
  LinkwardenCollection,
  LinkwardenLink,
  LinkwardenPayload,
  LinkwardenUserSettings,
} from './types.js';
import { toErrorMessage } from './utils/errors.js';
import { toIsoTimestamp } from './utils/timestamp.js';

export interface PayloadOptions {
  userId: number;
  collectionColor: string | null;
  userSettings: LinkwardenUserSettings;
}

/**
 * Load the account settings template shipped in templates/.
 */
export async function loadUserSettings(filepath: string = LINKWARDEN_USER_TEMPLATE): Promise<LinkwardenUserSettings> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filepath, 'utf-8'));
  } catch (e) {
    throw new Error(`Could not load Linkwarden template ${filepath}: ${toErrorMessage(e)}`, { cause: e });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Linkwarden template ${filepath} must contain a JSON object`);
  }
  return { ...parsed };
}

export function buildLink(record: LinkRecord, id: number, collectionId: number, userId: number): LinkwardenLink {
  const created = toIsoTimestamp(record.createdAt);
  return {
    id,
    name: record.title,
    type: 'url',
    description: record.description,
    createdById: userId,
    collectionId,
    icon: null,
    iconWeight: null,
    color: null,
    url: record.url,
    clientSide: false,
    aiTagged: false,
    indexVersion: null,
    lastPreserved: null,
    importDate: created,
    createdAt: created,
    updatedAt: created,
    tags: record.tags.map((name) => ({ name })),
  };
}

function earliest(records: LinkRecord[], fallback: Date): Date {
  let result: Date | null = null;
  for (const record of records) {
    if (!result || record.createdAt.getTime() < result.getTime()) {
      result = record.createdAt;
    }
  }
  return result ?? fallback;
}

export function buildCollection(collected: CollectedLinks, userId: number, color: string | null): LinkwardenCollection {
  const collectionId = config.collection.id;
  const created = toIsoTimestamp(earliest(collected.links, collected.referenceTime));

  return {
    id: collectionId,
    name: config.collection.name,
    description: '',
    icon: null,
    iconWeight: null,
    color,
    parentId: null,
    isPublic: false,
    ownerId: userId,
    createdById: userId,
    createdAt: created,
    updatedAt: created,
    rssSubscriptions: [],
    links: collected.links.map((record, index) => buildLink(record, index + 1, collectionId, userId)),
  };
}

/**
 * Build the complete Linkwarden import document.
 */
export function buildLinkwardenPayload(collected: CollectedLinks, options: PayloadOptions): LinkwardenPayload {
  const now = toIsoTimestamp(collected.referenceTime);
  return {
    ...options.userSettings,
    lastPickedAt: now,
    createdAt: now,
    updatedAt: now,
    collections: [buildCollection(collected, options.userId, options.collectionColor)],
    pinnedLinks: [],
    whitelistedUsers: [],
  };
}
