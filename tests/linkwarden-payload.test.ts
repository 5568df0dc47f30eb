import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  buildCollection,
  buildLink,
  buildLinkwardenPayload,
  loadUserSettings,
} from '../src/linkwarden-payload.js';
import type { CollectedLinks, LinkRecord } from '../src/types.js';
import { withWorkDir } from './helpers/hoarder.js';

function record(url: string, createdAt: string, overrides: Partial<LinkRecord> = {}): LinkRecord {
  return {
    title: url,
    url,
    description: '',
    tags: [],
    createdAt: new Date(createdAt),
    ...overrides,
  };
}

function collected(links: LinkRecord[], referenceTime = '2024-06-01T00:00:00.000Z'): CollectedLinks {
  return { links, skipped: 0, referenceTime: new Date(referenceTime) };
}

describe('buildLink', () => {
  it('maps a link record onto a Linkwarden link', () => {
    const link = buildLink(
      record('https://a.com', '2024-05-01T10:00:00.000Z', { title: 'A', description: 'note', tags: ['x', 'y'] }),
      3,
      1,
      7
    );

    expect(link).toEqual({
      id: 3,
      name: 'A',
      type: 'url',
      description: 'note',
      createdById: 7,
      collectionId: 1,
      icon: null,
      iconWeight: null,
      color: null,
      url: 'https://a.com',
      clientSide: false,
      aiTagged: false,
      indexVersion: null,
      lastPreserved: null,
      importDate: '2024-05-01T10:00:00.000Z',
      createdAt: '2024-05-01T10:00:00.000Z',
      updatedAt: '2024-05-01T10:00:00.000Z',
      tags: [{ name: 'x' }, { name: 'y' }],
    });
  });
});

describe('buildCollection', () => {
  it('creates the single import collection with sequential link ids', () => {
    const collection = buildCollection(
      collected([
        record('https://old.test', '2023-01-01T00:00:00.000Z'),
        record('https://new.test', '2024-01-01T00:00:00.000Z'),
      ]),
      5,
      '#0ea5e9'
    );

    expect(collection.id).toBe(1);
    expect(collection.name).toBe('Hoarder Import');
    expect(collection.ownerId).toBe(5);
    expect(collection.createdById).toBe(5);
    expect(collection.color).toBe('#0ea5e9');
    expect(collection.createdAt).toBe('2023-01-01T00:00:00.000Z');
    expect(collection.updatedAt).toBe('2023-01-01T00:00:00.000Z');
    expect(collection.links.map((link) => [link.id, link.url, link.collectionId])).toEqual([
      [1, 'https://old.test', 1],
      [2, 'https://new.test', 1],
    ]);
  });

  it('dates the collection by its earliest link, not its first', () => {
    const collection = buildCollection(
      collected([
        record('https://b.test', '2024-02-01T00:00:00.000Z'),
        record('https://a.test', '2022-02-01T00:00:00.000Z'),
      ]),
      1,
      null
    );

    expect(collection.createdAt).toBe('2022-02-01T00:00:00.000Z');
  });

  it('uses the reference time for an empty collection', () => {
    const collection = buildCollection(collected([], '2024-06-01T00:00:00.000Z'), 1, null);

    expect(collection.links).toEqual([]);
    expect(collection.color).toBeNull();
    expect(collection.createdAt).toBe('2024-06-01T00:00:00.000Z');
  });
});

describe('buildLinkwardenPayload', () => {
  it('wraps one collection in the account settings', () => {
    const payload = buildLinkwardenPayload(collected([record('https://a.com', '2024-05-01T10:00:00.000Z')]), {
      userId: 1,
      collectionColor: null,
      userSettings: { locale: 'en', theme: 'dark', createdAt: null, collections: [] },
    });

    expect(payload.locale).toBe('en');
    expect(payload.theme).toBe('dark');
    expect(payload.createdAt).toBe('2024-06-01T00:00:00.000Z');
    expect(payload.updatedAt).toBe('2024-06-01T00:00:00.000Z');
    expect(payload.lastPickedAt).toBe('2024-06-01T00:00:00.000Z');
    expect(payload.collections).toHaveLength(1);
    expect(payload.collections[0].links).toHaveLength(1);
    expect(payload.pinnedLinks).toEqual([]);
    expect(payload.whitelistedUsers).toEqual([]);
  });

  it('keeps the template key order', () => {
    const payload = buildLinkwardenPayload(collected([]), {
      userId: 1,
      collectionColor: null,
      userSettings: { name: '', createdAt: null, collections: [], theme: 'dark' },
    });

    expect(Object.keys(payload)).toEqual([
      'name',
      'createdAt',
      'collections',
      'theme',
      'lastPickedAt',
      'updatedAt',
      'pinnedLinks',
      'whitelistedUsers',
    ]);
  });
});

describe('loadUserSettings', () => {
  it('loads the bundled template', async () => {
    const settings = await loadUserSettings();

    expect(settings.locale).toBe('en');
    expect(settings.linksRouteTo).toBe('ORIGINAL');
    expect(settings.collections).toEqual([]);
  });

  it('rejects a template that is not an object', async () => {
    await withWorkDir(async (dir) => {
      const filepath = path.join(dir, 'template.json');
      await writeFile(filepath, '[]');

      await expect(loadUserSettings(filepath)).rejects.toThrow(`Linkwarden template ${filepath} must contain a JSON object`);
    });
  });

  it('reports a missing template', async () => {
    await expect(loadUserSettings('/nonexistent/template.json')).rejects.toThrow(
      'Could not load Linkwarden template /nonexistent/template.json'
    );
  });
});
