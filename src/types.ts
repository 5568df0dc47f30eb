/**
 * Type Definitions for the Hoarder → Linkwarden converter
 *
 * Source shapes are loose (everything optional, `unknown` where Hoarder
 * versions disagree) and get narrowed in hoarder-export.ts. Destination
 * shapes mirror what Linkwarden's backup importer reads.
 */

// ============================================
// Generic Result Type
// ============================================

export type Result<T, E = AppError> = { ok: true; value: T } | { ok: false; error: E };

export interface AppError {
  type: string;
  message: string;
  cause?: unknown;
}

// ============================================
// Hoarder Export (source)
// ============================================

export type HoarderContentType = 'link' | 'text' | 'asset';

export interface HoarderContent {
  type?: HoarderContentType | string;
  url?: unknown;
}

export interface HoarderBookmark {
  id?: string;
  createdAt?: unknown;
  title?: unknown;
  tags?: unknown;
  content?: HoarderContent | null;
  note?: unknown;
  url?: unknown;
}

export interface HoarderExport {
  bookmarks: unknown[];
}

/**
 * A link bookmark after validation, ready to be placed in a collection.
 */
export interface LinkRecord {
  title: string;
  url: string;
  description: string;
  tags: string[];
  createdAt: Date;
}

export interface CollectedLinks {
  links: LinkRecord[];
  /** Entries that were not links (notes, assets) */
  skipped: number;
  /** Reference time for entries without a usable timestamp */
  referenceTime: Date;
}

// ============================================
// Linkwarden Import (destination)
// ============================================

export interface LinkwardenTag {
  name: string;
}

export interface LinkwardenLink {
  id: number;
  name: string;
  type: 'url';
  description: string;
  createdById: number;
  collectionId: number;
  icon: null;
  iconWeight: null;
  color: null;
  url: string;
  clientSide: boolean;
  aiTagged: boolean;
  indexVersion: null;
  lastPreserved: null;
  importDate: string;
  createdAt: string;
  updatedAt: string;
  tags: LinkwardenTag[];
}

export interface LinkwardenCollection {
  id: number;
  name: string;
  description: string;
  icon: null;
  iconWeight: null;
  color: string | null;
  parentId: null;
  isPublic: boolean;
  ownerId: number;
  createdById: number;
  createdAt: string;
  updatedAt: string;
  rssSubscriptions: unknown[];
  links: LinkwardenLink[];
}

/**
 * Account-level settings Linkwarden expects around the collections.
 * Loaded from templates/linkwarden-user.json, so values stay `unknown`.
 */
export type LinkwardenUserSettings = Record<string, unknown>;

export interface LinkwardenPayload extends LinkwardenUserSettings {
  createdAt: string;
  updatedAt: string;
  lastPickedAt: string;
  collections: LinkwardenCollection[];
  pinnedLinks: unknown[];
  whitelistedUsers: unknown[];
}

// ============================================
// Converter options and results
// ============================================

export interface ConvertOptions {
  inputPath: string;
  outputPath: string;
  userId?: number;
  collectionColor?: string | null;
}

export interface ConvertSummary {
  links: number;
  skipped: number;
  collections: number;
  outputPath: string;
}

export type CliCommand = { kind: 'help' } | { kind: 'convert'; options: Required<ConvertOptions> };
