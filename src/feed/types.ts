/**
 * Catalog feed types
 *
 * A feed source is one JSON file listing known-good packages. Entries that
 * carry the accepted tag, a version and at least one identifier populate the
 * feed index.
 */

import { extractFeedIdentifiers } from '../matching/identifier.js';
import { extractVersionFromTitle } from '../matching/version.js';

// =============================================================================
// Raw Feed Shapes
// =============================================================================

/**
 * A feed element as parsed. Fields read: `title`, `description`,
 * `page_url` (or `link`), `tag` (or `category`); anything else is ignored.
 */
export type RawFeedElement = Record<string, unknown>;

/** Object key under which a wrapped feed keeps its list */
export const FEED_LIST_KEYS = ['items'] as const;

// =============================================================================
// Feed Entry
// =============================================================================

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function firstText(...values: unknown[]): string {
  for (const value of values) {
    const candidate = text(value);
    if (candidate) return candidate;
  }
  return '';
}

/**
 * One catalog record with its derived version and identifiers
 */
export class FeedEntry {
  readonly title: string;
  readonly description: string;
  readonly pageUrl: string;
  readonly tag: string;
  /** Normalized dotted version, or null when the title carries none */
  readonly version: string | null;
  /** Uppercased identifiers, possibly empty */
  readonly identifiers: readonly string[];

  constructor(
    readonly source: string,
    raw: RawFeedElement
  ) {
    this.title = text(raw.title);
    this.description = text(raw.description);
    this.pageUrl = firstText(raw.page_url, raw.link);
    this.tag = firstText(raw.tag, raw.category);
    this.version = extractVersionFromTitle(this.title);
    this.identifiers = extractFeedIdentifiers(this.title, this.description, this.pageUrl);
  }

  /**
   * Whether the entry may contribute to the index
   */
  isAcceptable(acceptedTag: string): boolean {
    return this.tag === acceptedTag && this.version !== null && this.identifiers.length > 0;
  }
}

// =============================================================================
// Feed Index
// =============================================================================

/**
 * Lookup from (identifier, normalized version) to category tag
 *
 * Later writes to the same key replace earlier ones; no history is kept.
 */
export class FeedIndex {
  private readonly entries = new Map<string, string>();

  static key(identifier: string, version: string): string {
    return `${identifier.toUpperCase()}@${version}`;
  }

  /**
   * Record every identifier of an acceptable entry
   *
   * @returns number of keys written
   */
  add(entry: FeedEntry, acceptedTag: string): number {
    if (!entry.isAcceptable(acceptedTag) || entry.version === null) {
      return 0;
    }
    for (const identifier of entry.identifiers) {
      this.entries.set(FeedIndex.key(identifier, entry.version), entry.tag);
    }
    return entry.identifiers.length;
  }

  get(identifier: string, version: string): string | undefined {
    return this.entries.get(FeedIndex.key(identifier, version));
  }

  get size(): number {
    return this.entries.size;
  }
}

// =============================================================================
// Load Statistics
// =============================================================================

/**
 * Per-source outcome of loading a feed file
 */
export interface FeedSourceStats {
  /** File name of the source */
  source: string;
  /** Elements found in the list */
  elements: number;
  /** Elements that were not objects */
  skipped: number;
  /** Entries that passed the acceptance check */
  accepted: number;
  /** Keys written (an entry with two identifiers writes two) */
  keysWritten: number;
  /** Read or parse error text, if the source could not be used */
  error?: string;
}

/**
 * Result of building the index
 */
export interface FeedLoadResult {
  index: FeedIndex;
  sources: FeedSourceStats[];
}
