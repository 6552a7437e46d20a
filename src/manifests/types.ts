/**
 * Installed package manifest types
 */

import type { IdentifierMatch } from '../matching/identifier.js';

/** File name that marks a package directory */
export const MANIFEST_FILE_NAME = 'manifest.json';

/** Manifest field holding the declared package version */
export const VERSION_FIELD = 'package_version';

/** Manifest field used as a fallback identifier source */
export const TITLE_FIELD = 'title';

/** Manifest field being reconciled against the feed */
export const TAG_FIELD = 'simType';

/**
 * Parsed manifest body. Only the fields above are read; the rest is carried
 * through untouched on rewrite.
 */
export type ManifestContent = Record<string, unknown>;

interface ManifestLocation {
  /** Absolute path to manifest.json */
  manifestPath: string;
  /** Directory that owns the manifest (the package directory) */
  directory: string;
  /** Base name of the package directory */
  folderName: string;
}

/**
 * A manifest that parsed as a JSON object
 */
export interface ParsedManifest extends ManifestLocation {
  status: 'parsed';
  /** File text as read; rewrites patch it rather than reserializing content */
  source: string;
  content: ManifestContent;
  /** Trimmed package_version, or null when missing, blank or not a string */
  declaredVersion: string | null;
  /** Current simType value as found (any JSON value, undefined if absent) */
  currentTag: unknown;
  /** Best identifier from folder name, then title */
  identifier: IdentifierMatch;
}

/**
 * A manifest that could not be read or did not parse to an object
 */
export interface BrokenManifest extends ManifestLocation {
  status: 'bad_json';
  /** Read or parse error text */
  error: string;
}

export type ManifestRecord = ParsedManifest | BrokenManifest;

/**
 * Options for manifest discovery
 */
export interface ManifestScanOptions {
  /** Directories whose subtrees are never scanned */
  exclude?: string[];
  /** Called for directories that cannot be listed */
  onUnreadableDirectory?: (path: string, error: Error) => void;
}
