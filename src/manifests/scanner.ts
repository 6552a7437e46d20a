/**
 * Manifest scanner
 *
 * Discovers every manifest.json under the addons root and parses each one into
 * a ManifestRecord. Discovery finishes before any record is handed out so that
 * relocating a directory cannot disturb the directory walk.
 */

import { readdirSync, readFileSync, type Dirent } from 'node:fs';
import { basename, dirname, join, resolve, sep } from 'node:path';
import { extractManifestIdentifier } from '../matching/identifier.js';
import {
  MANIFEST_FILE_NAME,
  TAG_FIELD,
  TITLE_FIELD,
  VERSION_FIELD,
  type ManifestContent,
  type ManifestRecord,
  type ManifestScanOptions,
} from './types.js';

/**
 * Whether a resolved path is the root itself or lies below it
 */
export function isWithin(path: string, root: string): boolean {
  return path === root || path.startsWith(root.endsWith(sep) ? root : root + sep);
}

function isRecord(value: unknown): value is ManifestContent {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find manifest files below a root, sorted by path
 *
 * Symlinked directories are not followed. An excluded directory only applies
 * when it lies strictly below the root; one that contains the root is ignored.
 */
export function discoverManifests(root: string, options: ManifestScanOptions = {}): string[] {
  const start = resolve(root);
  const excluded = (options.exclude ?? []).map((dir) => resolve(dir)).filter((dir) => !isWithin(start, dir));
  const found: string[] = [];
  const pending = [start];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;
    if (excluded.some((ex) => isWithin(dir, ex))) continue;

    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      options.onUnreadableDirectory?.(dir, err instanceof Error ? err : new Error(String(err)));
      continue;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(path);
      } else if (entry.isFile() && entry.name === MANIFEST_FILE_NAME) {
        found.push(path);
      }
    }
  }

  return found.sort();
}

/**
 * Read and classify a single manifest file
 */
export function readManifest(manifestPath: string): ManifestRecord {
  const directory = dirname(manifestPath);
  const location = { manifestPath, directory, folderName: basename(directory) };

  let source: string;
  let parsed: unknown;
  try {
    source = readFileSync(manifestPath, 'utf-8');
    parsed = JSON.parse(source);
  } catch (err) {
    return { ...location, status: 'bad_json', error: err instanceof Error ? err.message : String(err) };
  }

  if (!isRecord(parsed)) {
    return { ...location, status: 'bad_json', error: 'manifest is not a JSON object' };
  }

  const rawVersion = parsed[VERSION_FIELD];
  const version = typeof rawVersion === 'string' ? rawVersion.trim() : '';
  const rawTitle = parsed[TITLE_FIELD];

  return {
    ...location,
    status: 'parsed',
    source,
    content: parsed,
    declaredVersion: version || null,
    currentTag: parsed[TAG_FIELD],
    identifier: extractManifestIdentifier(location.folderName, typeof rawTitle === 'string' ? rawTitle : undefined),
  };
}

/**
 * Discover and parse every manifest under a root as one batch
 */
export function scanManifests(root: string, options: ManifestScanOptions = {}): ManifestRecord[] {
  return discoverManifests(root, options).map(readManifest);
}
