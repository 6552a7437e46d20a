/**
 * Manifest module exports
 */

export {
  MANIFEST_FILE_NAME,
  VERSION_FIELD,
  TITLE_FIELD,
  TAG_FIELD,
  type ManifestContent,
  type ManifestRecord,
  type ParsedManifest,
  type BrokenManifest,
  type ManifestScanOptions,
} from './types.js';

export { discoverManifests, isWithin, readManifest, scanManifests } from './scanner.js';
export { setManifestField, writeManifestAtomic } from './writer.js';
