/**
 * Matching primitives: version normalization and identifier extraction
 */

export {
  normalizeVersion,
  normalizeVersionString,
  formatVersion,
  versionsEqual,
  extractVersionFromTitle,
  type VersionTriple,
} from './version.js';

export {
  extractIdentifier,
  extractManifestIdentifier,
  extractFeedIdentifiers,
  labeledDescriptionExtractor,
  folderNameExtractor,
  titleWordExtractor,
  slugExtractor,
  DEFAULT_EXTRACTORS,
  MANIFEST_EXTRACTORS,
  UNKNOWN_IDENTIFIER,
  ABSENT,
  type IdentifierMatch,
  type IdentifierSource,
  type IdentifierInput,
  type IdentifierExtractor,
} from './identifier.js';
