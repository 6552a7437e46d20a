/**
 * Facility identifier extraction
 *
 * Identifiers are 4-letter alphabetic tokens (airport ICAO codes) pulled out
 * of free text. Several heuristics exist with a fixed priority; each one is an
 * extractor strategy and callers run an ordered list of them.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Where an identifier was found
 */
export type IdentifierSource = 'description' | 'folder' | 'title' | 'slug';

/**
 * Result of running one extractor
 */
export type IdentifierMatch =
  | { kind: 'found'; identifier: string; source: IdentifierSource }
  | { kind: 'absent' };

/**
 * Text available to the extractors. Every field is optional; an extractor
 * whose field is missing reports absent.
 */
export interface IdentifierInput {
  description?: string;
  folderName?: string;
  title?: string;
  slug?: string;
}

/**
 * A single extraction heuristic
 */
export interface IdentifierExtractor {
  source: IdentifierSource;
  /** First match only */
  extract(input: IdentifierInput): IdentifierMatch;
  /** Every distinct match, uppercased, in order of appearance */
  extractAll(input: IdentifierInput): string[];
}

// =============================================================================
// Patterns
// =============================================================================

/** "ICAO: KLAX" style label in descriptive text */
const LABELED_PATTERN = /ICAO:\s*([A-Za-z]{4})/gi;

/** "...-vtbu-..." inside a folder name */
const FOLDER_PATTERN = /(?:^|[-_ ])([A-Za-z]{4})(?=$|[-_ ])/g;

/** Any standalone 4-letter word */
const WORD_PATTERN = /\b([A-Za-z]{4})\b/g;

/** "/klax-..." inside a URL or slug */
const SLUG_PATTERN = /(?:^|[-_/])([A-Za-z]{4})(?=[-_/]|$)/g;

export const ABSENT: IdentifierMatch = { kind: 'absent' };

/** Shown in reports when no identifier could be derived */
export const UNKNOWN_IDENTIFIER = '????';

// =============================================================================
// Strategies
// =============================================================================

function collect(pattern: RegExp, text: string | undefined): string[] {
  if (!text) return [];
  const seen = new Set<string>();
  for (const match of text.matchAll(pattern)) {
    seen.add(match[1].toUpperCase());
  }
  return [...seen];
}

function patternExtractor(
  source: IdentifierSource,
  pattern: RegExp,
  field: keyof IdentifierInput
): IdentifierExtractor {
  return {
    source,
    extractAll(input) {
      return collect(pattern, input[field]);
    },
    extract(input) {
      const [first] = collect(pattern, input[field]);
      return first ? { kind: 'found', identifier: first, source } : ABSENT;
    },
  };
}

export const labeledDescriptionExtractor = patternExtractor('description', LABELED_PATTERN, 'description');
export const folderNameExtractor = patternExtractor('folder', FOLDER_PATTERN, 'folderName');
export const titleWordExtractor = patternExtractor('title', WORD_PATTERN, 'title');
export const slugExtractor = patternExtractor('slug', SLUG_PATTERN, 'slug');

/**
 * Full priority order: labeled description, folder name, title, slug
 */
export const DEFAULT_EXTRACTORS: readonly IdentifierExtractor[] = [
  labeledDescriptionExtractor,
  folderNameExtractor,
  titleWordExtractor,
  slugExtractor,
];

/**
 * Installed manifests only have a folder name and a title
 */
export const MANIFEST_EXTRACTORS: readonly IdentifierExtractor[] = [
  folderNameExtractor,
  titleWordExtractor,
];

// =============================================================================
// Runners
// =============================================================================

/**
 * Run extractors in order and stop at the first hit
 */
export function extractIdentifier(
  input: IdentifierInput,
  extractors: readonly IdentifierExtractor[] = DEFAULT_EXTRACTORS
): IdentifierMatch {
  for (const extractor of extractors) {
    const match = extractor.extract(input);
    if (match.kind === 'found') return match;
  }
  return ABSENT;
}

/**
 * Best single identifier for an installed package: folder name, then title
 */
export function extractManifestIdentifier(folderName: string, title: string | undefined): IdentifierMatch {
  return extractIdentifier({ folderName, title }, MANIFEST_EXTRACTORS);
}

/**
 * All identifiers a catalog entry may match
 *
 * A labeled token in the description is authoritative and returned alone.
 * Otherwise the union of title words and slug tokens is returned, sorted, since
 * one catalog entry can cover several installed identifiers.
 */
export function extractFeedIdentifiers(title: string, description: string, pageUrl: string): string[] {
  const labeled = labeledDescriptionExtractor.extract({ description });
  if (labeled.kind === 'found') {
    return [labeled.identifier];
  }

  const union = new Set([
    ...titleWordExtractor.extractAll({ title }),
    ...slugExtractor.extractAll({ slug: pageUrl }),
  ]);
  return [...union].sort();
}
