/**
 * Unit Tests: Identifier Extraction
 *
 * Tests the 4-letter identifier heuristics and their priority order for
 * installed manifests and catalog entries.
 *
 * @see src/matching/identifier.ts
 */

import { describe, it, expect } from 'vitest';
import {
  ABSENT,
  DEFAULT_EXTRACTORS,
  extractFeedIdentifiers,
  extractIdentifier,
  extractManifestIdentifier,
  folderNameExtractor,
  labeledDescriptionExtractor,
  slugExtractor,
  titleWordExtractor,
} from '../../src/matching/identifier.js';

// =============================================================================
// Strategy Tests
// =============================================================================

describe('labeledDescriptionExtractor', () => {
  it('should find a labeled token case-insensitively', () => {
    expect(labeledDescriptionExtractor.extract({ description: 'Airport ICAO: ksea, gate fix' })).toEqual({
      kind: 'found',
      identifier: 'KSEA',
      source: 'description',
    });
    expect(labeledDescriptionExtractor.extract({ description: 'icao:KSEA' })).toEqual({
      kind: 'found',
      identifier: 'KSEA',
      source: 'description',
    });
  });

  it('should take the first four letters after the label', () => {
    expect(labeledDescriptionExtractor.extract({ description: 'ICAO: KSEAX' })).toEqual({
      kind: 'found',
      identifier: 'KSEA',
      source: 'description',
    });
  });

  it('should report absent when the field is missing', () => {
    expect(labeledDescriptionExtractor.extract({})).toEqual(ABSENT);
  });
});

describe('folderNameExtractor', () => {
  it('should find a delimited token inside a folder name', () => {
    expect(folderNameExtractor.extract({ folderName: 'vendor-klax-los-angeles' })).toEqual({
      kind: 'found',
      identifier: 'KLAX',
      source: 'folder',
    });
  });

  it('should find a token at the start of the name', () => {
    expect(folderNameExtractor.extract({ folderName: 'klax_airport' })).toEqual({
      kind: 'found',
      identifier: 'KLAX',
      source: 'folder',
    });
  });

  it('should find adjacent tokens', () => {
    expect(folderNameExtractor.extractAll({ folderName: 'aaaa-bbbb' })).toEqual(['AAAA', 'BBBB']);
  });

  it('should not match part of a longer word', () => {
    expect(folderNameExtractor.extract({ folderName: 'scenery-bundle' })).toEqual(ABSENT);
  });
});

describe('titleWordExtractor', () => {
  it('should return distinct words in order of appearance', () => {
    expect(titleWordExtractor.extractAll({ title: 'KSEA and ksea plus KBFI' })).toEqual(['KSEA', 'PLUS', 'KBFI']);
  });
});

describe('slugExtractor', () => {
  it('should find tokens between URL path delimiters', () => {
    expect(slugExtractor.extractAll({ slug: 'https://example.test/p/klax-ksea' })).toEqual(['KLAX', 'KSEA']);
  });
});

// =============================================================================
// Runner Tests
// =============================================================================

describe('extractIdentifier', () => {
  it('should stop at the first extractor that finds a token', () => {
    const match = extractIdentifier(
      { description: 'ICAO: KBUR', folderName: 'klax-scenery', title: 'KSEA' },
      DEFAULT_EXTRACTORS
    );
    expect(match).toEqual({ kind: 'found', identifier: 'KBUR', source: 'description' });
  });

  it('should fall through to later extractors', () => {
    expect(extractIdentifier({ folderName: 'scenery', slug: '/kpdx' })).toEqual({
      kind: 'found',
      identifier: 'KPDX',
      source: 'slug',
    });
  });
});

describe('extractManifestIdentifier', () => {
  it('should prefer the folder name over the title', () => {
    expect(extractManifestIdentifier('vendor-klax', 'KSEA Seattle')).toEqual({
      kind: 'found',
      identifier: 'KLAX',
      source: 'folder',
    });
  });

  it('should fall back to the title', () => {
    expect(extractManifestIdentifier('scenery-bundle', 'KSEA Seattle Airport')).toEqual({
      kind: 'found',
      identifier: 'KSEA',
      source: 'title',
    });
  });

  it('should report absent when neither source has a token', () => {
    expect(extractManifestIdentifier('scenery', undefined)).toEqual(ABSENT);
  });
});

describe('extractFeedIdentifiers', () => {
  it('should return the labeled token alone', () => {
    expect(extractFeedIdentifiers('KLAX Los Angeles', 'Gates. ICAO: KVNY', 'https://example.test/klax')).toEqual([
      'KVNY',
    ]);
  });

  it('should union title words and slug tokens, sorted', () => {
    expect(extractFeedIdentifiers('ZZZZ and AAAA Bundle', 'Two airports', 'https://example.test/p/mmmm')).toEqual([
      'AAAA',
      'MMMM',
      'ZZZZ',
    ]);
  });

  it('should return an empty list when nothing matches', () => {
    expect(extractFeedIdentifiers('Great Scenery v1.0', '', '')).toEqual([]);
  });
});
