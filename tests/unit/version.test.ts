/**
 * Unit Tests: Version Normalization
 *
 * Tests conversion of free-form version strings into comparable triples and
 * extraction of versions from catalog titles.
 *
 * @see src/matching/version.ts
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeVersion,
  normalizeVersionString,
  formatVersion,
  versionsEqual,
  extractVersionFromTitle,
} from '../../src/matching/version.js';

// =============================================================================
// normalizeVersion Tests
// =============================================================================

describe('normalizeVersion', () => {
  it('should pad short versions with zeros', () => {
    expect(normalizeVersion('1.2')).toEqual([1, 2, 0]);
    expect(normalizeVersion('7')).toEqual([7, 0, 0]);
  });

  it('should accept underscore and hyphen separators', () => {
    expect(normalizeVersion('1_2_3')).toEqual([1, 2, 3]);
    expect(normalizeVersion('1-2-3')).toEqual([1, 2, 3]);
  });

  it('should strip a leading v or V and surrounding whitespace', () => {
    expect(normalizeVersion('v1_2')).toEqual([1, 2, 0]);
    expect(normalizeVersion('  V01.02 ')).toEqual([1, 2, 0]);
  });

  it('should ignore components beyond the third', () => {
    expect(normalizeVersion('1.2.3.4')).toEqual([1, 2, 3]);
    expect(normalizeVersion('1.2.3.x')).toEqual([1, 2, 3]);
  });

  it('should skip empty components between separators', () => {
    expect(normalizeVersion('1..2')).toEqual([1, 2, 0]);
  });

  it('should reject non-numeric leading components', () => {
    expect(normalizeVersion('1.x')).toBeNull();
    expect(normalizeVersion('abc')).toBeNull();
    expect(normalizeVersion('1.2beta')).toBeNull();
  });

  it('should reject empty input', () => {
    expect(normalizeVersion('')).toBeNull();
    expect(normalizeVersion('   ')).toBeNull();
    expect(normalizeVersion('v')).toBeNull();
    expect(normalizeVersion(null)).toBeNull();
    expect(normalizeVersion(undefined)).toBeNull();
  });
});

describe('normalizeVersionString', () => {
  it('should produce the dotted key form', () => {
    expect(normalizeVersionString('v2')).toBe('2.0.0');
    expect(normalizeVersionString('1-2-0-4')).toBe('1.2.0');
  });

  it('should return null for unparseable input', () => {
    expect(normalizeVersionString('latest')).toBeNull();
  });
});

describe('formatVersion', () => {
  it('should join the triple with dots', () => {
    expect(formatVersion([10, 0, 3])).toBe('10.0.3');
  });
});

describe('versionsEqual', () => {
  it('should compare normalized forms', () => {
    expect(versionsEqual('1.2', '1.2.0')).toBe(true);
    expect(versionsEqual('v1_2_0', '1.2')).toBe(true);
    expect(versionsEqual('1.2', '1.2.1')).toBe(false);
  });

  it('should never equate unparseable versions', () => {
    expect(versionsEqual('x', 'x')).toBe(false);
  });
});

// =============================================================================
// extractVersionFromTitle Tests
// =============================================================================

describe('extractVersionFromTitle', () => {
  it('should read a v-prefixed version', () => {
    expect(extractVersionFromTitle('KLAX Los Angeles v1.2.0')).toBe('1.2.0');
  });

  it('should take the first numeric run even when a v-prefixed one follows', () => {
    expect(extractVersionFromTitle('KLAX 2024 v1.4')).toBe('2024.0.0');
  });

  it('should read a bare numeric run', () => {
    expect(extractVersionFromTitle('KLAX Los Angeles 1.2')).toBe('1.2.0');
  });

  it('should accept underscore-delimited tokens', () => {
    expect(extractVersionFromTitle('Scenery_v2-1')).toBe('2.1.0');
  });

  it('should ignore digits glued to letters', () => {
    expect(extractVersionFromTitle('Freeware A320neo livery')).toBeNull();
  });

  it('should return null when the title has no version', () => {
    expect(extractVersionFromTitle('KLAX Los Angeles')).toBeNull();
  });
});
