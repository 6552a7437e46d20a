/**
 * Version normalization
 *
 * Free-form version strings ("1.2", "v1_2_0", "1-2-0-4") collapse to a
 * (major, minor, patch) triple so that catalog and manifest versions can be
 * compared regardless of separators or padding.
 */

/**
 * Canonical comparable form of a version string
 */
export type VersionTriple = readonly [major: number, minor: number, patch: number];

/** Separators accepted between numeric components */
const SEPARATORS = /[._-]/;

const NUMERIC_COMPONENT = /^\d+$/;

/**
 * Version token inside a catalog title, e.g. "KLAX Los Angeles v1.2.0".
 * Group 1 is the numeric run.
 */
const TITLE_VERSION_PATTERN = /(?:^|[\s_-])v?(\d+(?:[._-]\d+){0,3})(?:\b|$)/i;

/**
 * Normalize a version string into a triple
 *
 * Components beyond the third are ignored; missing ones are zero.
 * Returns null for empty input or when one of the first three components is
 * not a plain integer.
 *
 * @example
 * normalizeVersion('v1_2')    // [1, 2, 0]
 * normalizeVersion('1.2.3.4') // [1, 2, 3]
 * normalizeVersion('1.x')     // null
 */
export function normalizeVersion(raw: string | null | undefined): VersionTriple | null {
  if (typeof raw !== 'string') return null;

  const stripped = raw.trim().replace(/^[vV]+/, '');
  const parts = stripped.split(SEPARATORS).filter((part) => part.length > 0);
  if (parts.length === 0) return null;

  const nums: number[] = [];
  for (const part of parts.slice(0, 3)) {
    if (!NUMERIC_COMPONENT.test(part)) return null;
    nums.push(Number.parseInt(part, 10));
  }
  while (nums.length < 3) nums.push(0);

  return [nums[0], nums[1], nums[2]];
}

/**
 * Dotted string form of a triple ("1.2.0")
 */
export function formatVersion(version: VersionTriple): string {
  return version.join('.');
}

/**
 * Normalize straight to the dotted key form used by the feed index
 */
export function normalizeVersionString(raw: string | null | undefined): string | null {
  const triple = normalizeVersion(raw);
  return triple ? formatVersion(triple) : null;
}

/**
 * Two version strings are equal iff both normalize to the same triple
 */
export function versionsEqual(a: string, b: string): boolean {
  const na = normalizeVersion(a);
  const nb = normalizeVersion(b);
  if (!na || !nb) return false;
  return na[0] === nb[0] && na[1] === nb[1] && na[2] === nb[2];
}

/**
 * Pull a normalized version out of a catalog title
 *
 * The first delimited numeric run wins, with or without a "v" marker, so
 * "KLAX 2024 v1.4" reads as 2024.0.0.
 */
export function extractVersionFromTitle(title: string): string | null {
  const match = TITLE_VERSION_PATTERN.exec(title);
  return match ? normalizeVersionString(match[1]) : null;
}
