/**
 * Manifest rewriting
 *
 * Only the value of the field being changed is replaced in the original
 * text; every other byte of the manifest stays as it was on disk. The new
 * body is written to a sibling temp file and renamed over the original, so a
 * failed write leaves the old manifest in place.
 */

import { renameSync, rmSync, writeFileSync } from 'node:fs';

// =============================================================================
// Top-level member scanning
// =============================================================================

const JSON_WHITESPACE = new Set([' ', '\t', '\n', '\r']);
const SCALAR_TERMINATORS = new Set([',', '}', ']', ...JSON_WHITESPACE]);

interface MemberSpan {
  key: string;
  /** Offset of the first character of the value */
  valueStart: number;
  /** Offset just past the value */
  valueEnd: number;
}

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && JSON_WHITESPACE.has(text[i])) i++;
  return i;
}

function expectChar(text: string, at: number, char: string): void {
  if (text[at] !== char) {
    throw new SyntaxError(`expected '${char}' at offset ${at}`);
  }
}

function stringEnd(text: string, start: number): number {
  expectChar(text, start, '"');
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
    } else if (ch === '"') {
      return i + 1;
    } else {
      i++;
    }
  }
  throw new SyntaxError(`unterminated string at offset ${start}`);
}

function valueEnd(text: string, start: number): number {
  const first = text[start];
  if (first === '"') return stringEnd(text, start);

  if (first === '{' || first === '[') {
    let depth = 0;
    let i = start;
    while (i < text.length) {
      const ch = text[i];
      if (ch === '"') {
        i = stringEnd(text, i);
        continue;
      }
      if (ch === '{' || ch === '[') {
        depth++;
      } else if (ch === '}' || ch === ']') {
        depth--;
        if (depth === 0) return i + 1;
      }
      i++;
    }
    throw new SyntaxError(`unterminated value at offset ${start}`);
  }

  let i = start;
  while (i < text.length && !SCALAR_TERMINATORS.has(text[i])) i++;
  if (i === start) throw new SyntaxError(`expected a value at offset ${start}`);
  return i;
}

/**
 * Locate the members of a top-level JSON object without converting values
 */
function scanTopLevelMembers(text: string): { members: MemberSpan[]; close: number } {
  let i = skipWhitespace(text, 0);
  expectChar(text, i, '{');
  i = skipWhitespace(text, i + 1);

  const members: MemberSpan[] = [];
  if (text[i] === '}') return { members, close: i };

  for (;;) {
    const keyEnd = stringEnd(text, i);
    const key: unknown = JSON.parse(text.slice(i, keyEnd));
    i = skipWhitespace(text, keyEnd);
    expectChar(text, i, ':');
    i = skipWhitespace(text, i + 1);

    const end = valueEnd(text, i);
    members.push({ key: String(key), valueStart: i, valueEnd: end });

    i = skipWhitespace(text, end);
    if (text[i] === '}') return { members, close: i };
    expectChar(text, i, ',');
    i = skipWhitespace(text, i + 1);
  }
}

// =============================================================================
// Rewriting
// =============================================================================

/**
 * Set one top-level string field in a manifest's source text
 *
 * An existing value is replaced in place (the last one when the key is
 * duplicated, matching JSON.parse); a missing field is appended after the
 * last member.
 *
 * @throws SyntaxError when the text is not a JSON object
 */
export function setManifestField(source: string, field: string, value: string): string {
  const serialized = JSON.stringify(value);
  const { members, close } = scanTopLevelMembers(source);

  const target = members.filter((member) => member.key === field).pop();
  if (target) {
    return source.slice(0, target.valueStart) + serialized + source.slice(target.valueEnd);
  }

  const entry = `${JSON.stringify(field)}: ${serialized}`;
  if (members.length === 0) {
    return source.slice(0, close) + entry + source.slice(close);
  }
  const { valueEnd: lastEnd } = members[members.length - 1];
  return source.slice(0, lastEnd) + `, ${entry}` + source.slice(lastEnd);
}

/**
 * Replace a manifest file with a new body in a single rename
 */
export function writeManifestAtomic(manifestPath: string, body: string): void {
  const tempPath = `${manifestPath}.${process.pid}.${Date.now()}.tmp`;
  try {
    writeFileSync(tempPath, body, 'utf-8');
    renameSync(tempPath, manifestPath);
  } catch (err) {
    rmSync(tempPath, { force: true });
    throw err;
  }
}
