/**
 * Plain-text report formatting
 *
 * Produces the per-item lines and the end-of-run summary without colour, for
 * log files and tests. Console colouring lives in utils/output.ts.
 */

import { OUTCOME_CODES, type OutcomeRecord, type RunSummary } from './types.js';

/** Width the outcome code column is padded to */
const CODE_WIDTH = 11;

/**
 * Format one outcome as a pipe-separated line
 *
 * @example
 * formatOutcomeLine({ phase: 'reconcile', code: 'NOOP', identifier: 'KLAX', version: '1.2.0',
 *   detail: 'simType already MSFS 2020/2024', paths: ['/a/manifest.json'] })
 * // 'NOOP        | KLAX | v1.2.0 | simType already MSFS 2020/2024 | /a/manifest.json'
 */
export function formatOutcomeLine(record: OutcomeRecord): string {
  const fields: string[] = [record.code.padEnd(CODE_WIDTH)];

  if (record.identifier !== undefined) fields.push(record.identifier);
  if (record.version !== undefined) fields.push(`v${record.version}`);
  if (record.detail) fields.push(record.detail);
  if (record.paths.length > 0) fields.push(record.paths.join(' -> '));
  if (record.cause) fields.push(record.cause);

  return fields.join(' | ');
}

/**
 * Summary lines: counts per code, then the grouped BAD_JSON block
 */
export function formatSummaryLines(summary: RunSummary): string[] {
  const width = Math.max(...OUTCOME_CODES.map((code) => code.length));
  const lines = ['Summary:'];

  for (const code of OUTCOME_CODES) {
    lines.push(`  ${code.padEnd(width)}: ${summary.counts[code]}`);
  }

  if (summary.badJson.length > 0) {
    lines.push('', '==== BAD_JSON FILES (grouped) ====');
    for (const entry of summary.badJson) {
      lines.push(`${entry.path} | ${entry.error}`);
    }
    lines.push('=================================');
  }

  return lines;
}
