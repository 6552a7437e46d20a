/**
 * Per-run mutable state
 *
 * A RunState is created fresh for each run and passed to whatever records
 * outcomes; nothing here is module-global.
 */

import type { BadJsonEntry, OutcomeCode, OutcomeRecord } from './types.js';

export function emptyCounts(): Record<OutcomeCode, number> {
  return {
    BAD_JSON: 0,
    NO_VERSION: 0,
    NO_MATCH: 0,
    NOOP: 0,
    WILL_UPDATE: 0,
    UPDATED: 0,
    UPDATE_FAILED: 0,
    WILL_MOVE: 0,
    MOVED: 0,
    SKIP_EXIST: 0,
    WILL_SKIP_EXIST: 0,
    NO_SPACE: 0,
    WILL_NO_SPACE: 0,
    MOVE_FAILED: 0,
  };
}

export class RunState {
  readonly counts = emptyCounts();
  readonly badJson: BadJsonEntry[] = [];
  manifestsScanned = 0;

  record(outcome: OutcomeRecord): void {
    this.counts[outcome.code]++;
    if (outcome.code === 'BAD_JSON') {
      this.badJson.push({ path: outcome.paths[0] ?? '', error: outcome.cause ?? '' });
    }
  }

  total(): number {
    return Object.values(this.counts).reduce((sum, n) => sum + n, 0);
  }
}
