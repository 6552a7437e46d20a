/**
 * Report sinks
 *
 * The run pipeline writes structured outcome records to a ReportSink and does
 * not know where they end up. Console, log file and in-memory sinks can be
 * combined with a tee.
 */

import type { LogWriter } from '../utils/logger.js';
import { printOutcome } from '../utils/output.js';
import { formatOutcomeLine } from './report.js';
import type { OutcomeRecord } from './types.js';

export interface ReportSink {
  write(record: OutcomeRecord): void;
}

/**
 * Coloured lines on stdout
 */
export class ConsoleReportSink implements ReportSink {
  write(record: OutcomeRecord): void {
    printOutcome(record);
  }
}

/**
 * Plain lines through a log writer (normally the run's log file)
 */
export class LogWriterReportSink implements ReportSink {
  constructor(private readonly writer: LogWriter) {}

  write(record: OutcomeRecord): void {
    const level = record.code === 'MOVE_FAILED' || record.code === 'UPDATE_FAILED' ? 'error' : 'info';
    this.writer.write(level, formatOutcomeLine(record));
  }
}

/**
 * Collects records in memory
 */
export class MemoryReportSink implements ReportSink {
  readonly records: OutcomeRecord[] = [];

  write(record: OutcomeRecord): void {
    this.records.push(record);
  }

  lines(): string[] {
    return this.records.map(formatOutcomeLine);
  }
}

/**
 * Fans each record out to several sinks
 *
 * A sink that throws does not stop the others or the run. Its first failure
 * goes to `onError`; later records are still offered to it.
 */
export class TeeReportSink implements ReportSink {
  private readonly failed = new Set<ReportSink>();

  constructor(
    private readonly sinks: ReportSink[],
    private readonly onError?: (error: Error) => void
  ) {}

  write(record: OutcomeRecord): void {
    for (const sink of this.sinks) {
      try {
        sink.write(record);
      } catch (err) {
        if (this.failed.has(sink)) continue;
        this.failed.add(sink);
        this.onError?.(err instanceof Error ? err : new Error(String(err)));
      }
    }
  }
}
