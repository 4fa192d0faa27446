/**
 * Slow-Query Log Types
 */

/**
 * One slow statement extracted from an engine log.
 *
 * `queryTime` is in the engine's native unit: seconds for MySQL
 * (`Query_time`), milliseconds for PostgreSQL (`duration`).
 */
export interface SlowQueryRecord {
  /** ISO-8601 UTC timestamp, when the log line carried a parsable one */
  timestamp?: string;
  queryTime: number;
  lockTime?: number;
  rowsSent?: number;
  rowsExamined?: number;
  statement?: string;
}

/**
 * Unit of `SlowQueryRecord.queryTime` for a given engine
 */
export type DurationUnit = "seconds" | "milliseconds";

/**
 * Ranked output of a slow-query extraction
 */
export interface RankedSlowQueries {
  /** Number of records kept after bounding */
  total: number;
  top: SlowQueryRecord[];
}

/**
 * Log file metadata from the control plane
 */
export interface LogFileInfo {
  name: string;
  /** Epoch milliseconds */
  lastWritten: number;
  size?: number;
}
