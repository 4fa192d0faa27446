/**
 * MySQL slow query log parser
 *
 * Row-oriented format:
 *
 *   # Time: 2024-01-15T10:30:00.123456Z
 *   # User@Host: app[app] @ [10.0.0.1]  Id: 42
 *   # Query_time: 10.5  Lock_time: 0.1 Rows_sent: 100  Rows_examined: 1000
 *   SET timestamp=1705314600;
 *   SELECT * FROM users WHERE status = 'active';
 *
 * Only SELECT statements are captured.
 */

import type { SlowQueryRecord } from "../../../types/index.js";
import { normalizeRecord } from "./normalizer.js";

const TIME_MARKER = "# Time:";
const QUERY_TIME_MARKER = "# Query_time:";
const SESSION_SETUP_PREFIXES = ["SET timestamp=", "use "];

const METRIC_PAIR = /(\w+): (\d+\.?\d*)/g;
const TIMESTAMP = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})\.(\d{1,6})Z$/;

interface PendingRecord {
  timestamp?: string;
  queryTime?: number;
  lockTime?: number;
  rowsSent?: number;
  rowsExamined?: number;
}

/**
 * Parse `YYYY-MM-DDTHH:MM:SS.ffffffZ` into an ISO-8601 string with
 * millisecond precision. Returns undefined for any other shape or an
 * impossible calendar date.
 */
export function parseSlowLogTimestamp(value: string): string | undefined {
  const match = TIMESTAMP.exec(value);
  const [, date, time, fraction] = match ?? [];
  if (date === undefined || time === undefined || fraction === undefined) {
    return undefined;
  }

  const iso = `${date}T${time}.${fraction.padEnd(3, "0").slice(0, 3)}Z`;
  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString() !== iso) {
    return undefined;
  }
  return iso;
}

function applyMetrics(record: PendingRecord, line: string): void {
  for (const [, name, value] of line.matchAll(METRIC_PAIR)) {
    if (value === undefined) continue;
    switch (name) {
      case "Query_time":
        record.queryTime = parseFloat(value);
        break;
      case "Lock_time":
        record.lockTime = parseFloat(value);
        break;
      case "Rows_sent":
        record.rowsSent = parseInt(value, 10);
        break;
      case "Rows_examined":
        record.rowsExamined = parseInt(value, 10);
        break;
    }
  }
}

function finalize(
  record: PendingRecord,
  statementLines: string[],
): SlowQueryRecord | undefined {
  if (record.queryTime === undefined || statementLines.length === 0) {
    return undefined;
  }
  return normalizeRecord({
    timestamp: record.timestamp,
    queryTime: record.queryTime,
    lockTime: record.lockTime,
    rowsSent: record.rowsSent,
    rowsExamined: record.rowsExamined,
    statement: statementLines.join(" ").trim(),
  });
}

/**
 * Parse concatenated slow query log text into normalized records.
 *
 * A record is emitted when the next `# Time:` marker arrives or the
 * input ends, provided it has a query time and statement text.
 */
export function parseMySqlSlowLog(text: string): SlowQueryRecord[] {
  const records: SlowQueryRecord[] = [];
  let current: PendingRecord = {};
  let statementLines: string[] = [];
  let capturing = false;

  const emit = (): void => {
    const record = finalize(current, statementLines);
    if (record) records.push(record);
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();

    if (line.startsWith(TIME_MARKER)) {
      emit();
      current = {
        timestamp: parseSlowLogTimestamp(
          line.slice(TIME_MARKER.length).trim(),
        ),
      };
      statementLines = [];
      capturing = false;
    } else if (line.startsWith(QUERY_TIME_MARKER)) {
      applyMetrics(current, line);
    } else if (SESSION_SETUP_PREFIXES.some((p) => line.startsWith(p))) {
      continue;
    } else if (line !== "" && !line.startsWith("#")) {
      if (line.toLowerCase().startsWith("select")) {
        capturing = true;
        statementLines.push(line);
      } else if (capturing) {
        statementLines.push(line);
      }
    } else if (capturing && line === "") {
      capturing = false;
    }
  }

  emit();
  return records;
}
