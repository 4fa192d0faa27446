/**
 * PostgreSQL log parser
 *
 * Block-oriented format. Each entry starts with a UTC timestamp prefix
 * and may continue over several lines:
 *
 *   2024-01-15 10:30:00 UTC:10.0.0.1(5432):app@orders:[123]:LOG:  duration: 1532.118 ms  statement: SELECT *
 *   FROM orders
 *   WHERE id IN (1,2,3)
 *
 * Entries logged by `log_min_duration_statement` are kept; every other
 * block is discarded.
 */

import type { SlowQueryRecord } from "../../../types/index.js";
import { normalizeRecord } from "./normalizer.js";

const BLOCK_START = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}) UTC:/;
const DURATION_STATEMENT = /LOG: {2}duration: (\d+\.?\d*) ms {2}statement: ([\s\S]*)/;

function blockTimestamp(block: string): string | undefined {
  const [, date, time] = BLOCK_START.exec(block) ?? [];
  if (date === undefined || time === undefined) return undefined;

  const iso = `${date}T${time}.000Z`;
  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString() !== iso) {
    return undefined;
  }
  return iso;
}

function parseBlock(lines: string[]): SlowQueryRecord | undefined {
  const block = lines.join("\n");
  const [, duration, statement] = DURATION_STATEMENT.exec(block) ?? [];
  if (duration === undefined || statement === undefined) return undefined;

  return normalizeRecord({
    timestamp: blockTimestamp(block),
    queryTime: parseFloat(duration),
    statement: statement.trimEnd(),
  });
}

/**
 * Parse concatenated PostgreSQL log text into normalized records.
 * Lines before the first timestamped block are ignored; the trailing
 * block is parsed at end of input.
 */
export function parsePostgresLog(text: string): SlowQueryRecord[] {
  const records: SlowQueryRecord[] = [];
  let buffer: string[] = [];

  const flush = (): void => {
    if (buffer.length === 0) return;
    const record = parseBlock(buffer);
    if (record) records.push(record);
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();

    if (BLOCK_START.test(line)) {
      flush();
      buffer = [line];
    } else if (buffer.length > 0) {
      buffer.push(line);
    }
  }

  flush();
  return records;
}
