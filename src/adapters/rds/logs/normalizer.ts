/**
 * Query Normalizer
 *
 * Literal-text shortening of statements so that slow-query output stays
 * bounded. No SQL parsing: only the first `IN (` list is collapsed.
 */

import type { SlowQueryRecord } from "../../../types/index.js";

export const MAX_STATEMENT_LENGTH = 1500;
export const TRUNCATION_MARKER = "... [truncated]";

/** Lists longer than this are collapsed */
const MAX_IN_LIST_VALUES = 5;

const IN_LIST_OPENER = /IN \(/i;

/**
 * Collapse the first oversized `IN (...)` list to its first three and
 * last two values.
 */
export function collapseInList(statement: string): string {
  const match = IN_LIST_OPENER.exec(statement);
  if (!match) return statement;

  const listStart = match.index + match[0].length;
  const before = statement.slice(0, listStart);
  const rest = statement.slice(listStart);

  const close = rest.indexOf(")");
  const list = close === -1 ? rest : rest.slice(0, close);
  const trailer = close === -1 ? "" : rest.slice(close + 1);

  const values = list.split(",");
  if (values.length <= MAX_IN_LIST_VALUES) return statement;

  const collapsed = `${values.slice(0, 3).join(",")}, ... ${values.slice(-2).join(",")}`;
  return `${before}${collapsed})${trailer}`;
}

/**
 * Collapse the first `IN` list, then cap the length
 */
export function normalizeStatement(statement: string): string {
  const collapsed = collapseInList(statement);
  if (collapsed.length > MAX_STATEMENT_LENGTH) {
    return `${collapsed.slice(0, MAX_STATEMENT_LENGTH)}${TRUNCATION_MARKER}`;
  }
  return collapsed;
}

export function normalizeRecord(record: SlowQueryRecord): SlowQueryRecord {
  if (record.statement === undefined) return record;
  return { ...record, statement: normalizeStatement(record.statement) };
}
