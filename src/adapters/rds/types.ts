/**
 * rds-diagnostics-mcp - Tool Input Schemas
 *
 * Zod schemas for tool input validation. Every tool takes a free-text
 * `databaseName` that is resolved to a real instance identifier.
 */

import { z } from "zod";

export const DEFAULT_PERIOD_MINUTES = 60;
export const MAX_PERIOD_MINUTES = 1440;
export const DEFAULT_TOP_LOAD_LIMIT = 10;
export const MAX_TOP_LOAD_LIMIT = 25;

const databaseName = z
  .string()
  .refine((name) => name.trim().length > 0, "Database name must not be empty")
  .describe(
    "Database instance name; partial or approximate names are resolved to the closest instance",
  );

const periodMinutes = z
  .number()
  .int()
  .min(1)
  .max(MAX_PERIOD_MINUTES)
  .optional()
  .default(DEFAULT_PERIOD_MINUTES)
  .describe("Look-back window in minutes");

export const InstanceInfoSchema = z.object({
  databaseName,
});

export const MetricsSchema = z.object({
  databaseName,
  periodMinutes,
});

export const SlowQueriesSchema = z.object({
  databaseName,
  periodMinutes,
});

/**
 * Load dimensions, the Performance Insights group each maps to and the
 * dimension attribute that names a key within it
 */
export const LOAD_DIMENSIONS = {
  statement: { group: "db.sql", attribute: "db.sql.statement" },
  user: { group: "db.user", attribute: "db.user.name" },
  wait_event: { group: "db.wait_event", attribute: "db.wait_event.name" },
  host: { group: "db.host", attribute: "db.host.name" },
} as const;

export type LoadDimension = keyof typeof LOAD_DIMENSIONS;

export const TopLoadSchema = z.object({
  databaseName,
  dimension: z
    .enum(["statement", "user", "wait_event", "host"])
    .optional()
    .default("statement")
    .describe("What to group database load by"),
  periodMinutes,
  limit: z
    .number()
    .int()
    .min(1)
    .max(MAX_TOP_LOAD_LIMIT)
    .optional()
    .default(DEFAULT_TOP_LOAD_LIMIT)
    .describe("Number of top contributors to return"),
});
