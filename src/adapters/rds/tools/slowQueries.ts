/**
 * RDS Slow Query Tools
 */

import type {
  RequestContext,
  ToolDefinition,
} from "../../../types/index.js";
import { rankSlowQueries } from "../logs/ranking.js";
import { SlowQueriesSchema } from "../types.js";
import {
  describeResolved,
  parseParams,
  runTool,
  type RdsToolServices,
} from "./common.js";

export function createSlowQueriesTool(
  services: RdsToolServices,
): ToolDefinition {
  return {
    name: "rds_slow_queries",
    title: "RDS Slow Queries",
    description:
      "Slowest statements from the instance's slow-query logs (MySQL slow log or PostgreSQL duration log). Durations are in the engine's native unit, reported as durationUnit.",
    group: "logs",
    inputSchema: SlowQueriesSchema,
    annotations: {
      readOnlyHint: true,
      openWorldHint: true,
    },
    handler: (params: unknown, _context: RequestContext) =>
      runTool("rds_slow_queries", async () => {
        const { databaseName, periodMinutes } = parseParams(
          SlowQueriesSchema,
          params,
        );
        const instance = await describeResolved(services, databaseName);

        const collection = await services.collector.collect(
          instance.identifier,
          instance.engine,
          periodMinutes,
        );
        const ranked = rankSlowQueries(collection.records);

        return {
          status: "success",
          database: instance.identifier,
          engine: instance.engine,
          periodMinutes,
          durationUnit: collection.durationUnit,
          totalSlowQueries: ranked.total,
          topQueries: ranked.top,
        };
      }),
  };
}

export function getSlowQueryTools(
  services: RdsToolServices,
): ToolDefinition[] {
  return [createSlowQueriesTool(services)];
}
