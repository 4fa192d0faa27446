/**
 * RDS Top Load Tools
 *
 * Performance Insights breakdown of database load (average active
 * sessions) by statement, user, wait event or client host.
 */

import type {
  LoadKey,
  RequestContext,
  ToolDefinition,
} from "../../../types/index.js";
import { UpstreamError } from "../../../types/index.js";
import { normalizeStatement } from "../logs/normalizer.js";
import { LOAD_DIMENSIONS, TopLoadSchema, type LoadDimension } from "../types.js";
import {
  describeResolved,
  parseParams,
  runTool,
  type RdsToolServices,
} from "./common.js";

function keyLabel(key: LoadKey, dimension: LoadDimension): string {
  const value =
    key.dimensions[LOAD_DIMENSIONS[dimension].attribute] ??
    Object.values(key.dimensions)[0] ??
    "unknown";
  return dimension === "statement" ? normalizeStatement(value) : value;
}

export function createTopLoadTool(services: RdsToolServices): ToolDefinition {
  return {
    name: "rds_top_load",
    title: "RDS Top Load",
    description:
      "Top contributors to database load (average active sessions) from Performance Insights, grouped by statement, user, wait_event or host.",
    group: "load",
    inputSchema: TopLoadSchema,
    annotations: {
      readOnlyHint: true,
      openWorldHint: true,
    },
    handler: (params: unknown, _context: RequestContext) =>
      runTool("rds_top_load", async () => {
        const { databaseName, dimension, periodMinutes, limit } = parseParams(
          TopLoadSchema,
          params,
        );
        const instance = await describeResolved(services, databaseName);
        if (!instance.resourceId) {
          throw new UpstreamError(
            `RDS instance ${instance.identifier} has no resource id`,
          );
        }

        const end = new Date(services.now());
        const start = new Date(end.getTime() - periodMinutes * 60_000);
        const keys = await services.load.describeTopKeys({
          resourceId: instance.resourceId,
          group: LOAD_DIMENSIONS[dimension].group,
          start,
          end,
          limit,
        });

        const topLoad = keys
          .map((key) => ({
            key: keyLabel(key, dimension),
            averageActiveSessions: key.total,
          }))
          .sort((a, b) => b.averageActiveSessions - a.averageActiveSessions);

        return {
          status: "success",
          database: instance.identifier,
          dimension,
          periodMinutes,
          topLoad,
        };
      }),
  };
}

export function getTopLoadTools(services: RdsToolServices): ToolDefinition[] {
  return [createTopLoadTool(services)];
}
