/**
 * RDS Metrics Tools
 *
 * Point-in-time CloudWatch metrics: the latest 5-minute average of each
 * series within the look-back window.
 */

import type {
  RequestContext,
  ToolDefinition,
} from "../../../types/index.js";
import { MetricsSchema } from "../types.js";
import {
  parseParams,
  resolveIdentifier,
  runTool,
  type RdsToolServices,
} from "./common.js";

export const METRICS_NAMESPACE = "AWS/RDS";
export const METRICS_PERIOD_SECONDS = 300;
export const METRICS_STAT = "Average";

/**
 * Reported metrics in output order
 */
export const RDS_METRICS = [
  { key: "cpuUtilization", metricName: "CPUUtilization" },
  { key: "freeMemoryBytes", metricName: "FreeableMemory" },
  { key: "connections", metricName: "DatabaseConnections" },
  { key: "freeStorageBytes", metricName: "FreeStorageSpace" },
  { key: "readThroughput", metricName: "ReadThroughput" },
  { key: "writeThroughput", metricName: "WriteThroughput" },
  { key: "readLatency", metricName: "ReadLatency" },
  { key: "writeLatency", metricName: "WriteLatency" },
  { key: "dbLoad", metricName: "DBLoad" },
] as const;

export function createMetricsTool(services: RdsToolServices): ToolDefinition {
  return {
    name: "rds_metrics",
    title: "RDS Metrics",
    description:
      "Current CPU, memory, connections, storage, throughput, latency and DB load for an RDS instance. Values are null when no sample exists in the window.",
    group: "metrics",
    inputSchema: MetricsSchema,
    annotations: {
      readOnlyHint: true,
      openWorldHint: true,
    },
    handler: (params: unknown, _context: RequestContext) =>
      runTool("rds_metrics", async () => {
        const { databaseName, periodMinutes } = parseParams(
          MetricsSchema,
          params,
        );
        const identifier = await resolveIdentifier(services, databaseName);

        const end = new Date(services.now());
        const start = new Date(end.getTime() - periodMinutes * 60_000);

        const series = await Promise.all(
          RDS_METRICS.map(({ metricName }) =>
            services.metrics.getMetric({
              namespace: METRICS_NAMESPACE,
              metricName,
              dimensions: { DBInstanceIdentifier: identifier },
              period: METRICS_PERIOD_SECONDS,
              stat: METRICS_STAT,
              start,
              end,
            }),
          ),
        );

        const metrics: Record<string, number | null> = {};
        RDS_METRICS.forEach(({ key }, index) => {
          metrics[key] = series[index]?.at(-1) ?? null;
        });

        return {
          status: "success",
          database: identifier,
          periodMinutes,
          metrics,
          timestamp: end.toISOString(),
        };
      }),
  };
}

export function getMetricsTools(services: RdsToolServices): ToolDefinition[] {
  return [createMetricsTool(services)];
}
