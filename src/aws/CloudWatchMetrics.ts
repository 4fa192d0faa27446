/**
 * rds-diagnostics-mcp - CloudWatch Metrics
 */

import {
  GetMetricDataCommand,
  type CloudWatchClient,
} from "@aws-sdk/client-cloudwatch";
import type { MetricQuery, MetricsApi } from "../types/index.js";

export class CloudWatchMetrics implements MetricsApi {
  constructor(private readonly client: CloudWatchClient) {}

  /**
   * Samples for one metric, oldest first
   */
  async getMetric(query: MetricQuery): Promise<number[]> {
    const response = await this.client.send(
      new GetMetricDataCommand({
        MetricDataQueries: [
          {
            Id: query.metricName.toLowerCase(),
            MetricStat: {
              Metric: {
                Namespace: query.namespace,
                MetricName: query.metricName,
                Dimensions: Object.entries(query.dimensions).map(
                  ([Name, Value]) => ({ Name, Value }),
                ),
              },
              Period: query.period,
              Stat: query.stat,
            },
          },
        ],
        StartTime: query.start,
        EndTime: query.end,
        ScanBy: "TimestampAscending",
      }),
    );
    return response.MetricDataResults?.[0]?.Values ?? [];
  }
}
