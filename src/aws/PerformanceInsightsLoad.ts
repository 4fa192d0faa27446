/**
 * rds-diagnostics-mcp - Performance Insights Load
 */

import { DescribeDimensionKeysCommand, type PIClient } from "@aws-sdk/client-pi";
import type { LoadApi, LoadKey } from "../types/index.js";

export const DB_LOAD_METRIC = "db.load.avg";

export class PerformanceInsightsLoad implements LoadApi {
  constructor(private readonly client: PIClient) {}

  /**
   * Top dimension keys by average active sessions over the window
   */
  async describeTopKeys(params: {
    resourceId: string;
    group: string;
    start: Date;
    end: Date;
    limit: number;
  }): Promise<LoadKey[]> {
    const response = await this.client.send(
      new DescribeDimensionKeysCommand({
        ServiceType: "RDS",
        Identifier: params.resourceId,
        StartTime: params.start,
        EndTime: params.end,
        Metric: DB_LOAD_METRIC,
        GroupBy: {
          Group: params.group,
          Limit: params.limit,
        },
      }),
    );
    return (response.Keys ?? []).map((key) => ({
      dimensions: key.Dimensions ?? {},
      total: key.Total ?? 0,
    }));
  }
}
