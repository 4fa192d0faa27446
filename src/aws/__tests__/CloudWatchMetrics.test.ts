import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock("@aws-sdk/client-cloudwatch", () => ({
  CloudWatchClient: class {
    send = mockSend;
  },
  GetMetricDataCommand: class {
    constructor(readonly input: unknown) {}
  },
}));

import { CloudWatchClient } from "@aws-sdk/client-cloudwatch";
import { CloudWatchMetrics } from "../CloudWatchMetrics.js";

describe("CloudWatchMetrics", () => {
  const start = new Date("2024-01-15T10:00:00.000Z");
  const end = new Date("2024-01-15T11:00:00.000Z");
  let metrics: CloudWatchMetrics;

  beforeEach(() => {
    vi.clearAllMocks();
    metrics = new CloudWatchMetrics(new CloudWatchClient({ region: "us-east-1" }));
  });

  it("should request one metric series oldest first", async () => {
    mockSend.mockResolvedValueOnce({
      MetricDataResults: [{ Id: "cpuutilization", Values: [12.5, 14, 9.75] }],
    });

    const values = await metrics.getMetric({
      namespace: "AWS/RDS",
      metricName: "CPUUtilization",
      dimensions: { DBInstanceIdentifier: "test-db-1" },
      period: 300,
      stat: "Average",
      start,
      end,
    });

    expect(values).toEqual([12.5, 14, 9.75]);
    expect(mockSend.mock.calls[0]?.[0]).toMatchObject({
      input: {
        MetricDataQueries: [
          {
            Id: "cpuutilization",
            MetricStat: {
              Metric: {
                Namespace: "AWS/RDS",
                MetricName: "CPUUtilization",
                Dimensions: [{ Name: "DBInstanceIdentifier", Value: "test-db-1" }],
              },
              Period: 300,
              Stat: "Average",
            },
          },
        ],
        StartTime: start,
        EndTime: end,
        ScanBy: "TimestampAscending",
      },
    });
  });

  it("should return no samples when the series is empty", async () => {
    mockSend.mockResolvedValueOnce({ MetricDataResults: [] });

    await expect(
      metrics.getMetric({
        namespace: "AWS/RDS",
        metricName: "DBLoad",
        dimensions: { DBInstanceIdentifier: "test-db-1" },
        period: 300,
        stat: "Average",
        start,
        end,
      }),
    ).resolves.toEqual([]);
  });
});
