/**
 * RDS tool handler tests, run against in-process upstream fakes.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ToolDefinition } from "../../../../types/index.js";
import { InstanceDirectory } from "../../directory/InstanceDirectory.js";
import { LogFetcher } from "../../logs/LogFetcher.js";
import {
  MYSQL_SLOW_LOG_FILE,
  SlowQueryCollector,
} from "../../logs/SlowQueryCollector.js";
import { NameResolver } from "../../resolver/NameResolver.js";
import { DeterministicMatchStrategy } from "../../resolver/strategies.js";
import { RDS_METRICS } from "../metrics.js";
import { getRdsTools, type RdsToolServices } from "../index.js";
import {
  createInstanceEntry,
  createMockControlPlane,
  createMockLoad,
  createMockMetrics,
  createMockRequestContext,
  type MockControlPlane,
  type MockControlPlaneOptions,
  type MockLoad,
  type MockMetrics,
} from "../../../../__tests__/mocks/index.js";
import type { InstanceDirectoryEntry, LoadKey } from "../../../../types/index.js";

const NOW = Date.parse("2024-01-15T11:00:00.000Z");
const START = new Date("2024-01-15T10:00:00.000Z");
const END = new Date(NOW);

const INSTANCES: InstanceDirectoryEntry[] = [
  createInstanceEntry({ identifier: "test-db-1" }),
  createInstanceEntry({ identifier: "prod-db-1" }),
  createInstanceEntry({
    identifier: "pg-db-1",
    engine: "postgres",
    endpoint: { host: "pg-db-1.example.internal", port: 5432 },
  }),
  createInstanceEntry({ identifier: "mssql-db", engine: "sqlserver-ex" }),
];

interface Harness {
  controlPlane: MockControlPlane;
  metrics: MockMetrics;
  load: MockLoad;
  tool: (name: string) => ToolDefinition;
}

function setup(
  options: {
    logs?: MockControlPlaneOptions;
    samples?: Record<string, number[]>;
    loadKeys?: LoadKey[];
    resolver?: RdsToolServices["resolver"];
  } = {},
): Harness {
  const controlPlane = createMockControlPlane(INSTANCES, options.logs);
  const metrics = createMockMetrics(options.samples);
  const load = createMockLoad(options.loadKeys);
  const now = (): number => NOW;

  const services: RdsToolServices = {
    controlPlane,
    metrics,
    load,
    resolver:
      options.resolver ??
      new NameResolver(
        new InstanceDirectory(controlPlane, { now }),
        new DeterministicMatchStrategy(),
      ),
    collector: new SlowQueryCollector(new LogFetcher(controlPlane), now),
    now,
  };
  const tools = getRdsTools(services);

  return {
    controlPlane,
    metrics,
    load,
    tool: (name) => {
      const found = tools.find((t) => t.name === name);
      if (!found) throw new Error(`Tool not registered: ${name}`);
      return found;
    },
  };
}

describe("RDS tools", () => {
  const context = createMockRequestContext();

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("should expose one read-only tool per group", () => {
    const tools = getRdsTools({
      controlPlane: createMockControlPlane(),
      metrics: createMockMetrics(),
      load: createMockLoad(),
      resolver: { resolve: () => Promise.resolve(undefined) },
      collector: {
        collect: () => Promise.reject(new Error("not used")),
      },
      now: () => NOW,
    });

    expect(tools.map((t) => [t.name, t.group])).toEqual([
      ["rds_instance_info", "instance"],
      ["rds_metrics", "metrics"],
      ["rds_slow_queries", "logs"],
      ["rds_top_load", "load"],
    ]);
    expect(tools.every((t) => t.annotations?.readOnlyHint === true)).toBe(true);
  });

  describe("rds_instance_info", () => {
    it("should describe the resolved instance", async () => {
      const { tool } = setup();

      const result = await tool("rds_instance_info").handler(
        { databaseName: "test" },
        context,
      );

      expect(result).toEqual({
        status: "available",
        identifier: "test-db-1",
        engine: "mysql",
        endpoint: "test-db-1.example.internal",
        port: 3306,
        resourceId: "db-TEST-DB-1",
        allocatedStorage: 20,
      });
    });

    it("should report names that match no instance", async () => {
      const { controlPlane, tool } = setup();

      const result = await tool("rds_instance_info").handler(
        { databaseName: "nonexistent" },
        context,
      );

      expect(result).toEqual({
        status: "error",
        message: "No matching RDS instance found",
        code: "INSTANCE_NOT_FOUND",
      });
      expect(controlPlane.describeInstance).not.toHaveBeenCalled();
    });

    it("should report an instance that vanished after resolution", async () => {
      const { controlPlane, tool } = setup();
      controlPlane.describeInstance.mockResolvedValueOnce(undefined);

      const result = await tool("rds_instance_info").handler(
        { databaseName: "prod-db-1" },
        context,
      );

      expect(result).toEqual({
        status: "error",
        message: "RDS instance not found: prod-db-1",
        code: "INSTANCE_NOT_FOUND",
      });
    });

    it("should resolve the name exactly as given", async () => {
      const resolve = vi.fn<RdsToolServices["resolver"]["resolve"]>(() =>
        Promise.resolve("prod-db-1"),
      );
      const { tool } = setup({ resolver: { resolve } });

      const result = await tool("rds_instance_info").handler(
        { databaseName: "  Prod " },
        context,
      );

      expect(resolve).toHaveBeenCalledWith("  Prod ");
      expect(result).toMatchObject({ identifier: "prod-db-1" });
    });

    it("should reject a blank name without resolving it", async () => {
      const resolve = vi.fn<RdsToolServices["resolver"]["resolve"]>();
      const { tool } = setup({ resolver: { resolve } });

      const result = await tool("rds_instance_info").handler(
        { databaseName: "   " },
        context,
      );

      expect(result).toEqual({
        status: "error",
        message: "Invalid input: databaseName: Database name must not be empty",
        code: "VALIDATION_ERROR",
      });
      expect(resolve).not.toHaveBeenCalled();
    });

    it("should report invalid input", async () => {
      const { tool } = setup();

      const result = await tool("rds_instance_info").handler({}, context);

      expect(result).toMatchObject({
        status: "error",
        code: "VALIDATION_ERROR",
      });
    });

    it("should report a failed instance listing", async () => {
      const { controlPlane, tool } = setup();
      controlPlane.describeInstances.mockRejectedValueOnce(new Error("boom"));

      const result = await tool("rds_instance_info").handler(
        { databaseName: "test" },
        context,
      );

      expect(result).toEqual({
        status: "error",
        message: "Failed to get rds instances: boom",
        code: "UPSTREAM_ERROR",
      });
    });

    it("should contain unexpected failures", async () => {
      const { controlPlane, tool } = setup();
      controlPlane.describeInstance.mockRejectedValueOnce(
        new Error("AccessDenied"),
      );

      const result = await tool("rds_instance_info").handler(
        { databaseName: "test" },
        context,
      );

      expect(result).toEqual({ status: "error", message: "AccessDenied" });
    });
  });

  describe("rds_metrics", () => {
    it("should report the latest sample of every metric in fixed order", async () => {
      const { metrics, tool } = setup({
        samples: {
          CPUUtilization: [10, 12.5],
          DatabaseConnections: [3],
          FreeableMemory: [2048, 1024],
        },
      });

      const result = await tool("rds_metrics").handler(
        { databaseName: "prod" },
        context,
      );

      expect(result).toEqual({
        status: "success",
        database: "prod-db-1",
        periodMinutes: 60,
        metrics: {
          cpuUtilization: 12.5,
          freeMemoryBytes: 1024,
          connections: 3,
          freeStorageBytes: null,
          readThroughput: null,
          writeThroughput: null,
          readLatency: null,
          writeLatency: null,
          dbLoad: null,
        },
        timestamp: "2024-01-15T11:00:00.000Z",
      });
      expect(metrics.getMetric).toHaveBeenCalledTimes(RDS_METRICS.length);
      expect(metrics.getMetric).toHaveBeenCalledWith({
        namespace: "AWS/RDS",
        metricName: "CPUUtilization",
        dimensions: { DBInstanceIdentifier: "prod-db-1" },
        period: 300,
        stat: "Average",
        start: START,
        end: END,
      });
    });

    it("should keep output keys in order", async () => {
      const { tool } = setup();

      const result = await tool("rds_metrics").handler(
        { databaseName: "test-db-1" },
        context,
      );

      expect(result).toHaveProperty("metrics");
      if (typeof result === "object" && result !== null && "metrics" in result) {
        expect(Object.keys(Object(result.metrics))).toEqual(
          RDS_METRICS.map((m) => m.key),
        );
      }
    });

    it("should honour the period", async () => {
      const { metrics, tool } = setup();

      await tool("rds_metrics").handler(
        { databaseName: "test-db-1", periodMinutes: 15 },
        context,
      );

      expect(metrics.getMetric).toHaveBeenCalledWith(
        expect.objectContaining({
          start: new Date("2024-01-15T10:45:00.000Z"),
        }),
      );
    });

    it.each([0, 1441, 2.5])("should reject a period of %s", async (periodMinutes) => {
      const { metrics, tool } = setup();

      const result = await tool("rds_metrics").handler(
        { databaseName: "test-db-1", periodMinutes },
        context,
      );

      expect(result).toMatchObject({ status: "error", code: "VALIDATION_ERROR" });
      expect(metrics.getMetric).not.toHaveBeenCalled();
    });
  });

  describe("rds_slow_queries", () => {
    it("should return the slowest MySQL queries", async () => {
      const log = [
        "# Time: 2024-01-15T10:30:00.123456Z",
        "# User@Host: app[app] @ [10.0.0.1]  Id: 42",
        "# Query_time: 10.5  Lock_time: 0.1 Rows_sent: 100  Rows_examined: 1000",
        "SET timestamp=1705314600;",
        "SELECT * FROM users WHERE status = 'active';",
      ].join("\n");
      const { tool } = setup({
        logs: { logPages: { [MYSQL_SLOW_LOG_FILE]: [log] } },
      });

      const result = await tool("rds_slow_queries").handler(
        { databaseName: "test-db-1" },
        context,
      );

      expect(result).toEqual({
        status: "success",
        database: "test-db-1",
        engine: "mysql",
        periodMinutes: 60,
        durationUnit: "seconds",
        totalSlowQueries: 1,
        topQueries: [
          {
            timestamp: "2024-01-15T10:30:00.123Z",
            queryTime: 10.5,
            lockTime: 0.1,
            rowsSent: 100,
            rowsExamined: 1000,
            statement: "SELECT * FROM users WHERE status = 'active';",
          },
        ],
      });
    });

    it("should rank PostgreSQL statements and keep the top five", async () => {
      const durations = [5, 50, 1, 20, 7, 3];
      const log = durations
        .map(
          (ms, i) =>
            `2024-01-15 10:5${i}:00 UTC:10.0.0.1(5432):app@orders:[${i}]:LOG:  duration: ${ms} ms  statement: SELECT ${i}`,
        )
        .join("\n");
      const file = "error/postgresql.log.2024-01-15-10";
      const { tool } = setup({
        logs: {
          logFiles: [{ name: file, lastWritten: NOW - 60_000 }],
          logPages: { [file]: [log] },
        },
      });

      const result = await tool("rds_slow_queries").handler(
        { databaseName: "pg-db" },
        context,
      );

      expect(result).toMatchObject({
        status: "success",
        database: "pg-db-1",
        engine: "postgres",
        durationUnit: "milliseconds",
        totalSlowQueries: 6,
      });
      if (typeof result === "object" && result !== null && "topQueries" in result) {
        expect(result.topQueries).toEqual([
          expect.objectContaining({ queryTime: 50, statement: "SELECT 1" }),
          expect.objectContaining({ queryTime: 20, statement: "SELECT 3" }),
          expect.objectContaining({ queryTime: 7, statement: "SELECT 4" }),
          expect.objectContaining({ queryTime: 5, statement: "SELECT 0" }),
          expect.objectContaining({ queryTime: 3, statement: "SELECT 5" }),
        ]);
      }
    });

    it("should refuse unsupported engines without reading logs", async () => {
      const { controlPlane, tool } = setup();

      const result = await tool("rds_slow_queries").handler(
        { databaseName: "mssql" },
        context,
      );

      expect(result).toEqual({
        status: "error",
        message: "Unsupported database engine: sqlserver-ex",
        code: "UNSUPPORTED_ENGINE",
      });
      expect(controlPlane.describeLogFiles).not.toHaveBeenCalled();
      expect(controlPlane.downloadLogPortion).not.toHaveBeenCalled();
    });
  });

  describe("rds_top_load", () => {
    it("should rank statements by average active sessions", async () => {
      const { load, tool } = setup({
        loadKeys: [
          {
            dimensions: {
              "db.sql.statement": "SELECT * FROM t WHERE id IN (1,2,3,4,5,6)",
            },
            total: 0.5,
          },
          { dimensions: { "db.sql.statement": "SELECT 1" }, total: 2.25 },
        ],
      });

      const result = await tool("rds_top_load").handler(
        { databaseName: "test" },
        context,
      );

      expect(result).toEqual({
        status: "success",
        database: "test-db-1",
        dimension: "statement",
        periodMinutes: 60,
        topLoad: [
          { key: "SELECT 1", averageActiveSessions: 2.25 },
          {
            key: "SELECT * FROM t WHERE id IN (1,2,3, ... 5,6)",
            averageActiveSessions: 0.5,
          },
        ],
      });
      expect(load.describeTopKeys).toHaveBeenCalledWith({
        resourceId: "db-TEST-DB-1",
        group: "db.sql",
        start: START,
        end: END,
        limit: 10,
      });
    });

    it("should group by user", async () => {
      const { load, tool } = setup({
        loadKeys: [{ dimensions: { "db.user.name": "app" }, total: 1 }],
      });

      const result = await tool("rds_top_load").handler(
        { databaseName: "prod", dimension: "user", limit: 3 },
        context,
      );

      expect(result).toMatchObject({
        dimension: "user",
        topLoad: [{ key: "app", averageActiveSessions: 1 }],
      });
      expect(load.describeTopKeys).toHaveBeenCalledWith(
        expect.objectContaining({ group: "db.user", limit: 3 }),
      );
    });

    it("should reject limits above 25", async () => {
      const { tool } = setup();

      const result = await tool("rds_top_load").handler(
        { databaseName: "prod", limit: 26 },
        context,
      );

      expect(result).toMatchObject({ status: "error", code: "VALIDATION_ERROR" });
    });

    it("should reject unknown dimensions", async () => {
      const { tool } = setup();

      const result = await tool("rds_top_load").handler(
        { databaseName: "prod", dimension: "table" },
        context,
      );

      expect(result).toMatchObject({ status: "error", code: "VALIDATION_ERROR" });
    });
  });
});
