import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  MYSQL_SLOW_LOG_FILE,
  SlowQueryCollector,
  parserFor,
} from "../SlowQueryCollector.js";
import { LogFetcher } from "../LogFetcher.js";
import { parseMySqlSlowLog } from "../mysqlSlowLog.js";
import { parsePostgresLog } from "../postgresLog.js";
import { UnsupportedEngineError } from "../../../../types/index.js";
import { createMockControlPlane } from "../../../../__tests__/mocks/index.js";

const NOW = Date.parse("2024-01-15T11:00:00.000Z");

const MYSQL_LOG = [
  "# Time: 2024-01-15T10:30:00.000000Z",
  "# Query_time: 10.5  Lock_time: 0.1 Rows_sent: 100  Rows_examined: 1000",
  "SELECT * FROM users WHERE status = 'active';",
].join("\n");

const POSTGRES_LOG =
  "2024-01-15 10:45:00 UTC:10.0.0.1(5432):app@orders:[7]:LOG:  duration: 812.4 ms  statement: SELECT * FROM orders\n";

describe("parserFor", () => {
  it("should pick the parser for each supported engine", () => {
    expect(parserFor({ kind: "mysql" })).toBe(parseMySqlSlowLog);
    expect(parserFor({ kind: "postgres" })).toBe(parsePostgresLog);
  });

  it("should throw for unsupported engines", () => {
    expect(() => parserFor({ kind: "unsupported", name: "oracle-ee" })).toThrow(
      "Unsupported database engine: oracle-ee",
    );
  });
});

describe("SlowQueryCollector", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("should read the single MySQL slow log", async () => {
    const api = createMockControlPlane([], {
      logPages: { [MYSQL_SLOW_LOG_FILE]: [MYSQL_LOG] },
    });
    const collector = new SlowQueryCollector(new LogFetcher(api), () => NOW);

    const collection = await collector.collect("test-db-1", "aurora-mysql", 60);

    expect(collection.engine).toEqual({ kind: "mysql" });
    expect(collection.durationUnit).toBe("seconds");
    expect(collection.logFiles).toEqual([MYSQL_SLOW_LOG_FILE]);
    expect(collection.records).toHaveLength(1);
    expect(collection.records[0]?.queryTime).toBe(10.5);
    expect(api.describeLogFiles).not.toHaveBeenCalled();
  });

  it("should read PostgreSQL logs written within the period", async () => {
    const api = createMockControlPlane([], {
      logFiles: [
        {
          name: "error/postgresql.log.2024-01-15-10",
          lastWritten: NOW - 10 * 60_000,
        },
        {
          name: "error/postgresql.log.2024-01-15-08",
          lastWritten: NOW - 3 * 60 * 60_000,
        },
      ],
      logPages: { "error/postgresql.log.2024-01-15-10": [POSTGRES_LOG] },
    });
    const collector = new SlowQueryCollector(new LogFetcher(api), () => NOW);

    const collection = await collector.collect("pg-db-1", "postgres", 60);

    expect(collection.engine).toEqual({ kind: "postgres" });
    expect(collection.durationUnit).toBe("milliseconds");
    expect(collection.logFiles).toEqual(["error/postgresql.log.2024-01-15-10"]);
    expect(collection.records).toEqual([
      {
        timestamp: "2024-01-15T10:45:00.000Z",
        queryTime: 812.4,
        statement: "SELECT * FROM orders",
      },
    ]);
    expect(api.downloadLogPortion).toHaveBeenCalledTimes(1);
  });

  it("should reject unsupported engines before fetching anything", async () => {
    const api = createMockControlPlane();
    const collector = new SlowQueryCollector(new LogFetcher(api), () => NOW);

    const result = collector.collect("mssql-db", "sqlserver-ex", 60);
    await expect(result).rejects.toBeInstanceOf(UnsupportedEngineError);
    await expect(result).rejects.toThrow(
      "Unsupported database engine: sqlserver-ex",
    );
    expect(api.describeLogFiles).not.toHaveBeenCalled();
    expect(api.downloadLogPortion).not.toHaveBeenCalled();
  });

  it("should collect very large logs in full", async () => {
    const entry = "# Time: 2024-01-15T10:30:00.000000Z\n# Query_time: 1.5\nSELECT 1\n";
    const api = createMockControlPlane([], {
      logPages: { [MYSQL_SLOW_LOG_FILE]: [entry.repeat(250_000)] },
    });
    const collector = new SlowQueryCollector(new LogFetcher(api), () => NOW);

    const collection = await collector.collect("test-db-1", "mysql", 60);

    expect(collection.records).toHaveLength(250_000);
    expect(collection.records[249_999]).toEqual({
      timestamp: "2024-01-15T10:30:00.000Z",
      queryTime: 1.5,
      statement: "SELECT 1",
    });
  }, 30_000);
});
