/**
 * rds-diagnostics-mcp - Slow Query Collector
 *
 * Engine-selected retrieval and parsing of slow-query logs.
 */

import type {
  DurationUnit,
  Engine,
  SlowQueryRecord,
} from "../../../types/index.js";
import { UnsupportedEngineError } from "../../../types/index.js";
import { logger } from "../../../utils/logger.js";
import { durationUnitFor, toEngine } from "./engine.js";
import type { LogFetcher } from "./LogFetcher.js";
import { parseMySqlSlowLog } from "./mysqlSlowLog.js";
import { parsePostgresLog } from "./postgresLog.js";

export const MYSQL_SLOW_LOG_FILE = "slowquery/mysql-slowquery.log";
export const POSTGRES_LOG_FILTER = "error/postgresql.log.";

export type SlowLogParser = (text: string) => SlowQueryRecord[];

/**
 * Pick the parser for an engine. Unsupported engines throw before any
 * parsing happens.
 */
export function parserFor(engine: Engine): SlowLogParser {
  switch (engine.kind) {
    case "mysql":
      return parseMySqlSlowLog;
    case "postgres":
      return parsePostgresLog;
    case "unsupported":
      throw new UnsupportedEngineError(engine.name);
  }
}

export interface SlowQueryCollection {
  engine: Exclude<Engine, { kind: "unsupported" }>;
  durationUnit: DurationUnit;
  logFiles: string[];
  records: SlowQueryRecord[];
}

export class SlowQueryCollector {
  constructor(
    private readonly fetcher: LogFetcher,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Download and parse the slow-query logs of one instance.
   *
   * MySQL has a single rolling slow log. PostgreSQL writes slow
   * statements to its error log, rotated hourly; files last written
   * within the period are read one at a time.
   */
  async collect(
    instanceId: string,
    engineName: string,
    periodMinutes: number,
  ): Promise<SlowQueryCollection> {
    const engine = toEngine(engineName);
    if (engine.kind === "unsupported") {
      throw new UnsupportedEngineError(engine.name);
    }
    const parse = parserFor(engine);

    const logFiles =
      engine.kind === "mysql"
        ? [MYSQL_SLOW_LOG_FILE]
        : (
            await this.fetcher.listRecentLogFiles(
              instanceId,
              POSTGRES_LOG_FILTER,
              new Date(this.now() - periodMinutes * 60_000),
            )
          ).map((file) => file.name);

    logger.debug("Collecting slow queries", {
      instanceId,
      engine: engine.kind,
      logFiles: logFiles.length,
    });

    const records: SlowQueryRecord[] = [];
    for (const logFile of logFiles) {
      const text = await this.fetcher.fetchFullLog(instanceId, logFile);
      for (const record of parse(text)) {
        records.push(record);
      }
    }

    return {
      engine,
      durationUnit: durationUnitFor(engine),
      logFiles,
      records,
    };
  }
}
