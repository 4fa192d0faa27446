/**
 * rds-diagnostics-mcp - Log Fetcher
 *
 * Paginated retrieval of raw log text from the control plane. Pages are
 * exposed as a lazy sequence; the cursor never leaves this module.
 */

import type { ControlPlaneApi, LogFileInfo } from "../../../types/index.js";
import { UpstreamError } from "../../../types/index.js";
import { logger } from "../../../utils/logger.js";

/** Lines requested per log portion */
export const LOG_PAGE_LINES = 1000;

/** Cursor meaning "from the start of the file" */
export const INITIAL_CURSOR = "0";

export interface LogFetcherOptions {
  /** Upper bound on pages per file before giving up */
  maxPages?: number;
}

export class LogFetcher {
  private readonly maxPages: number;

  constructor(
    private readonly api: ControlPlaneApi,
    options: LogFetcherOptions = {},
  ) {
    this.maxPages = options.maxPages ?? 10000;
  }

  /**
   * Yield each page of a log file in order until the control plane
   * stops reporting pending data.
   */
  async *streamLog(
    instanceId: string,
    logFileName: string,
  ): AsyncGenerator<string, void, undefined> {
    let cursor = INITIAL_CURSOR;

    for (let page = 1; ; page++) {
      if (page > this.maxPages) {
        throw new UpstreamError(
          `Log download for ${logFileName} exceeded ${this.maxPages} pages`,
          { instanceId, logFileName },
        );
      }

      const portion = await this.api.downloadLogPortion(
        instanceId,
        logFileName,
        cursor,
        LOG_PAGE_LINES,
      );
      yield portion.data;

      if (!portion.morePending) return;
      cursor = portion.nextCursor ?? INITIAL_CURSOR;
    }
  }

  /**
   * Download a whole log file as one string
   */
  async fetchFullLog(instanceId: string, logFileName: string): Promise<string> {
    const chunks: string[] = [];
    for await (const chunk of this.streamLog(instanceId, logFileName)) {
      chunks.push(chunk);
    }
    logger.debug("Downloaded log file", {
      instanceId,
      logFileName,
      pages: chunks.length,
    });
    return chunks.join("");
  }

  /**
   * List log files whose name contains `filenameContains` and that were
   * last written at or after `since`.
   */
  async listRecentLogFiles(
    instanceId: string,
    filenameContains: string,
    since: Date,
  ): Promise<LogFileInfo[]> {
    const threshold = since.getTime();
    const files: LogFileInfo[] = [];
    let cursor: string | undefined;

    do {
      const page = await this.api.describeLogFiles(
        instanceId,
        filenameContains,
        cursor,
      );
      for (const file of page.files) {
        if (file.lastWritten >= threshold) {
          files.push(file);
        }
      }
      cursor = page.nextCursor;
    } while (cursor);

    return files;
  }
}
