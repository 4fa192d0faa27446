/**
 * rds-diagnostics-mcp - Instance Directory
 *
 * Time-bounded cache of the full instance list. Readers see either no
 * snapshot or one complete snapshot; a refresh swaps the reference.
 */

import type {
  ControlPlaneApi,
  DirectoryListing,
  DirectorySnapshot,
} from "../../../types/index.js";
import { logger } from "../../../utils/logger.js";
import { mcpLogger } from "../../../logging/McpLogging.js";

export const DEFAULT_DIRECTORY_TTL_SECONDS = 300;

export interface InstanceDirectoryOptions {
  ttlSeconds?: number;
  now?: () => number;
}

export class InstanceDirectory {
  private snapshot: DirectorySnapshot | undefined;
  private refreshing: Promise<DirectoryListing> | undefined;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly api: ControlPlaneApi,
    options: InstanceDirectoryOptions = {},
  ) {
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_DIRECTORY_TTL_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Return the cached instance list, refreshing it once expired.
   * Overlapping callers share a single refresh.
   */
  async listInstances(): Promise<DirectoryListing> {
    const snapshot = this.snapshot;
    if (snapshot && this.now() - snapshot.fetchedAt < this.ttlMs) {
      logger.debug("Returning cached instance directory", {
        instances: snapshot.entries.length,
      });
      return {
        status: "success",
        instances: snapshot.entries,
        fetchedAt: snapshot.fetchedAt,
        cached: true,
      };
    }

    this.refreshing ??= this.refresh().finally(() => {
      this.refreshing = undefined;
    });
    return this.refreshing;
  }

  /**
   * Current snapshot, if any, regardless of age
   */
  peek(): DirectorySnapshot | undefined {
    return this.snapshot;
  }

  /**
   * Drop the snapshot so the next read refetches
   */
  invalidate(): void {
    this.snapshot = undefined;
  }

  private async refresh(): Promise<DirectoryListing> {
    const startedAt = this.now();
    try {
      const entries = await this.api.describeInstances();
      const snapshot: DirectorySnapshot = Object.freeze({
        entries: Object.freeze(entries.map((entry) => Object.freeze(entry))),
        fetchedAt: startedAt,
      });
      this.snapshot = snapshot;

      logger.info("Refreshed instance directory", {
        instances: snapshot.entries.length,
      });
      mcpLogger.info("Instance directory refreshed", {
        instances: snapshot.entries.length,
      });

      return {
        status: "success",
        instances: snapshot.entries,
        fetchedAt: snapshot.fetchedAt,
        cached: false,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error("Error listing RDS instances", { error: message });
      return {
        status: "error",
        message: `Failed to get rds instances: ${message}`,
      };
    }
  }
}
