/**
 * rds-diagnostics-mcp - AWS Client Manager
 *
 * Lazily creates one client per AWS service for the configured region.
 */

import { RDSClient } from "@aws-sdk/client-rds";
import { CloudWatchClient } from "@aws-sdk/client-cloudwatch";
import { PIClient } from "@aws-sdk/client-pi";
import type { AwsConfig } from "../types/index.js";
import { logger } from "../utils/logger.js";

export class AwsClientManager {
  private rds: RDSClient | undefined;
  private cloudWatch: CloudWatchClient | undefined;
  private pi: PIClient | undefined;

  constructor(private readonly config: AwsConfig) {
    if (!config.accessKeyId || !config.secretAccessKey) {
      logger.info(
        "AWS keys not configured, using the default credential provider chain",
      );
    }
  }

  get region(): string {
    return this.config.region;
  }

  /**
   * Explicit static credentials, or undefined to let the SDK resolve them
   */
  private credentials():
    | { accessKeyId: string; secretAccessKey: string }
    | undefined {
    const { accessKeyId, secretAccessKey } = this.config;
    if (accessKeyId && secretAccessKey) {
      return { accessKeyId, secretAccessKey };
    }
    return undefined;
  }

  getRdsClient(): RDSClient {
    this.rds ??= new RDSClient({
      region: this.config.region,
      credentials: this.credentials(),
    });
    return this.rds;
  }

  getCloudWatchClient(): CloudWatchClient {
    this.cloudWatch ??= new CloudWatchClient({
      region: this.config.region,
      credentials: this.credentials(),
    });
    return this.cloudWatch;
  }

  getPiClient(): PIClient {
    this.pi ??= new PIClient({
      region: this.config.region,
      credentials: this.credentials(),
    });
    return this.pi;
  }

  /**
   * Release sockets held by created clients
   */
  destroy(): void {
    this.rds?.destroy();
    this.cloudWatch?.destroy();
    this.pi?.destroy();
    this.rds = undefined;
    this.cloudWatch = undefined;
    this.pi = undefined;
  }
}
