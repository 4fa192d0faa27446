/**
 * rds-diagnostics-mcp - RDS Control Plane
 *
 * Read-only RDS API calls mapped onto the ControlPlaneApi interface.
 */

import {
  DescribeDBInstancesCommand,
  DescribeDBLogFilesCommand,
  DownloadDBLogFilePortionCommand,
  type DBInstance,
  type RDSClient,
} from "@aws-sdk/client-rds";
import type {
  ControlPlaneApi,
  InstanceDirectoryEntry,
  LogFilePage,
  LogPortion,
} from "../types/index.js";
import { classifyEngineFamily } from "../adapters/rds/logs/engine.js";

export function mapDbInstance(instance: DBInstance): InstanceDirectoryEntry {
  const engine = instance.Engine ?? "";
  return {
    identifier: instance.DBInstanceIdentifier ?? "",
    engine,
    engineFamily: classifyEngineFamily(engine),
    status: instance.DBInstanceStatus ?? "",
    endpoint: instance.Endpoint?.Address
      ? {
          host: instance.Endpoint.Address,
          port: instance.Endpoint.Port ?? 0,
        }
      : undefined,
    resourceId: instance.DbiResourceId ?? "",
    allocatedStorage: instance.AllocatedStorage ?? 0,
  };
}

function isInstanceNotFound(error: unknown): boolean {
  return error instanceof Error && error.name === "DBInstanceNotFoundFault";
}

export class RdsControlPlane implements ControlPlaneApi {
  constructor(private readonly client: RDSClient) {}

  /**
   * Single DescribeDBInstances call; the first page covers up to 100
   * instances.
   */
  async describeInstances(): Promise<InstanceDirectoryEntry[]> {
    const response = await this.client.send(new DescribeDBInstancesCommand({}));
    return (response.DBInstances ?? []).map(mapDbInstance);
  }

  async describeInstance(
    identifier: string,
  ): Promise<InstanceDirectoryEntry | undefined> {
    try {
      const response = await this.client.send(
        new DescribeDBInstancesCommand({ DBInstanceIdentifier: identifier }),
      );
      const instance = response.DBInstances?.[0];
      return instance ? mapDbInstance(instance) : undefined;
    } catch (error) {
      if (isInstanceNotFound(error)) return undefined;
      throw error;
    }
  }

  async describeLogFiles(
    identifier: string,
    filenameContains: string,
    cursor?: string,
  ): Promise<LogFilePage> {
    const response = await this.client.send(
      new DescribeDBLogFilesCommand({
        DBInstanceIdentifier: identifier,
        FilenameContains: filenameContains,
        Marker: cursor,
      }),
    );
    return {
      files: (response.DescribeDBLogFiles ?? []).map((file) => ({
        name: file.LogFileName ?? "",
        lastWritten: file.LastWritten ?? 0,
        size: file.Size,
      })),
      nextCursor: response.Marker,
    };
  }

  async downloadLogPortion(
    identifier: string,
    logFileName: string,
    cursor: string,
    numberOfLines: number,
  ): Promise<LogPortion> {
    const response = await this.client.send(
      new DownloadDBLogFilePortionCommand({
        DBInstanceIdentifier: identifier,
        LogFileName: logFileName,
        Marker: cursor,
        NumberOfLines: numberOfLines,
      }),
    );
    return {
      data: response.LogFileData ?? "",
      nextCursor: response.Marker,
      morePending: response.AdditionalDataPending ?? false,
    };
  }
}
