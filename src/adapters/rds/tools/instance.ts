/**
 * RDS Instance Tools
 */

import type {
  RequestContext,
  ToolDefinition,
} from "../../../types/index.js";
import { InstanceInfoSchema } from "../types.js";
import {
  describeResolved,
  parseParams,
  runTool,
  type RdsToolServices,
} from "./common.js";

export function createInstanceInfoTool(
  services: RdsToolServices,
): ToolDefinition {
  return {
    name: "rds_instance_info",
    title: "RDS Instance Info",
    description:
      "Describe an RDS instance: status, engine, endpoint, resource id and allocated storage (GiB).",
    group: "instance",
    inputSchema: InstanceInfoSchema,
    annotations: {
      readOnlyHint: true,
      idempotentHint: true,
      openWorldHint: true,
    },
    handler: (params: unknown, _context: RequestContext) =>
      runTool("rds_instance_info", async () => {
        const { databaseName } = parseParams(InstanceInfoSchema, params);
        const instance = await describeResolved(services, databaseName);

        return {
          status: instance.status,
          identifier: instance.identifier,
          engine: instance.engine,
          endpoint: instance.endpoint?.host ?? null,
          port: instance.endpoint?.port ?? null,
          resourceId: instance.resourceId,
          allocatedStorage: instance.allocatedStorage,
        };
      }),
  };
}

export function getInstanceTools(services: RdsToolServices): ToolDefinition[] {
  return [createInstanceInfoTool(services)];
}
