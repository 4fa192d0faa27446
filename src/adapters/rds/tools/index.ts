/**
 * RDS Adapter Tools - Index
 *
 * Aggregates all tool exports for the RDS adapter.
 */

import type { ToolDefinition } from "../../../types/index.js";
import type { RdsToolServices } from "./common.js";
import { getInstanceTools } from "./instance.js";
import { getMetricsTools } from "./metrics.js";
import { getSlowQueryTools } from "./slowQueries.js";
import { getTopLoadTools } from "./topLoad.js";

export { getInstanceTools, getMetricsTools, getSlowQueryTools, getTopLoadTools };
export {
  toErrorResult,
  parseParams,
  runTool,
  type RdsToolServices,
} from "./common.js";

/**
 * Every RDS tool, in group order
 */
export function getRdsTools(services: RdsToolServices): ToolDefinition[] {
  return [
    ...getInstanceTools(services),
    ...getMetricsTools(services),
    ...getSlowQueryTools(services),
    ...getTopLoadTools(services),
  ];
}
