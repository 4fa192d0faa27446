/**
 * rds-diagnostics-mcp - Tool Filtering System
 *
 * Parses and applies tool filter rules from the command line or
 * environment variables.
 *
 * Syntax:
 *   -group    → Disable all tools in a group
 *   +group    → Enable all tools in a group
 *   -tool     → Disable a specific tool
 *   +tool     → Enable a specific tool (after group disable)
 *   name      → Bare names are treated as exclusions
 */

import type {
  ToolGroup,
  ToolFilterConfig,
  ToolFilterRule,
  ToolDefinition,
} from "../types/index.js";

/**
 * Canonical mapping of tools to groups
 */
export const TOOL_GROUPS: Record<ToolGroup, readonly string[]> = {
  instance: ["rds_instance_info"],
  metrics: ["rds_metrics"],
  logs: ["rds_slow_queries"],
  load: ["rds_top_load"],
};

const GROUP_NAMES: readonly ToolGroup[] = ["instance", "metrics", "logs", "load"];

/**
 * Get all tool names from all groups
 */
export function getAllToolNames(): string[] {
  return GROUP_NAMES.flatMap((group) => TOOL_GROUPS[group]);
}

/**
 * Get the group for a specific tool
 */
export function getToolGroup(toolName: string): ToolGroup | undefined {
  return GROUP_NAMES.find((group) => TOOL_GROUPS[group].includes(toolName));
}

function isToolGroup(name: string): name is ToolGroup {
  return GROUP_NAMES.some((group) => group === name);
}

function toRule(part: string): ToolFilterRule {
  const type = part.startsWith("+") ? "include" : "exclude";
  const target = part.startsWith("+") || part.startsWith("-") ? part.slice(1) : part;
  return { type, target, isGroup: isToolGroup(target) };
}

/**
 * Parse a tool filter string into structured rules. Rules apply left
 * to right; unknown tool names are recorded but enable nothing.
 *
 * @param filterString - e.g. "-load,+rds_top_load"
 */
export function parseToolFilter(
  filterString: string | undefined,
): ToolFilterConfig {
  const allTools = getAllToolNames();
  const enabledTools = new Set<string>(allTools);

  if (!filterString || filterString.trim() === "") {
    return { raw: "", rules: [], enabledTools };
  }

  const rules = filterString
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part)
    .map(toRule);

  for (const rule of rules) {
    const targets = isToolGroup(rule.target)
      ? TOOL_GROUPS[rule.target]
      : allTools.filter((tool) => tool === rule.target);

    for (const tool of targets) {
      if (rule.type === "include") {
        enabledTools.add(tool);
      } else {
        enabledTools.delete(tool);
      }
    }
  }

  return { raw: filterString, rules, enabledTools };
}

/**
 * Check if a tool is enabled based on filter configuration
 */
export function isToolEnabled(
  toolName: string,
  config: ToolFilterConfig,
): boolean {
  return config.enabledTools.has(toolName);
}

/**
 * Filter a list of tool definitions based on filter configuration
 */
export function filterTools(
  tools: ToolDefinition[],
  config: ToolFilterConfig,
): ToolDefinition[] {
  return tools.filter((tool) => config.enabledTools.has(tool.name));
}

/**
 * Get the tool filter from environment variables
 */
export function getToolFilterFromEnv(): ToolFilterConfig {
  const filterString =
    process.env["RDS_MCP_TOOL_FILTER"] ?? process.env["TOOL_FILTER"] ?? "";
  return parseToolFilter(filterString);
}

/**
 * Calculate token savings from tool filtering.
 * Assumes ~200 tokens per tool definition (description + parameters)
 */
export function calculateTokenSavings(
  totalTools: number,
  enabledTools: number,
  tokensPerTool = 200,
): { tokensSaved: number; percentSaved: number } {
  const disabledTools = totalTools - enabledTools;
  const tokensSaved = disabledTools * tokensPerTool;
  const percentSaved =
    totalTools > 0 ? Math.round((disabledTools / totalTools) * 100) : 0;

  return { tokensSaved, percentSaved };
}

/**
 * Generate a summary of the current filter configuration
 */
export function getFilterSummary(config: ToolFilterConfig): string {
  const totalCount = getAllToolNames().length;
  const enabledCount = config.enabledTools.size;

  const lines: string[] = [
    `Tool Filter Summary:`,
    `  Enabled: ${enabledCount}/${totalCount} tools`,
  ];

  if (config.rules.length > 0) {
    lines.push(`  Rules applied:`);
    for (const rule of config.rules) {
      const prefix = rule.type === "include" ? "+" : "-";
      const suffix = rule.isGroup ? " (group)" : "";
      lines.push(`    ${prefix}${rule.target}${suffix}`);
    }
  }

  const disabledGroups = GROUP_NAMES.filter((group) =>
    TOOL_GROUPS[group].every((tool) => !config.enabledTools.has(tool)),
  );
  if (disabledGroups.length > 0) {
    lines.push(`  Disabled groups: ${disabledGroups.join(", ")}`);
  }

  const { tokensSaved, percentSaved } = calculateTokenSavings(
    totalCount,
    enabledCount,
  );
  if (tokensSaved > 0) {
    lines.push(`  Token savings: ~${tokensSaved} tokens (${percentSaved}%)`);
  }

  return lines.join("\n");
}

/**
 * Get a list of all tool groups with their tool counts
 */
export function getToolGroupInfo(): {
  group: ToolGroup;
  count: number;
  tools: string[];
}[] {
  return GROUP_NAMES.map((group) => ({
    group,
    count: TOOL_GROUPS[group].length,
    tools: [...TOOL_GROUPS[group]],
  }));
}
