/**
 * rds-diagnostics-mcp - Name Match Strategies
 *
 * Two interchangeable ways to turn a user-supplied database name into a
 * member of the candidate identifier set.
 */

import { z } from "zod";
import type {
  InferenceClient,
  ResolverStrategy,
} from "../../../types/index.js";
import { logger } from "../../../utils/logger.js";
import { bestMatch } from "./bestMatch.js";

export interface MatchStrategy {
  readonly kind: ResolverStrategy;

  /**
   * Propose one of `candidates` for `rawName`, or undefined
   */
  match(
    rawName: string,
    candidates: readonly string[],
  ): Promise<string | undefined>;
}

/**
 * Substring matching via {@link bestMatch}; works offline.
 */
export class DeterministicMatchStrategy implements MatchStrategy {
  readonly kind = "match" as const;

  match(
    rawName: string,
    candidates: readonly string[],
  ): Promise<string | undefined> {
    return Promise.resolve(bestMatch(rawName, candidates));
  }
}

const SYSTEM_PROMPT =
  "You are a helpful assistant that finds the best matching RDS instance name. Always respond with valid JSON.";

const MatchResponseSchema = z.object({
  rds_instance: z.string().nullish(),
});

export function buildMatchPrompt(
  rawName: string,
  candidates: readonly string[],
): string {
  return [
    `Given the database name: ${rawName}, please find the most likely RDS instance name from the following list: ${JSON.stringify(candidates)}`,
    "Format your response as a JSON object with:",
    "{",
    '    "rds_instance": "best matching rds instance name or null"',
    "}",
    "Respond with the JSON object only.",
  ].join("\n");
}

/**
 * Extract the JSON object from a completion, tolerating a fenced block
 */
function extractJson(text: string): unknown {
  const trimmed = text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");
  return JSON.parse(trimmed);
}

/**
 * Ask the inference service to pick the instance. Failures and
 * malformed output count as no match.
 */
export class InferenceMatchStrategy implements MatchStrategy {
  readonly kind = "inference" as const;

  constructor(private readonly client: InferenceClient) {}

  async match(
    rawName: string,
    candidates: readonly string[],
  ): Promise<string | undefined> {
    let text: string;
    try {
      text = await this.client.complete(buildMatchPrompt(rawName, candidates), {
        system: SYSTEM_PROMPT,
        maxTokens: 500,
        temperature: 0.1,
      });
    } catch (error) {
      logger.error("Error calling inference service", {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = extractJson(text);
    } catch (error) {
      logger.error("Error parsing JSON response", {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const result = MatchResponseSchema.safeParse(parsed);
    const proposal = result.success ? result.data.rds_instance : undefined;
    if (!proposal) return undefined;

    if (!candidates.includes(proposal)) {
      logger.warn("Inference proposed an unknown instance", {
        rawName,
        proposal,
      });
      return undefined;
    }
    return proposal;
  }
}
