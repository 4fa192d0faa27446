/**
 * rds-diagnostics-mcp - Anthropic Inference Client
 */

import Anthropic from "@anthropic-ai/sdk";
import type { CompletionOptions, InferenceClient } from "../types/index.js";
import { UpstreamError } from "../types/index.js";

export const DEFAULT_INFERENCE_MODEL = "claude-3-5-haiku-latest";

export class AnthropicInferenceClient implements InferenceClient {
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string = DEFAULT_INFERENCE_MODEL,
  ) {
    this.client = new Anthropic({ apiKey });
  }

  /**
   * Single-turn completion; returns the concatenated text blocks
   */
  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      system: options.system,
      messages: [{ role: "user", content: prompt }],
    });

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
    if (!text) {
      throw new UpstreamError("Inference service returned no text", {
        model: this.model,
        stopReason: response.stop_reason,
      });
    }
    return text;
  }
}
