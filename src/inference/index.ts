export {
  AnthropicInferenceClient,
  DEFAULT_INFERENCE_MODEL,
} from "./AnthropicInferenceClient.js";
