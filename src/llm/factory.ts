import type { LlmConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { AnthropicClient } from "./anthropic.js";
import { LlmError, type LlmClient } from "./client.js";
import { OpenAiClient } from "./openai.js";

export function createLlmClient(config: LlmConfig): LlmClient {
  try {
    switch (config.provider) {
      case "openai":
        return new OpenAiClient({
          model: config.model,
          defaultTemperature: config.temperature,
          defaultTimeoutMs: config.timeout_ms,
          defaultReasoningEffort: config.reasoning_effort,
          maxRetries: config.max_retries,
        });
      case "anthropic":
        return new AnthropicClient({
          model: config.model,
          defaultTemperature: config.temperature,
          defaultTimeoutMs: config.timeout_ms,
          defaultMaxTokens: config.max_tokens,
          maxRetries: config.max_retries,
        });
      default: {
        const provider: never = config.provider;
        throw new LlmError(`Unsupported LLM provider: ${String(provider)}`);
      }
    }
  } catch (err) {
    if (err instanceof LlmError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "LLM client not configured.",
        message: err.message,
        hint: "Export the API key for the provider set in llm.provider.",
        cause: err,
      });
    }
    throw err;
  }
}
