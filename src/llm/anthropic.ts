import Anthropic, { APIError } from "@anthropic-ai/sdk";
import type {
  Message,
  MessageCreateParamsNonStreaming,
} from "@anthropic-ai/sdk/resources/messages/messages";

import {
  delay,
  isRetriableMessage,
  LlmError,
  retryDelayMs,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
} from "./client.js";

type AnthropicRequestOptions = {
  timeout?: number;
  maxRetries?: number;
  signal?: AbortSignal;
};

type AnthropicTransport = {
  create: (
    body: MessageCreateParamsNonStreaming,
    options?: AnthropicRequestOptions,
  ) => Promise<Message>;
};

export type AnthropicClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  maxRetries?: number;
  transport?: AnthropicTransport;
};

const DEFAULT_TIMEOUT_MS = 600_000;
const DEFAULT_MAX_TOKENS = 16_000;
const DEFAULT_MAX_RETRIES = 3;
const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504, 529]);

export class AnthropicClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly maxRetries: number;
  private readonly transport: AnthropicTransport;

  constructor(options: AnthropicClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultMaxTokens = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);

    if (options.transport) {
      this.transport = options.transport;
      return;
    }

    const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new LlmError(
        "Anthropic API key is required. Set ANTHROPIC_API_KEY or pass apiKey to AnthropicClient.",
      );
    }

    const client = new Anthropic({ apiKey, baseURL: options.baseURL, maxRetries: 0 });
    this.transport = {
      create: (body, requestOptions) => client.messages.create(body, requestOptions),
    };
  }

  async complete(
    prompt: string,
    options: LlmCompletionOptions = {},
  ): Promise<LlmCompletionResult> {
    const temperature = options.temperature ?? this.defaultTemperature;
    const body: MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.defaultMaxTokens,
      messages: [{ role: "user", content: prompt }],
      ...(temperature === undefined ? {} : { temperature }),
    };

    const requestOptions: AnthropicRequestOptions = {
      timeout: options.timeoutMs ?? this.defaultTimeoutMs,
      signal: options.signal,
    };

    const response = await this.runWithRetries(
      () => this.transport.create(body, requestOptions),
      options.signal,
    );

    const text = extractText(response);
    if (!text) {
      throw new LlmError("Anthropic response did not include text content.", response);
    }

    return { text, finishReason: response.stop_reason ?? null };
  }

  private async runWithRetries<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await fn();
      } catch (err) {
        if (signal?.aborted || !this.isRetryable(err) || attempt > this.maxRetries) {
          throw this.wrapError(err);
        }
        await delay(retryDelayMs(attempt), signal);
      }
    }
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof APIError) {
      return error.status !== undefined && RETRIABLE_STATUS_CODES.has(error.status);
    }
    return error instanceof Error && isRetriableMessage(error.message);
  }

  private wrapError(error: unknown): LlmError {
    if (error instanceof APIError) {
      const status = error.status ?? "unknown";
      const hint =
        status === 401 || status === 403
          ? " Check ANTHROPIC_API_KEY and permissions."
          : status === 429
            ? " Rate limited by Anthropic."
            : "";
      return new LlmError(
        `Anthropic request failed (status ${status}): ${error.message}${hint}`,
        error,
      );
    }

    if (error instanceof Error) {
      return new LlmError(error.message, error);
    }

    return new LlmError("Anthropic request failed due to an unknown error.", error);
  }
}

function extractText(message: Message): string {
  const parts: string[] = [];
  for (const block of message.content) {
    if (block.type === "text") {
      parts.push(block.text);
    }
  }
  return parts.join("").trim();
}
