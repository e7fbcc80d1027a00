import OpenAI from "openai";
import { APIError, OpenAIError } from "openai/error";
import type {
  Response,
  ResponseCreateParamsNonStreaming,
} from "openai/resources/responses/responses";

import {
  delay,
  isRetriableMessage,
  LlmError,
  retryDelayMs,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
  type ReasoningEffort,
} from "./client.js";

type OpenAiTransport = {
  create: (
    body: ResponseCreateParamsNonStreaming,
    options?: OpenAI.RequestOptions,
  ) => Promise<Response>;
};

export type OpenAiClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultReasoningEffort?: ReasoningEffort;
  maxRetries?: number;
  fetch?: typeof fetch;
  transport?: OpenAiTransport;
};

const DEFAULT_TIMEOUT_MS = 600_000;
const DEFAULT_MAX_RETRIES = 3;
const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export class OpenAiClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultReasoningEffort?: ReasoningEffort;
  private readonly maxRetries: number;
  private readonly transport: OpenAiTransport;

  constructor(options: OpenAiClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultReasoningEffort = options.defaultReasoningEffort;
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);

    if (!options.transport) {
      const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new LlmError(
          "OpenAI API key is required. Set OPENAI_API_KEY or pass apiKey to OpenAiClient.",
        );
      }
      this.transport = createTransport({
        apiKey,
        baseURL: options.baseURL,
        fetch: options.fetch,
      });
    } else {
      this.transport = options.transport;
    }
  }

  async complete(
    prompt: string,
    options: LlmCompletionOptions = {},
  ): Promise<LlmCompletionResult> {
    const body = this.buildRequestBody(prompt, options);
    const requestOptions = this.buildRequestOptions(options);

    const response = await this.runWithRetries(
      () => this.transport.create(body, requestOptions),
      options.signal,
    );

    const text = response.output_text ?? "";
    if (!text) {
      throw new LlmError("OpenAI response did not include assistant content.", response);
    }

    return { text, finishReason: response.status ?? null };
  }

  private buildRequestBody(
    prompt: string,
    options: LlmCompletionOptions,
  ): ResponseCreateParamsNonStreaming {
    // Reasoning models reject explicit temperatures, so only send one when configured.
    const temperature = options.temperature ?? this.defaultTemperature;
    const reasoningEffort = options.reasoningEffort ?? this.defaultReasoningEffort;

    return {
      model: this.model,
      input: prompt,
      temperature,
      reasoning: reasoningEffort ? { effort: reasoningEffort } : undefined,
    };
  }

  private buildRequestOptions(options: LlmCompletionOptions): OpenAI.RequestOptions | undefined {
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;
    if (!timeout && !options.signal) return undefined;
    return { timeout: timeout || undefined, signal: options.signal };
  }

  private async runWithRetries<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let attempt = 1;
    let lastError: unknown;

    // One initial attempt plus up to maxRetries retries.
    while (attempt <= this.maxRetries + 1) {
      try {
        return await fn();
      } catch (err) {
        lastError = err;
        if (signal?.aborted || !this.isRetryable(err) || attempt > this.maxRetries) {
          throw this.wrapError(err);
        }
        await delay(retryDelayMs(attempt), signal);
      }
      attempt += 1;
    }

    throw this.wrapError(lastError ?? new Error("Unknown OpenAI failure"));
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof APIError) {
      if (error.status === undefined) return false;
      return RETRIABLE_STATUS_CODES.has(error.status);
    }
    if (error instanceof Error) {
      return isRetriableMessage(error.message);
    }
    return false;
  }

  private wrapError(error: unknown): LlmError {
    if (error instanceof APIError) {
      const status = error.status ?? "unknown";
      const detail =
        error.error && typeof error.error === "object" && "message" in error.error
          ? String(error.error.message)
          : error.message;
      const hint =
        status === 401 || status === 403
          ? "Check OPENAI_API_KEY and permissions."
          : status === 429
            ? "Rate limited by OpenAI."
            : null;
      const suffix = hint ? ` ${hint}` : "";
      return new LlmError(`OpenAI request failed (status ${status}): ${detail}${suffix}`, error);
    }

    if (error instanceof OpenAIError) {
      return new LlmError(`OpenAI request failed: ${error.message}`, error);
    }

    if (error instanceof Error) {
      return new LlmError(error.message, error);
    }

    return new LlmError("OpenAI request failed due to an unknown error.", error);
  }
}

function createTransport(args: {
  apiKey: string;
  baseURL?: string;
  fetch?: typeof fetch;
}): OpenAiTransport {
  const client = new OpenAI({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    fetch: args.fetch,
    maxRetries: 0, // Manual retries handled in OpenAiClient.
  });

  return {
    create: (body, options) => client.responses.create({ ...body, stream: false }, options),
  };
}
