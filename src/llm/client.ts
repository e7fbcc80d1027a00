import type { ReasoningEffort } from "../core/config.js";

export type { ReasoningEffort };

export type LlmCompletionOptions = {
  temperature?: number;
  timeoutMs?: number;
  reasoningEffort?: ReasoningEffort;
  signal?: AbortSignal;
};

export type LlmCompletionResult = {
  text: string;
  finishReason: string | null;
};

export interface LlmClient {
  complete(prompt: string, options?: LlmCompletionOptions): Promise<LlmCompletionResult>;
}

export class LlmError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "LlmError";
  }
}

const RETRIABLE_MESSAGE_PATTERNS = ["timeout", "etimedout", "econnreset", "socket hang up"];

export function isRetriableMessage(message: string): boolean {
  const lowered = message.toLowerCase();
  return RETRIABLE_MESSAGE_PATTERNS.some((pattern) => lowered.includes(pattern));
}

export function retryDelayMs(attempt: number): number {
  const capped = Math.min(attempt, 5);
  return 250 * 2 ** (capped - 1);
}

export function delay(durationMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, durationMs);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
