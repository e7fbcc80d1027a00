/*
Purpose: dispatch the three instruction payloads to the generation backend.
Assumptions: requests share no state and may complete in any order; the backend gives no
             determinism guarantee, so agreement between artifacts is checked afterwards.
Usage: const artifacts = await generateArtifacts(backend, payloads, { resourceType, signal }).
*/

import { GenerationBackendError, type ArtifactFailure, type ArtifactKind } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import type { LlmClient, LlmCompletionOptions } from "../llm/client.js";

import { ARTIFACT_KINDS, type InstructionPayload, type InstructionSet } from "./composer.js";

// =============================================================================
// TYPES
// =============================================================================

export type GenerateOptions = {
  signal?: AbortSignal;
};

export interface GenerationBackend {
  generate(payload: InstructionPayload, options?: GenerateOptions): Promise<string>;
}

export type GeneratedArtifact = {
  kind: ArtifactKind;
  rawText: string;
};

export type GeneratedArtifacts = Record<ArtifactKind, GeneratedArtifact>;

export type GenerationOutcome =
  | { ok: true; artifacts: GeneratedArtifacts }
  | { ok: false; failures: ArtifactFailure[]; completed: GeneratedArtifact[] };

// =============================================================================
// BACKEND ADAPTER
// =============================================================================

export function formatPayloadPrompt(payload: InstructionPayload): string {
  return [
    `Role: ${payload.role}`,
    "",
    payload.description,
    "",
    "Expected output:",
    payload.expectedOutput,
  ].join("\n");
}

export function createLlmGenerationBackend(
  client: LlmClient,
  defaults: Omit<LlmCompletionOptions, "signal"> = {},
): GenerationBackend {
  return {
    async generate(payload, options = {}) {
      const result = await client.complete(formatPayloadPrompt(payload), {
        ...defaults,
        signal: options.signal,
      });
      return result.text;
    },
  };
}

// =============================================================================
// ORCHESTRATION
// =============================================================================

// Waits for every request to settle so a failure report covers all three artifacts.
export async function dispatchPayloads(
  backend: GenerationBackend,
  payloads: InstructionSet,
  options: GenerateOptions = {},
): Promise<GenerationOutcome> {
  const settled = await Promise.allSettled(
    ARTIFACT_KINDS.map(async (kind) =>
      backend.generate(payloads[kind], { signal: options.signal }),
    ),
  );

  const failures: ArtifactFailure[] = [];
  const completed: GeneratedArtifact[] = [];

  ARTIFACT_KINDS.forEach((kind, index) => {
    const result = settled[index];
    if (result.status === "rejected") {
      failures.push({ kind, message: formatErrorMessage(result.reason), cause: result.reason });
      return;
    }
    if (result.value.trim().length === 0) {
      failures.push({ kind, message: "Backend returned empty text." });
      return;
    }
    completed.push({ kind, rawText: result.value });
  });

  if (failures.length > 0) {
    return { ok: false, failures, completed };
  }

  return { ok: true, artifacts: toArtifactRecord(completed) };
}

export async function generateArtifacts(
  backend: GenerationBackend,
  payloads: InstructionSet,
  options: GenerateOptions & { resourceType: string },
): Promise<GeneratedArtifacts> {
  const outcome = await dispatchPayloads(backend, payloads, options);
  if (!outcome.ok) {
    throw new GenerationBackendError({
      resourceType: options.resourceType,
      failures: outcome.failures,
    });
  }
  return outcome.artifacts;
}

function toArtifactRecord(artifacts: GeneratedArtifact[]): GeneratedArtifacts {
  const byKind = new Map(artifacts.map((artifact) => [artifact.kind, artifact]));
  const pick = (kind: ArtifactKind): GeneratedArtifact =>
    byKind.get(kind) ?? { kind, rawText: "" };

  return { inputs: pick("inputs"), body: pick("body"), outputs: pick("outputs") };
}
