/*
Purpose: run one resource type from provider schema to a written module directory.
Assumptions: a failure in any stage leaves the module directory untouched; stages run in a
             fixed order and the current stage is attached to every failure.
Usage: await runModuleGeneration({ provider, resourceType, document, backend, namingTable, settings, logger }).
*/

import { formatErrorMessage } from "./error-format.js";
import {
  EncodingError,
  GenerationBackendError,
  PipelineStageError,
  ResourceRunError,
  type ArtifactKind,
  type PipelineStage,
} from "./errors.js";
import { logRunEvent, type JsonlLogger } from "./logger.js";
import type { ResolvedModgenConfig } from "./config.js";
import { truncateText } from "./utils.js";

import { loadResourceDocs, type FetchLike } from "../docs/fetch.js";
import { ARTIFACT_KINDS, composeInstructionSet } from "../generate/composer.js";
import { checkConsistency, checkInputReferences } from "../generate/consistency.js";
import { dispatchPayloads, type GenerationBackend } from "../generate/orchestrator.js";
import { sanitizeArtifactText } from "../generate/sanitize.js";
import { buildVersionPinning, writeModule, type ModuleArtifacts } from "../generate/writer.js";
import { resolveNamingToken, type NamingTable } from "../naming/abbreviations.js";
import type { SchemaDocument } from "../schema/document.js";
import { extractSchemaSummary } from "../schema/extract.js";
import { renderSchemaContext } from "../schema/render.js";
import { writeSchemaSummary } from "../schema/summary-store.js";
import type { ProviderIdentity } from "../schema/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineSettings = {
  summariesDir: string;
  docsDir: string;
  modulesDir: string;
  namingReferenceUrl: string;
  requiredVersion: string;
  fetchDocs: boolean;
};

export type ModuleRunInput = {
  provider: ProviderIdentity;
  resourceType: string;
  document: SchemaDocument;
  backend: GenerationBackend;
  namingTable: NamingTable;
  settings: PipelineSettings;
  logger: JsonlLogger;
  fetch?: FetchLike;
  signal?: AbortSignal;
};

export type ModuleRunResult = {
  resourceType: string;
  moduleDir: string;
  files: string[];
  namingToken: string;
};

export type ModuleBatchEntry =
  | { status: "written"; result: ModuleRunResult }
  | { status: "failed"; resourceType: string; stage: PipelineStage; error: unknown };

export type ModuleBatchInput = Omit<ModuleRunInput, "resourceType" | "logger"> & {
  resourceTypes: string[];
  logger: JsonlLogger;
  onResult?: (entry: ModuleBatchEntry) => void;
};

// Raw text kept in the run log for artifacts of a failed generation.
const RAW_ARTIFACT_LOG_LIMIT = 20_000;

// =============================================================================
// PUBLIC API
// =============================================================================

export function pipelineSettingsFromConfig(
  config: ResolvedModgenConfig,
  overrides: Partial<PipelineSettings> = {},
): PipelineSettings {
  return {
    summariesDir: config.paths.summaries_dir,
    docsDir: config.paths.docs_dir,
    modulesDir: config.paths.modules_dir,
    namingReferenceUrl: config.naming.reference_url,
    requiredVersion: config.terraform.required_version,
    fetchDocs: config.docs.fetch,
    ...overrides,
  };
}

export async function runModuleGeneration(input: ModuleRunInput): Promise<ModuleRunResult> {
  const { provider, resourceType, settings } = input;
  const logger = input.logger.forResource(resourceType);
  const tracker = createStageTracker(resourceType, logger, input.signal);

  logRunEvent(logger, "resource.start", { provider: `${provider.supplier}/${provider.name}` });

  try {
    const summary = await tracker.run("extract", async () => {
      const extracted = extractSchemaSummary(input.document, provider, resourceType);
      await writeSchemaSummary(settings.summariesDir, resourceType, extracted);
      return extracted;
    });

    const documentation = await tracker.run("docs", () =>
      loadResourceDocs({
        provider,
        resourceType,
        docsDir: settings.docsDir,
        fetchMissing: settings.fetchDocs,
        fetch: input.fetch,
        logger,
        signal: input.signal,
      }),
    );

    const composed = await tracker.run("compose", async () => {
      const naming = resolveNamingToken(input.namingTable, {
        providerName: provider.name,
        resourceType,
        referenceUrl: settings.namingReferenceUrl,
      });
      logRunEvent(
        logger,
        "naming.resolved",
        naming.source === "table"
          ? { source: naming.source, token: naming.token }
          : { source: naming.source, reference_url: naming.referenceUrl },
      );

      const payloads = await composeInstructionSet({
        resourceType,
        providerName: provider.name,
        schemaContext: renderSchemaContext(summary),
        documentation,
        naming,
      });
      return { payloads, expectedToken: naming.source === "table" ? naming.token : undefined };
    });

    const generated = await tracker.run("generate", async () => {
      const outcome = await dispatchPayloads(input.backend, composed.payloads, {
        signal: input.signal,
      });
      if (outcome.ok) return outcome.artifacts;

      logRunEvent(logger, "generation.failed", {
        failures: outcome.failures.map((failure) => ({
          kind: failure.kind,
          message: failure.message,
        })),
        completed: outcome.completed.map((artifact) => ({
          kind: artifact.kind,
          raw_text: truncateText(artifact.rawText, RAW_ARTIFACT_LOG_LIMIT),
        })),
      });
      throw new GenerationBackendError({ resourceType, failures: outcome.failures });
    });

    const artifacts = await tracker.run("sanitize", async () => {
      const cleaned: Partial<ModuleArtifacts> = {};
      const rejected: Array<{ kind: ArtifactKind; error: unknown }> = [];

      for (const kind of ARTIFACT_KINDS) {
        try {
          cleaned[kind] = sanitizeArtifactText(generated[kind].rawText);
        } catch (err) {
          rejected.push({ kind, error: err });
        }
      }

      if (rejected.length > 0 || !isComplete(cleaned)) {
        const kinds = rejected.map((entry) => entry.kind);
        throw new EncodingError(
          `Generated text for ${resourceType} is not plain text (${kinds.join(", ")}).`,
          { resourceType, artifacts: kinds, cause: rejected[0]?.error },
        );
      }
      return cleaned;
    });

    const validation = await tracker.run("validate", async () => {
      const result = checkConsistency(artifacts.body, artifacts.outputs, resourceType, {
        expectedToken: composed.expectedToken,
      });
      checkInputReferences(artifacts.inputs, artifacts.body, resourceType);
      return result;
    });

    const written = await tracker.run("write", () =>
      writeModule({
        modulesDir: settings.modulesDir,
        resourceType,
        artifacts,
        versionBlock: buildVersionPinning(provider, settings.requiredVersion),
      }),
    );

    logRunEvent(logger, "resource.complete", {
      module_dir: written.moduleDir,
      naming_token: validation.namingToken,
    });

    return {
      resourceType,
      moduleDir: written.moduleDir,
      files: written.files,
      namingToken: validation.namingToken,
    };
  } catch (err) {
    logRunEvent(logger, "resource.failed", {
      stage: tracker.current(),
      error: formatErrorMessage(err),
    });
    throw err;
  }
}

// Types run one after another; a failure is recorded and the next type still runs.
export async function runModuleBatch(input: ModuleBatchInput): Promise<ModuleBatchEntry[]> {
  const { resourceTypes, onResult, ...shared } = input;
  const entries: ModuleBatchEntry[] = [];

  logRunEvent(input.logger, "run.start", {
    provider: `${input.provider.supplier}/${input.provider.name}@${input.provider.version}`,
    resource_types: resourceTypes,
  });

  for (const resourceType of resourceTypes) {
    let entry: ModuleBatchEntry;
    try {
      const result = await runModuleGeneration({ ...shared, resourceType });
      entry = { status: "written", result };
    } catch (err) {
      entry = { status: "failed", resourceType, stage: stageOf(err), error: err };
    }
    entries.push(entry);
    onResult?.(entry);
  }

  const written = entries.filter((entry) => entry.status === "written").length;
  logRunEvent(input.logger, "run.complete", {
    written,
    failed: entries.length - written,
  });

  return entries;
}

// =============================================================================
// INTERNALS
// =============================================================================

type StageTracker = {
  run<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T>;
  current(): PipelineStage;
};

function createStageTracker(
  resourceType: string,
  logger: JsonlLogger,
  signal: AbortSignal | undefined,
): StageTracker {
  let current: PipelineStage = "extract";

  return {
    current: () => current,
    async run<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
      current = stage;
      logRunEvent(logger, "stage.start", { stage });

      try {
        signal?.throwIfAborted();
        return await fn();
      } catch (err) {
        if (isDomainError(err)) throw err;
        throw new PipelineStageError({ resourceType, stage, cause: err });
      }
    },
  };
}

// Resource-scoped errors already carry their stage; anything else is wrapped so it does.
function isDomainError(err: unknown): boolean {
  return err instanceof ResourceRunError || err instanceof EncodingError;
}

function isComplete(artifacts: Partial<ModuleArtifacts>): artifacts is ModuleArtifacts {
  return (
    artifacts.inputs !== undefined &&
    artifacts.body !== undefined &&
    artifacts.outputs !== undefined
  );
}

function stageOf(err: unknown): PipelineStage {
  if (err instanceof ResourceRunError) return err.stage;
  if (err instanceof EncodingError) return "sanitize";
  return "extract";
}
