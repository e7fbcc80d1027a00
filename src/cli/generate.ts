import type { Command } from "commander";

import { renderErrorForTerminal, resolveColorEnabled } from "../core/error-format.js";
import { JsonlLogger, runLogPath } from "../core/logger.js";
import {
  pipelineSettingsFromConfig,
  runModuleBatch,
  type ModuleBatchEntry,
} from "../core/pipeline.js";
import { defaultRunId } from "../core/utils.js";
import { createLlmGenerationBackend } from "../generate/orchestrator.js";
import { createLlmClient } from "../llm/factory.js";
import { loadNamingTable } from "../naming/abbreviations.js";
import { defaultSchemaPath, loadSchemaDocument } from "../schema/document.js";

import { globalOptions, loadConfigForCli, parseProviderArgs, resolveSchemaPath } from "./config.js";
import { toUserFacingError } from "./error-mapping.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

export type GenerateCommandOptions = {
  schema?: string;
  docs?: boolean;
};

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate")
    .description("Generate Terraform modules for one or more resource types")
    .argument("<supplier>", "Registry namespace, e.g. hashicorp")
    .argument("<name>", "Provider name, e.g. azurerm")
    .argument("<version>", "Provider version, e.g. 4.20.0")
    .argument("<resource_types...>", "Resource types to generate")
    .option("--schema <path>", "Provider schema JSON (default: <name>_<version>_schema.json)")
    .option("--no-docs", "Use cached documentation only; never download it")
    .action(
      async (
        supplier: string,
        name: string,
        version: string,
        resourceTypes: string[],
        opts: GenerateCommandOptions,
        command: Command,
      ) => {
        await generateCommand(command, { supplier, name, version, resourceTypes }, opts);
      },
    );
}

export async function generateCommand(
  command: Command,
  args: { supplier: string; name: string; version: string; resourceTypes: string[] },
  opts: GenerateCommandOptions,
): Promise<void> {
  const config = loadConfigForCli(command);
  const provider = parseProviderArgs(args.supplier, args.name, args.version);
  const schemaPath = resolveSchemaPath(opts.schema, defaultSchemaPath(provider), config.baseDir);

  const document = await loadSchemaDocument(schemaPath);
  const namingTable = await loadNamingTable(config.naming.table_path);
  const backend = createLlmGenerationBackend(createLlmClient(config.llm));

  const runId = defaultRunId();
  const logger = new JsonlLogger(runLogPath(config.paths.logs_dir, runId), { runId });
  const stopHandler = createRunStopSignalHandler({
    onSignal: (signal) => console.log(`Received ${signal}. Stopping run ${runId}.`),
  });

  const global = globalOptions(command);
  const useColor = resolveColorEnabled({ useColor: global.color });

  let entries: ModuleBatchEntry[];
  try {
    entries = await runModuleBatch({
      provider,
      resourceTypes: args.resourceTypes,
      document,
      backend,
      namingTable,
      settings: pipelineSettingsFromConfig(config, {
        fetchDocs: opts.docs !== false && config.docs.fetch,
      }),
      logger,
      signal: stopHandler.signal,
      onResult: (entry) => {
        if (entry.status === "written") {
          console.log(`${entry.result.resourceType}: module written to ${entry.result.moduleDir}`);
          return;
        }
        console.error(
          renderErrorForTerminal(toUserFacingError(entry.error), {
            mode: global.debug ? "debug" : "short",
            useColor,
          }),
        );
      },
    });
  } finally {
    stopHandler.cleanup();
  }

  const failed = entries.filter((entry) => entry.status === "failed").length;
  console.log(
    `Run ${runId}: ${entries.length - failed} written, ${failed} failed. Log: ${logger.filePath}`,
  );
  if (failed > 0) {
    process.exitCode = 1;
  }
}
