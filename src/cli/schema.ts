import type { Command } from "commander";

import { acquireProviderSchema } from "../schema/acquire.js";
import { defaultSchemaPath } from "../schema/document.js";

import { parseProviderArgs, resolveSchemaPath } from "./config.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

export type SchemaCommandOptions = {
  output?: string;
};

export function registerSchemaCommand(program: Command): void {
  program
    .command("schema")
    .description("Export a provider schema with terraform")
    .argument("<supplier>", "Registry namespace, e.g. hashicorp")
    .argument("<name>", "Provider name, e.g. azurerm")
    .argument("<version>", "Provider version, e.g. 4.20.0")
    .option("--output <path>", "Where to write the schema JSON")
    .action(
      async (supplier: string, name: string, version: string, opts: SchemaCommandOptions) => {
        await schemaCommand(supplier, name, version, opts);
      },
    );
}

export async function schemaCommand(
  supplier: string,
  name: string,
  version: string,
  opts: SchemaCommandOptions,
): Promise<void> {
  const provider = parseProviderArgs(supplier, name, version);
  const outputPath = resolveSchemaPath(opts.output, defaultSchemaPath(provider));

  const stopHandler = createRunStopSignalHandler({
    onSignal: (signal) => console.log(`Received ${signal}. Stopping schema export.`),
  });

  try {
    const written = await acquireProviderSchema({
      provider,
      outputPath,
      onStatus: (line) => console.log(line),
      signal: stopHandler.signal,
    });
    console.log(`Schema written to ${written}`);
  } finally {
    stopHandler.cleanup();
  }
}
