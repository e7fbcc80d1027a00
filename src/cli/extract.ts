import type { Command } from "commander";

import { loadResourceDocs, resourceDocPath } from "../docs/fetch.js";
import { defaultSchemaPath, loadSchemaDocument } from "../schema/document.js";
import { extractSchemaSummary } from "../schema/extract.js";
import { renderSchemaContext } from "../schema/render.js";
import { writeSchemaSummary } from "../schema/summary-store.js";

import { loadConfigForCli, parseProviderArgs, resolveSchemaPath } from "./config.js";

export type ExtractCommandOptions = {
  schema?: string;
  docs?: boolean;
};

export function registerExtractCommand(program: Command): void {
  program
    .command("extract")
    .description("Summarize one resource type from a provider schema")
    .argument("<supplier>", "Registry namespace, e.g. hashicorp")
    .argument("<name>", "Provider name, e.g. azurerm")
    .argument("<version>", "Provider version, e.g. 4.20.0")
    .argument("<resource_type>", "Resource type, e.g. azurerm_storage_account")
    .option("--schema <path>", "Provider schema JSON (default: <name>_<version>_schema.json)")
    .option("--no-docs", "Use cached documentation only; never download it")
    .action(
      async (
        supplier: string,
        name: string,
        version: string,
        resourceType: string,
        opts: ExtractCommandOptions,
        command: Command,
      ) => {
        await extractCommand(command, { supplier, name, version, resourceType }, opts);
      },
    );
}

export async function extractCommand(
  command: Command,
  args: { supplier: string; name: string; version: string; resourceType: string },
  opts: ExtractCommandOptions,
): Promise<void> {
  const config = loadConfigForCli(command);
  const provider = parseProviderArgs(args.supplier, args.name, args.version);
  const schemaPath = resolveSchemaPath(opts.schema, defaultSchemaPath(provider), config.baseDir);

  const document = await loadSchemaDocument(schemaPath);
  const summary = extractSchemaSummary(document, provider, args.resourceType);
  const written = await writeSchemaSummary(config.paths.summaries_dir, args.resourceType, summary);

  console.log(renderSchemaContext(summary));
  console.log("");
  console.log(`Summary written to ${written}`);

  const docs = await loadResourceDocs({
    provider,
    resourceType: args.resourceType,
    docsDir: config.paths.docs_dir,
    fetchMissing: opts.docs !== false && config.docs.fetch,
  });
  if (docs === null) {
    console.log("Documentation unavailable; variable descriptions will be derived from names.");
  } else {
    console.log(
      `Documentation cached at ${resourceDocPath(config.paths.docs_dir, provider.name, args.resourceType)}`,
    );
  }
}
