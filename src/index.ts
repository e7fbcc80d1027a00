import { Command } from "commander";

import { registerExtractCommand } from "./cli/extract.js";
import { registerGenerateCommand } from "./cli/generate.js";
import { registerSchemaCommand } from "./cli/schema.js";
import { toUserFacingError } from "./cli/error-mapping.js";
import { renderErrorForTerminal, resolveColorEnabled } from "./core/error-format.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("modgen")
    .description("Generate Terraform modules from provider schemas with an LLM")
    .option("--config <path>", "Path to modgen.yaml (default: ./modgen.yaml if present)")
    .option("--debug", "Show error codes, causes and stack traces", false)
    .option("--no-color", "Disable colored error output");

  registerSchemaCommand(program);
  registerExtractCommand(program);
  registerGenerateCommand(program);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const opts = program.opts<{ debug?: boolean; color?: boolean }>();
    console.error(
      renderErrorForTerminal(toUserFacingError(err), {
        mode: opts.debug ? "debug" : "short",
        useColor: resolveColorEnabled({ useColor: opts.color }),
      }),
    );
    process.exitCode = 1;
  }
}
