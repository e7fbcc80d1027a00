import path from "node:path";

import type { Command } from "commander";
import { z } from "zod";

import type { ResolvedModgenConfig } from "../core/config.js";
import { loadModgenConfig } from "../core/config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { formatZodIssues } from "../core/zod-issues.js";
import type { ProviderIdentity } from "../schema/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type GlobalCliOptions = {
  config?: string;
  debug?: boolean;
  color?: boolean;
};

const ProviderArgsSchema = z.object({
  supplier: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, "must be a registry namespace"),
  name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, "must be a lowercase provider name"),
  version: z.string().regex(/^\d+\.\d+\.\d+(?:[-+][\w.-]+)?$/, "must be a version like 4.20.0"),
});

// =============================================================================
// PUBLIC API
// =============================================================================

export function globalOptions(command: Command): GlobalCliOptions {
  return command.optsWithGlobals<GlobalCliOptions>();
}

export function loadConfigForCli(
  command: Command,
  cwd: string = process.cwd(),
): ResolvedModgenConfig {
  return loadModgenConfig({ explicitPath: globalOptions(command).config, cwd });
}

export function parseProviderArgs(supplier: string, name: string, version: string): ProviderIdentity {
  const parsed = ProviderArgsSchema.safeParse({ supplier, name, version });
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid provider arguments.",
      message: ["Provider arguments are invalid:", ...formatZodIssues(parsed.error.issues)].join(
        "\n",
      ),
      hint: "Pass <supplier> <name> <version>, for example: hashicorp azurerm 4.20.0.",
    });
  }
  return parsed.data;
}

export function resolveSchemaPath(
  explicit: string | undefined,
  fallback: string,
  cwd: string = process.cwd(),
): string {
  return path.resolve(cwd, explicit ?? fallback);
}
