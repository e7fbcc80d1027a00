/*
Purpose: export a provider's schema with the terraform CLI.
Assumptions: `terraform` is on PATH and can reach the provider registry.
Usage: await acquireProviderSchema({ provider, outputPath, onStatus: console.log }).
*/

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import { SchemaAcquisitionError } from "../core/errors.js";

import type { ProviderIdentity } from "./types.js";

export type AcquireSchemaOptions = {
  provider: ProviderIdentity;
  outputPath: string;
  terraformBin?: string;
  onStatus?: (line: string) => void;
  signal?: AbortSignal;
};

// azurerm refuses to configure without an (empty) features block.
const PROVIDERS_REQUIRING_FEATURES = new Set(["azurerm"]);

export function buildSchemaProbeConfig(provider: ProviderIdentity): string {
  const lines = [
    "terraform {",
    "  required_providers {",
    `    ${provider.name} = {`,
    `      source  = "${provider.supplier}/${provider.name}"`,
    `      version = "${provider.version}"`,
    "    }",
    "  }",
    "}",
    "",
  ];

  if (PROVIDERS_REQUIRING_FEATURES.has(provider.name)) {
    lines.push(`provider "${provider.name}" {`, "  features {}", "}", "");
  }

  return lines.join("\n");
}

export async function acquireProviderSchema(opts: AcquireSchemaOptions): Promise<string> {
  const terraform = opts.terraformBin ?? "terraform";
  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "modgen-schema-"));
  const outputPath = path.resolve(opts.outputPath);

  try {
    await fse.writeFile(path.join(workDir, "main.tf"), buildSchemaProbeConfig(opts.provider), "utf8");

    opts.onStatus?.("Running terraform init...");
    await runTerraform(terraform, ["init", "-input=false", "-no-color"], workDir, opts.signal);

    opts.onStatus?.("Exporting provider schema...");
    const res = await runTerraform(
      terraform,
      ["providers", "schema", "-json"],
      workDir,
      opts.signal,
    );

    await fse.ensureDir(path.dirname(outputPath));
    await fse.writeFile(outputPath, res.stdout, "utf8");
    return outputPath;
  } finally {
    await fse.remove(workDir).catch((err: unknown) => {
      const detail = err instanceof Error ? err.message : String(err);
      opts.onStatus?.(`Warning: could not remove temp folder ${workDir}: ${detail}`);
    });
  }
}

async function runTerraform(
  terraform: string,
  args: string[],
  cwd: string,
  signal?: AbortSignal,
): Promise<{ stdout: string }> {
  const command = `${terraform} ${args.join(" ")}`;
  let res: { stdout: string; stderr: string; exitCode?: number };
  try {
    res = await execa(terraform, args, {
      cwd,
      reject: false,
      stdin: "ignore",
      cancelSignal: signal,
    });
  } catch (err) {
    throw new SchemaAcquisitionError(`Failed to run ${command}.`, err);
  }

  if (res.exitCode !== 0) {
    const detail = res.stderr.trim() || res.stdout.trim() || `exit code ${res.exitCode ?? "unknown"}`;
    throw new SchemaAcquisitionError(`${command} failed: ${detail}`);
  }

  return { stdout: res.stdout };
}
