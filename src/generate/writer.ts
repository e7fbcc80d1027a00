/*
Purpose: persist a validated module as a directory of Terraform files.
Assumptions: artifacts have already passed sanitization and the consistency check.
Usage: await writeModule({ modulesDir, resourceType, artifacts, versionBlock }).
*/

import path from "node:path";

import fse from "fs-extra";

import { ensureTrailingNewline } from "../core/utils.js";
import type { ProviderIdentity } from "../schema/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ModuleArtifacts = {
  inputs: string;
  body: string;
  outputs: string;
};

export type WriteModuleInput = {
  modulesDir: string;
  resourceType: string;
  artifacts: ModuleArtifacts;
  versionBlock: string;
};

export type WrittenModule = {
  moduleDir: string;
  files: string[];
};

export const MODULE_FILE_NAMES = {
  inputs: "variables.tf",
  body: "main.tf",
  outputs: "outputs.tf",
  versions: "terraform.tf",
} as const;

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildVersionPinning(provider: ProviderIdentity, requiredVersion: string): string {
  return [
    "terraform {",
    `  required_version = "${requiredVersion}"`,
    "  required_providers {",
    `    ${provider.name} = {`,
    `      source  = "${provider.supplier}/${provider.name}"`,
    `      version = "~> ${provider.version}"`,
    "    }",
    "  }",
    "}",
    "",
  ].join("\n");
}

export function moduleDirFor(modulesDir: string, resourceType: string): string {
  return path.join(modulesDir, resourceType.toLowerCase());
}

// The four files are written into a sibling staging directory that replaces the module
// directory in one rename, so a failed write leaves the previous module as it was. Files in the
// module directory that modgen does not manage are carried over.
export async function writeModule(input: WriteModuleInput): Promise<WrittenModule> {
  const moduleDir = moduleDirFor(input.modulesDir, input.resourceType);
  const staging = `${moduleDir}.${process.pid}.staging`;

  const contents: Array<[string, string]> = [
    [MODULE_FILE_NAMES.inputs, input.artifacts.inputs],
    [MODULE_FILE_NAMES.body, input.artifacts.body],
    [MODULE_FILE_NAMES.outputs, input.artifacts.outputs],
    [MODULE_FILE_NAMES.versions, input.versionBlock],
  ];

  await fse.ensureDir(input.modulesDir);
  try {
    await fse.emptyDir(staging);
    for (const [fileName, text] of contents) {
      await fse.writeFile(path.join(staging, fileName), ensureTrailingNewline(text), "utf8");
    }
    await carryOverUnmanagedFiles(moduleDir, staging);
    await swapDirectory(staging, moduleDir);
  } finally {
    await fse.remove(staging);
  }

  return { moduleDir, files: contents.map(([fileName]) => path.join(moduleDir, fileName)) };
}

// =============================================================================
// INTERNALS
// =============================================================================

const MANAGED_FILES = new Set<string>(Object.values(MODULE_FILE_NAMES));

async function carryOverUnmanagedFiles(moduleDir: string, staging: string): Promise<void> {
  if (!(await fse.pathExists(moduleDir))) return;

  for (const entry of await fse.readdir(moduleDir)) {
    if (MANAGED_FILES.has(entry)) continue;
    await fse.copy(path.join(moduleDir, entry), path.join(staging, entry));
  }
}

async function swapDirectory(staging: string, target: string): Promise<void> {
  const previous = `${target}.${process.pid}.previous`;
  const hadTarget = await fse.pathExists(target);

  if (hadTarget) {
    await fse.remove(previous);
    await fse.rename(target, previous);
  }
  try {
    await fse.rename(staging, target);
  } catch (err) {
    if (hadTarget) await fse.rename(previous, target);
    throw err;
  }
  if (hadTarget) await fse.remove(previous);
}
