/*
Purpose: deterministic lookup of the local resource label (naming token) for a resource type.
Assumptions: the bundled table follows the Azure Cloud Adoption Framework abbreviations;
             a miss falls back to letting the backend consult the reference document.
Usage: resolveNamingToken(await loadNamingTable(), "azurerm", "azurerm_storage_account").
*/

import fse from "fs-extra";
import { z } from "zod";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { packageAssetPath } from "../core/package-root.js";
import { formatZodIssues } from "../core/zod-issues.js";

// =============================================================================
// TYPES
// =============================================================================

const NamingEntrySchema = z
  .object({
    abbreviation: z.string().regex(/^[a-z][a-z0-9_-]*$/, "must be a valid HCL label"),
    armType: z.string().min(1).optional(),
  })
  .strict();

export const NamingTableSchema = z.record(z.record(NamingEntrySchema));

export type NamingTable = z.infer<typeof NamingTableSchema>;

export type NamingResolution =
  | { source: "table"; token: string; armType?: string }
  | { source: "reference"; referenceUrl: string };

// =============================================================================
// PUBLIC API
// =============================================================================

export function defaultNamingTablePath(): string {
  return packageAssetPath("data", "naming-abbreviations.json");
}

export async function loadNamingTable(tablePath?: string | null): Promise<NamingTable> {
  const filePath = tablePath ?? defaultNamingTablePath();

  let raw: unknown;
  try {
    raw = await fse.readJson(filePath);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Naming table unreadable.",
      message: `Failed to read naming table at ${filePath}.`,
      hint: "Check naming.table_path in modgen.yaml.",
      cause: err,
    });
  }

  const parsed = NamingTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Naming table invalid.",
      message: [`Invalid naming table at ${filePath}:`, ...formatZodIssues(parsed.error.issues)].join(
        "\n",
      ),
      hint: "Each entry needs an abbreviation usable as a resource label.",
      cause: parsed.error,
    });
  }

  return parsed.data;
}

export function resolveNamingToken(
  table: NamingTable,
  args: { providerName: string; resourceType: string; referenceUrl: string },
): NamingResolution {
  const entry = table[args.providerName]?.[args.resourceType];
  if (!entry) {
    return { source: "reference", referenceUrl: args.referenceUrl };
  }

  return { source: "table", token: entry.abbreviation, armType: entry.armType };
}
