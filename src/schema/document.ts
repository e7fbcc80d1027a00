/*
Purpose: validate the JSON emitted by `terraform providers schema -json`.
Assumptions: only the keys the extractor reads are checked; everything else passes through.
*/

import fse from "fs-extra";
import { z } from "zod";

import { SchemaDocumentError } from "../core/errors.js";
import { formatZodIssues } from "../core/zod-issues.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const SchemaAttributeSchema = z
  .object({
    type: z.unknown().optional(),
    description: z.string().optional(),
    required: z.boolean().optional(),
    optional: z.boolean().optional(),
    computed: z.boolean().optional(),
    sensitive: z.boolean().optional(),
  })
  .passthrough();

export type SchemaAttribute = z.infer<typeof SchemaAttributeSchema>;

export type SchemaBlock = {
  attributes?: Record<string, SchemaAttribute>;
  block_types?: Record<string, SchemaBlockType>;
  description?: string;
};

export type SchemaBlockType = {
  nesting_mode?: string;
  block: SchemaBlock;
  min_items?: number;
  max_items?: number;
};

export const SchemaBlockSchema: z.ZodType<SchemaBlock> = z.lazy(() =>
  z
    .object({
      attributes: z.record(SchemaAttributeSchema).optional(),
      block_types: z.record(SchemaBlockTypeSchema).optional(),
      description: z.string().optional(),
    })
    .passthrough(),
);

export const SchemaBlockTypeSchema: z.ZodType<SchemaBlockType> = z.lazy(() =>
  z
    .object({
      nesting_mode: z.string().optional(),
      block: SchemaBlockSchema,
      min_items: z.number().int().min(0).optional(),
      max_items: z.number().int().min(0).optional(),
    })
    .passthrough(),
);

export const ResourceSchemaSchema = z
  .object({
    version: z.number().optional(),
    block: SchemaBlockSchema,
  })
  .passthrough();

export const ProviderSchemaSchema = z
  .object({
    resource_schemas: z.record(ResourceSchemaSchema).default({}),
  })
  .passthrough();

export const SchemaDocumentSchema = z
  .object({
    format_version: z.string().optional(),
    provider_schemas: z.record(ProviderSchemaSchema),
  })
  .passthrough();

export type SchemaDocument = z.infer<typeof SchemaDocumentSchema>;

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseSchemaDocument(raw: unknown): SchemaDocument {
  const parsed = SchemaDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error.issues);
    throw new SchemaDocumentError(
      ["Provider schema document is malformed:", ...issues].join("\n"),
      parsed.error,
    );
  }
  return parsed.data;
}

export async function loadSchemaDocument(filePath: string): Promise<SchemaDocument> {
  let text: string;
  try {
    text = await fse.readFile(filePath, "utf8");
  } catch (err) {
    throw new SchemaDocumentError(`Provider schema file not readable: ${filePath}`, err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SchemaDocumentError(`Provider schema file is not valid JSON: ${filePath}`, err);
  }

  return parseSchemaDocument(raw);
}

export function defaultSchemaPath(provider: { name: string; version: string }): string {
  return `${provider.name}_${provider.version}_schema.json`;
}
