import { z } from "zod";

export const DEFAULT_NAMING_REFERENCE_URL =
  "https://raw.githubusercontent.com/MicrosoftDocs/cloud-adoption-framework/refs/heads/main/docs/ready/azure-best-practices/resource-abbreviations.md";

export const LlmProviderSchema = z.enum(["openai", "anthropic"]);

export const ReasoningEffortSchema = z.enum(["low", "medium", "high"]);

export const LlmConfigSchema = z
  .object({
    provider: LlmProviderSchema.default("openai"),
    model: z.string().min(1).default("gpt-5"),
    temperature: z.number().min(0).max(2).optional(),
    timeout_ms: z.number().int().positive().default(600_000),
    max_retries: z.number().int().min(0).default(3),
    reasoning_effort: ReasoningEffortSchema.optional(),
    max_tokens: z.number().int().positive().default(16_000),
  })
  .strict();

export const PathsConfigSchema = z
  .object({
    summaries_dir: z.string().min(1).default("schemas"),
    docs_dir: z.string().min(1).default("wiki"),
    modules_dir: z.string().min(1).default("modules"),
    logs_dir: z.string().min(1).default(".modgen/logs"),
  })
  .strict();

export const NamingConfigSchema = z
  .object({
    table_path: z.string().min(1).nullable().default(null),
    reference_url: z.string().url().default(DEFAULT_NAMING_REFERENCE_URL),
  })
  .strict();

export const TerraformConfigSchema = z
  .object({
    required_version: z.string().min(1).default("~> 1.8"),
  })
  .strict();

export const DocsConfigSchema = z
  .object({
    fetch: z.boolean().default(true),
  })
  .strict();

export const ModgenConfigSchema = z
  .object({
    llm: LlmConfigSchema.default({}),
    paths: PathsConfigSchema.default({}),
    naming: NamingConfigSchema.default({}),
    terraform: TerraformConfigSchema.default({}),
    docs: DocsConfigSchema.default({}),
  })
  .strict();

export type LlmProvider = z.infer<typeof LlmProviderSchema>;
export type ReasoningEffort = z.infer<typeof ReasoningEffortSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type ModgenConfig = z.infer<typeof ModgenConfigSchema>;

// Paths resolved to absolute locations; produced by the loader.
export type ResolvedModgenConfig = ModgenConfig & {
  configPath: string | null;
  baseDir: string;
};
