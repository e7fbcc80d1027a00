import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { ModgenConfigSchema, type ResolvedModgenConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { formatZodIssues } from "./zod-issues.js";

export const CONFIG_FILE_NAMES = ["modgen.yaml", "modgen.yml"] as const;

const CONFIG_HINT = "Fix the listed keys in your modgen.yaml or remove them to use defaults.";

export function discoverConfigPath(cwd: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(cwd, name);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

export function loadModgenConfig(
  args: { explicitPath?: string; cwd?: string } = {},
): ResolvedModgenConfig {
  const cwd = args.cwd ?? process.cwd();
  const configPath = args.explicitPath
    ? path.resolve(cwd, args.explicitPath)
    : discoverConfigPath(cwd);

  if (args.explicitPath && configPath && !fs.existsSync(configPath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config file not found.",
      message: `No config file at ${configPath}.`,
      hint: "Check the --config path or omit it to use defaults.",
    });
  }

  const raw = configPath ? readConfigFile(configPath) : {};
  const parsed = ModgenConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config invalid.",
      message: [`Invalid config${configPath ? ` at ${configPath}` : ""}:`, ...issues].join("\n"),
      hint: CONFIG_HINT,
      cause: parsed.error,
    });
  }

  const baseDir = configPath ? path.dirname(configPath) : cwd;
  const config = parsed.data;

  return {
    ...config,
    paths: {
      summaries_dir: path.resolve(baseDir, config.paths.summaries_dir),
      docs_dir: path.resolve(baseDir, config.paths.docs_dir),
      modules_dir: path.resolve(baseDir, config.paths.modules_dir),
      logs_dir: path.resolve(baseDir, config.paths.logs_dir),
    },
    naming: {
      ...config.naming,
      table_path: config.naming.table_path
        ? path.resolve(baseDir, config.naming.table_path)
        : null,
    },
    configPath,
    baseDir,
  };
}

function readConfigFile(configPath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${configPath}.`, err);
  }

  try {
    return parseYaml(text);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config is not valid YAML.",
      message: `Could not parse ${configPath}.`,
      hint: CONFIG_HINT,
      cause: err,
    });
  }
}
