import path from "node:path";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { packageAssetPath } from "./package-root.js";

// =============================================================================
// TYPES
// =============================================================================

export type PromptTemplateName = "module-inputs" | "module-body" | "module-outputs";

export type PromptTemplateValues = Record<string, string>;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function renderPromptTemplate(
  name: PromptTemplateName,
  values: PromptTemplateValues,
): Promise<string> {
  const template = await loadTemplate(name);

  try {
    return template(values).trim();
  } catch (err) {
    if (err instanceof UserFacingError) {
      throw err;
    }
    throw new UserFacingError({
      code: PROMPT_ERROR_CODE,
      title: "Prompt template failed to render.",
      message: `Prompt template "${name}" could not be rendered.`,
      hint: "Provide values for all required template placeholders.",
      cause: err,
    });
  }
}

export function promptsDir(): string {
  return packageAssetPath("templates", "prompts");
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<PromptTemplateName, Handlebars.TemplateDelegate>();
const PROMPT_ERROR_CODE = USER_FACING_ERROR_CODES.io;

async function loadTemplate(name: PromptTemplateName): Promise<Handlebars.TemplateDelegate> {
  const cached = TEMPLATE_CACHE.get(name);
  if (cached) return cached;

  const templatePath = path.join(promptsDir(), `${name}.md`);
  if (!(await fse.pathExists(templatePath))) {
    throw new UserFacingError({
      code: PROMPT_ERROR_CODE,
      title: "Prompt template missing.",
      message: `Prompt template "${name}" not found at ${templatePath}.`,
      hint: "Ensure the template exists under templates/prompts.",
    });
  }

  let raw: string;
  try {
    raw = await fse.readFile(templatePath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: PROMPT_ERROR_CODE,
      title: "Prompt template unreadable.",
      message: `Failed to read prompt template "${name}" at ${templatePath}.`,
      hint: "Check that the prompt template file is readable.",
      cause: err,
    });
  }

  let compiled: Handlebars.TemplateDelegate;
  try {
    compiled = Handlebars.compile(raw, { noEscape: true, strict: true });
  } catch (err) {
    throw new UserFacingError({
      code: PROMPT_ERROR_CODE,
      title: "Prompt template invalid.",
      message: `Prompt template "${name}" failed to compile.`,
      hint: "Check the template syntax for errors.",
      cause: err,
    });
  }

  TEMPLATE_CACHE.set(name, compiled);
  return compiled;
}
