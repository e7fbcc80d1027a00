/*
Purpose: reject generated artifacts that disagree with each other before anything is written.
Assumptions: inputs are sanitized HCL; the naming token is the resource block's second label.
Usage: const { namingToken } = checkConsistency(mainTf, outputsTf, "azurerm_storage_account").
*/

import { NamingMismatchError, StructuralError, type ArtifactKind } from "../core/errors.js";
import { findAttribute, findBlocks, scanHcl, type HclBlock } from "../hcl/scan.js";

// =============================================================================
// TYPES
// =============================================================================

export type ValidationResult = {
  resourceType: string;
  namingToken: string;
};

export type ConsistencyOptions = {
  expectedToken?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

const LABEL_PATTERN = /^[A-Za-z_][\w-]*$/;
const VAR_REFERENCE = /\bvar\.([A-Za-z_][\w-]*)/g;
const TIMEOUTS_BLOCK = "timeouts";

export function checkConsistency(
  bodyText: string,
  outputsText: string,
  resourceType: string,
  options: ConsistencyOptions = {},
): ValidationResult {
  const resource = locateResourceBlock(bodyText, resourceType);
  const idOutput = locateIdOutput(outputsText, resourceType);

  const bodyToken = resource.labels[1] ?? null;
  const outputsToken = extractOutputToken(idOutput, resourceType);

  if (!bodyToken || !LABEL_PATTERN.test(bodyToken)) {
    throw new NamingMismatchError({
      resourceType,
      message: `main.tf for ${resourceType} has no usable resource label.`,
      bodyToken,
      outputsToken,
    });
  }

  if (!outputsToken) {
    throw new NamingMismatchError({
      resourceType,
      message: `outputs.tf for ${resourceType} does not reference ${resourceType}.<label>.id in output "id".`,
      bodyToken,
      outputsToken,
    });
  }

  if (bodyToken !== outputsToken) {
    throw new NamingMismatchError({
      resourceType,
      message: `Resource label mismatch for ${resourceType}: main.tf uses "${bodyToken}", outputs.tf references "${outputsToken}".`,
      bodyToken,
      outputsToken,
    });
  }

  if (options.expectedToken !== undefined && bodyToken !== options.expectedToken) {
    throw new NamingMismatchError({
      resourceType,
      message: `Resource label for ${resourceType} is "${bodyToken}" but the naming table requires "${options.expectedToken}".`,
      bodyToken,
      outputsToken,
    });
  }

  return { resourceType, namingToken: bodyToken };
}

export function checkInputReferences(
  inputsText: string,
  bodyText: string,
  resourceType: string,
): void {
  const declared = new Set(
    findBlocks(scanHcl(inputsText), "variable")
      .map((block) => block.labels[0])
      .filter((name): name is string => name !== undefined),
  );

  if (declared.has(TIMEOUTS_BLOCK)) {
    throw structural(
      resourceType,
      "inputs",
      `variables.tf for ${resourceType} declares a "timeouts" variable.`,
    );
  }

  const missing = new Set<string>();
  for (const match of bodyText.matchAll(VAR_REFERENCE)) {
    const name = match[1];
    if (name !== undefined && !declared.has(name)) missing.add(name);
  }

  if (missing.size > 0) {
    const names = [...missing].sort().join(", ");
    throw structural(
      resourceType,
      "body",
      `main.tf for ${resourceType} references undeclared variables: ${names}.`,
    );
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function locateResourceBlock(bodyText: string, resourceType: string): HclBlock {
  const body = scanHcl(bodyText);
  const resources = findBlocks(body, "resource");

  if (resources.length !== 1) {
    throw structural(
      resourceType,
      "body",
      `main.tf for ${resourceType} must declare exactly one resource block (found ${resources.length}).`,
    );
  }

  const [resource] = resources;
  if (!resource || resource.labels[0] !== resourceType || resource.labels.length !== 2) {
    const found = resource ? resource.labels.map((label) => `"${label}"`).join(" ") : "none";
    throw structural(
      resourceType,
      "body",
      `main.tf must declare resource "${resourceType}" "<label>" (found resource ${found}).`,
    );
  }

  if (findBlocks(body, "provider").length > 0) {
    throw structural(
      resourceType,
      "body",
      `main.tf for ${resourceType} must not declare a provider block.`,
    );
  }

  if (findBlocks(scanHcl(resource.body), "content").length > 0) {
    throw structural(
      resourceType,
      "body",
      `main.tf for ${resourceType} has a content block directly under the resource; content belongs inside dynamic blocks.`,
    );
  }

  return resource;
}

function locateIdOutput(outputsText: string, resourceType: string): HclBlock {
  const idOutputs = findBlocks(scanHcl(outputsText), "output", "id");
  if (idOutputs.length !== 1 || !idOutputs[0]) {
    throw structural(
      resourceType,
      "outputs",
      `outputs.tf for ${resourceType} must declare exactly one output "id" (found ${idOutputs.length}).`,
    );
  }
  return idOutputs[0];
}

function extractOutputToken(output: HclBlock, resourceType: string): string | null {
  const value = findAttribute(scanHcl(output.body), "value");
  if (!value) return null;

  const parts = value.expression.split(".");
  if (parts.length !== 3 || parts[0] !== resourceType || parts[2] !== "id") return null;

  const token = parts[1] ?? "";
  return LABEL_PATTERN.test(token) ? token : null;
}

function structural(
  resourceType: string,
  artifact: ArtifactKind,
  message: string,
): StructuralError {
  return new StructuralError({ resourceType, artifact, message });
}
