/*
Purpose: build the three instruction payloads (variables, main, outputs) for one resource type.
Assumptions: the schema context is rendered once and shared verbatim by all payloads; the
             naming rule text is duplicated into body and outputs so both requests agree.
Usage: const payloads = await composeInstructionSet({ resourceType, providerName, ... }).
*/

import type { ArtifactKind } from "../core/errors.js";
import { renderPromptTemplate, type PromptTemplateName } from "../core/prompts.js";
import type { NamingResolution } from "../naming/abbreviations.js";

// =============================================================================
// TYPES
// =============================================================================

export type InstructionPayload = {
  kind: ArtifactKind;
  role: string;
  description: string;
  expectedOutput: string;
};

export type InstructionSet = Record<ArtifactKind, InstructionPayload>;

export type CompositionContext = {
  resourceType: string;
  providerName: string;
  schemaContext: string;
  documentation?: string | null;
  naming: NamingResolution;
};

type PayloadSpec = {
  template: PromptTemplateName;
  role: string;
  expectedOutput: string;
};

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ["inputs", "body", "outputs"];

const UNRESOLVED_TOKEN_PLACEHOLDER = "<caf_abbreviation>";

const PAYLOAD_SPECS: Record<ArtifactKind, PayloadSpec> = {
  inputs: {
    template: "module-inputs",
    role: "Terraform Variables Generator: you generate clean, accurate Terraform variable definitions based on schema structure and exact markdown documentation.",
    expectedOutput: "Clean variables.tf with exact schema and literal description match.",
  },
  body: {
    template: "module-body",
    role: "Terraform Main Generator: you create a valid main.tf file that references variables correctly.",
    expectedOutput: "Valid main.tf file only.",
  },
  outputs: {
    template: "module-outputs",
    role: "Terraform Outputs Generator: you generate Terraform outputs for users to consume from other modules.",
    expectedOutput: "Terraform outputs.tf only.",
  },
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function composeInstruction(
  kind: ArtifactKind,
  context: CompositionContext,
): Promise<InstructionPayload> {
  const spec = PAYLOAD_SPECS[kind];
  const description = await renderPromptTemplate(spec.template, {
    resourceType: context.resourceType,
    resourceName: resourceDisplayName(context.resourceType, context.providerName),
    schemaContext: context.schemaContext,
    documentation: context.documentation?.trim() ?? "",
    namingToken: namingTokenFor(context.naming),
    namingRule: buildNamingRule(context.naming),
  });

  return { kind, role: spec.role, description, expectedOutput: spec.expectedOutput };
}

export async function composeInstructionSet(context: CompositionContext): Promise<InstructionSet> {
  const [inputs, body, outputs] = await Promise.all(
    ARTIFACT_KINDS.map((kind) => composeInstruction(kind, context)),
  );
  return { inputs, body, outputs };
}

// azurerm_route_server -> "Route Server"
export function resourceDisplayName(resourceType: string, providerName: string): string {
  const prefix = `${providerName}_`;
  const shortName = resourceType.startsWith(prefix)
    ? resourceType.slice(prefix.length)
    : resourceType;

  return shortName
    .split("_")
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function buildNamingRule(naming: NamingResolution): string {
  if (naming.source === "table") {
    const origin = naming.armType
      ? `the Cloud Adoption Framework abbreviation for ${naming.armType}`
      : "the Cloud Adoption Framework abbreviation for this resource type";
    return [
      `   - The resource label (local identifier after the resource type) MUST be exactly \`${naming.token}\``,
      `   - \`${naming.token}\` is ${origin}; do NOT derive, shorten, or extend it`,
    ].join("\n");
  }

  return [
    "   - The resource label (local identifier after the resource type) MUST use the exact abbreviation from Microsoft's Cloud Adoption Framework (CAF)",
    "   - Find the abbreviation by matching the Azure resource type in the official CAF documentation:",
    `     ${naming.referenceUrl}`,
    "   - Example: For Route Server (Microsoft.Network/virtualHubs), use 'rtserv':",
    '     resource "azurerm_route_server" "rtserv" { ... }',
    "   - Example: For Storage Account (Microsoft.Storage/storageAccounts), use 'st':",
    '     resource "azurerm_storage_account" "st" { ... }',
  ].join("\n");
}

function namingTokenFor(naming: NamingResolution): string {
  return naming.source === "table" ? naming.token : UNRESOLVED_TOKEN_PLACEHOLDER;
}
