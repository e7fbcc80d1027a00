export const STORAGE_ACCOUNT = "azurerm_storage_account";

export const VALID_INPUTS = [
  'variable "account_tier" {',
  "  type        = string",
  '  description = "Defines the Tier to use for this storage account."',
  "}",
  "",
  'variable "location" {',
  "  type        = string",
  '  description = "Specifies the supported Azure location where the resource exists."',
  "}",
  "",
  'variable "name" {',
  "  type        = string",
  '  description = "Specifies the name of the storage account."',
  "}",
  "",
  'variable "tags" {',
  "  type        = map(string)",
  "  default     = {}",
  '  description = "A mapping of tags to assign to the resource."',
  "}",
  "",
  'variable "network_rules" {',
  "  type = object({",
  "    default_action = string",
  "  })",
  "  default     = null",
  '  description = "A network_rules block."',
  "}",
].join("\n");

export function validBody(label = "st"): string {
  return [
    `resource "${STORAGE_ACCOUNT}" "${label}" {`,
    "  account_tier = var.account_tier",
    "  location     = var.location",
    "  name         = var.name",
    "  tags         = var.tags",
    "",
    '  dynamic "network_rules" {',
    "    for_each = var.network_rules != null ? [var.network_rules] : []",
    "    content {",
    "      default_action = network_rules.value.default_action",
    "    }",
    "  }",
    "}",
  ].join("\n");
}

export function validOutputs(label = "st"): string {
  return [
    'output "id" {',
    '  description = "The ID of the Storage Account"',
    `  value       = ${STORAGE_ACCOUNT}.${label}.id`,
    "}",
  ].join("\n");
}
