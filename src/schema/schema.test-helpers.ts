import type { SchemaDocument } from "./document.js";
import type { ProviderIdentity } from "./types.js";

export const AZURERM: ProviderIdentity = {
  supplier: "hashicorp",
  name: "azurerm",
  version: "4.20.0",
};

export const AZURERM_SOURCE = "registry.terraform.io/hashicorp/azurerm";

// A trimmed-down storage account schema in `terraform providers schema -json` shape.
export function buildSchemaDocument(): SchemaDocument {
  return {
    format_version: "1.0",
    provider_schemas: {
      [AZURERM_SOURCE]: {
        resource_schemas: {
          azurerm_storage_account: {
            version: 4,
            block: {
              attributes: {
                id: { type: "string", computed: true },
                name: { type: "string", required: true },
                location: { type: "string", required: true },
                account_tier: { type: "string", required: true },
                tags: { type: ["map", "string"], optional: true },
                primary_blob_endpoint: { type: "string", computed: true },
                min_tls_version: { type: "string", optional: true, computed: true },
              },
              block_types: {
                network_rules: {
                  nesting_mode: "list",
                  max_items: 1,
                  block: {
                    attributes: {
                      default_action: { type: "string", required: true },
                      ip_rules: { type: ["set", "string"], optional: true },
                    },
                    block_types: {
                      private_link_access: {
                        nesting_mode: "list",
                        min_items: 1,
                        block: {
                          attributes: {
                            endpoint_resource_id: { type: "string", required: true },
                          },
                        },
                      },
                    },
                  },
                },
                blob_properties: {
                  nesting_mode: "list",
                  block: {
                    attributes: {
                      versioning_enabled: { type: "bool", optional: true },
                    },
                  },
                },
              },
            },
          },
          azurerm_resource_group: {
            block: {
              attributes: {
                id: { type: "string", computed: true },
                name: { type: "string", required: true },
                location: { type: "string", required: true },
              },
            },
          },
        },
      },
    },
  };
}

export const STORAGE_ACCOUNT_CONTEXT = [
  "Arguments:",
  "- name (required)",
  "- location (required)",
  "- account_tier (required)",
  "- tags (optional)",
  "",
  "Nested Block Tree:",
  "- network_rules (min_items=0)",
  "  - default_action (required)",
  "  - ip_rules (optional)",
  "  - private_link_access (min_items=1)",
  "    - endpoint_resource_id (required)",
  "- blob_properties (min_items=0)",
  "  - versioning_enabled (optional)",
].join("\n");
