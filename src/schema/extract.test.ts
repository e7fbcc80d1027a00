import { describe, expect, it } from "vitest";

import { ResourceNotFoundError, SchemaDocumentError } from "../core/errors.js";

import { extractSchemaSummary, isUserSettable } from "./extract.js";
import { renderSchemaContext } from "./render.js";
import { AZURERM, STORAGE_ACCOUNT_CONTEXT, buildSchemaDocument } from "./schema.test-helpers.js";

describe("extractSchemaSummary", () => {
  it("keeps user-settable arguments in document order", () => {
    const summary = extractSchemaSummary(buildSchemaDocument(), AZURERM, "azurerm_storage_account");

    expect(summary.arguments).toEqual([
      { name: "name", required: true },
      { name: "location", required: true },
      { name: "account_tier", required: true },
      { name: "tags", required: false },
    ]);
  });

  it("builds the nested block tree with min_items defaulting to 0", () => {
    const summary = extractSchemaSummary(buildSchemaDocument(), AZURERM, "azurerm_storage_account");

    expect(summary.blockTree).toEqual([
      {
        name: "network_rules",
        minItems: 0,
        attributes: [
          { name: "default_action", required: true },
          { name: "ip_rules", required: false },
        ],
        blocks: [
          {
            name: "private_link_access",
            minItems: 1,
            attributes: [{ name: "endpoint_resource_id", required: true }],
            blocks: [],
          },
        ],
      },
      {
        name: "blob_properties",
        minItems: 0,
        attributes: [{ name: "versioning_enabled", required: false }],
        blocks: [],
      },
    ]);
  });

  it("returns an empty block tree for resources without nested blocks", () => {
    const summary = extractSchemaSummary(buildSchemaDocument(), AZURERM, "azurerm_resource_group");

    expect(summary.blockTree).toEqual([]);
    expect(renderSchemaContext(summary)).toBe(
      [
        "Arguments:",
        "- name (required)",
        "- location (required)",
        "",
        "Nested Block Tree:",
        "- (none)",
      ].join("\n"),
    );
  });

  it("raises ResourceNotFoundError for an unknown resource type", () => {
    let error: unknown;
    try {
      extractSchemaSummary(buildSchemaDocument(), AZURERM, "azurerm_not_a_thing");
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ResourceNotFoundError);
    const notFound = error as ResourceNotFoundError;
    expect(notFound.resourceType).toBe("azurerm_not_a_thing");
    expect(notFound.stage).toBe("extract");
    expect(notFound.message).toBe(
      'Resource type "azurerm_not_a_thing" not found in schema for provider registry.terraform.io/hashicorp/azurerm.',
    );
  });

  it("reports which providers a document holds when the provider is missing", () => {
    expect(() =>
      extractSchemaSummary(
        buildSchemaDocument(),
        { supplier: "hashicorp", name: "aws" },
        "aws_s3_bucket",
      ),
    ).toThrow(
      new SchemaDocumentError(
        "Provider registry.terraform.io/hashicorp/aws not present in schema document (found: registry.terraform.io/hashicorp/azurerm).",
      ),
    );
  });

  it("is a pure function of its input", () => {
    const document = buildSchemaDocument();
    const first = extractSchemaSummary(document, AZURERM, "azurerm_storage_account");
    const second = extractSchemaSummary(document, AZURERM, "azurerm_storage_account");

    expect(second).toEqual(first);
    expect(document).toEqual(buildSchemaDocument());
  });
});

describe("isUserSettable", () => {
  it("drops computed-only fields and keeps required or non-computed ones", () => {
    expect(isUserSettable({ computed: true })).toBe(false);
    expect(isUserSettable({ required: true, computed: true })).toBe(true);
    expect(isUserSettable({ computed: false })).toBe(true);
    expect(isUserSettable({})).toBe(true);
  });
});

describe("renderSchemaContext", () => {
  it("renders arguments and the indented block tree", () => {
    const summary = extractSchemaSummary(buildSchemaDocument(), AZURERM, "azurerm_storage_account");

    expect(renderSchemaContext(summary)).toBe(STORAGE_ACCOUNT_CONTEXT);
  });

  it("marks an empty argument list explicitly", () => {
    expect(renderSchemaContext({ arguments: [], blockTree: [] })).toBe(
      ["Arguments:", "- (none)", "", "Nested Block Tree:", "- (none)"].join("\n"),
    );
  });
});
