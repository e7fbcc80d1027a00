import { describe, expect, it } from "vitest";

import { NamingMismatchError, StructuralError } from "../core/errors.js";

import { checkConsistency, checkInputReferences } from "./consistency.js";
import {
  STORAGE_ACCOUNT,
  VALID_INPUTS,
  validBody,
  validOutputs,
} from "./module.test-helpers.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("checkConsistency", () => {
  it("returns the shared naming token for agreeing artifacts", () => {
    expect(checkConsistency(validBody(), validOutputs(), STORAGE_ACCOUNT)).toEqual({
      resourceType: STORAGE_ACCOUNT,
      namingToken: "st",
    });
  });

  it("accepts a token that matches the naming table", () => {
    expect(
      checkConsistency(validBody(), validOutputs(), STORAGE_ACCOUNT, { expectedToken: "st" })
        .namingToken,
    ).toBe("st");
  });

  it("rejects artifacts whose labels disagree", () => {
    const error = captureError(() =>
      checkConsistency(validBody("st"), validOutputs("stacct"), STORAGE_ACCOUNT),
    );

    expect(error).toBeInstanceOf(NamingMismatchError);
    const mismatch = error as NamingMismatchError;
    expect(mismatch.bodyToken).toBe("st");
    expect(mismatch.outputsToken).toBe("stacct");
    expect(mismatch.stage).toBe("validate");
    expect(mismatch.message).toBe(
      'Resource label mismatch for azurerm_storage_account: main.tf uses "st", outputs.tf references "stacct".',
    );
  });

  it("rejects an agreeing label that differs from the naming table", () => {
    const error = captureError(() =>
      checkConsistency(validBody("sa"), validOutputs("sa"), STORAGE_ACCOUNT, {
        expectedToken: "st",
      }),
    );

    expect(error).toBeInstanceOf(NamingMismatchError);
    expect((error as NamingMismatchError).message).toBe(
      'Resource label for azurerm_storage_account is "sa" but the naming table requires "st".',
    );
  });

  it("rejects an id output that does not reference the resource", () => {
    const outputs = 'output "id" {\n  value = "literal"\n}';
    const error = captureError(() => checkConsistency(validBody(), outputs, STORAGE_ACCOUNT));

    expect(error).toBeInstanceOf(NamingMismatchError);
    expect((error as NamingMismatchError).outputsToken).toBeNull();
    expect((error as NamingMismatchError).message).toBe(
      'outputs.tf for azurerm_storage_account does not reference azurerm_storage_account.<label>.id in output "id".',
    );
  });

  it("requires exactly one resource block", () => {
    const twice = `${validBody("st")}\n\n${validBody("st2")}`;
    const error = captureError(() => checkConsistency(twice, validOutputs(), STORAGE_ACCOUNT));

    expect(error).toBeInstanceOf(StructuralError);
    expect((error as StructuralError).artifact).toBe("body");
    expect((error as StructuralError).message).toBe(
      "main.tf for azurerm_storage_account must declare exactly one resource block (found 2).",
    );

    expect(() => checkConsistency("", validOutputs(), STORAGE_ACCOUNT)).toThrow(
      "main.tf for azurerm_storage_account must declare exactly one resource block (found 0).",
    );
  });

  it("requires the resource to have the requested type", () => {
    const body = 'resource "azurerm_resource_group" "rg" {\n  name = var.name\n}';

    expect(() => checkConsistency(body, validOutputs(), STORAGE_ACCOUNT)).toThrow(
      'main.tf must declare resource "azurerm_storage_account" "<label>" (found resource "azurerm_resource_group" "rg").',
    );
  });

  it("rejects provider blocks in main.tf", () => {
    const body = `provider "azurerm" {\n  features {}\n}\n\n${validBody()}`;

    expect(() => checkConsistency(body, validOutputs(), STORAGE_ACCOUNT)).toThrow(
      "main.tf for azurerm_storage_account must not declare a provider block.",
    );
  });

  it("rejects content blocks directly under the resource", () => {
    const body = [
      `resource "${STORAGE_ACCOUNT}" "st" {`,
      "  name = var.name",
      "  content {",
      "    default_action = var.default_action",
      "  }",
      "}",
    ].join("\n");

    const error = captureError(() => checkConsistency(body, validOutputs(), STORAGE_ACCOUNT));

    expect(error).toBeInstanceOf(StructuralError);
    expect((error as StructuralError).artifact).toBe("body");
  });

  it("requires exactly one id output", () => {
    const outputs = 'output "name" {\n  value = azurerm_storage_account.st.name\n}';
    const error = captureError(() => checkConsistency(validBody(), outputs, STORAGE_ACCOUNT));

    expect(error).toBeInstanceOf(StructuralError);
    expect((error as StructuralError).artifact).toBe("outputs");
    expect((error as StructuralError).message).toBe(
      'outputs.tf for azurerm_storage_account must declare exactly one output "id" (found 0).',
    );
  });
});

describe("checkInputReferences", () => {
  it("accepts a body that only references declared variables", () => {
    expect(() => checkInputReferences(VALID_INPUTS, validBody(), STORAGE_ACCOUNT)).not.toThrow();
  });

  it("lists undeclared variables in sorted order", () => {
    const inputs = VALID_INPUTS.replace('variable "tags"', 'variable "labels"').replace(
      'variable "location"',
      'variable "region"',
    );
    const error = captureError(() => checkInputReferences(inputs, validBody(), STORAGE_ACCOUNT));

    expect(error).toBeInstanceOf(StructuralError);
    expect((error as StructuralError).artifact).toBe("body");
    expect((error as StructuralError).message).toBe(
      "main.tf for azurerm_storage_account references undeclared variables: location, tags.",
    );
  });

  it("rejects a timeouts variable", () => {
    const inputs = `${VALID_INPUTS}\n\nvariable "timeouts" {\n  type    = any\n  default = null\n}`;
    const error = captureError(() => checkInputReferences(inputs, validBody(), STORAGE_ACCOUNT));

    expect(error).toBeInstanceOf(StructuralError);
    expect((error as StructuralError).artifact).toBe("inputs");
    expect((error as StructuralError).message).toBe(
      'variables.tf for azurerm_storage_account declares a "timeouts" variable.',
    );
  });
});
