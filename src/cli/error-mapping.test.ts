import { describe, expect, it } from "vitest";

import {
  ConfigError,
  EncodingError,
  GenerationBackendError,
  NamingMismatchError,
  PipelineStageError,
  ResourceNotFoundError,
  SchemaDocumentError,
  StructuralError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { LlmError } from "../llm/client.js";

import { toUserFacingError } from "./error-mapping.js";

describe("toUserFacingError", () => {
  it("passes user-facing errors through unchanged", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config invalid.",
      message: "bad",
    });

    expect(toUserFacingError(error)).toBe(error);
  });

  it("names the resource type and stage for unknown resource types", () => {
    const cause = new ResourceNotFoundError({
      resourceType: "azurerm_nope",
      providerSource: "registry.terraform.io/hashicorp/azurerm",
    });

    const mapped = toUserFacingError(cause);

    expect(mapped.code).toBe(USER_FACING_ERROR_CODES.schema);
    expect(mapped.title).toBe("azurerm_nope (stage extract): resource type not in schema.");
    expect(mapped.message).toBe(cause.message);
    expect(mapped.cause).toBe(cause);
  });

  it("lists each failed artifact for backend failures", () => {
    const mapped = toUserFacingError(
      new GenerationBackendError({
        resourceType: "azurerm_storage_account",
        failures: [
          { kind: "inputs", message: "timeout" },
          { kind: "outputs", message: "Backend returned empty text." },
        ],
      }),
    );

    expect(mapped.code).toBe(USER_FACING_ERROR_CODES.generation);
    expect(mapped.title).toBe(
      "azurerm_storage_account (stage generate): generation backend failed.",
    );
    expect(mapped.message).toBe(
      [
        "Generation failed for azurerm_storage_account (inputs, outputs).",
        "- inputs: timeout",
        "- outputs: Backend returned empty text.",
      ].join("\n"),
    );
  });

  it("maps validation failures to validation errors", () => {
    const mismatch = toUserFacingError(
      new NamingMismatchError({
        resourceType: "azurerm_storage_account",
        message: "labels differ",
        bodyToken: "st",
        outputsToken: "sa",
      }),
    );
    const structural = toUserFacingError(
      new StructuralError({
        resourceType: "azurerm_storage_account",
        artifact: "outputs",
        message: "no id output",
      }),
    );

    expect(mismatch.code).toBe(USER_FACING_ERROR_CODES.validation);
    expect(mismatch.title).toBe(
      "azurerm_storage_account (stage validate): resource label mismatch.",
    );
    expect(structural.title).toBe(
      "azurerm_storage_account (stage validate): invalid outputs artifact.",
    );
  });

  it("keeps the stage of wrapped failures", () => {
    const mapped = toUserFacingError(
      new PipelineStageError({
        resourceType: "azurerm_key_vault",
        stage: "write",
        cause: new Error("EACCES: permission denied"),
      }),
    );

    expect(mapped.code).toBe(USER_FACING_ERROR_CODES.io);
    expect(mapped.title).toBe("azurerm_key_vault (stage write): stage failed.");
    expect(mapped.message).toBe(
      'Stage "write" failed for azurerm_key_vault: EACCES: permission denied',
    );
  });

  it("uses the schema code for wrapped schema document errors", () => {
    const mapped = toUserFacingError(
      new PipelineStageError({
        resourceType: "aws_s3_bucket",
        stage: "extract",
        cause: new SchemaDocumentError("Provider missing."),
      }),
    );

    expect(mapped.code).toBe(USER_FACING_ERROR_CODES.schema);
  });

  it("maps encoding, config and client errors", () => {
    expect(
      toUserFacingError(
        new EncodingError("not plain text", {
          resourceType: "azurerm_storage_account",
          artifacts: ["body"],
        }),
      ).title,
    ).toBe("azurerm_storage_account (stage sanitize): generated text rejected.");
    expect(toUserFacingError(new ConfigError("Failed to read config.")).code).toBe(
      USER_FACING_ERROR_CODES.config,
    );
    expect(toUserFacingError(new LlmError("quota")).code).toBe(
      USER_FACING_ERROR_CODES.generation,
    );
  });

  it("falls back to an unknown error", () => {
    const mapped = toUserFacingError(new Error("boom"));

    expect(mapped.code).toBe(USER_FACING_ERROR_CODES.unknown);
    expect(mapped.title).toBe("Command failed.");
    expect(mapped.message).toBe("boom");
  });
});
