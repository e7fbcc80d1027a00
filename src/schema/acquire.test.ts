import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import { SchemaAcquisitionError } from "../core/errors.js";
import { makeTempDir, registerTempDirCleanup } from "../core/temp-dirs.test-helpers.js";

import { acquireProviderSchema, buildSchemaProbeConfig } from "./acquire.js";
import { AZURERM } from "./schema.test-helpers.js";

// =============================================================================
// TEST SETUP
// =============================================================================

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);

registerTempDirCleanup();

afterEach(() => {
  execaMock.mockReset();
});

type ExecaResult = Awaited<ReturnType<typeof execa>>;

function execaResult(stdout: string, exitCode = 0, stderr = ""): ExecaResult {
  return { stdout, stderr, exitCode } as ExecaResult;
}

function workDirs(): string[] {
  return execaMock.mock.calls.map((call) => {
    const options = call.at(2);
    return options && typeof options === "object" && "cwd" in options ? String(options.cwd) : "";
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("buildSchemaProbeConfig", () => {
  it("adds the features block azurerm requires", () => {
    expect(buildSchemaProbeConfig(AZURERM)).toBe(
      [
        "terraform {",
        "  required_providers {",
        "    azurerm = {",
        '      source  = "hashicorp/azurerm"',
        '      version = "4.20.0"',
        "    }",
        "  }",
        "}",
        "",
        'provider "azurerm" {',
        "  features {}",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("omits the provider block for other providers", () => {
    expect(
      buildSchemaProbeConfig({ supplier: "hashicorp", name: "aws", version: "5.80.0" }),
    ).not.toContain("provider ");
  });
});

describe("acquireProviderSchema", () => {
  it("runs init then schema export and writes stdout", async () => {
    const outDir = makeTempDir("modgen-acquire-");
    const outputPath = path.join(outDir, "azurerm_4.20.0_schema.json");
    execaMock
      .mockResolvedValueOnce(execaResult("Terraform has been successfully initialized!"))
      .mockResolvedValueOnce(execaResult('{"format_version":"1.0","provider_schemas":{}}'));

    const written = await acquireProviderSchema({ provider: AZURERM, outputPath });

    expect(written).toBe(outputPath);
    expect(fs.readFileSync(outputPath, "utf8")).toBe(
      '{"format_version":"1.0","provider_schemas":{}}',
    );
    expect(execaMock.mock.calls.map((call) => [call[0], call[1]])).toEqual([
      ["terraform", ["init", "-input=false", "-no-color"]],
      ["terraform", ["providers", "schema", "-json"]],
    ]);

    const [workDir] = workDirs();
    expect(workDir?.startsWith(path.join(os.tmpdir(), "modgen-schema-"))).toBe(true);
    expect(fs.existsSync(workDir ?? "")).toBe(false);
  });

  it("reports terraform failures and still removes the temp directory", async () => {
    const outputPath = path.join(makeTempDir("modgen-acquire-"), "schema.json");
    execaMock.mockResolvedValueOnce(execaResult("", 1, "Error: Failed to query available provider packages"));

    const error = await acquireProviderSchema({ provider: AZURERM, outputPath }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(SchemaAcquisitionError);
    expect((error as SchemaAcquisitionError).message).toBe(
      "terraform init -input=false -no-color failed: Error: Failed to query available provider packages",
    );
    expect(fs.existsSync(outputPath)).toBe(false);
    expect(fs.existsSync(workDirs()[0] ?? "")).toBe(false);
  });

  it("wraps spawn errors", async () => {
    const outputPath = path.join(makeTempDir("modgen-acquire-"), "schema.json");
    execaMock.mockRejectedValueOnce(new Error("spawn terraform ENOENT"));

    await expect(acquireProviderSchema({ provider: AZURERM, outputPath })).rejects.toThrow(
      "Failed to run terraform init -input=false -no-color.",
    );
  });
});
