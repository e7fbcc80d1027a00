import { describe, expect, it } from "vitest";

import {
  createAnsiFormatter,
  formatErrorLines,
  formatErrorMessage,
  renderErrorForTerminal,
  resolveColorEnabled,
} from "./error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config invalid.",
      message: "llm.max_retries: Expected number, received string",
      hint: "Fix the listed keys in your modgen.yaml",
      next: "Re-run modgen generate",
    });

    const lines = formatErrorLines(error);

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "hint", "next"]);
    expect(lines[0]?.text).toBe("Config invalid.");
    expect(lines[1]?.text).toBe("llm.max_retries: Expected number, received string");
  });

  it("includes debug details when requested", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.generation,
      title: "Generation failed",
      message: "Backend stopped",
      cause: new Error("boom"),
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.some((line) => line.kind === "code" && line.text === "GENERATION_ERROR")).toBe(true);
    expect(lines.some((line) => line.kind === "name" && line.text === "UserFacingError")).toBe(
      true,
    );
    expect(lines.some((line) => line.kind === "cause" && line.text === "boom")).toBe(true);

    const stack = lines.find((line) => line.kind === "stack");
    expect(stack?.text).toContain("UserFacingError");
  });

  it("defaults unknown inputs to an unexpected error title", () => {
    const lines = formatErrorLines("boom");

    expect(lines[0]?.text).toBe("Unexpected error");
    expect(lines[1]?.text).toBe("boom");
  });
});

describe("renderErrorForTerminal", () => {
  it("prefixes title, hint and next lines", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: "azurerm_storage_account (stage validate): resource label mismatch.",
      message: "Resource label mismatch.",
      hint: "No files were written.",
      next: "Re-run generate.",
    });

    expect(renderErrorForTerminal(error)).toBe(
      [
        "Error: azurerm_storage_account (stage validate): resource label mismatch.",
        "Resource label mismatch.",
        "Hint: No files were written.",
        "Next: Re-run generate.",
      ].join("\n"),
    );
  });

  it("adds the code in debug mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.io,
      title: "Write failed.",
      message: "Write failed.",
    });

    const rendered = renderErrorForTerminal(error, { mode: "debug" }).split("\n");

    expect(rendered[0]).toBe("Error: Write failed.");
    expect(rendered[1]).toBe("code: IO_ERROR");
  });
});

describe("formatErrorMessage", () => {
  it("prefers the error message and falls back to strings", () => {
    expect(formatErrorMessage(new Error("boom"))).toBe("boom");
    expect(formatErrorMessage("plain")).toBe("plain");
  });
});

describe("resolveColorEnabled", () => {
  it("disables color for non-TTY streams", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false } })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true } })).toBe(true);
  });

  it("respects explicit useColor flags", () => {
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: false })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: true })).toBe(true);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    const format = createAnsiFormatter(false);
    expect(format("plain", ["red"])).toBe("plain");
  });

  it("wraps output with ANSI codes when enabled", () => {
    const format = createAnsiFormatter(true);
    const result = format("alert", ["red"]);
    expect(result).toContain("\x1b[");
    expect(result).toContain("alert");
  });
});
