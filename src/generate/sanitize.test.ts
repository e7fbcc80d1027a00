import { describe, expect, it } from "vitest";

import { EncodingError } from "../core/errors.js";

import { sanitizeArtifactText, stripComments, stripFences } from "./sanitize.js";

describe("sanitizeArtifactText", () => {
  it("unwraps a fenced code block", () => {
    const raw = '```hcl\nresource "a" "b" {\n  x = 1\n}\n```\n';

    expect(sanitizeArtifactText(raw)).toBe('resource "a" "b" {\n  x = 1\n}');
  });

  it("drops an unpaired opening fence", () => {
    expect(sanitizeArtifactText("```terraform\nx = 1\n")).toBe("x = 1");
  });

  it("removes stray backticks", () => {
    expect(sanitizeArtifactText("x = `1`")).toBe("x = 1");
  });

  it("strips comments but keeps comment markers inside strings", () => {
    const raw = [
      "# heading",
      'variable "name" {',
      "  type = string # inline",
      '  description = "Use # not // here"',
      "}",
      "// trailing",
      "/* block",
      "comment */",
      "",
    ].join("\n");

    expect(sanitizeArtifactText(raw)).toBe(
      ['variable "name" {', "  type = string", '  description = "Use # not // here"', "}"].join(
        "\n",
      ),
    );
  });

  it("leaves heredoc bodies untouched", () => {
    const raw = [
      'variable "x" {',
      "  description = <<DESCRIPTION",
      "Main # not a comment",
      "DESCRIPTION",
      "}",
    ].join("\n");

    expect(sanitizeArtifactText(raw)).toBe(raw);
  });

  it("keeps comment markers inside quoted arguments of interpolations", () => {
    const raw = [
      'resource "a" "b" {',
      '  name = "${join("#", var.parts)}"',
      '  path = "${replace(var.p, "//", "/")}" # trailing',
      '  tags = "%{ for t in split("/*", var.t) }${t}%{ endfor }"',
      "}",
    ].join("\n");

    expect(sanitizeArtifactText(raw)).toBe(
      [
        'resource "a" "b" {',
        '  name = "${join("#", var.parts)}"',
        '  path = "${replace(var.p, "//", "/")}"',
        '  tags = "%{ for t in split("/*", var.t) }${t}%{ endfor }"',
        "}",
      ].join("\n"),
    );
  });

  it("treats escaped template markers as literal text", () => {
    expect(sanitizeArtifactText('a = "$${x}" # note')).toBe('a = "$${x}"');
  });

  it("normalizes line endings and removes invisible characters", () => {
    expect(sanitizeArtifactText("a = 1\r\nb = 2\r\n")).toBe("a = 1\nb = 2");
    expect(sanitizeArtifactText('a\u200B = "b"\u00A0')).toBe('a = "b"');
    expect(sanitizeArtifactText("\uFEFFa = 1")).toBe("a = 1");
  });

  it("collapses runs of blank lines", () => {
    expect(sanitizeArtifactText("a = 1\n\n\n\nb = 2")).toBe("a = 1\n\nb = 2");
  });

  it("rejects text with control characters", () => {
    let error: unknown;
    try {
      sanitizeArtifactText("a = 1\u0007");
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(EncodingError);
    expect((error as EncodingError).message).toBe(
      "Generated text contains control character U+0007 and is not plain text.",
    );
  });

  it("keeps tabs", () => {
    expect(sanitizeArtifactText("a = {\n\tb = 1\n}")).toBe("a = {\n\tb = 1\n}");
  });

  it("is idempotent", () => {
    const samples = [
      '```hcl\n# c\nresource "a" "b" {\n  x = "`y`" // z\n}\n```',
      "``\n```\nx = 1\n```\n```",
      "a = 1 /* open\n# still comment */ b = 2\n\n\n\n",
      "\u00A0\u200B```\n\n\n```",
    ];

    for (const sample of samples) {
      const once = sanitizeArtifactText(sample);
      expect(sanitizeArtifactText(once)).toBe(once);
    }
  });
});

describe("stripFences", () => {
  it("keeps the content of every paired fence", () => {
    expect(stripFences("```hcl\na = 1\n```\n```\nb = 2\n```")).toBe("a = 1\n\nb = 2\n");
  });
});

describe("stripComments", () => {
  it("keeps code that follows a closed block comment", () => {
    expect(stripComments("a = 1 /* note */ b")).toBe("a = 1  b");
  });
});
