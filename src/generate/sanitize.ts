/*
Purpose: turn raw backend text into HCL source that can be written to disk.
Assumptions: every step only deletes characters (or rewrites CR line breaks), and the pass is
             repeated until nothing changes, so sanitizing twice equals sanitizing once.
*/

import { EncodingError } from "../core/errors.js";
import { skipQuotedString } from "../hcl/scan.js";

// =============================================================================
// PATTERNS
// =============================================================================

const LINE_BREAKS = /\r\n?/g;
const INVISIBLE_CHARS = /[\u200B\u200C\u200D\u2060\uFEFF\u00A0]/g;
const LONE_SURROGATES = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/;
const PAIRED_FENCE = /```(?:[\w+.-]*[ \t]*\n)?([\s\S]*?)```/g;
const FENCE_LINE = /^[ \t]*```[\w+.-]*[ \t]*$\n?/gm;
const BACKTICKS = /`/g;
const TRAILING_SPACE = /[ \t]+$/gm;
const EXTRA_BLANK_LINES = /\n{3,}/g;
const HEREDOC_START = /^<<-?([A-Za-z_][\w-]*)[ \t]*$/;

// =============================================================================
// PUBLIC API
// =============================================================================

export function sanitizeArtifactText(raw: string): string {
  const match = CONTROL_CHARS.exec(raw);
  if (match) {
    const code = match[0].charCodeAt(0).toString(16).padStart(4, "0");
    throw new EncodingError(
      `Generated text contains control character U+${code.toUpperCase()} and is not plain text.`,
    );
  }

  let current = raw;
  for (;;) {
    const next = sanitizePass(current);
    if (next === current) return next;
    current = next;
  }
}

export function stripFences(text: string): string {
  return text.replace(PAIRED_FENCE, "$1").replace(FENCE_LINE, "").replace(BACKTICKS, "");
}

// Removes `#`, `//` and `/* */` comments outside strings and heredocs. Lines that held only a
// comment are dropped entirely.
export function stripComments(text: string): string {
  const kept: string[] = [];
  let heredocMarker: string | null = null;
  let inBlockComment = false;

  for (const line of text.split("\n")) {
    if (heredocMarker !== null) {
      kept.push(line);
      if (line.trim() === heredocMarker) heredocMarker = null;
      continue;
    }

    const result = stripLineComments(line, inBlockComment);
    inBlockComment = result.inBlockComment;
    heredocMarker = result.heredocMarker;

    if (result.hadComment && result.text.trim().length === 0) continue;
    kept.push(result.text);
  }

  return kept.join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function sanitizePass(text: string): string {
  let out = text.replace(LINE_BREAKS, "\n");
  out = out.replace(INVISIBLE_CHARS, "");
  out = out.replace(LONE_SURROGATES, "");
  out = stripFences(out);
  out = stripComments(out);
  out = out.replace(TRAILING_SPACE, "");
  out = out.replace(EXTRA_BLANK_LINES, "\n\n");
  return out.trim();
}

type LineScan = {
  text: string;
  hadComment: boolean;
  inBlockComment: boolean;
  heredocMarker: string | null;
};

function stripLineComments(line: string, startsInBlockComment: boolean): LineScan {
  let out = "";
  let hadComment = startsInBlockComment;
  let inBlockComment = startsInBlockComment;
  let heredocMarker: string | null = null;
  let i = 0;

  while (i < line.length) {
    if (inBlockComment) {
      const end = line.indexOf("*/", i);
      if (end === -1) {
        i = line.length;
        break;
      }
      inBlockComment = false;
      i = end + 2;
      continue;
    }

    const ch = line[i];
    const next = line[i + 1];

    if (ch === '"') {
      const end = skipQuotedString(line, i);
      out += line.slice(i, end);
      i = end;
      continue;
    }

    if (ch === "#" || (ch === "/" && next === "/")) {
      hadComment = true;
      break;
    }

    if (ch === "/" && next === "*") {
      hadComment = true;
      inBlockComment = true;
      i += 2;
      continue;
    }

    if (ch === "<" && next === "<") {
      const heredoc = HEREDOC_START.exec(line.slice(i));
      if (heredoc) {
        heredocMarker = heredoc[1] ?? null;
        out += line.slice(i);
        break;
      }
    }

    out += ch;
    i += 1;
  }

  return { text: out.replace(/[ \t]+$/, ""), hadComment, inBlockComment, heredocMarker };
}
