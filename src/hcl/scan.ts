/*
Purpose: shallow HCL reader for checking generated module files.
Assumptions: input is sanitized generator output; only the top level of a body is scanned,
             nested bodies are scanned by calling scanHcl again on `block.body`.
Usage: const { blocks, attributes } = scanHcl(text); scanHcl(blocks[0].body).
*/

// =============================================================================
// TYPES
// =============================================================================

export type HclBlock = {
  type: string;
  labels: string[];
  body: string;
  line: number;
};

export type HclAttribute = {
  name: string;
  expression: string;
  line: number;
};

export type HclBody = {
  blocks: HclBlock[];
  attributes: HclAttribute[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

const BLOCK_HEADER = /^([A-Za-z_][\w-]*)((?:\s+(?:"(?:[^"\\]|\\.)*"|[A-Za-z_][\w-]*))*)\s*$/;
const BLOCK_LABEL = /"((?:[^"\\]|\\.)*)"|([A-Za-z_][\w-]*)/g;
const ATTRIBUTE = /^([A-Za-z_][\w-]*)\s*=(?!=)\s*([\s\S]*)$/;
const HEREDOC_START = /^<<-?([A-Za-z_][\w-]*)[ \t]*\n/;

export function scanHcl(text: string): HclBody {
  const blocks: HclBlock[] = [];
  const attributes: HclAttribute[] = [];

  let depth = 0;
  let statementStart = 0;
  let openBrace = -1;
  let i = 0;

  const flushStatement = (end: number): void => {
    const statement = text.slice(statementStart, end).trim();
    const match = ATTRIBUTE.exec(statement);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      attributes.push({
        name: match[1],
        expression: match[2].trim(),
        line: lineOf(text, statementStart + leadingWhitespace(text, statementStart)),
      });
    }
  };

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === '"') {
      i = skipQuotedString(text, i);
      continue;
    }
    if (ch === "#" || (ch === "/" && next === "/")) {
      i = skipToLineEnd(text, i);
      continue;
    }
    if (ch === "/" && next === "*") {
      const end = text.indexOf("*/", i + 2);
      i = end === -1 ? text.length : end + 2;
      continue;
    }
    if (ch === "<" && next === "<") {
      const heredocEnd = skipHeredoc(text, i);
      if (heredocEnd !== null) {
        i = heredocEnd;
        continue;
      }
    }

    if (ch === "{" || ch === "[" || ch === "(") {
      if (depth === 0 && ch === "{") openBrace = i;
      depth += 1;
    } else if (ch === "}" || ch === "]" || ch === ")") {
      depth = Math.max(0, depth - 1);
      if (depth === 0 && ch === "}" && openBrace !== -1) {
        const block = toBlock(text, statementStart, openBrace, i);
        openBrace = -1;
        if (block) {
          blocks.push(block);
          statementStart = i + 1;
        }
      }
    } else if (ch === "\n" && depth === 0) {
      flushStatement(i);
      statementStart = i + 1;
    }

    i += 1;
  }

  if (depth === 0) {
    flushStatement(text.length);
  }

  return { blocks, attributes };
}

export function findBlocks(body: HclBody, type: string, firstLabel?: string): HclBlock[] {
  return body.blocks.filter(
    (block) => block.type === type && (firstLabel === undefined || block.labels[0] === firstLabel),
  );
}

export function findAttribute(body: HclBody, name: string): HclAttribute | undefined {
  return body.attributes.find((attr) => attr.name === name);
}

// =============================================================================
// INTERNALS
// =============================================================================

function toBlock(text: string, headerStart: number, open: number, close: number): HclBlock | null {
  const header = text.slice(headerStart, open).trim();
  const match = BLOCK_HEADER.exec(header);
  if (!match?.[1]) return null;

  const labels: string[] = [];
  for (const label of (match[2] ?? "").matchAll(BLOCK_LABEL)) {
    labels.push(label[1] ?? label[2] ?? "");
  }

  return {
    type: match[1],
    labels,
    body: text.slice(open + 1, close),
    line: lineOf(text, headerStart + leadingWhitespace(text, headerStart)),
  };
}

// Index just past the closing quote of the string opened at `start`. Quotes inside `${ }` and
// `%{ }` belong to the template expression; `$${` and `%%{` are literal. A newline ends the
// string.
export function skipQuotedString(text: string, start: number): number {
  let i = start + 1;
  let depth = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\n") {
      return i;
    }
    if (depth > 0) {
      if (ch === '"') {
        i = skipQuotedString(text, i);
        continue;
      }
      if (ch === "{") depth += 1;
      if (ch === "}") depth -= 1;
      i += 1;
      continue;
    }
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if ((ch === "$" || ch === "%") && text[i + 1] === ch && text[i + 2] === "{") {
      i += 3;
      continue;
    }
    if ((ch === "$" || ch === "%") && text[i + 1] === "{") {
      depth = 1;
      i += 2;
      continue;
    }
    if (ch === '"') {
      return i + 1;
    }
    i += 1;
  }
  return text.length;
}

function skipToLineEnd(text: string, start: number): number {
  const end = text.indexOf("\n", start);
  return end === -1 ? text.length : end;
}

// Returns the index of the newline after the closing marker, or null if this is not a heredoc.
function skipHeredoc(text: string, start: number): number | null {
  const match = HEREDOC_START.exec(text.slice(start));
  if (!match?.[1]) return null;

  const marker = match[1];
  let lineStart = start + match[0].length;
  while (lineStart < text.length) {
    const lineEnd = skipToLineEnd(text, lineStart);
    if (text.slice(lineStart, lineEnd).trim() === marker) {
      return lineEnd;
    }
    lineStart = lineEnd + 1;
  }
  return text.length;
}

function leadingWhitespace(text: string, start: number): number {
  const match = /^\s*/.exec(text.slice(start));
  return match ? match[0].length : 0;
}

function lineOf(text: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index && i < text.length; i += 1) {
    if (text[i] === "\n") line += 1;
  }
  return line;
}
