import type { Attribute, BlockNode, SchemaSummary } from "./types.js";

const INDENT = "  ";
const EMPTY_SECTION = "- (none)";

// Shared context for every instruction payload. Render once per run and reuse the string.
export function renderSchemaContext(summary: SchemaSummary): string {
  const argumentLines = summary.arguments.map((attr) => formatAttribute(attr, 0));
  const blockLines = formatBlockTree(summary.blockTree, 0);

  return [
    "Arguments:",
    ...(argumentLines.length > 0 ? argumentLines : [EMPTY_SECTION]),
    "",
    "Nested Block Tree:",
    ...(blockLines.length > 0 ? blockLines : [EMPTY_SECTION]),
  ].join("\n");
}

export function formatBlockTree(blocks: BlockNode[], depth: number): string[] {
  const lines: string[] = [];
  for (const block of blocks) {
    lines.push(`${INDENT.repeat(depth)}- ${block.name} (min_items=${block.minItems})`);
    for (const attr of block.attributes) {
      lines.push(formatAttribute(attr, depth + 1));
    }
    lines.push(...formatBlockTree(block.blocks, depth + 1));
  }
  return lines;
}

function formatAttribute(attr: Attribute, depth: number): string {
  const tag = attr.required ? "required" : "optional";
  return `${INDENT.repeat(depth)}- ${attr.name} (${tag})`;
}
