import path from "node:path";

import fse from "fs-extra";

import type { Attribute, BlockNode, SchemaSummary } from "./types.js";

export type SummaryBlockJson = {
  name: string;
  min_items: number;
  attributes: Attribute[];
  blocks: SummaryBlockJson[];
};

export type SchemaSummaryJson = {
  arguments: Attribute[];
  block_tree: SummaryBlockJson[];
};

export function toSummaryJson(summary: SchemaSummary): SchemaSummaryJson {
  return {
    arguments: summary.arguments.map(copyAttribute),
    block_tree: summary.blockTree.map(toBlockJson),
  };
}

export function summaryPath(summariesDir: string, resourceType: string): string {
  return path.join(summariesDir, `${resourceType}.json`);
}

export async function writeSchemaSummary(
  summariesDir: string,
  resourceType: string,
  summary: SchemaSummary,
): Promise<string> {
  const filePath = summaryPath(summariesDir, resourceType);
  await fse.ensureDir(summariesDir);
  await fse.writeFile(filePath, `${JSON.stringify(toSummaryJson(summary), null, 2)}\n`, "utf8");
  return filePath;
}

function toBlockJson(block: BlockNode): SummaryBlockJson {
  return {
    name: block.name,
    min_items: block.minItems,
    attributes: block.attributes.map(copyAttribute),
    blocks: block.blocks.map(toBlockJson),
  };
}

function copyAttribute(attr: Attribute): Attribute {
  return { name: attr.name, required: attr.required };
}
