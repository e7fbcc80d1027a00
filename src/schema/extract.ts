import { ResourceNotFoundError, SchemaDocumentError } from "../core/errors.js";

import type { SchemaBlock, SchemaDocument } from "./document.js";
import {
  providerSource,
  type Attribute,
  type BlockNode,
  type ProviderIdentity,
  type SchemaSummary,
} from "./types.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function extractSchemaSummary(
  document: SchemaDocument,
  provider: Pick<ProviderIdentity, "supplier" | "name">,
  resourceType: string,
): SchemaSummary {
  const source = providerSource(provider);
  const providerSchema = document.provider_schemas[source];
  if (!providerSchema) {
    const known = Object.keys(document.provider_schemas);
    const knownText = known.length > 0 ? known.join(", ") : "none";
    throw new SchemaDocumentError(
      `Provider ${source} not present in schema document (found: ${knownText}).`,
    );
  }

  const resource = providerSchema.resource_schemas[resourceType];
  if (!resource) {
    throw new ResourceNotFoundError({ resourceType, providerSource: source });
  }

  const root = parseBlock(resource.block);
  return { arguments: root.attributes, blockTree: root.blocks };
}

// A field the provider computes and the user cannot set never becomes an input.
export function isUserSettable(attr: { required?: boolean; computed?: boolean }): boolean {
  return (attr.required ?? false) || !(attr.computed ?? false);
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseBlock(block: SchemaBlock): { attributes: Attribute[]; blocks: BlockNode[] } {
  const attributes: Attribute[] = [];
  for (const [name, attr] of Object.entries(block.attributes ?? {})) {
    if (!isUserSettable(attr)) continue;
    attributes.push({ name, required: attr.required ?? false });
  }

  const blocks: BlockNode[] = [];
  for (const [name, blockType] of Object.entries(block.block_types ?? {})) {
    const child = parseBlock(blockType.block);
    blocks.push({
      name,
      minItems: blockType.min_items ?? 0,
      attributes: child.attributes,
      blocks: child.blocks,
    });
  }

  return { attributes, blocks };
}
