export type Attribute = {
  name: string;
  required: boolean;
};

export type BlockNode = {
  name: string;
  minItems: number;
  attributes: Attribute[];
  blocks: BlockNode[];
};

export type SchemaSummary = {
  arguments: Attribute[];
  blockTree: BlockNode[];
};

export type ProviderIdentity = {
  supplier: string;
  name: string;
  version: string;
};

export function providerSource(provider: Pick<ProviderIdentity, "supplier" | "name">): string {
  return `registry.terraform.io/${provider.supplier}/${provider.name}`;
}
