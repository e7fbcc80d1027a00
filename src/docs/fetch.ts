/*
Purpose: supply the provider's resource documentation page as generation context.
Assumptions: docs are optional; a missing page only degrades variable descriptions.
Usage: const docs = await loadResourceDocs({ provider, resourceType, docsDir, fetchMissing: true }).
*/

import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";
import { logRunEvent, type JsonlLogger } from "../core/logger.js";
import type { ProviderIdentity } from "../schema/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export type LoadResourceDocsInput = {
  provider: ProviderIdentity;
  resourceType: string;
  docsDir: string;
  fetchMissing: boolean;
  fetch?: FetchLike;
  logger?: JsonlLogger;
  signal?: AbortSignal;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resourceDocShortName(providerName: string, resourceType: string): string {
  const prefix = `${providerName}_`;
  return resourceType.startsWith(prefix) ? resourceType.slice(prefix.length) : resourceType;
}

export function resourceDocUrl(provider: ProviderIdentity, resourceType: string): string {
  const short = resourceDocShortName(provider.name, resourceType);
  return (
    `https://raw.githubusercontent.com/${provider.supplier}/terraform-provider-${provider.name}` +
    `/v${provider.version}/website/docs/r/${short}.html.markdown`
  );
}

export function resourceDocPath(docsDir: string, providerName: string, resourceType: string): string {
  return path.join(docsDir, `${resourceDocShortName(providerName, resourceType)}.html.markdown`);
}

export async function loadResourceDocs(input: LoadResourceDocsInput): Promise<string | null> {
  const cachePath = resourceDocPath(input.docsDir, input.provider.name, input.resourceType);

  if (await fse.pathExists(cachePath)) {
    const cached = await fse.readFile(cachePath, "utf8");
    if (cached.trim().length > 0) return cached;
  }

  if (!input.fetchMissing) {
    reportMissing(input, { reason: "not cached and fetching is disabled", path: cachePath });
    return null;
  }

  const url = resourceDocUrl(input.provider, input.resourceType);
  const fetchImpl = input.fetch ?? fetch;

  try {
    const response = await fetchImpl(url, { signal: input.signal });
    if (!response.ok) {
      reportMissing(input, { reason: `HTTP ${response.status}`, url });
      return null;
    }

    const text = await response.text();
    if (text.trim().length === 0) {
      reportMissing(input, { reason: "empty document", url });
      return null;
    }

    await fse.ensureDir(input.docsDir);
    await fse.writeFile(cachePath, text, "utf8");
    return text;
  } catch (err) {
    if (input.signal?.aborted) throw err;
    reportMissing(input, { reason: formatErrorMessage(err), url });
    return null;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function reportMissing(input: LoadResourceDocsInput, payload: Record<string, string>): void {
  if (!input.logger) return;
  logRunEvent(input.logger, "docs.missing", { resource_type: input.resourceType, ...payload });
}
