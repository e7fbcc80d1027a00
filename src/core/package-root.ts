import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// Walk upward until we find package.json so compiled builds resolve bundled assets correctly.
export function findPackageRoot(startDir: string = moduleDir()): string {
  let current = startDir;

  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.io,
    title: "Bundled assets unavailable.",
    message: `package.json not found while resolving assets from ${startDir}.`,
    hint: "Ensure the package root with templates/ and data/ is available.",
  });
}

export function packageAssetPath(...segments: string[]): string {
  return path.join(findPackageRoot(), ...segments);
}

function moduleDir(): string {
  return fileURLToPath(new URL(".", import.meta.url));
}
