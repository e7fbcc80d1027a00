import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach } from "vitest";

const temporaryDirectories: string[] = [];

export function registerTempDirCleanup(): void {
  afterEach(() => {
    for (const directoryPath of temporaryDirectories) {
      fs.rmSync(directoryPath, { recursive: true, force: true });
    }
    temporaryDirectories.length = 0;
  });
}

export function makeTempDir(prefix: string): string {
  const directoryPath = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  temporaryDirectories.push(directoryPath);
  return directoryPath;
}

export function readJsonl(filePath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(filePath, "utf8")
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}
