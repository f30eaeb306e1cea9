import micromatch from "micromatch";

import type { FileDiff } from "./types.js";

function normalizeFilePath(filePath: string): string {
  return filePath.replace(/\\/g, "/").replace(/^\.\//, "");
}

export function shouldIgnoreFile(
  filePath: string,
  patterns: readonly string[] | undefined,
): boolean {
  if (!patterns || patterns.length === 0) {
    return false;
  }
  const normalized = normalizeFilePath(filePath);
  return micromatch.isMatch(normalized, [...patterns], {
    dot: true,
  });
}

export function filterChangedFiles(
  paths: readonly string[],
  patterns: readonly string[] | undefined,
): string[] {
  if (!patterns || patterns.length === 0) {
    return [...paths];
  }
  return paths.filter((filePath) => !shouldIgnoreFile(filePath, patterns));
}

export function filterFileDiffs(
  fileDiffs: readonly FileDiff[],
  patterns: readonly string[] | undefined,
): FileDiff[] {
  if (!patterns || patterns.length === 0) {
    return [...fileDiffs];
  }
  return fileDiffs.filter((fileDiff) => !shouldIgnoreFile(fileDiff.path, patterns));
}
