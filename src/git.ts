import { BranchNotFoundError, ReviewError, describeError } from "./errors.js";
import { filterChangedFiles, filterFileDiffs } from "./ignore.js";
import { getLogger } from "./logging.js";
import type { DiffPayload, FileDiff } from "./types.js";

export const MAX_DIFF_BYTES = 120_000;
export const MAX_FILES = 100;
export const DIFF_TRUNCATION_MARKER = "\n... [diff truncated]";

/** The slice of simple-git the collector needs. */
export interface GitReader {
  revparse(options: string[]): Promise<string>;
  diff(options: string[]): Promise<string>;
}

export interface GitPusher {
  push(remote: string, branch: string): Promise<unknown>;
}

export interface GitConfigReader {
  getConfig(key: string): Promise<{ value: string | null }>;
}

export type CollectDiffOptions = {
  ignoreFiles?: readonly string[];
  maxDiffBytes?: number;
  maxFiles?: number;
};

export async function collectDiff(
  git: GitReader,
  sourceBranch: string,
  targetBranch: string,
  options: CollectDiffOptions = {},
): Promise<DiffPayload> {
  const logger = getLogger();
  const sourceRef = await resolveRef(git, sourceBranch);
  const targetRef = await resolveRef(git, targetBranch);

  // Three dots: diff against the merge base so unrelated target commits stay out.
  const rangeSpec = `${targetRef}...${sourceRef}`;
  logger.info("Computing git diff %s", rangeSpec);

  let nameOutput: string;
  let diffText: string;
  try {
    nameOutput = await git.diff(["--name-only", rangeSpec]);
    diffText = await git.diff([rangeSpec]);
  } catch (error) {
    throw new ReviewError(`Failed to compute git diff ${rangeSpec}: ${describeError(error)}`);
  }

  const ignoreFiles = options.ignoreFiles ?? [];
  const allFiles = filterChangedFiles(splitLines(nameOutput), ignoreFiles);
  if (ignoreFiles.length > 0) {
    const kept = filterFileDiffs(parseUnifiedDiff(diffText), ignoreFiles);
    diffText = kept.map((file) => file.diff).join("\n");
    logger.debug("Ignore patterns left %d file diff(s)", kept.length);
  }

  const body = truncateDiffBody(diffText, options.maxDiffBytes ?? MAX_DIFF_BYTES);
  const files = capFileList(allFiles, options.maxFiles ?? MAX_FILES);
  if (body.truncated) {
    logger.warn("Diff exceeds %d bytes; truncated before sending to the model.", MAX_DIFF_BYTES);
  }

  return {
    sourceBranch,
    targetBranch,
    rangeSpec,
    unifiedDiff: body.text,
    changedFiles: files.files,
    truncated: body.truncated || files.truncated,
  };
}

/**
 * Keeps the longest prefix of `diff` that fits in `maxBytes` of UTF-8 without
 * splitting a character, then appends {@link DIFF_TRUNCATION_MARKER}.
 */
export function truncateDiffBody(
  diff: string,
  maxBytes: number,
): { text: string; truncated: boolean } {
  const buffer = Buffer.from(diff, "utf8");
  if (buffer.length <= maxBytes) {
    return { text: diff, truncated: false };
  }

  let cut = maxBytes;
  while (cut > 0 && (buffer[cut] & 0xc0) === 0x80) {
    cut -= 1;
  }
  return {
    text: `${buffer.subarray(0, cut).toString("utf8")}${DIFF_TRUNCATION_MARKER}`,
    truncated: true,
  };
}

export function capFileList(
  paths: readonly string[],
  maxFiles: number,
): { files: string[]; truncated: boolean } {
  if (paths.length <= maxFiles) {
    return { files: [...paths], truncated: false };
  }
  const remaining = paths.length - maxFiles;
  return {
    files: [...paths.slice(0, maxFiles), `... and ${remaining} more files`],
    truncated: true,
  };
}

export function parseUnifiedDiff(diffText: string): FileDiff[] {
  const files: FileDiff[] = [];
  let currentLines: string[] = [];
  let currentPath: string | undefined;

  const flushCurrent = () => {
    if (currentPath && currentLines.length > 0) {
      files.push({ path: currentPath, diff: currentLines.join("\n") });
    }
    currentLines = [];
  };

  for (const line of diffText.split(/\r?\n/)) {
    if (line.startsWith("diff --git ")) {
      flushCurrent();
      const parts = line.split(" ");
      if (parts.length >= 4) {
        const pathToken = parts[2];
        currentPath = pathToken.startsWith("a/") ? pathToken.slice(2) : pathToken;
      } else {
        currentPath = "unknown";
      }
      currentLines = [line];
      continue;
    }

    if (currentPath === undefined) {
      continue;
    }
    currentLines.push(line);
    if (line.startsWith("+++ b/")) {
      currentPath = line.slice("+++ b/".length).trim();
    }
  }

  flushCurrent();
  return files;
}

export function normalizeBranchName(ref: string): string {
  return ref
    .trim()
    .replace(/^refs\/heads\//, "")
    .replace(/^origin\//, "");
}

export async function pushBranch(git: GitPusher, branch: string): Promise<void> {
  const branchName = normalizeBranchName(branch);
  getLogger().info("Pushing %s to origin", branchName);
  try {
    await git.push("origin", branchName);
  } catch (error) {
    throw new ReviewError(`git push origin ${branchName} failed: ${describeError(error)}`);
  }
}

/**
 * Derives the Azure DevOps repository name from an origin URL:
 * `https://dev.azure.com/org/project/_git/repo`,
 * `git@ssh.dev.azure.com:v3/org/project/repo`, or the last path segment of
 * any other remote.
 */
export function extractRepositoryIdFromRemote(remoteUrl: string): string | undefined {
  const normalized = remoteUrl.trim();
  if (!normalized) {
    return undefined;
  }

  if (normalized.includes("/_git/")) {
    const repo = normalized.slice(normalized.lastIndexOf("/_git/") + "/_git/".length);
    return decodeSegment(repo.replace(/^\/+|\/+$/g, ""));
  }

  const ssh = /ssh\.dev\.azure\.com[:/]+v3\/[^/]+\/[^/]+\/([^/]+)$/.exec(normalized);
  if (ssh) {
    return decodeSegment(ssh[1].replace(/\.git$/, ""));
  }

  const path = normalized.replace(/\\/g, "/").replace(/\/+$/, "");
  let repo = path.slice(path.lastIndexOf("/") + 1);
  // scp-style remote with no path: git@host:repo.git
  if (repo.includes(":") && path.includes("@")) {
    repo = repo.slice(repo.lastIndexOf(":") + 1);
  }
  return decodeSegment(repo.replace(/\.git$/, ""));
}

export async function inferRepositoryId(git: GitConfigReader): Promise<string | undefined> {
  let remoteUrl: string | null;
  try {
    remoteUrl = (await git.getConfig("remote.origin.url")).value;
  } catch (error) {
    getLogger().debug("Reading remote.origin.url failed: %s", describeError(error));
    return undefined;
  }
  return remoteUrl ? extractRepositoryIdFromRemote(remoteUrl) : undefined;
}

function decodeSegment(segment: string): string | undefined {
  if (!segment) {
    return undefined;
  }
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    getLogger().debug("Keeping undecoded repository name %s: %s", segment, describeError(error));
    return segment;
  }
}

// Pipelines usually check out a detached HEAD with only remote-tracking branches.
async function resolveRef(git: GitReader, ref: string): Promise<string> {
  const trimmed = ref.trim();
  const candidates = [trimmed];
  if (!trimmed.startsWith("origin/")) {
    candidates.push(`origin/${normalizeBranchName(trimmed)}`);
  }

  for (const candidate of candidates) {
    if (await refExists(git, candidate)) {
      return candidate;
    }
  }
  throw new BranchNotFoundError(ref);
}

async function refExists(git: GitReader, ref: string): Promise<boolean> {
  try {
    await git.revparse(["--verify", `${ref}^{commit}`]);
    return true;
  } catch (error) {
    getLogger().debug("rev-parse %s failed: %s", ref, describeError(error));
    return false;
  }
}

function splitLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
