import assert from "node:assert/strict";
import test from "node:test";

import {
  DESCRIPTION_SYSTEM_PROMPT,
  REVIEW_SYSTEM_PROMPT,
  buildDescriptionRequest,
  buildDiffContext,
  buildReviewRequest,
} from "../src/prompt.js";
import type { DiffPayload } from "../src/types.js";

const DIFF: DiffPayload = {
  sourceBranch: "feature/use-timeout",
  targetBranch: "main",
  rangeSpec: "origin/main...feature/use-timeout",
  unifiedDiff: "diff --git a/src/hooks/useTimeout.ts b/src/hooks/useTimeout.ts\n+const ids = new Set();",
  changedFiles: ["src/hooks/useTimeout.ts", "src/hooks/index.ts"],
  truncated: false,
};

test("buildDiffContext lists the range, files and diff", () => {
  assert.equal(
    buildDiffContext(DIFF),
    [
      "Git range: origin/main...feature/use-timeout",
      "Files changed:\nsrc/hooks/useTimeout.ts\nsrc/hooks/index.ts",
      `Diff:\n${DIFF.unifiedDiff}`,
    ].join("\n\n"),
  );
});

test("buildDiffContext notes truncation and an empty file list", () => {
  const context = buildDiffContext({ ...DIFF, changedFiles: [], truncated: true });
  const sections = context.split("\n\n");
  assert.equal(sections[1], "Files changed:\n(none)");
  assert.match(sections[2], /^Note: the diff or file list was truncated/);
});

test("buildReviewRequest asks for a suggested description section", () => {
  const request = buildReviewRequest(DIFF, 2048);
  assert.equal(request.systemPrompt, REVIEW_SYSTEM_PROMPT);
  assert.match(request.systemPrompt, /## Suggested PR Description/);
  assert.equal(request.userPrompt, buildDiffContext(DIFF));
  assert.equal(request.maxTokens, 2048);
});

test("buildDescriptionRequest prefixes branches and title", () => {
  const request = buildDescriptionRequest(DIFF, 1024, "  Add timeout hook ");
  const sections = request.userPrompt.split("\n\n---\n\n");
  assert.equal(request.systemPrompt, DESCRIPTION_SYSTEM_PROMPT);
  assert.deepEqual(sections, [
    "Branches: feature/use-timeout -> main",
    "Title: Add timeout hook",
    buildDiffContext(DIFF),
  ]);
});

test("buildDescriptionRequest leaves out a blank title", () => {
  const sections = buildDescriptionRequest(DIFF, 1024, "   ").userPrompt.split("\n\n---\n\n");
  assert.equal(sections.length, 2);
  assert.equal(sections[0], "Branches: feature/use-timeout -> main");
});
