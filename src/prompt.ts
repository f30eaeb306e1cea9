import type { DiffPayload, GenerationRequest } from "./types.js";

export const SUGGESTED_DESCRIPTION_HEADING = "Suggested PR Description";

export const REVIEW_SYSTEM_PROMPT = [
  "You are a senior software reviewer.",
  "Review the diff and produce:",
  "1) A concise code review covering risks, bugs, regressions, and missing tests.",
  `2) A section headed "## ${SUGGESTED_DESCRIPTION_HEADING}" containing the subsections "### Summary", "### Changes", and "### Tests".`,
  "3) Output in Markdown with clear sections and bullet points.",
  "Be factual and reference files when possible. If unsure, say so.",
].join("\n");

export const DESCRIPTION_SYSTEM_PROMPT = [
  "You write pull request descriptions for reviewers.",
  'Respond in Markdown with exactly three sections, headed "## Summary", "## Changes", and "## Tests".',
  "Summary: one or two sentences on the purpose of the change.",
  "Changes: bullet points grouped by area, referencing files.",
  "Tests: how the change was or should be verified; say so plainly if no tests changed.",
  "Do not add any other sections.",
].join("\n");

export function buildDiffContext(diff: DiffPayload): string {
  const sections: string[] = [`Git range: ${diff.rangeSpec}`];

  const files = diff.changedFiles.length > 0 ? diff.changedFiles.join("\n") : "(none)";
  sections.push(`Files changed:\n${files}`);

  if (diff.truncated) {
    sections.push(
      "Note: the diff or file list was truncated to fit the request; do not speculate about the omitted part.",
    );
  }

  sections.push(`Diff:\n${diff.unifiedDiff}`);
  return sections.join("\n\n");
}

export function buildReviewRequest(diff: DiffPayload, maxTokens: number): GenerationRequest {
  return {
    systemPrompt: REVIEW_SYSTEM_PROMPT,
    userPrompt: buildDiffContext(diff),
    maxTokens,
  };
}

export function buildDescriptionRequest(
  diff: DiffPayload,
  maxTokens: number,
  title?: string,
): GenerationRequest {
  const sections: string[] = [
    `Branches: ${diff.sourceBranch} -> ${diff.targetBranch}`,
  ];
  const trimmedTitle = title?.trim();
  if (trimmedTitle) {
    sections.push(`Title: ${trimmedTitle}`);
  }
  sections.push(buildDiffContext(diff));

  return {
    systemPrompt: DESCRIPTION_SYSTEM_PROMPT,
    userPrompt: sections.join("\n\n---\n\n"),
    maxTokens,
  };
}
