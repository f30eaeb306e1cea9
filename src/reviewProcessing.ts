import { getLogger } from "./logging.js";
import { SUGGESTED_DESCRIPTION_HEADING } from "./prompt.js";
import type { PrDescription, ReviewOutcome } from "./types.js";

export const EMPTY_SECTION_PLACEHOLDER = "_Not provided._";
export const SUGGESTED_DESCRIPTION_MARKER = "AI Suggested Description";

type SectionName = keyof PrDescription;

// "## Summary", "**Changes**", "Tests:", "**Summary:** text on the same line".
const SECTION_HEADING_REGEX =
  /^\s*(?:#{1,6}\s*)?(?:\*\*|__)?(summary|changes|tests)(?:\*\*|__)?\s*(?::\s*(?:\*\*|__)?\s*(.*))?$/i;

const SUGGESTED_HEADING_REGEX = new RegExp(
  `^\\s*(?:#{1,6}\\s*)?(?:\\*\\*)?${SUGGESTED_DESCRIPTION_HEADING}`,
  "i",
);

/**
 * Pulls the description a review reply embeds under its "Suggested PR
 * Description" heading. Without that heading the reply is review prose only,
 * so `undefined` is returned even if a line happens to read like a section.
 */
export function extractPrDescription(text: string): PrDescription | undefined {
  const lines = splitLines(text);
  const suggestedStart = lines.findIndex((line) => SUGGESTED_HEADING_REGEX.test(line));
  if (suggestedStart < 0) {
    return undefined;
  }
  return collectSections(lines.slice(suggestedStart + 1));
}

/**
 * Best-effort reading of a description reply. Model formatting is not
 * guaranteed: missing sections come back empty, and a reply with no section
 * heading at all becomes the summary.
 */
export function parsePrDescription(text: string): PrDescription {
  return collectSections(splitLines(text)) ?? { summary: text.trim(), changes: "", tests: "" };
}

function collectSections(lines: readonly string[]): PrDescription | undefined {
  const buckets: Record<SectionName, string[]> = { summary: [], changes: [], tests: [] };
  let current: SectionName | undefined;

  for (const line of lines) {
    const match = SECTION_HEADING_REGEX.exec(line);
    if (match) {
      current = toSectionName(match[1]);
      const inline = match[2]?.trim();
      if (inline) {
        buckets[current].push(inline);
      }
      continue;
    }
    if (current) {
      buckets[current].push(line);
    }
  }

  if (!current) {
    return undefined;
  }

  return {
    summary: buckets.summary.join("\n").trim(),
    changes: buckets.changes.join("\n").trim(),
    tests: buckets.tests.join("\n").trim(),
  };
}

function splitLines(text: string): string[] {
  return text.replace(/\r\n/g, "\n").split("\n");
}

export function emptyPrDescription(): PrDescription {
  return { summary: "", changes: "", tests: "" };
}

export function formatPrDescription(description: PrDescription): string {
  const section = (heading: string, body: string) =>
    `## ${heading}\n${body.trim() || EMPTY_SECTION_PLACEHOLDER}`;
  return [
    section("Summary", description.summary),
    section("Changes", description.changes),
    section("Tests", description.tests),
  ].join("\n\n");
}

/** Appends a delimited suggestion block; the existing text is kept verbatim. */
export function appendSuggestedDescription(existing: string, suggestion: string): string {
  const block = `---\n## ${SUGGESTED_DESCRIPTION_MARKER}\n\n${suggestion.trim()}`;
  return existing.trim() ? `${existing}\n\n${block}` : block;
}

export function buildReviewComment(outcome: ReviewOutcome): string {
  return `## AI Code Review\n\n${outcome.reviewText.trim()}`;
}

export function logReview(outcome: ReviewOutcome): void {
  const logger = getLogger();
  logger.info(
    "Review received (%d characters, description %s).",
    outcome.reviewText.length,
    outcome.prDescription ? "included" : "not found",
  );
  logger.debug("Review text:\n", outcome.reviewText);
}

function toSectionName(raw: string): SectionName {
  const lowered = raw.toLowerCase();
  if (lowered === "changes") {
    return "changes";
  }
  if (lowered === "tests") {
    return "tests";
  }
  return "summary";
}
