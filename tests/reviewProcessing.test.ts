import assert from "node:assert/strict";
import test from "node:test";

import {
  EMPTY_SECTION_PLACEHOLDER,
  appendSuggestedDescription,
  buildReviewComment,
  extractPrDescription,
  formatPrDescription,
  parsePrDescription,
} from "../src/reviewProcessing.js";

const REVIEW_OUTPUT = `## Review
- The retry loop in src/api/client.ts never resets its counter.
- Summary of risk: medium.

## Suggested PR Description
### Summary
Adds retries to the API client.

### Changes
- src/api/client.ts: retry on 503
- src/api/client.test.ts: new cases

### Tests
- npm test
`;

test("extractPrDescription reads the sections after the suggested heading", () => {
  assert.deepEqual(extractPrDescription(REVIEW_OUTPUT), {
    summary: "Adds retries to the API client.",
    changes: "- src/api/client.ts: retry on 503\n- src/api/client.test.ts: new cases",
    tests: "- npm test",
  });
});

test("parsePrDescription accepts bold headings with inline text", () => {
  const text = "**Summary:** Fixes the login redirect.\n**Changes**\n- src/auth.ts\nTests: none";
  assert.deepEqual(parsePrDescription(text), {
    summary: "Fixes the login redirect.",
    changes: "- src/auth.ts",
    tests: "none",
  });
});

test("parsePrDescription leaves missing sections empty", () => {
  assert.deepEqual(parsePrDescription("## Summary\nOnly a summary."), {
    summary: "Only a summary.",
    changes: "",
    tests: "",
  });
});

test("extractPrDescription returns undefined without section headings", () => {
  assert.equal(extractPrDescription("Looks fine to me."), undefined);
});

test("extractPrDescription ignores section-like review lines without the suggested heading", () => {
  assert.equal(
    extractPrDescription("Findings:\n- src/a.ts: off-by-one\nTests: none added for the parser"),
    undefined,
  );
  assert.equal(extractPrDescription("## Summary\nMostly fine.\n\n## Issues\n- src/a.ts leaks"), undefined);
});

test("extractPrDescription returns undefined when the suggested heading has no sections", () => {
  assert.equal(extractPrDescription("Looks fine.\n\n## Suggested PR Description\nSee above."), undefined);
});

test("parsePrDescription falls back to the whole text as summary", () => {
  assert.deepEqual(parsePrDescription("  Refactors the cache.  "), {
    summary: "Refactors the cache.",
    changes: "",
    tests: "",
  });
});

test("formatPrDescription renders three sections with placeholders", () => {
  assert.equal(
    formatPrDescription({ summary: "Adds login.", changes: "", tests: "- unit tests" }),
    `## Summary\nAdds login.\n\n## Changes\n${EMPTY_SECTION_PLACEHOLDER}\n\n## Tests\n- unit tests`,
  );
});

test("appendSuggestedDescription keeps the existing text verbatim", () => {
  assert.equal(
    appendSuggestedDescription("Original body\n", "  ## Summary\nNew  "),
    "Original body\n\n\n---\n## AI Suggested Description\n\n## Summary\nNew",
  );
});

test("appendSuggestedDescription returns only the block for an empty description", () => {
  assert.equal(
    appendSuggestedDescription("  ", "Suggestion"),
    "---\n## AI Suggested Description\n\nSuggestion",
  );
});

test("buildReviewComment adds the review heading", () => {
  assert.equal(
    buildReviewComment({ reviewText: "\nAll good.\n" }),
    "## AI Code Review\n\nAll good.",
  );
});
