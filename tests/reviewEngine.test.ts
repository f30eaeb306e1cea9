import assert from "node:assert/strict";
import test from "node:test";

import { createSilentLogger, setLogger } from "../src/logging.js";
import { DESCRIPTION_SYSTEM_PROMPT, REVIEW_SYSTEM_PROMPT } from "../src/prompt.js";
import { describeForPR, reviewDiff } from "../src/reviewEngine.js";
import type {
  DiffPayload,
  GenerationRequest,
  GenerationResult,
  ProviderSpec,
  TextGenerator,
} from "../src/types.js";

setLogger(createSilentLogger());

const SPEC: ProviderSpec = {
  name: "claude",
  model: "claude-3-haiku",
  apiKey: "test-secret",
  apiKeyPresent: true,
  endpointUrl: "https://api.anthropic.com/v1/messages",
  timeoutMs: 1000,
};

const DIFF: DiffPayload = {
  sourceBranch: "feature/cache",
  targetBranch: "main",
  rangeSpec: "main...feature/cache",
  unifiedDiff: "diff --git a/src/cache.ts b/src/cache.ts\n+export const TTL = 60;",
  changedFiles: ["src/cache.ts"],
  truncated: false,
};

class FakeGenerator implements TextGenerator {
  readonly spec = SPEC;
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly result: GenerationResult) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push(request);
    return this.result;
  }
}

test("reviewDiff returns the review and the embedded description", async () => {
  const generator = new FakeGenerator({
    ok: true,
    text: "Cache TTL is hard-coded.\n\n## Suggested PR Description\n### Summary\nAdds a TTL.\n### Changes\n- src/cache.ts\n### Tests\n- none",
  });

  const attempt = await reviewDiff(DIFF, generator, { maxTokens: 512 });

  assert.equal(generator.requests.length, 1);
  assert.equal(generator.requests[0].systemPrompt, REVIEW_SYSTEM_PROMPT);
  assert.equal(generator.requests[0].maxTokens, 512);
  assert.ok(attempt.ok);
  assert.deepEqual(attempt.outcome.prDescription, {
    summary: "Adds a TTL.",
    changes: "- src/cache.ts",
    tests: "- none",
  });
  assert.match(attempt.outcome.reviewText, /^Cache TTL is hard-coded\./);
});

test("reviewDiff leaves the description out when the reply has none", async () => {
  const generator = new FakeGenerator({ ok: true, text: "No issues found." });

  const attempt = await reviewDiff(DIFF, generator, { maxTokens: 512 });

  assert.deepEqual(attempt, {
    ok: true,
    outcome: { reviewText: "No issues found.", prDescription: undefined },
  });
});

test("reviewDiff passes provider failures through unchanged", async () => {
  const generator = new FakeGenerator({
    ok: false,
    failure: { reason: "HTTPError", status: 401, body: "invalid x-api-key" },
  });

  const attempt = await reviewDiff(DIFF, generator, { maxTokens: 512 });

  assert.deepEqual(attempt, {
    ok: false,
    failure: { reason: "HTTPError", status: 401, body: "invalid x-api-key" },
  });
  assert.equal(generator.requests.length, 1);
});

test("describeForPR sends the title and parses the sections", async () => {
  const generator = new FakeGenerator({
    ok: true,
    text: "## Summary\nAdds a TTL.\n\n## Changes\n- src/cache.ts\n\n## Tests\n- unit tests",
  });

  const attempt = await describeForPR(DIFF, generator, { maxTokens: 256, title: "Cache TTL" });

  assert.equal(generator.requests[0].systemPrompt, DESCRIPTION_SYSTEM_PROMPT);
  assert.match(generator.requests[0].userPrompt, /^Branches: feature\/cache -> main\n\n---\n\nTitle: Cache TTL/);
  assert.deepEqual(attempt, {
    ok: true,
    description: { summary: "Adds a TTL.", changes: "- src/cache.ts", tests: "- unit tests" },
  });
});

test("describeForPR returns MissingKey without retrying", async () => {
  const generator = new FakeGenerator({
    ok: false,
    failure: { reason: "MissingKey", detail: "OPENAI_API_KEY not set" },
  });

  const attempt = await describeForPR(DIFF, generator, { maxTokens: 256 });

  assert.equal(attempt.ok, false);
  assert.equal(generator.requests.length, 1);
});
