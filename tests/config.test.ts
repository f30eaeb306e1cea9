import assert from "node:assert/strict";
import test from "node:test";

import type { CliCommand } from "../src/cli.js";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  type Environment,
  loadConfig,
  parseBooleanFlag,
  redactConfig,
} from "../src/config.js";
import { ReviewError } from "../src/errors.js";

const PIPELINE_ENV: Environment = {
  SYSTEM_COLLECTIONURI: "https://dev.azure.com/example-org/",
  SYSTEM_TEAMPROJECT: "Widgets",
  BUILD_REPOSITORY_ID: "repo-123",
  SYSTEM_ACCESSTOKEN: "test-token",
  SYSTEM_PULLREQUEST_PULLREQUESTID: "42",
  ANTHROPIC_API_KEY: "test-secret",
};

function reviewCommand(overrides: Partial<CliCommand> = {}): CliCommand {
  return {
    mode: "review",
    legacy: false,
    source: "feature/login",
    target: "main",
    updateDescription: false,
    push: false,
    ignoreFiles: [],
    dryRun: false,
    debug: false,
    ...overrides,
  };
}

test("loadConfig applies defaults", () => {
  const config = loadConfig(reviewCommand(), {});

  assert.equal(config.model, DEFAULT_MODEL);
  assert.equal(config.maxTokens, DEFAULT_MAX_TOKENS);
  assert.equal(config.providerSettings.timeoutMs, 120_000);
  assert.equal(config.explicitProvider, undefined);
  assert.deepEqual(config.prContext, {
    orgUrl: undefined,
    project: undefined,
    repositoryId: undefined,
    token: undefined,
    prId: undefined,
  });
  assert.ok(Object.isFrozen(config));
});

test("loadConfig reads the Azure Pipelines variables", () => {
  const config = loadConfig(reviewCommand(), PIPELINE_ENV);

  assert.deepEqual(config.prContext, {
    orgUrl: "https://dev.azure.com/example-org/",
    project: "Widgets",
    repositoryId: "repo-123",
    token: "test-token",
    prId: 42,
  });
  assert.equal(config.providerSettings.anthropicApiKey, "test-secret");
});

test("loadConfig prefers CLI flags over explicit and pipeline variables", () => {
  const config = loadConfig(
    reviewCommand({ organization: "other-org", azureToken: "cli-token", prId: 7, model: "gpt-4o" }),
    {
      ...PIPELINE_ENV,
      AZURE_DEVOPS_ORG_URL: "https://dev.azure.com/env-org",
      AZURE_DEVOPS_PAT: "pat-token",
      AI_MODEL: "claude-3-haiku",
    },
  );

  assert.equal(config.prContext.orgUrl, "other-org");
  assert.equal(config.prContext.token, "cli-token");
  assert.equal(config.prContext.prId, 7);
  assert.equal(config.model, "gpt-4o");
});

test("loadConfig prefers explicit variables over pipeline ones", () => {
  const config = loadConfig(reviewCommand(), {
    ...PIPELINE_ENV,
    AZURE_DEVOPS_PROJECT: "Gadgets",
    AZURE_DEVOPS_PAT: "pat-token",
    AI_MODEL: "nvidia/llama-3.1-70b",
    AI_PROVIDER: "nvidia",
  });

  assert.equal(config.prContext.project, "Gadgets");
  assert.equal(config.prContext.token, "pat-token");
  assert.equal(config.model, "nvidia/llama-3.1-70b");
  assert.equal(config.explicitProvider, "nvidia");
});

test("loadConfig reads the AZDO_* variables between explicit and pipeline ones", () => {
  const config = loadConfig(reviewCommand(), {
    ...PIPELINE_ENV,
    AZDO_ORG_URL: "other-org",
    AZDO_PROJECT: "Gizmos",
    AZDO_REPO_ID: "repo-456",
    AZDO_TOKEN: "azdo-token",
    AZURE_DEVOPS_PROJECT: "Gadgets",
  });

  assert.equal(config.prContext.orgUrl, "other-org");
  assert.equal(config.prContext.project, "Gadgets");
  assert.equal(config.prContext.repositoryId, "repo-456");
  assert.equal(config.prContext.token, "azdo-token");
});

test("loadConfig ignores a zero pipeline PR id and never sets one for create", () => {
  assert.equal(
    loadConfig(reviewCommand(), { ...PIPELINE_ENV, SYSTEM_PULLREQUEST_PULLREQUESTID: "0" }).prContext.prId,
    undefined,
  );
  assert.equal(loadConfig(reviewCommand({ mode: "create" }), PIPELINE_ENV).prContext.prId, undefined);
});

test("loadConfig takes the description flag from the environment for the legacy form", () => {
  const env = { ...PIPELINE_ENV, AI_UPDATE_PR_DESCRIPTION: "True" };
  assert.equal(loadConfig(reviewCommand({ legacy: true }), env).updateDescription, true);
  assert.equal(loadConfig(reviewCommand(), env).updateDescription, false);
  assert.equal(loadConfig(reviewCommand({ updateDescription: true }), {}).updateDescription, true);
});

test("loadConfig takes dry-run from AI_DRY_RUN for the legacy form only", () => {
  const env = { ...PIPELINE_ENV, AI_DRY_RUN: "yes" };
  assert.equal(loadConfig(reviewCommand({ legacy: true }), env).dryRun, true);
  assert.equal(loadConfig(reviewCommand(), env).dryRun, false);
  assert.equal(loadConfig(reviewCommand({ legacy: true }), PIPELINE_ENV).dryRun, false);
});

test("loadConfig reads limits from the environment", () => {
  const config = loadConfig(reviewCommand(), { AI_MAX_TOKENS: "2048", AI_TIMEOUT_SECONDS: "30" });
  assert.equal(config.maxTokens, 2048);
  assert.equal(config.providerSettings.timeoutMs, 30_000);
});

test("loadConfig rejects invalid limits", () => {
  assert.throws(
    () => loadConfig(reviewCommand(), { AI_MAX_TOKENS: "-5" }),
    (error: unknown) =>
      error instanceof ReviewError &&
      error.message === "Invalid configuration: AI_MAX_TOKENS must be positive",
  );
  assert.throws(
    () => loadConfig(reviewCommand(), { AI_TIMEOUT_SECONDS: "7200" }),
    (error: unknown) =>
      error instanceof ReviewError &&
      error.message === "Invalid configuration: AI_TIMEOUT_SECONDS cannot exceed 3600",
  );
});

test("loadConfig rejects non-numeric limits", () => {
  assert.throws(
    () => loadConfig(reviewCommand(), { AI_MAX_TOKENS: "abc" }),
    (error: unknown) =>
      error instanceof ReviewError &&
      error.message === "Invalid configuration: AI_MAX_TOKENS must be a number",
  );
  assert.throws(
    () => loadConfig(reviewCommand(), { AI_TIMEOUT_SECONDS: "2m" }),
    (error: unknown) =>
      error instanceof ReviewError &&
      error.message === "Invalid configuration: AI_TIMEOUT_SECONDS must be a number",
  );
});

test("parseBooleanFlag accepts 1, true and yes", () => {
  assert.equal(parseBooleanFlag("1"), true);
  assert.equal(parseBooleanFlag(" YES "), true);
  assert.equal(parseBooleanFlag("true"), true);
  assert.equal(parseBooleanFlag("false"), false);
  assert.equal(parseBooleanFlag(undefined), false);
});

test("redactConfig masks keys and tokens", () => {
  const redacted = redactConfig(loadConfig(reviewCommand(), PIPELINE_ENV));
  assert.deepEqual(redacted.providerSettings, {
    anthropicApiKey: "te***et",
    claudeApiKey: undefined,
    openaiApiKey: undefined,
    openaiApiUrl: undefined,
    timeoutMs: 120_000,
  });
  assert.deepEqual(redacted.prContext, {
    orgUrl: "https://dev.azure.com/example-org/",
    project: "Widgets",
    repositoryId: "repo-123",
    token: "te***en",
    prId: 42,
  });
});
