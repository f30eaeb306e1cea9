import { z } from "zod";

import type { CliCommand } from "./cli.js";
import { ReviewError } from "./errors.js";
import type { ProviderSettings } from "./providers.js";
import type { PRContext } from "./types.js";
import { firstNonEmpty, maskSecret } from "./utils.js";

export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";
export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_TIMEOUT_SECONDS = 120;

export type Environment = Readonly<Record<string, string | undefined>>;

export type WorkflowMode = CliCommand["mode"];

export type AppConfig = Readonly<{
  mode: WorkflowMode;
  legacy: boolean;
  sourceBranch: string;
  targetBranch: string;
  title?: string;
  push: boolean;
  updateDescription: boolean;
  dryRun: boolean;
  debug: boolean;
  ignoreFiles: readonly string[];
  model: string;
  explicitProvider?: string;
  maxTokens: number;
  providerSettings: Readonly<ProviderSettings>;
  prContext: Readonly<PRContext>;
}>;

const LimitsSchema = z.object({
  maxTokens: z
    .number({ error: "AI_MAX_TOKENS must be a number" })
    .int("AI_MAX_TOKENS must be an integer")
    .positive("AI_MAX_TOKENS must be positive"),
  timeoutSeconds: z
    .number({ error: "AI_TIMEOUT_SECONDS must be a number" })
    .int("AI_TIMEOUT_SECONDS must be an integer")
    .positive("AI_TIMEOUT_SECONDS must be positive")
    .max(3600, "AI_TIMEOUT_SECONDS cannot exceed 3600"),
});

function envInt(env: Environment, name: string): number | undefined {
  const value = env[name]?.trim();
  if (!value) {
    return undefined;
  }
  // NaN for non-numeric text; the schema reports it.
  return Number(value);
}

export function parseBooleanFlag(value: string | undefined): boolean {
  return ["1", "true", "yes"].includes((value ?? "").trim().toLowerCase());
}

/**
 * Builds the run configuration. Precedence for every value is
 * CLI flag > explicit variable > pipeline-provided variable > default.
 */
export function loadConfig(command: CliCommand, env: Environment): AppConfig {
  const limits = LimitsSchema.safeParse({
    maxTokens: command.maxTokens ?? envInt(env, "AI_MAX_TOKENS") ?? DEFAULT_MAX_TOKENS,
    timeoutSeconds:
      command.timeoutSeconds ?? envInt(env, "AI_TIMEOUT_SECONDS") ?? DEFAULT_TIMEOUT_SECONDS,
  });
  if (!limits.success) {
    const message = limits.error.issues.map((issue) => issue.message).join("; ");
    throw new ReviewError(`Invalid configuration: ${message}`);
  }

  const pipelinePrId = envInt(env, "SYSTEM_PULLREQUEST_PULLREQUESTID");
  const prId =
    command.mode === "review"
      ? command.prId ?? (pipelinePrId !== undefined && pipelinePrId > 0 ? pipelinePrId : undefined)
      : undefined;

  const prContext: PRContext = Object.freeze({
    orgUrl:
      command.organization ??
      firstNonEmpty(env.AZURE_DEVOPS_ORG_URL, env.AZDO_ORG_URL, env.SYSTEM_COLLECTIONURI),
    project:
      command.project ??
      firstNonEmpty(env.AZURE_DEVOPS_PROJECT, env.AZDO_PROJECT, env.SYSTEM_TEAMPROJECT),
    repositoryId: command.repositoryId ?? firstNonEmpty(env.AZDO_REPO_ID, env.BUILD_REPOSITORY_ID),
    token:
      command.azureToken ??
      firstNonEmpty(
        env.AZURE_DEVOPS_PAT,
        env.AZDO_TOKEN,
        env.SYSTEM_ACCESSTOKEN,
        env.SYSTEM_ACCESS_TOKEN,
      ),
    prId,
  });

  const providerSettings: ProviderSettings = Object.freeze({
    anthropicApiKey: firstNonEmpty(env.ANTHROPIC_API_KEY),
    claudeApiKey: firstNonEmpty(env.CLAUDE_API_KEY),
    openaiApiKey: firstNonEmpty(env.OPENAI_API_KEY),
    openaiApiUrl: firstNonEmpty(env.OPENAI_API_URL),
    timeoutMs: limits.data.timeoutSeconds * 1000,
  });

  // The legacy form has no --update-description flag; the variable decides.
  const updateDescription = command.legacy
    ? parseBooleanFlag(env.AI_UPDATE_PR_DESCRIPTION)
    : command.updateDescription;
  const dryRun = command.dryRun || (command.legacy && parseBooleanFlag(env.AI_DRY_RUN));

  const config: AppConfig = {
    mode: command.mode,
    legacy: command.legacy,
    sourceBranch: command.source,
    targetBranch: command.target,
    title: command.title,
    push: command.push,
    updateDescription,
    dryRun,
    debug: command.debug,
    ignoreFiles: Object.freeze([...command.ignoreFiles]),
    model: command.model ?? firstNonEmpty(env.AI_MODEL) ?? DEFAULT_MODEL,
    explicitProvider: command.provider ?? firstNonEmpty(env.AI_PROVIDER),
    maxTokens: limits.data.maxTokens,
    providerSettings,
    prContext,
  };
  return Object.freeze(config);
}

export function redactConfig(config: AppConfig): Record<string, unknown> {
  const { providerSettings, prContext, ...rest } = config;
  return {
    ...rest,
    providerSettings: {
      ...providerSettings,
      anthropicApiKey: maskSecret(providerSettings.anthropicApiKey),
      claudeApiKey: maskSecret(providerSettings.claudeApiKey),
      openaiApiKey: maskSecret(providerSettings.openaiApiKey),
    },
    prContext: { ...prContext, token: maskSecret(prContext.token) },
  };
}
