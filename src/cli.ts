import process from "node:process";

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { z } from "zod";

import { ReviewError } from "./errors.js";
import { maskSecret } from "./utils.js";

const branchSchema = (label: string) => z.string().trim().min(1, `${label} cannot be empty`);

export const ArgsSchema = z.object({
  mode: z.enum(["review", "create"]),
  legacy: z.boolean(),
  source: branchSchema("source branch"),
  target: branchSchema("target branch"),
  prId: z.coerce
    .number()
    .int("pr-id must be an integer")
    .positive("pr-id must be positive")
    .optional(),
  updateDescription: z.boolean().default(false),
  title: z.string().trim().min(1, "title cannot be empty").optional(),
  push: z.boolean().default(false),
  model: z.string().trim().min(1, "model cannot be empty").optional(),
  provider: z.string().trim().min(1, "provider cannot be empty").optional(),
  organization: z.string().trim().min(1, "organization cannot be empty").optional(),
  project: z.string().trim().min(1, "project cannot be empty").optional(),
  repositoryId: z.string().trim().min(1, "repository-id cannot be empty").optional(),
  azureToken: z.string().trim().min(1, "azure-token cannot be empty").optional(),
  maxTokens: z.coerce
    .number()
    .int("max-tokens must be an integer")
    .positive("max-tokens must be positive")
    .optional(),
  timeoutSeconds: z.coerce
    .number()
    .int("timeout-seconds must be an integer")
    .positive("timeout-seconds must be positive")
    .max(3600, "timeout-seconds cannot exceed 3600")
    .optional(),
  ignoreFiles: z.array(z.string().trim().min(1)).optional().default([]),
  dryRun: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type CliCommand = z.infer<typeof ArgsSchema>;

/**
 * Parses `review`, `create` and the legacy `<source> <target>` form.
 * Returns `undefined` when yargs handled the invocation itself (`--help`).
 */
export function parseCommand(argv: string[] = hideBin(process.argv)): CliCommand | undefined {
  const invocation: { args?: Record<string, unknown> } = {};

  yargs(argv)
    .scriptName("ai-pr-review")
    .usage("$0 <command> <source> <target> [options]")
    .option("model", {
      type: "string",
      description: "Model name (defaults to AI_MODEL or claude-sonnet-4-5-20250929).",
    })
    .option("provider", {
      type: "string",
      description:
        "Force a provider: claude, anthropic, openai, chatgpt, nvidia (defaults to AI_PROVIDER, else inferred from the model).",
    })
    .option("organization", {
      type: "string",
      description:
        "Azure DevOps organization URL (defaults to AZURE_DEVOPS_ORG_URL or SYSTEM_COLLECTIONURI).",
    })
    .option("project", {
      type: "string",
      description: "Azure DevOps project (defaults to AZURE_DEVOPS_PROJECT or SYSTEM_TEAMPROJECT).",
    })
    .option("repository-id", {
      type: "string",
      description: "Azure DevOps repository ID (defaults to BUILD_REPOSITORY_ID).",
    })
    .option("azure-token", {
      type: "string",
      description:
        "Azure DevOps token (defaults to AZURE_DEVOPS_PAT, SYSTEM_ACCESSTOKEN or SYSTEM_ACCESS_TOKEN).",
    })
    .option("max-tokens", {
      type: "number",
      description: "Maximum tokens in the model reply (defaults to AI_MAX_TOKENS or 4096).",
    })
    .option("timeout-seconds", {
      type: "number",
      description: "Provider request timeout (defaults to AI_TIMEOUT_SECONDS or 120).",
    })
    .option("ignore-files", {
      type: "string",
      array: true,
      description: "Glob patterns for files to leave out of the diff (repeatable).",
      default: [],
    })
    .option("dry-run", {
      type: "boolean",
      description: "Never call Azure DevOps; print results only.",
      default: false,
    })
    .option("debug", {
      type: "boolean",
      description: "Enable verbose logging.",
      default: false,
    })
    .command(
      "review <source> <target>",
      "Review the diff between two branches and post it to the pull request.",
      (command) =>
        command
          .positional("source", { type: "string", demandOption: true })
          .positional("target", { type: "string", demandOption: true })
          .option("pr-id", {
            type: "number",
            description: "Pull request ID (defaults to SYSTEM_PULLREQUEST_PULLREQUESTID).",
          })
          .option("update-description", {
            type: "boolean",
            description: "Append the AI suggested description to the pull request description.",
            default: false,
          }),
      (args) => {
        invocation.args = { ...args, mode: "review", legacy: false };
      },
    )
    .command(
      "create <source> <target>",
      "Generate a description and open a pull request from source into target.",
      (command) =>
        command
          .positional("source", { type: "string", demandOption: true })
          .positional("target", { type: "string", demandOption: true })
          .option("title", {
            type: "string",
            description: 'Pull request title (defaults to "Merge <source> into <target>").',
          })
          .option("push", {
            type: "boolean",
            description: "Push the source branch to origin before creating the pull request.",
            default: false,
          }),
      (args) => {
        invocation.args = { ...args, mode: "create", legacy: false };
      },
    )
    .command(
      "$0 <source> <target>",
      "Legacy form of review; AI_UPDATE_PR_DESCRIPTION controls the description update.",
      (command) =>
        command
          .positional("source", { type: "string", demandOption: true })
          .positional("target", { type: "string", demandOption: true })
          .option("pr-id", {
            type: "number",
            description: "Pull request ID (defaults to SYSTEM_PULLREQUEST_PULLREQUESTID).",
          }),
      (args) => {
        invocation.args = { ...args, mode: "review", legacy: true };
      },
    )
    .strict()
    .version(false)
    .help()
    .exitProcess(false)
    .fail((message, error) => {
      throw new ReviewError(`Invalid CLI arguments: ${message || error?.message || "unknown error"}`);
    })
    .parseSync();

  if (!invocation.args) {
    return undefined;
  }

  const parsed = ArgsSchema.safeParse(invocation.args);
  if (parsed.success) {
    return parsed.data;
  }

  const message = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  throw new ReviewError(`Invalid CLI arguments: ${message}`);
}

export function redactCommand(command: CliCommand): Record<string, unknown> {
  const { azureToken, ...rest } = command;
  return {
    ...rest,
    azureToken: maskSecret(azureToken),
  };
}
