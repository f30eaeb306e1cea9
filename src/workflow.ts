import {
  MAX_PR_DESCRIPTION_LENGTH,
  type RemoteContext,
  type RemotePRGateway,
  buildCommentThread,
  buildPullRequestRequest,
  missingContextFields,
  pullRequestApiUrl,
  toRemoteContext,
} from "./azure.js";
import type { AppConfig, WorkflowMode } from "./config.js";
import { ReviewError, UnknownProviderError } from "./errors.js";
import { normalizeBranchName } from "./git.js";
import { getLogger } from "./logging.js";
import { describeFailure, resolveProvider } from "./providers.js";
import { describeForPR, reviewDiff } from "./reviewEngine.js";
import {
  appendSuggestedDescription,
  buildReviewComment,
  emptyPrDescription,
  formatPrDescription,
  logReview,
} from "./reviewProcessing.js";
import type { DiffPayload, PRContext, PrDescription, ProviderSpec, TextGenerator } from "./types.js";

export type CreateState =
  | "Init"
  | "DiffCollected"
  | "DescriptionGenerated"
  | "PRCreated"
  | "LocalOutput"
  | "Done";

export type ReviewState =
  | "Init"
  | "DiffCollected"
  | "Reviewed"
  | "Posted"
  | "DescriptionUpdated"
  | "LocalOutput"
  | "Done";

// Both machines run once and end in Done; no state is revisited.
export const CREATE_TRANSITIONS: Record<CreateState, CreateState[]> = {
  Init: ["DiffCollected", "Done"],
  DiffCollected: ["DescriptionGenerated", "Done"],
  DescriptionGenerated: ["PRCreated", "LocalOutput", "Done"],
  PRCreated: ["Done"],
  LocalOutput: ["Done"],
  Done: [],
};

export const REVIEW_TRANSITIONS: Record<ReviewState, ReviewState[]> = {
  Init: ["DiffCollected", "Done"],
  DiffCollected: ["Reviewed", "Done"],
  // A failed comment still lets the description update run.
  Reviewed: ["Posted", "DescriptionUpdated", "LocalOutput", "Done"],
  Posted: ["DescriptionUpdated", "Done"],
  DescriptionUpdated: ["Done"],
  LocalOutput: ["Done"],
  Done: [],
};

export class TransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string,
    public readonly label: string,
  ) {
    super(`Invalid transition [${label}]: ${from} -> ${to}`);
    this.name = "TransitionError";
  }
}

export class WorkflowTracker<TState extends string> {
  private readonly visited: TState[];

  constructor(
    private readonly transitions: Record<TState, TState[]>,
    initialState: TState,
    private readonly label: string,
  ) {
    this.visited = [initialState];
  }

  get state(): TState {
    return this.visited[this.visited.length - 1];
  }

  get history(): readonly TState[] {
    return this.visited;
  }

  advance(to: TState): void {
    const from = this.state;
    if (!this.transitions[from].includes(to)) {
      throw new TransitionError(from, to, this.label);
    }
    getLogger().debug("[%s] %s -> %s", this.label, from, to);
    this.visited.push(to);
  }
}

export type WorkflowResult = {
  mode: WorkflowMode;
  exitCode: 0 | 1;
  states: readonly string[];
};

export interface WorkflowDependencies {
  collectDiff(sourceBranch: string, targetBranch: string): Promise<DiffPayload>;
  createGenerator(spec: ProviderSpec): TextGenerator;
  createGateway(context: RemoteContext): RemotePRGateway;
  pushBranch(branch: string): Promise<void>;
  /** Repository id derived from the origin remote, for `create` runs without one. */
  inferRepositoryId(): Promise<string | undefined>;
  /** Writes user-facing output (review text, descriptions) without a log prefix. */
  print(text: string): void;
}

export async function runWorkflow(
  config: AppConfig,
  dependencies: WorkflowDependencies,
): Promise<WorkflowResult> {
  const logger = getLogger();

  let generator: TextGenerator;
  try {
    const spec = resolveProvider(config.model, config.explicitProvider, config.providerSettings);
    logger.info("Using provider %s, model %s", spec.name, spec.model);
    generator = dependencies.createGenerator(spec);
  } catch (error) {
    if (error instanceof UnknownProviderError) {
      logger.error(error.message);
      return { mode: config.mode, exitCode: 1, states: ["Init", "Done"] };
    }
    throw error;
  }

  return config.mode === "create"
    ? runCreate(config, generator, dependencies)
    : runReview(config, generator, dependencies);
}

export const EMPTY_DIFF_SUMMARY = "No diff detected between selected branches.";

export function defaultPullRequestTitle(sourceBranch: string, targetBranch: string): string {
  return `Merge ${normalizeBranchName(sourceBranch)} into ${normalizeBranchName(targetBranch)}`;
}

export async function runCreate(
  config: AppConfig,
  generator: TextGenerator,
  dependencies: WorkflowDependencies,
): Promise<WorkflowResult> {
  const logger = getLogger();
  const flow = new WorkflowTracker(CREATE_TRANSITIONS, "Init", "create");
  const finish = (exitCode: 0 | 1): WorkflowResult => {
    flow.advance("Done");
    return { mode: "create", exitCode, states: flow.history };
  };

  const diff = await collectOrReport(config, dependencies);
  if (!diff) {
    return finish(1);
  }
  flow.advance("DiffCollected");

  const title = config.title ?? defaultPullRequestTitle(config.sourceBranch, config.targetBranch);
  let description: PrDescription;
  if (!diff.unifiedDiff.trim()) {
    logger.info(
      "No diff found between %s and %s; creating the pull request with a fallback description.",
      diff.targetBranch,
      diff.sourceBranch,
    );
    description = { summary: EMPTY_DIFF_SUMMARY, changes: "", tests: "" };
  } else {
    const attempt = await describeForPR(diff, generator, { maxTokens: config.maxTokens, title });
    if (attempt.ok) {
      description = attempt.description;
    } else {
      logger.warn(
        "Description generation failed (%s); continuing with an empty description.",
        describeFailure(attempt.failure),
      );
      description = emptyPrDescription();
    }
  }
  flow.advance("DescriptionGenerated");
  const descriptionText = formatPrDescription(description);

  const prContext = await withInferredRepository(config.prContext, dependencies);
  const remote = config.dryRun ? undefined : toRemoteContext(prContext);
  if (!remote) {
    if (config.dryRun) {
      logger.info("Dry-run: pull request not created.");
      previewRequest(
        dependencies,
        "POST",
        pullRequestApiUrl(prContext, "pullrequests"),
        buildPullRequestRequest(config.sourceBranch, config.targetBranch, title, descriptionText),
      );
    } else {
      logger.warn(
        "Missing Azure DevOps context (%s); printing the description instead.",
        missingContextFields(prContext).join(", "),
      );
    }
    flow.advance("LocalOutput");
    dependencies.print(`# ${title}\n\n${descriptionText}`);
    return finish(0);
  }

  try {
    if (config.push) {
      await dependencies.pushBranch(config.sourceBranch);
    }
    const gateway = dependencies.createGateway(remote);
    const prId = await gateway.createPullRequest(
      config.sourceBranch,
      config.targetBranch,
      title,
      descriptionText,
    );
    flow.advance("PRCreated");
    logger.info("Created pull request #%d: %s", prId, title);
  } catch (error) {
    if (!(error instanceof ReviewError)) {
      throw error;
    }
    logger.error(error.message);
    dependencies.print(`# ${title}\n\n${descriptionText}`);
    return finish(1);
  }

  return finish(0);
}

export async function runReview(
  config: AppConfig,
  generator: TextGenerator,
  dependencies: WorkflowDependencies,
): Promise<WorkflowResult> {
  const logger = getLogger();
  const flow = new WorkflowTracker(REVIEW_TRANSITIONS, "Init", "review");
  const finish = (exitCode: 0 | 1): WorkflowResult => {
    flow.advance("Done");
    return { mode: "review", exitCode, states: flow.history };
  };

  const diff = await collectOrReport(config, dependencies);
  if (!diff) {
    return finish(1);
  }
  flow.advance("DiffCollected");
  if (!diff.unifiedDiff.trim()) {
    logger.info("No diff found between %s and %s; skipping review.", diff.targetBranch, diff.sourceBranch);
    return finish(0);
  }

  const attempt = await reviewDiff(diff, generator, { maxTokens: config.maxTokens });
  if (!attempt.ok) {
    logger.error("Review aborted, no usable model output: %s", describeFailure(attempt.failure));
    return finish(1);
  }
  const outcome = attempt.outcome;
  flow.advance("Reviewed");
  logReview(outcome);
  dependencies.print(outcome.reviewText);

  const suggestion = outcome.prDescription
    ? formatPrDescription(outcome.prDescription)
    : outcome.reviewText;
  const prId = config.prContext.prId;
  const remote = config.dryRun ? undefined : toRemoteContext(config.prContext);

  if (!remote || prId === undefined) {
    flow.advance("LocalOutput");
    if (config.dryRun && prId !== undefined) {
      logger.info("Dry-run: review not posted.");
      const path = `pullRequests/${prId}`;
      previewRequest(
        dependencies,
        "POST",
        pullRequestApiUrl(config.prContext, `${path}/threads`),
        buildCommentThread(buildReviewComment(outcome)),
      );
      if (config.updateDescription) {
        previewRequest(dependencies, "PATCH", pullRequestApiUrl(config.prContext, path), {
          description: appendSuggestedDescription("[existing description]", suggestion),
        });
      }
      return finish(0);
    }
    if (config.dryRun) {
      logger.info("Dry-run: no pull request id, review not posted.");
    } else {
      const missing = missingContextFields(config.prContext);
      if (prId === undefined) {
        missing.push("pull request id");
      }
      logger.warn("Missing Azure DevOps context (%s); printing output only.", missing.join(", "));
    }
    if (config.updateDescription) {
      dependencies.print(appendSuggestedDescription("", suggestion));
    }
    return finish(0);
  }

  // Azure DevOps failures from here on are reported but do not fail the run.
  const gateway = dependencies.createGateway(remote);
  try {
    await gateway.postComment(prId, buildReviewComment(outcome));
    flow.advance("Posted");
    logger.info("Posted review comment to PR %d.", prId);
  } catch (error) {
    if (!(error instanceof ReviewError)) {
      throw error;
    }
    logger.warn("Review comment not posted: %s", error.message);
  }

  if (!config.updateDescription) {
    return finish(0);
  }

  try {
    const current = await gateway.getPullRequestDescription(prId);
    const updated = appendSuggestedDescription(current, suggestion);
    if (updated.length > MAX_PR_DESCRIPTION_LENGTH) {
      logger.warn(
        "Suggested description would make PR %d longer than %d characters; leaving it unchanged.",
        prId,
        MAX_PR_DESCRIPTION_LENGTH,
      );
      return finish(0);
    }
    await gateway.updatePullRequestDescription(prId, updated);
  } catch (error) {
    if (!(error instanceof ReviewError)) {
      throw error;
    }
    logger.warn("PR description not updated: %s", error.message);
    return finish(0);
  }
  flow.advance("DescriptionUpdated");
  logger.info("Appended the AI suggested description to PR %d.", prId);
  return finish(0);
}

async function withInferredRepository(
  context: Readonly<PRContext>,
  dependencies: WorkflowDependencies,
): Promise<Readonly<PRContext>> {
  if (context.repositoryId) {
    return context;
  }
  const repositoryId = await dependencies.inferRepositoryId();
  if (!repositoryId) {
    return context;
  }
  getLogger().info("Inferred repository id %s from the origin remote.", repositoryId);
  return { ...context, repositoryId };
}

/** Shows the request a dry run skips: the URL in the log, the JSON body on stdout. */
function previewRequest(
  dependencies: WorkflowDependencies,
  method: "POST" | "PATCH",
  url: string,
  payload: unknown,
): void {
  getLogger().info("Dry-run: %s %s", method, url);
  dependencies.print(JSON.stringify(payload, null, 2));
}

async function collectOrReport(
  config: AppConfig,
  dependencies: WorkflowDependencies,
): Promise<DiffPayload | undefined> {
  try {
    return await dependencies.collectDiff(config.sourceBranch, config.targetBranch);
  } catch (error) {
    if (error instanceof ReviewError) {
      getLogger().error(error.message);
      return undefined;
    }
    throw error;
  }
}
