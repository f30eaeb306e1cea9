import azdev from "azure-devops-node-api";
import type { IGitApi } from "azure-devops-node-api/GitApi.js";
import * as GitInterfaces from "azure-devops-node-api/interfaces/GitInterfaces.js";

import { RemoteGatewayError, describeError } from "./errors.js";
import { normalizeBranchName } from "./git.js";
import { getLogger } from "./logging.js";
import type { PRContext } from "./types.js";

/** Azure DevOps rejects pull request descriptions longer than this. */
export const MAX_PR_DESCRIPTION_LENGTH = 4000;

export interface RemotePRGateway {
  createPullRequest(
    sourceBranch: string,
    targetBranch: string,
    title: string,
    description: string,
  ): Promise<number>;
  getPullRequestDescription(prId: number): Promise<string>;
  updatePullRequestDescription(prId: number, description: string): Promise<void>;
  postComment(prId: number, text: string): Promise<void>;
}

export type RemoteContext = {
  orgUrl: string;
  project: string;
  repositoryId: string;
  token: string;
};

/** The pull request calls the gateway makes on the Azure DevOps Git API. */
export type PullRequestApi = Pick<
  IGitApi,
  "createPullRequest" | "getPullRequest" | "updatePullRequest" | "createThread"
>;

export type GitApiFactory = (orgUrl: string, token: string) => Promise<PullRequestApi>;

export function resolveOrganizationUrl(org: string): string {
  if (org.startsWith("http")) {
    return org.replace(/\/+$/, "");
  }
  return `https://dev.azure.com/${org.replace(/^\//, "").replace(/\/+$/, "")}`;
}

export function missingContextFields(context: PRContext): string[] {
  const missing: string[] = [];
  if (!context.orgUrl) {
    missing.push("organization");
  }
  if (!context.project) {
    missing.push("project");
  }
  if (!context.repositoryId) {
    missing.push("repository id");
  }
  if (!context.token) {
    missing.push("token");
  }
  return missing;
}

/** Narrows a PR context to the fields every gateway call needs, or `undefined`. */
export function toRemoteContext(context: PRContext): RemoteContext | undefined {
  const { orgUrl, project, repositoryId, token } = context;
  if (!orgUrl || !project || !repositoryId || !token) {
    return undefined;
  }
  return { orgUrl: resolveOrganizationUrl(orgUrl), project, repositoryId, token };
}

export function toBranchRef(branch: string): string {
  return `refs/heads/${normalizeBranchName(branch)}`;
}

export function clipDescription(description: string): string {
  if (description.length <= MAX_PR_DESCRIPTION_LENGTH) {
    return description;
  }
  getLogger().warn(
    "Description is %d characters; clipping to the %d Azure DevOps accepts.",
    description.length,
    MAX_PR_DESCRIPTION_LENGTH,
  );
  let cut = MAX_PR_DESCRIPTION_LENGTH - 1;
  // Keep surrogate pairs whole.
  const last = description.charCodeAt(cut - 1);
  if (last >= 0xd800 && last <= 0xdbff) {
    cut -= 1;
  }
  return `${description.slice(0, cut)}…`;
}

/**
 * REST URL of a pull request resource, used to show what a dry run would call.
 * Missing context fields appear as `<placeholders>`.
 */
export function pullRequestApiUrl(context: PRContext, path: string): string {
  const org = context.orgUrl ? resolveOrganizationUrl(context.orgUrl) : "<organization>";
  const project = context.project ?? "<project>";
  const repositoryId = context.repositoryId ?? "<repository id>";
  return `${org}/${project}/_apis/git/repositories/${repositoryId}/${path}?api-version=7.1`;
}

export function buildPullRequestRequest(
  sourceBranch: string,
  targetBranch: string,
  title: string,
  description: string,
): GitInterfaces.GitPullRequest {
  return {
    sourceRefName: toBranchRef(sourceBranch),
    targetRefName: toBranchRef(targetBranch),
    title,
    description: clipDescription(description),
  };
}

export function buildCommentThread(text: string): GitInterfaces.GitPullRequestCommentThread {
  return {
    status: GitInterfaces.CommentThreadStatus.Active,
    comments: [
      {
        parentCommentId: 0,
        content: text,
        commentType: GitInterfaces.CommentType.Text,
      },
    ],
  };
}

const connectGitApi: GitApiFactory = async (orgUrl, token) => {
  const authHandler = azdev.getPersonalAccessTokenHandler(token);
  const connection = new azdev.WebApi(orgUrl, authHandler);
  return connection.getGitApi();
};

export class AzureDevOpsGateway implements RemotePRGateway {
  private gitApi: Promise<PullRequestApi> | undefined;

  constructor(
    private readonly context: RemoteContext,
    private readonly connect: GitApiFactory = connectGitApi,
  ) {}

  async createPullRequest(
    sourceBranch: string,
    targetBranch: string,
    title: string,
    description: string,
  ): Promise<number> {
    const request = buildPullRequestRequest(sourceBranch, targetBranch, title, description);
    const created = await this.call("create pull request", async (gitApi) =>
      gitApi.createPullRequest(request, this.context.repositoryId, this.context.project),
    );
    if (typeof created?.pullRequestId !== "number") {
      throw new RemoteGatewayError("create pull request", "response did not include a pull request ID");
    }
    return created.pullRequestId;
  }

  async getPullRequestDescription(prId: number): Promise<string> {
    const pr = await this.call("get pull request", async (gitApi) =>
      gitApi.getPullRequest(this.context.repositoryId, prId, this.context.project),
    );
    return pr?.description ?? "";
  }

  async updatePullRequestDescription(prId: number, description: string): Promise<void> {
    const update: GitInterfaces.GitPullRequest = { description: clipDescription(description) };
    await this.call("update pull request", async (gitApi) =>
      gitApi.updatePullRequest(update, this.context.repositoryId, prId, this.context.project),
    );
  }

  async postComment(prId: number, text: string): Promise<void> {
    const thread = buildCommentThread(text);
    getLogger().info("Posting review thread to PR %d", prId);
    await this.call("create thread", async (gitApi) =>
      gitApi.createThread(thread, this.context.repositoryId, prId, this.context.project),
    );
  }

  private async call<T>(operation: string, run: (gitApi: PullRequestApi) => Promise<T>): Promise<T> {
    try {
      if (!this.gitApi) {
        this.gitApi = this.connect(this.context.orgUrl, this.context.token);
      }
      return await run(await this.gitApi);
    } catch (error) {
      if (error instanceof RemoteGatewayError) {
        throw error;
      }
      throw new RemoteGatewayError(operation, describeError(error));
    }
  }
}
