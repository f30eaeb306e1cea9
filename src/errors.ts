export class ReviewError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReviewError";
  }
}

export class BranchNotFoundError extends ReviewError {
  constructor(public readonly ref: string) {
    super(`Branch not found: ${ref}. Fetch it or check the branch name.`);
    this.name = "BranchNotFoundError";
  }
}

export class UnknownProviderError extends ReviewError {
  constructor(public readonly provider: string) {
    super(
      `Unknown AI provider "${provider}". Use one of: claude, anthropic, openai, chatgpt, nvidia.`,
    );
    this.name = "UnknownProviderError";
  }
}

export class RemoteGatewayError extends ReviewError {
  constructor(
    public readonly operation: string,
    message: string,
  ) {
    super(`Azure DevOps ${operation} failed: ${message}`);
    this.name = "RemoteGatewayError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
