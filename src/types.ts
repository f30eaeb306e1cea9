export interface FileDiff {
  path: string;
  diff: string;
}

export interface DiffPayload {
  sourceBranch: string;
  targetBranch: string;
  rangeSpec: string;
  unifiedDiff: string;
  changedFiles: string[];
  truncated: boolean;
}

export type ProviderName = "claude" | "openai-compatible";

export interface ProviderSpec {
  readonly name: ProviderName;
  readonly model: string;
  readonly apiKey: string | undefined;
  readonly apiKeyPresent: boolean;
  readonly endpointUrl: string;
  readonly timeoutMs: number;
}

export interface GenerationRequest {
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
}

export type GenerationFailure =
  | { reason: "MissingKey"; detail: string }
  | { reason: "MissingSDK"; detail: string }
  | { reason: "HTTPError"; status: number; body: string }
  | { reason: "Timeout"; detail: string }
  | { reason: "MalformedResponse"; detail: string };

export type GenerationResult =
  | { ok: true; text: string }
  | { ok: false; failure: GenerationFailure };

export interface TextGenerator {
  readonly spec: ProviderSpec;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface PrDescription {
  summary: string;
  changes: string;
  tests: string;
}

export interface ReviewOutcome {
  reviewText: string;
  prDescription?: PrDescription;
}

export interface PRContext {
  orgUrl?: string;
  project?: string;
  repositoryId?: string;
  token?: string;
  prId?: number;
}
