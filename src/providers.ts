import { type AnthropicLoader, ClaudeGenerator } from "./claude.js";
import { UnknownProviderError } from "./errors.js";
import {
  type FetchLike,
  NVIDIA_CHAT_COMPLETIONS_URL,
  OPENAI_CHAT_COMPLETIONS_URL,
  OpenAICompatibleGenerator,
} from "./openaiCompatible.js";
import type {
  GenerationFailure,
  GenerationRequest,
  GenerationResult,
  ProviderName,
  ProviderSpec,
  TextGenerator,
} from "./types.js";
import { firstNonEmpty } from "./utils.js";

export const ANTHROPIC_MESSAGES_URL = "https://api.anthropic.com/v1/messages";

/** Credentials and endpoints the registry may draw on; assembled by `loadConfig`. */
export type ProviderSettings = {
  anthropicApiKey?: string;
  claudeApiKey?: string;
  openaiApiKey?: string;
  openaiApiUrl?: string;
  timeoutMs: number;
};

export type ProviderAlias = { name: ProviderName; nvidia: boolean };

const PROVIDER_ALIASES = new Map<string, ProviderAlias>([
  ["claude", { name: "claude", nvidia: false }],
  ["anthropic", { name: "claude", nvidia: false }],
  ["openai", { name: "openai-compatible", nvidia: false }],
  ["chatgpt", { name: "openai-compatible", nvidia: false }],
  ["openai-compatible", { name: "openai-compatible", nvidia: false }],
  ["nvidia", { name: "openai-compatible", nvidia: true }],
]);

// Ordered: the first matching rule wins.
const MODEL_PREFIX_RULES: Array<{ prefix: string; alias: ProviderAlias }> = [
  { prefix: "claude", alias: { name: "claude", nvidia: false } },
  { prefix: "gpt", alias: { name: "openai-compatible", nvidia: false } },
  { prefix: "o1", alias: { name: "openai-compatible", nvidia: false } },
  { prefix: "nvidia/", alias: { name: "openai-compatible", nvidia: true } },
];

const DEFAULT_ALIAS: ProviderAlias = { name: "openai-compatible", nvidia: false };

export function resolveProviderName(
  model: string,
  explicitProvider: string | undefined,
): ProviderAlias {
  const requested = explicitProvider?.trim().toLowerCase();
  if (requested) {
    const alias = PROVIDER_ALIASES.get(requested);
    if (!alias) {
      throw new UnknownProviderError(requested);
    }
    return alias;
  }

  const normalizedModel = model.trim().toLowerCase();
  const rule = MODEL_PREFIX_RULES.find((candidate) =>
    normalizedModel.startsWith(candidate.prefix),
  );
  return rule?.alias ?? DEFAULT_ALIAS;
}

export function resolveProvider(
  model: string,
  explicitProvider: string | undefined,
  settings: ProviderSettings,
): ProviderSpec {
  const alias = resolveProviderName(model, explicitProvider);

  if (alias.name === "claude") {
    const apiKey = firstNonEmpty(settings.anthropicApiKey, settings.claudeApiKey);
    const spec: ProviderSpec = {
      name: "claude",
      model,
      apiKey,
      apiKeyPresent: apiKey !== undefined,
      endpointUrl: ANTHROPIC_MESSAGES_URL,
      timeoutMs: settings.timeoutMs,
    };
    return Object.freeze(spec);
  }

  const routesToNvidia = alias.nvidia || model.trim().toLowerCase().startsWith("nvidia/");
  const apiKey = firstNonEmpty(settings.openaiApiKey);
  const spec: ProviderSpec = {
    name: "openai-compatible",
    model,
    apiKey,
    apiKeyPresent: apiKey !== undefined,
    endpointUrl:
      firstNonEmpty(settings.openaiApiUrl) ??
      (routesToNvidia ? NVIDIA_CHAT_COMPLETIONS_URL : OPENAI_CHAT_COMPLETIONS_URL),
    timeoutMs: settings.timeoutMs,
  };
  return Object.freeze(spec);
}

export type GeneratorDependencies = {
  fetch?: FetchLike;
  loadAnthropicSdk?: AnthropicLoader;
};

export function createTextGenerator(
  spec: ProviderSpec,
  dependencies: GeneratorDependencies = {},
): TextGenerator {
  switch (spec.name) {
    case "claude":
      return new ClaudeGenerator(spec, dependencies.loadAnthropicSdk);
    case "openai-compatible":
      return new OpenAICompatibleGenerator(spec, dependencies.fetch);
  }
}

export function invokeProvider(
  spec: ProviderSpec,
  request: GenerationRequest,
  dependencies: GeneratorDependencies = {},
): Promise<GenerationResult> {
  return createTextGenerator(spec, dependencies).generate(request);
}

export function describeFailure(failure: GenerationFailure): string {
  switch (failure.reason) {
    case "HTTPError":
      return failure.status === 0
        ? `request failed before a response: ${failure.body}`
        : `HTTP ${failure.status}${failure.body ? `: ${failure.body}` : ""}`;
    case "MissingKey":
    case "MissingSDK":
    case "Timeout":
    case "MalformedResponse":
      return `${failure.reason}: ${failure.detail}`;
  }
}
