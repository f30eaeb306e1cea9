import { getLogger } from "./logging.js";
import { buildDescriptionRequest, buildReviewRequest } from "./prompt.js";
import { extractPrDescription, parsePrDescription } from "./reviewProcessing.js";
import type {
  DiffPayload,
  GenerationFailure,
  PrDescription,
  ReviewOutcome,
  TextGenerator,
} from "./types.js";

export type EngineOptions = {
  maxTokens: number;
  title?: string;
};

export type ReviewAttempt =
  | { ok: true; outcome: ReviewOutcome }
  | { ok: false; failure: GenerationFailure };

export type DescriptionAttempt =
  | { ok: true; description: PrDescription }
  | { ok: false; failure: GenerationFailure };

// Single provider call per operation; failures are returned to the workflow, which
// decides whether to abort or degrade.

export async function reviewDiff(
  diff: DiffPayload,
  generator: TextGenerator,
  options: EngineOptions,
): Promise<ReviewAttempt> {
  getLogger().info(
    "Requesting review of %d file(s) from %s (%s)",
    diff.changedFiles.length,
    generator.spec.name,
    generator.spec.model,
  );
  const result = await generator.generate(buildReviewRequest(diff, options.maxTokens));
  if (!result.ok) {
    return result;
  }

  return {
    ok: true,
    outcome: {
      reviewText: result.text,
      prDescription: extractPrDescription(result.text),
    },
  };
}

export async function describeForPR(
  diff: DiffPayload,
  generator: TextGenerator,
  options: EngineOptions,
): Promise<DescriptionAttempt> {
  getLogger().info(
    "Requesting pull request description from %s (%s)",
    generator.spec.name,
    generator.spec.model,
  );
  const result = await generator.generate(
    buildDescriptionRequest(diff, options.maxTokens, options.title),
  );
  if (!result.ok) {
    return result;
  }
  return { ok: true, description: parsePrDescription(result.text) };
}
