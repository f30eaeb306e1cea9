import { z } from "zod";

import { describeError } from "./errors.js";
import { getLogger } from "./logging.js";
import type {
  GenerationRequest,
  GenerationResult,
  ProviderSpec,
  TextGenerator,
} from "./types.js";
import { truncateText } from "./utils.js";

export const OPENAI_CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";
export const NVIDIA_CHAT_COMPLETIONS_URL = "https://integrate.api.nvidia.com/v1/chat/completions";

const MAX_ERROR_BODY_LENGTH = 500;

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export class OpenAICompatibleGenerator implements TextGenerator {
  constructor(
    readonly spec: ProviderSpec,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const logger = getLogger();
    if (!this.spec.apiKey) {
      return {
        ok: false,
        failure: { reason: "MissingKey", detail: "OPENAI_API_KEY not set" },
      };
    }

    const payload = {
      model: this.spec.model,
      messages: [
        { role: "system", content: request.systemPrompt },
        { role: "user", content: request.userPrompt },
      ],
      temperature: 0.2,
      max_tokens: request.maxTokens,
    };

    logger.info("Requesting completion from %s (%s)", this.spec.endpointUrl, this.spec.model);
    let response: Response;
    try {
      response = await this.fetchImpl(this.spec.endpointUrl, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.spec.apiKey}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.spec.timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        return {
          ok: false,
          failure: { reason: "Timeout", detail: `no reply within ${this.spec.timeoutMs} ms` },
        };
      }
      // No response at all; reported with status 0.
      return {
        ok: false,
        failure: { reason: "HTTPError", status: 0, body: describeError(error) },
      };
    }

    let bodyText: string;
    try {
      bodyText = await response.text();
    } catch (error) {
      if (isTimeout(error)) {
        return {
          ok: false,
          failure: { reason: "Timeout", detail: `no reply within ${this.spec.timeoutMs} ms` },
        };
      }
      return {
        ok: false,
        failure: { reason: "MalformedResponse", detail: describeError(error) },
      };
    }

    if (!response.ok) {
      return {
        ok: false,
        failure: {
          reason: "HTTPError",
          status: response.status,
          body: truncateText(bodyText.trim(), MAX_ERROR_BODY_LENGTH),
        },
      };
    }

    return parseChatCompletion(bodyText);
  }
}

export function parseChatCompletion(bodyText: string): GenerationResult {
  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch (error) {
    return {
      ok: false,
      failure: {
        reason: "MalformedResponse",
        detail: `response was not valid JSON: ${describeError(error)}`,
      },
    };
  }

  const parsed = ChatCompletionSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return {
      ok: false,
      failure: { reason: "MalformedResponse", detail: issues },
    };
  }

  const text = parsed.data.choices[0].message.content.trim();
  if (!text) {
    return {
      ok: false,
      failure: { reason: "MalformedResponse", detail: "completion content was empty" },
    };
  }
  return { ok: true, text };
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}
