import { describeError } from "./errors.js";
import { getLogger } from "./logging.js";
import type {
  GenerationRequest,
  GenerationResult,
  ProviderSpec,
  TextGenerator,
} from "./types.js";
import { truncateText } from "./utils.js";

export type AnthropicModule = typeof import("@anthropic-ai/sdk");
export type AnthropicLoader = () => Promise<AnthropicModule>;

const loadAnthropicSdk: AnthropicLoader = () => import("@anthropic-ai/sdk");

export class ClaudeGenerator implements TextGenerator {
  constructor(
    readonly spec: ProviderSpec,
    private readonly loadSdk: AnthropicLoader = loadAnthropicSdk,
  ) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const logger = getLogger();
    if (!this.spec.apiKey) {
      return {
        ok: false,
        failure: {
          reason: "MissingKey",
          detail: "ANTHROPIC_API_KEY or CLAUDE_API_KEY not set",
        },
      };
    }

    let sdk: AnthropicModule;
    try {
      sdk = await this.loadSdk();
    } catch (error) {
      return {
        ok: false,
        failure: {
          reason: "MissingSDK",
          detail: `@anthropic-ai/sdk could not be loaded: ${describeError(error)}`,
        },
      };
    }

    const client = new sdk.default({
      apiKey: this.spec.apiKey,
      timeout: this.spec.timeoutMs,
      maxRetries: 0,
    });

    logger.info("Requesting completion from Claude model %s", this.spec.model);
    try {
      const message = await client.messages.create({
        model: this.spec.model,
        max_tokens: request.maxTokens,
        system: request.systemPrompt,
        messages: [{ role: "user", content: request.userPrompt }],
      });

      const text = message.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("")
        .trim();
      if (!text) {
        return {
          ok: false,
          failure: { reason: "MalformedResponse", detail: "Claude reply contained no text" },
        };
      }
      return { ok: true, text };
    } catch (error) {
      if (error instanceof sdk.APIConnectionTimeoutError) {
        return {
          ok: false,
          failure: { reason: "Timeout", detail: `no reply within ${this.spec.timeoutMs} ms` },
        };
      }
      if (error instanceof sdk.APIError) {
        return {
          ok: false,
          failure: {
            reason: "HTTPError",
            status: typeof error.status === "number" ? error.status : 0,
            body: truncateText(error.message, 500),
          },
        };
      }
      return {
        ok: false,
        failure: { reason: "MalformedResponse", detail: describeError(error) },
      };
    }
  }
}
