import { createGateway, generateText, type LanguageModel } from "ai";

import { ConfigurationError } from "../../domain/errors.js";

export interface TextGenerationOptions {
  /** Sampling temperature in [0, 1]. */
  temperature?: number;
}

/**
 * Prompt in, text out. Calls may be slow and may fail; callers own timeouts and fallbacks.
 */
export interface TextGenerationService {
  readonly modelId: string;
  generate(prompt: string, options?: TextGenerationOptions): Promise<string>;
}

export interface GatewayServiceConfig {
  apiKey?: string;
  model: string;
  maxOutputTokens: number;
  requestTimeoutMs: number;
  verboseLogs?: boolean;
}

const SYSTEM_PROMPT = [
  "You are an expert educator who writes hands-on coding labs.",
  "Return only JSON that matches the requested structure."
].join("\n");

export class GatewayTextGenerationService implements TextGenerationService {
  readonly modelId: string;
  private readonly model: LanguageModel;

  constructor(private readonly config: GatewayServiceConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError("AI_GATEWAY_API_KEY is required to call the text generation gateway.");
    }

    const gateway = createGateway({
      apiKey: config.apiKey
    });
    this.modelId = config.model;
    this.model = gateway(config.model);
  }

  async generate(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    const startedAtMs = Date.now();
    const result = await generateText({
      model: this.model,
      system: SYSTEM_PROMPT,
      prompt,
      temperature: options.temperature,
      maxOutputTokens: this.config.maxOutputTokens,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(this.config.requestTimeoutMs)
    });

    if (this.config.verboseLogs) {
      const inputTokens = result.usage?.inputTokens ?? 0;
      const outputTokens = result.usage?.outputTokens ?? 0;
      console.log(
        `[gateway] ${this.modelId} replied in ${Date.now() - startedAtMs}ms (${inputTokens}/${outputTokens} tokens)`
      );
    }

    return result.text.trim();
  }
}
