import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";

// LLM Provider types
export type LLMProvider = "anthropic" | "openai";

export interface LanguageModelConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionRequest {
  system: string;
  user: string;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  content: string;
  usage: TokenUsage;
}

/**
 * Single-turn text completion: one system prompt, one user prompt.
 */
export interface LanguageModel {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export class LlmProviderError extends Error {
  readonly provider: LLMProvider;

  constructor(provider: LLMProvider, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LlmProviderError";
    this.provider = provider;
  }
}

// Model client backed by the OpenAI or Anthropic SDK
export class LlmClient implements LanguageModel {
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;

  constructor(private readonly config: LanguageModelConfig) {
    if (!config.apiKey) {
      throw new LlmProviderError(
        config.provider,
        `No API key configured for ${config.provider}. Set ${
          config.provider === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY"
        }.`,
      );
    }

    // Initialize client based on provider
    if (config.provider === "anthropic") {
      this.anthropicClient = new Anthropic({ apiKey: config.apiKey });
    } else {
      this.openaiClient = new OpenAI({ apiKey: config.apiKey });
    }
  }

  get provider(): LLMProvider {
    return this.config.provider;
  }

  get model(): string {
    return this.config.model;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    try {
      if (this.anthropicClient) {
        return await this.completeAnthropic(this.anthropicClient, request);
      }
      if (this.openaiClient) {
        return await this.completeOpenAI(this.openaiClient, request);
      }
    } catch (error) {
      if (request.signal?.aborted) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new LlmProviderError(this.config.provider, `${this.config.provider} request failed: ${reason}`, {
        cause: error,
      });
    }
    throw new LlmProviderError(this.config.provider, "Provider not supported");
  }

  private async completeAnthropic(
    client: Anthropic,
    request: CompletionRequest,
  ): Promise<CompletionResponse> {
    const response = await client.messages.create(
      {
        model: this.config.model,
        max_tokens: this.config.maxTokens || 4096,
        temperature: this.config.temperature ?? 0.7,
        system: request.system,
        messages: [{ role: "user", content: request.user }],
      },
      { signal: request.signal },
    );

    let content = "";
    for (const block of response.content) {
      if (block.type === "text") content += block.text;
    }

    return {
      content,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  private async completeOpenAI(
    client: OpenAI,
    request: CompletionRequest,
  ): Promise<CompletionResponse> {
    const response = await client.chat.completions.create(
      {
        model: this.config.model,
        temperature: this.config.temperature ?? 0.7,
        max_tokens: this.config.maxTokens || 4096,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
      },
      { signal: request.signal },
    );

    const choice = response.choices[0];
    return {
      content: choice?.message?.content || "",
      usage: {
        inputTokens: response.usage?.prompt_tokens || 0,
        outputTokens: response.usage?.completion_tokens || 0,
      },
    };
  }
}
