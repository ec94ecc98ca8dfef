import { getOpenAIClient } from "../clients/openai.js";
import { withTimeout } from "../clients/call-policy.js";
import { recordOpenAIUsage } from "../observability/metrics.js";
import type { CallOptions, GenerationRequest, TextGenerator } from "./types.js";

type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

/** The slice of the OpenAI SDK client used for chat completions. */
export interface ChatCompletionsClientPort {
  chat: {
    completions: {
      create(
        body: { model: string; messages: ChatMessage[]; max_tokens: number; temperature: number },
        options?: { signal?: AbortSignal }
      ): Promise<{
        choices: Array<{ message: { content: string | null } }>;
        usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
      }>;
    };
  };
}

export interface OpenAITextGeneratorOptions {
  model: string;
  timeoutMs: number;
  getClient?: () => Promise<ChatCompletionsClientPort>;
}

const getDefaultClient = async (): Promise<ChatCompletionsClientPort> => (await getOpenAIClient()).client;

/** Chat-completions backed generator. Returns the raw completion text, possibly empty. */
export class OpenAITextGenerator implements TextGenerator {
  private readonly getClient: () => Promise<ChatCompletionsClientPort>;

  constructor(private readonly options: OpenAITextGeneratorOptions) {
    this.getClient = options.getClient ?? getDefaultClient;
  }

  async generate(request: GenerationRequest, callOptions?: CallOptions): Promise<string> {
    const client = await this.getClient();
    const messages: ChatMessage[] = request.system
      ? [
          { role: "system", content: request.system },
          { role: "user", content: request.prompt }
        ]
      : [{ role: "user", content: request.prompt }];

    const response = await withTimeout(
      (signal) =>
        client.chat.completions.create(
          {
            model: this.options.model,
            messages,
            max_tokens: request.maxTokens,
            temperature: request.temperature
          },
          { signal }
        ),
      this.options.timeoutMs,
      callOptions?.signal
    );

    if (response.usage) {
      recordOpenAIUsage({
        promptTokens: response.usage.prompt_tokens,
        completionTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      });
    }

    return response.choices[0]?.message.content ?? "";
  }
}
