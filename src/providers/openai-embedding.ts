import { getOpenAIClient } from "../clients/openai.js";
import { withTimeout } from "../clients/call-policy.js";
import { recordOpenAIUsage } from "../observability/metrics.js";
import { encodeSparse } from "./sparse-encoder.js";
import type { CallOptions, Embedder, QueryEmbedding } from "./types.js";

export class EmbeddingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmbeddingError";
  }
}

/** The slice of the OpenAI SDK client used for embeddings. */
export interface EmbeddingsClientPort {
  embeddings: {
    create(
      body: { model: string; input: string },
      options?: { signal?: AbortSignal }
    ): Promise<{
      data: Array<{ embedding: number[] }>;
      usage?: { prompt_tokens: number; total_tokens: number };
    }>;
  };
}

export interface OpenAIEmbedderOptions {
  model: string;
  timeoutMs: number;
  getClient?: () => Promise<EmbeddingsClientPort>;
}

const getDefaultClient = async (): Promise<EmbeddingsClientPort> => (await getOpenAIClient()).client;

export class OpenAIEmbedder implements Embedder {
  private readonly getClient: () => Promise<EmbeddingsClientPort>;

  constructor(private readonly options: OpenAIEmbedderOptions) {
    this.getClient = options.getClient ?? getDefaultClient;
  }

  async embed(text: string, callOptions?: CallOptions): Promise<QueryEmbedding> {
    const client = await this.getClient();
    const response = await withTimeout(
      (signal) => client.embeddings.create({ model: this.options.model, input: text }, { signal }),
      this.options.timeoutMs,
      callOptions?.signal
    );

    const dense = response.data[0]?.embedding;
    if (!dense || dense.length === 0) {
      throw new EmbeddingError("Embedding response did not contain a vector.");
    }
    if (response.usage) {
      recordOpenAIUsage({
        promptTokens: response.usage.prompt_tokens,
        totalTokens: response.usage.total_tokens
      });
    }

    return { dense, sparse: encodeSparse(text) };
  }
}
