import { z } from "zod";
import { joinUrl, postJson, type FetchLike } from "./http-json.js";
import type { CallOptions, RerankScore, RerankService } from "./types.js";

const rerankResponseSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    score: z.number()
  })
);

export interface HttpRerankServiceOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/** Cross-encoder client for a text-embeddings-inference style `/rerank` endpoint. */
export class HttpRerankService implements RerankService {
  constructor(private readonly options: HttpRerankServiceOptions) {}

  async rerank(query: string, texts: string[], callOptions?: CallOptions): Promise<RerankScore[]> {
    if (texts.length === 0) {
      return [];
    }
    return postJson({
      url: joinUrl(this.options.baseUrl, "rerank"),
      body: { query, texts, truncate: true },
      schema: rerankResponseSchema,
      timeoutMs: this.options.timeoutMs,
      signal: callOptions?.signal,
      fetchImpl: this.options.fetchImpl
    });
  }
}
