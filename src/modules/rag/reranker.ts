import { logInfo, logWarn } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import type { RerankService } from "../../providers/types.js";
import type { Document, RerankInput } from "./types.js";

export const DEFAULT_RERANK_TOP_K = 5;
export const MAX_RERANK_CANDIDATES = 15;

export interface RerankDependencies {
  service: RerankService;
  topK?: number;
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

/**
 * Reorders documents with the cross-encoder. Any service failure yields the
 * first `topK` documents in their incoming order; this never rejects.
 */
export class Reranker {
  private readonly topK: number;
  private readonly now: () => number;

  constructor(private readonly dependencies: RerankDependencies) {
    this.topK = dependencies.topK ?? DEFAULT_RERANK_TOP_K;
    this.now = dependencies.now ?? Date.now;
  }

  async rerank(input: RerankInput): Promise<Document[]> {
    const topK = Math.max(1, input.topK ?? this.topK);
    const candidates = input.documents.slice(0, MAX_RERANK_CANDIDATES);
    if (candidates.length === 0) {
      return [];
    }

    const startedAt = this.now();
    const context = { requestId: input.requestId ?? null, stage: "rerank" };

    try {
      const scores = await this.dependencies.service.rerank(
        input.query,
        candidates.map((document) => document.content),
        { signal: input.signal }
      );

      const reranked = scores
        .filter((entry) => entry.index < candidates.length)
        .sort((left, right) => right.score - left.score)
        .flatMap((entry) => {
          const document = candidates[entry.index];
          return document ? [Object.freeze({ ...document, score: entry.score })] : [];
        });

      if (reranked.length === 0) {
        throw new Error("Rerank service returned no usable scores.");
      }

      (this.dependencies.logInfo ?? logInfo)("rag.rerank.complete", context, {
        candidate_count: candidates.length,
        selected_count: Math.min(topK, reranked.length),
        latency_ms: this.now() - startedAt,
        fallback_used: false
      });
      return reranked.slice(0, topK);
    } catch (error) {
      recordErrorRate("rerank_fallback");
      (this.dependencies.logWarn ?? logWarn)("rag.rerank.fallback", context, {
        candidate_count: candidates.length,
        latency_ms: this.now() - startedAt,
        fallback_used: true,
        error: error instanceof Error ? error.message : String(error)
      });
      return input.documents.slice(0, topK);
    }
  }
}
