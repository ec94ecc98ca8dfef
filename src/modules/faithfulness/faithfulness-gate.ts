import { logDebug, logWarn } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import type { RerankService } from "../../providers/types.js";
import type { Document } from "../rag/types.js";

export const NEUTRAL_FAITHFULNESS_SCORE = 0.5;
export const DEFAULT_FALLBACK_THRESHOLD = 0.1;
export const MAX_CONTEXT_DOCUMENTS = 5;
export const MAX_CONTEXT_WORDS = 450;

export const truncateWords = (text: string, maxWords: number = MAX_CONTEXT_WORDS): string => {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  if (words.length <= maxWords) {
    return words.join(" ");
  }
  return `${words.slice(0, maxWords).join(" ")}...`;
};

export const buildContexts = (documents: readonly Pick<Document, "content">[]): string[] =>
  documents
    .slice(0, MAX_CONTEXT_DOCUMENTS)
    .map((document) => truncateWords(document.content))
    .filter((context) => context.length > 0);

export const clampScore = (score: number): number => {
  if (!Number.isFinite(score)) {
    return NEUTRAL_FAITHFULNESS_SCORE;
  }
  return Math.min(1, Math.max(0, score));
};

export interface FaithfulnessScoreOptions {
  signal?: AbortSignal;
  requestId?: string;
}

/**
 * Scores how well an answer is supported by its contexts using the
 * cross-encoder: the answer is the query and the joined contexts the single
 * candidate text. The question only has to be non-empty; it is not sent to
 * the scorer, so the score measures grounding, not relevance. Missing input
 * or a failed call yields the neutral score.
 */
export class FaithfulnessGate {
  constructor(private readonly service: RerankService) {}

  async score(
    question: string,
    answer: string,
    contexts: readonly string[],
    options: FaithfulnessScoreOptions = {}
  ): Promise<number> {
    const logContext = { requestId: options.requestId ?? null, stage: "verify" };
    const usableContexts = contexts.filter((context) => context.trim().length > 0);
    if (question.trim().length === 0 || answer.trim().length === 0 || usableContexts.length === 0) {
      logDebug("faithfulness.missing_input", logContext, { context_count: usableContexts.length });
      return NEUTRAL_FAITHFULNESS_SCORE;
    }

    try {
      const scores = await this.service.rerank(answer, [usableContexts.join("\n\n")], { signal: options.signal });
      const top = scores.find((entry) => entry.index === 0) ?? scores[0];
      if (!top) {
        return NEUTRAL_FAITHFULNESS_SCORE;
      }
      const score = clampScore(top.score);
      logDebug("faithfulness.scored", logContext, { score, context_count: usableContexts.length });
      return score;
    } catch (error) {
      recordErrorRate("faithfulness_unavailable");
      logWarn("faithfulness.unavailable", logContext, {
        error: error instanceof Error ? error.message : String(error)
      });
      return NEUTRAL_FAITHFULNESS_SCORE;
    }
  }
}
