import { logInfo, logWarn } from "../../observability/logger.js";
import { WEB_FALLBACK_INSTRUCTIONS } from "../../prompts/index.js";
import type { WebSearch, WebSearchResult } from "../../providers/types.js";
import type { GenerationOrchestrator } from "../generation/generation-orchestrator.js";
import type { Citation, Document } from "../rag/types.js";
import type { FaithfulnessGate } from "./faithfulness-gate.js";

export class FallbackUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FallbackUnavailableError";
  }
}

export interface WebFallbackInput {
  /** Normalized query as the user typed it; this is what gets searched. */
  searchQuery: string;
  /** Pivot-language question the answer is generated for and scored against. */
  question: string;
  signal?: AbortSignal;
  requestId?: string;
}

export interface WebFallbackResult {
  answer: string;
  citations: Citation[];
  score: number;
}

export interface WebFallbackDependencies {
  webSearch: WebSearch;
  orchestrator: Pick<GenerationOrchestrator, "generate">;
  faithfulness: Pick<FaithfulnessGate, "score">;
}

export const toFallbackDocuments = (results: readonly WebSearchResult[]): Document[] =>
  results.map((result) =>
    Object.freeze({
      title: result.title.trim().length > 0 ? result.title : result.url,
      content: result.content,
      url: result.url,
      score: 0,
      keywords: Object.freeze([])
    })
  );

export const runWebFallback = async (
  input: WebFallbackInput,
  dependencies: WebFallbackDependencies
): Promise<WebFallbackResult> => {
  const context = { requestId: input.requestId ?? null, stage: "fallback" };

  try {
    const results = await dependencies.webSearch.search(input.searchQuery, { signal: input.signal });
    if (results.length === 0) {
      throw new FallbackUnavailableError("Web search returned no results.");
    }

    const documents = toFallbackDocuments(results);
    const { answer, citations } = await dependencies.orchestrator.generate({
      query: input.question,
      documents,
      instructions: WEB_FALLBACK_INSTRUCTIONS,
      signal: input.signal,
      requestId: input.requestId
    });

    const contexts = documents.map((document) => `${document.title}: ${document.content}`);
    const score = await dependencies.faithfulness.score(input.question, answer, contexts, {
      signal: input.signal,
      requestId: input.requestId
    });

    logInfo("faithfulness.fallback.complete", context, { result_count: results.length, score });
    return { answer, citations, score };
  } catch (error) {
    if (error instanceof FallbackUnavailableError) {
      logWarn("faithfulness.fallback.unavailable", context, { error: error.message });
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    logWarn("faithfulness.fallback.unavailable", context, { error: message });
    throw new FallbackUnavailableError(`Web fallback failed: ${message}`, { cause: error });
  }
};
