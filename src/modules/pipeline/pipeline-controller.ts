import { randomUUID } from "node:crypto";
import { DeadlineExceededError, linkSignals } from "../../clients/call-policy.js";
import { logError, logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate, recordPipelineOutcome, recordPipelineTimings } from "../../observability/metrics.js";
import type { Translator, WebSearch } from "../../providers/types.js";
import type { CacheEntry, ResponseCache } from "../cache/response-cache.js";
import type { ConversationContextManager, ContextDecision } from "../conversation/context-manager.js";
import { detectFollowUp } from "../conversation/follow-up.js";
import { createConversationTurn, type ConversationTurn } from "../conversation/history.js";
import { DEFAULT_FALLBACK_THRESHOLD, buildContexts, type FaithfulnessGate } from "../faithfulness/faithfulness-gate.js";
import { runWebFallback, type WebFallbackResult } from "../faithfulness/web-fallback.js";
import type { GenerationOrchestrator } from "../generation/generation-orchestrator.js";
import type { GateResult, TopicGate } from "../guard/topic-gate.js";
import type { Reranker } from "../rag/reranker.js";
import type { HybridRetriever } from "../rag/retriever.js";
import type { Document } from "../rag/types.js";
import { GenerationError, NoEvidenceError, TranslationError, UnsupportedLanguageError } from "./errors.js";
import {
  PIVOT_LANGUAGE_CODE,
  languageDisplayName,
  resolveLanguageCode,
  type LanguageTable
} from "./language.js";
import { FAILURE_MESSAGES, QUERY_TOO_LONG_MESSAGE, QUERY_TOO_SHORT_MESSAGE, type FailureReason } from "./messages.js";
import { PipelineTrace } from "./pipeline-trace.js";
import { validateQuery } from "./query.js";
import type { PipelineFailure, PipelineResult, PipelineSuccess, ProcessOptions } from "./types.js";

export interface PipelineDependencies {
  cache: Pick<ResponseCache, "get" | "set">;
  translator: Translator;
  gate: Pick<TopicGate, "check">;
  contextManager: Pick<ConversationContextManager, "classifyAndRewrite">;
  retriever: Pick<HybridRetriever, "retrieve">;
  reranker: Pick<Reranker, "rerank">;
  orchestrator: Pick<GenerationOrchestrator, "generate">;
  faithfulness: Pick<FaithfulnessGate, "score">;
  webSearch: WebSearch;
  fallbackThreshold?: number;
  retrievalTopK?: number;
  rerankTopK?: number;
  deadlineMs?: number;
  languages?: LanguageTable;
  now?: () => number;
  clock?: () => Date;
  createRequestId?: () => string;
}

type ErrorReason = Extract<
  FailureReason,
  "timeout" | "no_evidence" | "generation_error" | "translation_error" | "internal_error"
>;

interface RunState {
  requestId: string;
  trace: PipelineTrace;
  signal: AbortSignal;
  languageCode: string;
  /** Trimmed query as the user wrote it. */
  originalQuery: string;
  /** Normalized query; the cache key and the web search text. */
  query: string;
  history: readonly ConversationTurn[];
}

type Evidence =
  | { kind: "ready"; documents: Document[]; retrievalQuery: string }
  | { kind: "rejected"; failure: PipelineFailure };

const errorText = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const contextFailureReason = (decision: Extract<ContextDecision, { kind: "rejected" }>): "harmful" | "off_topic" =>
  decision.classification === "harmful" ? "harmful" : "off_topic";

/**
 * Runs one query through cache, translation, topic gate, conversation
 * context, retrieval, generation and faithfulness verification. Every
 * outcome is a `PipelineResult`; `process` never rejects.
 */
export class PipelineController {
  private readonly now: () => number;
  private readonly clock: () => Date;
  private readonly createRequestId: () => string;
  private readonly fallbackThreshold: number;

  constructor(private readonly dependencies: PipelineDependencies) {
    this.now = dependencies.now ?? Date.now;
    this.clock = dependencies.clock ?? (() => new Date());
    this.createRequestId = dependencies.createRequestId ?? randomUUID;
    this.fallbackThreshold = dependencies.fallbackThreshold ?? DEFAULT_FALLBACK_THRESHOLD;
  }

  async process(
    query: string,
    languageName: string,
    history: readonly ConversationTurn[] = [],
    options: ProcessOptions = {}
  ): Promise<PipelineResult> {
    const requestId = options.requestId ?? this.createRequestId();
    const trace = new PipelineTrace({ requestId }, this.now);

    const validation = validateQuery(query);
    if (!validation.valid) {
      const message = validation.problem === "too_long" ? QUERY_TOO_LONG_MESSAGE : QUERY_TOO_SHORT_MESSAGE;
      return this.finish(requestId, this.failure(trace, "invalid_query", message, null));
    }

    let languageCode: string;
    try {
      languageCode = resolveLanguageCode(languageName, this.dependencies.languages);
    } catch (error) {
      if (error instanceof UnsupportedLanguageError) {
        return this.finish(requestId, this.failure(trace, "unsupported_language", error.message, null));
      }
      logError("pipeline.error", { requestId, stage: "normalize" }, serializeError(error));
      return this.finish(
        requestId,
        this.failure(trace, "internal_error", FAILURE_MESSAGES.internal_error, null, errorText(error))
      );
    }

    const deadlineMs = options.deadlineMs ?? this.dependencies.deadlineMs;
    const deadline = new AbortController();
    const linked = linkSignals([options.signal, deadline.signal]);
    const timer =
      deadlineMs !== undefined && deadlineMs > 0
        ? setTimeout(
            () => deadline.abort(new DeadlineExceededError(`Pipeline deadline of ${deadlineMs}ms exceeded.`)),
            deadlineMs
          )
        : undefined;

    const run: RunState = {
      requestId,
      trace,
      signal: linked.signal,
      languageCode,
      originalQuery: query.trim(),
      query: validation.normalized,
      history
    };

    try {
      const result = await Promise.race([this.runStages(run), this.whenAborted(linked.signal)]);
      return this.finish(requestId, result ?? this.timeoutFailure(run));
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      linked.detach();
    }
  }

  private whenAborted(signal: AbortSignal): Promise<null> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve(null);
        return;
      }
      signal.addEventListener("abort", () => resolve(null), { once: true });
    });
  }

  private async runStages(run: RunState): Promise<PipelineResult> {
    const { cache, orchestrator, faithfulness } = this.dependencies;
    const { trace, signal, requestId, languageCode } = run;

    try {
      const cached = await trace.measure("cache_lookup", () =>
        cache.get(languageCode, run.query, { signal, requestId })
      );
      if (cached) {
        return this.fromCache(run, cached);
      }

      const requiresTranslation = languageCode !== PIVOT_LANGUAGE_CODE;
      const userLanguage = languageDisplayName(languageCode, this.dependencies.languages);
      const pivotLanguage = languageDisplayName(PIVOT_LANGUAGE_CODE, this.dependencies.languages);
      const pivotQuery = requiresTranslation
        ? await trace.measure("translate_in", () => this.translate(run, run.query, userLanguage, pivotLanguage))
        : run.query;

      const evidence = await this.resolveEvidence(run, pivotQuery);
      if (evidence.kind === "rejected") {
        return evidence.failure;
      }
      const { documents, retrievalQuery } = evidence;

      const generated = await trace.measure("generate", () =>
        orchestrator.generate({ query: retrievalQuery, documents, history: run.history, signal, requestId })
      );
      let answer = generated.answer;
      let citations = generated.citations;

      const originalScore = await trace.measure("verify", () =>
        faithfulness.score(retrievalQuery, answer, buildContexts(documents), { signal, requestId })
      );
      let score = originalScore;
      let usedFallback = false;
      if (score < this.fallbackThreshold) {
        const fallback = await trace.measure("fallback", () => this.tryFallback(run, retrievalQuery));
        if (fallback && fallback.score > score) {
          answer = fallback.answer;
          citations = fallback.citations;
          score = fallback.score;
          usedFallback = true;
        }
        logInfo("pipeline.fallback.decision", { requestId, languageCode }, {
          original_score: originalScore,
          fallback_score: fallback?.score ?? null,
          used_fallback: usedFallback
        });
      }

      const finalAnswer = requiresTranslation
        ? await trace.measure("translate_out", () => this.translate(run, answer, pivotLanguage, userLanguage))
        : answer;

      const entry: CacheEntry = {
        answer: finalAnswer,
        citations,
        faithfulness: score,
        metadata: {
          cachedAt: this.clock().toISOString(),
          languageCode,
          processingTimeMs: trace.elapsedMs(),
          requiredTranslation: requiresTranslation
        }
      };
      await trace.measure("cache_store", () => cache.set(languageCode, run.query, entry, { signal, requestId }));

      return this.success(run, {
        answer: finalAnswer,
        citations,
        faithfulness: score,
        cacheHit: false,
        usedFallback
      });
    } catch (error) {
      return this.failureFromError(run, error);
    }
  }

  /**
   * Gate, conversation context and retrieval. A first turn runs the gate and
   * retrieval side by side; a gate rejection wins over a retrieval failure.
   */
  private async resolveEvidence(run: RunState, pivotQuery: string): Promise<Evidence> {
    const { gate } = this.dependencies;
    const callOptions = { signal: run.signal, requestId: run.requestId };

    if (run.history.length === 0) {
      const [gateOutcome, documentsOutcome] = await Promise.allSettled([
        run.trace.measure("gate", () => gate.check(pivotQuery, [], callOptions)),
        this.retrieveAndRerank(run, pivotQuery)
      ]);
      if (gateOutcome.status === "rejected") {
        throw gateOutcome.reason;
      }
      if (!gateOutcome.value.passed) {
        return this.gateRejection(run, gateOutcome.value);
      }
      if (documentsOutcome.status === "rejected") {
        throw documentsOutcome.reason;
      }
      return { kind: "ready", documents: documentsOutcome.value, retrievalQuery: pivotQuery };
    }

    const gateResult = await run.trace.measure("gate", () => gate.check(pivotQuery, run.history, callOptions));
    if (!gateResult.passed) {
      return this.gateRejection(run, gateResult);
    }

    const decision = await run.trace.measure("context", () => this.contextualize(run, pivotQuery));
    if (decision.kind === "rejected") {
      const reason = contextFailureReason(decision);
      logInfo("pipeline.context.rejected", { requestId: run.requestId, languageCode: run.languageCode }, {
        classification: decision.classification
      });
      return {
        kind: "rejected",
        failure: this.failure(run.trace, reason, FAILURE_MESSAGES[reason], run.languageCode)
      };
    }

    const documents = await this.retrieveAndRerank(run, decision.query);
    return { kind: "ready", documents, retrievalQuery: decision.query };
  }

  private gateRejection(run: RunState, result: Extract<GateResult, { passed: false }>): Evidence {
    const reason = result.reason;
    logInfo("pipeline.gate.rejected", { requestId: run.requestId, languageCode: run.languageCode }, {
      reason,
      score: result.score
    });
    return {
      kind: "rejected",
      failure: this.failure(run.trace, reason, FAILURE_MESSAGES[reason], run.languageCode)
    };
  }

  private async retrieveAndRerank(run: RunState, query: string): Promise<Document[]> {
    const { retriever, reranker } = this.dependencies;
    const candidates = await run.trace.measure("retrieve", () =>
      retriever.retrieve({
        query,
        topK: this.dependencies.retrievalTopK,
        signal: run.signal,
        requestId: run.requestId
      })
    );
    return run.trace.measure("rerank", () =>
      reranker.rerank({
        query,
        documents: candidates,
        topK: this.dependencies.rerankTopK,
        signal: run.signal,
        requestId: run.requestId
      })
    );
  }

  /** Falls back to the follow-up heuristic when the rewrite call fails. */
  private async contextualize(run: RunState, pivotQuery: string): Promise<ContextDecision> {
    try {
      return await this.dependencies.contextManager.classifyAndRewrite(run.history, pivotQuery, {
        signal: run.signal,
        requestId: run.requestId
      });
    } catch (error) {
      if (run.signal.aborted) {
        throw error;
      }
      const followUp = detectFollowUp(run.history, pivotQuery);
      const previous = run.history[run.history.length - 1];
      const query = followUp.isFollowUp && previous ? `${previous.query} ${pivotQuery}` : pivotQuery;
      recordErrorRate("context_rewrite_unavailable");
      logWarn("pipeline.context.heuristic_fallback", { requestId: run.requestId, languageCode: run.languageCode }, {
        error: errorText(error),
        follow_up: followUp.isFollowUp,
        confidence: followUp.confidence
      });
      return { kind: "rewritten", query };
    }
  }

  private async translate(run: RunState, text: string, from: string, to: string): Promise<string> {
    try {
      return await this.dependencies.translator.translate(text, from, to, { signal: run.signal });
    } catch (error) {
      if (run.signal.aborted) {
        throw error;
      }
      throw new TranslationError(`Translation from ${from} to ${to} failed: ${errorText(error)}`, { cause: error });
    }
  }

  private async tryFallback(run: RunState, question: string): Promise<WebFallbackResult | null> {
    try {
      return await runWebFallback(
        { searchQuery: run.query, question, signal: run.signal, requestId: run.requestId },
        {
          webSearch: this.dependencies.webSearch,
          orchestrator: this.dependencies.orchestrator,
          faithfulness: this.dependencies.faithfulness
        }
      );
    } catch (error) {
      if (run.signal.aborted) {
        throw error;
      }
      return null;
    }
  }

  private fromCache(run: RunState, cached: CacheEntry): PipelineSuccess {
    return this.success(run, {
      answer: cached.answer,
      citations: cached.citations,
      faithfulness: cached.faithfulness,
      cacheHit: true,
      usedFallback: false
    });
  }

  private success(
    run: RunState,
    outcome: Pick<PipelineSuccess, "answer" | "citations" | "faithfulness" | "cacheHit" | "usedFallback">
  ): PipelineSuccess {
    return {
      success: true,
      ...outcome,
      languageCode: run.languageCode,
      query: run.query,
      turn: createConversationTurn(
        { query: run.originalQuery, answer: outcome.answer, languageCode: run.languageCode },
        this.clock
      ),
      timings: run.trace.snapshot()
    };
  }

  private failure(
    trace: PipelineTrace,
    reason: FailureReason,
    message: string,
    languageCode: string | null,
    error?: string
  ): PipelineFailure {
    return {
      success: false,
      reason,
      message,
      languageCode,
      timings: trace.snapshot(),
      ...(error === undefined ? {} : { error })
    };
  }

  private timeoutFailure(run: RunState): PipelineFailure {
    const reason: unknown = run.signal.reason;
    const error = reason instanceof Error ? reason.message : "Pipeline aborted.";
    logWarn("pipeline.timeout", { requestId: run.requestId, languageCode: run.languageCode }, {
      failed_stage: run.trace.current,
      error
    });
    return this.failure(run.trace, "timeout", FAILURE_MESSAGES.timeout, run.languageCode, error);
  }

  private failureFromError(run: RunState, error: unknown): PipelineFailure {
    if (run.signal.aborted || error instanceof DeadlineExceededError) {
      return this.timeoutFailure(run);
    }

    const reason: ErrorReason =
      error instanceof NoEvidenceError
        ? "no_evidence"
        : error instanceof GenerationError
          ? "generation_error"
          : error instanceof TranslationError
            ? "translation_error"
            : "internal_error";

    recordErrorRate(`pipeline_${reason}`);
    const log = reason === "no_evidence" ? logWarn : logError;
    log("pipeline.error", { requestId: run.requestId, languageCode: run.languageCode }, {
      reason,
      failed_stage: run.trace.current,
      ...serializeError(error)
    });
    return this.failure(run.trace, reason, FAILURE_MESSAGES[reason], run.languageCode, errorText(error));
  }

  private finish(requestId: string, result: PipelineResult): PipelineResult {
    recordPipelineTimings(result.timings);
    recordPipelineOutcome(result.success ? (result.cacheHit ? "cache_hit" : "success") : result.reason);
    logInfo("pipeline.complete", { requestId, languageCode: result.languageCode }, {
      success: result.success,
      outcome: result.success ? "success" : result.reason,
      cache_hit: result.success ? result.cacheHit : false,
      used_fallback: result.success ? result.usedFallback : false,
      faithfulness: result.success ? result.faithfulness : null,
      total_ms: result.timings.total ?? null
    });
    return result;
  }
}
