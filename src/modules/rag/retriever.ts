import { logInfo } from "../../observability/logger.js";
import { recordStageLatency } from "../../observability/metrics.js";
import type { Embedder, QueryEmbedding, VectorMatch, VectorSearch } from "../../providers/types.js";
import { cleanContent } from "./content-cleaner.js";
import type { Document, RetrievalInput } from "./types.js";

export const DEFAULT_RETRIEVAL_TOP_K = 15;
export const DEFAULT_HYBRID_ALPHA = 0.5;
const MIN_CONTENT_LENGTH = 10;
const UNTITLED = "No Title";

export class InvalidHybridWeightError extends Error {
  constructor(alpha: number) {
    super(`Hybrid weight alpha must be within [0, 1], received ${alpha}.`);
    this.name = "InvalidHybridWeightError";
  }
}

export interface RetrieverDependencies {
  embedder: Embedder;
  vectorSearch: VectorSearch;
  alpha?: number;
  topK?: number;
  now?: () => number;
  logInfo?: typeof logInfo;
}

export const assertHybridWeight = (alpha: number): void => {
  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new InvalidHybridWeightError(alpha);
  }
};

/** Dense components are weighted by alpha and sparse values by 1 - alpha. */
export const weightEmbedding = (embedding: QueryEmbedding, alpha: number): QueryEmbedding => ({
  dense: embedding.dense.map((value) => value * alpha),
  sparse: {
    indices: [...embedding.sparse.indices],
    values: embedding.sparse.values.map((value) => value * (1 - alpha))
  }
});

const readString = (payload: Record<string, unknown>, key: string): string | undefined => {
  const value = payload[key];
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
};

const readUrl = (payload: Record<string, unknown>): string => {
  const value = payload.url;
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    const entries: unknown[] = value;
    const first = entries.find((entry): entry is string => typeof entry === "string");
    return first ?? "";
  }
  return "";
};

const readKeywords = (payload: Record<string, unknown>): string[] => {
  const keywords: string[] = [];
  for (const key of ["doc_keywords", "segment_keywords", "keywords"]) {
    const value = payload[key];
    if (!Array.isArray(value)) {
      continue;
    }
    const entries: unknown[] = value;
    for (const entry of entries) {
      if (typeof entry === "string" && !keywords.includes(entry)) {
        keywords.push(entry);
      }
    }
  }
  return keywords;
};

/**
 * Turns index matches into documents: the first match per title wins, content
 * is cleaned, near-empty documents are dropped, and the rest are ordered by
 * score, highest first.
 */
export const toDocuments = (matches: readonly VectorMatch[]): Document[] => {
  const seenTitles = new Set<string>();
  const documents: Document[] = [];

  for (const match of matches) {
    const title = readString(match.payload, "title") ?? UNTITLED;
    if (seenTitles.has(title)) {
      continue;
    }

    const rawContent =
      readString(match.payload, "chunk_text") ??
      readString(match.payload, "content") ??
      readString(match.payload, "text");
    if (!rawContent) {
      continue;
    }

    const content = cleanContent(rawContent);
    if (content.length < MIN_CONTENT_LENGTH) {
      continue;
    }

    seenTitles.add(title);
    documents.push(
      Object.freeze({
        title,
        content,
        url: readUrl(match.payload),
        score: match.score,
        keywords: Object.freeze(readKeywords(match.payload))
      })
    );
  }

  return documents.sort((left, right) => right.score - left.score);
};

export class HybridRetriever {
  private readonly alpha: number;
  private readonly topK: number;
  private readonly now: () => number;
  private readonly log: typeof logInfo;

  constructor(private readonly dependencies: RetrieverDependencies) {
    this.alpha = dependencies.alpha ?? DEFAULT_HYBRID_ALPHA;
    this.topK = dependencies.topK ?? DEFAULT_RETRIEVAL_TOP_K;
    this.now = dependencies.now ?? Date.now;
    this.log = dependencies.logInfo ?? logInfo;
  }

  async retrieve(input: RetrievalInput): Promise<Document[]> {
    assertHybridWeight(this.alpha);
    const topK = Math.max(1, input.topK ?? this.topK);
    const startedAt = this.now();

    const embedding = await this.dependencies.embedder.embed(input.query, { signal: input.signal });
    const weighted = weightEmbedding(embedding, this.alpha);
    const matches = await this.dependencies.vectorSearch.search(
      { dense: weighted.dense, sparse: weighted.sparse, topK },
      { signal: input.signal }
    );
    const documents = toDocuments(matches);

    const latencyMs = this.now() - startedAt;
    recordStageLatency("retrieval.search", latencyMs);
    this.log(
      "rag.retrieve.complete",
      { requestId: input.requestId ?? null, stage: "retrieve" },
      {
        alpha: this.alpha,
        top_k: topK,
        match_count: matches.length,
        document_count: documents.length,
        latency_ms: latencyMs
      }
    );

    return documents;
  }
}
