import { getQdrantClient } from "../clients/qdrant.js";
import { withRetries, withTimeout } from "../clients/call-policy.js";
import type { CallOptions, SparseVector, VectorMatch, VectorSearch, VectorSearchRequest } from "./types.js";

export const DENSE_VECTOR_NAME = "dense";
export const SPARSE_VECTOR_NAME = "sparse";

export type QdrantNamedVector =
  | { name: string; vector: number[] }
  | { name: string; vector: SparseVector };

export interface QdrantSearchRequest {
  vector: QdrantNamedVector;
  limit: number;
  with_payload: boolean;
}

export interface QdrantScoredPoint {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

/** The slice of the Qdrant REST client used for hybrid search. */
export interface QdrantSearchPort {
  searchBatch(collectionName: string, request: { searches: QdrantSearchRequest[] }): Promise<QdrantScoredPoint[][]>;
}

export interface QdrantVectorSearchOptions {
  collection: string;
  timeoutMs: number;
  retryDelayMs?: number;
  getClient?: () => Promise<QdrantSearchPort>;
}

const getDefaultClient = async (): Promise<QdrantSearchPort> => (await getQdrantClient()).client;

const isZeroVector = (values: number[]): boolean => values.every((value) => value === 0);

/**
 * Builds the dense and sparse searches for one batch. A search whose
 * (already weighted) vector carries no signal is left out.
 */
export const buildHybridSearches = (request: VectorSearchRequest): QdrantSearchRequest[] => {
  const searches: QdrantSearchRequest[] = [];
  if (request.dense.length > 0 && !isZeroVector(request.dense)) {
    searches.push({
      vector: { name: DENSE_VECTOR_NAME, vector: request.dense },
      limit: request.topK,
      with_payload: true
    });
  }
  if (request.sparse.indices.length > 0 && !isZeroVector(request.sparse.values)) {
    searches.push({
      vector: { name: SPARSE_VECTOR_NAME, vector: request.sparse },
      limit: request.topK,
      with_payload: true
    });
  }
  return searches;
};

/** Sums the scores each point earned across searches and keeps the best `topK`. */
export const mergeBatchResults = (batches: QdrantScoredPoint[][], topK: number): VectorMatch[] => {
  const merged = new Map<string, VectorMatch>();
  for (const points of batches) {
    for (const point of points) {
      const key = String(point.id);
      const existing = merged.get(key);
      if (existing) {
        existing.score += point.score;
        continue;
      }
      merged.set(key, { id: point.id, score: point.score, payload: point.payload ?? {} });
    }
  }
  return [...merged.values()].sort((left, right) => right.score - left.score).slice(0, topK);
};

export class QdrantVectorSearch implements VectorSearch {
  private readonly getClient: () => Promise<QdrantSearchPort>;

  constructor(private readonly options: QdrantVectorSearchOptions) {
    this.getClient = options.getClient ?? getDefaultClient;
  }

  async search(request: VectorSearchRequest, callOptions?: CallOptions): Promise<VectorMatch[]> {
    const searches = buildHybridSearches(request);
    if (searches.length === 0) {
      return [];
    }

    const client = await this.getClient();
    const batches = await withRetries(
      () =>
        withTimeout(
          () => client.searchBatch(this.options.collection, { searches }),
          this.options.timeoutMs,
          callOptions?.signal
        ),
      { signal: callOptions?.signal, delayMs: this.options.retryDelayMs }
    );

    return mergeBatchResults(batches, request.topK);
  }
}
