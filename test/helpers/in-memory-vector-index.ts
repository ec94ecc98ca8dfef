import type { SparseVector, VectorMatch, VectorSearch, VectorSearchRequest } from "../../src/providers/types.js";

export interface IndexedPoint {
  id: string | number;
  dense: number[];
  sparse: SparseVector;
  payload: Record<string, unknown>;
}

const denseDot = (left: readonly number[], right: readonly number[]): number =>
  left.reduce((sum, value, index) => sum + value * (right[index] ?? 0), 0);

const sparseDot = (left: SparseVector, right: SparseVector): number => {
  const weights = new Map<number, number>();
  left.indices.forEach((index, position) => weights.set(index, left.values[position] ?? 0));
  return right.indices.reduce(
    (sum, index, position) => sum + (weights.get(index) ?? 0) * (right.values[position] ?? 0),
    0
  );
};

/** Exhaustive dot-product search over both arms; scores are summed like the batched Qdrant query. */
export class InMemoryVectorIndex implements VectorSearch {
  readonly requests: VectorSearchRequest[] = [];

  constructor(private readonly points: IndexedPoint[]) {}

  async search(request: VectorSearchRequest): Promise<VectorMatch[]> {
    this.requests.push(request);
    return this.points
      .map((point) => ({
        id: point.id,
        score: denseDot(request.dense, point.dense) + sparseDot(request.sparse, point.sparse),
        payload: point.payload
      }))
      .sort((left, right) => right.score - left.score)
      .slice(0, request.topK);
  }
}
