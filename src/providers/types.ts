export interface CallOptions {
  signal?: AbortSignal;
}

export interface SparseVector {
  indices: number[];
  values: number[];
}

export interface QueryEmbedding {
  dense: number[];
  sparse: SparseVector;
}

export interface Embedder {
  embed(text: string, options?: CallOptions): Promise<QueryEmbedding>;
}

export interface VectorMatch {
  id: string | number;
  score: number;
  payload: Record<string, unknown>;
}

export interface VectorSearchRequest {
  dense: number[];
  sparse: SparseVector;
  topK: number;
}

export interface VectorSearch {
  search(request: VectorSearchRequest, options?: CallOptions): Promise<VectorMatch[]>;
}

export interface RerankScore {
  index: number;
  score: number;
}

export interface RerankService {
  rerank(query: string, texts: string[], options?: CallOptions): Promise<RerankScore[]>;
}

export interface ClassifierLabel {
  label: string;
  score: number;
}

export interface TopicClassifier {
  classify(text: string, options?: CallOptions): Promise<ClassifierLabel[]>;
}

export interface GenerationRequest {
  prompt: string;
  system?: string;
  maxTokens: number;
  temperature: number;
}

export interface TextGenerator {
  generate(request: GenerationRequest, options?: CallOptions): Promise<string>;
}

export interface Translator {
  translate(text: string, from: string, to: string, options?: CallOptions): Promise<string>;
}

export interface WebSearchResult {
  title: string;
  url: string;
  content: string;
}

export interface WebSearch {
  search(query: string, options?: CallOptions): Promise<WebSearchResult[]>;
}
