export type Document = Readonly<{
  title: string;
  content: string;
  url: string;
  score: number;
  keywords: readonly string[];
}>;

export type Citation = {
  title: string;
  url: string;
  content: string;
  snippet: string;
};

export type RetrievalInput = {
  query: string;
  topK?: number;
  signal?: AbortSignal;
  requestId?: string;
};

export type RerankInput = {
  query: string;
  documents: readonly Document[];
  topK?: number;
  signal?: AbortSignal;
  requestId?: string;
};
