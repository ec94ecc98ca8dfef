import type { Config } from "../../config/index.js";
import { HttpTopicClassifier } from "../../providers/http-classifier.js";
import { HttpRerankService } from "../../providers/http-reranker.js";
import { LlmTranslator } from "../../providers/llm-translator.js";
import { OpenAIEmbedder } from "../../providers/openai-embedding.js";
import { OpenAITextGenerator } from "../../providers/openai-generation.js";
import { ClassifierChain, type NamedClassifier } from "../../providers/provider-chain.js";
import { QdrantVectorSearch } from "../../providers/qdrant-search.js";
import { TavilyWebSearch } from "../../providers/tavily-search.js";
import { ResponseCache, type CacheBackend } from "../cache/response-cache.js";
import { ConversationContextManager } from "../conversation/context-manager.js";
import { FaithfulnessGate } from "../faithfulness/faithfulness-gate.js";
import { GenerationOrchestrator } from "../generation/generation-orchestrator.js";
import { TopicGate, loadTopicExemplars } from "../guard/topic-gate.js";
import { Reranker } from "../rag/reranker.js";
import { HybridRetriever } from "../rag/retriever.js";
import { loadLanguageTable } from "./language.js";
import { PipelineController } from "./pipeline-controller.js";

export interface CreatePipelineOptions {
  cacheBackend?: CacheBackend;
}

export function createPipelineController(config: Config, options: CreatePipelineOptions = {}): PipelineController {
  const timeoutMs = config.EXTERNAL_CALL_TIMEOUT_MS;

  const embedder = new OpenAIEmbedder({ model: config.OPENAI_EMBEDDING_MODEL, timeoutMs });
  const generator = new OpenAITextGenerator({ model: config.OPENAI_MODEL, timeoutMs });
  const rerankService = new HttpRerankService({ baseUrl: config.RERANKER_URL, timeoutMs });

  const classifiers: NamedClassifier[] = [
    { name: "primary", classifier: new HttpTopicClassifier({ baseUrl: config.CLASSIFIER_URL, timeoutMs }) }
  ];
  if (config.CLASSIFIER_FALLBACK_URL) {
    classifiers.push({
      name: "fallback",
      classifier: new HttpTopicClassifier({ baseUrl: config.CLASSIFIER_FALLBACK_URL, timeoutMs })
    });
  }

  const orchestrator = new GenerationOrchestrator({
    generator,
    maxTokens: config.GENERATION_MAX_TOKENS,
    temperature: config.GENERATION_TEMPERATURE
  });

  return new PipelineController({
    cache: new ResponseCache({ backend: options.cacheBackend, ttlSeconds: config.CACHE_TTL_SECONDS, timeoutMs }),
    translator: new LlmTranslator(generator),
    gate: new TopicGate({
      classifier: new ClassifierChain(classifiers),
      ...(config.SEMANTIC_GATE_ENABLED ? { embedder, exemplars: loadTopicExemplars() } : {})
    }),
    contextManager: new ConversationContextManager({ generator }),
    retriever: new HybridRetriever({
      embedder,
      vectorSearch: new QdrantVectorSearch({ collection: config.QDRANT_COLLECTION, timeoutMs }),
      alpha: config.HYBRID_ALPHA,
      topK: config.RETRIEVAL_TOP_K
    }),
    reranker: new Reranker({ service: rerankService, topK: config.RERANK_TOP_K }),
    orchestrator,
    faithfulness: new FaithfulnessGate(rerankService),
    webSearch: new TavilyWebSearch({
      baseUrl: config.WEB_SEARCH_URL,
      apiKey: config.WEB_SEARCH_API_KEY,
      timeoutMs
    }),
    fallbackThreshold: config.FAITHFULNESS_FALLBACK_THRESHOLD,
    retrievalTopK: config.RETRIEVAL_TOP_K,
    rerankTopK: config.RERANK_TOP_K,
    deadlineMs: config.PIPELINE_DEADLINE_MS,
    languages: loadLanguageTable()
  });
}
