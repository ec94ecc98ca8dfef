import { z } from "zod";
import { withRetries, withTimeout } from "../../clients/call-policy.js";
import { getRedisClient, shutdownRedisClient, type RedisSingleton } from "../../clients/redis.js";
import { logDebug, logWarn } from "../../observability/logger.js";
import { recordCacheEvent } from "../../observability/metrics.js";
import { normalizeQuery } from "../pipeline/query.js";
import type { Citation } from "../rag/types.js";

export const DEFAULT_CACHE_TTL_SECONDS = 3600;

export interface CacheEntry {
  answer: string;
  citations: Citation[];
  faithfulness: number;
  metadata: {
    cachedAt: string;
    languageCode: string;
    processingTimeMs: number;
    requiredTranslation: boolean;
  };
}

const cacheEntrySchema = z.object({
  answer: z.string(),
  citations: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      content: z.string(),
      snippet: z.string()
    })
  ),
  faithfulness: z.number(),
  metadata: z.object({
    cachedAt: z.string(),
    languageCode: z.string(),
    processingTimeMs: z.number(),
    requiredTranslation: z.boolean()
  })
});

/** Key-value store with expiring string values. */
export interface CacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  close(): Promise<void>;
}

export class CacheUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CacheUnavailableError";
  }
}

export class RedisCacheBackend implements CacheBackend {
  constructor(
    private readonly getClient: () => Promise<RedisSingleton> = getRedisClient,
    private readonly shutdown: () => Promise<void> = shutdownRedisClient
  ) {}

  private async openClient(): Promise<NonNullable<RedisSingleton["client"]>> {
    const { client } = await this.getClient();
    if (!client) {
      throw new CacheUnavailableError("Redis is not configured.");
    }
    if (client.status === "end") {
      throw new CacheUnavailableError("Redis connection is closed.");
    }
    return client;
  }

  async get(key: string): Promise<string | null> {
    const client = await this.openClient();
    return client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = await this.openClient();
    await client.set(key, value, "EX", ttlSeconds);
  }

  async close(): Promise<void> {
    await this.shutdown();
  }
}

export const buildCacheKey = (languageCode: string, query: string): string =>
  `${languageCode}:${normalizeQuery(query)}`;

export interface ResponseCacheOptions {
  backend?: CacheBackend;
  ttlSeconds?: number;
  timeoutMs: number;
  retryDelayMs?: number;
}

export interface CacheCallContext {
  signal?: AbortSignal;
  requestId?: string;
}

/**
 * Best-effort answer cache keyed by language and normalized query. Backend
 * failures read as misses and skipped writes; nothing here throws.
 */
export class ResponseCache {
  private readonly backend: CacheBackend;
  private readonly ttlSeconds: number;

  constructor(private readonly options: ResponseCacheOptions) {
    this.backend = options.backend ?? new RedisCacheBackend();
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
  }

  async get(languageCode: string, query: string, context: CacheCallContext = {}): Promise<CacheEntry | null> {
    const key = buildCacheKey(languageCode, query);
    let raw: string | null;
    try {
      raw = await withRetries(
        () => withTimeout(() => this.backend.get(key), this.options.timeoutMs, context.signal),
        {
          signal: context.signal,
          delayMs: this.options.retryDelayMs,
          isRetryable: (error) => !(error instanceof CacheUnavailableError)
        }
      );
    } catch (error) {
      recordCacheEvent("error");
      logWarn("cache.get.failed", { requestId: context.requestId, languageCode }, {
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }

    if (raw === null) {
      recordCacheEvent("miss");
      return null;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      recordCacheEvent("error");
      logWarn("cache.get.corrupt", { requestId: context.requestId, languageCode }, {
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }

    const parsed = cacheEntrySchema.safeParse(payload);
    if (!parsed.success) {
      recordCacheEvent("error");
      logWarn("cache.get.corrupt", { requestId: context.requestId, languageCode }, { error: parsed.error.message });
      return null;
    }

    recordCacheEvent("hit");
    logDebug("cache.get.hit", { requestId: context.requestId, languageCode }, { key });
    return parsed.data;
  }

  async set(
    languageCode: string,
    query: string,
    entry: CacheEntry,
    context: CacheCallContext = {}
  ): Promise<boolean> {
    const key = buildCacheKey(languageCode, query);
    try {
      await withTimeout(
        () => this.backend.set(key, JSON.stringify(entry), this.ttlSeconds),
        this.options.timeoutMs,
        context.signal
      );
      recordCacheEvent("write");
      return true;
    } catch (error) {
      recordCacheEvent("error");
      logWarn("cache.set.failed", { requestId: context.requestId, languageCode }, {
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.backend.close();
  }
}
