import { describe, expect, it, vi } from "vitest";
import { reconnectDelay, type RedisSingleton } from "../../src/clients/redis.js";
import {
  CacheUnavailableError,
  RedisCacheBackend,
  ResponseCache,
  buildCacheKey,
  type CacheEntry
} from "../../src/modules/cache/response-cache.js";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";
import { InMemoryCacheBackend } from "../helpers/in-memory-cache-backend.js";

const makeEntry = (): CacheEntry => ({
  answer: "Sea levels rise because of thermal expansion and melting ice.",
  citations: [
    {
      title: "Sea level",
      url: "https://example.org/sea-level",
      content: "Thermal expansion explains about half of the rise.",
      snippet: "Thermal expansion explains about half of the rise."
    }
  ],
  faithfulness: 0.72,
  metadata: {
    cachedAt: "2024-03-01T10:00:00.000Z",
    languageCode: "en",
    processingTimeMs: 1840,
    requiredTranslation: false
  }
});

describe("modules/cache/response-cache", () => {
  it("keys entries by language and normalized query", () => {
    expect(buildCacheKey("es", "  ¿Por qué SUBE el mar?  ")).toBe("es:¿por qué sube el mar?");
  });

  it("round-trips an entry and treats casing and padding as the same query", async () => {
    const backend = new InMemoryCacheBackend();
    const cache = new ResponseCache({ backend, timeoutMs: 1000 });

    await expect(cache.set("en", "Why are sea levels rising?", makeEntry())).resolves.toBe(true);
    await expect(cache.get("en", "  why are SEA levels rising?")).resolves.toEqual(makeEntry());
    await expect(cache.get("fr", "why are sea levels rising?")).resolves.toBeNull();

    expect(getMetricsSnapshot().cache).toEqual({ hits: 1, misses: 1, writes: 1, errors: 0 });
  });

  it("expires entries after the ttl", async () => {
    let now = 1_000_000;
    const backend = new InMemoryCacheBackend(() => now);
    const cache = new ResponseCache({ backend, ttlSeconds: 60, timeoutMs: 1000 });

    await cache.set("en", "what is albedo?", makeEntry());
    now += 59_000;
    await expect(cache.get("en", "what is albedo?")).resolves.not.toBeNull();
    now += 1_000;
    await expect(cache.get("en", "what is albedo?")).resolves.toBeNull();
  });

  it("reads corrupt payloads as misses", async () => {
    const backend = new InMemoryCacheBackend();
    const cache = new ResponseCache({ backend, timeoutMs: 1000 });
    await backend.set("en:what is albedo?", "{not json", 60);
    await backend.set("en:what is a carbon sink?", JSON.stringify({ answer: 42 }), 60);

    await expect(cache.get("en", "what is albedo?")).resolves.toBeNull();
    await expect(cache.get("en", "what is a carbon sink?")).resolves.toBeNull();
    expect(getMetricsSnapshot().cache).toEqual({ hits: 0, misses: 0, writes: 0, errors: 2 });
  });

  it("retries transient read failures and never throws", async () => {
    const backend = new InMemoryCacheBackend();
    const get = vi.spyOn(backend, "get").mockRejectedValue(new Error("ECONNRESET"));
    const cache = new ResponseCache({ backend, timeoutMs: 1000, retryDelayMs: 0 });

    await expect(cache.get("en", "what is albedo?")).resolves.toBeNull();
    expect(get).toHaveBeenCalledTimes(3);
  });

  it("does not retry when the cache is unavailable and skips writes", async () => {
    const backend = new InMemoryCacheBackend();
    backend.failure = new CacheUnavailableError("Redis is not configured.");
    const get = vi.spyOn(backend, "get");
    const cache = new ResponseCache({ backend, timeoutMs: 1000, retryDelayMs: 0 });

    await expect(cache.get("en", "what is albedo?")).resolves.toBeNull();
    await expect(cache.set("en", "what is albedo?", makeEntry())).resolves.toBe(false);
    expect(get).toHaveBeenCalledTimes(1);
    expect(getMetricsSnapshot().cache).toEqual({ hits: 0, misses: 0, writes: 0, errors: 2 });
  });

  it("reports a missing redis client as unavailable", async () => {
    const disabled: RedisSingleton = {
      client: null,
      healthCheck: async () => ({ status: "ok", details: "cache disabled" })
    };
    const shutdown = vi.fn().mockResolvedValue(undefined);
    const backend = new RedisCacheBackend(async () => disabled, shutdown);

    await expect(backend.get("en:what is albedo?")).rejects.toThrowError("Redis is not configured.");
    await expect(backend.set("en:what is albedo?", "{}", 60)).rejects.toBeInstanceOf(CacheUnavailableError);
    await backend.close();
    expect(shutdown).toHaveBeenCalledTimes(1);
  });
  it("serves again once the backend recovers from an outage", async () => {
    const backend = new InMemoryCacheBackend();
    const cache = new ResponseCache({ backend, timeoutMs: 1000, retryDelayMs: 0 });
    backend.failure = new Error("connect ECONNREFUSED");

    await expect(cache.set("en", "what is albedo?", makeEntry())).resolves.toBe(false);
    await expect(cache.get("en", "what is albedo?")).resolves.toBeNull();

    backend.failure = null;
    await expect(cache.set("en", "what is albedo?", makeEntry())).resolves.toBe(true);
    await expect(cache.get("en", "what is albedo?")).resolves.toEqual(makeEntry());
    expect(getMetricsSnapshot().cache).toEqual({ hits: 1, misses: 0, writes: 1, errors: 2 });
  });

  it("keeps reconnecting to redis with a capped delay", () => {
    expect(reconnectDelay(1)).toBe(200);
    expect(reconnectDelay(4)).toBe(800);
    expect(reconnectDelay(10)).toBe(2000);
    expect(reconnectDelay(500)).toBe(2000);
  });
});
