import { Redis } from "ioredis";
import { getConfig } from "../config/index.js";
import { logInfo, logWarn } from "../observability/logger.js";
import type { ClientHealth } from "./openai.js";

export interface RedisSingleton {
  client: Redis | null;
  healthCheck: () => Promise<ClientHealth>;
}

const MAX_RETRIES_PER_REQUEST = 1;
const RECONNECT_STEP_MS = 200;
const MAX_RECONNECT_DELAY_MS = 2000;

let singleton: RedisSingleton | null = null;

/** Reconnect delay for ioredis: linear backoff capped at two seconds, never giving up. */
export const reconnectDelay = (attempt: number): number =>
  Math.min(Math.max(1, attempt) * RECONNECT_STEP_MS, MAX_RECONNECT_DELAY_MS);

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

function initialize(): RedisSingleton {
  const { REDIS_URL } = getConfig();
  if (!REDIS_URL) {
    logInfo("clients.redis.skipped", {}, { reason: "REDIS_URL not set" });
    return {
      client: null,
      async healthCheck() {
        return { status: "ok", details: "cache disabled" };
      }
    };
  }

  const client = new Redis(REDIS_URL, {
    maxRetriesPerRequest: MAX_RETRIES_PER_REQUEST,
    retryStrategy: reconnectDelay
  });

  client.on("error", (error: Error) => {
    logWarn("clients.redis.error", {}, { error: describeError(error) });
  });

  logInfo("clients.redis.initialized", {});

  return {
    client,
    async healthCheck() {
      try {
        await client.ping();
        return { status: "ok" };
      } catch (error) {
        return { status: "error", details: describeError(error) };
      }
    }
  };
}

export async function getRedisClient(): Promise<RedisSingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownRedisClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  const { client } = singleton;
  singleton = null;
  if (client) {
    try {
      await client.quit();
    } catch (error) {
      logWarn("clients.redis.quit_failed", {}, { error: describeError(error) });
      client.disconnect();
    }
  }
  logInfo("clients.redis.shutdown", {});
}

export function resetRedisClientForTests(): void {
  singleton = null;
}
