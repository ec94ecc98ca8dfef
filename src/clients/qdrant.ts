import { QdrantClient } from "@qdrant/js-client-rest";
import { getConfig } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { withRetries } from "./call-policy.js";
import type { ClientHealth } from "./openai.js";

export interface QdrantSingleton {
  client: QdrantClient;
  healthCheck: () => Promise<ClientHealth>;
}

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

async function initialize(): Promise<QdrantSingleton> {
  const config = getConfig();
  const client = new QdrantClient({
    url: config.QDRANT_URL,
    apiKey: config.QDRANT_API_KEY,
    timeout: config.EXTERNAL_CALL_TIMEOUT_MS
  });

  await withRetries(async () => {
    await client.getCollections();
  });

  logInfo("clients.qdrant.initialized", {}, { collection: config.QDRANT_COLLECTION });

  return {
    client,
    async healthCheck() {
      try {
        const { exists } = await client.collectionExists(config.QDRANT_COLLECTION);
        return exists
          ? { status: "ok" }
          : { status: "error", details: `collection ${config.QDRANT_COLLECTION} not found` };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize();
  }

  try {
    singleton = await initPromise;
  } catch (error) {
    initPromise = null;
    throw error;
  }
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  logInfo("clients.qdrant.shutdown", {});
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
