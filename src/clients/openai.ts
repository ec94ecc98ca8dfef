import OpenAI from "openai";
import { getConfig } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { withTimeout } from "./call-policy.js";

export type HealthStatus = "ok" | "error";

export interface ClientHealth {
  status: HealthStatus;
  details?: string;
}

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<ClientHealth>;
}

const HEALTH_CHECK_TIMEOUT_MS = 7000;

let singleton: OpenAISingleton | null = null;

function initialize(): OpenAISingleton {
  const config = getConfig();
  // Retries are owned by the call policy: generation is never retried.
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: 0,
    timeout: config.EXTERNAL_CALL_TIMEOUT_MS
  });

  logInfo("clients.openai.initialized", {}, { model: config.OPENAI_MODEL });

  return {
    client,
    async healthCheck() {
      try {
        await withTimeout(async (signal) => {
          await client.models.retrieve(config.OPENAI_MODEL, { signal });
        }, HEALTH_CHECK_TIMEOUT_MS);
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  logInfo("clients.openai.shutdown", {});
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
