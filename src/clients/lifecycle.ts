import type { FastifyInstance } from "fastify";
import { logError, logInfo } from "../observability/logger.js";
import type { ClientHealth } from "./openai.js";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<ClientHealth> };

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
  getQdrantClient: () => Promise<HealthCheckedClient>;
  shutdownQdrantClient: () => Promise<void>;
  getRedisClient: () => Promise<HealthCheckedClient>;
  shutdownRedisClient: () => Promise<void>;
}

export async function loadClientModules(): Promise<ClientLifecycleModules> {
  const [openaiModule, qdrantModule, redisModule] = await Promise.all([
    import("./openai.js"),
    import("./qdrant.js"),
    import("./redis.js")
  ]);

  return {
    getOpenAIClient: openaiModule.getOpenAIClient,
    shutdownOpenAIClient: openaiModule.shutdownOpenAIClient,
    getQdrantClient: qdrantModule.getQdrantClient,
    shutdownQdrantClient: qdrantModule.shutdownQdrantClient,
    getRedisClient: redisModule.getRedisClient,
    shutdownRedisClient: redisModule.shutdownRedisClient
  };
}

export interface InfrastructureHealth {
  openai: ClientHealth;
  qdrant: ClientHealth;
  redis: ClientHealth;
}

export async function checkInfrastructureHealth(
  load: () => Promise<ClientLifecycleModules> = loadClientModules
): Promise<InfrastructureHealth> {
  const clients = await load();
  const [openai, qdrant, redis] = await Promise.all([
    clients.getOpenAIClient().then((client) => client.healthCheck()),
    clients.getQdrantClient().then((client) => client.healthCheck()),
    clients.getRedisClient().then((client) => client.healthCheck())
  ]);
  return { openai, qdrant, redis };
}

async function shutdownAllClients(origin: string, load: () => Promise<ClientLifecycleModules>): Promise<void> {
  const clients = await load();
  logInfo("clients.lifecycle.shutdown", {}, { origin });
  const results = await Promise.allSettled([
    clients.shutdownQdrantClient(),
    clients.shutdownOpenAIClient(),
    clients.shutdownRedisClient()
  ]);
  for (const result of results) {
    if (result.status === "rejected") {
      logError("clients.lifecycle.shutdown_failed", {}, { origin, error: String(result.reason) });
    }
  }
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  loadClientModules?: () => Promise<ClientLifecycleModules>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => void;
}

export function registerClientLifecycle(app: FastifyInstance, options?: ClientLifecycleOptions): void {
  const enableBootstrap = options?.enableBootstrap ?? process.env.ENABLE_INFRA_BOOTSTRAP === "true";
  const load = options?.loadClientModules ?? loadClientModules;
  const shouldRegisterProcessSignals = options?.registerProcessSignals ?? true;
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  app.addHook("onClose", async () => {
    await shutdownAllClients("onClose", load);
  });

  if (!enableBootstrap) {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    return;
  }

  app.addHook("onReady", async () => {
    const health = await checkInfrastructureHealth(load);
    logInfo("clients.lifecycle.ready", {}, {
      openai: health.openai.status,
      qdrant: health.qdrant.status,
      redis: health.redis.status
    });
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      logInfo("clients.lifecycle.signal", {}, { signal });
      await shutdownAllClients("process", load);
      exit(0);
    };

    const onSignal = (signal: NodeJS.Signals): void => {
      handleSignal(signal).catch((error: unknown) => {
        logError("clients.lifecycle.signal_failed", {}, { signal, error: String(error) });
        exit(1);
      });
    };

    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
