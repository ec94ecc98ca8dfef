import { afterEach, beforeEach, vi } from "vitest";

process.env.LOG_LEVEL ??= "error";

const ENV_SNAPSHOT = { ...process.env };

beforeEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

afterEach(async () => {
  for (const key of Object.keys(process.env)) {
    if (!(key in ENV_SNAPSHOT)) {
      delete process.env[key];
    }
  }

  for (const [key, value] of Object.entries(ENV_SNAPSHOT)) {
    process.env[key] = value;
  }

  // Modules mocked out by a test file have no reset hook; those resets are skipped.
  await Promise.allSettled([
    import("../../src/clients/openai.js").then((m) => m.resetOpenAIClientForTests?.()),
    import("../../src/clients/qdrant.js").then((m) => m.resetQdrantClientForTests?.()),
    import("../../src/clients/redis.js").then((m) => m.resetRedisClientForTests?.()),
    import("../../src/config/index.js").then((m) => m.resetConfigForTests?.()),
    import("../../src/observability/metrics.js").then((m) => m.resetMetrics?.()),
    import("../../src/api/routes/query.js").then((m) => m.resetQueryControllerForTests?.()),
    import("../../src/clients/lifecycle.js").then((m) => m.resetClientLifecycleStateForTests?.())
  ]);
});
