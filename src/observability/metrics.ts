import type { FastifyInstance } from "fastify";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface OpenAIUsageSummary {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  stageLatency: Record<string, LatencySummary>;
  openAIUsage: OpenAIUsageSummary;
  cache: { hits: number; misses: number; writes: number; errors: number };
  outcomes: Record<string, number>;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createState = (): MetricsState => ({
  requestLatency: createLatencySummary(),
  stageLatency: {},
  openAIUsage: {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0
  },
  cache: { hits: 0, misses: 0, writes: 0, errors: 0 },
  outcomes: {},
  errorRates: {}
});

let state: MetricsState = createState();

const REQUEST_START_TIME = Symbol("request_start_time");

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordStageLatency = (stage: string, durationMs: number): void => {
  const summary = state.stageLatency[stage] ?? createLatencySummary();
  state.stageLatency[stage] = summary;
  recordLatency(summary, durationMs);
};

export const recordPipelineTimings = (timings: Readonly<Record<string, number>>): void => {
  for (const [stage, durationMs] of Object.entries(timings)) {
    recordStageLatency(stage, durationMs);
  }
};

export const recordOpenAIUsage = (usage: {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}): void => {
  state.openAIUsage.promptTokens += usage.promptTokens ?? 0;
  state.openAIUsage.completionTokens += usage.completionTokens ?? 0;
  state.openAIUsage.totalTokens += usage.totalTokens ?? 0;
};

export const recordCacheEvent = (event: "hit" | "miss" | "write" | "error"): void => {
  if (event === "hit") {
    state.cache.hits += 1;
  } else if (event === "miss") {
    state.cache.misses += 1;
  } else if (event === "write") {
    state.cache.writes += 1;
  } else {
    state.cache.errors += 1;
  }
};

export const recordPipelineOutcome = (outcome: string): void => {
  state.outcomes[outcome] = (state.outcomes[outcome] ?? 0) + 1;
};

export const recordErrorRate = (key: string): void => {
  state.errorRates[key] = (state.errorRates[key] ?? 0) + 1;
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  request_latency: serializeLatency(state.requestLatency),
  stage_latency: Object.fromEntries(
    Object.entries(state.stageLatency).map(([stage, summary]) => [stage, serializeLatency(summary)])
  ),
  openai_usage: state.openAIUsage,
  cache: state.cache,
  outcomes: state.outcomes,
  error_rates: state.errorRates
});

export const resetMetrics = (): void => {
  state = createState();
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request, reply) => {
    Reflect.set(request, REQUEST_START_TIME, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    const startedAt: unknown = Reflect.get(request, REQUEST_START_TIME);
    recordRequestLatency(Date.now() - (typeof startedAt === "number" ? startedAt : Date.now()));
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
