import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: (candidate: string) => boolean;
  readFileSync?: (candidate: string, encoding: "utf8") => string;
}

/**
 * Loads `.env.<mode>` from the working directory without overriding variables
 * already present in the process environment.
 */
export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? ((candidate: string, encoding: "utf8") => fs.readFileSync(candidate, encoding));
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }
  return envFilePath;
}

const MAX_EXTERNAL_CALL_TIMEOUT_MS = 300_000;

const runtimeModeSchema = z.enum(["prod", "local"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));
const ratioSchema = z.coerce.number().min(0).max(1);

export const envSchema = z.object({
  APP_MODE: runtimeModeSchema.default("prod"),
  PORT: z.coerce.number().int().positive().default(3000),
  FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  QDRANT_URL: z.string().min(1, "QDRANT_URL is required"),
  QDRANT_API_KEY: optionalString,
  QDRANT_COLLECTION: z.string().min(1, "QDRANT_COLLECTION is required"),
  REDIS_URL: optionalString,
  RERANKER_URL: z.string().url("RERANKER_URL must be a URL"),
  CLASSIFIER_URL: z.string().url("CLASSIFIER_URL must be a URL"),
  CLASSIFIER_FALLBACK_URL: optionalString,
  WEB_SEARCH_URL: z.string().url().default("https://api.tavily.com"),
  WEB_SEARCH_API_KEY: optionalString,
  HYBRID_ALPHA: ratioSchema.default(0.5),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(15),
  RERANK_TOP_K: z.coerce.number().int().positive().default(5),
  FAITHFULNESS_FALLBACK_THRESHOLD: ratioSchema.default(0.1),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  EXTERNAL_CALL_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_EXTERNAL_CALL_TIMEOUT_MS, "EXTERNAL_CALL_TIMEOUT_MS cannot exceed 300000")
    .default(MAX_EXTERNAL_CALL_TIMEOUT_MS),
  PIPELINE_DEADLINE_MS: z.coerce.number().int().positive().optional(),
  GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  SEMANTIC_GATE_ENABLED: booleanFlagSchema.default(true)
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}
