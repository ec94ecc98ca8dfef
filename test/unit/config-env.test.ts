import { describe, expect, it } from "vitest";
import { loadModeEnvFile, parseDotEnvLine, parseEnv } from "../../src/config/index.js";

const REQUIRED_ENV = {
  OPENAI_API_KEY: "test-secret",
  QDRANT_URL: "http://qdrant.local:6333",
  QDRANT_COLLECTION: "climate",
  RERANKER_URL: "http://reranker.local",
  CLASSIFIER_URL: "http://classifier.local"
};

describe("config/env", () => {
  it("applies defaults for optional settings", () => {
    const env = parseEnv({ ...REQUIRED_ENV });

    expect(env.APP_MODE).toBe("prod");
    expect(env.PORT).toBe(3000);
    expect(env.HYBRID_ALPHA).toBe(0.5);
    expect(env.RETRIEVAL_TOP_K).toBe(15);
    expect(env.RERANK_TOP_K).toBe(5);
    expect(env.FAITHFULNESS_FALLBACK_THRESHOLD).toBe(0.1);
    expect(env.CACHE_TTL_SECONDS).toBe(3600);
    expect(env.SEMANTIC_GATE_ENABLED).toBe(true);
    expect(env.REDIS_URL).toBeUndefined();
    expect(env.PIPELINE_DEADLINE_MS).toBeUndefined();
  });

  it("coerces numbers and flags and blanks out empty optional strings", () => {
    const env = parseEnv({
      ...REQUIRED_ENV,
      HYBRID_ALPHA: "0.25",
      PIPELINE_DEADLINE_MS: "20000",
      SEMANTIC_GATE_ENABLED: "off",
      REDIS_URL: "   ",
      WEB_SEARCH_API_KEY: " test-secret "
    });

    expect(env.HYBRID_ALPHA).toBe(0.25);
    expect(env.PIPELINE_DEADLINE_MS).toBe(20000);
    expect(env.SEMANTIC_GATE_ENABLED).toBe(false);
    expect(env.REDIS_URL).toBeUndefined();
    expect(env.WEB_SEARCH_API_KEY).toBe("test-secret");
  });

  it("reports every invalid or missing key", () => {
    expect(() => parseEnv({ ...REQUIRED_ENV, HYBRID_ALPHA: "1.5", OPENAI_API_KEY: undefined })).toThrowError(
      /Invalid environment configuration:[\s\S]*- OPENAI_API_KEY: [\s\S]*- HYBRID_ALPHA: /
    );
  });

  it("parses dotenv lines", () => {
    expect(parseDotEnvLine("# comment")).toBeNull();
    expect(parseDotEnvLine("=value")).toBeNull();
    expect(parseDotEnvLine('QDRANT_COLLECTION="climate"')).toEqual(["QDRANT_COLLECTION", "climate"]);
    expect(parseDotEnvLine(" PORT = 8080 ")).toEqual(["PORT", "8080"]);
  });

  it("loads the mode env file without overriding existing variables", () => {
    const processEnv: NodeJS.ProcessEnv = { APP_MODE: "local", PORT: "4000" };
    const loaded = loadModeEnvFile({
      cwd: "/srv/app",
      processEnv,
      existsSync: (candidate) => candidate.endsWith(".env.local"),
      readFileSync: () => "PORT=5000\nQDRANT_COLLECTION=climate\n# ignored\n"
    });

    expect(loaded).toMatch(/\.env\.local$/);
    expect(processEnv.PORT).toBe("4000");
    expect(processEnv.QDRANT_COLLECTION).toBe("climate");
  });
});
