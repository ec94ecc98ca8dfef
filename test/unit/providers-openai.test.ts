import { describe, expect, it, vi } from "vitest";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";
import { TRANSLATION_SYSTEM_PROMPT } from "../../src/prompts/index.js";
import { EmptyTranslationError, LlmTranslator } from "../../src/providers/llm-translator.js";
import {
  EmbeddingError,
  OpenAIEmbedder,
  type EmbeddingsClientPort
} from "../../src/providers/openai-embedding.js";
import { OpenAITextGenerator, type ChatCompletionsClientPort } from "../../src/providers/openai-generation.js";
import { encodeSparse } from "../../src/providers/sparse-encoder.js";
import type { TextGenerator } from "../../src/providers/types.js";

describe("providers/openai-embedding", () => {
  it("returns the dense vector with the sparse encoding and records usage", async () => {
    const create = vi.fn<EmbeddingsClientPort["embeddings"]["create"]>().mockResolvedValue({
      data: [{ embedding: [0.1, 0.2, 0.3] }],
      usage: { prompt_tokens: 4, total_tokens: 4 }
    });
    const embedder = new OpenAIEmbedder({
      model: "text-embedding-3-small",
      timeoutMs: 1000,
      getClient: async () => ({ embeddings: { create } })
    });

    const embedding = await embedder.embed("ocean heat content");

    expect(create.mock.calls[0]?.[0]).toEqual({ model: "text-embedding-3-small", input: "ocean heat content" });
    expect(embedding).toEqual({ dense: [0.1, 0.2, 0.3], sparse: encodeSparse("ocean heat content") });
    expect(getMetricsSnapshot().openai_usage).toEqual({ promptTokens: 4, completionTokens: 0, totalTokens: 4 });
  });

  it("throws EmbeddingError on an empty reply", async () => {
    const embedder = new OpenAIEmbedder({
      model: "text-embedding-3-small",
      timeoutMs: 1000,
      getClient: async () => ({ embeddings: { create: async () => ({ data: [] }) } })
    });

    await expect(embedder.embed("text")).rejects.toBeInstanceOf(EmbeddingError);
  });
});

describe("providers/openai-generation", () => {
  it("sends the system and user messages and returns the completion text", async () => {
    const create = vi.fn<ChatCompletionsClientPort["chat"]["completions"]["create"]>().mockResolvedValue({
      choices: [{ message: { content: "Answer text" } }],
      usage: { prompt_tokens: 10, completion_tokens: 3, total_tokens: 13 }
    });
    const generator = new OpenAITextGenerator({
      model: "gpt-4.1-mini",
      timeoutMs: 1000,
      getClient: async () => ({ chat: { completions: { create } } })
    });

    const text = await generator.generate({ system: "Be brief.", prompt: "Why?", maxTokens: 50, temperature: 0.2 });

    expect(text).toBe("Answer text");
    expect(create.mock.calls[0]?.[0]).toEqual({
      model: "gpt-4.1-mini",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Why?" }
      ],
      max_tokens: 50,
      temperature: 0.2
    });
    expect(getMetricsSnapshot().openai_usage).toEqual({ promptTokens: 10, completionTokens: 3, totalTokens: 13 });
  });

  it("returns an empty string when the model sends no content", async () => {
    const generator = new OpenAITextGenerator({
      model: "gpt-4.1-mini",
      timeoutMs: 1000,
      getClient: async () => ({
        chat: { completions: { create: async () => ({ choices: [{ message: { content: null } }] }) } }
      })
    });

    await expect(generator.generate({ prompt: "Hi", maxTokens: 5, temperature: 0 })).resolves.toBe("");
  });
});

describe("providers/llm-translator", () => {
  it("passes text through when the languages match", async () => {
    const generate = vi.fn<TextGenerator["generate"]>();
    const translator = new LlmTranslator({ generate });

    await expect(translator.translate("hola", "spanish", "spanish")).resolves.toBe("hola");
    expect(generate).not.toHaveBeenCalled();
  });

  it("translates with a deterministic prompt and trims the reply", async () => {
    const generate = vi.fn<TextGenerator["generate"]>().mockResolvedValue("  why is the sea rising?  ");
    const translator = new LlmTranslator({ generate });

    await expect(translator.translate("¿por qué sube el mar?", "spanish", "english")).resolves.toBe(
      "why is the sea rising?"
    );
    expect(generate.mock.calls[0]?.[0]).toEqual({
      system: TRANSLATION_SYSTEM_PROMPT,
      prompt: "Translate the following text from spanish to english.\n\n¿por qué sube el mar?",
      maxTokens: 1000,
      temperature: 0
    });
  });

  it("rejects an empty translation", async () => {
    const translator = new LlmTranslator({ generate: async () => "   " });

    await expect(translator.translate("bonjour", "french", "english")).rejects.toBeInstanceOf(EmptyTranslationError);
  });
});
