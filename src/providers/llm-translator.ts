import { TRANSLATION_SYSTEM_PROMPT, buildTranslationPrompt } from "../prompts/index.js";
import type { CallOptions, TextGenerator, Translator } from "./types.js";

const TRANSLATION_MAX_TOKENS = 1000;
const TRANSLATION_TEMPERATURE = 0;

export class EmptyTranslationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmptyTranslationError";
  }
}

/** Translation through the text generator. Language arguments are display names or ISO codes. */
export class LlmTranslator implements Translator {
  constructor(private readonly generator: TextGenerator) {}

  async translate(text: string, from: string, to: string, callOptions?: CallOptions): Promise<string> {
    if (text.trim().length === 0 || from === to) {
      return text;
    }

    const translated = await this.generator.generate(
      {
        system: TRANSLATION_SYSTEM_PROMPT,
        prompt: buildTranslationPrompt(text, from, to),
        maxTokens: Math.max(TRANSLATION_MAX_TOKENS, text.length),
        temperature: TRANSLATION_TEMPERATURE
      },
      callOptions
    );

    const trimmed = translated.trim();
    if (trimmed.length === 0) {
      throw new EmptyTranslationError(`Translation from ${from} to ${to} returned no text.`);
    }
    return trimmed;
  }
}
