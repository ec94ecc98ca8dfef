export { DeadlineExceededError } from "../../clients/call-policy.js";
export { InvalidHybridWeightError } from "../rag/retriever.js";
import { unsupportedLanguageMessage } from "./messages.js";

export class UnsupportedLanguageError extends Error {
  constructor(
    readonly languageName: string,
    readonly availableLanguages: readonly string[]
  ) {
    super(unsupportedLanguageMessage(languageName, availableLanguages));
    this.name = "UnsupportedLanguageError";
  }
}

export class TranslationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TranslationError";
  }
}

export class NoEvidenceError extends Error {
  constructor(message = "No documents with content are available to ground an answer.") {
    super(message);
    this.name = "NoEvidenceError";
  }
}

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}
