export type FailureReason =
  | "invalid_query"
  | "unsupported_language"
  | "translation_error"
  | "harmful_content"
  | "misinformation"
  | "not_climate_related"
  | "off_topic"
  | "harmful"
  | "no_evidence"
  | "generation_error"
  | "timeout"
  | "internal_error";

export const QUERY_TOO_SHORT_MESSAGE = "Please provide a more detailed question.";
export const QUERY_TOO_LONG_MESSAGE = "Your question is too long. Please provide a more concise question.";

export const FAILURE_MESSAGES: Readonly<Record<Exclude<FailureReason, "unsupported_language">, string>> = {
  invalid_query: QUERY_TOO_SHORT_MESSAGE,
  translation_error: "I could not translate your question right now. Please try again, or ask in English.",
  harmful_content: "I cannot provide information on harmful actions. Please ask a question about climate change.",
  misinformation: "I provide factual information about climate change based on scientific consensus.",
  not_climate_related: "I apologize, but I can only help with climate-related questions.",
  off_topic: "I apologize, but I can only help with climate-related questions.",
  harmful: "I cannot help with that request. Please ask a question about climate change.",
  no_evidence: "I could not find reliable information to answer this question. Please try rephrasing it.",
  generation_error: "I could not complete this response right now. Please try again.",
  timeout: "This request took too long to complete. Please try again.",
  internal_error: "Something went wrong while processing your question. Please try again."
};

export const unsupportedLanguageMessage = (languageName: string, availableLanguages: readonly string[]): string =>
  `Unsupported language: ${languageName}\nAvailable languages:\n${availableLanguages.join(", ")}`;
