import { CLIMATE_EDUCATOR_SYSTEM_PROMPT, buildGroundedAnswerPrompt } from "../../prompts/index.js";
import { formatHistoryBlock, type ConversationTurn } from "../conversation/history.js";
import type { Document } from "../rag/types.js";

export interface GenerationPromptInput {
  query: string;
  documents: readonly Document[];
  history: readonly ConversationTurn[];
  instructions?: string;
}

export interface GenerationPrompt {
  system: string;
  prompt: string;
}

export const buildGenerationPrompt = (input: GenerationPromptInput): GenerationPrompt => ({
  system: CLIMATE_EDUCATOR_SYSTEM_PROMPT,
  prompt: buildGroundedAnswerPrompt({
    query: input.query,
    sources: input.documents.map((document) => ({ title: document.title, content: document.content })),
    historyBlock: formatHistoryBlock(input.history),
    instructions: input.instructions?.trim() || undefined
  })
});
