export const MAX_CONTEXT_TURNS = 5;

export type ConversationTurn = Readonly<{
  query: string;
  answer: string;
  languageCode: string;
  timestamp: string;
}>;

export interface ConversationTurnInput {
  query: string;
  answer: string;
  languageCode?: string;
  timestamp?: string;
}

export const createConversationTurn = (input: ConversationTurnInput, now: () => Date = () => new Date()): ConversationTurn =>
  Object.freeze({
    query: input.query,
    answer: input.answer,
    languageCode: input.languageCode ?? "en",
    timestamp: input.timestamp ?? now().toISOString()
  });

/** Boundary conversion for caller-supplied history; order is preserved. */
export const toConversationTurns = (inputs: readonly ConversationTurnInput[]): ConversationTurn[] =>
  inputs.map((input) => createConversationTurn(input));

/** The most recent turns, oldest first. */
export const recentTurns = (
  history: readonly ConversationTurn[],
  limit: number = MAX_CONTEXT_TURNS
): ConversationTurn[] => (limit > 0 ? history.slice(-limit) : []);

export const formatHistoryBlock = (
  history: readonly ConversationTurn[],
  limit: number = MAX_CONTEXT_TURNS
): string =>
  recentTurns(history, limit)
    .map((turn) => `User: ${turn.query}\nAssistant: ${turn.answer}`)
    .join("\n");
