import type { ConversationTurn } from "./history.js";

export interface FollowUpSignal {
  isFollowUp: boolean;
  confidence: number;
  matchedIndicators: string[];
}

export const FOLLOW_UP_THRESHOLD = 0.5;

const REFERENCE_WORDS = new Set([
  "it",
  "its",
  "they",
  "them",
  "their",
  "theirs",
  "that",
  "this",
  "those",
  "these",
  "else",
  "more",
  "also",
  "another",
  "other",
  "further",
  "elaborate"
]);

const QUESTION_OPENERS = new Set(["why", "how"]);

const EXPLICIT_PATTERNS: RegExp[] = [
  /^(why|how)( so| come)?\??$/,
  /\b(elaborate|tell me more|what else|expand on|go on)\b/,
  /^(and|what about|how about)\b/
];

const SHORT_QUERY_WORDS = 4;

const roundTo2Decimals = (value: number): number => Math.round(value * 100) / 100;

/**
 * Keyword heuristic for "does this query lean on the previous turns?". It is
 * advisory: callers only consult it when the model-based check is unavailable
 * or to soften a topic rejection.
 */
export const detectFollowUp = (history: readonly ConversationTurn[], query: string): FollowUpSignal => {
  if (history.length === 0) {
    return { isFollowUp: false, confidence: 0, matchedIndicators: [] };
  }

  const normalized = query.trim().toLowerCase();
  const words = normalized.match(/[\p{L}\p{N}']+/gu) ?? [];
  const matchedIndicators = [...new Set(words.filter((word) => REFERENCE_WORDS.has(word)))];

  let confidence = 0;
  if (matchedIndicators.length > 0) {
    confidence = 0.5 + 0.1 * Math.min(matchedIndicators.length - 1, 2);
  }
  const opener = words[0];
  if (opener && QUESTION_OPENERS.has(opener)) {
    confidence += 0.2;
  }
  if (words.length <= SHORT_QUERY_WORDS) {
    confidence += 0.1;
  }
  if (EXPLICIT_PATTERNS.some((pattern) => pattern.test(normalized))) {
    confidence = Math.max(confidence, 0.9);
  }

  confidence = roundTo2Decimals(Math.min(1, confidence));
  return {
    isFollowUp: confidence >= FOLLOW_UP_THRESHOLD,
    confidence,
    matchedIndicators
  };
};
