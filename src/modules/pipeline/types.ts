import type { ConversationTurn } from "../conversation/history.js";
import type { Citation } from "../rag/types.js";
import type { FailureReason } from "./messages.js";

export type StageTimings = Readonly<Record<string, number>>;

export type PipelineSuccess = {
  success: true;
  answer: string;
  citations: Citation[];
  faithfulness: number;
  cacheHit: boolean;
  usedFallback: boolean;
  languageCode: string;
  query: string;
  turn: ConversationTurn;
  timings: StageTimings;
};

export type PipelineFailure = {
  success: false;
  reason: FailureReason;
  /** User-facing text for the reason. */
  message: string;
  languageCode: string | null;
  timings: StageTimings;
  /** Underlying error text, when there was one. Never sent to HTTP callers. */
  error?: string;
};

export type PipelineResult = PipelineSuccess | PipelineFailure;

export interface ProcessOptions {
  signal?: AbortSignal;
  /** Overrides the controller's default end-to-end deadline for this call. */
  deadlineMs?: number;
  requestId?: string;
}
