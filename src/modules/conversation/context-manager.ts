import { logInfo } from "../../observability/logger.js";
import {
  MODERATION_SYSTEM_PROMPT,
  QUERY_REWRITE_SYSTEM_PROMPT,
  buildModerationPrompt,
  buildQueryRewritePrompt
} from "../../prompts/index.js";
import type { CallOptions, TextGenerator } from "../../providers/types.js";
import { MAX_CONTEXT_TURNS, formatHistoryBlock, type ConversationTurn } from "./history.js";

export type QueryClassification = "on-topic" | "off-topic" | "harmful";

export type ContextDecision =
  | { kind: "rewritten"; query: string }
  | { kind: "rejected"; classification: Exclude<QueryClassification, "on-topic"> };

const CLASSIFICATION_PATTERN = /Classification:\s*(on-topic|off-topic|harmful)/i;
const CLASSIFICATION_MAX_TOKENS = 300;
const REWRITE_MAX_TOKENS = 200;
const CLASSIFICATION_TEMPERATURE = 0;
const REWRITE_TEMPERATURE = 0.2;

/** Reads the model's verdict; anything unparseable counts as off-topic. */
export const parseClassification = (response: string): QueryClassification => {
  const match = CLASSIFICATION_PATTERN.exec(response);
  const label = match?.[1]?.toLowerCase();
  if (label === "on-topic" || label === "harmful") {
    return label;
  }
  return "off-topic";
};

const cleanRewrite = (rewrite: string): string =>
  rewrite
    .trim()
    .replace(/^(rewritten (query|question)|standalone question)\s*:\s*/i, "")
    .replace(/^["'“”]+|["'“”]+$/g, "")
    .trim();

export interface ContextManagerDependencies {
  generator: TextGenerator;
  historyLimit?: number;
  logInfo?: typeof logInfo;
}

export interface ContextManagerOptions extends CallOptions {
  requestId?: string;
}

/**
 * Classifies a query against the conversation and, when it is on topic,
 * rewrites it into a standalone English question. Generation errors propagate
 * to the caller.
 */
export class ConversationContextManager {
  private readonly historyLimit: number;

  constructor(private readonly dependencies: ContextManagerDependencies) {
    this.historyLimit = dependencies.historyLimit ?? MAX_CONTEXT_TURNS;
  }

  async classifyAndRewrite(
    history: readonly ConversationTurn[],
    query: string,
    options: ContextManagerOptions = {}
  ): Promise<ContextDecision> {
    const historyBlock = formatHistoryBlock(history, this.historyLimit);
    const callOptions = { signal: options.signal };
    const log = this.dependencies.logInfo ?? logInfo;
    const context = { requestId: options.requestId ?? null, stage: "context_rewrite" };

    const verdict = await this.dependencies.generator.generate(
      {
        system: MODERATION_SYSTEM_PROMPT,
        prompt: buildModerationPrompt(historyBlock, query),
        maxTokens: CLASSIFICATION_MAX_TOKENS,
        temperature: CLASSIFICATION_TEMPERATURE
      },
      callOptions
    );
    const classification = parseClassification(verdict);
    log("conversation.classified", context, { classification, history_turns: Math.min(history.length, this.historyLimit) });

    if (classification !== "on-topic") {
      return { kind: "rejected", classification };
    }

    const rewrite = cleanRewrite(
      await this.dependencies.generator.generate(
        {
          system: QUERY_REWRITE_SYSTEM_PROMPT,
          prompt: buildQueryRewritePrompt(historyBlock, query),
          maxTokens: REWRITE_MAX_TOKENS,
          temperature: REWRITE_TEMPERATURE
        },
        callOptions
      )
    );

    const rewritten = rewrite.length > 0 ? rewrite : query;
    log("conversation.rewritten", context, { rewritten_query: rewritten, used_original: rewrite.length === 0 });
    return { kind: "rewritten", query: rewritten };
  }
}
