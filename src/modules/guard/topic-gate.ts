import fs from "node:fs";
import { z } from "zod";
import { logDebug, logInfo, logWarn } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import type { Embedder, TopicClassifier } from "../../providers/types.js";
import { detectFollowUp } from "../conversation/follow-up.js";
import type { ConversationTurn } from "../conversation/history.js";

/** Word stems; each matches its inflections ("kill" also catches "killing", "pollut" catches "polluted"). */
export const HARMFUL_STEMS = [
  "burn",
  "toxic",
  "harm",
  "destroy",
  "damag",
  "kill",
  "pollut",
  "contaminat",
  "poison"
] as const;

const FIRE_SETTING_PATTERN =
  /\b(?:start|light|set)(?:s|ed|ing|ting)?\s+(?:(?:a|an|the|some)\s+)?(?:[\p{L}'-]+\s+)?fires?\b|\bset(?:s|ting)?\s+fire\s+to\b/iu;

/** Climate-science phrasing that would otherwise trip the "burn" stem. */
const ALLOWED_PHRASE_PATTERN =
  /\b(?:burn(?:s|ed|ing)?\s+(?:of\s+)?(?:fossil\s+fuels?|coal|oil|natural\s+gas|gas|petrol|gasoline)|(?:fossil\s+fuels?|coal|oil|gas)\s+(?:is\s+|are\s+|being\s+)?burn(?:s|ed|ing|t)?)\b/giu;

export const DENIAL_PATTERNS = [
  "hoax",
  "fake",
  "fraud",
  "scam",
  "conspiracy",
  "not real",
  "isn't real",
  "propaganda"
] as const;

export const SEMANTIC_ACCEPT_THRESHOLD = 0.5;
export const SEMANTIC_AMBIGUOUS_THRESHOLD = 0.3;
export const CLASSIFIER_ACCEPT_THRESHOLD = 0.5;
const ON_TOPIC_LABEL = "yes";

export type GateRejectionReason = "harmful_content" | "misinformation" | "not_climate_related";
export type GatePassReason = "semantic_similarity" | "classifier" | "deferred_to_context" | "service_unavailable";

export type GateResult =
  | { passed: true; reason: GatePassReason; score: number }
  | { passed: false; reason: GateRejectionReason; score: number };

export interface GateCheckOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export interface TopicGateDependencies {
  classifier: TopicClassifier;
  embedder?: Embedder;
  exemplars?: readonly string[];
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

const exemplarFileSchema = z.object({
  exemplars: z.array(z.string().min(1))
});

const DEFAULT_EXEMPLARS_URL = new URL("../../../data/topic-exemplars.json", import.meta.url);

export const loadTopicExemplars = (fileUrl: URL = DEFAULT_EXEMPLARS_URL): string[] => {
  const raw: unknown = JSON.parse(fs.readFileSync(fileUrl, "utf8"));
  return exemplarFileSchema.parse(raw).exemplars;
};

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const toPhrasePattern = (phrases: readonly string[]): RegExp =>
  new RegExp(`\\b(?:${phrases.map(escapeRegExp).join("|")})\\b`, "i");

const HARMFUL_STEM_PATTERN = new RegExp(`\\b(?:${HARMFUL_STEMS.map(escapeRegExp).join("|")})\\w*`, "i");
const DENIAL_PHRASE_PATTERN = toPhrasePattern(DENIAL_PATTERNS);

/**
 * Harmful stems match at word starts, after allowed climate phrasing such as
 * "burning fossil fuels" is removed. Denial phrases match as whole words.
 */
export const matchKeywordRules = (query: string): GateRejectionReason | null => {
  if (FIRE_SETTING_PATTERN.test(query)) {
    return "harmful_content";
  }
  if (HARMFUL_STEM_PATTERN.test(query.replace(ALLOWED_PHRASE_PATTERN, " "))) {
    return "harmful_content";
  }
  if (DENIAL_PHRASE_PATTERN.test(query)) {
    return "misinformation";
  }
  return null;
};

export const cosineSimilarity = (left: readonly number[], right: readonly number[]): number => {
  const length = Math.min(left.length, right.length);
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < length; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }
  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
};

/**
 * Decides whether a query is on topic and safe: keyword rules first, then an
 * optional embedding similarity tier, then the classifier. Service failures
 * pass the query through.
 */
export class TopicGate {
  private exemplarVectors: Promise<number[][]> | null = null;

  constructor(private readonly dependencies: TopicGateDependencies) {}

  private get semanticTierEnabled(): boolean {
    return Boolean(this.dependencies.embedder) && (this.dependencies.exemplars?.length ?? 0) > 0;
  }

  private loadExemplarVectors(embedder: Embedder, options: GateCheckOptions): Promise<number[][]> {
    if (!this.exemplarVectors) {
      const exemplars = this.dependencies.exemplars ?? [];
      const pending = Promise.all(
        exemplars.map(async (exemplar) => (await embedder.embed(exemplar, { signal: options.signal })).dense)
      );
      this.exemplarVectors = pending;
      pending.catch(() => {
        // Retry the exemplar embeddings on the next check.
        this.exemplarVectors = null;
      });
    }
    return this.exemplarVectors;
  }

  private async semanticScore(query: string, options: GateCheckOptions): Promise<number | null> {
    const embedder = this.dependencies.embedder;
    if (!embedder || !this.semanticTierEnabled) {
      return null;
    }
    try {
      const [queryEmbedding, exemplarVectors] = await Promise.all([
        embedder.embed(query, { signal: options.signal }),
        this.loadExemplarVectors(embedder, options)
      ]);
      return exemplarVectors.reduce(
        (best, vector) => Math.max(best, cosineSimilarity(queryEmbedding.dense, vector)),
        0
      );
    } catch (error) {
      (this.dependencies.logWarn ?? logWarn)(
        "guard.semantic.failed",
        { requestId: options.requestId ?? null, stage: "gate" },
        { error: error instanceof Error ? error.message : String(error) }
      );
      return null;
    }
  }

  async check(
    query: string,
    history: readonly ConversationTurn[] = [],
    options: GateCheckOptions = {}
  ): Promise<GateResult> {
    const context = { requestId: options.requestId ?? null, stage: "gate" };
    const log = this.dependencies.logInfo ?? logInfo;

    const keywordRejection = matchKeywordRules(query);
    if (keywordRejection) {
      log("guard.keyword.rejected", context, { reason: keywordRejection });
      return { passed: false, reason: keywordRejection, score: 1 };
    }

    const similarity = await this.semanticScore(query, options);
    if (similarity !== null) {
      logDebug("guard.semantic.score", context, {
        similarity,
        band:
          similarity >= SEMANTIC_ACCEPT_THRESHOLD
            ? "accept"
            : similarity >= SEMANTIC_AMBIGUOUS_THRESHOLD
              ? "ambiguous"
              : "low"
      });
      if (similarity >= SEMANTIC_ACCEPT_THRESHOLD) {
        return { passed: true, reason: "semantic_similarity", score: similarity };
      }
    }

    let top: { label: string; score: number } | undefined;
    try {
      const labels = await this.dependencies.classifier.classify(query, { signal: options.signal });
      top = labels[0];
    } catch (error) {
      recordErrorRate("gate_classifier_unavailable");
      (this.dependencies.logWarn ?? logWarn)("guard.classifier.unavailable", context, {
        error: error instanceof Error ? error.message : String(error)
      });
      return { passed: true, reason: "service_unavailable", score: 0 };
    }

    if (top && top.label.toLowerCase() === ON_TOPIC_LABEL && top.score > CLASSIFIER_ACCEPT_THRESHOLD) {
      return { passed: true, reason: "classifier", score: top.score };
    }

    const score = top?.score ?? 0;
    if (history.length > 0) {
      const followUp = detectFollowUp(history, query);
      if (followUp.isFollowUp) {
        log("guard.classifier.deferred", context, {
          follow_up_confidence: followUp.confidence,
          classifier_score: score
        });
        return { passed: true, reason: "deferred_to_context", score };
      }
    }

    log("guard.classifier.rejected", context, { label: top?.label ?? null, score });
    return { passed: false, reason: "not_climate_related", score };
  }
}
