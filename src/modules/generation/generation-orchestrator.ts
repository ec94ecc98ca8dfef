import { logInfo } from "../../observability/logger.js";
import { recordStageLatency } from "../../observability/metrics.js";
import type { TextGenerator } from "../../providers/types.js";
import type { ConversationTurn } from "../conversation/history.js";
import { GenerationError, NoEvidenceError } from "../pipeline/errors.js";
import { buildCitations } from "../rag/citation-builder.js";
import type { Citation, Document } from "../rag/types.js";
import { buildGenerationPrompt as defaultBuildPrompt } from "./prompt-builder.js";

export const DEFAULT_MAX_TOKENS = 2000;
export const DEFAULT_TEMPERATURE = 0.7;

export interface GenerationInput {
  query: string;
  documents: readonly Document[];
  history?: readonly ConversationTurn[];
  instructions?: string;
  signal?: AbortSignal;
  requestId?: string;
}

export interface GenerationOutput {
  answer: string;
  citations: Citation[];
}

export interface GenerationDependencies {
  generator: TextGenerator;
  maxTokens?: number;
  temperature?: number;
  buildPrompt?: typeof defaultBuildPrompt;
  now?: () => number;
  logInfo?: typeof logInfo;
}

/** Puts a space between leading heading markers and the heading text ("##Title" -> "## Title"). */
export const formatHeadings = (answer: string): string => answer.replace(/^(\s*#{1,6})(?=[^#\s])/gm, "$1 ");

export class GenerationOrchestrator {
  private readonly now: () => number;

  constructor(private readonly dependencies: GenerationDependencies) {
    this.now = dependencies.now ?? Date.now;
  }

  async generate(input: GenerationInput): Promise<GenerationOutput> {
    const documents = input.documents.filter((document) => document.content.trim().length > 0);
    if (documents.length === 0) {
      throw new NoEvidenceError();
    }

    const buildPrompt = this.dependencies.buildPrompt ?? defaultBuildPrompt;
    const prompt = buildPrompt({
      query: input.query,
      documents,
      history: input.history ?? [],
      instructions: input.instructions
    });

    const startedAt = this.now();
    let raw: string;
    try {
      raw = await this.dependencies.generator.generate(
        {
          system: prompt.system,
          prompt: prompt.prompt,
          maxTokens: this.dependencies.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: this.dependencies.temperature ?? DEFAULT_TEMPERATURE
        },
        { signal: input.signal }
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new GenerationError(`Answer generation failed: ${message}`, { cause: error });
    }

    const answer = formatHeadings(raw.trim());
    if (answer.length === 0) {
      throw new GenerationError("Answer generation returned empty output.");
    }

    const latencyMs = this.now() - startedAt;
    recordStageLatency("generation.model_call", latencyMs);
    (this.dependencies.logInfo ?? logInfo)(
      "generation.complete",
      { requestId: input.requestId ?? null, stage: "generate" },
      {
        document_count: documents.length,
        history_turns: input.history?.length ?? 0,
        answer_chars: answer.length,
        latency_ms: latencyMs,
        with_instructions: Boolean(input.instructions)
      }
    );

    return { answer, citations: buildCitations(documents) };
  }
}
