import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { getConfig } from "../../config/index.js";
import { toConversationTurns } from "../../modules/conversation/history.js";
import { createPipelineController } from "../../modules/pipeline/create-pipeline.js";
import type { PipelineController } from "../../modules/pipeline/pipeline-controller.js";
import type { PipelineResult } from "../../modules/pipeline/types.js";
import { logError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";

const MAX_HISTORY_TURNS = 20;

const historyTurnSchema = z.object({
  query: z.string(),
  answer: z.string(),
  languageCode: z.string().min(2).optional(),
  timestamp: z.string().optional()
});

const queryBodySchema = z.object({
  query: z.string({ required_error: "query is required" }),
  language: z.string().trim().min(1, "language is required").default("english"),
  history: z.array(historyTurnSchema).max(MAX_HISTORY_TURNS).optional()
});

const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

/** Drops the underlying error text; it stays in the logs. */
export const toPublicResult = (result: PipelineResult): PipelineResult =>
  result.success
    ? result
    : {
        success: false,
        reason: result.reason,
        message: result.message,
        languageCode: result.languageCode,
        timings: result.timings
      };

export interface QueryRoutesDependencies {
  createController?: () => Pick<PipelineController, "process">;
}

let sharedController: PipelineController | null = null;

const getSharedController = (): PipelineController => {
  sharedController ??= createPipelineController(getConfig());
  return sharedController;
};

export function resetQueryControllerForTests(): void {
  sharedController = null;
}

const buildQueryHandler = (dependencies?: QueryRoutesDependencies) => {
  const createController = dependencies?.createController ?? getSharedController;

  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const requestId = resolveRequestId(request);
    const parsed = queryBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422).send(toValidationError(parsed.error));
      return;
    }

    let controller: Pick<PipelineController, "process">;
    try {
      controller = createController();
    } catch (error) {
      recordErrorRate("query_bootstrap_exception");
      logError("query.bootstrap_error", { requestId }, {
        error: error instanceof Error ? error.message : String(error)
      });
      reply.code(503).send({ detail: "The question service is not configured." });
      return;
    }

    const result = await controller.process(
      parsed.data.query,
      parsed.data.language,
      toConversationTurns(parsed.data.history ?? []),
      { requestId }
    );
    reply.code(200).send(toPublicResult(result));
  };
};

export async function registerQueryRoutes(app: FastifyInstance, dependencies?: QueryRoutesDependencies): Promise<void> {
  app.post("/api/query", buildQueryHandler(dependencies));
}
