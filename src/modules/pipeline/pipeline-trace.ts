import { logTrace, type CorrelationContext } from "../../observability/logger.js";
import type { StageTimings } from "./types.js";

/**
 * Per-request stage clock. Each measured stage records its elapsed time even
 * when it throws; `current` names the stage in flight for error logs.
 */
export class PipelineTrace {
  private readonly timings: Record<string, number> = {};
  private readonly startedAt: number;
  current = "normalize";

  constructor(
    private readonly context: CorrelationContext,
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = now();
  }

  enter(stage: string, fields: Record<string, unknown> = {}): void {
    this.current = stage;
    logTrace("pipeline.stage", { ...this.context, stage }, fields);
  }

  async measure<T>(stage: string, operation: () => Promise<T>): Promise<T> {
    this.enter(stage);
    const stageStartedAt = this.now();
    try {
      return await operation();
    } finally {
      this.timings[stage] = (this.timings[stage] ?? 0) + (this.now() - stageStartedAt);
    }
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  snapshot(): StageTimings {
    return { ...this.timings, total: this.elapsedMs() };
  }
}
