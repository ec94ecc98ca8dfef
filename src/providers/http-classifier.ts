import { z } from "zod";
import { joinUrl, postJson, type FetchLike } from "./http-json.js";
import type { CallOptions, ClassifierLabel, TopicClassifier } from "./types.js";

const labelSchema = z.object({
  label: z.string(),
  score: z.number()
});

// Some deployments wrap predictions per input, e.g. [[{ label, score }]].
const predictResponseSchema = z
  .array(z.union([labelSchema, z.array(labelSchema)]))
  .transform((value): ClassifierLabel[] => value.flatMap((entry) => (Array.isArray(entry) ? entry : [entry])));

export interface HttpTopicClassifierOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export class HttpTopicClassifier implements TopicClassifier {
  constructor(private readonly options: HttpTopicClassifierOptions) {}

  async classify(text: string, callOptions?: CallOptions): Promise<ClassifierLabel[]> {
    return postJson({
      url: joinUrl(this.options.baseUrl, "predict"),
      body: { inputs: text },
      schema: predictResponseSchema,
      timeoutMs: this.options.timeoutMs,
      signal: callOptions?.signal,
      fetchImpl: this.options.fetchImpl
    });
  }
}
