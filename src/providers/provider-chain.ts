import { logWarn } from "../observability/logger.js";
import type { CallOptions, ClassifierLabel, TopicClassifier } from "./types.js";

export class ProviderChainExhaustedError extends Error {
  constructor(
    message: string,
    readonly failures: unknown[]
  ) {
    super(message);
    this.name = "ProviderChainExhaustedError";
  }
}

export interface NamedClassifier {
  name: string;
  classifier: TopicClassifier;
}

/**
 * Asks each classifier in order and returns the first successful answer.
 * A caller abort stops the walk immediately.
 */
export class ClassifierChain implements TopicClassifier {
  constructor(private readonly providers: NamedClassifier[]) {}

  async classify(text: string, callOptions?: CallOptions): Promise<ClassifierLabel[]> {
    const failures: unknown[] = [];
    for (const provider of this.providers) {
      try {
        return await provider.classifier.classify(text, callOptions);
      } catch (error) {
        failures.push(error);
        if (callOptions?.signal?.aborted) {
          throw error;
        }
        logWarn("providers.classifier.failed", {}, {
          provider: provider.name,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
    throw new ProviderChainExhaustedError(`All ${this.providers.length} classifier providers failed.`, failures);
  }
}
