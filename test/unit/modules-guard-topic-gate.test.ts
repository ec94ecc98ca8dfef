import { describe, expect, it, vi } from "vitest";
import { createConversationTurn } from "../../src/modules/conversation/history.js";
import { TopicGate, cosineSimilarity, loadTopicExemplars, matchKeywordRules } from "../../src/modules/guard/topic-gate.js";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";
import type { ClassifierLabel, Embedder, TopicClassifier } from "../../src/providers/types.js";

const classifierReturning = (labels: ClassifierLabel[]) =>
  vi.fn<TopicClassifier["classify"]>().mockResolvedValue(labels);

const history = [
  createConversationTurn({
    query: "What is ocean acidification?",
    answer: "Seawater absorbs carbon dioxide and becomes more acidic.",
    timestamp: "2024-03-01T10:00:00.000Z"
  })
];

describe("modules/guard/topic-gate", () => {
  it("catches fire-setting requests with words between the verb and fire", () => {
    expect(matchKeywordRules("How can I start a forest fire?")).toBe("harmful_content");
    expect(matchKeywordRules("How can I start a fire in a forest?")).toBe("harmful_content");
    expect(matchKeywordRules("best way of setting fire to a field")).toBe("harmful_content");
  });

  it("matches harmful stems with their inflections", () => {
    expect(matchKeywordRules("best way of killing the coral reef")).toBe("harmful_content");
    expect(matchKeywordRules("which chemicals are harmful to dump in a river?")).toBe("harmful_content");
    expect(matchKeywordRules("poisoning a lake without being noticed")).toBe("harmful_content");
    expect(matchKeywordRules("I burned my neighbour's crops")).toBe("harmful_content");
  });

  it("lets fossil-fuel burning through and flags denial phrases", () => {
    expect(matchKeywordRules("Why does burning coal warm the planet?")).toBeNull();
    expect(matchKeywordRules("How does burning fossil fuels change the climate?")).toBeNull();
    expect(matchKeywordRules("Why are fossil fuels burned for electricity?")).toBeNull();
    expect(matchKeywordRules("Is global warming a HOAX?")).toBe("misinformation");
  });

  it("rejects a forest-fire request even when the classifier says yes", async () => {
    const classify = classifierReturning([{ label: "yes", score: 0.99 }]);
    const gate = new TopicGate({ classifier: { classify } });

    await expect(gate.check("How can I start a forest fire?")).resolves.toEqual({
      passed: false,
      reason: "harmful_content",
      score: 1
    });
    expect(classify).not.toHaveBeenCalled();
  });

  it("rejects a car maintenance question as not climate related", async () => {
    const gate = new TopicGate({
      classifier: { classify: classifierReturning([{ label: "no", score: 0.97 }]) }
    });

    await expect(gate.check("How do I change my car's oil?")).resolves.toEqual({
      passed: false,
      reason: "not_climate_related",
      score: 0.97
    });
  });

  it("rejects rule matches without calling the classifier", async () => {
    const classify = classifierReturning([{ label: "yes", score: 0.99 }]);
    const gate = new TopicGate({ classifier: { classify } });

    await expect(gate.check("Climate change is a hoax, right?")).resolves.toEqual({
      passed: false,
      reason: "misinformation",
      score: 1
    });
    expect(classify).not.toHaveBeenCalled();
  });

  it("passes queries the classifier labels on topic", async () => {
    const gate = new TopicGate({ classifier: { classify: classifierReturning([{ label: "yes", score: 0.9 }]) } });

    await expect(gate.check("Why does burning coal warm the planet?")).resolves.toEqual({
      passed: true,
      reason: "classifier",
      score: 0.9
    });
  });

  it("rejects a confident off-topic label with its score", async () => {
    const gate = new TopicGate({
      classifier: {
        classify: classifierReturning([
          { label: "no", score: 0.8 },
          { label: "yes", score: 0.2 }
        ])
      }
    });

    await expect(gate.check("Who won the football match?")).resolves.toEqual({
      passed: false,
      reason: "not_climate_related",
      score: 0.8
    });
  });

  it("requires a yes score strictly above the threshold", async () => {
    const gate = new TopicGate({ classifier: { classify: classifierReturning([{ label: "yes", score: 0.5 }]) } });

    await expect(gate.check("Tell me about rivers")).resolves.toMatchObject({
      passed: false,
      reason: "not_climate_related"
    });
  });

  it("fails open when the classifier is unavailable", async () => {
    const gate = new TopicGate({
      classifier: { classify: vi.fn<TopicClassifier["classify"]>().mockRejectedValue(new Error("503")) }
    });

    await expect(gate.check("What is a carbon budget?")).resolves.toEqual({
      passed: true,
      reason: "service_unavailable",
      score: 0
    });
    expect(getMetricsSnapshot().error_rates).toEqual({ gate_classifier_unavailable: 1 });
  });

  it("defers a rejected follow-up to the conversation context", async () => {
    const gate = new TopicGate({ classifier: { classify: classifierReturning([{ label: "yes", score: 0.4 }]) } });

    await expect(gate.check("why is it important?", history)).resolves.toEqual({
      passed: true,
      reason: "deferred_to_context",
      score: 0.4
    });
    await expect(gate.check("why is it important?")).resolves.toMatchObject({ passed: false });
  });

  it("accepts close matches to the exemplars and embeds the exemplars once", async () => {
    const vectors: Record<string, number[]> = {
      "how do heatwaves affect crops?": [1, 0],
      "what causes sea level rise?": [0, 1],
      "how do droughts affect harvests?": [0.9, 0.1]
    };
    const embed = vi.fn<Embedder["embed"]>(async (text) => ({
      dense: vectors[text] ?? [0, 0],
      sparse: { indices: [], values: [] }
    }));
    const classify = classifierReturning([{ label: "no", score: 0.9 }]);
    const gate = new TopicGate({
      classifier: { classify },
      embedder: { embed },
      exemplars: ["how do heatwaves affect crops?", "what causes sea level rise?"]
    });

    const first = await gate.check("how do droughts affect harvests?");
    await gate.check("how do droughts affect harvests?");

    expect(first.passed).toBe(true);
    expect(first.reason).toBe("semantic_similarity");
    expect(first.score).toBeCloseTo(0.9 / Math.sqrt(0.82));
    expect(classify).not.toHaveBeenCalled();
    expect(embed).toHaveBeenCalledTimes(4);
  });

  it("falls through to the classifier when embedding fails", async () => {
    const classify = classifierReturning([{ label: "yes", score: 0.7 }]);
    const gate = new TopicGate({
      classifier: { classify },
      embedder: { embed: vi.fn<Embedder["embed"]>().mockRejectedValue(new Error("embeddings down")) },
      exemplars: ["what causes sea level rise?"]
    });

    await expect(gate.check("what melts permafrost?")).resolves.toEqual({
      passed: true,
      reason: "classifier",
      score: 0.7
    });
  });

  it("computes cosine similarity and ships a non-empty exemplar file", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([2, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(loadTopicExemplars().length).toBeGreaterThan(10);
  });
});
