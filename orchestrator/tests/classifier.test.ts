import { describe, expect, it, vi } from "vitest";

import { ScoreCache, SentimentClassifier } from "../src/orchestrator/classifier.js";
import { ClassifierUnavailableError } from "../src/orchestrator/errors.js";
import { LexiconSentimentModel } from "../src/orchestrator/sentiment_model.js";
import type { ModelScore } from "../src/orchestrator/types.js";
import { makeMention } from "./helpers.js";

const options = { confidenceThreshold: 0.55, maxAttempts: 3, retryBaseDelaySeconds: 0 };

function fakeModel(score: (text: string) => Promise<ModelScore>) {
  return { version: "fake-v1", score: vi.fn(score) };
}

describe("SentimentClassifier", () => {
  it("labels a mention with the model's polarity and measured provenance", async () => {
    const classifier = new SentimentClassifier(new LexiconSentimentModel(), options);
    const outcome = await classifier.classify(makeMention("m1", "I love the new GPU, it is amazing"));

    expect(outcome).toMatchObject({
      id: "m1",
      status: "classified",
      polarity: "positive",
      rawPolarity: "positive",
      confidence: 1,
      modelVersion: "lexicon-v1",
      provenance: "measured",
    });
    expect(Object.isFrozen(outcome)).toBe(true);
  });

  it("downgrades low-confidence labels to neutral and keeps the raw label", async () => {
    const model = fakeModel(async () => ({ polarity: "negative", confidence: 0.4 }));
    const outcome = await new SentimentClassifier(model, options).classify(makeMention("m1", "meh"));

    expect(outcome).toMatchObject({ status: "classified", polarity: "neutral", rawPolarity: "negative", confidence: 0.4 });
  });

  it("returns the same label for the same text without asking the model again", async () => {
    const model = fakeModel(async () => ({ polarity: "positive", confidence: 0.9 }));
    const classifier = new SentimentClassifier(model, options);

    const first = await classifier.classify(makeMention("m1", "Blackwell is fast"));
    const second = await classifier.classify(makeMention("m2", "Blackwell is fast"));

    expect(model.score).toHaveBeenCalledTimes(1);
    expect(second).toMatchObject({ id: "m2", polarity: "positive", confidence: 0.9 });
    expect(first).toMatchObject({ id: "m1", polarity: "positive", confidence: 0.9 });
  });

  it("retries while the model is unavailable", async () => {
    const model = fakeModel(async () => ({ polarity: "negative", confidence: 0.8 }));
    model.score
      .mockRejectedValueOnce(new ClassifierUnavailableError())
      .mockRejectedValueOnce(new ClassifierUnavailableError());

    const outcome = await new SentimentClassifier(model, options).classify(makeMention("m1", "queue"));

    expect(model.score).toHaveBeenCalledTimes(3);
    expect(outcome).toMatchObject({ status: "classified", polarity: "negative" });
  });

  it("marks the mention unclassified once attempts run out", async () => {
    const model = fakeModel(async () => {
      throw new ClassifierUnavailableError();
    });

    const outcome = await new SentimentClassifier(model, options).classify(makeMention("m1", "anything"));

    expect(model.score).toHaveBeenCalledTimes(3);
    expect(outcome).toMatchObject({
      id: "m1",
      status: "unclassified",
      reason: "classifier_unavailable",
      attempts: 3,
      modelVersion: "fake-v1",
    });
  });

  it("does not retry other model errors and does not cache them", async () => {
    const model = fakeModel(async () => ({ polarity: "positive", confidence: 0.7 }));
    model.score.mockRejectedValueOnce(new Error("unexpected label"));
    const classifier = new SentimentClassifier(model, options);

    const failed = await classifier.classify(makeMention("m1", "text"));
    expect(failed).toMatchObject({ status: "unclassified", reason: "model_error", attempts: 1 });

    const retried = await classifier.classify(makeMention("m1", "text"));
    expect(retried).toMatchObject({ status: "classified", polarity: "positive" });
    expect(model.score).toHaveBeenCalledTimes(2);
  });
});

describe("ScoreCache", () => {
  it("keys scores by model version and text", () => {
    expect(ScoreCache.keyOf("v1", "abc")).toBe(
      "v1:ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });

  it("evicts the oldest entry past its limit", () => {
    const cache = new ScoreCache(2);
    cache.set("a", { polarity: "positive", confidence: 1 });
    cache.set("b", { polarity: "negative", confidence: 1 });
    cache.set("c", { polarity: "neutral", confidence: 1 });

    expect(cache.size).toBe(2);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("c")).toEqual({ polarity: "neutral", confidence: 1 });
  });

  it("keeps a recently read entry over an older unread one", () => {
    const cache = new ScoreCache(2);
    cache.set("a", { polarity: "positive", confidence: 1 });
    cache.set("b", { polarity: "negative", confidence: 1 });
    cache.get("a");
    cache.set("c", { polarity: "neutral", confidence: 1 });

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toEqual({ polarity: "positive", confidence: 1 });
  });
});
