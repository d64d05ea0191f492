import { describe, expect, it } from "vitest";

import { aggregateSentiment } from "../src/orchestrator/aggregator.js";
import { SynthesisDefectError } from "../src/orchestrator/errors.js";
import { parseRecommendationRules } from "../src/orchestrator/recommendations.js";
import { synthesizeReport, type SynthesisInput } from "../src/orchestrator/summary_generator.js";
import type { UnclassifiedMention } from "../src/orchestrator/types.js";
import { makeClassified, makeMention, makeTheme } from "./helpers.js";

const unclassified: UnclassifiedMention = Object.freeze({
  ...makeMention("u1", "timeout", { url: "https://example.com/u1" }),
  status: "unclassified" as const,
  reason: "classifier_unavailable" as const,
  attempts: 3,
  modelVersion: "test-model",
});

const launch = makeTheme(
  "theme-1",
  [
    makeClassified("a1", "Launch keynote was great", "positive", 0.9, { url: "https://example.com/a1" }),
    makeClassified("a2", "a2", "positive", 0.8),
    makeClassified("a3", "a3", "positive", 0.95),
    makeClassified("a4", "a4", "positive", 0.7),
    makeClassified("a5", "a5", "positive", 0.6),
    makeClassified("a6", "a6", "neutral", 0.3),
  ],
  "launch / keynote / reviews",
  ["launch", "keynote", "reviews"],
);

const shortage = makeTheme(
  "theme-2",
  [
    makeClassified("b1", "b1", "positive", 0.99),
    makeClassified("b2", "b2", "negative", 0.8),
    makeClassified("b3", "b3", "negative", 0.9),
    makeClassified("b4", "b4", "neutral", 0.5),
  ],
  "shortage / stock / gamers",
  ["shortage", "stock", "gamers"],
);

const rules = parseRecommendationRules({
  version: "test",
  rules: [
    {
      id: "supply",
      pattern: "shortage",
      appliesTo: "escalated",
      action: "Address {theme} for {brand}",
      rationale: "{negativeShare}% negative across {mentions} mentions",
      tactics: ["Post restock dates"],
    },
    { id: "amplify", pattern: ".", appliesTo: "positive", action: "Amplify {theme}", rationale: "{positiveShare}% positive" },
  ],
});

const audit = {
  modelVersion: "test-model",
  clusteringMode: "batch" as const,
  confidenceThreshold: 0.55,
  similarityThreshold: 0.6,
  escalationThresholdPct: 15,
};

function input(overrides: Partial<SynthesisInput> = {}): SynthesisInput {
  return {
    runId: "run_test",
    brand: "Acme",
    aggregated: aggregateSentiment(
      { themes: [launch, shortage], unclassified: [unclassified] },
      { escalationThresholdPct: 15, notableTopK: 1 },
    ),
    rules,
    audit,
    generatedAt: new Date("2025-01-15T12:00:00Z"),
    ...overrides,
  };
}

describe("synthesizeReport", () => {
  const report = synthesizeReport(input());

  it("reports the aggregator's numbers", () => {
    expect(report).toMatchObject({
      runId: "run_test",
      brand: "Acme",
      date: "2025-01-15",
      generatedAt: "2025-01-15T12:00:00.000Z",
      partial: false,
      sentiment: { positive: 60, negative: 20, neutral: 20 },
      counts: { positive: 6, negative: 2, neutral: 2, classified: 10, unclassified: 1 },
    });
    expect(report.executiveSummary).toBe(
      'Acme received 10 classified mentions: 60% positive, 20% negative, 20% neutral. ' +
        '2 themes identified; the largest is "launch / keynote / reviews" with 6 mentions. ' +
        'Escalated: "shortage / stock / gamers" (20% of all mentions negative). ' +
        "1 mention could not be classified and is excluded from the percentages.",
    );
  });

  it("recommends one action per matching theme, covering every escalated theme", () => {
    expect(report.recommendations).toEqual([
      {
        index: 1,
        ruleId: "amplify",
        themeId: "theme-1",
        action: "Amplify launch / keynote / reviews",
        rationale: "83% positive",
        tactics: [],
        escalation: false,
      },
      {
        index: 2,
        ruleId: "supply",
        themeId: "theme-2",
        action: "Address shortage / stock / gamers for Acme",
        rationale: "50% negative across 4 mentions",
        tactics: ["Post restock dates"],
        escalation: true,
      },
    ]);
  });

  it("lists notable mentions with their source and keeps unclassified ones in the audit", () => {
    expect(report.notableMentions).toEqual([
      {
        mentionId: "a3",
        polarity: "positive",
        confidence: 0.95,
        source: "example.com",
        excerpt: "a3",
        themeId: "theme-1",
        provenance: "measured",
      },
      {
        mentionId: "b3",
        polarity: "negative",
        confidence: 0.9,
        source: "example.com",
        excerpt: "b3",
        themeId: "theme-2",
        provenance: "measured",
      },
      {
        mentionId: "b4",
        polarity: "neutral",
        confidence: 0.5,
        source: "example.com",
        excerpt: "b4",
        themeId: "theme-2",
        provenance: "measured",
      },
    ]);
    expect(report.audit.unclassified).toEqual([
      {
        mentionId: "u1",
        source: "example.com",
        url: "https://example.com/u1",
        reason: "classifier_unavailable",
        attempts: 3,
      },
    ]);
  });

  it("deep-freezes the report", () => {
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.themes[0])).toBe(true);
    expect(Object.isFrozen(report.recommendations[1]?.tactics)).toBe(true);
  });

  it("uses the fallback for an escalated theme no rule matches", () => {
    const withFallback = parseRecommendationRules({
      version: "test",
      rules: [],
      fallback: { action: "Investigate {theme}", rationale: "{mentions} mentions" },
    });
    const result = synthesizeReport(input({ rules: withFallback }));

    expect(result.recommendations).toEqual([
      {
        index: 1,
        ruleId: "fallback",
        themeId: "theme-2",
        action: "Investigate shortage / stock / gamers",
        rationale: "4 mentions",
        tactics: [],
        escalation: true,
      },
    ]);
  });

  it("refuses to produce a report when an escalated theme has no recommendation", () => {
    const noFallback = parseRecommendationRules({ version: "test", rules: [] });
    expect(() => synthesizeReport(input({ rules: noFallback }))).toThrow(SynthesisDefectError);
  });

  it("refuses a distribution that does not sum to 100", () => {
    const aggregated = input().aggregated;
    const broken = { ...aggregated, distribution: { positive: 50, negative: 20, neutral: 20 } };
    expect(() => synthesizeReport(input({ aggregated: broken }))).toThrow("Sentiment distribution does not sum to 100");
  });

  it("refuses notable mentions that are not measured", () => {
    const imagined = makeTheme("theme-9", [
      makeClassified("i1", "Imagined praise", "positive", 0.99, { provenance: "illustrative" }),
    ]);
    const aggregated = aggregateSentiment(
      { themes: [imagined], unclassified: [] },
      { escalationThresholdPct: 15, notableTopK: 1 },
    );
    expect(() => synthesizeReport(input({ aggregated }))).toThrow("Notable mentions must come from measured data");
  });

  it("keeps illustrative examples in their own tagged section", () => {
    const result = synthesizeReport(
      input({ illustrativeExamples: [{ text: "Imagine a card melting", polarity: "negative", note: "hypothetical" }] }),
    );
    expect(result.illustrativeExamples).toEqual([
      { text: "Imagine a card melting", polarity: "negative", note: "hypothetical", provenance: "illustrative" },
    ]);
    expect(result.notableMentions.every((mention) => mention.provenance === "measured")).toBe(true);
  });

  it("flags partial reports and handles an empty run", () => {
    const empty = synthesizeReport(
      input({
        partial: true,
        aggregated: aggregateSentiment({ themes: [], unclassified: [] }, { escalationThresholdPct: 15, notableTopK: 3 }),
      }),
    );
    expect(empty.partial).toBe(true);
    expect(empty.sentiment).toEqual({ positive: 0, negative: 0, neutral: 0 });
    expect(empty.executiveSummary).toBe(
      "Partial report: the run was cancelled before every mention was processed. " +
        "No mentions of Acme could be classified in this window.",
    );
  });
});
