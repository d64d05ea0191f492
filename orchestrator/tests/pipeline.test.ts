import { IngestService, parseIngestEnv, type RawRecord } from "@mention-pulse/ingestor";
import { describe, expect, it, vi } from "vitest";

import { config, resolvePipelineOptions } from "../src/orchestrator/config.js";
import { ClassifierUnavailableError, ConfigurationError, RunCancelledError } from "../src/orchestrator/errors.js";
import {
  MonitorPipeline,
  assertSourcesConfigured,
  createDefaultIngest,
  type IngestFactory,
  type PipelineRunInput,
} from "../src/orchestrator/pipeline.js";
import { loadRecommendationRules } from "../src/orchestrator/recommendations.js";
import { LexiconSentimentModel } from "../src/orchestrator/sentiment_model.js";

const TEXTS = [
  "Blackwell GPUs are amazing for training",
  "I love the Blackwell launch",
  "Nvidia earnings were excellent",
  "The RTX 5090 is incredible",
  "Fantastic keynote from Nvidia",
  "Awesome upgrade for creators",
  "GPU shortage is terrible for gamers",
  "Drivers crash constantly, awful experience",
  "Nvidia announces a keynote date",
  "Jensen Huang will speak on Tuesday",
];

const records: RawRecord[] = TEXTS.map((text, index) => ({
  id: String(index + 1),
  text,
  source: "example.com",
  published_at: new Date(Date.UTC(2025, 0, 15, 10, index)).toISOString(),
}));

const rules = loadRecommendationRules(config.RECOMMENDATION_RULES_PATH);
const lexicon = new LexiconSentimentModel();

function sourceIngest(rawRecords: RawRecord[]): IngestFactory {
  return () =>
    new IngestService(
      [{ name: "social-api", channel: "social", fetch: vi.fn(async () => rawRecords) }],
      { maxFetchLimit: 100, sourceConcurrency: 1 },
    );
}

const request: PipelineRunInput = {
  runId: "run_test",
  brand: "Nvidia",
  keywords: ["Blackwell"],
  since: new Date("2025-01-14T00:00:00Z"),
};

const options = resolvePipelineOptions({
  clusteringMode: "batch",
  partialReport: false,
  queueCapacity: 100,
  queuePolicy: "block",
  classifierConcurrency: 3,
  maxAttempts: 2,
  retryBaseDelaySeconds: 0,
});

describe("MonitorPipeline", () => {
  it("turns ten mentions into a 60/20/20 report", async () => {
    const pipeline = new MonitorPipeline({ model: lexicon, rules, createIngest: sourceIngest(records) }, options);
    const result = await pipeline.run(request);

    expect(result.report.counts).toEqual({ positive: 6, negative: 2, neutral: 2, classified: 10, unclassified: 0 });
    expect(result.report.sentiment).toEqual({ positive: 60, negative: 20, neutral: 20 });
    expect(result.report.partial).toBe(false);
    expect(result.report.audit.modelVersion).toBe("lexicon-v1");
    expect(result.ingest.admitted).toBe(10);
    expect(result.queue).toEqual({ admitted: 10, rejected: 0, discarded: 0 });
    expect(result.markdown.split("\n")).toContain("- Positive: 60%");
    expect(Object.isFrozen(result.report)).toBe(true);
  });

  it("gives identical themes and figures when re-run over the same mentions", async () => {
    const pipeline = new MonitorPipeline({ model: lexicon, rules, createIngest: sourceIngest(records) }, options);
    const first = await pipeline.run(request);
    const second = await pipeline.run(request);

    expect(second.report.themes).toEqual(first.report.themes);
    expect(second.report.sentiment).toEqual(first.report.sentiment);
    expect(second.report.recommendations).toEqual(first.report.recommendations);
  });

  it("clusters in admission order in online mode with a small queue", async () => {
    const pipeline = new MonitorPipeline({ model: lexicon, rules, createIngest: sourceIngest(records) }, options);
    const result = await pipeline.run(request, undefined, { clusteringMode: "online", queueCapacity: 2 });

    expect(result.report.audit.clusteringMode).toBe("online");
    expect(result.report.sentiment).toEqual({ positive: 60, negative: 20, neutral: 20 });
    expect(result.report.themes.reduce((sum, theme) => sum + theme.mentionCount, 0)).toBe(10);
  });

  it("leaves mentions unclassified when the model stays unavailable", async () => {
    const model = {
      version: "flaky-v1",
      score: vi.fn(async (text: string) => {
        if (text.startsWith("Jensen")) {
          throw new ClassifierUnavailableError();
        }
        return lexicon.score(text);
      }),
    };
    const pipeline = new MonitorPipeline({ model, rules, createIngest: sourceIngest(records) }, options);
    const result = await pipeline.run(request);

    expect(result.report.counts).toEqual({ positive: 6, negative: 2, neutral: 1, classified: 9, unclassified: 1 });
    expect(result.report.sentiment).toEqual({ positive: 67, negative: 22, neutral: 11 });
    expect(result.report.audit.unclassified).toEqual([
      { mentionId: "social-10", source: "example.com", reason: "classifier_unavailable", attempts: 2 },
    ]);
  });

  it("counts mentions rejected by a full queue in both the queue and ingest summaries", async () => {
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const model = {
      version: "gated-v1",
      score: async () => {
        await gate;
        return { polarity: "positive" as const, confidence: 0.9 };
      },
    };
    const service = new IngestService(
      [
        {
          name: "social-api",
          channel: "social",
          fetch: vi.fn(async () => [
            { id: "1", text: "first", source: "example.com" },
            { id: "2", text: "second", source: "example.com" },
            { id: "3", text: "third", source: "example.com" },
          ]),
        },
      ],
      { maxFetchLimit: 100, sourceConcurrency: 1 },
    );
    const createIngest: IngestFactory = () => ({
      run: async (since, sink, signal) => {
        const summary = await service.run(since, sink, signal);
        openGate();
        return summary;
      },
    });

    const pipeline = new MonitorPipeline({ model, rules, createIngest }, options);
    const result = await pipeline.run(request, undefined, {
      queueCapacity: 1,
      queuePolicy: "reject",
      classifierConcurrency: 1,
    });

    expect(result.queue).toEqual({ admitted: 2, rejected: 1, discarded: 0 });
    expect(result.ingest.admitted).toBe(2);
    expect(result.ingest.rejected).toBe(1);
    expect(result.ingest.sources[0]).toMatchObject({ admittedCount: 2, rejectedCount: 1 });
    expect(result.report.counts.classified).toBe(2);
  });

  it("produces no report when cancelled without partial mode", async () => {
    const controller = new AbortController();
    controller.abort();
    const pipeline = new MonitorPipeline({ model: lexicon, rules, createIngest: sourceIngest(records) }, options);

    await expect(pipeline.run(request, controller.signal)).rejects.toBeInstanceOf(RunCancelledError);
  });

  it("stops mid-run and rejects when partial mode is off", async () => {
    const controller = new AbortController();
    const model = {
      version: "lexicon-v1",
      score: vi.fn(async (text: string) => {
        controller.abort();
        return lexicon.score(text);
      }),
    };
    const pipeline = new MonitorPipeline({ model, rules, createIngest: sourceIngest(records) }, options);

    await expect(pipeline.run(request, controller.signal, { classifierConcurrency: 1 })).rejects.toBeInstanceOf(
      RunCancelledError,
    );
  });

  it("builds a flagged partial report from what was classified", async () => {
    const controller = new AbortController();
    const model = {
      version: "lexicon-v1",
      score: vi.fn(async (text: string) => {
        controller.abort();
        return lexicon.score(text);
      }),
    };
    const pipeline = new MonitorPipeline({ model, rules, createIngest: sourceIngest(records) }, options);
    const result = await pipeline.run(request, controller.signal, { classifierConcurrency: 1, partialReport: true });

    expect(result.report.partial).toBe(true);
    expect(result.report.counts.classified).toBeGreaterThanOrEqual(1);
    expect(result.report.counts.classified).toBeLessThan(10);
    expect(result.report.executiveSummary.startsWith("Partial report:")).toBe(true);
    expect(result.markdown.split("\n")).toContain(
      "> **Partial report:** the run was cancelled before every mention was processed.",
    );
  });

  it("fails instead of reporting nothing when no source is configured", async () => {
    const pipeline = new MonitorPipeline(
      { model: lexicon, rules, createIngest: (query) => createDefaultIngest(query, parseIngestEnv({})) },
      options,
    );

    await expect(pipeline.run(request)).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe("assertSourcesConfigured", () => {
  it("returns the configured source names", () => {
    expect(assertSourcesConfigured(parseIngestEnv({ NEWSAPI_API_KEY: "test-key" }))).toEqual(["newsapi"]);
  });

  it("throws when nothing is configured", () => {
    expect(() => assertSourcesConfigured(parseIngestEnv({}))).toThrow(
      "No mention sources are configured; set NEWSAPI_API_KEY, SERPER_API_KEY, SOCIAL_API_URL or BLOG_FEED_URLS",
    );
  });
});
