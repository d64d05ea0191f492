import {
  IngestService,
  configuredSourceNames,
  createSources,
  env as ingestEnv,
  type IngestEnv,
  type IngestSummary,
  type MentionSink,
  type SearchQuery,
} from "@mention-pulse/ingestor";
import { performance } from "node:perf_hooks";

import { aggregateSentiment } from "./aggregator.js";
import { BoundedQueue } from "./bounded_queue.js";
import { ScoreCache, SentimentClassifier } from "./classifier.js";
import { assignToTheme, clusterMentions, createClusteringContext, freezeThemes } from "./clusterer.js";
import { resolvePipelineOptions, type PipelineOptions } from "./config.js";
import { ConfigurationError, QueueFullError, RunCancelledError } from "./errors.js";
import { logger } from "./logger.js";
import {
  duplicateMentionsTotal,
  malformedRecordsTotal,
  mentionsIngestedTotal,
  queueDepth,
  queueRejectionsTotal,
} from "./metrics.js";
import type { RecommendationRuleSet } from "./recommendations.js";
import { renderReportMarkdown } from "./report_renderer.js";
import { ReorderBuffer } from "./reorder_buffer.js";
import type { SentimentModel } from "./sentiment_model.js";
import { synthesizeReport } from "./summary_generator.js";
import type {
  ClassificationOutcome,
  ClassifiedMention,
  Mention,
  PipelineResult,
  QueueStats,
  RunRequest,
  UnclassifiedMention,
} from "./types.js";
import { measure } from "./utils.js";

export interface MentionIngest {
  run(since: Date, sink: MentionSink, signal?: AbortSignal): Promise<IngestSummary>;
}

export type IngestFactory = (query: SearchQuery) => MentionIngest;

/** Names of the configured mention sources; throws when there are none. */
export function assertSourcesConfigured(settings: IngestEnv = ingestEnv): string[] {
  const names = configuredSourceNames(settings);
  if (names.length === 0) {
    throw new ConfigurationError(
      "No mention sources are configured; set NEWSAPI_API_KEY, SERPER_API_KEY, SOCIAL_API_URL or BLOG_FEED_URLS",
    );
  }
  return names;
}

export function createDefaultIngest(query: SearchQuery, settings: IngestEnv = ingestEnv): MentionIngest {
  assertSourcesConfigured(settings);
  return new IngestService(createSources(query, settings));
}

export interface PipelineDependencies {
  model: SentimentModel;
  rules: RecommendationRuleSet;
  createIngest?: IngestFactory;
  /** Shared across runs so re-classifying the same text is free and stable. */
  scoreCache?: ScoreCache;
  clock?: () => Date;
}

export interface PipelineRunInput extends RunRequest {
  runId: string;
}

function isRejected(outcome: PromiseSettledResult<unknown>): outcome is PromiseRejectedResult {
  return outcome.status === "rejected";
}

/**
 * Ingest feeds a bounded queue drained by classifier workers; outcomes pass
 * through a reorder buffer so online clustering sees admission order.
 */
export class MonitorPipeline {
  private readonly createIngest: IngestFactory;
  private readonly scoreCache: ScoreCache;
  private readonly clock: () => Date;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly defaults: PipelineOptions = resolvePipelineOptions(),
  ) {
    this.createIngest = deps.createIngest ?? createDefaultIngest;
    this.scoreCache = deps.scoreCache ?? new ScoreCache();
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(
    input: PipelineRunInput,
    signal?: AbortSignal,
    overrides: Partial<PipelineOptions> = {},
  ): Promise<PipelineResult> {
    const options: PipelineOptions = { ...this.defaults, ...overrides };
    const log = logger.child({ runId: input.runId, brand: input.brand });
    const startedAt = performance.now();
    const ingest = this.createIngest({ brand: input.brand, keywords: input.keywords });

    const queue = new BoundedQueue<Mention>(options.queueCapacity, options.queuePolicy);
    const reorder = new ReorderBuffer<ClassificationOutcome>();
    const classifier = new SentimentClassifier(
      this.deps.model,
      {
        confidenceThreshold: options.confidenceThreshold,
        maxAttempts: options.maxAttempts,
        retryBaseDelaySeconds: options.retryBaseDelaySeconds,
      },
      this.scoreCache,
    );
    const context = createClusteringContext(options.similarityThreshold);
    const classified: ClassifiedMention[] = [];
    const unclassified: UnclassifiedMention[] = [];
    const stats: QueueStats = { admitted: 0, rejected: 0, discarded: 0 };

    const release = (outcomes: ClassificationOutcome[]): void => {
      for (const outcome of outcomes) {
        if (outcome.status === "unclassified") {
          unclassified.push(outcome);
          continue;
        }
        classified.push(outcome);
        if (options.clusteringMode === "online") {
          assignToTheme(context, outcome);
        }
      }
    };

    const onAbort = (): void => {
      stats.discarded += queue.close({ discardPending: true });
      queueDepth.set(0);
      log.warn({ discarded: stats.discarded }, "Run cancelled; pending mentions discarded");
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    const sink: MentionSink = async (mention) => {
      try {
        await queue.push(mention);
      } catch (error) {
        if (error instanceof QueueFullError) {
          stats.rejected += 1;
          queueRejectionsTotal.inc();
          log.warn({ mentionId: mention.id, capacity: error.capacity }, "Mention queue full; mention rejected");
          return false;
        }
        throw error;
      }
      stats.admitted += 1;
      queueDepth.set(queue.size);
      return true;
    };

    const producer = (async () => {
      try {
        return await ingest.run(input.since, sink, signal);
      } finally {
        queue.close();
      }
    })();

    const worker = async (): Promise<void> => {
      for (let item = await queue.pull(); item; item = await queue.pull()) {
        queueDepth.set(queue.size);
        const outcome = await classifier.classify(item.value);
        release(reorder.accept(item.seq, outcome));
      }
    };
    const workers = Promise.allSettled(
      Array.from({ length: options.classifierConcurrency }, () =>
        worker().catch((error: unknown) => {
          queue.close({ discardPending: true });
          throw error;
        }),
      ),
    );

    let ingestSummary: IngestSummary;
    try {
      ingestSummary = await producer;
    } catch (error) {
      queue.close({ discardPending: true });
      await workers;
      throw error;
    }
    const failedWorker = (await workers).find(isRejected);
    signal?.removeEventListener("abort", onAbort);
    if (failedWorker) {
      throw failedWorker.reason;
    }
    const classifyMs = performance.now() - startedAt;

    release(reorder.flush());
    mentionsIngestedTotal.inc(ingestSummary.admitted);
    malformedRecordsTotal.inc(ingestSummary.malformed);
    duplicateMentionsTotal.inc(ingestSummary.duplicates);

    const cancelled = signal?.aborted ?? false;
    if (cancelled && !options.partialReport) {
      log.info({ classified: classified.length, discarded: stats.discarded }, "Run cancelled without a report");
      throw new RunCancelledError(`Run ${input.runId} was cancelled`);
    }

    const { result: themes, durationMs: clusterMs } = measure(() =>
      options.clusteringMode === "online"
        ? freezeThemes(context)
        : clusterMentions(classified, { mode: "batch", similarityThreshold: options.similarityThreshold }),
    );

    const { result: aggregated, durationMs: aggregateMs } = measure(() =>
      aggregateSentiment(
        { themes, unclassified },
        { escalationThresholdPct: options.escalationThresholdPct, notableTopK: options.notableTopK },
      ),
    );

    const { result: report, durationMs: synthesisMs } = measure(() =>
      synthesizeReport({
        runId: input.runId,
        brand: input.brand,
        aggregated,
        rules: this.deps.rules,
        audit: {
          modelVersion: classifier.modelVersion,
          clusteringMode: options.clusteringMode,
          confidenceThreshold: options.confidenceThreshold,
          similarityThreshold: options.similarityThreshold,
          escalationThresholdPct: options.escalationThresholdPct,
        },
        partial: cancelled,
        generatedAt: this.clock(),
      }),
    );

    const markdown = renderReportMarkdown(report);
    const totalMs = performance.now() - startedAt;

    log.info(
      {
        admitted: ingestSummary.admitted,
        classified: report.counts.classified,
        unclassified: report.counts.unclassified,
        themes: report.themes.length,
        partial: report.partial,
        totalMs: Number(totalMs.toFixed(2)),
      },
      "Report synthesized",
    );

    return {
      report,
      markdown,
      ingest: ingestSummary,
      queue: stats,
      timings: { totalMs, classifyMs, clusterMs, aggregateMs, synthesisMs },
    };
  }
}
