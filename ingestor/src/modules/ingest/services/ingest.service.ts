import pLimit from "p-limit";
import { env } from "../../../config/env.js";
import { MalformedRecordError } from "../../../utils/errors.js";
import { logger } from "../../../utils/logger.js";
import type { Mention, SourceChannel } from "../types/mention.js";
import type { MentionSource } from "../types/provider.js";
import { MentionDeduplicationService } from "./deduplication.service.js";
import { MentionNormalizerService } from "./normalizer.service.js";

/** Resolves false when the mention was turned away (a full queue under the reject policy). */
export type MentionSink = (mention: Mention) => Promise<boolean>;

export interface SourceSummary {
  source: string;
  channel: SourceChannel;
  fetchedCount: number;
  admittedCount: number;
  malformedCount: number;
  duplicateCount: number;
  rejectedCount: number;
  truncatedCount: number;
  fetchDurationMs: number;
  error?: string;
}

export interface IngestSummary {
  sources: SourceSummary[];
  admitted: number;
  malformed: number;
  duplicates: number;
  rejected: number;
  failedSources: string[];
  stoppedEarly: boolean;
}

export interface IngestServiceOptions {
  maxFetchLimit: number;
  sourceConcurrency: number;
}

export class IngestService {
  constructor(
    private readonly sources: MentionSource[],
    private readonly options: IngestServiceOptions = {
      maxFetchLimit: env.ingest.maxFetchLimit,
      sourceConcurrency: env.ingest.sourceConcurrency,
    },
    private readonly normalizer: MentionNormalizerService = new MentionNormalizerService(),
  ) {}

  /**
   * Fetches every source, normalizes and deduplicates the records, and hands
   * each mention to `sink`. The sink may block; a false result counts the
   * mention as rejected, a sink error stops that source.
   */
  async run(since: Date, sink: MentionSink, signal?: AbortSignal): Promise<IngestSummary> {
    const deduplicator = new MentionDeduplicationService();
    const limit = pLimit(Math.max(1, this.options.sourceConcurrency));
    let stoppedEarly = false;

    const summaries = await Promise.all(
      this.sources.map((source) =>
        limit(async () => {
          const summary = await this.processSource(source, since, sink, deduplicator, signal);
          if (summary.stopped) {
            stoppedEarly = true;
          }
          return summary.result;
        }),
      ),
    );

    const result: IngestSummary = {
      sources: summaries,
      admitted: summaries.reduce((acc, summary) => acc + summary.admittedCount, 0),
      malformed: summaries.reduce((acc, summary) => acc + summary.malformedCount, 0),
      duplicates: summaries.reduce((acc, summary) => acc + summary.duplicateCount, 0),
      rejected: summaries.reduce((acc, summary) => acc + summary.rejectedCount, 0),
      failedSources: summaries.filter((summary) => summary.error !== undefined).map((summary) => summary.source),
      stoppedEarly: stoppedEarly || Boolean(signal?.aborted),
    };

    logger.info(
      {
        sources: summaries.length,
        admitted: result.admitted,
        malformed: result.malformed,
        duplicates: result.duplicates,
        rejected: result.rejected,
        failedSources: result.failedSources,
        stoppedEarly: result.stoppedEarly,
      },
      "Ingest run finished",
    );

    return result;
  }

  async collect(since: Date, signal?: AbortSignal): Promise<{ mentions: Mention[]; summary: IngestSummary }> {
    const mentions: Mention[] = [];
    const summary = await this.run(
      since,
      async (mention) => {
        mentions.push(mention);
        return true;
      },
      signal,
    );
    return { mentions, summary };
  }

  private async processSource(
    source: MentionSource,
    since: Date,
    sink: MentionSink,
    deduplicator: MentionDeduplicationService,
    signal?: AbortSignal,
  ): Promise<{ result: SourceSummary; stopped: boolean }> {
    const summary: SourceSummary = {
      source: source.name,
      channel: source.channel,
      fetchedCount: 0,
      admittedCount: 0,
      malformedCount: 0,
      duplicateCount: 0,
      rejectedCount: 0,
      truncatedCount: 0,
      fetchDurationMs: 0,
    };

    if (signal?.aborted) {
      return { result: summary, stopped: true };
    }

    const fetchStart = Date.now();
    let records: unknown[];
    try {
      records = await source.fetch(since);
    } catch (error) {
      summary.fetchDurationMs = Date.now() - fetchStart;
      summary.error = error instanceof Error ? error.message : "Unknown error";
      logger.warn(
        { source: source.name, channel: source.channel, error, fetchDurationMs: summary.fetchDurationMs },
        "Failed to fetch mentions from source",
      );
      return { result: summary, stopped: false };
    }
    summary.fetchDurationMs = Date.now() - fetchStart;
    summary.fetchedCount = records.length;

    const capped = records.slice(0, this.options.maxFetchLimit);
    summary.truncatedCount = records.length - capped.length;
    if (summary.truncatedCount > 0) {
      logger.warn(
        { source: source.name, truncatedCount: summary.truncatedCount },
        "Source results truncated to max fetch limit",
      );
    }

    for (const record of capped) {
      if (signal?.aborted) {
        return { result: summary, stopped: true };
      }

      let mention: Mention;
      try {
        mention = this.normalizer.normalize(record, source);
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) {
          throw error;
        }
        summary.malformedCount += 1;
        logger.warn({ source: source.name, reason: error.reason }, "Skipped malformed record");
        continue;
      }

      if (!deduplicator.admit(mention)) {
        summary.duplicateCount += 1;
        logger.debug({ source: source.name, mentionId: mention.id }, "Skipped duplicate mention");
        continue;
      }

      let accepted: boolean;
      try {
        accepted = await sink(mention);
      } catch (error) {
        logger.info({ source: source.name, error }, "Mention sink closed; stopping source");
        return { result: summary, stopped: true };
      }
      if (accepted) {
        summary.admittedCount += 1;
      } else {
        summary.rejectedCount += 1;
      }
    }

    logger.debug(
      {
        source: source.name,
        fetched: summary.fetchedCount,
        admitted: summary.admittedCount,
        malformed: summary.malformedCount,
        duplicates: summary.duplicateCount,
        rejected: summary.rejectedCount,
      },
      "Source ingested",
    );

    return { result: summary, stopped: false };
  }
}
