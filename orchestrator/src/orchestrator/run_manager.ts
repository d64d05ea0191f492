import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";

import { config, type ClusteringMode, type PipelineOptions } from "./config.js";
import { NotFoundError, RunCancelledError } from "./errors.js";
import { errorMessage, logRecoverableError } from "./error_utils.js";
import { createHealthSnapshot, updateHealthOnFinish, updateHealthOnStart, type HealthSnapshot } from "./health.js";
import { logger } from "./logger.js";
import { runDurationSeconds, runsTotal } from "./metrics.js";
import type { PipelineRunInput } from "./pipeline.js";
import { buildChartData } from "./report_renderer.js";
import type { RunRecord, RunStatus, RunStore } from "./run_store.js";
import type { PipelineResult } from "./types.js";
import { roundTo } from "./utils.js";

export interface PipelineRunner {
  run(input: PipelineRunInput, signal?: AbortSignal, overrides?: Partial<PipelineOptions>): Promise<PipelineResult>;
}

export interface StartRunRequest {
  brand: string;
  keywords: string[];
  since?: Date;
  clusteringMode?: ClusteringMode;
  partialReport?: boolean;
}

export interface RunManagerOptions {
  lookbackHours?: number;
  clock?: () => Date;
  health?: HealthSnapshot;
}

interface ActiveRun {
  controller: AbortController;
  done: Promise<void>;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `run_YYYYMMDD_HHMMSS_xxxxxxxx` in UTC. */
export function generateRunId(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `run_${date}_${time}_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

export class RunManager {
  readonly health: HealthSnapshot;
  private readonly active = new Map<string, ActiveRun>();
  private readonly lookbackHours: number;
  private readonly clock: () => Date;

  constructor(
    private readonly pipeline: PipelineRunner,
    private readonly store: RunStore,
    options: RunManagerOptions = {},
  ) {
    this.lookbackHours = options.lookbackHours ?? config.LOOKBACK_HOURS;
    this.clock = options.clock ?? (() => new Date());
    this.health = options.health ?? createHealthSnapshot();
  }

  /** Records the run as running and starts the pipeline in the background. */
  async start(request: StartRunRequest): Promise<RunRecord> {
    const now = this.clock();
    const runId = generateRunId(now);
    const since = request.since ?? new Date(now.getTime() - this.lookbackHours * 60 * 60 * 1000);
    const record: RunRecord = {
      runId,
      status: "running",
      brand: request.brand,
      keywords: request.keywords,
      since: since.toISOString(),
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    };
    await this.store.save(record);

    const overrides: Partial<PipelineOptions> = {};
    if (request.clusteringMode !== undefined) overrides.clusteringMode = request.clusteringMode;
    if (request.partialReport !== undefined) overrides.partialReport = request.partialReport;

    const controller = new AbortController();
    updateHealthOnStart(this.health, runId);
    logger.info({ runId, brand: request.brand, keywords: request.keywords }, "Run started");

    const input: PipelineRunInput = { runId, brand: request.brand, keywords: request.keywords, since };
    const done = this.execute(record, input, controller, overrides)
      .catch((error: unknown) => {
        logRecoverableError(logger, error, { location: "RunManager.execute", runId }, "Failed to record run result");
      })
      .finally(() => {
        this.active.delete(runId);
      });
    this.active.set(runId, { controller, done });
    return record;
  }

  async get(runId: string): Promise<RunRecord | null> {
    return this.store.get(runId);
  }

  async list(): Promise<RunRecord[]> {
    return this.store.list();
  }

  isActive(runId: string): boolean {
    return this.active.has(runId);
  }

  /**
   * Aborts a running run and returns its final record. A finished run is
   * removed instead, and null is returned.
   */
  async cancel(runId: string): Promise<RunRecord | null> {
    const run = this.active.get(runId);
    if (run) {
      run.controller.abort();
      await run.done;
      return this.store.get(runId);
    }

    const deleted = await this.store.delete(runId);
    if (!deleted) {
      throw new NotFoundError(`Run ${runId} not found`);
    }
    logger.info({ runId }, "Run record removed");
    return null;
  }

  async waitFor(runId: string): Promise<RunRecord | null> {
    await this.active.get(runId)?.done;
    return this.store.get(runId);
  }

  async stop(): Promise<void> {
    const runs = Array.from(this.active.values());
    runs.forEach((run) => run.controller.abort());
    await Promise.all(runs.map((run) => run.done));
  }

  private async execute(
    record: RunRecord,
    input: PipelineRunInput,
    controller: AbortController,
    overrides: Partial<PipelineOptions>,
  ): Promise<void> {
    const startedAt = performance.now();
    let final: RunRecord;

    try {
      const result = await this.pipeline.run(input, controller.signal, overrides);
      final = {
        ...record,
        status: controller.signal.aborted ? "cancelled" : "completed",
        report: result.report,
        reportMarkdown: result.markdown,
        chartData: buildChartData(result.report),
        ingest: result.ingest,
        queue: result.queue,
      };
    } catch (error) {
      const status: RunStatus = error instanceof RunCancelledError ? "cancelled" : "failed";
      if (status === "failed") {
        logRecoverableError(
          logger,
          error,
          { location: "RunManager.execute", runId: record.runId, brand: record.brand },
          "Run failed",
        );
      }
      final = { ...record, status, error: errorMessage(error) };
    }

    const elapsedSeconds = (performance.now() - startedAt) / 1000;
    final.executionTimeSeconds = roundTo(elapsedSeconds, 3);
    final.updatedAt = this.clock().toISOString();

    runsTotal.inc({ status: final.status });
    runDurationSeconds.observe(elapsedSeconds);
    if (final.status !== "running") {
      updateHealthOnFinish(this.health, record.runId, final.status);
    }

    await this.store.save(final);
    logger.info(
      { runId: record.runId, status: final.status, executionTimeSeconds: final.executionTimeSeconds },
      "Run finished",
    );
  }
}
