import type { IngestSummary } from "@mention-pulse/ingestor";
import type { Redis } from "ioredis";

import type { ChartData } from "./report_renderer.js";
import type { QueueStats, Report } from "./types.js";
import { buildRunIndexKey, buildRunKey, safeJsonParse } from "./utils.js";

export type RunStatus = "running" | "completed" | "failed" | "cancelled";

export interface RunRecord {
  runId: string;
  status: RunStatus;
  brand: string;
  keywords: string[];
  since: string;
  createdAt: string;
  updatedAt: string;
  executionTimeSeconds?: number;
  error?: string;
  report?: Report;
  reportMarkdown?: string;
  chartData?: ChartData;
  ingest?: IngestSummary;
  queue?: QueueStats;
}

export interface RunStore {
  save(record: RunRecord): Promise<void>;
  get(runId: string): Promise<RunRecord | null>;
  list(): Promise<RunRecord[]>;
  /** Resolves false when there was nothing to delete. */
  delete(runId: string): Promise<boolean>;
}

function newestFirst(a: RunRecord, b: RunRecord): number {
  return b.createdAt.localeCompare(a.createdAt) || b.runId.localeCompare(a.runId);
}

export class MemoryRunStore implements RunStore {
  private readonly records = new Map<string, RunRecord>();

  async save(record: RunRecord): Promise<void> {
    this.records.set(record.runId, record);
  }

  async get(runId: string): Promise<RunRecord | null> {
    return this.records.get(runId) ?? null;
  }

  async list(): Promise<RunRecord[]> {
    return Array.from(this.records.values()).sort(newestFirst);
  }

  async delete(runId: string): Promise<boolean> {
    return this.records.delete(runId);
  }
}

/** Run records as JSON under `run:{id}` with a TTL, indexed by the `runs:index` set. */
export class RedisRunStore implements RunStore {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number,
  ) {}

  async save(record: RunRecord): Promise<void> {
    await Promise.all([
      this.redis.set(buildRunKey(record.runId), JSON.stringify(record), "EX", this.ttlSeconds),
      this.redis.sadd(buildRunIndexKey(), record.runId),
    ]);
  }

  async get(runId: string): Promise<RunRecord | null> {
    const raw = await this.redis.get(buildRunKey(runId));
    return raw ? safeJsonParse<RunRecord>(raw) : null;
  }

  async list(): Promise<RunRecord[]> {
    const runIds = await this.redis.smembers(buildRunIndexKey());
    if (runIds.length === 0) {
      return [];
    }

    const payloads = await this.redis.mget(...runIds.map(buildRunKey));
    const records: RunRecord[] = [];
    const expired: string[] = [];
    payloads.forEach((raw, index) => {
      const record = raw ? safeJsonParse<RunRecord>(raw) : null;
      if (record) {
        records.push(record);
        return;
      }
      const runId = runIds[index];
      if (runId !== undefined) {
        expired.push(runId);
      }
    });

    if (expired.length > 0) {
      await this.redis.srem(buildRunIndexKey(), ...expired);
    }
    return records.sort(newestFirst);
  }

  async delete(runId: string): Promise<boolean> {
    const [deleted] = await Promise.all([
      this.redis.del(buildRunKey(runId)),
      this.redis.srem(buildRunIndexKey(), runId),
    ]);
    return deleted > 0;
  }
}
