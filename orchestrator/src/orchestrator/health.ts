import type { RunStatus } from "./run_store.js";

export interface HealthSnapshot {
  startTime: number;
  activeRuns: Set<string>;
  finishedRuns: Record<Exclude<RunStatus, "running">, number>;
  lastFinishedAt: number | null;
}

export function createHealthSnapshot(): HealthSnapshot {
  return {
    startTime: Date.now(),
    activeRuns: new Set(),
    finishedRuns: { completed: 0, failed: 0, cancelled: 0 },
    lastFinishedAt: null,
  };
}

export function updateHealthOnStart(snapshot: HealthSnapshot, runId: string): void {
  snapshot.activeRuns.add(runId);
}

export function updateHealthOnFinish(
  snapshot: HealthSnapshot,
  runId: string,
  status: Exclude<RunStatus, "running">,
): void {
  snapshot.activeRuns.delete(runId);
  snapshot.finishedRuns[status] += 1;
  snapshot.lastFinishedAt = Date.now();
}

export function buildHealthPayload(snapshot: HealthSnapshot, orchestratorId: string) {
  return {
    status: "ok" as const,
    orchestratorId,
    uptimeSeconds: Math.round((Date.now() - snapshot.startTime) / 1000),
    activeRuns: Array.from(snapshot.activeRuns),
    finishedRuns: { ...snapshot.finishedRuns },
    lastFinishedAt: snapshot.lastFinishedAt === null ? null : new Date(snapshot.lastFinishedAt).toISOString(),
  };
}
