import { performance } from "node:perf_hooks";
import { config } from "./config.js";

export function safeJsonParse<T>(raw: string): T | null {
  try {
    return JSON.parse(raw) as T;
  } catch {
    return null;
  }
}

export function buildRunKey(runId: string): string {
  return `run:${runId}`;
}

export function buildRunIndexKey(): string {
  return "runs:index";
}

export interface TimedResult<T> {
  result: T;
  durationMs: number;
}

export function measure<T>(fn: () => T): TimedResult<T> {
  const start = performance.now();
  const result = fn();
  return { result, durationMs: performance.now() - start };
}

export async function sleep(seconds: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, seconds * 1000));
}

export interface BackoffOptions {
  retries?: number;
  baseDelaySeconds?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delaySeconds: number) => void;
}

/** Retries `operation` `retries` times after the first attempt, doubling the delay each time. */
export async function exponentialBackoff<T>(operation: () => Promise<T>, options: BackoffOptions = {}): Promise<T> {
  const {
    retries = config.CLASSIFIER_MAX_ATTEMPTS - 1,
    baseDelaySeconds = config.RETRY_BACKOFF_BASE,
    shouldRetry = () => true,
    onRetry,
  } = options;
  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await operation();
    } catch (error) {
      attempt += 1;
      if (attempt > retries || !shouldRetry(error)) {
        throw error;
      }
      const delay = baseDelaySeconds * 2 ** (attempt - 1);
      onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    Object.values(value).forEach((child) => {
      deepFreeze(child);
    });
    Object.freeze(value);
  }
  return value;
}
