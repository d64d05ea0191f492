import { readFileSync } from "node:fs";
import { z } from "zod";
import type { TermVector } from "./types.js";

const STOPWORDS_PATH = new URL("../../data/stopwords.json", import.meta.url);

const StopwordsSchema = z.object({ words: z.array(z.string()) });

const STOPWORDS: ReadonlySet<string> = new Set(
  StopwordsSchema.parse(JSON.parse(readFileSync(STOPWORDS_PATH, "utf8"))).words,
);

const MIN_TOKEN_LENGTH = 3;

export function tokenizeForThemes(text: string): string[] {
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).filter(
    (token) => token.length >= MIN_TOKEN_LENGTH && !STOPWORDS.has(token),
  );
}

/** Unit-length term-count vector. Empty when the text has no content tokens. */
export function embedText(text: string): TermVector {
  const counts = new Map<string, number>();
  for (const token of tokenizeForThemes(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return normalizeVector(counts);
}

export function normalizeVector(vector: TermVector): TermVector {
  let norm = 0;
  for (const value of vector.values()) {
    norm += value * value;
  }
  if (norm === 0) {
    return new Map();
  }
  const length = Math.sqrt(norm);
  const normalized = new Map<string, number>();
  for (const [term, value] of vector) {
    normalized.set(term, value / length);
  }
  return normalized;
}

export function cosineSimilarity(a: TermVector, b: TermVector): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [term, value] of small) {
    const other = large.get(term);
    if (other !== undefined) {
      dot += value * other;
    }
  }
  if (dot === 0) {
    return 0;
  }
  let normA = 0;
  let normB = 0;
  for (const value of a.values()) normA += value * value;
  for (const value of b.values()) normB += value * value;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Running mean: the centroid of `count` members plus one more vector. */
export function addToCentroid(centroid: TermVector, count: number, vector: TermVector): TermVector {
  const next = new Map<string, number>();
  for (const [term, value] of centroid) {
    next.set(term, value * count);
  }
  for (const [term, value] of vector) {
    next.set(term, (next.get(term) ?? 0) + value);
  }
  for (const [term, value] of next) {
    next.set(term, value / (count + 1));
  }
  return next;
}

/** Terms by descending weight, alphabetical on ties. */
export function topTerms(vector: TermVector, limit: number): string[] {
  return Array.from(vector.entries())
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, limit)
    .map(([term]) => term);
}
