import { contentHash } from "@mention-pulse/ingestor";

import type { ClassifiedMention, Mention, Polarity, Theme } from "../src/orchestrator/types.js";

export const BASE_TIME = Date.UTC(2025, 0, 15, 12, 0, 0);

export function makeMention(id: string, rawText: string, overrides: Partial<Mention> = {}): Mention {
  return Object.freeze({
    id,
    source: "example.com",
    rawText,
    timestamp: BASE_TIME,
    channel: "social" as const,
    contentHash: contentHash(rawText),
    ...overrides,
  });
}

export function makeClassified(
  id: string,
  rawText: string,
  polarity: Polarity,
  confidence = 0.9,
  overrides: Partial<ClassifiedMention> = {},
): ClassifiedMention {
  return Object.freeze({
    ...makeMention(id, rawText),
    status: "classified" as const,
    polarity,
    rawPolarity: polarity,
    confidence,
    modelVersion: "test-model",
    provenance: "measured" as const,
    ...overrides,
  });
}

export function makeTheme(
  id: string,
  members: ClassifiedMention[],
  label = id,
  keywords: string[] = [],
): Theme {
  return Object.freeze({
    id,
    label,
    keywords,
    members,
    representativeText: members[0]?.rawText ?? "",
    centroid: new Map<string, number>(),
  });
}
