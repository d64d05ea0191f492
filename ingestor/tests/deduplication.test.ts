import { describe, expect, it } from "vitest";

import { MentionDeduplicationService } from "../src/modules/ingest/services/deduplication.service.js";
import { MentionNormalizerService } from "../src/modules/ingest/services/normalizer.service.js";

describe("MentionDeduplicationService", () => {
  const normalizer = new MentionNormalizerService(() => 0);
  const source = { name: "newsapi", channel: "news" as const };

  it("keeps exactly one mention when the same record is ingested twice", () => {
    const record = { text: "Nvidia beats earnings", source: "reuters.com", url: "https://reuters.com/a" };
    const first = normalizer.normalize(record, source);
    const second = normalizer.normalize({ ...record }, source);

    const result = new MentionDeduplicationService().deduplicate([first, second]);

    expect(result.unique).toEqual([first]);
    expect(result.duplicates).toHaveLength(1);
  });

  it("treats case and whitespace variants from the same source as duplicates", () => {
    const dedup = new MentionDeduplicationService();
    const a = normalizer.normalize({ text: "Nvidia  beats earnings", source: "Reuters.com" }, source);
    const b = normalizer.normalize({ text: "nvidia beats EARNINGS", source: "reuters.com" }, source);

    expect(dedup.admit(a)).toBe(true);
    expect(dedup.admit(b)).toBe(false);
    expect(dedup.size).toBe(1);
  });

  it("keeps the same text from different sources", () => {
    const a = normalizer.normalize({ text: "Nvidia beats earnings", source: "reuters.com" }, source);
    const b = normalizer.normalize({ text: "Nvidia beats earnings", source: "bloomberg.com" }, source);

    const result = new MentionDeduplicationService().deduplicate([a, b]);

    expect(result.unique).toHaveLength(2);
    expect(result.duplicates).toHaveLength(0);
  });
});
