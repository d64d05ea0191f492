import { describe, expect, it, vi } from "vitest";

import { IngestService } from "../src/modules/ingest/services/ingest.service.js";
import type { Mention, RawRecord, SourceChannel } from "../src/modules/ingest/types/mention.js";
import type { MentionSource } from "../src/modules/ingest/types/provider.js";

function fakeSource(name: string, channel: SourceChannel, records: RawRecord[] | Error): MentionSource {
  return {
    name,
    channel,
    fetch: vi.fn(async () => {
      if (records instanceof Error) {
        throw records;
      }
      return records;
    }),
  };
}

const since = new Date("2025-01-01T00:00:00Z");
const options = { maxFetchLimit: 10, sourceConcurrency: 2 };

describe("IngestService", () => {
  it("skips malformed records, drops duplicates and keeps going past a failing source", async () => {
    const social = fakeSource("social-api", "social", [
      { id: "1", text: "RTX 5090 looks incredible", source: "example.com" },
      { id: "2", author: "@nobody" },
      { id: "3", text: "Drivers crashed again", source: "example.com" },
    ]);
    const news = fakeSource("newsapi", "news", [
      { text: "RTX 5090 looks incredible", source: "example.com" },
      { title: "Nvidia stock climbs", url: "https://markets.test/nvda" },
    ]);
    const broken = fakeSource("broken", "blog", new Error("boom"));

    const service = new IngestService([social, news, broken], options);
    const { mentions, summary } = await service.collect(since);

    expect(mentions.map((mention) => mention.rawText).sort()).toEqual([
      "Drivers crashed again",
      "Nvidia stock climbs",
      "RTX 5090 looks incredible",
    ]);
    expect(summary.admitted).toBe(3);
    expect(summary.malformed).toBe(1);
    expect(summary.duplicates).toBe(1);
    expect(summary.failedSources).toEqual(["broken"]);
    expect(summary.stoppedEarly).toBe(false);

    const brokenSummary = summary.sources.find((entry) => entry.source === "broken");
    expect(brokenSummary?.error).toBe("boom");
    expect(social.fetch).toHaveBeenCalledWith(since);
  });

  it("caps each source at the fetch limit", async () => {
    const source = fakeSource("social-api", "social", [
      { text: "one", source: "a.test" },
      { text: "two", source: "a.test" },
      { text: "three", source: "a.test" },
    ]);

    const service = new IngestService([source], { maxFetchLimit: 1, sourceConcurrency: 1 });
    const { mentions, summary } = await service.collect(since);

    expect(mentions.map((mention) => mention.rawText)).toEqual(["one"]);
    expect(summary.sources[0]).toMatchObject({ fetchedCount: 3, admittedCount: 1, truncatedCount: 2 });
  });

  it("admits nothing once the signal is aborted", async () => {
    const source = fakeSource("social-api", "social", [{ text: "one", source: "a.test" }]);
    const controller = new AbortController();
    controller.abort();

    const service = new IngestService([source], options);
    const { mentions, summary } = await service.collect(since, controller.signal);

    expect(mentions).toHaveLength(0);
    expect(summary.stoppedEarly).toBe(true);
    expect(source.fetch).not.toHaveBeenCalled();
  });

  it("stops a source when the sink rejects without marking it failed", async () => {
    const source = fakeSource("social-api", "social", [
      { text: "one", source: "a.test" },
      { text: "two", source: "a.test" },
    ]);
    const received: Mention[] = [];
    const sink = vi.fn(async (mention: Mention) => {
      if (received.length === 1) {
        throw new Error("queue closed");
      }
      received.push(mention);
      return true;
    });

    const service = new IngestService([source], options);
    const summary = await service.run(since, sink);

    expect(received.map((mention) => mention.rawText)).toEqual(["one"]);
    expect(summary.admitted).toBe(1);
    expect(summary.stoppedEarly).toBe(true);
    expect(summary.failedSources).toEqual([]);
  });

  it("gives the same story from two outlets distinct ids", async () => {
    const news = fakeSource("newsapi", "news", [
      { title: "Nvidia recalls adapters", source: { name: "Reuters" } },
      { title: "Nvidia recalls adapters", url: "https://www.bloomberg.com/nvda" },
    ]);

    const { mentions } = await new IngestService([news], options).collect(since);

    expect(mentions.map((mention) => mention.source)).toEqual(["Reuters", "bloomberg.com"]);
    expect(new Set(mentions.map((mention) => mention.id)).size).toBe(2);
  });

  it("counts mentions the sink turns away as rejected, not admitted", async () => {
    const source = fakeSource("social-api", "social", [
      { text: "one", source: "a.test" },
      { text: "two", source: "a.test" },
      { text: "three", source: "a.test" },
    ]);
    const sink = vi.fn(async (mention: Mention) => mention.rawText !== "two");

    const summary = await new IngestService([source], options).run(since, sink);

    expect(sink).toHaveBeenCalledTimes(3);
    expect(summary.admitted).toBe(2);
    expect(summary.rejected).toBe(1);
    expect(summary.sources[0]).toMatchObject({ admittedCount: 2, rejectedCount: 1 });
    expect(summary.stoppedEarly).toBe(false);
  });
});
