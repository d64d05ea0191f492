import axios, { type AxiosInstance } from "axios";
import { XMLParser } from "fast-xml-parser";
import type { MentionSource } from "../types/provider.js";
import type { RawRecord, SearchQuery } from "../types/mention.js";
import { logger } from "../../../utils/logger.js";
import { asArray, firstText, isRecord, keepSince } from "../../../utils/records.js";
import { mentionsAnyTerm } from "../../../utils/text.js";

export interface BlogFeedSourceOptions {
  feedUrls: string[];
  timeoutMs?: number;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
});

export function parseFeedItems(xml: string): RawRecord[] {
  const parsed: unknown = parser.parse(xml);
  if (!isRecord(parsed)) return [];

  const rss = parsed.rss;
  if (isRecord(rss) && isRecord(rss.channel)) {
    return asArray(rss.channel.item).filter(isRecord);
  }

  const feed = parsed.feed;
  if (isRecord(feed)) {
    return asArray(feed.entry).filter(isRecord);
  }

  return [];
}

/** Scrapes RSS 2.0 and Atom feeds, keeping items that mention the brand or a keyword. */
export class BlogFeedSource implements MentionSource {
  readonly name = "blog-feeds";
  readonly channel = "blog" as const;
  private readonly http: AxiosInstance;

  constructor(
    private readonly query: SearchQuery,
    private readonly options: BlogFeedSourceOptions,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({ timeout: options.timeoutMs ?? 8000 });
  }

  async fetch(since: Date): Promise<RawRecord[]> {
    const terms = [this.query.brand, ...this.query.keywords];
    const collected: RawRecord[] = [];
    const failures: string[] = [];

    for (const feedUrl of this.options.feedUrls) {
      try {
        const response = await this.http.get<string>(feedUrl, { responseType: "text" });
        const items = parseFeedItems(String(response.data));
        const relevant = items.filter((item) => {
          const text = [firstText(item, ["title"]), firstText(item, ["description", "summary", "content"])]
            .filter((part): part is string => part !== null)
            .join(" ");
          return mentionsAnyTerm(text, terms);
        });
        collected.push(...relevant);
      } catch (error) {
        logger.warn({ feedUrl, error }, "Failed to read blog feed");
        failures.push(`${feedUrl}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    if (failures.length > 0 && failures.length === this.options.feedUrls.length) {
      throw new Error(`All ${failures.length} blog feeds failed (${failures.join("; ")})`);
    }

    return keepSince(collected, since);
  }
}
