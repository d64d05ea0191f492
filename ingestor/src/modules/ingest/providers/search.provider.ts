import axios, { type AxiosInstance } from "axios";
import type { MentionSource } from "../types/provider.js";
import type { RawRecord, SearchQuery } from "../types/mention.js";
import { buildSearchQueryString } from "../query.js";
import { isRecord, keepSince } from "../../../utils/records.js";

export interface WebSearchSourceOptions {
  apiKey: string;
  baseUrl: string;
  resultCount?: number;
  timeoutMs?: number;
}

interface SerperResponse {
  organic?: unknown;
  news?: unknown;
}

/** Serper web search. Organic and news results are both kept. */
export class WebSearchSource implements MentionSource {
  readonly name = "serper";
  readonly channel = "search" as const;
  private readonly http: AxiosInstance;

  constructor(
    private readonly query: SearchQuery,
    private readonly options: WebSearchSourceOptions,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({ timeout: options.timeoutMs ?? 8000 });
  }

  async fetch(since: Date): Promise<RawRecord[]> {
    const response = await this.http.post<SerperResponse>(
      `${this.options.baseUrl}/search`,
      { q: buildSearchQueryString(this.query), num: this.options.resultCount ?? 20 },
      { headers: { "X-API-KEY": this.options.apiKey, "Content-Type": "application/json" } },
    );

    const body = response.data;
    const organic = Array.isArray(body.organic) ? body.organic.filter(isRecord) : [];
    const news = Array.isArray(body.news) ? body.news.filter(isRecord) : [];
    return keepSince([...organic, ...news], since);
  }
}
