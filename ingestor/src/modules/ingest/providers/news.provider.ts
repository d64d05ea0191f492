import axios, { type AxiosInstance } from "axios";
import type { MentionSource } from "../types/provider.js";
import type { RawRecord, SearchQuery } from "../types/mention.js";
import { buildSearchQueryString } from "../query.js";
import { isRecord, keepSince } from "../../../utils/records.js";

export interface NewsApiSourceOptions {
  apiKey: string;
  baseUrl: string;
  pageSize?: number;
  timeoutMs?: number;
}

interface NewsApiResponse {
  status?: string;
  message?: string;
  articles?: unknown;
}

/** NewsAPI `/everything` search; articles carry `title`, `description`, `url`, `publishedAt` and `source.name`. */
export class NewsApiSource implements MentionSource {
  readonly name = "newsapi";
  readonly channel = "news" as const;
  private readonly http: AxiosInstance;

  constructor(
    private readonly query: SearchQuery,
    private readonly options: NewsApiSourceOptions,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({ timeout: options.timeoutMs ?? 8000 });
  }

  async fetch(since: Date): Promise<RawRecord[]> {
    const response = await this.http.get<NewsApiResponse>(`${this.options.baseUrl}/everything`, {
      params: {
        q: buildSearchQueryString(this.query),
        from: since.toISOString(),
        language: "en",
        sortBy: "publishedAt",
        pageSize: this.options.pageSize ?? 50,
      },
      headers: { "X-Api-Key": this.options.apiKey },
    });

    const body = response.data;
    if (body.status === "error") {
      throw new Error(`NewsAPI error: ${body.message ?? "unknown"}`);
    }

    const articles = Array.isArray(body.articles) ? body.articles.filter(isRecord) : [];
    return keepSince(articles, since);
  }
}
