import axios, { type AxiosInstance } from "axios";
import type { MentionSource } from "../types/provider.js";
import type { RawRecord, SearchQuery } from "../types/mention.js";
import { buildSearchQueryString } from "../query.js";
import { isRecord, keepSince } from "../../../utils/records.js";

export interface SocialApiSourceOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

export class SocialApiSource implements MentionSource {
  readonly name = "social-api";
  readonly channel = "social" as const;
  private readonly http: AxiosInstance;

  constructor(
    private readonly query: SearchQuery,
    private readonly options: SocialApiSourceOptions,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({ timeout: options.timeoutMs ?? 8000 });
  }

  async fetch(since: Date): Promise<RawRecord[]> {
    const response = await this.http.get<unknown>(`${this.options.baseUrl}/search`, {
      params: {
        q: buildSearchQueryString(this.query),
        since: since.toISOString(),
      },
      headers: this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : undefined,
    });

    const body = response.data;
    const posts = Array.isArray(body) ? body : isRecord(body) && Array.isArray(body.data) ? body.data : [];
    return keepSince(posts.filter(isRecord), since);
  }
}
