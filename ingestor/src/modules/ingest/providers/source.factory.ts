import type { AxiosInstance } from "axios";
import type { IngestEnv } from "../../../config/env.js";
import type { MentionSource } from "../types/provider.js";
import type { SearchQuery } from "../types/mention.js";
import { BlogFeedSource } from "./blog.provider.js";
import { NewsApiSource } from "./news.provider.js";
import { WebSearchSource } from "./search.provider.js";
import { SocialApiSource } from "./social.provider.js";

/** Names of the sources `createSources` would build, in the same order. */
export function configuredSourceNames(settings: IngestEnv): string[] {
  const names: string[] = [];
  if (settings.social.baseUrl) names.push("social-api");
  if (settings.newsApi.apiKey) names.push("newsapi");
  if (settings.blogFeeds.length > 0) names.push("blog-feeds");
  if (settings.serper.apiKey) names.push("serper");
  return names;
}

/** Builds every source whose credentials or URLs are configured. */
export function createSources(query: SearchQuery, settings: IngestEnv, http?: AxiosInstance): MentionSource[] {
  const timeoutMs = settings.ingest.httpTimeoutMs;
  const sources: MentionSource[] = [];

  if (settings.social.baseUrl) {
    sources.push(
      new SocialApiSource(query, { baseUrl: settings.social.baseUrl, apiKey: settings.social.apiKey, timeoutMs }, http),
    );
  }

  if (settings.newsApi.apiKey) {
    sources.push(
      new NewsApiSource(query, { apiKey: settings.newsApi.apiKey, baseUrl: settings.newsApi.baseUrl, timeoutMs }, http),
    );
  }

  if (settings.blogFeeds.length > 0) {
    sources.push(new BlogFeedSource(query, { feedUrls: settings.blogFeeds, timeoutMs }, http));
  }

  if (settings.serper.apiKey) {
    sources.push(
      new WebSearchSource(query, { apiKey: settings.serper.apiKey, baseUrl: settings.serper.baseUrl, timeoutMs }, http),
    );
  }

  return sources;
}
