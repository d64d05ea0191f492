export { env, parseIngestEnv } from "./config/env.js";
export type { IngestEnv, IngestEnvSource } from "./config/env.js";
export { AppError, MalformedRecordError } from "./utils/errors.js";
export type { MalformedReason } from "./utils/errors.js";
export { sha256Hex, contentHash } from "./utils/text.js";
export type { Mention, RawRecord, SearchQuery, SourceChannel } from "./modules/ingest/types/mention.js";
export type { MentionSource } from "./modules/ingest/types/provider.js";
export { buildSearchQueryString, parseKeywords } from "./modules/ingest/query.js";
export { NewsApiSource } from "./modules/ingest/providers/news.provider.js";
export { SocialApiSource } from "./modules/ingest/providers/social.provider.js";
export { WebSearchSource } from "./modules/ingest/providers/search.provider.js";
export { BlogFeedSource, parseFeedItems } from "./modules/ingest/providers/blog.provider.js";
export { configuredSourceNames, createSources } from "./modules/ingest/providers/source.factory.js";
export { MentionNormalizerService } from "./modules/ingest/services/normalizer.service.js";
export { MentionDeduplicationService } from "./modules/ingest/services/deduplication.service.js";
export { IngestService } from "./modules/ingest/services/ingest.service.js";
export type {
  IngestServiceOptions,
  IngestSummary,
  MentionSink,
  SourceSummary,
} from "./modules/ingest/services/ingest.service.js";
