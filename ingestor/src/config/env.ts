import { config } from "dotenv";
import { z } from "zod";

config();

const EnvSchema = z.object({
  NEWSAPI_API_KEY: z.string().optional(),
  NEWSAPI_URL: z.string().url().default("https://newsapi.org/v2"),
  SERPER_API_KEY: z.string().optional(),
  SERPER_URL: z.string().url().default("https://google.serper.dev"),
  SOCIAL_API_URL: z.string().url().optional(),
  SOCIAL_API_KEY: z.string().optional(),
  BLOG_FEED_URLS: z.string().default(""),
  INGEST_MAX_FETCH_LIMIT: z.coerce.number().int().min(1).default(100),
  INGEST_SOURCE_CONCURRENCY: z.coerce.number().int().min(1).default(3),
  INGEST_HTTP_TIMEOUT_MS: z.coerce.number().int().min(100).default(8000),
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type IngestEnvSource = Record<string, string | undefined>;

function withoutBlanks(source: IngestEnvSource): IngestEnvSource {
  const cleaned: IngestEnvSource = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function parseIngestEnv(source: IngestEnvSource) {
  const parsed = EnvSchema.safeParse(withoutBlanks(source));

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join(", ");
    console.warn(`[env] Invalid ingestor values detected. Falling back to defaults: ${issues}`);
  }

  const values = parsed.success ? parsed.data : EnvSchema.parse({});

  return {
    newsApi: { apiKey: values.NEWSAPI_API_KEY, baseUrl: values.NEWSAPI_URL },
    serper: { apiKey: values.SERPER_API_KEY, baseUrl: values.SERPER_URL },
    social: { baseUrl: values.SOCIAL_API_URL, apiKey: values.SOCIAL_API_KEY },
    blogFeeds: values.BLOG_FEED_URLS.split(",")
      .map((url) => url.trim())
      .filter(Boolean),
    ingest: {
      maxFetchLimit: values.INGEST_MAX_FETCH_LIMIT,
      sourceConcurrency: values.INGEST_SOURCE_CONCURRENCY,
      httpTimeoutMs: values.INGEST_HTTP_TIMEOUT_MS,
    },
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL,
  };
}

export type IngestEnv = ReturnType<typeof parseIngestEnv>;

export const env: IngestEnv = parseIngestEnv({ ...process.env });
