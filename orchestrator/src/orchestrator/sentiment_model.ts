import axios, { type AxiosInstance } from "axios";
import { readFileSync } from "node:fs";
import { z } from "zod";

import { config } from "./config.js";
import { ClassifierUnavailableError } from "./errors.js";
import type { ModelScore, Polarity } from "./types.js";
import { roundTo } from "./utils.js";

export interface SentimentModel {
  readonly version: string;
  score(text: string): Promise<ModelScore>;
}

const DEFAULT_LEXICON_PATH = new URL("../../data/sentiment-lexicon.json", import.meta.url);

const LexiconSchema = z.object({
  version: z.string().min(1),
  positive: z.record(z.number().positive()),
  negative: z.record(z.number().positive()),
  negators: z.array(z.string()),
  intensifiers: z.record(z.number().positive()),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

export function loadLexicon(path: URL | string = DEFAULT_LEXICON_PATH): Lexicon {
  return LexiconSchema.parse(JSON.parse(readFileSync(path, "utf8")));
}

const NEUTRAL_WHEN_SILENT: ModelScore = { polarity: "neutral", confidence: 0.6 };
const NEGATION_WINDOW = 2;

/**
 * Deterministic lexicon scorer. A negator within the two tokens before a
 * term flips it; an intensifier right before a term scales its weight.
 */
export class LexiconSentimentModel implements SentimentModel {
  readonly version: string;
  private readonly positive: ReadonlyMap<string, number>;
  private readonly negative: ReadonlyMap<string, number>;
  private readonly negators: ReadonlySet<string>;
  private readonly intensifiers: ReadonlyMap<string, number>;

  constructor(lexicon: Lexicon = loadLexicon(), version?: string) {
    this.version = version ?? lexicon.version;
    this.positive = new Map(Object.entries(lexicon.positive));
    this.negative = new Map(Object.entries(lexicon.negative));
    this.negators = new Set(lexicon.negators);
    this.intensifiers = new Map(Object.entries(lexicon.intensifiers));
  }

  async score(text: string): Promise<ModelScore> {
    return this.scoreSync(text);
  }

  scoreSync(text: string): ModelScore {
    const tokens = text.toLowerCase().match(/[a-z0-9]+(?:'[a-z]+)?/g) ?? [];
    let positive = 0;
    let negative = 0;

    tokens.forEach((token, index) => {
      const positiveWeight = this.positive.get(token);
      const negativeWeight = this.negative.get(token);
      if (positiveWeight === undefined && negativeWeight === undefined) {
        return;
      }

      const previous = index > 0 ? tokens[index - 1] : undefined;
      const multiplier = (previous !== undefined ? this.intensifiers.get(previous) : undefined) ?? 1;
      const negated = tokens
        .slice(Math.max(0, index - NEGATION_WINDOW), index)
        .some((candidate) => this.negators.has(candidate));

      const isPositive = positiveWeight !== undefined;
      const weight = (positiveWeight ?? negativeWeight ?? 0) * multiplier;
      if (isPositive !== negated) {
        positive += weight;
      } else {
        negative += weight;
      }
    });

    const total = positive + negative;
    if (total === 0) {
      return { ...NEUTRAL_WHEN_SILENT };
    }

    const dominance = Math.abs(positive - negative) / total;
    const strength = Math.min(1, total / 2);
    const polarity: Polarity = positive > negative ? "positive" : negative > positive ? "negative" : "neutral";
    return { polarity, confidence: roundTo(dominance * strength, 4) };
  }
}

const RemoteScoreSchema = z.object({
  polarity: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["positive", "negative", "neutral"]),
  ),
  confidence: z.number().min(0).max(1),
});

export interface RemoteModelOptions {
  baseUrl: string;
  version: string;
  timeoutMs?: number;
}

/** Client for an external `POST /classify` scoring service. */
export class RemoteSentimentModel implements SentimentModel {
  readonly version: string;
  private readonly http: AxiosInstance;

  constructor(private readonly options: RemoteModelOptions, http?: AxiosInstance) {
    this.version = options.version;
    this.http = http ?? axios.create({ timeout: options.timeoutMs ?? 10_000 });
  }

  async score(text: string): Promise<ModelScore> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(`${this.options.baseUrl}/classify`, {
        text,
        modelVersion: this.version,
      });
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === undefined || status === 429 || status >= 500) {
          throw new ClassifierUnavailableError(
            status === undefined ? `Classifier unreachable: ${error.message}` : `Classifier responded ${status}`,
          );
        }
      }
      throw error;
    }

    const parsed = RemoteScoreSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Classifier returned an invalid payload: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return parsed.data;
  }
}

export function createSentimentModel(): SentimentModel {
  if (config.CLASSIFIER_URL) {
    return new RemoteSentimentModel({
      baseUrl: config.CLASSIFIER_URL.replace(/\/+$/, ""),
      version: config.MODEL_VERSION ?? "remote",
    });
  }
  return new LexiconSentimentModel(loadLexicon(), config.MODEL_VERSION);
}
