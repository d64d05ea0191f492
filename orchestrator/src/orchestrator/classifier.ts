import { sha256Hex } from "@mention-pulse/ingestor";

import { ClassifierUnavailableError } from "./errors.js";
import { errorMessage } from "./error_utils.js";
import { logger } from "./logger.js";
import { classificationsTotal, classifierRetriesTotal, unclassifiedMentionsTotal } from "./metrics.js";
import type { SentimentModel } from "./sentiment_model.js";
import type {
  ClassificationOutcome,
  ClassifiedMention,
  Mention,
  ModelScore,
  UnclassifiedMention,
  UnclassifiedReason,
} from "./types.js";
import { exponentialBackoff } from "./utils.js";

export interface ClassifierOptions {
  confidenceThreshold: number;
  maxAttempts: number;
  retryBaseDelaySeconds: number;
}

/** Model scores keyed by `modelVersion:sha256(text)`, least recently used evicted first. */
export class ScoreCache {
  private readonly entries = new Map<string, ModelScore>();

  constructor(private readonly maxEntries = 10_000) {}

  static keyOf(modelVersion: string, text: string): string {
    return `${modelVersion}:${sha256Hex(text)}`;
  }

  get(key: string): ModelScore | undefined {
    const score = this.entries.get(key);
    if (score) {
      this.entries.delete(key);
      this.entries.set(key, score);
    }
    return score;
  }

  set(key: string, score: ModelScore): void {
    this.entries.delete(key);
    this.entries.set(key, score);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

export class SentimentClassifier {
  constructor(
    private readonly model: SentimentModel,
    private readonly options: ClassifierOptions,
    private readonly cache: ScoreCache = new ScoreCache(),
  ) {}

  get modelVersion(): string {
    return this.model.version;
  }

  async classify(mention: Mention): Promise<ClassificationOutcome> {
    const key = ScoreCache.keyOf(this.model.version, mention.rawText);
    const cached = this.cache.get(key);
    if (cached) {
      return this.toClassified(mention, cached);
    }

    let attempts = 0;
    try {
      const score = await exponentialBackoff(
        async () => {
          attempts += 1;
          return this.model.score(mention.rawText);
        },
        {
          retries: Math.max(0, this.options.maxAttempts - 1),
          baseDelaySeconds: this.options.retryBaseDelaySeconds,
          shouldRetry: (error) => error instanceof ClassifierUnavailableError,
          onRetry: (error, attempt, delaySeconds) => {
            classifierRetriesTotal.inc();
            logger.debug(
              { mentionId: mention.id, attempt, delaySeconds, error: errorMessage(error) },
              "Classifier unavailable; retrying",
            );
          },
        },
      );
      this.cache.set(key, score);
      return this.toClassified(mention, score);
    } catch (error) {
      const reason: UnclassifiedReason =
        error instanceof ClassifierUnavailableError ? "classifier_unavailable" : "model_error";
      logger.warn(
        { mentionId: mention.id, source: mention.source, attempts, reason, error: errorMessage(error) },
        "Mention left unclassified",
      );
      return this.toUnclassified(mention, reason, attempts);
    }
  }

  private toClassified(mention: Mention, score: ModelScore): ClassifiedMention {
    const polarity = score.confidence < this.options.confidenceThreshold ? "neutral" : score.polarity;
    classificationsTotal.inc({ polarity });
    const classified: ClassifiedMention = {
      ...mention,
      status: "classified",
      polarity,
      rawPolarity: score.polarity,
      confidence: score.confidence,
      modelVersion: this.model.version,
      provenance: "measured",
    };
    return Object.freeze(classified);
  }

  private toUnclassified(mention: Mention, reason: UnclassifiedReason, attempts: number): UnclassifiedMention {
    unclassifiedMentionsTotal.inc({ reason });
    const unclassified: UnclassifiedMention = {
      ...mention,
      status: "unclassified",
      reason,
      attempts,
      modelVersion: this.model.version,
    };
    return Object.freeze(unclassified);
  }
}
