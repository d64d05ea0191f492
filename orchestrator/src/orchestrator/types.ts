import type { IngestSummary, Mention } from "@mention-pulse/ingestor";
import type { ClusteringMode } from "./config.js";

export type { Mention };

export type Polarity = "positive" | "negative" | "neutral";
export type Provenance = "measured" | "illustrative";

export const POLARITIES: readonly Polarity[] = ["positive", "negative", "neutral"];

export interface ModelScore {
  polarity: Polarity;
  /** In [0, 1]. */
  confidence: number;
}

export interface ClassifiedMention extends Mention {
  readonly status: "classified";
  readonly polarity: Polarity;
  /** What the model said before the confidence threshold was applied. */
  readonly rawPolarity: Polarity;
  readonly confidence: number;
  readonly modelVersion: string;
  readonly provenance: Provenance;
}

export type UnclassifiedReason = "classifier_unavailable" | "model_error";

export interface UnclassifiedMention extends Mention {
  readonly status: "unclassified";
  readonly reason: UnclassifiedReason;
  readonly attempts: number;
  readonly modelVersion: string;
}

export type ClassificationOutcome = ClassifiedMention | UnclassifiedMention;

/** Sparse term vector keyed by token. */
export type TermVector = ReadonlyMap<string, number>;

export interface Theme {
  readonly id: string;
  readonly label: string;
  readonly keywords: readonly string[];
  readonly members: readonly ClassifiedMention[];
  readonly representativeText: string;
  readonly centroid: TermVector;
}

export interface SentimentCounts {
  positive: number;
  negative: number;
  neutral: number;
}

/** Whole percentages summing to exactly 100, or all zero for an empty set. */
export interface SentimentDistribution {
  positive: number;
  negative: number;
  neutral: number;
}

export interface ThemeAggregate {
  theme: Theme;
  counts: SentimentCounts;
  distribution: SentimentDistribution;
  /** Theme negatives as a percentage of every classified mention in the run. */
  negativeShareOfTotal: number;
  escalated: boolean;
}

export interface NotableMention {
  mention: ClassifiedMention;
  themeId: string;
  score: number;
}

export interface AggregatedSentiment {
  totalClassified: number;
  counts: SentimentCounts;
  distribution: SentimentDistribution;
  themes: ThemeAggregate[];
  notable: Record<Polarity, NotableMention[]>;
  unclassified: UnclassifiedMention[];
}

export interface ReportTheme {
  id: string;
  label: string;
  keywords: string[];
  representativeText: string;
  mentionCount: number;
  sentiment: SentimentDistribution;
  negativeShareOfTotal: number;
  escalated: boolean;
}

export interface ReportNotableMention {
  mentionId: string;
  polarity: Polarity;
  confidence: number;
  source: string;
  url?: string;
  excerpt: string;
  themeId: string;
  provenance: Provenance;
}

export interface Recommendation {
  index: number;
  ruleId: string;
  themeId?: string;
  action: string;
  rationale: string;
  tactics: string[];
  escalation: boolean;
}

export interface IllustrativeExample {
  text: string;
  polarity: Polarity;
  note?: string;
}

export interface ReportIllustrativeExample extends IllustrativeExample {
  provenance: "illustrative";
}

export interface ReportAudit {
  modelVersion: string;
  clusteringMode: ClusteringMode;
  confidenceThreshold: number;
  similarityThreshold: number;
  escalationThresholdPct: number;
  unclassified: Array<{
    mentionId: string;
    source: string;
    url?: string;
    reason: UnclassifiedReason;
    attempts: number;
  }>;
}

export interface Report {
  runId: string;
  brand: string;
  /** YYYY-MM-DD (UTC). */
  date: string;
  generatedAt: string;
  partial: boolean;
  executiveSummary: string;
  sentiment: SentimentDistribution;
  counts: SentimentCounts & { classified: number; unclassified: number };
  themes: ReportTheme[];
  notableMentions: ReportNotableMention[];
  recommendations: Recommendation[];
  illustrativeExamples: ReportIllustrativeExample[];
  audit: ReportAudit;
}

export interface RunRequest {
  brand: string;
  keywords: string[];
  since: Date;
}

export interface PipelineTimings {
  totalMs: number;
  /** Ingest and classification overlap; this covers both. */
  classifyMs: number;
  clusterMs: number;
  aggregateMs: number;
  synthesisMs: number;
}

export interface QueueStats {
  admitted: number;
  rejected: number;
  discarded: number;
}

export interface PipelineResult {
  report: Report;
  markdown: string;
  ingest: IngestSummary;
  queue: QueueStats;
  timings: PipelineTimings;
}
