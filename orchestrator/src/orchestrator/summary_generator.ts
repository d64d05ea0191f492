import type { ClusteringMode } from "./config.js";
import { SynthesisDefectError } from "./errors.js";
import { matchRule, renderTemplate, type RecommendationRuleSet } from "./recommendations.js";
import { POLARITIES } from "./types.js";
import type {
  AggregatedSentiment,
  IllustrativeExample,
  Recommendation,
  Report,
  ReportNotableMention,
  ReportTheme,
  ThemeAggregate,
} from "./types.js";
import { deepFreeze } from "./utils.js";

const EXCERPT_LENGTH = 280;

export interface SynthesisAuditInput {
  modelVersion: string;
  clusteringMode: ClusteringMode;
  confidenceThreshold: number;
  similarityThreshold: number;
  escalationThresholdPct: number;
}

export interface SynthesisInput {
  runId: string;
  brand: string;
  aggregated: AggregatedSentiment;
  rules: RecommendationRuleSet;
  audit: SynthesisAuditInput;
  partial?: boolean;
  illustrativeExamples?: readonly IllustrativeExample[];
  generatedAt?: Date;
}

function plural(count: number, noun: string): string {
  return `${count} ${count === 1 ? noun : `${noun}s`}`;
}

export function excerpt(text: string, length = EXCERPT_LENGTH): string {
  return text.length > length ? `${text.slice(0, length - 3)}...` : text;
}

function buildRecommendations(input: SynthesisInput): Recommendation[] {
  const recommendations: Recommendation[] = [];
  input.aggregated.themes.forEach((aggregate) => {
    const rule = matchRule(input.rules, aggregate);
    const template = rule ?? (aggregate.escalated ? input.rules.fallback : undefined);
    if (!template) {
      return;
    }
    const variables = {
      brand: input.brand,
      theme: aggregate.theme.label,
      mentions: aggregate.theme.members.length,
      negativeShare: aggregate.distribution.negative,
      positiveShare: aggregate.distribution.positive,
    };
    recommendations.push({
      index: recommendations.length + 1,
      ruleId: rule?.id ?? "fallback",
      themeId: aggregate.theme.id,
      action: renderTemplate(template.action, variables),
      rationale: renderTemplate(template.rationale, variables),
      tactics: template.tactics.map((tactic) => renderTemplate(tactic, variables)),
      escalation: aggregate.escalated,
    });
  });
  return recommendations;
}

function buildNotableMentions(aggregated: AggregatedSentiment): ReportNotableMention[] {
  return POLARITIES.flatMap((polarity) =>
    aggregated.notable[polarity].map(({ mention, themeId }) => {
      const entry: ReportNotableMention = {
        mentionId: mention.id,
        polarity: mention.polarity,
        confidence: mention.confidence,
        source: mention.source,
        excerpt: excerpt(mention.rawText),
        themeId,
        provenance: mention.provenance,
      };
      if (mention.url) {
        entry.url = mention.url;
      }
      return entry;
    }),
  );
}

function toReportTheme(aggregate: ThemeAggregate): ReportTheme {
  return {
    id: aggregate.theme.id,
    label: aggregate.theme.label,
    keywords: [...aggregate.theme.keywords],
    representativeText: excerpt(aggregate.theme.representativeText),
    mentionCount: aggregate.theme.members.length,
    sentiment: { ...aggregate.distribution },
    negativeShareOfTotal: aggregate.negativeShareOfTotal,
    escalated: aggregate.escalated,
  };
}

export function buildExecutiveSummary(brand: string, aggregated: AggregatedSentiment, partial: boolean): string {
  const sentences: string[] = [];
  if (partial) {
    sentences.push("Partial report: the run was cancelled before every mention was processed.");
  }

  if (aggregated.totalClassified === 0) {
    sentences.push(`No mentions of ${brand} could be classified in this window.`);
  } else {
    const { positive, negative, neutral } = aggregated.distribution;
    sentences.push(
      `${brand} received ${plural(aggregated.totalClassified, "classified mention")}: ${positive}% positive, ${negative}% negative, ${neutral}% neutral.`,
    );

    const lead = aggregated.themes[0];
    if (lead) {
      sentences.push(
        `${plural(aggregated.themes.length, "theme")} identified; the largest is "${lead.theme.label}" with ${plural(lead.theme.members.length, "mention")}.`,
      );
    }

    const escalated = aggregated.themes.filter((aggregate) => aggregate.escalated);
    if (escalated.length > 0) {
      sentences.push(
        `Escalated: ${escalated
          .map((aggregate) => `"${aggregate.theme.label}" (${aggregate.negativeShareOfTotal}% of all mentions negative)`)
          .join(", ")}.`,
      );
    } else {
      sentences.push("No theme crossed the escalation threshold.");
    }
  }

  const unclassified = aggregated.unclassified.length;
  if (unclassified > 0) {
    sentences.push(
      `${plural(unclassified, "mention")} could not be classified and ${unclassified === 1 ? "is" : "are"} excluded from the percentages.`,
    );
  }

  return sentences.join(" ");
}

function verify(report: Report, aggregated: AggregatedSentiment): void {
  for (const aggregate of aggregated.themes) {
    if (aggregate.escalated && !report.recommendations.some((item) => item.themeId === aggregate.theme.id)) {
      throw new SynthesisDefectError(`Escalated theme "${aggregate.theme.label}" has no recommendation`, {
        themeId: aggregate.theme.id,
      });
    }
  }

  const { positive, negative, neutral } = report.sentiment;
  if (aggregated.totalClassified > 0 && positive + negative + neutral !== 100) {
    throw new SynthesisDefectError("Sentiment distribution does not sum to 100", { ...report.sentiment });
  }

  const unmeasured = report.notableMentions.find((item) => item.provenance !== "measured");
  if (unmeasured) {
    throw new SynthesisDefectError("Notable mentions must come from measured data", {
      mentionId: unmeasured.mentionId,
    });
  }
}

/**
 * Builds the immutable report from aggregator output. Throws
 * SynthesisDefectError instead of returning a report that fails its checks.
 */
export function synthesizeReport(input: SynthesisInput): Report {
  const { aggregated } = input;
  const generatedAt = input.generatedAt ?? new Date();
  const partial = input.partial ?? false;

  const report: Report = {
    runId: input.runId,
    brand: input.brand,
    date: generatedAt.toISOString().slice(0, 10),
    generatedAt: generatedAt.toISOString(),
    partial,
    executiveSummary: buildExecutiveSummary(input.brand, aggregated, partial),
    sentiment: { ...aggregated.distribution },
    counts: {
      ...aggregated.counts,
      classified: aggregated.totalClassified,
      unclassified: aggregated.unclassified.length,
    },
    themes: aggregated.themes.map(toReportTheme),
    notableMentions: buildNotableMentions(aggregated),
    recommendations: buildRecommendations(input),
    illustrativeExamples: (input.illustrativeExamples ?? []).map((example) => ({
      ...example,
      provenance: "illustrative" as const,
    })),
    audit: {
      ...input.audit,
      unclassified: aggregated.unclassified.map((mention) => ({
        mentionId: mention.id,
        source: mention.source,
        ...(mention.url ? { url: mention.url } : {}),
        reason: mention.reason,
        attempts: mention.attempts,
      })),
    },
  };

  verify(report, aggregated);
  return deepFreeze(report);
}
