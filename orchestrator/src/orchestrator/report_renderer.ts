import type { Polarity, Report } from "./types.js";

export interface ChartData {
  sentiment: {
    Positive: number;
    Negative: number;
    Neutral: number;
  };
}

function titleCase(polarity: Polarity): string {
  return polarity.charAt(0).toUpperCase() + polarity.slice(1);
}

export function buildChartData(report: Report): ChartData {
  return {
    sentiment: {
      Positive: report.sentiment.positive,
      Negative: report.sentiment.negative,
      Neutral: report.sentiment.neutral,
    },
  };
}

function themeSection(report: Report): string[] {
  if (report.themes.length === 0) {
    return ["_No themes identified._", ""];
  }
  return report.themes.flatMap((theme, index) => [
    `### ${index + 1}. ${theme.label}${theme.escalated ? " [ESCALATED]" : ""}`,
    `- Mentions: ${theme.mentionCount}`,
    `- Sentiment: ${theme.sentiment.positive}% positive, ${theme.sentiment.negative}% negative, ${theme.sentiment.neutral}% neutral`,
    `- Keywords: ${theme.keywords.join(", ")}`,
    `- Representative: "${theme.representativeText}"`,
    "",
  ]);
}

function notableSection(report: Report): string[] {
  if (report.notableMentions.length === 0) {
    return ["_No notable mentions._", ""];
  }
  return [
    ...report.notableMentions.map((mention) => {
      const attribution = mention.url ? `${mention.source}, ${mention.url}` : mention.source;
      return `- [${titleCase(mention.polarity)}] "${mention.excerpt}" (source: ${attribution})`;
    }),
    "",
  ];
}

function recommendationSection(report: Report): string[] {
  if (report.recommendations.length === 0) {
    return ["_No recommendations._", ""];
  }
  return report.recommendations.flatMap((recommendation) => [
    `${recommendation.index}. **${recommendation.action}**${recommendation.escalation ? " (escalation)" : ""}`,
    `   - Rationale: ${recommendation.rationale}`,
    ...(recommendation.tactics.length > 0 ? [`   - Tactics: ${recommendation.tactics.join("; ")}`] : []),
    "",
  ]);
}

function illustrativeSection(report: Report): string[] {
  if (report.illustrativeExamples.length === 0) {
    return [];
  }
  return [
    "## Illustrative Examples (not measured data)",
    "",
    ...report.illustrativeExamples.map(
      (example) => `- [${titleCase(example.polarity)}] "${example.text}"${example.note ? ` (${example.note})` : ""}`,
    ),
    "",
  ];
}

export function renderReportMarkdown(report: Report): string {
  const lines = [
    `# Brand Monitoring Report: ${report.brand}`,
    "",
    `Date: ${report.date} | Run: ${report.runId}`,
    "",
    ...(report.partial
      ? ["> **Partial report:** the run was cancelled before every mention was processed.", ""]
      : []),
    "## Executive Summary",
    "",
    report.executiveSummary,
    "",
    "## Sentiment Analysis",
    "",
    `- Positive: ${report.sentiment.positive}%`,
    `- Negative: ${report.sentiment.negative}%`,
    `- Neutral: ${report.sentiment.neutral}%`,
    `- Classified mentions: ${report.counts.classified} (unclassified: ${report.counts.unclassified})`,
    "",
    "## Key Themes & Topics",
    "",
    ...themeSection(report),
    "## Notable Mentions",
    "",
    ...notableSection(report),
    "## Actionable Recommendations",
    "",
    ...recommendationSection(report),
    ...illustrativeSection(report),
  ];
  return `${lines.join("\n").trimEnd()}\n`;
}
