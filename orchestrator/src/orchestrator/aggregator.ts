import { POLARITIES } from "./types.js";
import type {
  AggregatedSentiment,
  ClassifiedMention,
  NotableMention,
  Polarity,
  SentimentCounts,
  SentimentDistribution,
  Theme,
  ThemeAggregate,
  UnclassifiedMention,
} from "./types.js";
import { roundTo } from "./utils.js";

export interface AggregateOptions {
  escalationThresholdPct: number;
  notableTopK: number;
}

export interface AggregateInput {
  themes: readonly Theme[];
  unclassified: readonly UnclassifiedMention[];
}

export function countPolarities(mentions: readonly ClassifiedMention[]): SentimentCounts {
  const counts: SentimentCounts = { positive: 0, negative: 0, neutral: 0 };
  mentions.forEach((mention) => {
    counts[mention.polarity] += 1;
  });
  return counts;
}

/**
 * Whole percentages that sum to exactly 100. The rounding residual lands on
 * the largest bucket (positive, negative, neutral on ties).
 */
export function computeDistribution(counts: SentimentCounts): SentimentDistribution {
  const total = counts.positive + counts.negative + counts.neutral;
  if (total === 0) {
    return { positive: 0, negative: 0, neutral: 0 };
  }

  const distribution: SentimentDistribution = {
    positive: Math.round((counts.positive / total) * 100),
    negative: Math.round((counts.negative / total) * 100),
    neutral: Math.round((counts.neutral / total) * 100),
  };

  const residual = 100 - (distribution.positive + distribution.negative + distribution.neutral);
  if (residual !== 0) {
    const largest = POLARITIES.reduce<Polarity>(
      (current, polarity) => (counts[polarity] > counts[current] ? polarity : current),
      "positive",
    );
    distribution[largest] += residual;
  }
  return distribution;
}

function compareNotable(a: NotableMention, b: NotableMention): number {
  return (
    b.score - a.score ||
    b.mention.confidence - a.mention.confidence ||
    a.mention.timestamp - b.mention.timestamp ||
    (a.mention.id < b.mention.id ? -1 : a.mention.id > b.mention.id ? 1 : 0)
  );
}

function selectNotable(themes: readonly Theme[], topK: number): Record<Polarity, NotableMention[]> {
  const largest = themes.reduce((max, theme) => Math.max(max, theme.members.length), 0);
  const buckets: Record<Polarity, NotableMention[]> = { positive: [], negative: [], neutral: [] };
  if (largest === 0) {
    return buckets;
  }

  themes.forEach((theme) => {
    const weight = theme.members.length / largest;
    theme.members.forEach((mention) => {
      buckets[mention.polarity].push({ mention, themeId: theme.id, score: mention.confidence * weight });
    });
  });

  for (const polarity of POLARITIES) {
    buckets[polarity] = buckets[polarity]
      .sort(compareNotable)
      .slice(0, topK)
      .map((notable) => ({ ...notable, score: roundTo(notable.score, 4) }));
  }
  return buckets;
}

export function aggregateSentiment(input: AggregateInput, options: AggregateOptions): AggregatedSentiment {
  const classified = input.themes.flatMap((theme) => theme.members);
  const totalClassified = classified.length;
  const counts = countPolarities(classified);

  const themes: ThemeAggregate[] = input.themes
    .map((theme) => {
      const themeCounts = countPolarities(theme.members);
      const negativeShare = totalClassified === 0 ? 0 : (themeCounts.negative / totalClassified) * 100;
      return {
        theme,
        counts: themeCounts,
        distribution: computeDistribution(themeCounts),
        negativeShareOfTotal: roundTo(negativeShare, 2),
        escalated: negativeShare > options.escalationThresholdPct,
      };
    })
    .sort((a, b) => b.theme.members.length - a.theme.members.length);

  return {
    totalClassified,
    counts,
    distribution: computeDistribution(counts),
    themes,
    notable: selectNotable(input.themes, options.notableTopK),
    unclassified: [...input.unclassified],
  };
}
