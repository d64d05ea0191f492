import type { ClusteringMode } from "./config.js";
import { addToCentroid, cosineSimilarity, embedText, topTerms } from "./text_vector.js";
import type { ClassifiedMention, TermVector, Theme } from "./types.js";

const TIE_EPSILON = 1e-9;
const LABEL_TERMS = 3;
const KEYWORD_TERMS = 10;

export interface ThemeState {
  readonly id: string;
  centroid: TermVector;
  readonly members: ClassifiedMention[];
  readonly vectors: TermVector[];
}

/** Mutable clustering state for one run. */
export interface ClusteringContext {
  readonly similarityThreshold: number;
  readonly themes: ThemeState[];
  nextThemeNumber: number;
}

export interface ClusterOptions {
  mode: ClusteringMode;
  similarityThreshold: number;
}

export function createClusteringContext(similarityThreshold: number): ClusteringContext {
  return { similarityThreshold, themes: [], nextThemeNumber: 1 };
}

/**
 * Greedy single-pass assignment. Joins the most similar theme at or above the
 * threshold, otherwise opens a new one. Returns the theme id.
 */
export function assignToTheme(context: ClusteringContext, mention: ClassifiedMention): string {
  const vector = embedText(mention.rawText);

  let best: ThemeState | undefined;
  let bestSimilarity = Number.NEGATIVE_INFINITY;
  for (const theme of context.themes) {
    const similarity = cosineSimilarity(vector, theme.centroid);
    if (similarity < context.similarityThreshold) {
      continue;
    }
    const tied = Math.abs(similarity - bestSimilarity) <= TIE_EPSILON;
    if (
      best === undefined ||
      (!tied && similarity > bestSimilarity) ||
      (tied && theme.members.length > best.members.length)
    ) {
      best = theme;
      bestSimilarity = similarity;
    }
  }

  if (best) {
    best.centroid = addToCentroid(best.centroid, best.members.length, vector);
    best.members.push(mention);
    best.vectors.push(vector);
    return best.id;
  }

  const theme: ThemeState = {
    id: `theme-${context.nextThemeNumber}`,
    centroid: vector,
    members: [mention],
    vectors: [vector],
  };
  context.nextThemeNumber += 1;
  context.themes.push(theme);
  return theme.id;
}

function byTimestampThenId(a: ClassifiedMention, b: ClassifiedMention): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp - b.timestamp;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function clusterMentions(mentions: readonly ClassifiedMention[], options: ClusterOptions): Theme[] {
  const context = createClusteringContext(options.similarityThreshold);
  const ordered = options.mode === "batch" ? [...mentions].sort(byTimestampThenId) : mentions;
  for (const mention of ordered) {
    assignToTheme(context, mention);
  }
  return freezeThemes(context);
}

function representativeOf(theme: ThemeState): string {
  let bestIndex = 0;
  let bestSimilarity = Number.NEGATIVE_INFINITY;
  theme.vectors.forEach((vector, index) => {
    const similarity = cosineSimilarity(vector, theme.centroid);
    if (similarity > bestSimilarity + TIE_EPSILON) {
      bestIndex = index;
      bestSimilarity = similarity;
    }
  });
  return theme.members[bestIndex]?.rawText ?? "";
}

export function freezeThemes(context: ClusteringContext): Theme[] {
  return context.themes.map((state) => {
    const labelTerms = topTerms(state.centroid, LABEL_TERMS);
    const theme: Theme = {
      id: state.id,
      label: labelTerms.length > 0 ? labelTerms.join(" / ") : "uncategorized",
      keywords: Object.freeze(topTerms(state.centroid, KEYWORD_TERMS)),
      members: Object.freeze([...state.members]),
      representativeText: representativeOf(state),
      centroid: new Map(state.centroid),
    };
    return Object.freeze(theme);
  });
}
