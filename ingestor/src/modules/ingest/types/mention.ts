export type SourceChannel = "social" | "news" | "blog" | "search";

/** A record exactly as a source feed returned it. Field names vary by feed. */
export type RawRecord = Record<string, unknown>;

export interface Mention {
  readonly id: string;
  readonly source: string;
  readonly rawText: string;
  /** Epoch milliseconds. */
  readonly timestamp: number;
  readonly url?: string;
  readonly channel: SourceChannel;
  /** SHA-256 of the whitespace-collapsed, lower-cased text. */
  readonly contentHash: string;
}

export interface SearchQuery {
  brand: string;
  keywords: string[];
}
