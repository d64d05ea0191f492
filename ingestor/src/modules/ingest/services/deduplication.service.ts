import type { Mention } from "../types/mention.js";

export interface DeduplicationResult {
  unique: Mention[];
  duplicates: Mention[];
}

/** Syndicated copies share a source and text; the first one seen wins. */
export class MentionDeduplicationService {
  private readonly seen = new Set<string>();

  static keyOf(mention: Mention): string {
    return `${mention.source.toLowerCase()}|${mention.contentHash}`;
  }

  admit(mention: Mention): boolean {
    const key = MentionDeduplicationService.keyOf(mention);
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);
    return true;
  }

  deduplicate(mentions: Mention[]): DeduplicationResult {
    const unique: Mention[] = [];
    const duplicates: Mention[] = [];
    for (const mention of mentions) {
      if (this.admit(mention)) {
        unique.push(mention);
      } else {
        duplicates.push(mention);
      }
    }
    return { unique, duplicates };
  }

  get size(): number {
    return this.seen.size;
  }
}
