import type { RawRecord, SourceChannel } from "./mention.js";

export interface MentionSource {
  readonly name: string;
  readonly channel: SourceChannel;
  fetch(since: Date): Promise<RawRecord[]>;
}
