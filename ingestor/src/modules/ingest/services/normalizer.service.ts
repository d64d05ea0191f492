import { MalformedRecordError } from "../../../utils/errors.js";
import { asArray, extractTimestamp, firstText, isRecord, readText } from "../../../utils/records.js";
import { cleanText, contentHash, hostnameOf, sha256Hex } from "../../../utils/text.js";
import type { Mention, RawRecord } from "../types/mention.js";
import type { MentionSource } from "../types/provider.js";

const BODY_FIELDS = ["raw_text", "rawText", "text", "content", "body"] as const;
const DETAIL_FIELDS = ["description", "snippet", "summary"] as const;
const SOURCE_FIELDS = ["source", "domain", "site"] as const;
const URL_FIELDS = ["url", "link", "permalink"] as const;
const ID_FIELDS = ["id", "guid", "post_id"] as const;

type SourceDescriptor = Pick<MentionSource, "name" | "channel">;

function readUrl(value: unknown): string | null {
  const direct = readText(value);
  if (direct !== null && direct.trim().length > 0) {
    return direct.trim();
  }

  // Atom: <link href="..." rel="alternate"/>, possibly repeated.
  const links = asArray(value).filter(isRecord);
  const preferred = links.find((link) => link["@_rel"] === undefined || link["@_rel"] === "alternate") ?? links[0];
  const href = preferred ? readText(preferred["@_href"]) : null;
  return href && href.trim().length > 0 ? href.trim() : null;
}

export class MentionNormalizerService {
  constructor(private readonly clock: () => number = Date.now) {}

  /** Same text from two sources must not share an id. */
  private fallbackId(channel: SourceDescriptor["channel"], sourceName: string, hash: string): string {
    return `${channel}-${sha256Hex(`${sourceName.toLowerCase()}|${hash}`).slice(0, 16)}`;
  }

  normalize(record: unknown, source: SourceDescriptor): Mention {
    if (!isRecord(record)) {
      throw new MalformedRecordError("not_an_object", source.name);
    }

    const rawText = this.extractText(record);
    if (!rawText) {
      throw new MalformedRecordError("missing_text", source.name);
    }

    const url = this.extractUrl(record);
    const sourceName = this.extractSource(record, url);
    if (!sourceName) {
      throw new MalformedRecordError("missing_source", source.name);
    }

    const hash = contentHash(rawText);
    const rawId = firstText(record, ID_FIELDS);

    const mention: Mention = {
      id: rawId ? `${source.channel}-${rawId.trim()}` : this.fallbackId(source.channel, sourceName, hash),
      source: sourceName,
      rawText,
      timestamp: extractTimestamp(record) ?? this.clock(),
      channel: source.channel,
      contentHash: hash,
      ...(url ? { url } : {}),
    };

    return Object.freeze(mention);
  }

  private extractText(record: RawRecord): string {
    const body = firstText(record, BODY_FIELDS);
    if (body) {
      return cleanText(body);
    }

    const title = firstText(record, ["title"]);
    const detail = firstText(record, DETAIL_FIELDS);
    const parts = [title, detail]
      .filter((part): part is string => part !== null)
      .map(cleanText)
      .filter((part) => part.length > 0);

    if (parts.length === 2) {
      const [head, tail] = parts;
      return /[.!?]$/.test(head) ? `${head} ${tail}` : `${head}. ${tail}`;
    }
    return parts[0] ?? "";
  }

  private extractUrl(record: RawRecord): string | null {
    for (const field of URL_FIELDS) {
      const url = readUrl(record[field]);
      if (url) return url;
    }
    return null;
  }

  private extractSource(record: RawRecord, url: string | null): string | null {
    for (const field of SOURCE_FIELDS) {
      const value = record[field];
      const name = isRecord(value) && value.name !== undefined ? readText(value.name) : readText(value);
      if (name && name.trim().length > 0) {
        return name.trim();
      }
    }
    return url ? hostnameOf(url) : null;
  }
}
