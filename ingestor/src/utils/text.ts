import { createHash } from "node:crypto";

export function sanitize(text?: string | null): string {
  if (!text) return "";
  return text.replace(/\s+/g, " ").trim();
}

export function decodeHtmlEntities(input: string): string {
  return input
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

export function stripHtml(input: string): string {
  return input.replace(/<[^>]*>/g, " ");
}

export function cleanText(input: string): string {
  return sanitize(decodeHtmlEntities(stripHtml(input)));
}

export function normalizeForHash(text: string): string {
  return sanitize(text).toLowerCase();
}

export function sha256Hex(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

export function contentHash(text: string): string {
  return sha256Hex(normalizeForHash(text));
}

export function hostnameOf(rawUrl: string): string | null {
  try {
    const host = new URL(rawUrl).hostname.toLowerCase();
    return host.startsWith("www.") ? host.slice(4) : host;
  } catch {
    return null;
  }
}

export function mentionsAnyTerm(text: string, terms: readonly string[]): boolean {
  const haystack = text.toLowerCase();
  return terms.some((term) => term.trim().length > 0 && haystack.includes(term.trim().toLowerCase()));
}
