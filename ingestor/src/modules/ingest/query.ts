import type { SearchQuery } from "./types/mention.js";

function quoteTerm(term: string): string {
  return /\s/.test(term) ? `"${term}"` : term;
}

export function buildSearchQueryString(query: SearchQuery): string {
  const brand = quoteTerm(query.brand.trim());
  const keywords = query.keywords.map((keyword) => keyword.trim()).filter(Boolean);
  if (keywords.length === 0) {
    return brand;
  }
  return `${brand} AND (${keywords.map(quoteTerm).join(" OR ")})`;
}

export function parseKeywords(raw: string): string[] {
  return Array.from(
    new Set(
      raw
        .split(",")
        .map((keyword) => keyword.trim())
        .filter((keyword) => keyword.length > 0),
    ),
  );
}
