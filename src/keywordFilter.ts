import type { KeywordSet } from "./types.js";

export function parseKeywords(raw: string): KeywordSet {
  const seen = new Set<string>();
  for (const part of raw.split(",")) {
    const keyword = part.trim().toLowerCase();
    if (keyword) seen.add(keyword);
  }
  return [...seen];
}

/**
 * True when any keyword occurs in the text, ignoring case.
 * An empty keyword set matches nothing.
 */
export function matches(text: string, keywords: KeywordSet): boolean {
  if (keywords.length === 0) return false;
  const lowered = text.trim().toLowerCase();
  return keywords.some((k) => k.length > 0 && lowered.includes(k.toLowerCase()));
}
