import { readFileSync } from "node:fs";
import { z } from "zod";
import { tokenize } from "../utils/text.js";

export const DEFAULT_KEYWORD_COUNT = 5;
const MIN_KEYWORD_LENGTH = 4;

const stopwordsSchema = z.array(z.string());

let cachedStopwords: ReadonlySet<string> | null = null;

export function loadStopwords(): ReadonlySet<string> {
  if (!cachedStopwords) {
    const raw = readFileSync(new URL("../../data/stopwords.json", import.meta.url), "utf-8");
    const words = stopwordsSchema.parse(JSON.parse(raw));
    cachedStopwords = new Set(words.map((word) => word.toLowerCase()));
  }
  return cachedStopwords;
}

/**
 * Most frequent distinct tokens longer than three characters, stopwords
 * removed. Ties keep first-occurrence order so output is deterministic.
 */
export function extractKeywords(
  text: string,
  limit: number = DEFAULT_KEYWORD_COUNT,
  stopwords: ReadonlySet<string> = loadStopwords(),
): string[] {
  const counts = new Map<string, { count: number; firstSeen: number }>();

  tokenize(text).forEach((token, position) => {
    if (token.length < MIN_KEYWORD_LENGTH || stopwords.has(token)) {
      return;
    }
    const entry = counts.get(token);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(token, { count: 1, firstSeen: position });
    }
  });

  return [...counts.entries()]
    .sort((a, b) => b[1].count - a[1].count || a[1].firstSeen - b[1].firstSeen)
    .slice(0, limit)
    .map(([token]) => token);
}
