import { readFileSync } from "node:fs";

const STOP_WORDS_FILE = new URL("../../data/stop-words.json", import.meta.url);

/** Tokens shorter than this never become keywords. */
export const MIN_KEYWORD_LENGTH = 3;

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

function loadStopWords(): ReadonlySet<string> {
  const parsed: unknown = JSON.parse(readFileSync(STOP_WORDS_FILE, "utf-8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Stop-word list must be a JSON array: ${STOP_WORDS_FILE.pathname}`);
  }
  return new Set(
    parsed.filter((w): w is string => typeof w === "string").map((w) => w.toLowerCase()),
  );
}

export const STOP_WORDS = loadStopWords();

/**
 * Lowercase word tokens of a query minus stop words and short tokens,
 * in first-seen order without repeats. May be empty.
 */
export function extractKeywords(query: string): string[] {
  const seen = new Set<string>();
  const keywords: string[] = [];
  for (const word of query.toLowerCase().match(WORD_PATTERN) ?? []) {
    if (word.length < MIN_KEYWORD_LENGTH || STOP_WORDS.has(word) || seen.has(word)) {
      continue;
    }
    seen.add(word);
    keywords.push(word);
  }
  return keywords;
}

/**
 * True when any keyword occurs in the lowercased text. No keywords never
 * matches: an empty query must not select the whole corpus.
 */
export function matchesAnyKeyword(
  text: string | undefined,
  keywords: readonly string[],
): boolean {
  if (keywords.length === 0) return false;
  const haystack = (text ?? "").toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword));
}
