/**
 * Keyword extraction for requirement search.
 */

import { readFileSync } from 'fs';

const STOPWORDS: ReadonlySet<string> = new Set(loadStopwords());

function loadStopwords(): string[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./stopwords.json', import.meta.url), 'utf-8')
  );
  return Array.isArray(raw) ? raw.filter((word): word is string => typeof word === 'string') : [];
}

/**
 * Lower-cased words of three or more characters, minus stop words, in
 * first-seen order without repeats.
 */
export function extractKeywords(...texts: string[]): string[] {
  const seen = new Set<string>();
  for (const text of texts) {
    for (const word of text.toLowerCase().match(/[a-z0-9][a-z0-9_]*/g) ?? []) {
      if (word.length >= 3 && !STOPWORDS.has(word)) {
        seen.add(word);
      }
    }
  }
  return Array.from(seen);
}
