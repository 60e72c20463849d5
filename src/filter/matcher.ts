/**
 * Keyword Matcher
 *
 * Case-insensitive substring containment against the native and foreign
 * keyword lists. No tokenization and no word boundaries: a short keyword
 * inside a longer word counts as a match.
 */

import type { KeywordSets } from '../types/index.js';

/**
 * Join title and summary into the text the matcher sees
 */
export function combineText(title: string, summary: string): string {
  return `${title}\n${summary}`;
}

function* allKeywords(keywordSets: KeywordSets): Generator<string> {
  yield* keywordSets.native;
  yield* keywordSets.foreign;
}

/**
 * Every keyword found in the text, in configuration order
 */
export function findMatchedKeywords(text: string, keywordSets: KeywordSets): string[] {
  const lowerText = text.toLowerCase();
  const matched: string[] = [];

  for (const keyword of allKeywords(keywordSets)) {
    if (keyword.length > 0 && lowerText.includes(keyword.toLowerCase())) {
      matched.push(keyword);
    }
  }

  return matched;
}

export function matches(text: string, keywordSets: KeywordSets): boolean {
  const lowerText = text.toLowerCase();

  for (const keyword of allKeywords(keywordSets)) {
    if (keyword.length > 0 && lowerText.includes(keyword.toLowerCase())) {
      return true;
    }
  }

  return false;
}

/**
 * Restrict matching to the native list (sources that are always native-language)
 */
export function nativeOnly(keywordSets: KeywordSets): KeywordSets {
  return { native: keywordSets.native, foreign: [] };
}
