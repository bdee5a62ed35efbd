/**
 * Lexical helpers for relevance scoring.
 *
 * Deliberately shallow: lowercase word tokens, no stemming.
 */

const WORD_REGEX = /[\p{L}\p{N}]+/gu;

/** Words too common to count as description keywords. */
const STOP_WORDS = new Set([
  "about", "after", "all", "also", "and", "any", "are", "but", "can", "for",
  "from", "has", "have", "how", "into", "its", "not", "one", "other", "our",
  "should", "that", "the", "their", "them", "then", "there", "these", "this",
  "use", "using", "was", "what", "when", "which", "while", "will", "with", "you", "your",
]);

/** Minimum length for a description keyword. */
export const MIN_KEYWORD_LENGTH = 3;

/** Lowercased word tokens, in order. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_REGEX) ?? [];
}

/** Distinct keywords of a description (stop words and short words dropped). */
export function extractKeywords(text: string): string[] {
  const keywords = new Set<string>();
  for (const token of tokenize(text)) {
    if (token.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(token)) {
      keywords.add(token);
    }
  }
  return [...keywords];
}

/**
 * Whole-word phrase match: the phrase's tokens appear contiguously in
 * `tokens`. An empty phrase never matches.
 */
export function containsPhrase(tokens: readonly string[], phrase: readonly string[]): boolean {
  if (phrase.length === 0 || phrase.length > tokens.length) return false;

  for (let start = 0; start + phrase.length <= tokens.length; start++) {
    let matched = true;
    for (let offset = 0; offset < phrase.length; offset++) {
      if (tokens[start + offset] !== phrase[offset]) {
        matched = false;
        break;
      }
    }
    if (matched) return true;
  }
  return false;
}
